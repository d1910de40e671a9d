// ═══════════════════════════════════════════════════════════════════════════════
// DOWNLOADS PROMOTION — Best-Effort Copy into the Shared Downloads Area
// ═══════════════════════════════════════════════════════════════════════════════
//
// Two storage eras:
// - modern: register an entry with a shared downloads index, then stream the
//   export into the sink the index hands back
// - legacy: resolve the public downloads directory and copy straight into it
//
// Failures are logged and reported as null. Nothing here throws.
//
// ═══════════════════════════════════════════════════════════════════════════════

import { createReadStream, createWriteStream } from 'node:fs';
import { mkdir, open } from 'node:fs/promises';
import { join } from 'node:path';
import type { Writable } from 'node:stream';
import { pipeline } from 'node:stream/promises';
import type { StorageEra } from '../config/index.js';
import { loggers, toError } from '../logging/index.js';
import { formatFileTimestamp } from './dates.js';
import { FILE_EXTENSIONS, type ExportFileRef } from './types.js';

const logger = loggers.delivery();

export const DIRECTORY_DOWNLOADS = 'Downloads';

const MAX_NAME_ATTEMPTS = 100;

// ─────────────────────────────────────────────────────────────────────────────────
// TYPES
// ─────────────────────────────────────────────────────────────────────────────────

export interface DownloadRegistration {
  displayName: string;
  mimeType: string;
  relativePath: string;
}

export interface DownloadEntry {
  displayName: string;
  location: string;
  openWriteStream(): Promise<Writable>;
}

/**
 * Platform-managed index of shared files (modern era).
 */
export interface SharedDownloadsIndex {
  register(registration: DownloadRegistration): Promise<DownloadEntry | null>;
}

/**
 * Locates the public downloads directory (legacy era).
 */
export type DownloadsDirectoryResolver = () => string | Promise<string>;

export interface DownloadsPromoterOptions {
  era: StorageEra;
  fileBase: string;
  index: SharedDownloadsIndex;
  resolveDownloadsDir: DownloadsDirectoryResolver;
  now?: () => Date;
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

// ─────────────────────────────────────────────────────────────────────────────────
// FILESYSTEM INDEX
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Shared index rooted at a directory. Registering reserves a unique name,
 * adding " (n)" before the extension when the requested one is taken.
 */
export class FileSystemDownloadsIndex implements SharedDownloadsIndex {
  constructor(private readonly root: string) {}

  async register(registration: DownloadRegistration): Promise<DownloadEntry | null> {
    const directory = join(this.root, registration.relativePath);
    await mkdir(directory, { recursive: true });

    for (let attempt = 0; attempt < MAX_NAME_ATTEMPTS; attempt++) {
      const displayName = attempt === 0
        ? registration.displayName
        : withSuffix(registration.displayName, attempt);
      const location = join(directory, displayName);

      try {
        const handle = await open(location, 'wx');
        await handle.close();
      } catch (error) {
        if (isErrnoException(error) && error.code === 'EEXIST') continue;
        throw error;
      }

      return {
        displayName,
        location,
        openWriteStream: async () => createWriteStream(location),
      };
    }

    logger.warn('No free name in shared downloads', { displayName: registration.displayName });
    return null;
  }
}

function withSuffix(name: string, attempt: number): string {
  const dot = name.lastIndexOf('.');
  return dot > 0
    ? `${name.slice(0, dot)} (${attempt})${name.slice(dot)}`
    : `${name} (${attempt})`;
}

// ─────────────────────────────────────────────────────────────────────────────────
// PROMOTER
// ─────────────────────────────────────────────────────────────────────────────────

export class DownloadsPromoter {
  private readonly now: () => Date;

  constructor(private readonly options: DownloadsPromoterOptions) {
    this.now = options.now ?? (() => new Date());
  }

  filenameFor(file: ExportFileRef): string {
    return `${this.options.fileBase}-${formatFileTimestamp(this.now())}.${FILE_EXTENSIONS[file.format]}`;
  }

  /**
   * Copy the export into shared downloads. Resolves to the saved display
   * name (modern) or absolute path (legacy), or null on any failure.
   */
  async promote(file: ExportFileRef): Promise<string | null> {
    const filename = this.filenameFor(file);

    try {
      const saved = this.options.era === 'modern'
        ? await this.promoteModern(file, filename)
        : await this.promoteLegacy(file, filename);

      if (saved) {
        logger.info('Saved export to Downloads', { saved, era: this.options.era });
      }
      return saved;
    } catch (error) {
      logger.error('Failed to save export to Downloads', toError(error), {
        filename,
        era: this.options.era,
      });
      return null;
    }
  }

  private async promoteModern(file: ExportFileRef, filename: string): Promise<string | null> {
    const entry = await this.options.index.register({
      displayName: filename,
      mimeType: file.mimeType,
      relativePath: DIRECTORY_DOWNLOADS,
    });
    if (!entry) return null;

    await pipeline(createReadStream(file.path), await entry.openWriteStream());
    return entry.displayName;
  }

  private async promoteLegacy(file: ExportFileRef, filename: string): Promise<string> {
    const directory = await this.options.resolveDownloadsDir();
    await mkdir(directory, { recursive: true });

    const destination = join(directory, filename);
    await pipeline(createReadStream(file.path), createWriteStream(destination));
    return destination;
  }
}
