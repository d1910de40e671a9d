// ═══════════════════════════════════════════════════════════════════════════════
// EXPORT FILES — Ephemeral Export File and Direct Destinations
// ═══════════════════════════════════════════════════════════════════════════════

import { createWriteStream } from 'node:fs';
import { mkdir, rm, writeFile } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import { Readable, type Writable } from 'node:stream';
import { pipeline } from 'node:stream/promises';
import { pathToFileURL } from 'node:url';
import { FILE_EXTENSIONS, MIME_TYPES, type ExportDestination, type ExportFileRef, type ExportFormat } from './types.js';

export interface ExportFileWriterOptions {
  /** App-private directory holding the ephemeral export */
  exportDir: string;
  fileBase: string;
}

/**
 * Writes one fixed-name file per format; each run replaces the previous one.
 */
export class ExportFileWriter {
  constructor(private readonly options: ExportFileWriterOptions) {}

  filenameFor(format: ExportFormat): string {
    return `${this.options.fileBase}.${FILE_EXTENSIONS[format]}`;
  }

  async write(content: string, format: ExportFormat): Promise<ExportFileRef> {
    const filename = this.filenameFor(format);
    const path = join(this.options.exportDir, filename);

    await mkdir(this.options.exportDir, { recursive: true });
    await rm(path, { force: true });
    // Resolves only after the data is flushed and the file closed
    await writeFile(path, content, { encoding: 'utf8', flag: 'wx' });

    return {
      path,
      filename,
      format,
      uri: pathToFileURL(path).href,
      mimeType: MIME_TYPES[format],
    };
  }
}

/**
 * Stream a document into an already-opened destination sink.
 */
export async function writeToSink(sink: Writable, content: string): Promise<void> {
  await pipeline(Readable.from([Buffer.from(content, 'utf8')]), sink);
}

/**
 * A destination backed by a file path, created or truncated on open.
 */
export function fileDestination(path: string): ExportDestination {
  return {
    uri: pathToFileURL(path).href,
    async openWriteStream(): Promise<Writable> {
      await mkdir(dirname(path), { recursive: true });
      return createWriteStream(path);
    },
  };
}
