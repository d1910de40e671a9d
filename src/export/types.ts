// ═══════════════════════════════════════════════════════════════════════════════
// EXPORT TYPES — Saved Stories Export
// ═══════════════════════════════════════════════════════════════════════════════

import type { Writable } from 'node:stream';
import type { FavoriteItem } from '../favorites/types.js';

// ─────────────────────────────────────────────────────────────────────────────────
// EXPORT FORMATS
// ─────────────────────────────────────────────────────────────────────────────────

export type ExportFormat = 'csv' | 'txt' | 'html' | 'markdown' | 'json';

export const EXPORT_FORMATS: readonly ExportFormat[] = ['csv', 'txt', 'html', 'markdown', 'json'];

export const FILE_EXTENSIONS: Record<ExportFormat, string> = {
  csv: 'csv',
  txt: 'txt',
  html: 'html',
  markdown: 'md',
  json: 'json',
};

export const MIME_TYPES: Record<ExportFormat, string> = {
  csv: 'text/csv',
  txt: 'text/plain',
  html: 'text/html',
  markdown: 'text/markdown',
  json: 'application/json',
};

// ─────────────────────────────────────────────────────────────────────────────────
// SERIALIZATION INPUT
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * A saved item ready for export. `displayTitle` comes from whoever derives
 * display titles; an empty one falls back to title, url, then id.
 */
export interface ExportEntry extends FavoriteItem {
  displayTitle?: string;
}

export type DisplayTitleResolver = (item: FavoriteItem) => string;

export interface FormatContext {
  documentTitle: string;
  exportedAt: Date;
  discussionUrl(itemId: string): string;
}

// ─────────────────────────────────────────────────────────────────────────────────
// DELIVERY
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Anything a share action can be pointed at.
 */
export interface ShareTarget {
  uri: string;
  mimeType: string;
}

/**
 * The ephemeral export file in the app-private export directory.
 */
export interface ExportFileRef extends ShareTarget {
  path: string;
  filename: string;
  format: ExportFormat;
}

/**
 * A caller-chosen, already-resolved destination.
 */
export interface ExportDestination {
  uri: string;
  openWriteStream(): Promise<Writable>;
}

export interface ShareLauncher {
  share(target: ShareTarget): Promise<void>;
}

// ─────────────────────────────────────────────────────────────────────────────────
// ERRORS
// ─────────────────────────────────────────────────────────────────────────────────

export type ExportStage = 'acquire' | 'serialize' | 'deliver';

export class ExportStageError extends Error {
  constructor(
    readonly stage: ExportStage,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'ExportStageError';
  }
}

// ─────────────────────────────────────────────────────────────────────────────────
// SETTINGS
// ─────────────────────────────────────────────────────────────────────────────────

export interface ExportSettings {
  documentTitle: string;
  discussionUrlTemplate: string;
  shareDelayMs: number;
}

export function discussionUrl(template: string, itemId: string): string {
  return template.replace('%s', itemId);
}
