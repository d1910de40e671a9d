// ═══════════════════════════════════════════════════════════════════════════════
// EXPORT MODULE — Saved Stories Export & Delivery
// ═══════════════════════════════════════════════════════════════════════════════

// Types
export type {
  ExportFormat,
  ExportEntry,
  DisplayTitleResolver,
  FormatContext,
  ShareTarget,
  ExportFileRef,
  ExportDestination,
  ShareLauncher,
  ExportStage,
  ExportSettings,
} from './types.js';

// Constants
export {
  EXPORT_FORMATS,
  MIME_TYPES,
  FILE_EXTENSIONS,
  ExportStageError,
  discussionUrl,
} from './types.js';

// Formatters
export {
  CsvFormatter,
  TextFormatter,
  HtmlFormatter,
  MarkdownFormatter,
  JsonFormatter,
  CSV_HEADER,
  getFormatter,
  resolveTitle,
  type ExportFormatter,
  type ExportedDocument,
  type ExportedStory,
} from './formatters.js';

// Delivery
export { ExportFileWriter, fileDestination, writeToSink, type ExportFileWriterOptions } from './files.js';
export {
  DownloadsPromoter,
  FileSystemDownloadsIndex,
  DIRECTORY_DOWNLOADS,
  type DownloadEntry,
  type DownloadRegistration,
  type DownloadsDirectoryResolver,
  type DownloadsPromoterOptions,
  type SharedDownloadsIndex,
} from './promotion.js';

// Progress
export {
  ExportProgressNotifier,
  PROGRESS_MESSAGES,
  type ProgressHandle,
  type ProgressNotifier,
  type ProgressState,
  type NoticeLevel,
} from './progress.js';

// Service
export {
  FavoriteExportService,
  PROMOTION_NOTICES,
  type DownloadsPromotion,
  type FavoriteExportServiceDeps,
} from './service.js';
