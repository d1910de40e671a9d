// ═══════════════════════════════════════════════════════════════════════════════
// EXPORT SERVICE — Acquire, Serialize, Deliver Saved Stories
// ═══════════════════════════════════════════════════════════════════════════════
//
// Each run: progress started → acquire → serialize → deliver → succeeded or
// failed. Acquisition, serialization and file writes run on the background
// executor; progress updates and the share action run on the interactive one.
//
// After a successful share export two follow-ups run independently:
// - promotion of the file into shared Downloads, then a notice
// - the share action, after the configured delay
//
// ═══════════════════════════════════════════════════════════════════════════════

import { setTimeout as delay } from 'node:timers/promises';
import { v4 as uuidv4 } from 'uuid';
import { FavoriteCursor } from '../favorites/cursor.js';
import { MissingColumnError } from '../favorites/errors.js';
import { querySavedStories } from '../favorites/manager.js';
import type { SavedStoriesStore } from '../favorites/types.js';
import type { Executor } from '../infrastructure/executors/index.js';
import { loggers, toError, type Logger } from '../logging/index.js';
import { writeToSink, type ExportFileWriter } from './files.js';
import { getFormatter } from './formatters.js';
import type { ProgressHandle, ProgressNotifier } from './progress.js';
import {
  discussionUrl,
  ExportStageError,
  type DisplayTitleResolver,
  type ExportDestination,
  type ExportEntry,
  type ExportFileRef,
  type ExportFormat,
  type ExportSettings,
  type ShareLauncher,
} from './types.js';

const logger = loggers.export();

export const PROMOTION_NOTICES = {
  saved: (location: string) => `Saved to Downloads: ${location}`,
  fallback: 'Could not save to Downloads. Use the share option.',
};

// ─────────────────────────────────────────────────────────────────────────────────
// TYPES
// ─────────────────────────────────────────────────────────────────────────────────

export interface DownloadsPromotion {
  promote(file: ExportFileRef): Promise<string | null>;
}

export interface FavoriteExportServiceDeps {
  store: SavedStoriesStore;
  io: Executor;
  main: Executor;
  writer: ExportFileWriter;
  promoter: DownloadsPromotion;
  share: ShareLauncher;
  notifier: ProgressNotifier;
  settings: ExportSettings;
  displayTitle?: DisplayTitleResolver;
  now?: () => Date;
}

// ─────────────────────────────────────────────────────────────────────────────────
// EXPORT SERVICE
// ─────────────────────────────────────────────────────────────────────────────────

export class FavoriteExportService {
  private readonly now: () => Date;
  private readonly followUps = new Set<Promise<void>>();

  constructor(private readonly deps: FavoriteExportServiceDeps) {
    this.now = deps.now ?? (() => new Date());
  }

  // ═══════════════════════════════════════════════════════════════════════════════
  // EXPORT
  // ═══════════════════════════════════════════════════════════════════════════════

  /**
   * Export matching stories to the ephemeral share file. Resolves to the
   * file on success, null when nothing matched or any stage failed.
   */
  async exportToShare(filter: string | null, format: ExportFormat): Promise<ExportFileRef | null> {
    const runId = uuidv4();
    const log = logger.child({ runId });
    const startTime = Date.now();

    const progress = await this.startProgress(runId, log);

    let file: ExportFileRef;
    try {
      file = await this.deps.io.execute(async () => {
        const content = await this.produce(filter, format);
        return this.deliverToFile(content, format);
      });
    } catch (error) {
      this.logFailure(log, error, format);
      await this.settle(log, progress, handle => handle.failed());
      return null;
    }

    log.time('Export written', startTime, { format, filename: file.filename });
    await this.settle(log, progress, handle => handle.succeeded(file));

    this.track(this.promote(file, log));
    this.track(this.shareAfterDelay(file, log));
    return file;
  }

  /**
   * Export matching stories straight into a caller-resolved destination.
   */
  async exportToDestination(
    filter: string | null,
    format: ExportFormat,
    destination: ExportDestination
  ): Promise<boolean> {
    const runId = uuidv4();
    const log = logger.child({ runId });
    const startTime = Date.now();

    const progress = await this.startProgress(runId, log);

    try {
      await this.deps.io.execute(async () => {
        const content = await this.produce(filter, format);
        await this.deliverToDestination(content, destination);
      });
    } catch (error) {
      this.logFailure(log, error, format);
      await this.settle(log, progress, handle => handle.failed());
      return false;
    }

    log.time('Export delivered', startTime, { format, uri: destination.uri });
    await this.settle(log, progress, handle => handle.succeeded());
    return true;
  }

  /**
   * Resolves once every promotion and share follow-up has finished.
   */
  async drain(): Promise<void> {
    while (this.followUps.size > 0) {
      await Promise.all([...this.followUps]);
    }
  }

  // ═══════════════════════════════════════════════════════════════════════════════
  // STAGES
  // ═══════════════════════════════════════════════════════════════════════════════

  private async produce(filter: string | null, format: ExportFormat): Promise<string> {
    let cursor: FavoriteCursor;
    try {
      cursor = new FavoriteCursor(await querySavedStories(this.deps.store, filter));
    } catch (error) {
      throw new ExportStageError('acquire', 'Failed to query saved stories', { cause: error });
    }

    try {
      if (cursor.count === 0) {
        throw new ExportStageError('acquire', 'No saved stories to export');
      }
      return this.serialize(cursor, format);
    } finally {
      cursor.close();
    }
  }

  private serialize(cursor: FavoriteCursor, format: ExportFormat): string {
    const { settings, displayTitle } = this.deps;

    try {
      const entries: ExportEntry[] = cursor.toArray().map(item => ({
        ...item,
        displayTitle: displayTitle?.(item),
      }));

      return getFormatter(format).format(entries, {
        documentTitle: settings.documentTitle,
        exportedAt: this.now(),
        discussionUrl: id => discussionUrl(settings.discussionUrlTemplate, id),
      });
    } catch (error) {
      const message = error instanceof MissingColumnError ? error.message : 'Failed to serialize saved stories';
      throw new ExportStageError('serialize', message, { cause: error });
    }
  }

  private async deliverToFile(content: string, format: ExportFormat): Promise<ExportFileRef> {
    try {
      return await this.deps.writer.write(content, format);
    } catch (error) {
      throw new ExportStageError('deliver', 'Failed to write export file', { cause: error });
    }
  }

  private async deliverToDestination(content: string, destination: ExportDestination): Promise<void> {
    try {
      await writeToSink(await destination.openWriteStream(), content);
    } catch (error) {
      throw new ExportStageError('deliver', 'Failed to write export destination', { cause: error });
    }
  }

  // ═══════════════════════════════════════════════════════════════════════════════
  // FOLLOW-UPS
  // ═══════════════════════════════════════════════════════════════════════════════

  private async promote(file: ExportFileRef, log: Logger): Promise<void> {
    const saved = await this.deps.io.execute(() => this.deps.promoter.promote(file));

    await this.onMain(log, 'Failed to announce Downloads result', () =>
      saved
        ? this.deps.notifier.announce(PROMOTION_NOTICES.saved(saved), 'info')
        : this.deps.notifier.announce(PROMOTION_NOTICES.fallback, 'warn')
    );
  }

  private async shareAfterDelay(file: ExportFileRef, log: Logger): Promise<void> {
    await delay(this.deps.settings.shareDelayMs);
    await this.onMain(log, 'Failed to open share dialog', () =>
      this.deps.share.share({ uri: file.uri, mimeType: file.mimeType })
    );
  }

  private track(followUp: Promise<void>): void {
    const tracked = followUp
      .catch((error: unknown) => {
        logger.error('Export follow-up failed', toError(error));
      })
      .finally(() => {
        this.followUps.delete(tracked);
      });
    this.followUps.add(tracked);
  }

  // ═══════════════════════════════════════════════════════════════════════════════
  // PROGRESS
  // ═══════════════════════════════════════════════════════════════════════════════

  private async startProgress(runId: string, log: Logger): Promise<ProgressHandle | null> {
    try {
      return await this.deps.main.execute(() => this.deps.notifier.start(runId));
    } catch (error) {
      log.error('Failed to start export progress', toError(error));
      return null;
    }
  }

  private async settle(
    log: Logger,
    progress: ProgressHandle | null,
    update: (handle: ProgressHandle) => Promise<void>
  ): Promise<void> {
    if (!progress) return;
    await this.onMain(log, 'Failed to update export progress', () => update(progress));
  }

  private async onMain(log: Logger, failure: string, task: () => Promise<void>): Promise<void> {
    try {
      await this.deps.main.execute(task);
    } catch (error) {
      log.error(failure, toError(error));
    }
  }

  private logFailure(log: Logger, error: unknown, format: ExportFormat): void {
    if (error instanceof ExportStageError && error.stage === 'acquire' && error.cause === undefined) {
      log.warn(error.message, { format });
      return;
    }
    const stage = error instanceof ExportStageError ? error.stage : 'unknown';
    log.error('Export failed', toError(error), { format, stage });
  }
}
