// ═══════════════════════════════════════════════════════════════════════════════
// EXPORT PROGRESS — Started, then Succeeded or Failed
// ═══════════════════════════════════════════════════════════════════════════════

import { loggers } from '../logging/index.js';
import type { NotificationPresenter } from '../notifications/index.js';
import type { ShareTarget } from './types.js';

const logger = loggers.notifier();

// ─────────────────────────────────────────────────────────────────────────────────
// TYPES
// ─────────────────────────────────────────────────────────────────────────────────

export type ProgressState = 'started' | 'succeeded' | 'failed';

/**
 * One export run. Exactly one terminal call takes effect.
 */
export interface ProgressHandle {
  readonly runId: string;
  readonly state: ProgressState;
  succeeded(target?: ShareTarget): Promise<void>;
  failed(): Promise<void>;
}

export type NoticeLevel = 'info' | 'warn';

export interface ProgressNotifier {
  start(runId: string): Promise<ProgressHandle>;
  announce(message: string, level: NoticeLevel): Promise<void>;
}

export interface ExportProgressNotifierOptions {
  channel?: string;
  title?: string;
}

export const PROGRESS_MESSAGES = {
  started: 'Exporting saved stories...',
  succeeded: 'Export complete',
  failed: 'Export failed - no saved stories or error occurred',
  shareLabel: 'Share',
};

// ─────────────────────────────────────────────────────────────────────────────────
// NOTIFIER
// ─────────────────────────────────────────────────────────────────────────────────

export class ExportProgressNotifier implements ProgressNotifier {
  private readonly channel: string;
  private readonly title: string;

  constructor(
    private readonly presenter: NotificationPresenter,
    options: ExportProgressNotifierOptions = {}
  ) {
    this.channel = options.channel ?? 'export';
    this.title = options.title ?? 'Export saved stories';
  }

  async start(runId: string): Promise<ProgressHandle> {
    const progress = await this.presenter.show({
      channel: this.channel,
      kind: 'progress',
      title: this.title,
      body: PROGRESS_MESSAGES.started,
      ongoing: true,
    });

    return new ExportProgressHandle(runId, progress.id, this.presenter, this.channel, this.title);
  }

  async announce(message: string, level: NoticeLevel): Promise<void> {
    await this.presenter.show({
      channel: this.channel,
      kind: 'notice',
      title: message,
      priority: level === 'warn' ? 'high' : 'medium',
    });
  }
}

class ExportProgressHandle implements ProgressHandle {
  private current: ProgressState = 'started';

  constructor(
    readonly runId: string,
    private readonly progressId: string,
    private readonly presenter: NotificationPresenter,
    private readonly channel: string,
    private readonly title: string
  ) {}

  get state(): ProgressState {
    return this.current;
  }

  async succeeded(target?: ShareTarget): Promise<void> {
    if (!this.settle('succeeded')) return;

    await this.presenter.cancel(this.progressId);
    await this.presenter.show({
      channel: this.channel,
      kind: 'success',
      title: this.title,
      body: PROGRESS_MESSAGES.succeeded,
      action: target
        ? { type: 'share', label: PROGRESS_MESSAGES.shareLabel, uri: target.uri, mimeType: target.mimeType }
        : undefined,
    });
  }

  async failed(): Promise<void> {
    if (!this.settle('failed')) return;

    await this.presenter.cancel(this.progressId);
    await this.presenter.show({
      channel: this.channel,
      kind: 'failure',
      title: this.title,
      body: PROGRESS_MESSAGES.failed,
    });
  }

  // State flips before any await so a racing second call sees it
  private settle(next: ProgressState): boolean {
    if (this.current !== 'started') {
      logger.warn('Ignoring second terminal progress update', {
        runId: this.runId,
        state: this.current,
        attempted: next,
      });
      return false;
    }
    this.current = next;
    return true;
  }
}
