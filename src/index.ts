// ═══════════════════════════════════════════════════════════════════════════════
// SAVED STORIES — Favorites Repository & Export Wiring
// ═══════════════════════════════════════════════════════════════════════════════

import { join } from 'node:path';
import { loadConfig, type FavoritesConfig } from './config/index.js';
import { DownloadsPromoter, ExportFileWriter, ExportProgressNotifier, FavoriteExportService, FileSystemDownloadsIndex, type DisplayTitleResolver, type ShareLauncher } from './export/index.js';
import { FavoriteManager, ItemSyncQueue, KeyValueSavedStoriesStore, LiveValue, MemoryFavoriteCache } from './favorites/index.js';
import { BackgroundExecutor, SerialExecutor } from './infrastructure/executors/index.js';
import { getLogger } from './logging/index.js';
import { InAppNotificationPresenter } from './notifications/index.js';
import { getStore, type KeyValueStore } from './storage/index.js';

export interface SavedStoriesOptions {
  share: ShareLauncher;
  config?: FavoritesConfig;
  store?: KeyValueStore;
  displayTitle?: DisplayTitleResolver;
}

export interface SavedStories {
  config: FavoritesConfig;
  manager: FavoriteManager;
  exporter: FavoriteExportService;
  changes: LiveValue;
  notifications: InAppNotificationPresenter;
  sync: ItemSyncQueue;
  close(): Promise<void>;
}

/**
 * Wire the repository and exporter. Resolves once the membership cache
 * reflects what the store already holds.
 */
export async function createSavedStories(options: SavedStoriesOptions): Promise<SavedStories> {
  const config = options.config ?? loadConfig();
  const kv = options.store ?? getStore();

  const io = new BackgroundExecutor(config.ioConcurrency);
  const main = new SerialExecutor();
  const store = new KeyValueSavedStoriesStore(kv);
  const changes = new LiveValue();
  const sync = new ItemSyncQueue(kv);
  const notifications = new InAppNotificationPresenter(kv);

  const manager = new FavoriteManager({
    store,
    io,
    main,
    cache: new MemoryFavoriteCache(),
    changes,
    sync,
  });

  const exporter = new FavoriteExportService({
    store,
    io,
    main,
    writer: new ExportFileWriter({
      exportDir: join(config.dataDir, config.exportDirName),
      fileBase: config.exportFileBase,
    }),
    promoter: new DownloadsPromoter({
      era: config.storageEra,
      fileBase: config.exportFileBase,
      index: new FileSystemDownloadsIndex(config.sharedStorageRoot),
      resolveDownloadsDir: () => config.downloadsDir,
    }),
    share: options.share,
    notifier: new ExportProgressNotifier(notifications),
    settings: {
      documentTitle: config.documentTitle,
      discussionUrlTemplate: config.discussionUrlTemplate,
      shareDelayMs: config.shareDelayMs,
    },
    displayTitle: options.displayTitle,
  });

  await manager.warm();

  getLogger({ component: 'favorites' }).info('Saved stories ready', {
    era: config.storageEra,
    backend: kv.constructor.name,
  });

  return {
    config,
    manager,
    exporter,
    changes,
    notifications,
    sync,
    async close() {
      manager.detach();
      await exporter.drain();
      await io.idle();
      await main.idle();
      if (!options.store) {
        await kv.disconnect();
      }
    },
  };
}

export * from './favorites/index.js';
export * from './export/index.js';
export * from './notifications/index.js';
export { BackgroundExecutor, SerialExecutor, type Executor, type Task } from './infrastructure/executors/index.js';
export { loadConfig, buildConfig, ConfigError, type FavoritesConfig, type StorageEra } from './config/index.js';
export { getLogger, Logger, type LogLevel } from './logging/index.js';
export { MemoryStore, RedisStore, getStore, setStore, type KeyValueStore } from './storage/index.js';
export { ok, err, type Result, type AsyncResult } from './types/result.js';
