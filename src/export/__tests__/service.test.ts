// ═══════════════════════════════════════════════════════════════════════════════
// EXPORT SERVICE TESTS — Share Exports, Destination Exports, Follow-Ups
// ═══════════════════════════════════════════════════════════════════════════════

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { existsSync } from 'node:fs';
import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { KeyValueSavedStoriesStore } from '../../favorites/store.js';
import { BackgroundExecutor, SerialExecutor } from '../../infrastructure/executors/index.js';
import { InAppNotificationPresenter } from '../../notifications/index.js';
import { MemoryStore } from '../../storage/index.js';
import { ExportFileWriter, fileDestination } from '../files.js';
import type { ExportedDocument } from '../formatters.js';
import { ExportProgressNotifier } from '../progress.js';
import { DownloadsPromoter, FileSystemDownloadsIndex } from '../promotion.js';
import { FavoriteExportService, type DownloadsPromotion, type FavoriteExportServiceDeps } from '../service.js';
import type { ExportDestination, ShareTarget } from '../types.js';

const NOW = new Date(Date.UTC(2024, 4, 6, 7, 8, 9));

const CSV_EXPECTED =
  'Title,URL,Hacker News Link,Saved Date\n' +
  '"A",http://a,https://news.ycombinator.com/item?id=1,1970-01-01 00:00';

describe('FavoriteExportService', () => {
  let dir: string;
  let kv: MemoryStore;
  let store: KeyValueSavedStoriesStore;
  let presenter: InAppNotificationPresenter;
  let shared: ShareTarget[];
  let share: { share: (target: ShareTarget) => Promise<void> };

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'saved-export-'));
    kv = new MemoryStore();
    store = new KeyValueSavedStoriesStore(kv);
    presenter = new InAppNotificationPresenter(kv);
    shared = [];
    share = {
      share: async target => {
        shared.push(target);
      },
    };
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  function createService(overrides: Partial<FavoriteExportServiceDeps> = {}): FavoriteExportService {
    return new FavoriteExportService({
      store,
      io: new BackgroundExecutor(2),
      main: new SerialExecutor(),
      writer: new ExportFileWriter({ exportDir: join(dir, 'saved'), fileBase: 'saved-stories-export' }),
      promoter: new DownloadsPromoter({
        era: 'legacy',
        fileBase: 'saved-stories-export',
        index: new FileSystemDownloadsIndex(join(dir, 'shared')),
        resolveDownloadsDir: () => join(dir, 'Downloads'),
        now: () => NOW,
      }),
      share,
      notifier: new ExportProgressNotifier(presenter),
      settings: {
        documentTitle: 'Saved Stories',
        discussionUrlTemplate: 'https://news.ycombinator.com/item?id=%s',
        shareDelayMs: 0,
      },
      now: () => NOW,
      ...overrides,
    });
  }

  async function kinds(): Promise<string[]> {
    return (await presenter.list('export')).map(notification => notification.kind);
  }

  // ═══════════════════════════════════════════════════════════════════════════════
  // SHARE EXPORTS
  // ═══════════════════════════════════════════════════════════════════════════════

  describe('exportToShare', () => {
    it('should fail without writing anything when nothing is saved', async () => {
      const service = createService();

      expect(await service.exportToShare(null, 'csv')).toBeNull();
      await service.drain();

      expect(existsSync(join(dir, 'saved', 'saved-stories-export.csv'))).toBe(false);
      expect(shared).toEqual([]);
      expect(await kinds()).toEqual(['failure']);
    });

    it('should fail when the filter matches nothing', async () => {
      await store.insert({ id: '1', title: 'A', url: 'http://a', savedAtEpochSeconds: 0 });
      const service = createService();

      expect(await service.exportToShare('zzz', 'json')).toBeNull();
      expect(existsSync(join(dir, 'saved', 'saved-stories-export.json'))).toBe(false);
    });

    it('should write the file, promote it and share it', async () => {
      await store.insert({ id: '1', title: 'A', url: 'http://a', savedAtEpochSeconds: 0 });
      const service = createService();

      const file = await service.exportToShare(null, 'csv');
      await service.drain();

      expect(file?.filename).toBe('saved-stories-export.csv');
      expect(file?.path).toBe(join(dir, 'saved', 'saved-stories-export.csv'));
      expect(await readFile(join(dir, 'saved', 'saved-stories-export.csv'), 'utf8')).toBe(CSV_EXPECTED);

      const promoted = join(dir, 'Downloads', 'saved-stories-export-2024-05-06_0708.csv');
      expect(await readFile(promoted, 'utf8')).toBe(CSV_EXPECTED);

      expect(shared).toEqual([{ uri: file?.uri, mimeType: 'text/csv' }]);

      const notifications = await presenter.list('export');
      expect(notifications.map(notification => notification.kind)).toEqual(['notice', 'success']);
      expect(notifications[0]?.title).toBe(`Saved to Downloads: ${promoted}`);
      expect(notifications[1]?.action?.type).toBe('share');
    });

    it('should replace the previous file of the same format', async () => {
      await store.insert({ id: '1', title: 'A', url: 'http://a', savedAtEpochSeconds: 0 });
      const service = createService();
      await service.exportToShare(null, 'txt');
      await service.drain();

      await store.insert({ id: '2', title: 'B', url: 'http://b', savedAtEpochSeconds: 0 });
      await service.exportToShare(null, 'txt');
      await service.drain();

      const text = await readFile(join(dir, 'saved', 'saved-stories-export.txt'), 'utf8');
      expect(text.split('\n').filter(line => /^\d+\. /.test(line))).toEqual(['1. B', '2. A']);
    });

    it('should apply the title filter', async () => {
      await store.insert({ id: '1', title: 'Rust in production', url: 'http://a', savedAtEpochSeconds: 0 });
      await store.insert({ id: '2', title: 'Postgres internals', url: 'http://b', savedAtEpochSeconds: 0 });
      const service = createService();

      const file = await service.exportToShare('rust', 'markdown');
      await service.drain();

      expect(file?.filename).toBe('saved-stories-export.md');
      const headings = (await readFile(join(dir, 'saved', 'saved-stories-export.md'), 'utf8'))
        .split('\n')
        .filter(line => line.startsWith('## '));
      expect(headings).toEqual(['## Rust in production']);
    });

    it('should keep each run on its own format', async () => {
      await store.insert({ id: '1', title: 'A', url: 'http://a', savedAtEpochSeconds: 0 });
      const service = createService();

      const [csv, json] = await Promise.all([
        service.exportToShare(null, 'csv'),
        service.exportToShare(null, 'json'),
      ]);
      await service.drain();

      expect(csv?.filename).toBe('saved-stories-export.csv');
      expect(json?.filename).toBe('saved-stories-export.json');
      expect(json?.mimeType).toBe('application/json');

      const document: ExportedDocument = JSON.parse(
        await readFile(join(dir, 'saved', 'saved-stories-export.json'), 'utf8')
      );
      expect(document.exported).toBe('2024-05-06T07:08:09');
      expect(document.stories.map(entry => entry.id)).toEqual(['1']);
    });

    it('should use resolved display titles', async () => {
      await store.insert({ id: '1', title: 'a', url: 'http://a', savedAtEpochSeconds: 0 });
      const service = createService({ displayTitle: item => item.title.toUpperCase() });

      await service.exportToShare(null, 'csv');
      await service.drain();

      const csv = await readFile(join(dir, 'saved', 'saved-stories-export.csv'), 'utf8');
      expect(csv.split('\n')[1]).toBe('"A",http://a,https://news.ycombinator.com/item?id=1,1970-01-01 00:00');
    });

    it('should fail on a corrupted row', async () => {
      await kv.hset('saved:story:9', { itemId: '9', title: 'No url' });
      await kv.lpush('saved:index', '9');
      const service = createService();

      expect(await service.exportToShare(null, 'csv')).toBeNull();
      expect(await kinds()).toEqual(['failure']);
    });

    it('should still share when promotion fails', async () => {
      await store.insert({ id: '1', title: 'A', url: 'http://a', savedAtEpochSeconds: 0 });
      const promoter: DownloadsPromotion = { promote: async () => null };
      const service = createService({ promoter });

      const file = await service.exportToShare(null, 'html');
      await service.drain();

      const [notice] = await presenter.list('export');
      expect(notice?.title).toBe('Could not save to Downloads. Use the share option.');
      expect(notice?.priority).toBe('high');
      expect(shared).toEqual([{ uri: file?.uri, mimeType: 'text/html' }]);
    });

    it('should keep the export when the share action fails', async () => {
      await store.insert({ id: '1', title: 'A', url: 'http://a', savedAtEpochSeconds: 0 });
      const failing = vi.fn(async () => {
        throw new Error('no share targets');
      });
      const service = createService({ share: { share: failing } });

      const file = await service.exportToShare(null, 'csv');
      await service.drain();

      expect(failing).toHaveBeenCalledTimes(1);
      expect(file?.filename).toBe('saved-stories-export.csv');
      expect(await kinds()).toEqual(['notice', 'success']);
    });
  });

  // ═══════════════════════════════════════════════════════════════════════════════
  // DESTINATION EXPORTS
  // ═══════════════════════════════════════════════════════════════════════════════

  describe('exportToDestination', () => {
    it('should write into the destination without promotion or share', async () => {
      await store.insert({ id: '1', title: 'A', url: 'http://a', savedAtEpochSeconds: 0 });
      const service = createService();
      const target = join(dir, 'picked', 'stories.csv');

      expect(await service.exportToDestination(null, 'csv', fileDestination(target))).toBe(true);
      await service.drain();

      expect(await readFile(target, 'utf8')).toBe(CSV_EXPECTED);
      expect(existsSync(join(dir, 'Downloads'))).toBe(false);
      expect(shared).toEqual([]);

      const notifications = await presenter.list('export');
      expect(notifications.map(notification => notification.kind)).toEqual(['success']);
      expect(notifications[0]?.action).toBeUndefined();
    });

    it('should not open the destination when nothing matches', async () => {
      const openWriteStream = vi.fn(async () => {
        throw new Error('should not open');
      });
      const destination: ExportDestination = { uri: 'file:///unused', openWriteStream };
      const service = createService();

      expect(await service.exportToDestination(null, 'txt', destination)).toBe(false);
      expect(openWriteStream).not.toHaveBeenCalled();
      expect(await kinds()).toEqual(['failure']);
    });

    it('should fail when the destination cannot be opened', async () => {
      await store.insert({ id: '1', title: 'A', url: 'http://a', savedAtEpochSeconds: 0 });
      const destination: ExportDestination = {
        uri: 'content://revoked',
        openWriteStream: async () => {
          throw new Error('permission revoked');
        },
      };
      const service = createService();

      expect(await service.exportToDestination(null, 'json', destination)).toBe(false);
      expect(await kinds()).toEqual(['failure']);
    });
  });
});
