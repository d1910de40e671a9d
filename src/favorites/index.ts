// ═══════════════════════════════════════════════════════════════════════════════
// FAVORITES MODULE — Saved Items Repository
// ═══════════════════════════════════════════════════════════════════════════════

// Types
export type {
  FavoriteItem,
  ResultSet,
  SavedStoriesStore,
  SavedStoryColumn,
  LocalItemObserver,
} from './types.js';
export { SAVED_STORY_COLUMNS } from './types.js';

// Errors
export {
  MissingColumnError,
  InvalidFavoriteError,
  StoreOperationError,
  type FavoriteMutationError,
  type MutationKind,
} from './errors.js';

// Store
export { KeyValueSavedStoriesStore } from './store.js';
export { RowResultSet, ResultSetClosedError, type Row } from './result-set.js';
export { FavoriteItemSchema, parseFavoriteItem, type FavoriteItemInput } from './schemas.js';
export { FavoriteCursor } from './cursor.js';

// Change tokens
export {
  SAVED_BASE_PATH,
  buildAdded,
  buildRemoved,
  buildCleared,
  isAdded,
  isRemoved,
  isCleared,
  parseChange,
  LiveValue,
  type ChangeKind,
  type ChangeListener,
  type ChangeNotifier,
  type SavedItemChange,
} from './changes.js';

// Manager
export { MemoryFavoriteCache, type LocalCache } from './cache.js';
export { ItemSyncQueue, type SyncScheduler } from './sync.js';
export { FavoriteLoader, type LoaderContext, type LoaderHost } from './loader.js';
export { FavoriteManager, querySavedStories, type FavoriteManagerDeps } from './manager.js';
