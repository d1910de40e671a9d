// ═══════════════════════════════════════════════════════════════════════════════
// CHANGE TOKENS — Path-Like Addresses for Saved Item Mutations
// ═══════════════════════════════════════════════════════════════════════════════

import { loggers, toError } from '../logging/index.js';

export const SAVED_BASE_PATH = '/saved';

const PATH_ADD = 'add';
const PATH_REMOVE = 'remove';
const PATH_CLEAR = 'clear';

export type ChangeKind = 'added' | 'removed' | 'cleared';

export interface SavedItemChange {
  kind: ChangeKind;
  itemId?: string;
}

export function buildAdded(itemId: string): string {
  return `${SAVED_BASE_PATH}/${PATH_ADD}/${encodeURIComponent(itemId)}`;
}

export function buildRemoved(itemId: string): string {
  return `${SAVED_BASE_PATH}/${PATH_REMOVE}/${encodeURIComponent(itemId)}`;
}

export function buildCleared(): string {
  return `${SAVED_BASE_PATH}/${PATH_CLEAR}`;
}

export function isAdded(token: string): boolean {
  return token.startsWith(`${SAVED_BASE_PATH}/${PATH_ADD}/`);
}

export function isRemoved(token: string): boolean {
  return token.startsWith(`${SAVED_BASE_PATH}/${PATH_REMOVE}/`);
}

export function isCleared(token: string): boolean {
  return token === buildCleared();
}

export function parseChange(token: string): SavedItemChange | null {
  if (isCleared(token)) return { kind: 'cleared' };

  const itemId = decodeURIComponent(token.slice(token.lastIndexOf('/') + 1));
  if (isAdded(token)) return { kind: 'added', itemId };
  if (isRemoved(token)) return { kind: 'removed', itemId };
  return null;
}

// ─────────────────────────────────────────────────────────────────────────────────
// LIVE VALUE
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Sink for change tokens. Listing screens subscribe to react to mutations.
 */
export interface ChangeNotifier {
  setLiveValue(token: string): void;
}

export type ChangeListener = (token: string) => void;

export class LiveValue implements ChangeNotifier {
  private current: string | null = null;
  private listeners: Set<ChangeListener> = new Set();

  get value(): string | null {
    return this.current;
  }

  setLiveValue(token: string): void {
    this.current = token;
    for (const listener of [...this.listeners]) {
      try {
        listener(token);
      } catch (error) {
        loggers.favorites().error('Change listener failed', toError(error), { change: token });
      }
    }
  }

  subscribe(listener: ChangeListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }
}
