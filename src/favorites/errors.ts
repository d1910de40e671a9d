// ═══════════════════════════════════════════════════════════════════════════════
// FAVORITES ERRORS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * A required column is missing from a result set. Signals a corrupted row.
 */
export class MissingColumnError extends Error {
  constructor(readonly column: string) {
    super(`Required column "${column}" is missing`);
    this.name = 'MissingColumnError';
  }
}

export class InvalidFavoriteError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid saved item: ${issues.join('; ')}`);
    this.name = 'InvalidFavoriteError';
  }
}

export type MutationKind = 'add' | 'remove' | 'clear';

export class StoreOperationError extends Error {
  constructor(
    readonly operation: MutationKind,
    cause: Error
  ) {
    super(`Saved items ${operation} failed: ${cause.message}`, { cause });
    this.name = 'StoreOperationError';
  }
}

export type FavoriteMutationError = InvalidFavoriteError | StoreOperationError;
