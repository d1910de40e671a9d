// ═══════════════════════════════════════════════════════════════════════════════
// ROW RESULT SET — In-Memory Snapshot of a Query
// ═══════════════════════════════════════════════════════════════════════════════

import type { ResultSet } from './types.js';

export type Row = Readonly<Record<string, string>>;

export class ResultSetClosedError extends Error {
  constructor() {
    super('Result set is closed');
    this.name = 'ResultSetClosedError';
  }
}

/**
 * Snapshot of rows taken at query time. Later store writes never show up
 * here; a fresh query produces a fresh result set.
 */
export class RowResultSet implements ResultSet {
  private readonly rows: readonly Row[];
  private readonly columns: readonly string[];
  private cursorPosition = -1;
  private closed = false;

  constructor(columns: readonly string[], rows: readonly Row[]) {
    this.columns = [...columns];
    this.rows = [...rows];
  }

  get count(): number {
    this.assertOpen();
    return this.rows.length;
  }

  get position(): number {
    return this.cursorPosition;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  moveToFirst(): boolean {
    return this.moveToPosition(0);
  }

  moveToNext(): boolean {
    return this.moveToPosition(this.cursorPosition + 1);
  }

  moveToPosition(position: number): boolean {
    this.assertOpen();
    if (!Number.isInteger(position)) {
      return false;
    }
    if (position < 0) {
      this.cursorPosition = -1;
      return false;
    }
    if (position >= this.rows.length) {
      this.cursorPosition = this.rows.length;
      return false;
    }
    this.cursorPosition = position;
    return true;
  }

  getColumnIndex(column: string): number {
    return this.columns.indexOf(column);
  }

  getString(columnIndex: number): string | null {
    this.assertOpen();
    const row = this.rows[this.cursorPosition];
    const column = this.columns[columnIndex];
    if (!row || column === undefined) return null;
    return row[column] ?? null;
  }

  close(): void {
    this.closed = true;
  }

  private assertOpen(): void {
    if (this.closed) throw new ResultSetClosedError();
  }
}
