// ═══════════════════════════════════════════════════════════════════════════════
// EXECUTOR TYPES — Execution Contexts for Background and Interactive Work
// ═══════════════════════════════════════════════════════════════════════════════

export type Task<T> = () => T | Promise<T>;

/**
 * An execution context. `execute` dispatches the task and returns at once;
 * the promise settles with the task's outcome.
 */
export interface Executor {
  execute<T>(task: Task<T>): Promise<T>;

  /** Resolves once every task submitted so far has settled */
  idle(): Promise<void>;
}
