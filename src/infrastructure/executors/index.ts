// ═══════════════════════════════════════════════════════════════════════════════
// EXECUTORS MODULE INDEX
// ═══════════════════════════════════════════════════════════════════════════════

export type { Executor, Task } from './types.js';
export { BackgroundExecutor } from './background.js';
export { SerialExecutor } from './serial.js';
