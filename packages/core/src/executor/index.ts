// packages/core/src/executor/index.ts -- barrel re-export

export { SequencedExecutor, sleep } from './executor.js';
export type { ActionExecutor, ExecutorOptions, Sleeper } from './executor.js';
export { DryRunExecutor } from './dry-run.js';
export { XdotoolExecutor, toKeysym, xdotoolCommands } from './xdotool.js';
export { createExecutor } from './factory.js';
