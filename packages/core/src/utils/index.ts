// packages/core/src/utils/index.ts -- barrel re-export

export { generateSessionId } from './id.js';
export {
  ConfigError,
  ModelError,
  ExecutionError,
  InstructionError,
  WorkflowError,
  DatabaseError,
  ProcessError,
} from './errors.js';
export { createLogger } from './logger.js';
export type { Logger, LogLevel } from './logger.js';
export { extractJsonObject } from './json-extract.js';
export type { JsonObject } from './json-extract.js';
export { describeFailure, errorMessage, capDetail, summarizeAction, truncate } from './failure.js';
export { BASE_ENV_ALLOWLIST, buildFilteredEnv, killProcessTree, runProcess } from './process.js';
export type { ProcessOutput, RunProcessOptions } from './process.js';
export * from './constants.js';
