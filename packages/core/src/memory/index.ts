// packages/core/src/memory/index.ts -- barrel re-export

export { SCHEMA_VERSION, openDatabase, runMigrations, getSchemaVersion } from './database.js';
export { SessionStore } from './session-store.js';
export { StepStore } from './step-store.js';
export type { NewStepRecord } from './step-store.js';
export { PostMortemStore } from './post-mortem-store.js';
