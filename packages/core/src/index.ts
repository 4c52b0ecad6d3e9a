// @taskpilot/core - Task-execution control loop, action translation and verification

export const VERSION = '0.1.0';

// Type definitions
export * from './types/index.js';

// Utilities (errors, logger, ids, subprocesses, JSON recovery)
export * from './utils/index.js';

// Configuration
export * from './config/index.js';

// Instruction vocabulary
export * from './instructions/index.js';

// Environment descriptor
export * from './env/index.js';

// Action translator and rule ingestion
export * from './translator/index.js';

// Reasoning and verification
export * from './models/index.js';

// Persistence
export * from './memory/index.js';

// Collaborators
export * from './capture/index.js';
export * from './executor/index.js';

// Engine
export * from './engine/index.js';
