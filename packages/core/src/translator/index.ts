// packages/core/src/translator/index.ts -- barrel re-export

export { ActionTranslator } from './translator.js';
export type { ActionTranslatorOptions } from './translator.js';
export { loadRules, readRuleFile, validateRules, writeRules } from './rules.js';
export type { RuleFile } from './rules.js';
export { buildRules, collectCandidates, ingestRules, mergeRules } from './ingest.js';
export type { CandidateSource, IngestResult } from './ingest.js';
