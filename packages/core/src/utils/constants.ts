// packages/core/src/utils/constants.ts — Shared magic number constants

/** Default step budget when the reasoning engine does not declare a plan length */
export const DEFAULT_STEP_BUDGET = 10;

/** Upper bound a caller may request for a session's step budget */
export const MAX_STEP_BUDGET = 100;

/** A revised budget never drops below this */
export const MIN_REVISED_BUDGET = 2;

/** Reasoning engine call timeout in seconds */
export const DEFAULT_REASONING_TIMEOUT_SEC = 60;

/** Verifier call timeout in seconds */
export const DEFAULT_VERIFICATION_TIMEOUT_SEC = 30;

/** Snapshot capture timeout in seconds */
export const DEFAULT_CAPTURE_TIMEOUT_SEC = 15;

/** Pause between statements of one instruction */
export const DEFAULT_INTER_ACTION_DELAY_MS = 600;

/** Pause after a successful instruction before the after-snapshot */
export const DEFAULT_SETTLE_DELAY_MS = 400;

/** Failure detail stored per step record */
export const MAX_FAILURE_DETAIL_CHARS = 8192;

/** Per-entry history truncation in reasoning prompts */
export const HISTORY_THOUGHT_CHARS = 200;
export const HISTORY_INSTRUCTION_CHARS = 150;

/** Action summary length shown in listings */
export const ACTION_SUMMARY_CHARS = 120;

/** Rule ingestion pattern length */
export const INGEST_PATTERN_CHARS = 80;

/** Raw engine text kept in warnings */
export const RAW_PREVIEW_CHARS = 300;
