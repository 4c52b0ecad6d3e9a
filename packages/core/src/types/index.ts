// packages/core/src/types/index.ts -- barrel re-export

export type {
  ExecutorKind,
  PresetName,
  SessionConfig,
  TransportConfig,
  ReasoningConfig,
  VerificationConfig,
  TranslatorConfig,
  CaptureConfig,
  ExecutorConfig,
  DisplayConfig,
  AdvancedConfig,
  ProjectConfig,
} from './config.js';

export { TERMINAL_STATUSES } from './session.js';
export type {
  SessionStatus,
  TerminalStatus,
  DecisionStatus,
  StepOutcomeKind,
  InstructionSource,
  Session,
  VerificationResult,
  StepRecord,
  PostMortem,
} from './session.js';

export { NOOP_INSTRUCTION } from './decision.js';
export type { Decision, DecideRequest } from './decision.js';

export type {
  MouseButton,
  MoveInstruction,
  ClickInstruction,
  TypeInstruction,
  HotkeyInstruction,
  WaitInstruction,
  Instruction,
  InstructionKind,
} from './instruction.js';

export type { TranslationRule, IngestCandidate } from './rules.js';

export type {
  SessionStartedEvent,
  SessionFinishedEvent,
  BudgetRevisedEvent,
  StepStartedEvent,
  StepDecidedEvent,
  StepVerifiedEvent,
  StepCompletedEvent,
  CheckpointCapturedEvent,
  PostMortemCreatedEvent,
  EngineEvent,
} from './events.js';
