// packages/core/src/engine/index.ts -- barrel re-export

export { CancellationToken } from './cancellation.js';
export { EventBus } from './event-bus.js';
export { isTerminal, nextState } from './state-machine.js';
export type { FaultKind, StepFault, Transition, TransitionInput } from './state-machine.js';
export { StepPipeline, snapshotPath } from './step-pipeline.js';
export type { SessionRun, SnapshotKind, StepOutcome, StepPipelineDeps } from './step-pipeline.js';
export { PostMortemSynthesizer, buildOptimizedPrompt, lessonLine, NO_ERRORS_NOTE } from './post-mortem.js';
export type { PostMortemSynthesizerDeps } from './post-mortem.js';
export { Orchestrator } from './orchestrator.js';
export type { OrchestratorOptions, RunOptions, RunResult, StartOptions } from './orchestrator.js';
