// packages/core/src/models/index.ts -- barrel re-export

export type { CompletionRequest, ModelTransport } from './transport.js';
export { CliTransport } from './cli-transport.js';
export type { CliTransportOptions } from './cli-transport.js';
export { formatHistoryLine, renderPrompt } from './prompts.js';
export type { PromptType, PromptVariables } from './prompts.js';
export {
  ReasoningClient,
  parseDecision,
  stripCodeFence,
  textField,
  toPositiveInt,
} from './reasoning-client.js';
export type { ReasoningClientOptions } from './reasoning-client.js';
export { Verifier, parseVerification } from './verifier.js';
export type { VerifierOptions } from './verifier.js';
export { stubDecision } from './stub.js';
export { createModelClients } from './factory.js';
export type { ModelClients } from './factory.js';
