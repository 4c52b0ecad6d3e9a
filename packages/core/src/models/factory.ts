// packages/core/src/models/factory.ts — Wire transports, reasoning client and verifier from config

import type { ProjectConfig } from '../types/config.js';
import type { Logger } from '../utils/logger.js';
import { CliTransport } from './cli-transport.js';
import { ReasoningClient } from './reasoning-client.js';
import type { ModelTransport } from './transport.js';
import { Verifier } from './verifier.js';

export interface ModelClients {
  reasoning: ReasoningClient;
  verifier: Verifier;
}

/** The verifier reuses the reasoning command with its own timeout. */
export function createModelClients(
  config: ProjectConfig,
  logger?: Logger,
  options?: { cwd?: string; transport?: ModelTransport | null },
): ModelClients {
  let reasoningTransport: ModelTransport | null = null;
  let verifierTransport: ModelTransport | null = null;

  if (options?.transport !== undefined) {
    reasoningTransport = options.transport;
    verifierTransport = options.transport;
  } else if (config.reasoning.enabled && config.reasoning.command) {
    const base = {
      command: config.reasoning.command,
      args: config.reasoning.args,
      model: config.reasoning.model,
      envAllowlist: config.reasoning.envAllowlist,
      cwd: options?.cwd,
    };
    reasoningTransport = new CliTransport({ ...base, timeout: config.reasoning.timeout });
    verifierTransport = new CliTransport({ ...base, timeout: config.verification.timeout });
  }

  return {
    reasoning: new ReasoningClient({ transport: reasoningTransport, logger: logger?.child('reasoning') }),
    verifier: new Verifier({
      transport: verifierTransport,
      enabled: config.verification.enabled,
      logger: logger?.child('verifier'),
    }),
  };
}
