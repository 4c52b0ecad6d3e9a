// packages/core/src/models/prompts.ts

import type { StepRecord } from '../types/session.js';
import { HISTORY_INSTRUCTION_CHARS, HISTORY_THOUGHT_CHARS } from '../utils/constants.js';
import { truncate } from '../utils/failure.js';
import type { CompletionRequest } from './transport.js';

export type PromptType = 'decide' | 'translate' | 'verify-step' | 'verify-goal';

/**
 * Variables passed into prompt templates.
 */
export interface PromptVariables {
  environment: string;
  goal?: string;
  history?: readonly StepRecord[];
  isFirstStep?: boolean;
  description?: string;
  intendedThought?: string;
}

interface PromptTemplate {
  system: (environment: string, vars: PromptVariables) => string;
  user: (vars: PromptVariables) => string;
}

const VOCABULARY = [
  'Instruction language (statements separated by ";"):',
  '  move X Y                         move the pointer',
  '  click [X Y] [left|right|middle] [double]',
  '  doubleclick [X Y]',
  '  type "text"                      JSON string literal',
  '  press KEY                        e.g. press enter',
  '  hotkey K1 K2 ...                 e.g. hotkey ctrl c',
  '  wait SECONDS',
  '  noop                             do nothing this step',
].join('\n');

function contextLine(environment: string): string {
  return environment ? `\nUser context: ${environment}\n` : '';
}

export function formatHistoryLine(record: StepRecord): string {
  return (
    `Step ${record.stepNumber}: thought=${truncate(record.thought, HISTORY_THOUGHT_CHARS)} ` +
    `instruction=${truncate(record.instruction, HISTORY_INSTRUCTION_CHARS)} ` +
    `status=${record.decisionStatus} outcome=${record.outcome}`
  );
}

const TEMPLATES: Record<PromptType, PromptTemplate> = {
  decide: {
    system: (environment, vars) =>
      [
        'You operate a graphical desktop one atomic action at a time.',
        'Look at the current screenshot, decide the single next action toward the goal, and say',
        'whether the goal is now achieved.',
        contextLine(environment),
        VOCABULARY,
        '',
        'Status values: CONTINUE (more steps needed), SUCCESS (goal achieved after this action),',
        'LOST (you cannot tell how to proceed).',
        ...(vars.isFirstStep
          ? [
              '',
              'This is the first step. Also estimate how many steps the whole task needs',
              '("planned_step_count") and list the step numbers after which the screen should be',
              'checked ("checkpoints").',
            ]
          : [
              '',
              'Example response:',
              '{"thought": "Calculator is open. I will type 42.", "instruction": "type \\"42\\"; press enter", "status": "SUCCESS"}',
            ]),
        '',
        'Respond with a single JSON object and nothing else.',
      ].join('\n'),
    user: (vars) => {
      const history = vars.history ?? [];
      const historyBlock =
        history.length > 0
          ? `Steps already taken (for context):\n${history.map(formatHistoryLine).join('\n')}\n\n`
          : '';
      const keys = vars.isFirstStep
        ? 'thought, instruction, status, planned_step_count, checkpoints'
        : 'thought, instruction, status';
      return `Goal: ${vars.goal ?? ''}\n\n${historyBlock}Reply with JSON with keys: ${keys}.`;
    },
  },

  translate: {
    system: (environment) =>
      [
        'Translate a natural-language desktop step into the instruction language below.',
        contextLine(environment),
        VOCABULARY,
        '',
        'Reply with the instruction text only: no prose, no code fence.',
      ].join('\n'),
    user: (vars) => `Step: ${vars.description ?? ''}`,
  },

  'verify-step': {
    system: (environment) =>
      [
        'You check whether a single desktop action had its intended effect.',
        'Judge only from the screenshot taken right after the action.',
        contextLine(environment),
        'Respond with a single JSON object: {"achieved": true|false, "reason": "one sentence"}.',
      ].join('\n'),
    user: (vars) =>
      `Intended action: ${vars.intendedThought ?? ''}\n\nDid the screenshot show this action was carried out?`,
  },

  'verify-goal': {
    system: (environment) =>
      [
        'You check whether a task on a desktop was completed.',
        'Judge only from the final screenshot.',
        contextLine(environment),
        'Respond with a single JSON object: {"achieved": true|false, "reason": "one sentence"}.',
      ].join('\n'),
    user: (vars) => `Goal: ${vars.goal ?? ''}\n\nWas this goal achieved in the screenshot?`,
  },
};

/**
 * Render a prompt template into a completion request (system + user text).
 */
export function renderPrompt(
  type: PromptType,
  vars: PromptVariables,
  imagePath?: string | null,
): CompletionRequest {
  const template = TEMPLATES[type];
  return {
    system: template.system(vars.environment, vars),
    user: template.user(vars),
    imagePath: imagePath ?? null,
  };
}
