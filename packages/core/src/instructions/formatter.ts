// packages/core/src/instructions/formatter.ts

import type { Instruction } from '../types/instruction.js';
import { NOOP_INSTRUCTION } from '../types/decision.js';

export function formatStatement(instruction: Instruction): string {
  switch (instruction.kind) {
    case 'move':
      return `move ${instruction.x} ${instruction.y}`;
    case 'click': {
      const parts = ['click'];
      if (instruction.x !== undefined && instruction.y !== undefined) {
        parts.push(String(instruction.x), String(instruction.y));
      }
      if (instruction.button !== 'left') parts.push(instruction.button);
      if (instruction.count >= 2) parts.push('double');
      return parts.join(' ');
    }
    case 'type':
      return `type ${JSON.stringify(instruction.text)}`;
    case 'hotkey':
      return instruction.keys.length === 1
        ? `press ${instruction.keys[0]}`
        : `hotkey ${instruction.keys.join(' ')}`;
    case 'wait':
      return `wait ${instruction.ms / 1000}`;
  }
}

/** Canonical text form; an empty list renders as `noop`. */
export function formatInstruction(instructions: readonly Instruction[]): string {
  if (instructions.length === 0) return NOOP_INSTRUCTION;
  return instructions.map(formatStatement).join('; ');
}
