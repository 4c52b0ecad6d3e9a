// packages/core/src/instructions/parser.ts — Text form of the instruction vocabulary

import type { Instruction, MouseButton } from '../types/instruction.js';
import { NOOP_INSTRUCTION } from '../types/decision.js';
import { InstructionError } from '../utils/errors.js';

const NOOP_WORDS = new Set(['', NOOP_INSTRUCTION, 'pass']);
const BUTTONS: readonly MouseButton[] = ['left', 'right', 'middle'];
const INTEGER = /^-?\d+$/;

export function isNoop(text: string): boolean {
  return NOOP_WORDS.has(text.trim().toLowerCase());
}

/**
 * Split on `;` and newlines outside double-quoted strings.
 * Backslash escapes inside quotes are kept as written so JSON.parse can read them.
 */
export function splitStatements(text: string): string[] {
  const statements: string[] = [];
  let current = '';
  let inQuotes = false;
  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (inQuotes) {
      current += ch;
      if (ch === '\\' && i + 1 < text.length) {
        current += text[++i];
      } else if (ch === '"') {
        inQuotes = false;
      }
      continue;
    }
    if (ch === '"') {
      inQuotes = true;
      current += ch;
    } else if (ch === ';' || ch === '\n') {
      statements.push(current.trim());
      current = '';
    } else {
      current += ch;
    }
  }
  statements.push(current.trim());
  return statements.filter((s) => s.length > 0);
}

function parseCoordinate(token: string, statement: string): number {
  if (!INTEGER.test(token)) {
    throw new InstructionError(`Expected an integer coordinate, got "${token}"`, statement);
  }
  return Number.parseInt(token, 10);
}

function isButton(token: string): token is MouseButton {
  return BUTTONS.some((b) => b === token);
}

function parseClick(args: string[], statement: string, count: number): Instruction {
  let x: number | undefined;
  let y: number | undefined;
  let button: MouseButton = 'left';
  let rest = args;

  if (rest.length >= 1 && INTEGER.test(rest[0])) {
    if (rest.length < 2) {
      throw new InstructionError('Click coordinates need both x and y', statement);
    }
    x = parseCoordinate(rest[0], statement);
    y = parseCoordinate(rest[1], statement);
    rest = rest.slice(2);
  }

  for (const token of rest) {
    const word = token.toLowerCase();
    if (isButton(word)) {
      button = word;
    } else if (word === 'double') {
      count = 2;
    } else {
      throw new InstructionError(`Unknown click option "${token}"`, statement);
    }
  }

  return x !== undefined && y !== undefined
    ? { kind: 'click', x, y, button, count }
    : { kind: 'click', button, count };
}

function parseText(rest: string, statement: string): string {
  if (rest.startsWith('"')) {
    let value: unknown;
    try {
      value = JSON.parse(rest);
    } catch {
      throw new InstructionError('Malformed quoted text', statement);
    }
    if (typeof value !== 'string') {
      throw new InstructionError('Quoted text must be a string', statement);
    }
    return value;
  }
  if (rest.length >= 2 && rest.startsWith("'") && rest.endsWith("'")) {
    return rest.slice(1, -1);
  }
  return rest;
}

function parseKeys(args: string[], statement: string): string[] {
  const keys = (args.length === 1 ? args[0].split('+') : args)
    .map((k) => k.trim().toLowerCase())
    .filter((k) => k.length > 0);
  if (keys.length === 0) {
    throw new InstructionError('Expected at least one key', statement);
  }
  return keys;
}

function parseStatement(statement: string): Instruction | null {
  const match = /^(\S+)\s*([\s\S]*)$/.exec(statement);
  if (!match) return null;
  const verb = match[1].toLowerCase();
  const rest = match[2].trim();
  const args = rest.length > 0 ? rest.split(/\s+/) : [];

  switch (verb) {
    case NOOP_INSTRUCTION:
    case 'pass':
      return null;
    case 'move': {
      if (args.length !== 2) {
        throw new InstructionError('move takes exactly two coordinates', statement);
      }
      return {
        kind: 'move',
        x: parseCoordinate(args[0], statement),
        y: parseCoordinate(args[1], statement),
      };
    }
    case 'click':
      return parseClick(args, statement, 1);
    case 'doubleclick':
      return parseClick(args, statement, 2);
    case 'type': {
      const text = parseText(rest, statement);
      if (text.length === 0) {
        throw new InstructionError('type needs text', statement);
      }
      return { kind: 'type', text };
    }
    case 'press': {
      if (args.length !== 1) {
        throw new InstructionError('press takes exactly one key', statement);
      }
      return { kind: 'hotkey', keys: [args[0].toLowerCase()] };
    }
    case 'hotkey':
      return { kind: 'hotkey', keys: parseKeys(args, statement) };
    case 'wait': {
      const seconds = args.length === 1 ? Number(args[0]) : Number.NaN;
      if (!Number.isFinite(seconds) || seconds < 0) {
        throw new InstructionError('wait takes a non-negative number of seconds', statement);
      }
      return { kind: 'wait', ms: Math.round(seconds * 1000) };
    }
    default:
      throw new InstructionError(`Unknown statement "${verb}"`, statement);
  }
}

/**
 * Parse instruction text into statements. `noop`, `pass` and blank text yield [].
 * Throws InstructionError naming the first statement that cannot be read.
 */
export function parseInstruction(text: string): Instruction[] {
  if (isNoop(text)) return [];
  const instructions: Instruction[] = [];
  for (const statement of splitStatements(text)) {
    const parsed = parseStatement(statement);
    if (parsed) instructions.push(parsed);
  }
  return instructions;
}
