// packages/core/src/types/instruction.ts

export type MouseButton = 'left' | 'right' | 'middle';

export interface MoveInstruction {
  kind: 'move';
  x: number;
  y: number;
}

export interface ClickInstruction {
  kind: 'click';
  x?: number;
  y?: number;
  button: MouseButton;
  count: number;
}

export interface TypeInstruction {
  kind: 'type';
  text: string;
}

/** A single key press is a hotkey with one key. */
export interface HotkeyInstruction {
  kind: 'hotkey';
  keys: string[];
}

export interface WaitInstruction {
  kind: 'wait';
  ms: number;
}

export type Instruction =
  | MoveInstruction
  | ClickInstruction
  | TypeInstruction
  | HotkeyInstruction
  | WaitInstruction;

export type InstructionKind = Instruction['kind'];
