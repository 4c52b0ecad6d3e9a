// packages/core/src/executor/xdotool.ts — X11 input synthesis through the xdotool binary

import type { CursorPosition, DisplayProbe, ScreenGeometry } from '../env/environment.js';
import type { Instruction, MouseButton } from '../types/instruction.js';
import { ExecutionError, ProcessError } from '../utils/errors.js';
import type { Logger } from '../utils/logger.js';
import { runProcess } from '../utils/process.js';
import type { ExecutorOptions } from './executor.js';
import { SequencedExecutor } from './executor.js';

const COMMAND_TIMEOUT_MS = 10_000;
const TYPE_DELAY_MS = 12;

const BUTTON_CODES: Record<MouseButton, string> = { left: '1', middle: '2', right: '3' };

// Vocabulary key names → X keysyms. Unlisted names pass through unchanged.
const KEYSYMS: Record<string, string> = {
  command: 'super',
  cmd: 'super',
  win: 'super',
  super: 'super',
  ctrl: 'ctrl',
  control: 'ctrl',
  alt: 'alt',
  option: 'alt',
  shift: 'shift',
  enter: 'Return',
  return: 'Return',
  esc: 'Escape',
  escape: 'Escape',
  tab: 'Tab',
  space: 'space',
  backspace: 'BackSpace',
  delete: 'Delete',
  del: 'Delete',
  up: 'Up',
  down: 'Down',
  left: 'Left',
  right: 'Right',
  home: 'Home',
  end: 'End',
  pageup: 'Prior',
  pagedown: 'Next',
};

export function toKeysym(key: string): string {
  const lower = key.toLowerCase();
  if (/^f([1-9]|1[0-2])$/.test(lower)) return lower.toUpperCase();
  return KEYSYMS[lower] ?? key;
}

/** xdotool argument lists for one statement; `wait` yields none. */
export function xdotoolCommands(instruction: Instruction): string[][] {
  switch (instruction.kind) {
    case 'move':
      return [['mousemove', String(instruction.x), String(instruction.y)]];
    case 'click': {
      const click = ['click', '--repeat', String(instruction.count), BUTTON_CODES[instruction.button]];
      return instruction.x !== undefined && instruction.y !== undefined
        ? [['mousemove', String(instruction.x), String(instruction.y)], click]
        : [click];
    }
    case 'type':
      return [['type', '--delay', String(TYPE_DELAY_MS), '--', instruction.text]];
    case 'hotkey':
      return [['key', instruction.keys.map(toKeysym).join('+')]];
    case 'wait':
      return [];
  }
}

export class XdotoolExecutor extends SequencedExecutor implements DisplayProbe {
  readonly name = 'xdotool';

  constructor(
    options: ExecutorOptions = {},
    private readonly logger?: Logger,
    private readonly binary = 'xdotool',
  ) {
    super(options);
  }

  protected async perform(instruction: Instruction): Promise<void> {
    if (instruction.kind === 'wait') {
      await this.sleep(instruction.ms);
      return;
    }
    for (const args of xdotoolCommands(instruction)) {
      this.logger?.debug(`${this.binary} ${args.join(' ')}`);
      await this.run(args);
    }
  }

  /** Confirms the binary runs and can reach a display. */
  async probe(): Promise<string> {
    const { stdout } = await this.run(['getdisplaygeometry']);
    return stdout.trim();
  }

  async screenSize(): Promise<ScreenGeometry | null> {
    const { stdout } = await this.run(['getdisplaygeometry']);
    const [width, height] = stdout.trim().split(/\s+/).map(Number);
    return Number.isInteger(width) && Number.isInteger(height) ? { width, height } : null;
  }

  async cursorPosition(): Promise<CursorPosition | null> {
    const { stdout } = await this.run(['getmouselocation', '--shell']);
    const x = /^X=(\d+)$/m.exec(stdout);
    const y = /^Y=(\d+)$/m.exec(stdout);
    return x && y ? { x: Number(x[1]), y: Number(y[1]) } : null;
  }

  private async run(args: string[]): Promise<{ stdout: string }> {
    try {
      return await runProcess({ command: this.binary, args, timeoutMs: COMMAND_TIMEOUT_MS });
    } catch (err) {
      if (err instanceof ProcessError) {
        throw new ExecutionError(err.message, `${this.binary} ${args.join(' ')}`);
      }
      throw err;
    }
  }
}
