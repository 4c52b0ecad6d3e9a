import type { CaptureResult, SnapshotCapture } from '../../src/capture/capture.js';
import type { ActionExecutor } from '../../src/executor/executor.js';
import type { CompletionRequest, ModelTransport } from '../../src/models/transport.js';
import type { Instruction } from '../../src/types/instruction.js';

/** Records target paths; fails any path matching `failWhen`. Writes nothing to disk. */
export class FakeCapture implements SnapshotCapture {
  readonly paths: string[] = [];

  constructor(public failWhen: (path: string) => boolean = () => false) {}

  async capture(targetPath: string): Promise<CaptureResult> {
    this.paths.push(targetPath);
    if (this.failWhen(targetPath)) {
      return { ok: false, error: 'display unavailable' };
    }
    return { ok: true, path: targetPath };
  }
}

/** Records every batch; throws `fault` on the call numbers listed in `failOnCalls` (1-based). */
export class RecordingExecutor implements ActionExecutor {
  readonly name = 'recording';
  readonly batches: Instruction[][] = [];

  constructor(
    private readonly failOnCalls: number[] = [],
    private readonly fault: Error = new Error('window not found'),
  ) {}

  async execute(instructions: readonly Instruction[]): Promise<void> {
    this.batches.push([...instructions]);
    if (this.failOnCalls.includes(this.batches.length)) {
      throw this.fault;
    }
  }
}

type Reply = string | Error | ((request: CompletionRequest) => string);

/** Replies from a script, keyed by which prompt it is (decide / translate / verify). */
export class ScriptedTransport implements ModelTransport {
  readonly name = 'scripted';
  readonly requests: CompletionRequest[] = [];

  constructor(private readonly reply: (request: CompletionRequest, call: number) => Reply) {}

  async complete(request: CompletionRequest): Promise<string> {
    this.requests.push(request);
    const reply = this.reply(request, this.requests.length);
    if (reply instanceof Error) throw reply;
    return typeof reply === 'function' ? reply(request) : reply;
  }
}

export function isVerifyStepPrompt(request: CompletionRequest): boolean {
  return request.user.startsWith('Intended action:');
}

export function isVerifyGoalPrompt(request: CompletionRequest): boolean {
  return request.system.startsWith('You check whether a task');
}

export function isDecidePrompt(request: CompletionRequest): boolean {
  return request.user.startsWith('Goal:') && request.system.startsWith('You operate');
}
