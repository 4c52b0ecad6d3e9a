// packages/core/src/utils/errors.ts

export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly field?: string,
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

/** Reasoning / verification transport failure. */
export class ModelError extends Error {
  constructor(
    message: string,
    public readonly command?: string,
    public readonly exitCode?: number,
  ) {
    super(message);
    this.name = 'ModelError';
  }

  get isTimeout(): boolean {
    return this.message.includes('timeout') || this.message.includes('ETIMEDOUT');
  }
}

/** Raised by an action executor when a statement cannot be carried out. */
export class ExecutionError extends Error {
  constructor(
    message: string,
    public readonly statement?: string,
  ) {
    super(message);
    this.name = 'ExecutionError';
  }
}

export class InstructionError extends Error {
  constructor(
    message: string,
    public readonly statement?: string,
  ) {
    super(message);
    this.name = 'InstructionError';
  }
}

export class WorkflowError extends Error {
  constructor(
    message: string,
    public readonly sessionId?: string,
  ) {
    super(message);
    this.name = 'WorkflowError';
  }
}

export class DatabaseError extends Error {
  constructor(
    message: string,
    public readonly operation?: string,
  ) {
    super(message);
    this.name = 'DatabaseError';
  }
}

/** A spawned helper process failed to start, exited non-zero, or ran past its limit. */
export class ProcessError extends Error {
  constructor(
    message: string,
    public readonly command: string,
    public readonly exitCode?: number | null,
    public readonly timedOut = false,
  ) {
    super(message);
    this.name = 'ProcessError';
  }
}
