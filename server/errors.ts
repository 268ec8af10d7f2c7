export type ProbeErrorCode = 'VALIDATION' | 'SETUP' | 'TRANSIENT_IO' | 'LIFECYCLE';

export class ProbeError extends Error {
  constructor(
    public readonly code: ProbeErrorCode,
    message: string,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

/** Bad run parameters or a target outside the permitted address ranges. */
export class ValidationError extends ProbeError {
  constructor(message: string) {
    super('VALIDATION', message);
  }
}

/** The transport could not be opened; the run never reached `running`. */
export class SetupError extends ProbeError {
  constructor(
    message: string,
    public readonly reason?: unknown,
    public readonly runId?: string,
  ) {
    super('SETUP', message);
  }
}

/** A single probe attempt failed. Counted by the worker, never fatal. */
export class TransientIOError extends ProbeError {
  constructor(
    public readonly ioCode: string,
    message: string,
  ) {
    super('TRANSIENT_IO', message);
  }
}

export class LifecycleError extends ProbeError {
  constructor(message: string) {
    super('LIFECYCLE', message);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
