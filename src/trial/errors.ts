export class TrialError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TrialError';
  }
}

/** The operating system refused to start the trial program. */
export class LaunchError extends TrialError {
  readonly command: string;
  readonly code?: string;

  constructor(command: string, cause: unknown) {
    const code = typeof cause === 'object' && cause !== null && 'code' in cause ? String(cause.code) : undefined;
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Unable to launch "${command}": ${reason}`, { cause });
    this.name = 'LaunchError';
    this.command = command;
    this.code = code;
  }
}

export class TrialTimeoutError extends TrialError {
  readonly timeoutSeconds: number;

  constructor(timeoutSeconds: number) {
    super(`Trial timed out after ${timeoutSeconds}s and was terminated.`);
    this.name = 'TrialTimeoutError';
    this.timeoutSeconds = timeoutSeconds;
  }
}

export class ProcessFailureError extends TrialError {
  readonly exitCode: number;

  constructor(exitCode: number, label = 'Trial') {
    super(`${label} exited with code ${exitCode}.`);
    this.name = 'ProcessFailureError';
    this.exitCode = exitCode;
  }
}

/** Anything unexpected thrown while reading or classifying trial output. */
export class SupervisionError extends TrialError {
  constructor(cause: unknown) {
    super(`Supervision failed: ${cause instanceof Error ? cause.message : String(cause)}`, { cause });
    this.name = 'SupervisionError';
  }
}

export const describeError = (error: unknown) => (error instanceof Error ? error.message : String(error));
