/**
 * Errors surfaced to callers of the session manager.
 *
 * Everything else degrades in place (see the session and adapter modules);
 * only a failed process start reaches the caller of `open`.
 */

export class SessionStartError extends Error {
  readonly command: string;

  constructor(command: string, cause?: unknown) {
    super(`Failed to start job for '${command}'${cause === undefined ? '' : `: ${getErrorMessage(cause)}`}`, { cause });
    this.name = 'SessionStartError';
    this.command = command;
  }
}

export function isSessionStartError(error: unknown): error is SessionStartError {
  return error instanceof SessionStartError;
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }

  if (typeof error === 'string') {
    return error;
  }

  return 'An unknown error occurred';
}
