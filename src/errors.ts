import axios from 'axios';

export type DeadlineErrorKind = 'auth' | 'transport' | 'parse' | 'config' | 'busy';

/**
 * Base class for every failure the deadline pipeline can surface.
 * `kind` lets presenters tell fatal failures apart without instanceof chains.
 */
export abstract class DeadlineError extends Error {
  abstract readonly kind: DeadlineErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Identity resolution failed, usually an invalid or expired token. */
export class AuthError extends DeadlineError {
  readonly kind = 'auth';

  constructor(message: string, readonly status?: number, options?: { cause?: unknown }) {
    super(message, options);
  }
}

/** A request (or one page of a paginated request) did not succeed. */
export class TransportError extends DeadlineError {
  readonly kind = 'transport';

  constructor(
    message: string,
    readonly url: string,
    readonly status?: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

/** A due timestamp could not be read. Never fatal; see classify.ts. */
export class ParseError extends DeadlineError {
  readonly kind = 'parse';

  constructor(readonly input: string, reason?: string | null) {
    super(`Unparseable due date "${input}"${reason ? `: ${reason}` : ''}`);
  }
}

export class ConfigError extends DeadlineError {
  readonly kind = 'config';
}

export class RunInProgressError extends DeadlineError {
  readonly kind = 'busy';

  constructor() {
    super('A deadline fetch is already running');
  }
}

/**
 * Pull the most useful message out of an HTTP failure. Canvas reports errors as
 * `{ errors: [{ message }] }`.
 */
export function describeHttpError(error: unknown): { message: string; status?: number } {
  if (axios.isAxiosError(error)) {
    const data: unknown = error.response?.data;
    let apiMessage: string | undefined;
    if (typeof data === 'object' && data !== null && 'errors' in data && Array.isArray(data.errors)) {
      const first: unknown = data.errors[0];
      if (typeof first === 'object' && first !== null && 'message' in first && typeof first.message === 'string') {
        apiMessage = first.message;
      }
    }
    return { message: apiMessage ?? error.message, status: error.response?.status };
  }
  if (error instanceof Error) {
    return { message: error.message };
  }
  return { message: 'Unknown error' };
}
