export type RouterErrorCode =
  | 'NO_HEALTHY_HOST'
  | 'BACKEND_CALL_FAILED'
  | 'RETRIES_EXHAUSTED'
  | 'INVALID_HOST'
  | 'INVALID_CONFIG';

export class RouterError extends Error {
  readonly code: RouterErrorCode;

  constructor(code: RouterErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * No host was selectable, even after a refresh. Never retried.
 */
export class NoHealthyHostError extends RouterError {
  readonly totalHosts: number;

  constructor(totalHosts: number) {
    super('NO_HEALTHY_HOST', `No healthy hosts available (${totalHosts} configured)`);
    this.totalHosts = totalHosts;
  }
}

/**
 * A single attempt against one host failed. `cause` holds whatever the
 * backend client threw.
 */
export class BackendCallError extends RouterError {
  readonly address: string;
  readonly attempt: number;

  constructor(address: string, attempt: number, cause: unknown) {
    super(
      'BACKEND_CALL_FAILED',
      `Backend call to ${address} failed on attempt ${attempt}: ${describeError(cause)}`,
      { cause }
    );
    this.address = address;
    this.attempt = attempt;
  }
}

export class ExhaustedRetriesError extends RouterError {
  constructor(message = 'All hosts exhausted without a successful call') {
    super('RETRIES_EXHAUSTED', message);
  }
}

export class InvalidHostError extends RouterError {
  constructor(message: string) {
    super('INVALID_HOST', message);
  }
}

export class ConfigError extends RouterError {
  constructor(message: string, cause?: unknown) {
    super('INVALID_CONFIG', message, { cause });
  }
}

// Errors from Node internals may come from another realm (as under Jest),
// so look at the shape rather than relying on instanceof
export function describeError(error: unknown): string {
  if (typeof error === 'string') {
    return error;
  }
  if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
    return error.message;
  }
  return 'Unknown error';
}

export function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}
