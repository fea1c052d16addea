import { toError } from '../errors';

export interface RetryOptions {
  /** Attempts after the first one */
  maxRetries: number;
  /** Wait before the first retry in ms; doubles on each further retry */
  retryDelay: number;
  shouldRetry: (error: Error) => boolean;
}

const TRANSIENT_CONNECTION_CODES = ['ECONNREFUSED', 'ECONNRESET', 'ETIMEDOUT', 'ENOTFOUND', 'ENETUNREACH'];

/**
 * Whether a failed connect is worth another attempt: the socket was refused,
 * reset, timed out or could not reach the host.
 */
export function isTransientConnectionError(error: Error): boolean {
  const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined;
  return TRANSIENT_CONNECTION_CODES.some((known) => known === code || error.message.includes(known));
}

export async function retry<T>(fn: () => Promise<T>, options: Partial<RetryOptions> = {}): Promise<T> {
  const { maxRetries = 3, retryDelay = 1000, shouldRetry = isTransientConnectionError } = options;

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      const failure = toError(error);
      if (attempt >= maxRetries || !shouldRetry(failure)) {
        throw failure;
      }
      await sleep(retryDelay * 2 ** attempt);
    }
  }
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
