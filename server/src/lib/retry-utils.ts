import { errorMessage } from '../types/errors';

export interface RetryOptions {
  maxAttempts?: number;
  delayMs?: number;
  backoffFactor?: number;
  shouldRetry?: (error: unknown) => boolean;
  onRetry?: (error: unknown, attempt: number) => void;
}

export async function withRetry<T>(
  operation: () => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const {
    maxAttempts = parseInt(process.env.STORE_RETRY_ATTEMPTS || '3'),
    delayMs = 50,
    backoffFactor = 2,
    shouldRetry = isRetryableError,
    onRetry
  } = options;

  for (let attempt = 1; ; attempt++) {
    try {
      return await operation();
    } catch (error) {
      if (attempt >= maxAttempts || !shouldRetry(error)) {
        throw error;
      }

      if (onRetry) {
        onRetry(error, attempt);
      }

      const delay = delayMs * Math.pow(backoffFactor, attempt - 1);
      await new Promise(resolve => setTimeout(resolve, delay));
    }
  }
}

/**
 * Transient filesystem conditions worth another attempt
 */
export function isRetryableError(error: unknown): boolean {
  const retryableCodes = [
    'EBUSY',
    'EAGAIN',
    'EMFILE',
    'ENFILE',
    'ETIMEDOUT',
    'EPERM'
  ];

  const code = errorCode(error) || '';
  const message = errorMessage(error);
  return retryableCodes.some(candidate =>
    code === candidate || message.includes(candidate)
  );
}

/**
 * errno code of a failed call. Checked structurally: errors raised by
 * Node's fs are not always instances of this realm's Error.
 */
export function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}
