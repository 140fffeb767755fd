import vm from 'vm';
import { errorCode, isRetryableError, withRetry } from '../retry-utils';
import { errorMessage } from '../../types/errors';

function errnoError(code: string): Error {
  return Object.assign(new Error(`${code}: resource busy`), { code });
}

describe('withRetry', () => {
  it('should retry transient errors until the operation succeeds', async () => {
    let calls = 0;
    const onRetry = jest.fn();

    const value = await withRetry(async () => {
      calls++;
      if (calls < 3) {
        throw errnoError('EBUSY');
      }
      return 'written';
    }, { delayMs: 1, onRetry });

    expect(value).toBe('written');
    expect(calls).toBe(3);
    expect(onRetry).toHaveBeenCalledTimes(2);
  });

  it('should not retry permanent errors', async () => {
    let calls = 0;

    await expect(withRetry(async () => {
      calls++;
      throw errnoError('ENOSPC');
    }, { delayMs: 1 })).rejects.toThrow('ENOSPC');

    expect(calls).toBe(1);
  });

  it('should give up after the last attempt', async () => {
    let calls = 0;

    await expect(withRetry(async () => {
      calls++;
      throw errnoError('EAGAIN');
    }, { delayMs: 1, maxAttempts: 2 })).rejects.toThrow('EAGAIN');

    expect(calls).toBe(2);
  });
});

describe('isRetryableError', () => {
  it('should recognise transient errno codes', () => {
    expect(isRetryableError(errnoError('EMFILE'))).toBe(true);
    expect(isRetryableError(errnoError('ENOENT'))).toBe(false);
  });
});

describe('errorCode', () => {
  // fs errors can come from another realm, where instanceof Error fails
  const foreign: unknown = vm.runInNewContext(
    "Object.assign(new Error('ENOENT: no such file or directory'), { code: 'ENOENT' })"
  );

  it('should read the code of an error from another realm', () => {
    expect(foreign instanceof Error).toBe(false);
    expect(errorCode(foreign)).toBe('ENOENT');
    expect(errorMessage(foreign)).toBe('ENOENT: no such file or directory');
  });

  it('should return undefined for values without a code', () => {
    expect(errorCode(new Error('plain'))).toBeUndefined();
    expect(errorCode('ENOENT')).toBeUndefined();
    expect(errorMessage(42)).toBe('42');
  });
});
