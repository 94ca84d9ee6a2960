import { toError, withRetry } from '../../src/utils/retry';

const noDelay = { initialDelayMs: 0, maxDelayMs: 0 };

describe('withRetry', () => {
  it('should return the first successful result', async () => {
    const attempts: number[] = [];

    const result = await withRetry(async (attempt) => {
      attempts.push(attempt);
      if (attempt < 2) {
        throw new Error('flaky');
      }
      return 'done';
    }, noDelay);

    expect(result).toBe('done');
    expect(attempts).toEqual([1, 2]);
  });

  it('should rethrow the last error after the final attempt', async () => {
    let calls = 0;

    const run = withRetry(
      async (attempt) => {
        calls++;
        throw new Error(`failure ${attempt}`);
      },
      { ...noDelay, maxAttempts: 4 }
    );

    await expect(run).rejects.toThrow('failure 4');
    expect(calls).toBe(4);
  });

  it('should wrap non-error rejections', async () => {
    await expect(
      withRetry(() => Promise.reject('plain string'), { ...noDelay, maxAttempts: 1 })
    ).rejects.toThrow('plain string');
  });
});

describe('toError', () => {
  it('should keep errors and wrap anything else', () => {
    const error = new Error('kept');
    expect(toError(error)).toBe(error);
    expect(toError(42).message).toBe('42');
  });
});
