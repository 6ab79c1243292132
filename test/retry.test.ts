/**
 * Tests for retry helpers
 */
import { callOnce, getErrorCode, withRetry } from '../src/utils/retry';
import { ProviderApiError } from '../src/utils/errors';

function awsError(name: string, message: string): Error {
  const error = new Error(message);
  error.name = name;
  return error;
}

describe('withRetry', () => {
  test('returns the first successful result', async () => {
    const delays: number[] = [];
    let calls = 0;
    const result = await withRetry(
      'DescribeThing',
      async () => {
        calls++;
        if (calls < 3) throw new Error('throttled');
        return 'ok';
      },
      { sleep: async (ms) => void delays.push(ms), baseDelayMs: 100 }
    );

    expect(result).toBe('ok');
    expect(delays).toEqual([100, 200]);
  });

  test('wraps the last failure in ProviderApiError', async () => {
    const promise = withRetry(
      'DescribeThing',
      async () => {
        throw awsError('RequestLimitExceeded', 'slow down');
      },
      { attempts: 2, sleep: async () => undefined }
    );

    await expect(promise).rejects.toBeInstanceOf(ProviderApiError);
    await expect(promise).rejects.toMatchObject({
      message: 'DescribeThing failed: slow down',
      providerCode: 'RequestLimitExceeded',
    });
  });
});

describe('callOnce', () => {
  test('calls exactly once', async () => {
    let calls = 0;
    await expect(
      callOnce('RunInstances', async () => {
        calls++;
        throw awsError('InsufficientInstanceCapacity', 'no capacity');
      })
    ).rejects.toMatchObject({ operation: 'RunInstances', providerCode: 'InsufficientInstanceCapacity' });
    expect(calls).toBe(1);
  });

  test('passes ProviderApiError through unchanged', async () => {
    const original = new ProviderApiError('inner', 'boom');
    await expect(
      callOnce('outer', async () => {
        throw original;
      })
    ).rejects.toBe(original);
  });
});

describe('getErrorCode', () => {
  test('reads the error name', () => {
    expect(getErrorCode(awsError('InvalidGroup.NotFound', 'x'))).toBe('InvalidGroup.NotFound');
    expect(getErrorCode('text')).toBeUndefined();
  });
});
