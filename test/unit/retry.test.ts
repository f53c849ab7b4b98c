import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest';
import { NdjsonLogger } from '../../src/common/logger.js';
import { DEFAULT_RETRY_POLICY, callWithRetry, type RetryPolicy } from '../../src/common/retry.js';

function recordingSleep() {
  const delays: number[] = [];
  return {
    delays,
    sleep: async (ms: number) => {
      delays.push(ms);
    },
  };
}

describe('callWithRetry', () => {
  let line: MockInstance<NdjsonLogger['line']>;

  beforeEach(() => {
    line = vi.spyOn(NdjsonLogger.prototype, 'line').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should return the first successful result without sleeping', async () => {
    const { delays, sleep } = recordingSleep();
    const op = vi.fn(async () => 'ok');
    await expect(callWithRetry(op, DEFAULT_RETRY_POLICY, { sleep })).resolves.toBe('ok');
    expect(op).toHaveBeenCalledTimes(1);
    expect(delays).toEqual([]);
  });

  it('should back off linearly between attempts', async () => {
    const { delays, sleep } = recordingSleep();
    let calls = 0;
    const op = async () => {
      calls++;
      if (calls < 3) throw new Error(`transient ${calls}`);
      return calls;
    };
    await expect(callWithRetry(op, DEFAULT_RETRY_POLICY, { sleep })).resolves.toBe(3);
    expect(delays).toEqual([2000, 4000]);
  });

  it('should rethrow the last error once attempts run out', async () => {
    const { delays, sleep } = recordingSleep();
    let calls = 0;
    const op = async (): Promise<string> => {
      calls++;
      throw new Error(`failure ${calls}`);
    };
    await expect(callWithRetry(op, DEFAULT_RETRY_POLICY, { sleep })).rejects.toThrow('failure 3');
    expect(calls).toBe(3);
    expect(delays).toEqual([2000, 4000]);
  });

  it('should stop early when the policy declines to retry', async () => {
    const { delays, sleep } = recordingSleep();
    const policy: RetryPolicy = {
      maxAttempts: 5,
      baseDelayMs: 100,
      shouldRetry: (err) => !(err instanceof TypeError),
    };
    const op = vi.fn(async (): Promise<string> => {
      throw new TypeError('bad request');
    });
    await expect(callWithRetry(op, policy, { sleep })).rejects.toThrow('bad request');
    expect(op).toHaveBeenCalledTimes(1);
    expect(delays).toEqual([]);
  });

  it('should treat a non-positive attempt count as a single attempt', async () => {
    const { sleep } = recordingSleep();
    const op = vi.fn(async (): Promise<string> => {
      throw new Error('nope');
    });
    await expect(callWithRetry(op, { ...DEFAULT_RETRY_POLICY, maxAttempts: 0 }, { sleep })).rejects.toThrow('nope');
    expect(op).toHaveBeenCalledTimes(1);
  });

  it('should log each failed attempt with its number', async () => {
    const { sleep } = recordingSleep();
    const op = async (): Promise<string> => {
      throw new Error('quota');
    };
    await expect(
      callWithRetry(op, { ...DEFAULT_RETRY_POLICY, maxAttempts: 2 }, { sleep, label: 'generate' })
    ).rejects.toThrow('quota');
    expect(line).toHaveBeenNthCalledWith(
      1,
      'warn',
      expect.objectContaining({ message: 'generate failed (attempt 1/2): quota' })
    );
    expect(line).toHaveBeenNthCalledWith(
      2,
      'warn',
      expect.objectContaining({ message: 'generate failed (attempt 2/2): quota' })
    );
  });
});
