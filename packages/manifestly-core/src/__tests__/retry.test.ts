import { describe, it, expect, vi } from 'vitest';
import { getBackoffDelay, withRetry } from '../storage/retry.js';
import { OperationCancelledError, RemoteAuthError, TransientRemoteError } from '../errors.js';

const policy = { maxRetries: 3, baseDelayMs: 100, maxDelayMs: 1000, operation: 'test' };

describe('getBackoffDelay', () => {
  it('should grow exponentially with jitter of up to one base delay', () => {
    expect(getBackoffDelay(0, policy, () => 0)).toBe(100);
    expect(getBackoffDelay(1, policy, () => 0)).toBe(200);
    expect(getBackoffDelay(2, policy, () => 0.5)).toBe(450);
  });

  it('should cap at maxDelayMs', () => {
    expect(getBackoffDelay(10, policy, () => 0)).toBe(1000);
  });
});

describe('withRetry', () => {
  it('should retry transient failures and return the eventual result', async () => {
    const sleep = vi.fn(async () => {});
    const task = vi
      .fn<[number], Promise<string>>()
      .mockRejectedValueOnce(new TransientRemoteError('slow down'))
      .mockRejectedValueOnce(new TransientRemoteError('slow down'))
      .mockResolvedValue('ok');

    const result = await withRetry(task, { ...policy, sleep, random: () => 0 });

    expect(result).toBe('ok');
    expect(task).toHaveBeenCalledTimes(3);
    expect(sleep.mock.calls).toEqual([[100], [200]]);
  });

  it('should give up after maxRetries', async () => {
    const error = new TransientRemoteError('still down');
    const task = vi.fn(async () => {
      throw error;
    });

    await expect(withRetry(task, { ...policy, sleep: async () => {} })).rejects.toBe(error);
    expect(task).toHaveBeenCalledTimes(4);
  });

  it('should not retry non-transient failures', async () => {
    const task = vi.fn(async () => {
      throw new RemoteAuthError('denied');
    });

    await expect(withRetry(task, { ...policy, sleep: async () => {} })).rejects.toBeInstanceOf(RemoteAuthError);
    expect(task).toHaveBeenCalledTimes(1);
  });

  it('should stop retrying once cancelled', async () => {
    const controller = new AbortController();
    controller.abort();
    const task = vi.fn(async () => {
      throw new TransientRemoteError('slow down');
    });

    await expect(
      withRetry(task, { ...policy, signal: controller.signal, sleep: async () => {} }),
    ).rejects.toBeInstanceOf(OperationCancelledError);
    expect(task).toHaveBeenCalledTimes(1);
  });
});
