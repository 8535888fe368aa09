import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { DeliveryQueue, computeBackoffDelay, type DeliveryAttemptResult } from './delivery-queue.js';

describe('computeBackoffDelay', () => {
  it('doubles from the base and caps at the max', () => {
    expect([1, 2, 3, 4, 5, 6].map(n => computeBackoffDelay(n, 1000, 8000))).toEqual([
      1000, 2000, 4000, 8000, 8000, 8000,
    ]);
  });

  it('treats attempt 0 like the first failure', () => {
    expect(computeBackoffDelay(0, 500, 8000)).toBe(500);
  });
});

describe('DeliveryQueue', () => {
  const failed: DeliveryAttemptResult = { delivered: false, reason: 'agent busy' };
  const delivered: DeliveryAttemptResult = { delivered: true };

  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('attempts immediately and clears the slot on success', async () => {
    const attempt = vi.fn(async (_item: string) => delivered);
    const onDelivered = vi.fn();
    const queue = new DeliveryQueue<string>({ attempt, retryBaseMs: 1000, retryMaxMs: 8000, onDelivered });

    queue.enqueue('hello');
    await vi.advanceTimersByTimeAsync(0);

    expect(attempt).toHaveBeenCalledWith('hello');
    expect(onDelivered).toHaveBeenCalledWith('hello');
    expect(queue.pending).toBeUndefined();
  });

  it('retries with exponential backoff capped at the max', async () => {
    const attempt = vi.fn(async (_item: string) => failed);
    const delays: number[] = [];
    const queue = new DeliveryQueue<string>({
      attempt,
      retryBaseMs: 1000,
      retryMaxMs: 8000,
      onRetryScheduled: info => delays.push(info.delayMs),
    });

    queue.enqueue('payload');
    await vi.advanceTimersByTimeAsync(0);
    expect(delays).toEqual([1000]);

    await vi.advanceTimersByTimeAsync(15000);
    expect(delays).toEqual([1000, 2000, 4000, 8000, 8000]);
    expect(attempt).toHaveBeenCalledTimes(5);
    expect(queue.pending?.attempts).toBe(5);
    expect(queue.pending?.lastFailure).toBe('agent busy');

    queue.dispose();
  });

  it('replaces a waiting item and keeps its failure count', async () => {
    let result: DeliveryAttemptResult = failed;
    const attempt = vi.fn(async (_item: string) => result);
    const onDelivered = vi.fn();
    const queue = new DeliveryQueue<string>({ attempt, retryBaseMs: 1000, retryMaxMs: 8000, onDelivered });

    queue.enqueue('first');
    await vi.advanceTimersByTimeAsync(0);
    queue.enqueue('second');

    expect(attempt).toHaveBeenCalledTimes(1);
    expect(queue.pending?.item).toBe('second');
    expect(queue.pending?.attempts).toBe(1);

    result = delivered;
    await vi.advanceTimersByTimeAsync(1000);

    expect(attempt).toHaveBeenLastCalledWith('second');
    expect(onDelivered).toHaveBeenCalledWith('second');
    expect(queue.pending).toBeUndefined();
  });

  it('kick cancels the scheduled retry and attempts now', async () => {
    const attempt = vi.fn(async (_item: string) => failed);
    const delays: number[] = [];
    const queue = new DeliveryQueue<string>({
      attempt,
      retryBaseMs: 1000,
      retryMaxMs: 8000,
      onRetryScheduled: info => delays.push(info.delayMs),
    });

    queue.enqueue('payload');
    await vi.advanceTimersByTimeAsync(0);
    queue.kick();
    await vi.advanceTimersByTimeAsync(0);

    expect(attempt).toHaveBeenCalledTimes(2);
    expect(delays).toEqual([1000, 2000]);

    queue.dispose();
  });

  it('holds an item replaced during a successful attempt until kicked', async () => {
    let resolveAttempt: (value: DeliveryAttemptResult) => void = () => undefined;
    const attempt = vi.fn(
      (_item: string) =>
        new Promise<DeliveryAttemptResult>(resolve => {
          resolveAttempt = resolve;
        })
    );
    const onDelivered = vi.fn();
    const queue = new DeliveryQueue<string>({ attempt, retryBaseMs: 1000, retryMaxMs: 8000, onDelivered });

    queue.enqueue('first');
    expect(queue.isInFlight).toBe(true);
    queue.enqueue('second');
    resolveAttempt(delivered);
    await vi.advanceTimersByTimeAsync(0);

    expect(onDelivered).toHaveBeenCalledWith('first');
    expect(queue.pending?.item).toBe('second');
    expect(queue.pending?.attempts).toBe(0);
    expect(attempt).toHaveBeenCalledTimes(1);

    queue.kick();
    expect(attempt).toHaveBeenLastCalledWith('second');
    resolveAttempt(delivered);
    await vi.advanceTimersByTimeAsync(0);
    expect(queue.pending).toBeUndefined();
  });

  it('counts a thrown attempt as a failure', async () => {
    const attempt = vi.fn(async (_item: string): Promise<DeliveryAttemptResult> => {
      throw new Error('handle lost');
    });
    const reasons: string[] = [];
    const queue = new DeliveryQueue<string>({
      attempt,
      retryBaseMs: 1000,
      retryMaxMs: 8000,
      onRetryScheduled: info => reasons.push(info.reason),
    });

    queue.enqueue('payload');
    await vi.advanceTimersByTimeAsync(0);

    expect(reasons).toEqual(['handle lost']);
    queue.dispose();
  });

  it('discardIf drops only a matching item', async () => {
    const attempt = vi.fn(async (_item: string) => failed);
    const queue = new DeliveryQueue<string>({ attempt, retryBaseMs: 1000, retryMaxMs: 8000 });

    queue.enqueue('keep');
    await vi.advanceTimersByTimeAsync(0);
    queue.discardIf(item => item === 'other');
    expect(queue.pending?.item).toBe('keep');

    queue.discardIf(item => item === 'keep');
    expect(queue.pending).toBeUndefined();

    await vi.advanceTimersByTimeAsync(10000);
    expect(attempt).toHaveBeenCalledTimes(1);
  });

  it('ignores enqueues after dispose', async () => {
    const attempt = vi.fn(async (_item: string) => delivered);
    const queue = new DeliveryQueue<string>({ attempt, retryBaseMs: 1000, retryMaxMs: 8000 });

    queue.dispose();
    queue.enqueue('late');
    await vi.advanceTimersByTimeAsync(0);

    expect(attempt).not.toHaveBeenCalled();
    expect(queue.pending).toBeUndefined();
  });
});
