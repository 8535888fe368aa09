import { createLogger, errorMessage } from '@parley/utils';

const log = createLogger('delivery');

export type DeliveryAttemptResult = { delivered: true } | { delivered: false; reason: string };

/** min(maxMs, baseMs * 2^(attempt - 1)) for the attempt-th consecutive failure */
export function computeBackoffDelay(attempt: number, baseMs: number, maxMs: number): number {
  const exponent = Math.max(0, attempt - 1);
  return Math.min(maxMs, baseMs * 2 ** exponent);
}

export interface PendingDelivery<T> {
  item: T;
  /** Consecutive failed attempts */
  attempts: number;
  lastFailure?: string;
  enqueuedAt: number;
  nextAttemptAt?: number;
}

export interface DeliveryQueueOptions<T> {
  attempt: (item: T) => Promise<DeliveryAttemptResult>;
  retryBaseMs: number;
  retryMaxMs: number;
  onDelivered?: (item: T) => void;
  onRetryScheduled?: (info: { attempts: number; delayMs: number; reason: string }) => void;
  now?: () => number;
}

/**
 * Single-slot delivery queue with exponential backoff.
 *
 * A newer item replaces the undelivered one (the failure count carries over).
 * An attempt starts immediately on enqueue unless one is in flight or a retry
 * is already scheduled. If the item was replaced while an attempt was in
 * flight and that attempt succeeded, the replacement waits for `kick()`.
 */
export class DeliveryQueue<T> {
  private slot: PendingDelivery<T> | undefined;
  private retryTimer: NodeJS.Timeout | null = null;
  private inFlight = false;
  private disposed = false;
  private readonly now: () => number;

  constructor(private readonly options: DeliveryQueueOptions<T>) {
    this.now = options.now ?? (() => Date.now());
  }

  get pending(): Readonly<PendingDelivery<T>> | undefined {
    return this.slot;
  }

  get isInFlight(): boolean {
    return this.inFlight;
  }

  enqueue(item: T): void {
    if (this.disposed) return;
    if (this.slot) {
      this.slot.item = item;
    } else {
      this.slot = { item, attempts: 0, enqueuedAt: this.now() };
    }
    if (!this.inFlight && this.retryTimer === null) {
      this.start();
    }
  }

  /** Attempt now, cancelling any scheduled retry. */
  kick(): void {
    if (this.disposed || this.inFlight || !this.slot) return;
    this.clearTimer();
    this.start();
  }

  discardIf(predicate: (item: T) => boolean): void {
    if (this.slot && predicate(this.slot.item)) {
      this.clear();
    }
  }

  clear(): void {
    this.clearTimer();
    this.slot = undefined;
  }

  dispose(): void {
    this.clear();
    this.disposed = true;
  }

  private start(): void {
    this.run().catch(err => {
      log.error('Delivery attempt crashed', { error: errorMessage(err) });
    });
  }

  private clearTimer(): void {
    if (this.retryTimer) {
      clearTimeout(this.retryTimer);
      this.retryTimer = null;
    }
  }

  private async run(): Promise<void> {
    const slot = this.slot;
    if (!slot || this.disposed) return;
    this.retryTimer = null;
    slot.nextAttemptAt = undefined;

    const item = slot.item;
    this.inFlight = true;
    let result: DeliveryAttemptResult;
    try {
      result = await this.options.attempt(item);
    } catch (err) {
      result = { delivered: false, reason: errorMessage(err) };
    } finally {
      this.inFlight = false;
    }

    if (this.disposed) return;
    if (this.slot !== slot) {
      // Cleared (and maybe refilled) while in flight
      if (this.slot && this.retryTimer === null) {
        this.start();
      }
      return;
    }

    if (result.delivered) {
      if (slot.item === item) {
        this.slot = undefined;
      } else {
        slot.attempts = 0;
        slot.lastFailure = undefined;
      }
      this.options.onDelivered?.(item);
      return;
    }

    slot.attempts += 1;
    slot.lastFailure = result.reason;
    const delayMs = computeBackoffDelay(slot.attempts, this.options.retryBaseMs, this.options.retryMaxMs);
    slot.nextAttemptAt = this.now() + delayMs;
    this.retryTimer = setTimeout(() => this.start(), delayMs);
    this.options.onRetryScheduled?.({ attempts: slot.attempts, delayMs, reason: result.reason });
  }
}
