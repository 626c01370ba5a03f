import { ProviderUnavailableError } from './errors';
import type { Logger } from '../logger';

export interface RateLimiterOptions {
  maxConcurrent?: number;
  minInterval?: number;
  maxQueueSize?: number;
  logger?: Logger;
}

interface QueueItem {
  label: string;
  /** Runs the request and settles the caller's promise */
  run: () => Promise<void>;
  reject: (reason: unknown) => void;
}

/**
 * Spaces out requests to the vendor API. A full queue is reported as
 * provider unavailability so callers retry it like any other transient failure.
 */
export class RateLimiter {
  private readonly maxConcurrent: number;
  private readonly minInterval: number;
  private readonly maxQueueSize?: number;
  private readonly logger?: Logger;
  private readonly queue: QueueItem[] = [];
  private activeCount = 0;
  private lastStart = 0;
  private wakeTimer?: NodeJS.Timeout;

  constructor(options: RateLimiterOptions = {}) {
    this.maxConcurrent = Math.max(1, options.maxConcurrent ?? 2);
    this.minInterval = Math.max(0, options.minInterval ?? 200);
    this.maxQueueSize = options.maxQueueSize;
    this.logger = options.logger;
  }

  get pending(): number {
    return this.queue.length;
  }

  get active(): number {
    return this.activeCount;
  }

  async schedule<T>(fn: () => Promise<T>, label = 'request'): Promise<T> {
    if (this.maxQueueSize !== undefined && this.queue.length >= this.maxQueueSize) {
      this.logger?.error('[RateLimiter] Queue full (%d), dropping %s', this.queue.length, label);
      throw new ProviderUnavailableError(`Request queue full, ${label} not sent`);
    }

    return new Promise<T>((resolve, reject) => {
      this.queue.push({
        label,
        run: async () => {
          try {
            resolve(await fn());
          } catch (error) {
            reject(error);
          }
        },
        reject,
      });
      this.process();
    });
  }

  /** Rejects everything still waiting; requests already started run to completion. */
  clear(reason = 'Rate limiter cleared'): void {
    if (this.wakeTimer) {
      clearTimeout(this.wakeTimer);
      this.wakeTimer = undefined;
    }
    const dropped = this.queue.splice(0, this.queue.length);
    for (const item of dropped) {
      item.reject(new ProviderUnavailableError(`${reason}: ${item.label} not sent`));
    }
  }

  private process(): void {
    if (!this.queue.length || this.wakeTimer) {
      return;
    }

    if (this.activeCount >= this.maxConcurrent) {
      return;
    }

    const wait = Math.max(0, this.minInterval - (Date.now() - this.lastStart));
    if (wait > 0) {
      this.wakeTimer = setTimeout(() => {
        this.wakeTimer = undefined;
        this.process();
      }, wait);
      return;
    }

    const item = this.queue.shift();
    if (!item) {
      return;
    }

    this.activeCount += 1;
    this.lastStart = Date.now();

    item
      .run()
      .finally(() => {
        this.activeCount -= 1;
        this.process();
      });

    this.process();
  }
}

export default RateLimiter;
