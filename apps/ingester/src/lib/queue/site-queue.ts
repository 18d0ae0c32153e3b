/**
 * In-process Site Queues
 * Bounded FIFO sinks the folder watcher fans classified URLs out to
 */

import { OTHER_SITE } from '../sites/classifier';
import type { ClassifiedUrl, DestinationMap, UrlSink } from '../ingest/types';
import { logDebug } from '../observability/logger';

export const DEFAULT_QUEUE_CAPACITY = 1000;

export class QueueFullError extends Error {
  constructor(readonly queueName: string, readonly capacity: number) {
    super(`Queue "${queueName}" is full (capacity ${capacity})`);
    this.name = 'QueueFullError';
  }
}

interface Waiter {
  resolve: (item: ClassifiedUrl) => void;
  detach: () => void;
}

export class SiteQueue implements UrlSink {
  private readonly items: ClassifiedUrl[] = [];
  private readonly waiters: Waiter[] = [];

  constructor(
    readonly name: string,
    readonly capacity: number = DEFAULT_QUEUE_CAPACITY
  ) {}

  get size(): number {
    return this.items.length;
  }

  /**
   * Add an item, handing it straight to a waiting consumer if there is one.
   * Throws QueueFullError once `capacity` items are pending.
   */
  enqueue(item: ClassifiedUrl): void {
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter.detach();
      waiter.resolve(item);
      return;
    }

    if (this.items.length >= this.capacity) {
      throw new QueueFullError(this.name, this.capacity);
    }

    this.items.push(item);
    logDebug('Enqueued URL', { queue: this.name, site: item.site, pending: this.items.length });
  }

  /**
   * Take the oldest item, waiting for one if the queue is empty.
   * Rejects when `signal` aborts first.
   */
  dequeue(signal?: AbortSignal): Promise<ClassifiedUrl> {
    const next = this.items.shift();
    if (next) {
      return Promise.resolve(next);
    }

    return new Promise<ClassifiedUrl>((resolve, reject) => {
      const abortError = () => new Error(`Dequeue from "${this.name}" aborted`);
      if (signal?.aborted) {
        reject(abortError());
        return;
      }

      const onAbort = () => {
        const index = this.waiters.indexOf(waiter);
        if (index !== -1) this.waiters.splice(index, 1);
        reject(abortError());
      };

      const waiter: Waiter = {
        resolve,
        detach: () => signal?.removeEventListener('abort', onAbort),
      };

      signal?.addEventListener('abort', onAbort, { once: true });
      this.waiters.push(waiter);
    });
  }

  /** Remove and return everything pending. */
  drain(): ClassifiedUrl[] {
    return this.items.splice(0, this.items.length);
  }
}

/**
 * Build one queue per site plus the `other` fallback
 */
export function createSiteQueues(
  siteIds: readonly string[],
  capacity: number = DEFAULT_QUEUE_CAPACITY
): Map<string, SiteQueue> {
  const queues = new Map<string, SiteQueue>();
  for (const id of [...siteIds, OTHER_SITE]) {
    if (!queues.has(id)) {
      queues.set(id, new SiteQueue(id, capacity));
    }
  }
  return queues;
}

/**
 * Pending counts for every sink that reports a size
 */
export function getQueueStats(destinations: DestinationMap): Record<string, number> {
  const stats: Record<string, number> = {};
  for (const [key, sink] of destinations) {
    if (typeof sink.size === 'number') {
      stats[key] = sink.size;
    }
  }
  return stats;
}
