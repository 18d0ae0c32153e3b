/**
 * Folder Watcher
 * Polls the drop folder on a fixed interval and dispatches every URL it finds
 */

import { randomUUID } from 'node:crypto';
import type { WatchConfig } from '../config';
import { dispatchUrl } from '../ingest/dispatcher';
import type { DispatchOutcome } from '../ingest/dispatcher';
import type { DestinationMap, Notifier, UrlItem } from '../ingest/types';
import { UrlFileExtractor } from '../ingest/url-file-extractor';
import { logInfo, serializeError, withCorrelationId } from '../observability/logger';
import { getQueueStats } from '../queue/site-queue';
import type { Classifier } from '../sites/classifier';

export interface FolderWatcherDeps {
  destinations: DestinationMap;
  notifier: Notifier;
  classify?: Classifier;
  /** Log each classification at debug level. Defaults to false. */
  verboseClassification?: boolean;
  extractor?: Pick<UrlFileExtractor, 'extract'>;
}

export interface CycleSummary {
  cycleId: string;
  extracted: number;
  queued: number;
  notified: number;
  dropped: number;
  /** Dispatch calls that threw instead of returning an outcome. */
  failed: number;
  /** Set when the extractor itself failed and the cycle ran on an empty batch. */
  extractError?: string;
}

/**
 * Resolve after `ms`, or early once `signal` aborts
 */
export function interruptibleSleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

export class FolderWatcher {
  private readonly extractor: Pick<UrlFileExtractor, 'extract'>;

  constructor(
    readonly config: WatchConfig,
    private readonly deps: FolderWatcherDeps
  ) {
    this.extractor = deps.extractor ?? new UrlFileExtractor(config.folderPath);
  }

  /**
   * One poll cycle: extract, then dispatch each item in extraction order.
   * Never throws.
   */
  async runCycle(): Promise<CycleSummary> {
    const cycleId = randomUUID();
    const log = withCorrelationId(cycleId);
    const summary: CycleSummary = {
      cycleId,
      extracted: 0,
      queued: 0,
      notified: 0,
      dropped: 0,
      failed: 0,
    };

    let items: UrlItem[] = [];
    try {
      items = await this.extractor.extract();
    } catch (error) {
      summary.extractError = error instanceof Error ? error.message : String(error);
      log.error('Error in folder watcher cycle', {
        folder: this.config.folderPath,
        error: serializeError(error),
      });
    }
    summary.extracted = items.length;

    for (const item of items) {
      let outcome: DispatchOutcome;
      try {
        outcome = await dispatchUrl(item, {
          config: this.config,
          destinations: this.deps.destinations,
          notifier: this.deps.notifier,
          classify: this.deps.classify,
          verbose: this.deps.verboseClassification ?? false,
        });
      } catch (error) {
        summary.failed++;
        log.error('Error processing URL', { url: item.rawUrl, error: serializeError(error) });
        continue;
      }

      switch (outcome.kind) {
        case 'queued':
          summary.queued++;
          break;
        case 'notified':
          summary.notified++;
          break;
        case 'dropped':
          summary.dropped++;
          break;
      }
    }

    if (summary.extracted > 0) {
      log.info('Folder watcher cycle completed', {
        ...summary,
        pending: getQueueStats(this.deps.destinations),
      });
    } else {
      log.debug('Folder watcher cycle found nothing');
    }

    return summary;
  }

  /**
   * Poll until `signal` aborts. Without a signal this never returns.
   */
  async run(signal?: AbortSignal): Promise<void> {
    const { folderPath, pollIntervalSeconds, disableFanfictionNet } = this.config;

    logInfo('Starting folder watcher', {
      folder: folderPath,
      intervalSeconds: pollIntervalSeconds,
      fanfictionNet: disableFanfictionNet ? 'diverted to notifier' : 'queued',
    });

    while (!signal?.aborted) {
      await this.runCycle();
      await interruptibleSleep(pollIntervalSeconds * 1000, signal);
    }

    logInfo('Folder watcher stopped', { folder: folderPath });
  }
}
