/**
 * URL Dispatcher
 * Classifies an extracted URL and hands it to exactly one destination
 */

import type { WatchConfig } from '../config';
import { logDebug, logError, logInfo, logWarn } from '../observability/logger';
import { ffnetSite } from '../sites/ffnet';
import { classifyUrl, OTHER_SITE } from '../sites/classifier';
import type { Classification, Classifier } from '../sites/classifier';
import type { ClassifiedUrl, DestinationMap, Notifier, UrlItem } from './types';

/** Site whose URLs can be diverted to the notifier. */
export const DIVERTIBLE_SITE = ffnetSite.id;

export const DIVERSION_NOTIFICATION_TITLE = 'New Fanfiction Download';

export interface DispatchContext {
  config: Pick<WatchConfig, 'disableFanfictionNet'>;
  destinations: DestinationMap;
  notifier: Notifier;
  classify?: Classifier;
  /** Log each classification at debug level. */
  verbose?: boolean;
}

export type DropReason = 'classification-failed' | 'no-destination' | 'enqueue-failed';

export type DispatchOutcome =
  | { kind: 'queued'; site: string; destination: string }
  | { kind: 'notified'; site: string }
  | { kind: 'dropped'; reason: DropReason; site?: string };

async function notifyDiverted(notifier: Notifier, item: ClassifiedUrl): Promise<void> {
  try {
    await notifier.notify(DIVERSION_NOTIFICATION_TITLE, item.normalizedUrl, item.site);
    logInfo('Diverted URL to notifier', { site: item.site, url: item.rawUrl });
  } catch (error) {
    // Delivery is the notifier's concern; the item still counts as diverted
    logWarn('Notifier failed for diverted URL', {
      site: item.site,
      url: item.rawUrl,
      error: error instanceof Error ? error.message : String(error),
    });
  }
}

/**
 * Dispatch one extracted URL
 *
 * Exactly one of these happens: the notifier is called (diverted site with the
 * flag on), the item is enqueued on `destinations[site]` or `destinations.other`,
 * or the item is dropped with a log line.
 */
export async function dispatchUrl(item: UrlItem, context: DispatchContext): Promise<DispatchOutcome> {
  const { config, destinations, notifier, classify = classifyUrl, verbose = false } = context;

  let classification: Classification;
  try {
    classification = classify(item.rawUrl, { verbose });
  } catch (error) {
    logError('Failed to classify URL', error, { url: item.rawUrl, file: item.sourceFile });
    return { kind: 'dropped', reason: 'classification-failed' };
  }

  item.site = classification.site;
  item.normalizedUrl = classification.normalizedUrl;
  const classified: ClassifiedUrl = { rawUrl: item.rawUrl, ...classification };

  if (classified.site === DIVERTIBLE_SITE && config.disableFanfictionNet) {
    await notifyDiverted(notifier, classified);
    return { kind: 'notified', site: classified.site };
  }

  let destination = classified.site;
  let sink = destinations.get(destination);
  if (!sink) {
    destination = OTHER_SITE;
    sink = destinations.get(OTHER_SITE);
  }

  if (!sink) {
    logDebug('No queue available for site', { site: classified.site, url: classified.rawUrl });
    return { kind: 'dropped', reason: 'no-destination', site: classified.site };
  }

  try {
    await sink.enqueue(classified);
  } catch (error) {
    logError('Failed to enqueue URL', error, { site: classified.site, destination, url: classified.rawUrl });
    return { kind: 'dropped', reason: 'enqueue-failed', site: classified.site };
  }

  logInfo('Queued URL', { site: classified.site, destination, url: classified.rawUrl });
  return { kind: 'queued', site: classified.site, destination };
}
