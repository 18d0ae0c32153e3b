/**
 * URL Site Classifier
 * Maps a dropped URL to the site it belongs to and its canonical story URL
 */

import { logDebug } from '../observability/logger';
import { bareHostname, cleanDroppedUrl, isValidUrl } from '../utils/url';
import { KNOWN_SITES } from './registry';
import type { SiteDefinition } from './types';

/** Fallback site identifier for URLs no known site claims. */
export const OTHER_SITE = 'other';

export interface Classification {
  site: string;
  normalizedUrl: string;
}

export interface ClassifyOptions {
  /** Log each classification at debug level. */
  verbose?: boolean;
  sites?: readonly SiteDefinition[];
}

export type Classifier = (rawUrl: string, options?: ClassifyOptions) => Classification;

export class ClassificationError extends Error {
  constructor(readonly rawUrl: string, reason: string) {
    super(`Cannot classify "${rawUrl}": ${reason}`);
    this.name = 'ClassificationError';
  }
}

function findSite(hostname: string, sites: readonly SiteDefinition[]): SiteDefinition | undefined {
  const host = bareHostname(hostname);
  return sites.find((site) => site.hosts.includes(host));
}

export const classifyUrl: Classifier = (rawUrl, options = {}) => {
  const { verbose = false, sites = KNOWN_SITES } = options;
  const trimmed = rawUrl.trim();

  if (!isValidUrl(trimmed)) {
    throw new ClassificationError(rawUrl, 'not an http(s) URL');
  }

  const cleaned = new URL(cleanDroppedUrl(trimmed));
  const site = findSite(cleaned.hostname, sites);

  let result: Classification;
  if (!site) {
    result = { site: OTHER_SITE, normalizedUrl: cleaned.toString() };
  } else {
    const match = cleaned.pathname.match(site.storyPattern);
    result = {
      site: site.id,
      normalizedUrl: match ? site.canonicalUrl(match) : cleaned.toString(),
    };
  }

  if (verbose) {
    logDebug('Classified URL', { rawUrl, ...result });
  }

  return result;
};
