const MAX_URL_LENGTH = 2048;

const TRACKING_PARAMS = new Set([
  'utm_source',
  'utm_medium',
  'utm_campaign',
  'utm_term',
  'utm_content',
  'fbclid',
  'gclid',
  'msclkid',
  '_ga',
  '_gid',
  'mc_cid',
  'mc_eid',
  'ref_src',
  'igshid',
]);

const TRACKING_PATTERNS: RegExp[] = [/^utm_/i, /^mc_/i, /^twclid$/i, /^wbraid$/i, /^gbraid$/i];

function isTrackingParam(name: string): boolean {
  if (!name) return false;
  if (TRACKING_PARAMS.has(name.toLowerCase())) return true;
  return TRACKING_PATTERNS.some((p) => p.test(name));
}

/** Validate if URL is well-formed and safe (HTTP/S only). */
export function isValidUrl(url: string): boolean {
  if (!url || url.length > MAX_URL_LENGTH) return false;
  try {
    const u = new URL(url);
    return u.protocol === 'http:' || u.protocol === 'https:';
  } catch {
    return false;
  }
}

/** Remove tracking params, keeping the first occurrence of each remaining key. */
export function removeTrackingParams(url: string): string {
  try {
    const u = new URL(url);
    const seen = new Set<string>();
    const kept: [string, string][] = [];
    for (const [key, value] of u.searchParams.entries()) {
      const k = key.toLowerCase();
      if (isTrackingParam(key) || seen.has(k)) continue;
      seen.add(k);
      kept.push([key, value]);
    }
    u.search = '';
    for (const [k, v] of kept) u.searchParams.append(k, v);
    return u.toString();
  } catch {
    return url;
  }
}

/**
 * Lowercase the hostname and drop the fragment.
 * WHATWG URL parsing already converts IDN hosts to punycode.
 */
export function normalizeHost(url: string): string {
  try {
    const u = new URL(url);
    u.hostname = u.hostname.toLowerCase();
    u.hash = '';
    return u.toString();
  } catch {
    return url;
  }
}

/** Cleanup applied to every dropped URL before site matching. */
export function cleanDroppedUrl(url: string): string {
  return normalizeHost(removeTrackingParams(url));
}

/** Strip the `www.` or `m.` prefix mobile and desktop mirrors share. */
export function bareHostname(hostname: string): string {
  return hostname.toLowerCase().replace(/^(www\.|m\.)/, '');
}
