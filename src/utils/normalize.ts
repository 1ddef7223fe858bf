/**
 * Field normalization shared by every parser
 */

// Query parameters that only carry tracking state. Anything else is kept,
// since some boards identify the posting by query (Indeed's jk).
const TRACKING_PARAMS = new Set([
  'trackingid',
  'refid',
  'trk',
  'trkemail',
  'lipi',
  'midtoken',
  'midsig',
  'eid',
  'otptoken',
  'ssid',
  'fbclid',
  'gclid',
  'mc_cid',
  'mc_eid',
  'from',
  'tk',
  'alid',
  'gh_src',
  'src',
  'source',
  'ref',
  'recommendedflavor',
]);

function isTrackingParam(name: string): boolean {
  const lower = name.toLowerCase();
  return lower.startsWith('utm_') || TRACKING_PARAMS.has(lower);
}

/**
 * Strips tracking query parameters and the fragment from a posting URL,
 * and folds LinkedIn's email link form into its public one
 */
export function cleanUrl(url: string): string {
  const trimmed = url.trim();
  if (!trimmed) return '';

  let parsed: URL;
  try {
    parsed = new URL(trimmed);
  } catch {
    // Relative or otherwise non-standard: only the fragment can be dropped safely
    return trimmed.split('#')[0];
  }

  for (const name of Array.from(parsed.searchParams.keys())) {
    if (isTrackingParam(name)) {
      parsed.searchParams.delete(name);
    }
  }
  parsed.hash = '';

  // Alert emails link to /comm/jobs/view/<id>, the same posting as /jobs/view/<id>
  if (/(^|\.)linkedin\.com$/i.test(parsed.hostname) && parsed.pathname.startsWith('/comm/')) {
    parsed.pathname = parsed.pathname.slice('/comm'.length);
  }

  return parsed.toString();
}

/**
 * Collapses whitespace runs (including NBSP) and drops zero-width characters
 */
export function cleanText(text: string): string {
  return text
    .replace(/[\u200B-\u200D\uFEFF]/g, '')
    .replace(/\s+/g, ' ')
    .trim();
}

export function truncate(text: string, maxLen: number): string {
  return text.length > maxLen ? text.slice(0, maxLen) : text;
}

/**
 * Turns a URL slug into a display name: "acme-corp" -> "Acme Corp"
 */
export function humanizeSlug(slug: string): string {
  return slug
    .split(/[-_]+/)
    .filter(part => part.length > 0)
    .map(part => part.charAt(0).toUpperCase() + part.slice(1))
    .join(' ');
}

export function containsAny(text: string, needles: readonly string[]): boolean {
  const lower = text.toLowerCase();
  return needles.some(needle => lower.includes(needle));
}
