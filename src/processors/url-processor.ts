import defaultNoTrimDomains from '../data/no-trim-domains.json' with { type: 'json' };
import { escapeRegExp } from './content-filter.js';

export const DEFAULT_NO_TRIM_DOMAINS: readonly string[] = defaultNoTrimDomains;

const ELLIPSIS = '(?:…|\\.{2,})';

const URL_RE = /https?:\/\/[^\s<>"']+/gi;
const TRUNCATED_URL_RE = new RegExp(`https?://\\S*${ELLIPSIS}\\S*`, 'gi');
const TRUNCATED_URL_NO_PROTO_RE = new RegExp(`(?:www\\.)?[a-zA-Z0-9][a-zA-Z0-9-]*\\.[a-zA-Z0-9]\\S*${ELLIPSIS}\\S*`, 'gi');
const PROTOCOL_FRAGMENT_RE = new RegExp(`\\bhttps?${ELLIPSIS}`, 'gi');
const PATH_ELLIPSIS_RE = new RegExp(`https?://\\S*/${ELLIPSIS}/\\S*`, 'gi');
// Path or slug left behind when a trim cut the protocol and domain off a truncated link
const ORPHAN_PATH_RE = new RegExp(`/\\d+[a-zA-Z0-9-]{10,}${ELLIPSIS}`, 'gi');
const ORPHAN_SLUG_RE = new RegExp(`(?<=\\s|^)\\d+(?:-[a-zA-Z0-9]+){2,}[a-zA-Z0-9-]*${ELLIPSIS}`, 'gim');

const INCOMPLETE_URL_AT_END = [
  /https?:\/\/\S*\.$/,
  /https?:\/\/[a-zA-Z]{1,4}$/,
  /https?:\/\/[a-zA-Z0-9-]+\.[a-zA-Z]{1,2}$/,
  /https?:\/\/www\.[a-zA-Z0-9-]{1,10}$/,
  /https?:\/\/\S+\/[a-zA-Z]{1,2}$/,
];
const COMPLETE_URL_RE = /https?:\/\/[a-zA-Z0-9-]+\.[a-zA-Z]{3,}(?:\/\S*)?[a-zA-Z0-9/_\-~]$/;
const TRAILING_URL_RE = /([\r\n]+)(https?:\/\/\S+)\s*$/;

const SUBDOMAIN_PATTERN = '(?:[a-zA-Z0-9](?:[a-zA-Z0-9-]*[a-zA-Z0-9])?\\.)*';

function contains(text: string, regex: RegExp): boolean {
  return text.search(regex) !== -1;
}

export interface UrlProcessor {
  readonly noTrimDomains: readonly string[];
  processContent(text: string): string;
  processUrl(url: string): string;
  applyDomainFixes(text: string, domains: readonly string[]): string;
}

export function createUrlProcessor(noTrimDomains: readonly string[] = DEFAULT_NO_TRIM_DOMAINS): UrlProcessor {
  const domains = noTrimDomains.map((domain) => domain.toLowerCase());

  function preservesQuery(url: string): boolean {
    const lower = url.toLowerCase();
    return domains.some((domain) => lower.includes(domain));
  }

  function processUrl(input: string): string {
    const url = input.trim();
    if (!url || url === '(none)') return '';
    if (contains(url, new RegExp(ELLIPSIS))) return '';

    const kept = preservesQuery(url) ? url : trimQuery(url);
    return kept.replace(/&/g, '%26');
  }

  function processContent(text: string): string {
    if (!text) return '';

    let result = text.replace(/\.{2,}/g, '…');
    if (hasTruncatedUrl(result)) result = removeTruncatedUrls(result);
    result = result.replace(URL_RE, (url) => processUrl(url));
    if (hasIncompleteUrlAtEnd(result)) result = removeIncompleteUrlFromEnd(result);
    result = deduplicateTrailingUrls(result);

    return result
      .replace(/…+/g, '…')
      .replace(/\s+…/g, ' …')
      .trim();
  }

  return {
    noTrimDomains: domains,
    processContent,
    processUrl,
    applyDomainFixes,
  };
}

function trimQuery(url: string): string {
  const queryIndex = url.indexOf('?');
  return queryIndex === -1 ? url : url.slice(0, queryIndex);
}

export function hasTruncatedUrl(text: string): boolean {
  if (!text) return false;
  return [TRUNCATED_URL_RE, TRUNCATED_URL_NO_PROTO_RE, PATH_ELLIPSIS_RE, ORPHAN_PATH_RE, ORPHAN_SLUG_RE].some(
    (regex) => contains(text, regex),
  );
}

/**
 * Replace links that a source platform shortened for display ("https://site/…/page…")
 * and orphaned slug fragments with a single ellipsis.
 */
export function removeTruncatedUrls(text: string): string {
  return text
    .replace(PATH_ELLIPSIS_RE, '…')
    .replace(TRUNCATED_URL_RE, '…')
    .replace(TRUNCATED_URL_NO_PROTO_RE, '…')
    .replace(ORPHAN_PATH_RE, '…')
    .replace(ORPHAN_SLUG_RE, '…')
    .replace(/…+/g, '…')
    .replace(/\s+/g, ' ')
    .trim();
}

export function hasIncompleteUrlAtEnd(text: string): boolean {
  if (!text) return false;
  if (INCOMPLETE_URL_AT_END.some((regex) => regex.test(text))) return true;
  return contains(text, PROTOCOL_FRAGMENT_RE);
}

export function removeIncompleteUrlFromEnd(text: string): string {
  const result = text.replace(PROTOCOL_FRAGMENT_RE, '');
  const start = Math.max(result.lastIndexOf('http://'), result.lastIndexOf('https://'));
  if (start === -1) return result.trim();

  const spaceBefore = start === 0 || /\s/.test(result[start - 1]);
  if (!spaceBefore) return result.trim();

  if (COMPLETE_URL_RE.test(result.slice(start))) return result.trim();
  return result.slice(0, start).trim();
}

function normalizeUrlForComparison(url: string): string {
  return trimQuery(url.toLowerCase().replace(/[.,;:!?]+$/, ''))
    .replace(/\/+$/, '')
    .replace(/^https?:\/\//, '');
}

/**
 * Drop a URL on its own final line when the same link already appears earlier in the text.
 */
export function deduplicateTrailingUrls(text: string): string {
  const trailing = text.match(TRAILING_URL_RE);
  if (!trailing || trailing.index === undefined) return text;

  const before = text.slice(0, trailing.index);
  const normalized = normalizeUrlForComparison(trailing[2]);
  const earlier = before.match(URL_RE) ?? [];
  if (!earlier.some((url) => normalizeUrlForComparison(url) === normalized)) return text;

  return before.trimEnd();
}

/**
 * Prefix https:// to bare mentions of the given domains and their subdomains.
 * Existing URLs are left untouched.
 */
export function applyDomainFixes(text: string, domains: readonly string[]): string {
  if (!text || domains.length === 0) return text;

  const urls = text.match(/https?:\/\/\S+/gi) ?? [];
  let result = text;
  urls.forEach((url, i) => {
    result = result.replace(url, () => `___URL_PLACEHOLDER_${i}___`);
  });

  for (const raw of domains) {
    const domain = raw.trim().toLowerCase();
    if (!domain) continue;

    const pattern = new RegExp(
      `(?<![a-zA-Z0-9/:@])(${SUBDOMAIN_PATTERN}${escapeRegExp(domain)})(/\\S*|(?=[\\s,;:.!?)\\]"]|$))`,
      'gi',
    );
    result = result.replace(pattern, (_match, host: string, path: string | undefined) => `https://${host.toLowerCase()}${path ?? ''}`);
  }

  urls.forEach((url, i) => {
    result = result.replace(`___URL_PLACEHOLDER_${i}___`, () => url);
  });

  return result;
}
