import type { ThreadChainEntry } from '../types.js';
import { decodeHtmlEntities, stripTags } from './html.js';

export const MAX_CHAIN_DEPTH = 10;

const PREVIEW_LENGTH = 51;

const CHAIN_MARKER_RE = /<div class="before-tweet[^"]*">.*?<div class="timeline-item/s;
const BEFORE_SECTION_RE = /<div class="before-tweet[^"]*">(.*)<\/div>\s*<div[^>]*class="[^"]*main-tweet/s;
const CHAIN_ITEM_RE =
  /data-username="([^"]+)".*?<a class="tweet-link" href="\/[^/]+\/status\/(\d+)[^"]*".*?<div class="tweet-content[^"]*"[^>]*>(.*?)<\/div>/gs;

/**
 * True when a rendered status page shows ancestor posts above the main one.
 */
export function hasThreadChain(html: string): boolean {
  return html.includes('before-tweet') && CHAIN_MARKER_RE.test(html);
}

/**
 * Extract the ancestors shown above the main post, oldest first.
 * Only the `maxDepth` most recent ancestors are kept.
 */
export function extractThreadChain(html: string, maxDepth = MAX_CHAIN_DEPTH): ThreadChainEntry[] {
  const section = html.match(BEFORE_SECTION_RE);
  if (!section) return [];

  const chain: ThreadChainEntry[] = [];
  for (const [, username, id, contentHtml] of section[1].matchAll(CHAIN_ITEM_RE)) {
    chain.push({
      id,
      username: username.toLowerCase(),
      text_preview: decodeHtmlEntities(stripTags(contentHtml)).slice(0, PREVIEW_LENGTH),
    });
  }

  return chain.length > maxDepth ? chain.slice(chain.length - maxDepth) : chain;
}
