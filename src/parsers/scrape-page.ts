import type { Media, Post, QuotedPostRef } from '../types.js';
import { decodeHtmlEntities } from './html.js';

const SECTION_START_PATTERNS = [
  /<div[^>]*id="m"[^>]*class="[^"]*main-tweet[^"]*"[^>]*>/i,
  /<div[^>]*class="[^"]*main-tweet[^"]*"[^>]*>/i,
  /<div[^>]*class="[^"]*tweet-body[^"]*"[^>]*>/i,
];

const SECTION_END_PATTERNS = [
  /<div[^>]*class="[^"]*after-tweet[^"]*"[^>]*>/i,
  /<div[^>]*class="[^"]*replies[^"]*"[^>]*>/i,
  /<div[^>]*class="[^"]*reply-box[^"]*"[^>]*>/i,
  /<\/div>\s*<!--\s*main-thread\s*-->/i,
];

const MAX_SECTION_LENGTH = 10_000;

/**
 * Slice the main post out of a rendered status page.
 */
export function extractMainSection(html: string): string | null {
  let start: number | null = null;
  for (const pattern of SECTION_START_PATTERNS) {
    const match = html.match(pattern);
    if (match && match.index !== undefined) {
      start = match.index;
      break;
    }
  }
  if (start === null) return null;

  const remaining = html.slice(start);
  let end = Math.min(start + MAX_SECTION_LENGTH, html.length);
  for (const pattern of SECTION_END_PATTERNS) {
    const match = remaining.match(pattern);
    if (match && match.index !== undefined) {
      end = Math.min(end, start + match.index);
    }
  }

  return html.slice(start, end);
}

export function extractText(section: string): string {
  const content = section.match(/<div[^>]*class="[^"]*tweet-content[^"]*"[^>]*>(.*?)<\/div>/is);
  if (!content) return '';

  const text = content[1]
    .replace(/<img[^>]*>/gi, '')
    .replace(/<a[^>]*>(@\w+)<\/a>/gi, '$1')
    .replace(/<a[^>]+href="[^"]*\/status\/\d+\/(?:photo|video)\/\d+"[^>]*>[^<]*<\/a>/gi, '')
    .replace(/<a[^>]+href="[^"]*\/status\/\d+#m"[^>]*>[^<]*<\/a>/gi, '')
    // Links the renderer shortened for display carry the full URL in href
    .replace(/<a[^>]+href="([^"]+)"[^>]*>[^<]*…<\/a>/gi, '$1')
    .replace(/<a[^>]*>([^<]*)<\/a>/gi, '$1')
    .replace(/<br\s*\/?>/g, '\n')
    .replace(/<\/p>\s*<p[^>]*>/g, '\n')
    .replace(/<\/?p[^>]*>/g, '')
    .replace(/<[^>]+>/g, ' ');

  return decodeHtmlEntities(text)
    .replace(/[ \t]+/g, ' ')
    .replace(/\n[ \t]+/g, '\n')
    .replace(/[ \t]+\n/g, '\n')
    .replace(/\n{3,}/g, '\n\n')
    .trim();
}

export function extractTimestamp(html: string): string | null {
  const match =
    html.match(/<span[^>]*class="[^"]*tweet-date[^"]*"[^>]*>.*?<a[^>]*title="([^"]+)"/is) ??
    html.match(/<span[^>]*class="[^"]*tweet-published[^"]*"[^>]*>([^<]+)/is);
  if (!match) return null;

  const cleaned = match[1].replace('·', '').replace('UTC', '').trim();
  const parsed = new Date(`${cleaned} UTC`);
  return Number.isNaN(parsed.getTime()) ? null : parsed.toISOString();
}

function absoluteMediaUrl(url: string, baseUrl: string): string {
  if (!url.startsWith('/pic/') && !url.startsWith('/media/')) return url;
  const path = url.includes('/pic/media') && !url.includes('video') ? url.replace('/pic/', '/pic/orig/') : url;
  return `${baseUrl.replace(/\/$/, '')}${path}`;
}

export function extractMedia(section: string, baseUrl: string): Media[] {
  const media: Media[] = [];

  for (const [, href] of section.matchAll(/<a[^>]*class="[^"]*(?:still-image|gallery-image)[^"]*"[^>]*href="([^"]+)"/gi)) {
    if (href.includes('emoji')) continue;
    media.push({ type: 'image', url: absoluteMediaUrl(href, baseUrl), alt_text: '' });
  }
  for (const [, src] of section.matchAll(/<source[^>]+src="([^"]+)"[^>]*>/gi)) {
    media.push({ type: 'video', url: absoluteMediaUrl(src, baseUrl), alt_text: '' });
  }
  for (const [, poster] of section.matchAll(/<video[^>]+poster="([^"]+)"[^>]*>/gi)) {
    media.push({ type: 'video_thumbnail', url: absoluteMediaUrl(poster, baseUrl), alt_text: '🎬 Video' });
  }

  const seen = new Set<string>();
  const unique = media.filter((item) => {
    if (seen.has(item.url)) return false;
    seen.add(item.url);
    return true;
  });

  // Four or more images next to a video means the video is a converted GIF artifact
  const images = unique.filter((item) => item.type === 'image').length;
  if (images >= 4) return unique.filter((item) => item.type !== 'video');
  return unique;
}

export function detectReply(title: string, username: string): { is_reply: boolean; is_thread_post: boolean; reply_to_handle?: string } {
  const match = title.match(/^R to @(\w+):/i) ?? title.match(/^@(\w+)\s/);
  if (!match) return { is_reply: false, is_thread_post: false };

  const handle = match[1].toLowerCase();
  return { is_reply: true, is_thread_post: handle === username.toLowerCase(), reply_to_handle: handle };
}

function extractQuotedPost(html: string): QuotedPostRef | undefined {
  const link = html.match(/<a[^>]*class="[^"]*quote-link[^"]*"[^>]*href="([^"]+)"[^>]*>/i);
  const path = link?.[1].match(/\/(\w+)\/status\/(\d+)/);
  if (!path) return undefined;

  return {
    username: path[1],
    url: `https://twitter.com/${path[1]}/status/${path[2]}`,
    status_id: path[2],
  };
}

/**
 * Parse the main post of a rendered status page into a Post.
 * Returns null when the page has no recognisable main post.
 */
export function parseStatusPage(html: string, postId: string, username: string, baseUrl: string): Post | null {
  const section = extractMainSection(html);
  if (!section) return null;

  const title = decodeHtmlEntities(html.match(/<title>([^<]+)<\/title>/i)?.[1] ?? '');
  const isRepost = /^RT by @\w+:/i.test(title);
  const isQuote = /class="[^"]*\bquote\b/.test(html);
  const reply = detectReply(title, username);

  let author = username;
  let repostedBy: string | undefined;
  if (isRepost) {
    repostedBy = username;
    author = section.match(/<a[^>]*class="[^"]*username[^"]*"[^>]*>@?(\w+)<\/a>/i)?.[1] ?? username;
  }

  const text = extractText(section)
    .replace(/^RT by @\w+:\s*/i, '')
    .replace(/^R to @\w+:\s*/i, '')
    .trim();

  return {
    id: postId,
    platform: 'twitter',
    url: `https://twitter.com/${username}/status/${postId}`,
    text,
    author: { username: author, display_name: author, profile_url: `https://twitter.com/${author}` },
    media: extractMedia(section, baseUrl),
    published_at: extractTimestamp(html) ?? new Date().toISOString(),
    is_repost: isRepost,
    is_reply: reply.is_reply,
    is_quote: isQuote,
    is_thread_post: reply.is_thread_post,
    has_video: html.includes('>Video<') || html.includes('video_thumb') || html.includes('<video') || html.includes('video-container'),
    reposted_by: repostedBy,
    quoted_post: isQuote ? extractQuotedPost(html) : undefined,
    reply_to_handle: reply.reply_to_handle,
    extensions: { source_tier: 'scrape' },
  };
}
