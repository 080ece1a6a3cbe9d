import { checkContent, applyReplacements } from '../processors/content-filter.js';
import { DEFAULT_MAX_LENGTH, DEFAULT_TOLERANCE_PERCENT, trimText } from '../processors/content-processor.js';
import type { UrlProcessor } from '../processors/url-processor.js';
import { StatusNotFoundError, errorMessage } from '../errors.js';
import type { Formatter, Media, Platform, Post, SourceConfig } from '../types.js';

export interface ProcessOptions {
  dryRun?: boolean;
  /** Published id of the thread parent this post answers. */
  inReplyToId?: string | null;
  /** Domains whose links keep their query string; extends the domain-fix list. */
  noTrimDomains?: readonly string[];
}

export interface ProcessingContext {
  post: Post;
  sourceConfig: SourceConfig;
  options: ProcessOptions;
  source_id: string;
  post_id: string;
  platform: Platform;
}

export function createContext(post: Post, sourceConfig: SourceConfig, options: ProcessOptions = {}): ProcessingContext {
  return {
    post,
    sourceConfig,
    options,
    source_id: sourceConfig.id,
    post_id: post.id || post.url,
    platform: sourceConfig.platform,
  };
}

// Trailing line carrying the post link (optionally behind an emoji prefix); never edited or trimmed
const TRAILING_URL_SEGMENT_RE = /([\r\n]+[^\n]*?https?:\/\/\S+)\s*$/;

export function extractTrailingUrl(text: string): { body: string; suffix: string } {
  const match = text.match(TRAILING_URL_SEGMENT_RE);
  if (!match || match.index === undefined) return { body: text, suffix: '' };
  return { body: text.slice(0, match.index), suffix: match[1] };
}

export function resolveMaxLength(sourceConfig: SourceConfig): number {
  return (
    sourceConfig.truncation?.max_length ??
    sourceConfig.formatting?.max_length ??
    sourceConfig.processing?.max_length ??
    DEFAULT_MAX_LENGTH
  );
}

/**
 * Returns the reason a post should be skipped, or null to keep it.
 */
export function filterReason(post: Post, sourceConfig: SourceConfig): string | null {
  const filtering: NonNullable<SourceConfig['filtering']> = sourceConfig.filtering ?? {};

  if (post.is_reply) {
    if (post.is_thread_post) {
      if (filtering.skip_self_replies) return 'is_self_reply_thread';
    } else if (filtering.skip_replies) {
      return 'is_external_reply';
    }
  }
  if (post.is_repost && filtering.skip_retweets) return 'is_retweet';
  if (post.is_quote && filtering.skip_quotes) return 'is_quote';

  const combined = [post.text, post.title, post.url].filter((part) => part).join(' ');
  if (!combined) return null;

  return checkContent(combined, filtering).reason;
}

export function replaceContent(text: string, sourceConfig: SourceConfig): string {
  const replacements = sourceConfig.processing?.content_replacements ?? [];
  if (replacements.length === 0) return text;

  const { body, suffix } = extractTrailingUrl(text);
  return applyReplacements(body, replacements) + suffix;
}

/**
 * Trim to the source's length limit, keeping the trailing link line intact.
 * When the link line leaves no room for the body it is sent alone, and cut
 * hard if even the link line is over the limit.
 */
export function trimContent(text: string, sourceConfig: SourceConfig): string {
  const maxLength = resolveMaxLength(sourceConfig);
  const { body, suffix } = extractTrailingUrl(text);

  if (suffix.length >= maxLength) {
    const linkLine = suffix.trim();
    return linkLine.length <= maxLength ? linkLine : trimText(linkLine, { maxLength, strategy: 'hard' });
  }

  const trimmed = trimText(body, {
    maxLength: maxLength - suffix.length,
    strategy: sourceConfig.processing?.trim_strategy ?? 'smart',
    tolerancePercent: sourceConfig.processing?.smart_tolerance_percent ?? DEFAULT_TOLERANCE_PERCENT,
  });
  return suffix ? trimmed.trimEnd() + suffix : trimmed;
}

export function processUrls(text: string, sourceConfig: SourceConfig, urlProcessor: UrlProcessor): string {
  const fixes = [...new Set([...(sourceConfig.processing?.url_domain_fixes ?? []), ...urlProcessor.noTrimDomains])];
  const fixed = fixes.length > 0 ? urlProcessor.applyDomainFixes(text, fixes) : text;
  return urlProcessor.processContent(fixed);
}

/** Steps 4-7: format, replace, trim, clean links. */
export function renderText(
  post: Post,
  sourceConfig: SourceConfig,
  formatter: Formatter,
  urlProcessor: UrlProcessor,
): string {
  const formatted = formatter.format(post, sourceConfig);
  const replaced = replaceContent(formatted, sourceConfig);
  const trimmed = trimContent(replaced, sourceConfig);
  return processUrls(trimmed, sourceConfig, urlProcessor);
}

export function selectUploadableMedia(media: Media[]): Media[] {
  const hasVideo = media.some((item) => item.type === 'video');
  return media.filter((item) => item.type !== 'link_card' && !(item.type === 'video_thumbnail' && hasVideo));
}

/**
 * When no media made it up, point readers at the original video instead.
 */
export function appendVideoLink(text: string, post: Post, sourceConfig: SourceConfig, uploadedCount: number): string {
  if (uploadedCount > 0 || !post.has_video) return text;
  if (post.extensions.video_url_added || text.includes(post.url)) return text;

  const prefix = sourceConfig.formatting?.prefix_video ?? '🎬';
  return `${text}\n${prefix} ${post.url}`;
}

export function isMissingReplyTarget(err: unknown): boolean {
  return err instanceof StatusNotFoundError || /record not found/i.test(errorMessage(err));
}
