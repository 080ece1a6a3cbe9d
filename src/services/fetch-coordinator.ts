import type { SyndicationPost } from '../clients/syndication.js';
import { NotFoundError, errorMessage } from '../errors.js';
import type { Logger } from '../logger.js';
import type { ProcessPost } from '../pipeline/post-processor.js';
import { PLATFORM_CAPABILITIES } from '../types.js';
import type { Media, Post, ProcessingResult, ScrapeAdapter, SourceConfig } from '../types.js';
import { DEFAULT_FETCH_RETRY, retry, type RetryOptions } from '../utils/retry.js';
import type { ThreadReconstructorRegistry } from './thread-reconstructor.js';
import type { ThreadTracker } from './thread-tracker.js';

export interface FetchCoordinatorDeps {
  logger: Logger;
  processPost: ProcessPost;
  scrapeAdapter: ScrapeAdapter;
  fetchSyndication: (postId: string) => Promise<SyndicationPost | null>;
  threads: ThreadReconstructorRegistry;
  tracker: ThreadTracker;
  retry?: RetryOptions;
  dryRun?: boolean;
  noTrimDomains?: readonly string[];
}

export interface ProcessTweetInput {
  sourceConfig: SourceConfig;
  postId: string;
  username: string;
  /** Post built from the real-time trigger; last resort when every fetch fails. */
  fallbackPost?: Post | null;
  signal?: AbortSignal;
}

interface Resolved {
  post: Post;
  inReplyToId: string | null;
}

type ScrapeOutcome = { kind: 'found'; post: Post } | { kind: 'not_found' } | { kind: 'failed' };

function skipped(reason: string): ProcessingResult {
  return { status: 'skipped', skipped_reason: reason };
}

function parseTimestamp(value: string | null): string {
  if (value) {
    const parsed = new Date(value);
    if (!Number.isNaN(parsed.getTime())) return parsed.toISOString();
  }
  return new Date().toISOString();
}

/**
 * Build a post from the embed API payload. Type flags come from the trigger's
 * fallback post when there is one, since the payload does not carry them.
 */
export function buildSyndicationPost(
  postId: string,
  username: string,
  data: SyndicationPost,
  fallback: Post | null,
): Post {
  const author = data.username ?? username;
  const media: Media[] = data.photos.map((url): Media => ({ type: 'image', url, alt_text: '' }));
  if (data.video_thumbnail && media.length === 0) {
    media.push({ type: 'image', url: data.video_thumbnail, alt_text: 'Video thumbnail' });
  }

  const isRepost = fallback?.is_repost ?? false;

  return {
    id: postId,
    platform: 'twitter',
    url: `https://x.com/${author}/status/${postId}`,
    text: data.text,
    author:
      isRepost && fallback
        ? fallback.author
        : { username: author, display_name: data.display_name ?? author, profile_url: `https://x.com/${author}` },
    media,
    published_at: parseTimestamp(data.created_at),
    is_repost: isRepost,
    is_reply: fallback?.is_reply ?? false,
    is_quote: fallback?.is_quote ?? false,
    is_thread_post: fallback?.is_thread_post ?? false,
    has_video: data.video_thumbnail !== null || (fallback?.has_video ?? false),
    reposted_by: fallback?.reposted_by,
    quoted_post: fallback?.quoted_post,
    reply_to_handle: fallback?.reply_to_handle,
    extensions: {
      source_tier: 'syndication',
      scrape_failed: true,
      trigger_text: fallback?.extensions.trigger_text,
    },
  };
}

/**
 * Last-resort trigger content, flagged for a read-more link.
 */
function asDegraded(post: Post): Post {
  return { ...post, extensions: { ...post.extensions, source_tier: 'fallback', force_read_more: true } };
}

/**
 * Resolve the best available content for one post (scrape, then the embed API,
 * then the trigger's own fallback), find its thread parent and run it through
 * the pipeline.
 */
export function createFetchCoordinator(deps: FetchCoordinatorDeps) {
  const retryOptions = deps.retry ?? DEFAULT_FETCH_RETRY;

  async function scrape(postId: string, username: string, log: Logger): Promise<ScrapeOutcome> {
    try {
      const post = await retry(() => deps.scrapeAdapter.fetchSinglePost(username, postId), retryOptions, log, 'scrape');
      return post ? { kind: 'found', post } : { kind: 'failed' };
    } catch (err) {
      if (err instanceof NotFoundError) {
        log.info('post not found at source');
        return { kind: 'not_found' };
      }
      log.warn({ err: errorMessage(err) }, 'scrape failed');
      return { kind: 'failed' };
    }
  }

  async function syndicate(postId: string, username: string, fallback: Post | null, log: Logger): Promise<Post | null> {
    try {
      const data = await deps.fetchSyndication(postId);
      if (!data) return null;
      log.info({ photos: data.photos.length, video: data.video_thumbnail !== null }, 'syndication fetch ok');
      return buildSyndicationPost(postId, username, data, fallback);
    } catch (err) {
      log.warn({ err: errorMessage(err) }, 'syndication failed');
      return null;
    }
  }

  /** Returns null when no tier produced a post. */
  async function fetchContent(postId: string, username: string, fallback: Post | null, log: Logger): Promise<Post | null> {
    const scraped = await scrape(postId, username, log);
    if (scraped.kind === 'found') return scraped.post;
    if (scraped.kind === 'not_found') return null;

    const syndicated = await syndicate(postId, username, fallback, log);
    if (syndicated) return syndicated;

    if (!fallback) return null;
    log.warn('all fetches failed, using trigger content');
    return asDegraded(fallback);
  }

  async function resolve(input: ProcessTweetInput, log: Logger): Promise<Resolved | null> {
    const { sourceConfig, postId, username } = input;
    const fallback = input.fallbackPost ?? null;

    const tiered = PLATFORM_CAPABILITIES[sourceConfig.platform].tieredFetch && sourceConfig.nitter_processing?.enabled !== false;
    if (!tiered) {
      if (!fallback) return null;
      return { post: fallback, inReplyToId: deps.tracker.resolveParent(sourceConfig.id, fallback) };
    }

    if (sourceConfig.thread_handling?.enabled === true) {
      const thread = await deps.threads.get(sourceConfig.id).process(sourceConfig.id, postId, username);
      if (thread.is_thread) {
        log.info({ chainLength: thread.chain_length, inReplyToId: thread.reply_to_id }, 'thread detected');
      }
      const post = await fetchContent(postId, username, fallback, log);
      return post ? { post, inReplyToId: thread.reply_to_id } : null;
    }

    const post = await fetchContent(postId, username, fallback, log);
    return post ? { post, inReplyToId: deps.tracker.resolveParent(sourceConfig.id, post) } : null;
  }

  async function processTweet(input: ProcessTweetInput): Promise<ProcessingResult> {
    const sourceId = input.sourceConfig.id;
    const log = deps.logger.child({ sourceId, postId: input.postId });

    if (input.signal?.aborted) return skipped('cancelled');

    try {
      const resolved = await resolve(input, log);
      if (!resolved) {
        log.warn('no post available');
        return skipped('no_data');
      }

      const result = await deps.processPost(resolved.post, input.sourceConfig, {
        dryRun: deps.dryRun,
        inReplyToId: resolved.inReplyToId,
        noTrimDomains: deps.noTrimDomains,
      });

      if (result.status === 'published' && result.published_id) {
        deps.tracker.remember(sourceId, resolved.post, result.published_id);
      }
      return result;
    } catch (err) {
      const message = errorMessage(err);
      log.error({ err: message }, 'tweet processing failed');
      return { status: 'failed', error: message };
    }
  }

  return { processTweet };
}

export type FetchCoordinator = ReturnType<typeof createFetchCoordinator>;
