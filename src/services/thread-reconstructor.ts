import { NotFoundError, errorMessage } from '../errors.js';
import type { Logger } from '../logger.js';
import { extractThreadChain, hasThreadChain, MAX_CHAIN_DEPTH } from '../parsers/thread-page.js';
import { selectUploadableMedia } from '../pipeline/steps.js';
import type { Post, Publisher, ScrapeAdapter, StateStore, ThreadChainEntry } from '../types.js';
import { DEFAULT_FETCH_RETRY, retry, sleep, type RetryOptions } from '../utils/retry.js';

export const BACKFILL_DELAY_MS = 500;

export interface ThreadResult {
  reply_to_id: string | null;
  is_thread: boolean;
  chain_length: number;
}

export interface ThreadReconstructorDeps {
  store: StateStore;
  publisher: Publisher;
  scrapeAdapter: ScrapeAdapter;
  logger: Logger;
  retry?: RetryOptions;
  backfillDelayMs?: number;
  maxChainDepth?: number;
  sleep?: (ms: number) => Promise<void>;
}

const NOT_A_THREAD: ThreadResult = { reply_to_id: null, is_thread: false, chain_length: 0 };

export function formatAncestorText(post: Post): string {
  const text = post.url && !post.text.includes(post.url) ? `${post.text}\n\n${post.url}` : post.text;
  return text.trim();
}

/**
 * Makes sure every ancestor of a self-thread is published before the post
 * that answers it, and reports the id that post should reply to.
 */
export class ThreadReconstructor {
  private readonly logger: Logger;
  private readonly retryOptions: RetryOptions;
  private readonly backfillDelayMs: number;
  private readonly maxChainDepth: number;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(private readonly deps: ThreadReconstructorDeps) {
    this.logger = deps.logger;
    this.sleep = deps.sleep ?? sleep;
    this.retryOptions = { ...(deps.retry ?? DEFAULT_FETCH_RETRY), sleep: this.sleep };
    this.backfillDelayMs = deps.backfillDelayMs ?? BACKFILL_DELAY_MS;
    this.maxChainDepth = deps.maxChainDepth ?? MAX_CHAIN_DEPTH;
  }

  async process(sourceId: string, postId: string, username: string): Promise<ThreadResult> {
    const html = await this.fetchPage(sourceId, postId, username);
    if (html === null) return NOT_A_THREAD;

    if (!hasThreadChain(html)) {
      this.logger.debug({ sourceId, postId }, 'not a thread');
      return NOT_A_THREAD;
    }

    const chain = extractThreadChain(html, this.maxChainDepth);
    if (chain.length === 0) {
      this.logger.warn({ sourceId, postId }, 'thread marker found but chain extraction failed');
      return { reply_to_id: null, is_thread: true, chain_length: 0 };
    }

    this.logger.info({ sourceId, postId, chainLength: chain.length }, 'thread chain found');
    const replyToId = await this.reconstructChain(sourceId, username, chain);
    return { reply_to_id: replyToId, is_thread: true, chain_length: chain.length };
  }

  private async fetchPage(sourceId: string, postId: string, username: string): Promise<string | null> {
    try {
      return await retry(
        () => this.deps.scrapeAdapter.fetchThreadPage(username, postId),
        this.retryOptions,
        this.logger,
        'thread page',
      );
    } catch (err) {
      if (err instanceof NotFoundError) {
        this.logger.warn({ sourceId, postId }, 'thread page not found');
      } else {
        this.logger.warn({ sourceId, postId, err: errorMessage(err) }, 'thread page fetch failed, treating as standalone');
      }
      return null;
    }
  }

  private async reconstructChain(sourceId: string, username: string, chain: ThreadChainEntry[]): Promise<string | null> {
    const handle = username.toLowerCase();
    let parent: string | null = null;

    for (const entry of chain) {
      const existing = this.deps.store.findByPostId(sourceId, entry.id);
      if (existing) {
        parent = existing.published_id;
        continue;
      }

      // External replies are not backfilled
      if (entry.username !== handle) {
        this.logger.debug({ sourceId, postId: entry.id, author: entry.username }, 'chain broken by another author');
        break;
      }

      try {
        const publishedId = await this.publishAncestor(sourceId, username, entry.id, parent);
        if (publishedId) {
          parent = publishedId;
          this.logger.info({ sourceId, postId: entry.id, publishedId }, 'published missing thread ancestor');
        }
      } catch (err) {
        this.logger.error({ sourceId, postId: entry.id, err: errorMessage(err) }, 'failed to publish thread ancestor');
      }

      await this.sleep(this.backfillDelayMs);
    }

    return parent;
  }

  private async publishAncestor(
    sourceId: string,
    username: string,
    postId: string,
    inReplyToId: string | null,
  ): Promise<string | null> {
    const post = await this.deps.scrapeAdapter.fetchSinglePost(username, postId);
    if (!post) {
      this.logger.warn({ sourceId, postId }, 'could not fetch thread ancestor');
      return null;
    }

    const uploadable = selectUploadableMedia(post.media);
    const mediaIds =
      uploadable.length > 0
        ? await this.deps.publisher.uploadMediaParallel(uploadable.map((media) => ({ url: media.url, description: media.alt_text })))
        : [];

    const result = await this.deps.publisher.publish({
      text: formatAncestorText(post),
      media_ids: mediaIds,
      in_reply_to_id: inReplyToId,
    });

    this.deps.store.markPublished({ source_id: sourceId, post_id: postId, post_url: post.url, published_id: result.id });
    return result.id;
  }
}

/**
 * One reconstructor per source for the lifetime of a run.
 */
export class ThreadReconstructorRegistry {
  private readonly instances = new Map<string, ThreadReconstructor>();

  constructor(private readonly create: (sourceId: string) => ThreadReconstructor) {}

  get(sourceId: string): ThreadReconstructor {
    let instance = this.instances.get(sourceId);
    if (!instance) {
      instance = this.create(sourceId);
      this.instances.set(sourceId, instance);
    }
    return instance;
  }

  clear(): void {
    this.instances.clear();
  }
}
