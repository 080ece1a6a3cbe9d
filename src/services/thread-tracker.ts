import { errorMessage } from '../errors.js';
import type { Logger } from '../logger.js';
import type { Post, PublishedRecord, StateStore } from '../types.js';

export const THREAD_PARENT_TTL_HOURS = 24;

export interface ThreadTrackerOptions {
  /** How far back the store is searched for a parent when the cache has none. */
  ttlHours?: number;
}

/**
 * Remembers the last published id per (source, author) so that the next
 * self-reply in the same run can be threaded under it.
 */
export class ThreadTracker {
  private readonly cache = new Map<string, Map<string, string>>();
  private readonly ttlHours: number;

  constructor(
    private readonly store: StateStore,
    private readonly logger: Logger,
    options: ThreadTrackerOptions = {},
  ) {
    this.ttlHours = options.ttlHours ?? THREAD_PARENT_TTL_HOURS;
  }

  remember(sourceId: string, post: Post, publishedId: string): void {
    const author = post.author.username.toLowerCase();
    if (!author) return;

    let bySource = this.cache.get(sourceId);
    if (!bySource) {
      bySource = new Map();
      this.cache.set(sourceId, bySource);
    }
    bySource.set(author, publishedId);
    this.logger.debug({ sourceId, author, publishedId }, 'cached thread parent');
  }

  /**
   * Reply target for a thread post: the cached id for its author, else the
   * source's most recent published post within the TTL. Null for anything
   * that is not a thread post, or when the store cannot be read.
   */
  resolveParent(sourceId: string, post: Post): string | null {
    if (!post.is_thread_post) return null;

    const cached = this.cache.get(sourceId)?.get(post.author.username.toLowerCase());
    if (cached) {
      this.logger.debug({ sourceId, parent: cached }, 'thread parent from cache');
      return cached;
    }

    let recent: PublishedRecord | null;
    try {
      recent = this.store.findRecentThreadParent(sourceId, this.ttlHours);
    } catch (err) {
      this.logger.warn({ sourceId, err: errorMessage(err) }, 'thread parent lookup failed, starting a new thread');
      return null;
    }
    if (recent) {
      this.logger.debug({ sourceId, parent: recent.published_id }, 'thread parent from store');
      return recent.published_id;
    }

    this.logger.debug({ sourceId }, 'no thread parent, starting a new thread');
    return null;
  }

  clear(): void {
    this.cache.clear();
  }
}
