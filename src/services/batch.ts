import type { Logger } from '../logger.js';
import { compareIds } from '../parsers/post-id.js';
import type { EditDetector } from '../processors/edit-detector.js';
import type { BatchResult, Post, ProcessingResult, SourceConfig } from '../types.js';

export interface BatchOptions {
  sourceConfig: SourceConfig;
  processPost: (post: Post, sourceConfig: SourceConfig) => Promise<ProcessingResult>;
  logger: Logger;
  /** Checked between posts; the post in flight always finishes. */
  signal?: AbortSignal;
}

function publishedTime(post: Post): number {
  const time = Date.parse(post.published_at);
  return Number.isNaN(time) ? 0 : time;
}

/**
 * Process posts one at a time, oldest first, so thread parents are published
 * before their replies.
 */
export async function processBatch(posts: Post[], options: BatchOptions): Promise<BatchResult> {
  const { sourceConfig, processPost, logger, signal } = options;
  const ordered = [...posts].sort((a, b) => publishedTime(a) - publishedTime(b) || compareIds(a.id, b.id));

  const batch: BatchResult = { results: [], published: 0, skipped: 0, failed: 0, cancelled: false };

  for (const post of ordered) {
    if (signal?.aborted) {
      batch.cancelled = true;
      logger.info({ sourceId: sourceConfig.id, remaining: ordered.length - batch.results.length }, 'batch cancelled');
      break;
    }

    const result = await processPost(post, sourceConfig);
    batch.results.push({ post_id: post.id, result });
    batch[result.status]++;
  }

  logger.info(
    { sourceId: sourceConfig.id, published: batch.published, skipped: batch.skipped, failed: batch.failed },
    'batch done',
  );
  return batch;
}

export function runMaintenance(detector: EditDetector, retentionHours?: number): number {
  return detector.cleanup(retentionHours);
}
