import { createMastodonPublisher } from './clients/mastodon.js';
import { createScrapeClient } from './clients/scraper.js';
import { fetchSyndicationPost, type SyndicationPost } from './clients/syndication.js';
import { loadConfig } from './config.js';
import { sqliteStateStore } from './db/index.js';
import { plainFormatter } from './formatters/plain.js';
import { createChildLogger, createLogger, type Logger } from './logger.js';
import { createPostProcessor, type ProcessPost } from './pipeline/post-processor.js';
import { EditDetector } from './processors/edit-detector.js';
import { createUrlProcessor, DEFAULT_NO_TRIM_DOMAINS } from './processors/url-processor.js';
import { processBatch, runMaintenance } from './services/batch.js';
import { createFetchCoordinator, type ProcessTweetInput } from './services/fetch-coordinator.js';
import { ThreadReconstructor, ThreadReconstructorRegistry } from './services/thread-reconstructor.js';
import { ThreadTracker } from './services/thread-tracker.js';
import type { BatchResult, Formatter, Post, ProcessingResult, Publisher, ScrapeAdapter, SourceConfig, StateStore } from './types.js';
import type { RetryOptions } from './utils/retry.js';

export interface RelayOptions {
  logger?: Logger;
  store?: StateStore;
  publisher?: Publisher;
  formatter?: Formatter;
  scrapeAdapter?: ScrapeAdapter;
  fetchSyndication?: (postId: string) => Promise<SyndicationPost | null>;
  noTrimDomains?: readonly string[];
  sleep?: (ms: number) => Promise<void>;
}

export interface Relay {
  processPost: ProcessPost;
  processTweet(input: ProcessTweetInput): Promise<ProcessingResult>;
  processBatch(posts: Post[], sourceConfig: SourceConfig, signal?: AbortSignal): Promise<BatchResult>;
  /** Purge edit-buffer rows past the retention window; returns the number removed. */
  runMaintenance(): number;
}

function publisherFromConfig(logger: Logger): Publisher {
  const config = loadConfig();
  if (!config.MASTODON_INSTANCE_URL || !config.MASTODON_ACCESS_TOKEN) {
    throw new Error('MASTODON_INSTANCE_URL and MASTODON_ACCESS_TOKEN are required to publish');
  }
  return createMastodonPublisher({
    instanceUrl: config.MASTODON_INSTANCE_URL,
    accessToken: config.MASTODON_ACCESS_TOKEN,
    logger,
  });
}

/**
 * Wire the pipeline from environment configuration. Every collaborator can be
 * replaced through `options`.
 */
export function createRelay(options: RelayOptions = {}): Relay {
  const config = loadConfig();
  const logger = options.logger ?? createLogger({ level: config.LOG_LEVEL, pretty: config.LOG_PRETTY });
  const store = options.store ?? sqliteStateStore;
  const publisher = options.publisher ?? publisherFromConfig(createChildLogger(logger, 'mastodon'));
  const scrapeAdapter = options.scrapeAdapter ?? createScrapeClient({ baseUrl: config.SCRAPE_BASE_URL });
  const fetchSyndication =
    options.fetchSyndication ?? ((postId: string) => fetchSyndicationPost(postId, config.SYNDICATION_BASE_URL));
  const noTrimDomains = options.noTrimDomains ?? DEFAULT_NO_TRIM_DOMAINS;

  const retry: RetryOptions = {
    maxAttempts: config.FETCH_RETRY_ATTEMPTS,
    baseDelayMs: config.FETCH_RETRY_BASE_DELAY_MS,
    sleep: options.sleep,
  };

  const editDetector = new EditDetector(store, createChildLogger(logger, 'edit-detector'), {
    editWindowSeconds: config.EDIT_WINDOW_SECONDS,
    similarityThreshold: config.EDIT_SIMILARITY_THRESHOLD,
    retentionHours: config.EDIT_BUFFER_RETENTION_HOURS,
  });

  const { processPost } = createPostProcessor({
    store,
    publisher,
    formatter: options.formatter ?? plainFormatter,
    logger: createChildLogger(logger, 'pipeline'),
    editDetector,
    urlProcessor: createUrlProcessor(noTrimDomains),
  });

  const threadLogger = createChildLogger(logger, 'threads');
  const threads = new ThreadReconstructorRegistry(
    () => new ThreadReconstructor({ store, publisher, scrapeAdapter, logger: threadLogger, retry, sleep: options.sleep }),
  );
  const tracker = new ThreadTracker(store, threadLogger, { ttlHours: config.THREAD_PARENT_TTL_HOURS });

  const coordinator = createFetchCoordinator({
    logger: createChildLogger(logger, 'fetch'),
    processPost,
    scrapeAdapter,
    fetchSyndication,
    threads,
    tracker,
    retry,
    dryRun: config.DRY_RUN,
  });

  const batchLogger = createChildLogger(logger, 'batch');

  return {
    processPost,
    processTweet: coordinator.processTweet,
    processBatch: (posts, sourceConfig, signal) =>
      processBatch(posts, {
        sourceConfig,
        processPost: async (post, sc) => {
          const inReplyToId = tracker.resolveParent(sc.id, post);
          const result = await processPost(post, sc, { dryRun: config.DRY_RUN, inReplyToId });
          if (result.published_id) tracker.remember(sc.id, post, result.published_id);
          return result;
        },
        logger: batchLogger,
        signal,
      }),
    runMaintenance: () => runMaintenance(editDetector),
  };
}
