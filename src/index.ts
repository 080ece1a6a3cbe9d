export { createRelay, type Relay, type RelayOptions } from './relay.js';
export { loadConfig, type Config } from './config.js';
export { createLogger, createChildLogger, type Logger } from './logger.js';
export * from './errors.js';
export * from './types.js';

export { sqliteStateStore, getDb, setDb, resetDb } from './db/index.js';
export { ensureSchema } from './db/schema.js';

export { createMastodonPublisher, type MastodonPublisherOptions } from './clients/mastodon.js';
export { createScrapeClient, type ScrapeClientOptions } from './clients/scraper.js';
export { fetchSyndicationPost, type SyndicationPost } from './clients/syndication.js';
export { plainFormatter } from './formatters/plain.js';

export { checkContent, isBanned, hasRequired, matchesRule, applyReplacements } from './processors/content-filter.js';
export { trimText, normalizeText, type TrimOptions } from './processors/content-processor.js';
export { createUrlProcessor, type UrlProcessor } from './processors/url-processor.js';
export {
  EditDetector,
  calculateSimilarity,
  normalizeForComparison,
  type EditCheckResult,
  type EditDetectorOptions,
} from './processors/edit-detector.js';
export { extractPostId, compareIds } from './parsers/post-id.js';

export { createPostProcessor, type ProcessPost, type PostProcessorDeps } from './pipeline/post-processor.js';
export type { ProcessOptions, ProcessingContext } from './pipeline/steps.js';
export { createFetchCoordinator, type FetchCoordinator, type ProcessTweetInput } from './services/fetch-coordinator.js';
export { ThreadReconstructor, ThreadReconstructorRegistry, type ThreadResult } from './services/thread-reconstructor.js';
export { ThreadTracker } from './services/thread-tracker.js';
export { processBatch, runMaintenance } from './services/batch.js';
export { parseSourceConfig, sourceConfigSchema } from './sources/schema.js';
