export const PLATFORMS = ['twitter', 'bluesky', 'rss', 'youtube'] as const;
export type Platform = (typeof PLATFORMS)[number];

export interface PlatformCapabilities {
  /** Post ids change when the author edits, so edits arrive as new items. */
  editDetection: boolean;
  /** The post id doubles as a platform URI worth recording alongside the status id. */
  recordsPlatformUri: boolean;
  /** Content is retrieved through the tiered fetch cascade. */
  tieredFetch: boolean;
}

export const PLATFORM_CAPABILITIES: Record<Platform, PlatformCapabilities> = {
  twitter: { editDetection: true, recordsPlatformUri: false, tieredFetch: true },
  bluesky: { editDetection: true, recordsPlatformUri: true, tieredFetch: false },
  rss: { editDetection: false, recordsPlatformUri: false, tieredFetch: false },
  youtube: { editDetection: false, recordsPlatformUri: false, tieredFetch: false },
};

export interface Author {
  username: string;
  display_name?: string;
  profile_url?: string;
}

export const MEDIA_TYPES = ['image', 'video', 'gif', 'video_thumbnail', 'link_card'] as const;
export type MediaType = (typeof MEDIA_TYPES)[number];

export interface Media {
  type: MediaType;
  url: string;
  alt_text?: string;
}

export interface QuotedPostRef {
  username: string;
  url: string;
  text?: string;
  status_id?: string;
}

export type FetchTier = 'scrape' | 'syndication' | 'fallback';

/**
 * Cross-cutting signals passed between the fetch cascade, the formatter and the pipeline.
 */
export interface PostExtensions {
  source_tier?: FetchTier;
  /** Content is known to be truncated; the formatter should add a read-more link. */
  force_read_more?: boolean;
  /** The formatter already appended the video permalink. */
  video_url_added?: boolean;
  /** Tier 1 was attempted and failed before this post was produced. */
  scrape_failed?: boolean;
  /** Raw text carried by the real-time trigger, kept for diagnostics. */
  trigger_text?: string;
}

export interface Post {
  id: string;
  platform: Platform;
  url: string;
  text: string;
  title?: string;
  author: Author;
  media: Media[];
  published_at: string;
  is_repost: boolean;
  is_reply: boolean;
  is_quote: boolean;
  is_thread_post: boolean;
  has_video: boolean;
  reposted_by?: string;
  quoted_post?: QuotedPostRef;
  reply_to_handle?: string;
  extensions: PostExtensions;
}

export type ProcessingStatus = 'published' | 'skipped' | 'failed';

export interface ProcessingResult {
  status: ProcessingStatus;
  published_id?: string;
  error?: string;
  skipped_reason?: string;
}

export interface EditBufferEntry {
  source_id: string;
  post_id: string;
  username: string;
  text_normalized: string;
  text_hash: string;
  published_id: string | null;
  created_at: string;
}

export interface ThreadChainEntry {
  id: string;
  username: string;
  text_preview: string;
}

export interface PublishedRecord {
  source_id: string;
  post_id: string;
  post_url: string | null;
  published_id: string;
  platform_uri: string | null;
  published_at: string;
}

export type Visibility = 'public' | 'unlisted' | 'private' | 'direct';

export interface MarkPublishedInput {
  source_id: string;
  post_id: string;
  post_url?: string | null;
  published_id: string;
  platform_uri?: string | null;
}

export interface EditBufferInput {
  source_id: string;
  post_id: string;
  username: string;
  text_normalized: string;
  text_hash: string;
  published_id?: string | null;
}

export interface ActivityDetails {
  [key: string]: string | number | boolean | null | undefined;
}

/**
 * Durable state owned outside the pipeline.
 * Implementations must enforce uniqueness of (source_id, post_id) and of published_id.
 */
export interface StateStore {
  isPublished(sourceId: string, postId: string): boolean;
  markPublished(input: MarkPublishedInput): void;
  markUpdated(publishedId: string, newPostId: string, newPostUrl?: string | null): void;
  findByPostId(sourceId: string, postId: string): PublishedRecord | null;
  findRecentThreadParent(sourceId: string, withinHours: number): PublishedRecord | null;
  logSkip(sourceId: string, postId: string, reason: string, details?: ActivityDetails): void;
  logPublish(sourceId: string, postId: string, details?: ActivityDetails): void;
  logUpdate(sourceId: string, postId: string, details?: ActivityDetails): void;
  logError(sourceId: string, postId: string, message: string): void;
  findByTextHash(username: string, textHash: string, withinSeconds: number): EditBufferEntry | null;
  findRecentBufferEntries(username: string, withinSeconds: number, limit?: number): EditBufferEntry[];
  addToEditBuffer(input: EditBufferInput): void;
  updateEditBufferPublishedId(sourceId: string, postId: string, publishedId: string): void;
  cleanupEditBuffer(retentionHours: number): number;
  markEditSuperseded(sourceId: string, postId: string): void;
}

export interface PublishRequest {
  text: string;
  media_ids?: string[];
  visibility?: Visibility;
  in_reply_to_id?: string | null;
}

export interface MediaUpload {
  url: string;
  description?: string;
}

export interface Publisher {
  publish(request: PublishRequest): Promise<{ id: string }>;
  /** Rejects with StatusNotFoundError or EditNotAllowedError when the status cannot be edited. */
  updateStatus(id: string, text: string, mediaIds?: string[]): Promise<{ id: string }>;
  deleteStatus(id: string): Promise<void>;
  /** Failed uploads are dropped; the result keeps input order. */
  uploadMediaParallel(items: MediaUpload[]): Promise<string[]>;
}

export interface Formatter {
  format(post: Post, sourceConfig: SourceConfig): string;
}

export interface Adapter {
  fetchPosts(since?: Date): Promise<Post[]>;
  fetchSinglePost(id: string): Promise<Post | null>;
}

export interface ScrapeAdapter {
  /** Returns null when the page could not be parsed; throws NotFoundError on a definitive 404. */
  fetchSinglePost(username: string, postId: string): Promise<Post | null>;
  /** Throws NotFoundError on a definitive 404. */
  fetchThreadPage(username: string, postId: string): Promise<string>;
}

// --- Source configuration ---

export type TrimStrategy = 'sentence' | 'word' | 'smart' | 'hard';

export interface LiteralRule {
  type: 'literal';
  pattern: string;
}

export interface RegexRule {
  type: 'regex';
  pattern: string;
  flags?: string;
}

export interface CombinatorRule {
  type: 'and' | 'or' | 'not';
  content?: string[];
  username?: string[];
  domain?: string[];
  contentRegex?: string[];
  usernameRegex?: string[];
  domainRegex?: string[];
}

export interface ComplexRule {
  type: 'complex';
  rules: FilterRule[];
  operator?: string;
}

export type FilterRule = string | LiteralRule | RegexRule | CombinatorRule | ComplexRule;

export interface ReplacementRule {
  pattern: string;
  replacement?: string;
  flags?: string;
  literal?: boolean;
}

export interface SourceConfig {
  id: string;
  platform: Platform;
  enabled?: boolean;
  filtering?: {
    skip_replies?: boolean;
    skip_self_replies?: boolean;
    skip_retweets?: boolean;
    skip_quotes?: boolean;
    banned_phrases?: FilterRule[];
    required_keywords?: FilterRule[];
  };
  processing?: {
    trim_strategy?: TrimStrategy;
    smart_tolerance_percent?: number;
    max_length?: number;
    content_replacements?: ReplacementRule[];
    url_domain_fixes?: string[];
  };
  formatting?: {
    max_length?: number;
    prefix_video?: string;
  };
  truncation?: {
    max_length?: number;
  };
  thread_handling?: {
    enabled?: boolean;
  };
  nitter_processing?: {
    enabled?: boolean;
  };
  target?: {
    visibility?: Visibility;
  };
}

export interface BatchResult {
  results: Array<{ post_id: string; result: ProcessingResult }>;
  published: number;
  skipped: number;
  failed: number;
  cancelled: boolean;
}
