import { createHash } from 'crypto';

import { errorMessage } from '../errors.js';
import type { Logger } from '../logger.js';
import type { EditBufferEntry, StateStore } from '../types.js';
import { compareIds } from '../parsers/post-id.js';

export const EDIT_WINDOW_SECONDS = 3600;
export const SIMILARITY_THRESHOLD = 0.8;
export const BUFFER_RETENTION_HOURS = 2;

export type EditAction = 'publish_new' | 'update_existing' | 'skip_older_version';

export interface EditCheckResult {
  action: EditAction;
  original_post_id: string | null;
  published_id: string | null;
  similarity: number;
  /** Older unpublished version that this post replaces. */
  superseded_post_id?: string;
}

export interface EditDetectorOptions {
  editWindowSeconds?: number;
  similarityThreshold?: number;
  retentionHours?: number;
}

export interface EditCheckInput {
  sourceId: string;
  postId: string;
  username: string;
  text: string;
}

interface SimilarMatch {
  entry: EditBufferEntry;
  similarity: number;
}

const NO_MATCH: EditCheckResult = { action: 'publish_new', original_post_id: null, published_id: null, similarity: 0 };

export function normalizeForComparison(text: string): string {
  if (!text) return '';
  return text
    .toLowerCase()
    .replace(/https?:\/\/\S+/g, '')
    .replace(/@\w+/g, '')
    .replace(/#\w+/g, '')
    .replace(/[….]{2,}$/, '')
    .replace(/[.!?,;:]+$/, '')
    .replace(/\s+/g, ' ')
    .trim();
}

export function normalizeUsername(username: string): string {
  return username.trim().replace(/^@/, '').toLowerCase();
}

export function hashText(normalized: string): string {
  return createHash('sha256').update(normalized).digest('hex');
}

// Words are compared without surrounding punctuation: "downtown," matches "downtown".
function wordSet(text: string): Set<string> {
  return new Set(
    text
      .split(/\s+/)
      .map((word) => word.replace(/^[^\p{L}\p{N}]+|[^\p{L}\p{N}]+$/gu, ''))
      .filter((word) => word.length >= 2),
  );
}

function prefixRatio(a: string, b: string): number {
  const shorter = Math.min(a.length, b.length);
  if (shorter === 0) return 0;
  let matching = 0;
  while (matching < shorter && a[matching] === b[matching]) matching++;
  return matching / shorter;
}

/**
 * Composite similarity of two normalized texts in 0..1.
 * Word overlap (the larger of Jaccard and containment) weighs 0.85, shared prefix 0.15.
 */
export function calculateSimilarity(a: string, b: string): number {
  if (a === b) return 1;
  if (!a || !b) return 0;

  const wordsA = wordSet(a);
  const wordsB = wordSet(b);
  if (wordsA.size === 0 || wordsB.size === 0) return 0;

  let intersection = 0;
  for (const word of wordsA) {
    if (wordsB.has(word)) intersection++;
  }
  const union = wordsA.size + wordsB.size - intersection;
  const jaccard = intersection / union;
  const containment = intersection / Math.min(wordsA.size, wordsB.size);

  return Math.max(jaccard, containment) * 0.85 + prefixRatio(a, b) * 0.15;
}

export class EditDetector {
  private readonly editWindowSeconds: number;
  private readonly similarityThreshold: number;
  private readonly retentionHours: number;

  constructor(
    private readonly store: StateStore,
    private readonly logger: Logger,
    options: EditDetectorOptions = {},
  ) {
    this.editWindowSeconds = options.editWindowSeconds ?? EDIT_WINDOW_SECONDS;
    this.similarityThreshold = options.similarityThreshold ?? SIMILARITY_THRESHOLD;
    this.retentionHours = options.retentionHours ?? BUFFER_RETENTION_HOURS;
  }

  /**
   * Classify an incoming post as new, an edit of a published post, or a stale duplicate.
   * A store failure degrades to publish_new.
   */
  checkForEdit(input: EditCheckInput): EditCheckResult {
    const username = normalizeUsername(input.username);
    const normalized = normalizeForComparison(input.text);
    if (!normalized) return NO_MATCH;

    let match: SimilarMatch | null;
    try {
      match = this.findSimilar(input.sourceId, input.postId, username, normalized);
    } catch (err) {
      this.logger.warn(
        { sourceId: input.sourceId, postId: input.postId, err: errorMessage(err) },
        'edit detection unavailable, treating post as new (possible duplicate)',
      );
      return NO_MATCH;
    }

    if (!match) return NO_MATCH;

    const { entry, similarity } = match;
    const isNewer = compareIds(input.postId, entry.post_id) > 0;
    const base = { original_post_id: entry.post_id, published_id: entry.published_id, similarity };

    if (entry.published_id) {
      return { ...base, action: isNewer ? 'update_existing' : 'skip_older_version' };
    }

    if (!isNewer) return { ...base, action: 'skip_older_version' };

    try {
      this.store.markEditSuperseded(entry.source_id, entry.post_id);
    } catch (err) {
      this.logger.warn({ postId: entry.post_id, err: errorMessage(err) }, 'failed to mark buffered post as superseded');
    }
    return { ...base, action: 'publish_new', superseded_post_id: entry.post_id };
  }

  private findSimilar(sourceId: string, postId: string, username: string, normalized: string): SimilarMatch | null {
    const exact = this.store.findByTextHash(username, hashText(normalized), this.editWindowSeconds);
    if (exact && !(exact.source_id === sourceId && exact.post_id === postId)) {
      return { entry: exact, similarity: 1 };
    }

    let best: SimilarMatch | null = null;
    for (const entry of this.store.findRecentBufferEntries(username, this.editWindowSeconds)) {
      if (entry.source_id === sourceId && entry.post_id === postId) continue;
      const similarity = calculateSimilarity(normalized, entry.text_normalized);
      if (similarity >= this.similarityThreshold && similarity > (best?.similarity ?? 0)) {
        best = { entry, similarity };
      }
    }
    return best;
  }

  addToBuffer(input: EditCheckInput & { publishedId?: string | null }): void {
    const normalized = normalizeForComparison(input.text);
    this.store.addToEditBuffer({
      source_id: input.sourceId,
      post_id: input.postId,
      username: normalizeUsername(input.username),
      text_normalized: normalized,
      text_hash: hashText(normalized),
      published_id: input.publishedId ?? null,
    });
  }

  /** Fill in the status id of a post buffered before it was published. */
  updateBufferPublishedId(sourceId: string, postId: string, publishedId: string): void {
    this.store.updateEditBufferPublishedId(sourceId, postId, publishedId);
  }

  cleanup(retentionHours: number = this.retentionHours): number {
    const removed = this.store.cleanupEditBuffer(retentionHours);
    if (removed > 0) {
      this.logger.info({ removed, retentionHours }, 'edit buffer cleanup');
    }
    return removed;
  }
}
