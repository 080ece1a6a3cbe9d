import { mkdirSync } from 'fs';
import Database from 'better-sqlite3';
import { homedir } from 'os';
import { dirname, join } from 'path';

import { loadConfig } from '../config.js';
import { StateError, errorMessage } from '../errors.js';
import type {
  ActivityDetails,
  EditBufferEntry,
  EditBufferInput,
  MarkPublishedInput,
  PublishedRecord,
  StateStore,
} from '../types.js';
import { ensureSchema } from './schema.js';

let _db: Database.Database | null = null;

const RECENT_BUFFER_LIMIT = 10;

type PublishedRow = {
  source_id: string;
  post_id: string;
  post_url: string | null;
  mastodon_status_id: string;
  platform_uri: string | null;
  published_at: string;
};

type BufferRow = {
  source_id: string;
  post_id: string;
  username: string;
  text_normalized: string;
  text_hash: string;
  mastodon_id: string | null;
  created_at: string;
};

export function getDb(): Database.Database {
  if (_db) return _db;

  const config = loadConfig();
  const dbPath = config.FEDIRELAY_DB_PATH ?? join(homedir(), '.fedirelay', 'state.db');
  mkdirSync(dirname(dbPath), { recursive: true });

  _db = new Database(dbPath);
  _db.pragma('journal_mode = WAL');
  _db.pragma('foreign_keys = ON');
  _db.pragma('synchronous = NORMAL');
  _db.pragma('busy_timeout = 5000');
  ensureSchema(_db);

  return _db;
}

export function setDb(db: Database.Database): void {
  _db = db;
}

export function resetDb(): void {
  if (_db) {
    _db.close();
    _db = null;
  }
}

function nowIso(): string {
  return new Date().toISOString();
}

function isoSecondsAgo(seconds: number): string {
  return new Date(Date.now() - seconds * 1000).toISOString();
}

/**
 * Run a store operation, rethrowing SQLite failures as StateError.
 */
function withStateErrorContext<T>(context: string, fn: () => T): T {
  try {
    return fn();
  } catch (err) {
    throw new StateError(`State store ${context} failed: ${errorMessage(err)}`, { cause: err });
  }
}

function toPublishedRecord(row: PublishedRow): PublishedRecord {
  return {
    source_id: row.source_id,
    post_id: row.post_id,
    post_url: row.post_url,
    published_id: row.mastodon_status_id,
    platform_uri: row.platform_uri,
    published_at: row.published_at,
  };
}

function toBufferEntry(row: BufferRow): EditBufferEntry {
  return {
    source_id: row.source_id,
    post_id: row.post_id,
    username: row.username,
    text_normalized: row.text_normalized,
    text_hash: row.text_hash,
    published_id: row.mastodon_id,
    created_at: row.created_at,
  };
}

// --- Published posts ---

export function isPublished(sourceId: string, postId: string): boolean {
  return withStateErrorContext('isPublished', () => {
    const row = getDb()
      .prepare<[string, string], { found: number }>(
        'SELECT 1 AS found FROM published_posts WHERE source_id = ? AND post_id = ? LIMIT 1',
      )
      .get(sourceId, postId);
    return row !== undefined;
  });
}

export function markPublished(input: MarkPublishedInput): void {
  withStateErrorContext('markPublished', () => {
    getDb()
      .prepare(`
        INSERT INTO published_posts (source_id, post_id, post_url, mastodon_status_id, platform_uri, published_at)
        VALUES (@source_id, @post_id, @post_url, @published_id, @platform_uri, @published_at)
        ON CONFLICT (source_id, post_id) DO UPDATE SET
          post_url = COALESCE(excluded.post_url, published_posts.post_url),
          mastodon_status_id = COALESCE(excluded.mastodon_status_id, published_posts.mastodon_status_id),
          platform_uri = COALESCE(excluded.platform_uri, published_posts.platform_uri)
      `)
      .run({
        source_id: input.source_id,
        post_id: input.post_id,
        post_url: input.post_url ?? null,
        published_id: input.published_id,
        platform_uri: input.platform_uri ?? null,
        published_at: nowIso(),
      });
  });
}

/**
 * Point an existing status at the edited source post that replaced it.
 */
export function markUpdated(publishedId: string, newPostId: string, newPostUrl?: string | null): void {
  withStateErrorContext('markUpdated', () => {
    getDb()
      .prepare(`
        UPDATE published_posts
        SET post_id = @post_id, post_url = COALESCE(@post_url, post_url), updated_at = @updated_at
        WHERE mastodon_status_id = @published_id
      `)
      .run({
        post_id: newPostId,
        post_url: newPostUrl ?? null,
        updated_at: nowIso(),
        published_id: publishedId,
      });
  });
}

export function findByPostId(sourceId: string, postId: string): PublishedRecord | null {
  return withStateErrorContext('findByPostId', () => {
    const row = getDb()
      .prepare<[string, string], PublishedRow>(`
        SELECT source_id, post_id, post_url, mastodon_status_id, platform_uri, published_at
        FROM published_posts
        WHERE source_id = ? AND post_id = ? AND mastodon_status_id IS NOT NULL
      `)
      .get(sourceId, postId);
    return row ? toPublishedRecord(row) : null;
  });
}

export function findRecentThreadParent(sourceId: string, withinHours: number): PublishedRecord | null {
  return withStateErrorContext('findRecentThreadParent', () => {
    const row = getDb()
      .prepare<[string, string], PublishedRow>(`
        SELECT source_id, post_id, post_url, mastodon_status_id, platform_uri, published_at
        FROM published_posts
        WHERE source_id = ? AND published_at > ? AND mastodon_status_id IS NOT NULL
        ORDER BY published_at DESC, id DESC
        LIMIT 1
      `)
      .get(sourceId, isoSecondsAgo(withinHours * 3600));
    return row ? toPublishedRecord(row) : null;
  });
}

// --- Activity log ---

function logActivity(action: string, sourceId: string, postId: string, details?: ActivityDetails): void {
  withStateErrorContext('logActivity', () => {
    getDb()
      .prepare(`
        INSERT INTO activity_log (source_id, post_id, action, details, created_at)
        VALUES (@source_id, @post_id, @action, @details, @created_at)
      `)
      .run({
        source_id: sourceId,
        post_id: postId,
        action,
        details: details ? JSON.stringify(details) : null,
        created_at: nowIso(),
      });
  });
}

export function logSkip(sourceId: string, postId: string, reason: string, details: ActivityDetails = {}): void {
  logActivity('skip', sourceId, postId, { reason, ...details });
}

export function logPublish(sourceId: string, postId: string, details?: ActivityDetails): void {
  logActivity('publish', sourceId, postId, details);
}

export function logUpdate(sourceId: string, postId: string, details?: ActivityDetails): void {
  logActivity('update', sourceId, postId, details);
}

export function logError(sourceId: string, postId: string, message: string): void {
  logActivity('error', sourceId, postId, { message });
}

export function getActivity(sourceId: string): Array<{ post_id: string | null; action: string; details: string | null }> {
  return withStateErrorContext('getActivity', () =>
    getDb()
      .prepare<[string], { post_id: string | null; action: string; details: string | null }>(
        'SELECT post_id, action, details FROM activity_log WHERE source_id = ? ORDER BY id',
      )
      .all(sourceId),
  );
}

// --- Edit detection buffer ---

export function addToEditBuffer(input: EditBufferInput): void {
  withStateErrorContext('addToEditBuffer', () => {
    getDb()
      .prepare(`
        INSERT INTO edit_detection_buffer
          (source_id, post_id, username, text_normalized, text_hash, mastodon_id, created_at)
        VALUES (@source_id, @post_id, @username, @text_normalized, @text_hash, @mastodon_id, @created_at)
        ON CONFLICT (source_id, post_id) DO UPDATE SET
          text_normalized = excluded.text_normalized,
          text_hash = excluded.text_hash,
          mastodon_id = COALESCE(excluded.mastodon_id, edit_detection_buffer.mastodon_id)
      `)
      .run({
        source_id: input.source_id,
        post_id: input.post_id,
        username: input.username,
        text_normalized: input.text_normalized,
        text_hash: input.text_hash,
        mastodon_id: input.published_id ?? null,
        created_at: nowIso(),
      });
  });
}

export function updateEditBufferPublishedId(sourceId: string, postId: string, publishedId: string): void {
  withStateErrorContext('updateEditBufferPublishedId', () => {
    getDb()
      .prepare('UPDATE edit_detection_buffer SET mastodon_id = ? WHERE source_id = ? AND post_id = ?')
      .run(publishedId, sourceId, postId);
  });
}

export function findByTextHash(username: string, textHash: string, withinSeconds: number): EditBufferEntry | null {
  return withStateErrorContext('findByTextHash', () => {
    const row = getDb()
      .prepare<[string, string, string], BufferRow>(`
        SELECT source_id, post_id, username, text_normalized, text_hash, mastodon_id, created_at
        FROM edit_detection_buffer
        WHERE username = ? AND text_hash = ? AND created_at > ?
        ORDER BY created_at DESC, id DESC
        LIMIT 1
      `)
      .get(username, textHash, isoSecondsAgo(withinSeconds));
    return row ? toBufferEntry(row) : null;
  });
}

export function findRecentBufferEntries(
  username: string,
  withinSeconds: number,
  limit = RECENT_BUFFER_LIMIT,
): EditBufferEntry[] {
  return withStateErrorContext('findRecentBufferEntries', () =>
    getDb()
      .prepare<[string, string, number], BufferRow>(`
        SELECT source_id, post_id, username, text_normalized, text_hash, mastodon_id, created_at
        FROM edit_detection_buffer
        WHERE username = ? AND created_at > ?
        ORDER BY created_at DESC, id DESC
        LIMIT ?
      `)
      .all(username, isoSecondsAgo(withinSeconds), limit)
      .map(toBufferEntry),
  );
}

/**
 * Returns the number of rows removed.
 */
export function cleanupEditBuffer(retentionHours: number): number {
  return withStateErrorContext('cleanupEditBuffer', () => {
    const result = getDb()
      .prepare('DELETE FROM edit_detection_buffer WHERE created_at < ?')
      .run(isoSecondsAgo(retentionHours * 3600));
    return result.changes;
  });
}

export function markEditSuperseded(sourceId: string, postId: string): void {
  withStateErrorContext('markEditSuperseded', () => {
    getDb().prepare('DELETE FROM edit_detection_buffer WHERE source_id = ? AND post_id = ?').run(sourceId, postId);
  });
}

export const sqliteStateStore: StateStore = {
  isPublished,
  markPublished,
  markUpdated,
  findByPostId,
  findRecentThreadParent,
  logSkip,
  logPublish,
  logUpdate,
  logError,
  findByTextHash,
  findRecentBufferEntries,
  addToEditBuffer,
  updateEditBufferPublishedId,
  cleanupEditBuffer,
  markEditSuperseded,
};
