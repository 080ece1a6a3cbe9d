import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import Database from 'better-sqlite3';

import { ensureSchema } from '../../db/schema.js';
import { resetDb, setDb, sqliteStateStore } from '../../db/index.js';
import { StateError } from '../../errors.js';
import { ThreadTracker } from '../../services/thread-tracker.js';
import { makePost, silentLogger } from '../fixtures/posts.js';

const SOURCE = 'newsdesk_twitter';

describe('ThreadTracker', () => {
  beforeEach(() => {
    vi.useFakeTimers({ toFake: ['Date'] });
    vi.setSystemTime(new Date('2025-03-01T10:00:00.000Z'));
    const db = new Database(':memory:');
    setDb(db);
    ensureSchema(db);
  });

  afterEach(() => {
    resetDb();
    vi.useRealTimers();
  });

  it('ignores posts that are not thread posts', () => {
    const tracker = new ThreadTracker(sqliteStateStore, silentLogger);
    tracker.remember(SOURCE, makePost(), 'mst-1');
    expect(tracker.resolveParent(SOURCE, makePost())).toBeNull();
  });

  it('replies to the last post remembered for the author', () => {
    const tracker = new ThreadTracker(sqliteStateStore, silentLogger);
    tracker.remember(SOURCE, makePost({ author: { username: 'NewsDesk' } }), 'mst-1');
    tracker.remember(SOURCE, makePost(), 'mst-2');
    tracker.remember(SOURCE, makePost({ author: { username: 'mayor' } }), 'mst-3');

    expect(tracker.resolveParent(SOURCE, makePost({ is_thread_post: true }))).toBe('mst-2');
    expect(tracker.resolveParent('other_source', makePost({ is_thread_post: true }))).toBeNull();
  });

  it('falls back to the latest published post within the ttl', () => {
    sqliteStateStore.markPublished({ source_id: SOURCE, post_id: '900', published_id: 'mst-9' });
    vi.setSystemTime(new Date('2025-03-01T12:00:00.000Z'));
    const tracker = new ThreadTracker(sqliteStateStore, silentLogger, { ttlHours: 3 });

    expect(tracker.resolveParent(SOURCE, makePost({ is_thread_post: true }))).toBe('mst-9');
  });

  it('starts a new thread when the stored parent is too old', () => {
    sqliteStateStore.markPublished({ source_id: SOURCE, post_id: '900', published_id: 'mst-9' });
    vi.setSystemTime(new Date('2025-03-02T11:00:00.000Z'));
    const tracker = new ThreadTracker(sqliteStateStore, silentLogger);

    expect(tracker.resolveParent(SOURCE, makePost({ is_thread_post: true }))).toBeNull();
  });

  it('starts a new thread when the store cannot be read', () => {
    const store = {
      ...sqliteStateStore,
      findRecentThreadParent: vi.fn(() => {
        throw new StateError('findRecentThreadParent failed: database is locked');
      }),
    };
    const tracker = new ThreadTracker(store, silentLogger);

    expect(tracker.resolveParent(SOURCE, makePost({ is_thread_post: true }))).toBeNull();
    expect(store.findRecentThreadParent).toHaveBeenCalledWith(SOURCE, 24);
  });

  it('forgets cached parents on clear', () => {
    const tracker = new ThreadTracker(sqliteStateStore, silentLogger);
    tracker.remember(SOURCE, makePost(), 'mst-1');
    tracker.clear();

    expect(tracker.resolveParent(SOURCE, makePost({ is_thread_post: true }))).toBeNull();
  });
});
