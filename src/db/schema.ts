import type Database from 'better-sqlite3';

export const ACTIVITY_ACTIONS = ['publish', 'update', 'skip', 'error'] as const;

function tableColumns(db: Database.Database, table: string): string[] {
  const rows = db.prepare<[], { name: string }>(`PRAGMA table_info(${table})`).all();
  return rows.map((row) => row.name);
}

function ensurePublishedPostColumns(db: Database.Database): void {
  const columns = new Set(tableColumns(db, 'published_posts'));
  const columnDefinitions: Array<[string, string]> = [
    ['platform_uri', 'TEXT'],
    ['updated_at', 'TEXT'],
  ];

  for (const [name, definition] of columnDefinitions) {
    if (!columns.has(name)) {
      db.exec(`ALTER TABLE published_posts ADD COLUMN ${name} ${definition}`);
    }
  }
}

function ensureActivityTrigger(db: Database.Database): void {
  const actionList = ACTIVITY_ACTIONS.map((value) => `'${value}'`).join(', ');

  db.exec(`
    DROP TRIGGER IF EXISTS activity_log_validate_insert;

    CREATE TRIGGER activity_log_validate_insert BEFORE INSERT ON activity_log
    WHEN new.action NOT IN (${actionList})
    BEGIN
      SELECT RAISE(ABORT, 'invalid activity_log action');
    END;
  `);
}

/**
 * Create all tables, indexes, and triggers if they don't exist.
 * Safe to call multiple times.
 */
export function ensureSchema(db: Database.Database): void {
  db.exec(`
    -- One row per published source post; the dedup key is (source_id, post_id)
    CREATE TABLE IF NOT EXISTS published_posts (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      source_id TEXT NOT NULL,
      post_id TEXT NOT NULL,
      post_url TEXT,
      mastodon_status_id TEXT,
      platform_uri TEXT,
      published_at TEXT NOT NULL,
      updated_at TEXT,
      UNIQUE (source_id, post_id)
    );

    -- Recently seen posts, compared by normalized text to recognise edits
    CREATE TABLE IF NOT EXISTS edit_detection_buffer (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      source_id TEXT NOT NULL,
      post_id TEXT NOT NULL,
      username TEXT NOT NULL,
      text_normalized TEXT NOT NULL,
      text_hash TEXT NOT NULL,
      mastodon_id TEXT,
      created_at TEXT NOT NULL,
      UNIQUE (source_id, post_id)
    );

    CREATE TABLE IF NOT EXISTS activity_log (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      source_id TEXT,
      post_id TEXT,
      action TEXT NOT NULL,
      details TEXT,
      created_at TEXT NOT NULL
    );

    CREATE UNIQUE INDEX IF NOT EXISTS uq_published_mastodon_status
      ON published_posts(mastodon_status_id) WHERE mastodon_status_id IS NOT NULL;
    CREATE INDEX IF NOT EXISTS idx_published_source_time ON published_posts(source_id, published_at DESC);
    CREATE INDEX IF NOT EXISTS idx_edit_buffer_user_time ON edit_detection_buffer(username, created_at DESC);
    CREATE INDEX IF NOT EXISTS idx_edit_buffer_user_hash ON edit_detection_buffer(username, text_hash);
    CREATE INDEX IF NOT EXISTS idx_edit_buffer_created ON edit_detection_buffer(created_at);
    CREATE INDEX IF NOT EXISTS idx_activity_source_time ON activity_log(source_id, created_at DESC);
  `);

  ensurePublishedPostColumns(db);
  ensureActivityTrigger(db);
}
