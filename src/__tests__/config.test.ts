import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

const savedEnv = { ...process.env };

const CONFIG_KEYS = [
  'FEDIRELAY_DB_PATH',
  'LOG_LEVEL',
  'LOG_PRETTY',
  'SCRAPE_BASE_URL',
  'SYNDICATION_BASE_URL',
  'MASTODON_INSTANCE_URL',
  'MASTODON_ACCESS_TOKEN',
  'EDIT_SIMILARITY_THRESHOLD',
  'EDIT_WINDOW_SECONDS',
  'EDIT_BUFFER_RETENTION_HOURS',
  'FETCH_RETRY_ATTEMPTS',
  'FETCH_RETRY_BASE_DELAY_MS',
  'THREAD_PARENT_TTL_HOURS',
  'DRY_RUN',
];

describe('loadConfig', () => {
  beforeEach(() => {
    vi.resetModules();
    for (const key of CONFIG_KEYS) delete process.env[key];
  });

  afterEach(() => {
    process.env = { ...savedEnv };
  });

  async function getLoadConfig() {
    const mod = await import('../config.js');
    return mod.loadConfig;
  }

  it('applies defaults when nothing is set', async () => {
    const loadConfig = await getLoadConfig();
    expect(loadConfig()).toEqual({
      LOG_LEVEL: 'info',
      LOG_PRETTY: false,
      SCRAPE_BASE_URL: 'https://nitter.net',
      SYNDICATION_BASE_URL: 'https://cdn.syndication.twimg.com',
      EDIT_SIMILARITY_THRESHOLD: 0.8,
      EDIT_WINDOW_SECONDS: 3600,
      EDIT_BUFFER_RETENTION_HOURS: 2,
      FETCH_RETRY_ATTEMPTS: 3,
      FETCH_RETRY_BASE_DELAY_MS: 1000,
      THREAD_PARENT_TTL_HOURS: 24,
      DRY_RUN: false,
    });
  });

  it('reads Mastodon credentials', async () => {
    process.env.MASTODON_INSTANCE_URL = 'https://mastodon.example';
    process.env.MASTODON_ACCESS_TOKEN = 'test-token';
    const loadConfig = await getLoadConfig();
    const config = loadConfig();
    expect(config.MASTODON_INSTANCE_URL).toBe('https://mastodon.example');
    expect(config.MASTODON_ACCESS_TOKEN).toBe('test-token');
  });

  it('coerces numeric thresholds', async () => {
    process.env.EDIT_SIMILARITY_THRESHOLD = '0.75';
    process.env.FETCH_RETRY_ATTEMPTS = '5';
    const loadConfig = await getLoadConfig();
    const config = loadConfig();
    expect(config.EDIT_SIMILARITY_THRESHOLD).toBe(0.75);
    expect(config.FETCH_RETRY_ATTEMPTS).toBe(5);
  });

  it('parses boolean flags', async () => {
    process.env.DRY_RUN = '1';
    process.env.LOG_PRETTY = 'true';
    const loadConfig = await getLoadConfig();
    const config = loadConfig();
    expect(config.DRY_RUN).toBe(true);
    expect(config.LOG_PRETTY).toBe(true);
  });

  it('throws when a threshold is out of range', async () => {
    process.env.EDIT_SIMILARITY_THRESHOLD = '1.5';
    const loadConfig = await getLoadConfig();
    expect(() => loadConfig()).toThrow(
      'Missing or invalid environment variables:\n  EDIT_SIMILARITY_THRESHOLD: Number must be less than or equal to 1',
    );
  });

  it('throws for an invalid instance url', async () => {
    process.env.MASTODON_INSTANCE_URL = 'not a url';
    const loadConfig = await getLoadConfig();
    expect(() => loadConfig()).toThrow('MASTODON_INSTANCE_URL: Invalid url');
  });

  it('caches the first result', async () => {
    const loadConfig = await getLoadConfig();
    const first = loadConfig();
    process.env.LOG_LEVEL = 'debug';
    expect(loadConfig()).toBe(first);
    expect(loadConfig().LOG_LEVEL).toBe('info');
  });
});
