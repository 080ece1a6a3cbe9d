import { z } from 'zod';

const booleanFlag = z.enum(['true', 'false', '1', '0']).default('false').transform((value) => value === 'true' || value === '1');

const configSchema = z.object({
  FEDIRELAY_DB_PATH: z.string().optional(),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  LOG_PRETTY: booleanFlag,
  SCRAPE_BASE_URL: z.string().url().default('https://nitter.net'),
  SYNDICATION_BASE_URL: z.string().url().default('https://cdn.syndication.twimg.com'),
  MASTODON_INSTANCE_URL: z.string().url().optional(),
  MASTODON_ACCESS_TOKEN: z.string().min(1).optional(),
  EDIT_SIMILARITY_THRESHOLD: z.coerce.number().min(0).max(1).default(0.8),
  EDIT_WINDOW_SECONDS: z.coerce.number().int().positive().default(3600),
  EDIT_BUFFER_RETENTION_HOURS: z.coerce.number().positive().default(2),
  FETCH_RETRY_ATTEMPTS: z.coerce.number().int().min(1).max(10).default(3),
  FETCH_RETRY_BASE_DELAY_MS: z.coerce.number().int().min(0).default(1000),
  THREAD_PARENT_TTL_HOURS: z.coerce.number().positive().default(24),
  DRY_RUN: booleanFlag,
});

export type Config = z.infer<typeof configSchema>;

let _config: Config | null = null;

export function loadConfig(): Config {
  if (_config) return _config;

  const result = configSchema.safeParse(process.env);
  if (!result.success) {
    const missing = result.error.issues.map(i => `  ${i.path.join('.')}: ${i.message}`).join('\n');
    throw new Error(`Missing or invalid environment variables:\n${missing}`);
  }

  _config = result.data;
  return _config;
}
