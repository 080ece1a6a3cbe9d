import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import Database from 'better-sqlite3';

import type { SyndicationPost } from '../../clients/syndication.js';
import { ensureSchema } from '../../db/schema.js';
import { resetDb, setDb, sqliteStateStore } from '../../db/index.js';
import { NetworkError, NotFoundError, ServerError } from '../../errors.js';
import type { ProcessPost } from '../../pipeline/post-processor.js';
import { buildSyndicationPost, createFetchCoordinator } from '../../services/fetch-coordinator.js';
import { ThreadReconstructor, ThreadReconstructorRegistry } from '../../services/thread-reconstructor.js';
import { ThreadTracker } from '../../services/thread-tracker.js';
import type { ScrapeAdapter } from '../../types.js';
import { immediate, makePost, makePublisher, makeSourceConfig, silentLogger } from '../fixtures/posts.js';
import { statusPage } from '../fixtures/pages.js';

const SOURCE = 'newsdesk_twitter';

const syndicationData: SyndicationPost = {
  id: '2001',
  text: 'Council vote delayed',
  photos: [],
  video_thumbnail: null,
  display_name: 'News Desk',
  username: 'newsdesk',
  created_at: '2025-03-01T10:00:00.000Z',
};

describe('buildSyndicationPost', () => {
  it('builds a post from the embed payload', () => {
    expect(buildSyndicationPost('2001', 'NewsDesk', { ...syndicationData, photos: ['https://pbs.example/a.jpg'] }, null)).toEqual({
      id: '2001',
      platform: 'twitter',
      url: 'https://x.com/newsdesk/status/2001',
      text: 'Council vote delayed',
      author: { username: 'newsdesk', display_name: 'News Desk', profile_url: 'https://x.com/newsdesk' },
      media: [{ type: 'image', url: 'https://pbs.example/a.jpg', alt_text: '' }],
      published_at: '2025-03-01T10:00:00.000Z',
      is_repost: false,
      is_reply: false,
      is_quote: false,
      is_thread_post: false,
      has_video: false,
      extensions: { source_tier: 'syndication', scrape_failed: true },
    });
  });

  it('uses the video thumbnail only when there are no photos', () => {
    const thumbnail = 'https://pbs.example/thumb.jpg';
    const withThumb = buildSyndicationPost('2001', 'newsdesk', { ...syndicationData, video_thumbnail: thumbnail }, null);
    expect(withThumb.media).toEqual([{ type: 'image', url: thumbnail, alt_text: 'Video thumbnail' }]);
    expect(withThumb.has_video).toBe(true);

    const withPhoto = buildSyndicationPost(
      '2001',
      'newsdesk',
      { ...syndicationData, photos: ['https://pbs.example/a.jpg'], video_thumbnail: thumbnail },
      null,
    );
    expect(withPhoto.media.map((media) => media.url)).toEqual(['https://pbs.example/a.jpg']);
  });

  it('takes type flags and the repost author from the trigger post', () => {
    const fallback = makePost({
      is_repost: true,
      reposted_by: 'newsdesk',
      author: { username: 'mayor' },
      extensions: { trigger_text: 'RT @mayor: Council vote delayed' },
    });

    const post = buildSyndicationPost('2001', 'newsdesk', { ...syndicationData, username: null }, fallback);

    expect(post.author).toEqual({ username: 'mayor' });
    expect(post.is_repost).toBe(true);
    expect(post.reposted_by).toBe('newsdesk');
    expect(post.extensions.trigger_text).toBe('RT @mayor: Council vote delayed');
  });

  it('stamps the current time when the payload date is unusable', () => {
    vi.useFakeTimers({ toFake: ['Date'] });
    vi.setSystemTime(new Date('2025-03-02T08:00:00.000Z'));
    try {
      expect(buildSyndicationPost('2001', 'newsdesk', { ...syndicationData, created_at: 'soon' }, null).published_at).toBe(
        '2025-03-02T08:00:00.000Z',
      );
    } finally {
      vi.useRealTimers();
    }
  });
});

describe('createFetchCoordinator', () => {
  const processPost = vi.fn<ProcessPost>();
  const fetchSinglePost = vi.fn<ScrapeAdapter['fetchSinglePost']>();
  const fetchThreadPage = vi.fn<ScrapeAdapter['fetchThreadPage']>();
  const fetchSyndication = vi.fn<(postId: string) => Promise<SyndicationPost | null>>();
  let tracker: ThreadTracker;
  let threads: ThreadReconstructorRegistry;

  function build(options: { dryRun?: boolean; noTrimDomains?: string[] } = {}) {
    return createFetchCoordinator({
      logger: silentLogger,
      processPost,
      scrapeAdapter: { fetchSinglePost, fetchThreadPage },
      fetchSyndication,
      threads,
      tracker,
      retry: { maxAttempts: 2, baseDelayMs: 1, sleep: immediate },
      ...options,
    });
  }

  beforeEach(() => {
    const db = new Database(':memory:');
    setDb(db);
    ensureSchema(db);
    tracker = new ThreadTracker(sqliteStateStore, silentLogger);
    threads = new ThreadReconstructorRegistry(
      () =>
        new ThreadReconstructor({
          store: sqliteStateStore,
          publisher: makePublisher(),
          scrapeAdapter: { fetchSinglePost, fetchThreadPage },
          logger: silentLogger,
          retry: { maxAttempts: 2, baseDelayMs: 1 },
          sleep: immediate,
        }),
    );
    processPost.mockResolvedValue({ status: 'published', published_id: 'mst-1' });
  });

  afterEach(() => {
    resetDb();
    processPost.mockReset();
    fetchSinglePost.mockReset();
    fetchThreadPage.mockReset();
    fetchSyndication.mockReset();
  });

  it('publishes the scraped post', async () => {
    const scraped = makePost({ id: '2001' });
    fetchSinglePost.mockResolvedValue(scraped);

    const result = await build({ dryRun: true, noTrimDomains: ['video.example'] }).processTweet({
      sourceConfig: makeSourceConfig(),
      postId: '2001',
      username: 'newsdesk',
    });

    expect(result).toEqual({ status: 'published', published_id: 'mst-1' });
    expect(fetchSinglePost).toHaveBeenCalledWith('newsdesk', '2001');
    expect(fetchSyndication).not.toHaveBeenCalled();
    expect(processPost).toHaveBeenCalledWith(scraped, makeSourceConfig(), {
      dryRun: true,
      inReplyToId: null,
      noTrimDomains: ['video.example'],
    });
  });

  it('threads the next self-reply under the published post', async () => {
    const coordinator = build();
    fetchSinglePost.mockResolvedValueOnce(makePost({ id: '2001' }));
    await coordinator.processTweet({ sourceConfig: makeSourceConfig(), postId: '2001', username: 'newsdesk' });

    fetchSinglePost.mockResolvedValueOnce(makePost({ id: '2002', is_thread_post: true }));
    processPost.mockResolvedValueOnce({ status: 'published', published_id: 'mst-2' });
    await coordinator.processTweet({ sourceConfig: makeSourceConfig(), postId: '2002', username: 'newsdesk' });

    expect(processPost.mock.calls[1][2]).toEqual({ dryRun: undefined, inReplyToId: 'mst-1', noTrimDomains: undefined });
  });

  it('stops at a definitive not-found without trying other tiers', async () => {
    fetchSinglePost.mockRejectedValue(new NotFoundError('Status page failed: HTTP 404'));

    const result = await build().processTweet({
      sourceConfig: makeSourceConfig(),
      postId: '2001',
      username: 'newsdesk',
      fallbackPost: makePost({ id: '2001' }),
    });

    expect(result).toEqual({ status: 'skipped', skipped_reason: 'no_data' });
    expect(fetchSinglePost).toHaveBeenCalledTimes(1);
    expect(fetchSyndication).not.toHaveBeenCalled();
    expect(processPost).not.toHaveBeenCalled();
  });

  it('falls back to the embed api when scraping comes back empty', async () => {
    fetchSinglePost.mockResolvedValue(null);
    fetchSyndication.mockResolvedValue(syndicationData);

    await build().processTweet({ sourceConfig: makeSourceConfig(), postId: '2001', username: 'newsdesk' });

    expect(fetchSinglePost).toHaveBeenCalledTimes(2);
    expect(fetchSyndication).toHaveBeenCalledWith('2001');
    expect(processPost).toHaveBeenCalledWith(
      buildSyndicationPost('2001', 'newsdesk', syndicationData, null),
      makeSourceConfig(),
      { dryRun: undefined, inReplyToId: null, noTrimDomains: undefined },
    );
  });

  it('uses the trigger post when every fetch fails', async () => {
    const fallbackPost = makePost({ id: '2001', text: 'From the trigger' });
    fetchSinglePost.mockRejectedValue(new ServerError('Status page failed: HTTP 503', 503));
    fetchSyndication.mockRejectedValue(new NetworkError('Syndication request failed: timeout'));

    await build().processTweet({ sourceConfig: makeSourceConfig(), postId: '2001', username: 'newsdesk', fallbackPost });

    expect(fetchSinglePost).toHaveBeenCalledTimes(2);
    expect(processPost.mock.calls[0][0]).toEqual({
      ...fallbackPost,
      extensions: { source_tier: 'fallback', force_read_more: true },
    });
  });

  it('skips when nothing is available', async () => {
    fetchSinglePost.mockResolvedValue(null);
    fetchSyndication.mockResolvedValue(null);

    await expect(
      build().processTweet({ sourceConfig: makeSourceConfig(), postId: '2001', username: 'newsdesk' }),
    ).resolves.toEqual({ status: 'skipped', skipped_reason: 'no_data' });
  });

  it('does not start work once cancelled', async () => {
    const result = await build().processTweet({
      sourceConfig: makeSourceConfig(),
      postId: '2001',
      username: 'newsdesk',
      signal: AbortSignal.abort(),
    });

    expect(result).toEqual({ status: 'skipped', skipped_reason: 'cancelled' });
    expect(fetchSinglePost).not.toHaveBeenCalled();
  });

  it('uses the trigger post directly when scraping is disabled', async () => {
    sqliteStateStore.markPublished({ source_id: SOURCE, post_id: '2000', published_id: 'mst-9' });
    const sourceConfig = makeSourceConfig({ nitter_processing: { enabled: false } });
    const fallbackPost = makePost({ id: '2001', is_thread_post: true });

    await build().processTweet({ sourceConfig, postId: '2001', username: 'newsdesk', fallbackPost });

    expect(fetchSinglePost).not.toHaveBeenCalled();
    expect(processPost).toHaveBeenCalledWith(fallbackPost, sourceConfig, {
      dryRun: undefined,
      inReplyToId: 'mst-9',
      noTrimDomains: undefined,
    });
  });

  it('does not scrape platforms without a fetch cascade', async () => {
    const sourceConfig = makeSourceConfig({ id: 'newsdesk_bluesky', platform: 'bluesky' });
    const fallbackPost = makePost({ id: 'at://did:plc:desk/app.bsky.feed.post/3kf2a', platform: 'bluesky' });

    await build().processTweet({ sourceConfig, postId: fallbackPost.id, username: 'newsdesk', fallbackPost });

    expect(fetchSinglePost).not.toHaveBeenCalled();
    expect(fetchSyndication).not.toHaveBeenCalled();
    expect(processPost.mock.calls[0][0]).toBe(fallbackPost);
  });

  it('skips a disabled source without a trigger post', async () => {
    const sourceConfig = makeSourceConfig({ nitter_processing: { enabled: false } });

    await expect(build().processTweet({ sourceConfig, postId: '2001', username: 'newsdesk' })).resolves.toEqual({
      status: 'skipped',
      skipped_reason: 'no_data',
    });
  });

  it('replies to the reconstructed thread parent', async () => {
    sqliteStateStore.markPublished({ source_id: SOURCE, post_id: '1', published_id: 'mst-7' });
    fetchThreadPage.mockResolvedValue(statusPage({ chain: [{ id: '1', username: 'newsdesk', text: 'Part one' }] }));
    fetchSinglePost.mockResolvedValue(makePost({ id: '2' }));
    const sourceConfig = makeSourceConfig({ thread_handling: { enabled: true } });

    await build().processTweet({ sourceConfig, postId: '2', username: 'newsdesk' });

    expect(fetchThreadPage).toHaveBeenCalledWith('newsdesk', '2');
    expect(processPost.mock.calls[0][2]).toEqual({ dryRun: undefined, inReplyToId: 'mst-7', noTrimDomains: undefined });
  });

  it('reports a pipeline exception as failed', async () => {
    fetchSinglePost.mockResolvedValue(makePost({ id: '2001' }));
    processPost.mockRejectedValue(new Error('disk full'));

    await expect(
      build().processTweet({ sourceConfig: makeSourceConfig(), postId: '2001', username: 'newsdesk' }),
    ).resolves.toEqual({ status: 'failed', error: 'disk full' });
  });
});
