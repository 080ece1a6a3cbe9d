import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

import {
  fetchSyndicationPost,
  parseSyndicationResponse,
  syndicationToken,
} from '../../clients/syndication.js';
import { NetworkError, NotFoundError, ServerError } from '../../errors.js';

const BASE = 'https://embed.example';

describe('syndicationToken', () => {
  it('is deterministic and free of zeros and dots', () => {
    const token = syndicationToken('1893456789012345678');
    expect(token).toBe(syndicationToken('1893456789012345678'));
    expect(token).toMatch(/^[1-9a-z]+$/);
  });
});

describe('parseSyndicationResponse', () => {
  it('reads text, author and photos', () => {
    const body = {
      id_str: '2001',
      text: 'Breaking: fire downtown',
      created_at: '2025-03-01T10:00:00.000Z',
      user: { name: 'News Desk', screen_name: 'newsdesk' },
      mediaDetails: [
        { type: 'photo', media_url_https: 'https://cdn.example/a.jpg' },
        { type: 'video', media_url_https: 'https://cdn.example/v.jpg' },
      ],
    };

    expect(parseSyndicationResponse(body, '2001')).toEqual({
      id: '2001',
      text: 'Breaking: fire downtown',
      photos: ['https://cdn.example/a.jpg'],
      video_thumbnail: 'https://cdn.example/v.jpg',
      display_name: 'News Desk',
      username: 'newsdesk',
      created_at: '2025-03-01T10:00:00.000Z',
    });
  });

  it('falls back to the photos list and the video poster', () => {
    const body = {
      text: 'Gallery',
      photos: [{ url: 'https://cdn.example/p.jpg' }, {}],
      video: { poster: 'https://cdn.example/poster.jpg' },
    };

    expect(parseSyndicationResponse(body, '7')).toMatchObject({
      id: '7',
      photos: ['https://cdn.example/p.jpg'],
      video_thumbnail: 'https://cdn.example/poster.jpg',
      username: null,
    });
  });

  it('returns null for bodies without a post', () => {
    expect(parseSyndicationResponse({}, '1')).toBeNull();
    expect(parseSyndicationResponse({ __typename: 'TweetTombstone' }, '1')).toBeNull();
    expect(parseSyndicationResponse('nope', '1')).toBeNull();
  });
});

describe('fetchSyndicationPost', () => {
  const fetchMock = vi.fn<typeof fetch>();

  beforeEach(() => {
    vi.stubGlobal('fetch', fetchMock);
  });

  afterEach(() => {
    fetchMock.mockReset();
    vi.unstubAllGlobals();
  });

  it('requests the id with its token', async () => {
    fetchMock.mockResolvedValueOnce(new Response(JSON.stringify({ id_str: '2001', text: 'Hi' })));

    const post = await fetchSyndicationPost('2001', `${BASE}/`);

    expect(post?.text).toBe('Hi');
    expect(fetchMock.mock.calls[0][0]).toBe(`${BASE}/tweet-result?id=2001&token=${syndicationToken('2001')}`);
  });

  it('returns null for an empty body', async () => {
    fetchMock.mockResolvedValueOnce(new Response(''));
    await expect(fetchSyndicationPost('2001', BASE)).resolves.toBeNull();
  });

  it('throws NotFoundError on 404', async () => {
    fetchMock.mockResolvedValueOnce(new Response('', { status: 404 }));
    await expect(fetchSyndicationPost('2001', BASE)).rejects.toBeInstanceOf(NotFoundError);
  });

  it('throws ServerError on 5xx', async () => {
    fetchMock.mockResolvedValueOnce(new Response('', { status: 502 }));
    await expect(fetchSyndicationPost('2001', BASE)).rejects.toThrow(
      new ServerError('Syndication request for 2001 failed: HTTP 502', 502),
    );
  });

  it('throws NetworkError for malformed JSON and transport failures', async () => {
    fetchMock.mockResolvedValueOnce(new Response('<html>'));
    await expect(fetchSyndicationPost('2001', BASE)).rejects.toBeInstanceOf(NetworkError);

    fetchMock.mockRejectedValueOnce(new Error('ECONNRESET'));
    await expect(fetchSyndicationPost('2001', BASE)).rejects.toThrow(
      'Syndication request for 2001 failed: ECONNRESET',
    );
  });
});
