import { z } from 'zod';

import { loadConfig } from '../config.js';
import { NetworkError, errorMessage, httpError } from '../errors.js';

const USER_AGENT = 'Mozilla/5.0 (compatible; Googlebot/2.1; +http://www.google.com/bot.html)';
const REQUEST_TIMEOUT_MS = 15_000;

const mediaDetailSchema = z.object({
  type: z.string(),
  media_url_https: z.string().optional(),
});

const syndicationResponseSchema = z.object({
  id_str: z.string().optional(),
  text: z.string().optional(),
  created_at: z.string().optional(),
  user: z.object({ name: z.string().optional(), screen_name: z.string().optional() }).optional(),
  mediaDetails: z.array(mediaDetailSchema).optional(),
  photos: z.array(z.object({ url: z.string().optional() })).optional(),
  video: z.object({ poster: z.string().optional() }).optional(),
});

export interface SyndicationPost {
  id: string;
  text: string;
  photos: string[];
  video_thumbnail: string | null;
  display_name: string | null;
  username: string | null;
  created_at: string | null;
}

/**
 * Token the public embed endpoint expects alongside the id.
 */
export function syndicationToken(postId: string): string {
  return ((Number(postId) / 1e15) * Math.PI).toString(36).replace(/(0+|\.)/g, '');
}

export function parseSyndicationResponse(body: unknown, postId: string): SyndicationPost | null {
  const parsed = syndicationResponseSchema.safeParse(body);
  if (!parsed.success) return null;

  const data = parsed.data;
  if (!data.id_str && !data.text) return null;

  const details = data.mediaDetails ?? [];
  let photos = details.flatMap((media) => (media.type === 'photo' && media.media_url_https ? [media.media_url_https] : []));
  if (photos.length === 0) {
    photos = (data.photos ?? []).flatMap((photo) => (photo.url ? [photo.url] : []));
  }

  const videoThumbnail =
    data.video?.poster ?? details.find((media) => media.type === 'video')?.media_url_https ?? null;

  return {
    id: data.id_str ?? postId,
    text: data.text ?? '',
    photos,
    video_thumbnail: videoThumbnail,
    display_name: data.user?.name ?? null,
    username: data.user?.screen_name ?? null,
    created_at: data.created_at ?? null,
  };
}

/**
 * Fetch a post from the token-less embed API. Returns null when the response
 * carries no usable post; throws NotFoundError on 404.
 */
export async function fetchSyndicationPost(postId: string, baseUrl?: string): Promise<SyndicationPost | null> {
  const base = baseUrl ?? loadConfig().SYNDICATION_BASE_URL;
  const url = `${base.replace(/\/$/, '')}/tweet-result?id=${encodeURIComponent(postId)}&token=${syndicationToken(postId)}`;

  let response: Response;
  try {
    response = await fetch(url, {
      headers: { Accept: 'application/json', 'User-Agent': USER_AGENT },
      signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS),
    });
  } catch (err) {
    throw new NetworkError(`Syndication request for ${postId} failed: ${errorMessage(err)}`, { cause: err });
  }

  if (!response.ok) {
    throw httpError(response.status, `Syndication request for ${postId}`, response.headers.get('retry-after'));
  }

  const text = await response.text();
  if (!text.trim()) return null;

  let body: unknown;
  try {
    body = JSON.parse(text);
  } catch (err) {
    throw new NetworkError(`Syndication response for ${postId} could not be parsed: ${errorMessage(err)}`);
  }
  return parseSyndicationResponse(body, postId);
}
