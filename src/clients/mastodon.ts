import { z } from 'zod';

import {
  EditNotAllowedError,
  NetworkError,
  PublishError,
  RateLimitError,
  ServerError,
  StatusNotFoundError,
  ValidationError,
  errorMessage,
} from '../errors.js';
import type { Logger } from '../logger.js';
import type { MediaUpload, PublishRequest, Publisher } from '../types.js';

export const MAX_STATUS_LENGTH = 2500;
export const MAX_MEDIA_COUNT = 4;
export const MAX_MEDIA_SIZE = 10 * 1024 * 1024;

const REQUEST_TIMEOUT_MS = 30_000;

const statusSchema = z.object({ id: z.string() });
const errorBodySchema = z.object({ error: z.string() });

export interface MastodonPublisherOptions {
  instanceUrl: string;
  accessToken: string;
  logger: Logger;
}

async function readError(response: Response): Promise<string> {
  const text = await response.text();
  try {
    const parsed = errorBodySchema.safeParse(JSON.parse(text));
    if (parsed.success) return parsed.data.error;
  } catch {
    // not JSON, fall through to the raw body
  }
  return text.trim() || `HTTP ${response.status}`;
}

/**
 * Map a failed Mastodon response to an error. Conflicts on an existing status
 * (gone, not editable) get their own classes so callers can fall back.
 */
async function toPublishError(response: Response, context: string): Promise<Error> {
  const detail = await readError(response);
  const message = `${context}: ${detail}`;

  switch (response.status) {
    case 404:
      return new StatusNotFoundError(message);
    case 403:
      return new EditNotAllowedError(message);
    case 422:
      return new ValidationError(message);
    case 429: {
      const retryAfter = Number.parseInt(response.headers.get('retry-after') ?? '', 10);
      return new RateLimitError(message, Number.isNaN(retryAfter) ? null : retryAfter);
    }
    default:
      if (response.status >= 500) return new ServerError(message, response.status);
      return new PublishError(message);
  }
}

export function createMastodonPublisher(options: MastodonPublisherOptions): Publisher {
  const baseUrl = options.instanceUrl.replace(/\/$/, '');
  const { logger } = options;

  async function request(path: string, init: RequestInit, context: string): Promise<Response> {
    let response: Response;
    try {
      response = await fetch(`${baseUrl}${path}`, {
        ...init,
        headers: { Authorization: `Bearer ${options.accessToken}`, ...init.headers },
        signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS),
      });
    } catch (err) {
      throw new NetworkError(`${context} failed: ${errorMessage(err)}`, { cause: err });
    }

    if (!response.ok) throw await toPublishError(response, context);
    return response;
  }

  async function sendStatus(path: string, method: 'POST' | 'PUT', body: object, context: string): Promise<{ id: string }> {
    const response = await request(
      path,
      { method, headers: { 'Content-Type': 'application/json' }, body: JSON.stringify(body) },
      context,
    );
    const parsed = statusSchema.safeParse(await response.json());
    if (!parsed.success) throw new PublishError(`${context}: response has no status id`);
    return { id: parsed.data.id };
  }

  function assertLength(text: string): void {
    if (text.length > MAX_STATUS_LENGTH) {
      throw new ValidationError(`Text too long (${text.length}/${MAX_STATUS_LENGTH})`);
    }
  }

  async function uploadMedia(item: MediaUpload): Promise<string> {
    let download: Response;
    try {
      download = await fetch(item.url, { signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS) });
    } catch (err) {
      throw new NetworkError(`Media download ${item.url} failed: ${errorMessage(err)}`, { cause: err });
    }
    if (!download.ok) throw new PublishError(`Media download ${item.url} failed: HTTP ${download.status}`);

    const blob = await download.blob();
    if (blob.size === 0) throw new PublishError(`Media ${item.url} is empty`);
    if (blob.size > MAX_MEDIA_SIZE) throw new PublishError(`Media ${item.url} too large (${blob.size} bytes)`);

    const form = new FormData();
    const filename = new URL(item.url).pathname.split('/').pop() || 'media';
    form.append('file', blob, filename);
    if (item.description) form.append('description', item.description);

    const response = await request('/api/v2/media', { method: 'POST', body: form }, `Upload ${item.url}`);
    const parsed = statusSchema.safeParse(await response.json());
    if (!parsed.success) throw new PublishError(`Upload ${item.url}: response has no media id`);
    return parsed.data.id;
  }

  return {
    async publish(req: PublishRequest) {
      const mediaIds = req.media_ids ?? [];
      if (!req.text.trim() && mediaIds.length === 0) {
        throw new ValidationError('Text cannot be empty without media');
      }
      assertLength(req.text);

      const body: Record<string, unknown> = {
        status: req.text,
        visibility: req.visibility ?? 'public',
      };
      if (mediaIds.length > 0) body.media_ids = mediaIds;
      if (req.in_reply_to_id) body.in_reply_to_id = req.in_reply_to_id;

      return sendStatus('/api/v1/statuses', 'POST', body, 'Publish status');
    },

    async updateStatus(id: string, text: string, mediaIds?: string[]) {
      if (!text.trim()) throw new ValidationError('Text cannot be empty');
      assertLength(text);

      const body: Record<string, unknown> = { status: text };
      if (mediaIds) body.media_ids = mediaIds;
      return sendStatus(`/api/v1/statuses/${encodeURIComponent(id)}`, 'PUT', body, `Update status ${id}`);
    },

    async deleteStatus(id: string) {
      await request(`/api/v1/statuses/${encodeURIComponent(id)}`, { method: 'DELETE' }, `Delete status ${id}`);
    },

    async uploadMediaParallel(items: MediaUpload[]) {
      if (items.length > MAX_MEDIA_COUNT) {
        logger.warn({ count: items.length, limit: MAX_MEDIA_COUNT }, 'media count exceeds limit, uploading the first items only');
      }

      const settled = await Promise.allSettled(items.slice(0, MAX_MEDIA_COUNT).map((item) => uploadMedia(item)));
      const ids: string[] = [];
      settled.forEach((outcome, index) => {
        if (outcome.status === 'fulfilled') {
          ids.push(outcome.value);
        } else {
          logger.warn({ url: items[index].url, err: errorMessage(outcome.reason) }, 'media upload failed');
        }
      });
      return ids;
    },
  };
}
