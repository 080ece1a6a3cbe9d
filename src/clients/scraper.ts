import { loadConfig } from '../config.js';
import { NetworkError, errorMessage, httpError } from '../errors.js';
import { parseStatusPage } from '../parsers/scrape-page.js';
import type { Post, ScrapeAdapter } from '../types.js';

const REQUEST_TIMEOUT_MS = 20_000;
const USER_AGENT = 'Mozilla/5.0 (X11; Linux x86_64) fedirelay';

export interface ScrapeClientOptions {
  baseUrl?: string;
  timeoutMs?: number;
}

export function statusPageUrl(baseUrl: string, username: string, postId: string): string {
  return `${baseUrl.replace(/\/$/, '')}/${encodeURIComponent(username)}/status/${encodeURIComponent(postId)}`;
}

/**
 * Client for a rendering front end that serves status pages as HTML.
 */
export function createScrapeClient(options: ScrapeClientOptions = {}): ScrapeAdapter {
  const baseUrl = options.baseUrl ?? loadConfig().SCRAPE_BASE_URL;
  const timeoutMs = options.timeoutMs ?? REQUEST_TIMEOUT_MS;

  async function fetchPage(username: string, postId: string): Promise<string> {
    const url = statusPageUrl(baseUrl, username, postId);

    let response: Response;
    try {
      response = await fetch(url, {
        headers: { Accept: 'text/html', 'User-Agent': USER_AGENT },
        signal: AbortSignal.timeout(timeoutMs),
      });
    } catch (err) {
      throw new NetworkError(`Status page ${url} failed: ${errorMessage(err)}`, { cause: err });
    }

    if (!response.ok) {
      throw httpError(response.status, `Status page ${url}`, response.headers.get('retry-after'));
    }
    return response.text();
  }

  return {
    fetchThreadPage: fetchPage,

    async fetchSinglePost(username: string, postId: string): Promise<Post | null> {
      const html = await fetchPage(username, postId);
      return parseStatusPage(html, postId, username, baseUrl);
    },
  };
}
