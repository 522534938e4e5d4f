import type { Platform, ProviderClient } from '@/types/social';
import { ProviderError, RequestError } from '@/utils/errors';
import { fetchWithRetry, type RetriedResponse } from '@/utils/http';
import logger from '@/utils/logger';

export interface ProviderEndpoint {
  host: string;
  path: string;
}

export interface ScraperClientOptions {
  apiKey: string;
  endpoints: Record<Platform, ProviderEndpoint>;
  postLimit: number;
  timeoutMs: number;
  maxRetries: number;
  baseDelay?: number;
}

/**
 * RapidAPI-style scraping provider. Returns the decoded JSON body untouched;
 * the normalizers own the payload shape.
 */
export class ScraperClient implements ProviderClient {
  constructor(private readonly options: ScraperClientOptions) {}

  buildUrl(platform: Platform, handle: string): string {
    const { host, path } = this.options.endpoints[platform];
    const url = new URL(path, `https://${host}`);
    url.searchParams.set('username', handle);
    if (platform === 'x') {
      url.searchParams.set('count', String(this.options.postLimit));
    }
    return url.toString();
  }

  async fetch(platform: Platform, handle: string): Promise<unknown> {
    const url = this.buildUrl(platform, handle);
    const { host } = this.options.endpoints[platform];

    let result: RetriedResponse;
    try {
      result = await fetchWithRetry(
        url,
        {
          headers: {
            'x-rapidapi-key': this.options.apiKey,
            'x-rapidapi-host': host,
            Accept: 'application/json',
          },
        },
        {
          maxRetries: this.options.maxRetries,
          timeoutMs: this.options.timeoutMs,
          baseDelay: this.options.baseDelay,
        },
      );
    } catch (error) {
      const attempts = error instanceof RequestError ? error.attempts : 1;
      const message = error instanceof Error ? error.message : String(error);
      throw new ProviderError('network', `${platform} request failed: ${message}`, undefined, attempts);
    }

    const { response, attempts } = result;
    if (!response.ok) {
      const body = await response.text().catch(() => '');
      logger.warn(`Provider returned ${response.status} for ${platform}:${handle}`, {
        attempts,
        body: body.slice(0, 500),
      });
      if (response.status === 401 || response.status === 403) {
        throw new ProviderError('auth', `${platform} provider rejected the API key`, response.status, attempts);
      }
      if (response.status === 429) {
        throw new ProviderError('rate_limit', `${platform} provider rate limit reached`, response.status, attempts);
      }
      throw new ProviderError('http', `${platform} provider responded ${response.status}`, response.status, attempts);
    }

    try {
      return await response.json();
    } catch {
      throw new ProviderError('unparseable', `${platform} provider returned invalid JSON`, undefined, attempts);
    }
  }
}
