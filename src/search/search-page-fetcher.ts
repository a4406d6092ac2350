import type { HttpClient } from '../http/http-client';
import { DEFAULT_BASE_URL } from '../parsing/normalize';
import type { Logger } from '../utils/logger';

interface SearchPageFetcherDependencies {
  client: HttpClient;
  logger: Logger;
  baseUrl?: string;
}

function encodeQuery(query: string): string {
  return query
    .split(' ')
    .map((part) => encodeURIComponent(part))
    .join('+');
}

export function buildSearchUrl(query: string, pageNumber: number, baseUrl = DEFAULT_BASE_URL): string {
  const origin = baseUrl.replace(/\/+$/, '');
  const url = `${origin}/s?k=${encodeQuery(query)}`;
  return pageNumber >= 2 ? `${url}&page=${pageNumber}` : url;
}

export class SearchPageFetcher {
  private readonly baseUrl: string;

  constructor(private readonly deps: SearchPageFetcherDependencies) {
    this.baseUrl = deps.baseUrl ?? DEFAULT_BASE_URL;
  }

  /** Returns the raw HTML of one 1-based results page, or throws a ScraperError. */
  async fetchPage(query: string, pageNumber: number): Promise<string> {
    const url = buildSearchUrl(query, pageNumber, this.baseUrl);
    this.deps.logger.debug('Fetching search results page', { query, page: pageNumber, url });

    const response = await this.deps.client.get(url);
    this.deps.logger.info('Fetched search results page', {
      query,
      page: pageNumber,
      status: response.status,
      attempts: response.attempts,
      bytes: response.body.length
    });
    return response.body;
  }
}
