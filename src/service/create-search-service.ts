import type { Settings } from '../config';
import { HttpClient, type FetchLike } from '../http/http-client';
import { PageParser } from '../parsing/page-parser';
import { SearchPageFetcher } from '../search/search-page-fetcher';
import { SearchScraper } from '../search/search-scraper';
import type { ProductStore } from '../storage/product-store';
import type { Logger } from '../utils/logger';
import { SearchService } from './search-service';

export interface SearchServiceOverrides {
  fetchImpl?: FetchLike;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
  now?: () => number;
}

/** Wires the HTTP client, fetcher, parser and scraper around an open store. */
export function createSearchService(
  settings: Settings,
  store: ProductStore,
  logger: Logger,
  overrides: SearchServiceOverrides = {}
): SearchService {
  const { http, search } = settings;

  const client = new HttpClient({
    logger: logger.child('http'),
    timeoutMs: http.timeout_ms,
    headers: {
      'User-Agent': http.user_agent,
      'Accept-Language': http.accept_language
    },
    retryPolicy: {
      maxRetries: http.retry.max_retries,
      backoffBaseMs: http.retry.backoff_base_ms,
      retryableStatusCodes: http.retry.status_forcelist
    },
    fetchImpl: overrides.fetchImpl,
    sleep: overrides.sleep
  });

  const scraper = new SearchScraper({
    logger: logger.child('scraper'),
    fetcher: new SearchPageFetcher({ client, logger: logger.child('fetcher'), baseUrl: http.base_url }),
    parser: new PageParser({ logger: logger.child('parser'), baseUrl: http.base_url, now: overrides.now }),
    sink: store,
    pageDelay: { minMs: search.delay_min_ms, maxMs: search.delay_max_ms },
    sleep: overrides.sleep,
    random: overrides.random
  });

  return new SearchService({
    logger: logger.child('service'),
    scraper,
    store,
    defaultPages: search.default_pages,
    pageLimit: search.max_pages
  });
}
