import { ValidationError } from '../errors';
import { sleep } from '../http/http-client';
import type { PageParser } from '../parsing/page-parser';
import { describeError, type Logger } from '../utils/logger';
import type { SearchPageFetcher } from './search-page-fetcher';
import type { Product } from './types';

export const MAX_PAGES_LIMIT = 10;

export interface SearchResultsSink {
  /** Resolves false when persistence failed; must not reject. */
  writeSearch(query: string, products: Product[]): Promise<boolean>;
}

export interface PageDelayRange {
  minMs: number;
  maxMs: number;
}

interface SearchScraperDependencies {
  logger: Logger;
  fetcher: SearchPageFetcher;
  parser: PageParser;
  sink: SearchResultsSink;
  pageDelay: PageDelayRange;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
}

export class SearchScraper {
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly random: () => number;

  constructor(private readonly deps: SearchScraperDependencies) {
    this.sleep = deps.sleep ?? sleep;
    this.random = deps.random ?? Math.random;
  }

  private nextDelay(): number {
    const { minMs, maxMs } = this.deps.pageDelay;
    return minMs + this.random() * (maxMs - minMs);
  }

  private async scrapePage(query: string, pageNumber: number): Promise<Product[]> {
    const html = await this.deps.fetcher.fetchPage(query, pageNumber);
    return this.deps.parser.parse(html);
  }

  /**
   * Fetches pages 1..maxPages one after another. Page 1 failures propagate;
   * later pages are logged and skipped. The aggregated list is returned even
   * when persisting it fails.
   */
  async scrape(query: string, maxPages = 1): Promise<Product[]> {
    if (!Number.isInteger(maxPages) || maxPages < 1 || maxPages > MAX_PAGES_LIMIT) {
      throw new ValidationError(`maxPages must be an integer between 1 and ${MAX_PAGES_LIMIT}`);
    }

    const { logger } = this.deps;
    logger.info('Starting product scrape', { query, maxPages });

    const products: Product[] = [];
    let pagesScraped = 0;

    for (let pageNumber = 1; pageNumber <= maxPages; pageNumber += 1) {
      if (pageNumber > 1) {
        await this.sleep(this.nextDelay());
      }

      if (pageNumber === 1) {
        products.push(...(await this.scrapePage(query, pageNumber)));
        pagesScraped += 1;
        continue;
      }

      try {
        products.push(...(await this.scrapePage(query, pageNumber)));
        pagesScraped += 1;
      } catch (error) {
        logger.warn('Skipping search results page after failure', {
          query,
          page: pageNumber,
          error: describeError(error)
        });
      }
    }

    const persisted = await this.deps.sink.writeSearch(query, products);

    logger.info('Finished product scrape', {
      query,
      pagesRequested: maxPages,
      pagesScraped,
      products: products.length,
      valid: products.filter((product) => product.valid).length,
      persisted
    });

    return products;
  }
}
