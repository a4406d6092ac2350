import { NotFoundError, ScraperError, ValidationError, HttpError } from '../errors';
import type { FilterOptions } from '../query/filter-engine';
import type { SearchScraper } from '../search/search-scraper';
import type { Product } from '../search/types';
import type { ProductStore } from '../storage/product-store';
import { SCRATCH_TABLES, type ScratchSelection, type SearchTable } from '../storage/types';
import type { Logger } from '../utils/logger';
import { finiteValues, mean, median } from '../utils/stats';
import { normalizeQuery } from '../utils/text';

interface SearchServiceDependencies {
  logger: Logger;
  scraper: SearchScraper;
  store: ProductStore;
  defaultPages: number;
  pageLimit: number;
}

export interface ProductSummary {
  total: number;
  valid: number;
  priceMin: number | null;
  priceMax: number | null;
  priceMedian: number | null;
  ratingMean: number | null;
}

export interface BoundaryResponse {
  status: number;
  message: string;
}

export function summarizeProducts(products: Product[]): ProductSummary {
  const prices = finiteValues(products.map((product) => product.price));
  const ratings = finiteValues(products.map((product) => product.rating));
  return {
    total: products.length,
    valid: products.filter((product) => product.valid).length,
    priceMin: prices.length > 0 ? Math.min(...prices) : null,
    priceMax: prices.length > 0 ? Math.max(...prices) : null,
    priceMedian: median(prices),
    ratingMean: mean(ratings)
  };
}

/** Maps an error to the status an HTTP or CLI front end should report. */
export function toBoundaryResponse(error: unknown): BoundaryResponse {
  if (!(error instanceof ScraperError)) {
    return { status: 500, message: 'Internal Server Error' };
  }

  switch (error.code) {
    case 'not_found':
      return { status: 404, message: error.message };
    case 'validation':
      return { status: 422, message: error.message };
    case 'timeout':
      return { status: 408, message: error.message };
    case 'connection':
      return { status: 502, message: error.message };
    case 'http':
      if (error instanceof HttpError && error.status === 404) {
        return { status: 404, message: error.message };
      }
      return { status: 502, message: error.message };
    default:
      return { status: 500, message: error.message };
  }
}

export class SearchService {
  constructor(private readonly deps: SearchServiceDependencies) {}

  private requireQuery(query: string): string {
    const normalized = normalizeQuery(query);
    if (!normalized) {
      throw new ValidationError('Query must not be empty');
    }
    return normalized;
  }

  async search(query: string, maxPages = this.deps.defaultPages): Promise<Product[]> {
    const normalized = this.requireQuery(query);
    if (maxPages > this.deps.pageLimit) {
      throw new ValidationError(`maxPages must not exceed ${this.deps.pageLimit}`);
    }
    const products = await this.deps.scraper.scrape(normalized, maxPages);
    if (products.length === 0) {
      throw new NotFoundError(`No products found for the given query: '${normalized}'`);
    }
    return products;
  }

  async history(query: string): Promise<Product[]> {
    const normalized = this.requireQuery(query);
    const products = await this.deps.store.copyToHistory(normalized);
    if (products.length === 0) {
      throw new NotFoundError(`No stored searches for query: '${normalized}'`);
    }
    return products;
  }

  async filterLive(options: Omit<FilterOptions, 'dedup'> = {}): Promise<Product[]> {
    return this.deps.store.query('live-scratch', { ...options, dedup: false });
  }

  async filterHistorical(options: FilterOptions = {}): Promise<Product[]> {
    return this.deps.store.query('historical-scratch', options);
  }

  async allOf(selection: ScratchSelection): Promise<Product[]> {
    return this.deps.store.all(SCRATCH_TABLES[selection]);
  }

  async clear(table: SearchTable): Promise<void> {
    await this.deps.store.clear(table);
    this.deps.logger.info('Table cleared on request', { table });
  }

  summarize(products: Product[]): ProductSummary {
    return summarizeProducts(products);
  }
}
