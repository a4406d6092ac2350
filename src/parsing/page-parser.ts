import { load, type CheerioAPI } from 'cheerio';

import { ParsingError } from '../errors';
import type { ItemParseResult, Product } from '../search/types';
import { describeError, type Logger } from '../utils/logger';
import { extractItemFields } from './field-extractor';
import {
  DEFAULT_BASE_URL,
  hasRequiredFields,
  isCompleteRecord,
  normalizePrice,
  normalizeRating,
  normalizeReviewCount,
  resolveProductUrl
} from './normalize';

export const ITEM_SELECTOR = 'div.s-main-slot div[role="listitem"]';

interface PageParserDependencies {
  logger: Logger;
  baseUrl?: string;
  now?: () => number;
}

export class PageParser {
  private readonly baseUrl: string;
  private readonly now: () => number;

  constructor(private readonly deps: PageParserDependencies) {
    this.baseUrl = deps.baseUrl ?? DEFAULT_BASE_URL;
    this.now = deps.now ?? Date.now;
  }

  private loadDocument(html: string): CheerioAPI {
    try {
      return load(html);
    } catch (error) {
      throw new ParsingError(`HTML parsing failed: ${describeError(error)}`, error);
    }
  }

  parseItem(fragment: string, index: number): ItemParseResult {
    try {
      const $item = load(fragment, null, false);
      const raw = extractItemFields($item, this.deps.logger, index);
      if (!hasRequiredFields(raw)) {
        return { ok: false, index, reason: 'missing_fields', detail: 'missing title or link' };
      }

      const productUrl = resolveProductUrl(raw.link, this.baseUrl);
      const price = normalizePrice(raw.price);
      const rating = normalizeRating(raw.rating);
      const reviewCount = normalizeReviewCount(raw.reviewCount);
      const valid = isCompleteRecord({
        title: raw.title,
        price,
        rating,
        reviewCount,
        productUrl,
        imageUrl: raw.image
      });

      if (!valid) {
        this.deps.logger.debug('Item is missing critical data', {
          itemIndex: index,
          price: price !== null,
          rating: rating !== null,
          reviewCount: reviewCount !== null,
          productUrl: productUrl !== null,
          image: raw.image !== null
        });
      }

      return {
        ok: true,
        index,
        product: {
          title: raw.title,
          price,
          rating,
          reviewCount,
          productUrl,
          imageUrl: raw.image,
          valid,
          timestamp: this.now()
        }
      };
    } catch (error) {
      return { ok: false, index, reason: 'unexpected', detail: describeError(error) };
    }
  }

  parseItems(html: string): ItemParseResult[] {
    const $ = this.loadDocument(html);
    const nodes = $(ITEM_SELECTOR).toArray();
    if (nodes.length === 0) {
      this.deps.logger.warn('No product items found on page', { selector: ITEM_SELECTOR });
      return [];
    }

    this.deps.logger.debug('Located product items', { count: nodes.length });
    return nodes.map((node, index) => this.parseItem($.html(node), index));
  }

  parse(html: string): Product[] {
    const products: Product[] = [];
    for (const result of this.parseItems(html)) {
      if (result.ok) {
        products.push(result.product);
        continue;
      }
      if (result.reason === 'unexpected') {
        this.deps.logger.error('Skipped item after unexpected parsing error', {
          itemIndex: result.index,
          error: result.detail
        });
      } else {
        this.deps.logger.warn('Skipped item', { itemIndex: result.index, reason: result.detail });
      }
    }
    return products;
  }
}
