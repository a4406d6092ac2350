import type { CheerioAPI } from 'cheerio';

import type { RawItemFields } from '../search/types';
import type { Logger } from '../utils/logger';

export type FieldSource = { kind: 'text' } | { kind: 'attr'; name: string };

export interface FieldRule {
  field: keyof RawItemFields;
  selector: string;
  source: FieldSource;
}

export const ITEM_FIELD_RULES: readonly FieldRule[] = [
  { field: 'title', selector: 'h2 span', source: { kind: 'text' } },
  { field: 'link', selector: 'a', source: { kind: 'attr', name: 'href' } },
  { field: 'price', selector: '.a-price .a-offscreen', source: { kind: 'text' } },
  { field: 'rating', selector: 'i.a-icon-star-small span', source: { kind: 'text' } },
  { field: 'reviewCount', selector: "span[data-component-type='s-client-side-analytics']", source: { kind: 'text' } },
  { field: 'image', selector: 'img.s-image', source: { kind: 'attr', name: 'src' } }
];

/**
 * Reads one field from the first node matching `selector`. Missing nodes,
 * missing attributes and blank text all come back as null.
 */
export function extractField($: CheerioAPI, selector: string, source: FieldSource): string | null {
  const node = $(selector).first();
  if (node.length === 0) {
    return null;
  }
  const value = source.kind === 'text' ? node.text() : node.attr(source.name);
  const trimmed = value?.trim();
  return trimmed ? trimmed : null;
}

export function extractItemFields($: CheerioAPI, logger?: Logger, itemIndex?: number): RawItemFields {
  const fields: RawItemFields = {
    title: null,
    link: null,
    price: null,
    rating: null,
    reviewCount: null,
    image: null
  };

  for (const rule of ITEM_FIELD_RULES) {
    const value = extractField($, rule.selector, rule.source);
    if (value === null) {
      logger?.debug('Field not found on item', { field: rule.field, selector: rule.selector, itemIndex });
    }
    fields[rule.field] = value;
  }

  return fields;
}
