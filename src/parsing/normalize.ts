import type { RawItemFields } from '../search/types';

export const DEFAULT_BASE_URL = 'https://www.amazon.com';

const CURRENCY_PATTERN = /[$\u20AC\u00A3\u00A5\u20B9\u20BA\s\u00A0]+/g;
const DECIMAL_PATTERN = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?$/;
const INTEGER_PATTERN = /^[+-]?\d+$/;
const RATING_PATTERN = /([0-5]\.?[0-9]?) out of 5 stars/;

/**
 * Strips currency symbols and whitespace, then requires the remainder to be a
 * plain decimal. "$1,299.99" therefore yields null: thousands separators are
 * not removed from prices.
 */
export function normalizePrice(raw: string | null | undefined): number | null {
  if (!raw) {
    return null;
  }
  const stripped = raw.replace(CURRENCY_PATTERN, '');
  if (!DECIMAL_PATTERN.test(stripped)) {
    return null;
  }
  const parsed = Number.parseFloat(stripped);
  return Number.isFinite(parsed) ? parsed : null;
}

export function normalizeRating(raw: string | null | undefined): number | null {
  if (!raw) {
    return null;
  }
  const match = RATING_PATTERN.exec(raw);
  if (!match) {
    return null;
  }
  const parsed = Number.parseFloat(match[1]);
  return Number.isFinite(parsed) ? parsed : null;
}

export function normalizeReviewCount(raw: string | null | undefined): number | null {
  if (!raw) {
    return null;
  }
  const stripped = raw.replace(/,/g, '').trim();
  if (!INTEGER_PATTERN.test(stripped)) {
    return null;
  }
  const parsed = Number.parseInt(stripped, 10);
  return Number.isSafeInteger(parsed) ? parsed : null;
}

export function resolveProductUrl(href: string | null | undefined, baseUrl = DEFAULT_BASE_URL): string | null {
  if (!href) {
    return null;
  }
  try {
    return new URL(href, baseUrl).toString();
  } catch {
    return null;
  }
}

// Zero counts as missing here, so a free or unrated item is never valid.
export function isCompleteRecord(fields: {
  title: string | null;
  price: number | null;
  rating: number | null;
  reviewCount: number | null;
  productUrl: string | null;
  imageUrl: string | null;
}): boolean {
  return Boolean(
    fields.title &&
      fields.price &&
      fields.rating &&
      fields.reviewCount &&
      fields.productUrl &&
      fields.imageUrl
  );
}

export function hasRequiredFields(raw: RawItemFields): raw is RawItemFields & { title: string; link: string } {
  return Boolean(raw.title) && Boolean(raw.link);
}
