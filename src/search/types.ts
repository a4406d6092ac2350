export interface Product {
  title: string;
  price: number | null;
  rating: number | null;
  reviewCount: number | null;
  productUrl: string | null;
  imageUrl: string | null;
  valid: boolean;
  /** Epoch milliseconds, set when the item was extracted. */
  timestamp: number;
}

export interface RawItemFields {
  title: string | null;
  link: string | null;
  price: string | null;
  rating: string | null;
  reviewCount: string | null;
  image: string | null;
}

export type ItemParseResult =
  | { ok: true; index: number; product: Product }
  | { ok: false; index: number; reason: 'missing_fields' | 'unexpected'; detail: string };
