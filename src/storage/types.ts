export const SEARCH_TABLES = ['permanent', 'live-scratch', 'historical-scratch'] as const;
export type SearchTable = (typeof SEARCH_TABLES)[number];

export type ScratchSelection = 'live' | 'hist';

export const TABLE_NAMES: Record<SearchTable, string> = {
  permanent: 'search_records',
  'live-scratch': 'live_search_records',
  'historical-scratch': 'historical_search_records'
};

export const SCRATCH_TABLES: Record<ScratchSelection, SearchTable> = {
  live: 'live-scratch',
  hist: 'historical-scratch'
};

export function isSearchTable(value: string): value is SearchTable {
  return SEARCH_TABLES.some((table) => table === value);
}

export function isScratchSelection(value: string): value is ScratchSelection {
  return value === 'live' || value === 'hist';
}

export interface SearchRecordRow {
  id: number;
  query: string;
  title: string;
  price: number | null;
  rating: number | null;
  review_count: number | null;
  product_url: string | null;
  image_url: string | null;
  valid: number;
  timestamp: number;
}

export const RECORD_COLUMNS = [
  'id',
  'query',
  'title',
  'price',
  'rating',
  'review_count',
  'product_url',
  'image_url',
  'valid',
  'timestamp'
] as const;
