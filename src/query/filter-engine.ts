import { z } from 'zod';

import { ValidationError } from '../errors';

export const SORT_FIELDS = ['price', 'rating', 'review_count', 'title'] as const;
export type SortField = (typeof SORT_FIELDS)[number];
export type SortOrder = 'asc' | 'desc';

export interface FilterOptions {
  minPrice?: number;
  maxPrice?: number;
  minRating?: number;
  sortBy?: string;
  order?: string;
  dedup?: boolean;
}

export interface ResolvedFilter {
  minPrice: number;
  maxPrice: number;
  minRating: number;
  sortBy: SortField;
  order: SortOrder;
  dedup: boolean;
}

export interface SqlStatement {
  sql: string;
  params: number[];
}

// Anything at or below zero means the threshold is off.
const threshold = z
  .number()
  .finite()
  .default(0)
  .transform((value) => Math.max(value, 0));

const FilterOptionsSchema = z.object({
  minPrice: threshold,
  maxPrice: threshold,
  minRating: threshold,
  sortBy: z.enum(SORT_FIELDS).catch('price'),
  order: z.enum(['asc', 'desc']).catch('desc').default('asc'),
  dedup: z.boolean().default(false)
});

const SORT_COLUMNS: Record<SortField, string> = {
  price: 'price',
  rating: 'rating',
  review_count: 'review_count',
  title: 'title'
};

export function resolveFilter(options: FilterOptions = {}): ResolvedFilter {
  const result = FilterOptionsSchema.safeParse(options);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ValidationError(`Invalid filter options: ${issues.join('; ')}`);
  }
  return result.data;
}

/** True unless every threshold is zero, which means "no filtering requested". */
export function hasThresholds(filter: ResolvedFilter): boolean {
  return filter.minPrice > 0 || filter.maxPrice > 0 || filter.minRating > 0;
}

export function buildWhereClause(filter: ResolvedFilter): SqlStatement {
  const conditions: string[] = [];
  const params: number[] = [];

  if (filter.minPrice > 0) {
    conditions.push('price >= ?');
    params.push(filter.minPrice);
  }
  if (filter.maxPrice > 0) {
    conditions.push('price <= ?');
    params.push(filter.maxPrice);
  }
  if (filter.minRating > 0) {
    conditions.push('rating >= ?');
    params.push(filter.minRating);
  }

  return { sql: conditions.join(' AND '), params };
}

// Ascending puts nulls last, descending puts them first. Ties keep insertion order.
export function buildOrderClause(filter: Pick<ResolvedFilter, 'sortBy' | 'order'>): string {
  const column = SORT_COLUMNS[filter.sortBy];
  if (filter.order === 'desc') {
    return `${column} IS NULL DESC, ${column} DESC, id ASC`;
  }
  return `${column} IS NULL ASC, ${column} ASC, id ASC`;
}

/**
 * Builds the SELECT for one table. `allowDedup` is only true for the
 * historical scratch table; the flag is ignored elsewhere. With dedup the
 * thresholds are applied first, then the lowest id of each (title, price)
 * group among the matching rows is kept.
 */
export function buildFilterQuery(
  tableName: string,
  columns: readonly string[],
  filter: ResolvedFilter,
  allowDedup: boolean
): SqlStatement {
  const where = buildWhereClause(filter);
  const conditions: string[] = [];
  if (filter.dedup && allowDedup) {
    const innerWhere = where.sql ? ` WHERE ${where.sql}` : '';
    conditions.push(`id IN (SELECT MIN(id) FROM ${tableName}${innerWhere} GROUP BY title, price)`);
  } else if (where.sql) {
    conditions.push(where.sql);
  }

  const whereSql = conditions.length > 0 ? ` WHERE ${conditions.join(' AND ')}` : '';
  return {
    sql: `SELECT ${columns.join(', ')} FROM ${tableName}${whereSql} ORDER BY ${buildOrderClause(filter)}`,
    params: where.params
  };
}
