import assert from 'node:assert/strict';
import test from 'node:test';

import { ValidationError } from '../errors';
import { buildFilterQuery, buildOrderClause, buildWhereClause, hasThresholds, resolveFilter } from './filter-engine';

test('resolveFilter fills defaults', () => {
  assert.deepEqual(resolveFilter(), {
    minPrice: 0,
    maxPrice: 0,
    minRating: 0,
    sortBy: 'price',
    order: 'asc',
    dedup: false
  });
});

test('resolveFilter falls back to price for unknown sort fields', () => {
  assert.equal(resolveFilter({ sortBy: 'popularity' }).sortBy, 'price');
  assert.equal(resolveFilter({ sortBy: 'review_count' }).sortBy, 'review_count');
});

test('resolveFilter sorts descending for any order other than asc', () => {
  assert.equal(resolveFilter({ order: 'asc' }).order, 'asc');
  assert.equal(resolveFilter({ order: 'desc' }).order, 'desc');
  assert.equal(resolveFilter({ order: 'sideways' }).order, 'desc');
  assert.equal(resolveFilter({ order: undefined }).order, 'asc');
});

test('negative thresholds resolve to zero and add no predicate', () => {
  const filter = resolveFilter({ minPrice: -1, maxPrice: -20, minRating: -0.5 });
  assert.deepEqual([filter.minPrice, filter.maxPrice, filter.minRating], [0, 0, 0]);
  assert.deepEqual(buildWhereClause(filter), { sql: '', params: [] });
});

test('resolveFilter rejects non-finite thresholds', () => {
  assert.throws(() => resolveFilter({ minRating: Number.NaN }), ValidationError);
  assert.throws(() => resolveFilter({ maxPrice: Number.POSITIVE_INFINITY }), ValidationError);
});

test('all-zero thresholds add no predicate', () => {
  const filter = resolveFilter({ minPrice: 0, maxPrice: 0, minRating: 0 });
  assert.equal(hasThresholds(filter), false);
  assert.deepEqual(buildWhereClause(filter), { sql: '', params: [] });
});

test('each positive threshold adds its own predicate', () => {
  assert.deepEqual(buildWhereClause(resolveFilter({ minPrice: 50 })), { sql: 'price >= ?', params: [50] });
  assert.deepEqual(buildWhereClause(resolveFilter({ minPrice: 10, maxPrice: 80, minRating: 4 })), {
    sql: 'price >= ? AND price <= ? AND rating >= ?',
    params: [10, 80, 4]
  });
});

test('buildOrderClause puts nulls last ascending and first descending', () => {
  assert.equal(buildOrderClause({ sortBy: 'price', order: 'asc' }), 'price IS NULL ASC, price ASC, id ASC');
  assert.equal(buildOrderClause({ sortBy: 'rating', order: 'desc' }), 'rating IS NULL DESC, rating DESC, id ASC');
});

test('buildFilterQuery filters before picking one row per duplicate group', () => {
  const filter = resolveFilter({ minRating: 4, sortBy: 'title', dedup: true });

  assert.deepEqual(buildFilterQuery('history', ['id', 'title'], filter, true), {
    sql:
      'SELECT id, title FROM history WHERE id IN (SELECT MIN(id) FROM history WHERE rating >= ? GROUP BY title, price) ' +
      'ORDER BY title IS NULL ASC, title ASC, id ASC',
    params: [4]
  });
  assert.deepEqual(buildFilterQuery('live', ['id', 'title'], filter, false), {
    sql: 'SELECT id, title FROM live WHERE rating >= ? ORDER BY title IS NULL ASC, title ASC, id ASC',
    params: [4]
  });
});

test('buildFilterQuery dedups the whole table when no threshold is set', () => {
  const filter = resolveFilter({ dedup: true });

  assert.deepEqual(buildFilterQuery('history', ['id'], filter, true), {
    sql:
      'SELECT id FROM history WHERE id IN (SELECT MIN(id) FROM history GROUP BY title, price) ' +
      'ORDER BY price IS NULL ASC, price ASC, id ASC',
    params: []
  });
});
