import assert from 'node:assert/strict';
import test from 'node:test';

import {
  isCompleteRecord,
  normalizePrice,
  normalizeRating,
  normalizeReviewCount,
  resolveProductUrl
} from './normalize';

test('normalizePrice strips every recognised currency symbol and whitespace', () => {
  assert.equal(normalizePrice('$19.99'), 19.99);
  assert.equal(normalizePrice('£12'), 12);
  assert.equal(normalizePrice('¥ 3000'), 3000);
  assert.equal(normalizePrice('₹499.50'), 499.5);
  assert.equal(normalizePrice('₺89.9'), 89.9);
  assert.equal(normalizePrice('€ 7.25'), 7.25);
  assert.equal(normalizePrice(' $5.00 '), 5);
  assert.equal(normalizePrice('$ €1 0.5'), 10.5);
});

test('normalizePrice returns null for remainders that are not plain numbers', () => {
  assert.equal(normalizePrice('$1,299.99'), null);
  assert.equal(normalizePrice('Free'), null);
  assert.equal(normalizePrice('$'), null);
  assert.equal(normalizePrice('12.99 - 15.99'), null);
  assert.equal(normalizePrice(''), null);
  assert.equal(normalizePrice(null), null);
});

test('normalizeRating reads the "out of 5 stars" pattern', () => {
  assert.equal(normalizeRating('4.5 out of 5 stars'), 4.5);
  assert.equal(normalizeRating('5 out of 5 stars'), 5);
  assert.equal(normalizeRating('Rated 3.7 out of 5 stars by shoppers'), 3.7);
  assert.equal(normalizeRating('0.0 out of 5 stars'), 0);
});

test('normalizeRating returns null when the pattern is absent', () => {
  assert.equal(normalizeRating('4.5 stars'), null);
  assert.equal(normalizeRating('four out of five'), null);
  assert.equal(normalizeRating(''), null);
  assert.equal(normalizeRating(undefined), null);
});

test('normalizeReviewCount removes thousands separators', () => {
  assert.equal(normalizeReviewCount('1,234'), 1234);
  assert.equal(normalizeReviewCount('12,345,678'), 12345678);
  assert.equal(normalizeReviewCount('87'), 87);
  assert.equal(normalizeReviewCount(' 42 '), 42);
});

test('normalizeReviewCount returns null for non-integer text', () => {
  assert.equal(normalizeReviewCount('(2,001)'), null);
  assert.equal(normalizeReviewCount('N/A'), null);
  assert.equal(normalizeReviewCount('12.5'), null);
  assert.equal(normalizeReviewCount(null), null);
});

test('resolveProductUrl resolves relative links against the marketplace origin', () => {
  assert.equal(resolveProductUrl('/dp/B0TEST0001?ref=sr_1_1'), 'https://www.amazon.com/dp/B0TEST0001?ref=sr_1_1');
  assert.equal(resolveProductUrl('https://shop.example.test/item/9'), 'https://shop.example.test/item/9');
  assert.equal(resolveProductUrl('/dp/X', 'https://mirror.example.test'), 'https://mirror.example.test/dp/X');
  assert.equal(resolveProductUrl(null), null);
});

test('isCompleteRecord treats zero numeric values as missing', () => {
  const complete = {
    title: 'Lamp',
    price: 20,
    rating: 4.2,
    reviewCount: 9,
    productUrl: 'https://www.amazon.com/dp/L',
    imageUrl: 'https://images.example.test/l.jpg'
  };
  assert.equal(isCompleteRecord(complete), true);
  assert.equal(isCompleteRecord({ ...complete, price: 0 }), false);
  assert.equal(isCompleteRecord({ ...complete, rating: 0 }), false);
  assert.equal(isCompleteRecord({ ...complete, reviewCount: 0 }), false);
  assert.equal(isCompleteRecord({ ...complete, price: null }), false);
  assert.equal(isCompleteRecord({ ...complete, imageUrl: null }), false);
  assert.equal(isCompleteRecord({ ...complete, title: '' }), false);
});
