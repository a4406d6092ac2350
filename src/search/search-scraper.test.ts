import assert from 'node:assert/strict';
import test from 'node:test';

import { HttpError, ValidationError } from '../errors';
import { HttpClient } from '../http/http-client';
import { PageParser } from '../parsing/page-parser';
import { HEADPHONE_ITEMS, htmlResponse, resultsPageHtml, silentLogger } from '../testing/fixtures';
import { SearchPageFetcher } from './search-page-fetcher';
import { SearchScraper, type SearchResultsSink } from './search-scraper';
import type { Product } from './types';

interface RecordingSink extends SearchResultsSink {
  writes: Array<{ query: string; products: Product[] }>;
}

function recordingSink(result = true): RecordingSink {
  const writes: Array<{ query: string; products: Product[] }> = [];
  return {
    writes,
    async writeSearch(query, products) {
      writes.push({ query, products });
      return result;
    }
  };
}

function createScraper(pages: Record<number, Response>, sink: SearchResultsSink) {
  const requested: string[] = [];
  const sleeps: number[] = [];
  const client = new HttpClient({
    logger: silentLogger(),
    timeoutMs: 1000,
    retryPolicy: { maxRetries: 0, backoffBaseMs: 0, retryableStatusCodes: [500, 502, 503, 504] },
    fetchImpl: async (url) => {
      requested.push(url);
      const match = /[?&]page=(\d+)/.exec(url);
      const pageNumber = match ? Number(match[1]) : 1;
      return pages[pageNumber] ?? htmlResponse('missing', 404);
    }
  });
  const scraper = new SearchScraper({
    logger: silentLogger(),
    fetcher: new SearchPageFetcher({ client, logger: silentLogger() }),
    parser: new PageParser({ logger: silentLogger(), now: () => 1_700_000_000_000 }),
    sink,
    pageDelay: { minMs: 800, maxMs: 1800 },
    sleep: async (ms) => {
      sleeps.push(ms);
    },
    random: () => 0.5
  });
  return { scraper, requested, sleeps };
}

test('scrape aggregates pages in order and writes once', async () => {
  const sink = recordingSink();
  const { scraper, requested, sleeps } = createScraper(
    {
      1: htmlResponse(resultsPageHtml(HEADPHONE_ITEMS.slice(0, 2))),
      2: htmlResponse(resultsPageHtml(HEADPHONE_ITEMS.slice(2)))
    },
    sink
  );

  const products = await scraper.scrape('headphones', 2);

  assert.deepEqual(
    products.map((product) => product.title),
    ['Studio Headphones', 'Travel Earbuds', 'Budget Headset']
  );
  assert.deepEqual(requested, ['https://www.amazon.com/s?k=headphones', 'https://www.amazon.com/s?k=headphones&page=2']);
  assert.deepEqual(sleeps, [1300]);
  assert.equal(sink.writes.length, 1);
  assert.equal(sink.writes[0].query, 'headphones');
  assert.equal(sink.writes[0].products.length, 3);
});

test('scrape propagates a first-page failure without writing', async () => {
  const sink = recordingSink();
  const { scraper } = createScraper({}, sink);

  await assert.rejects(scraper.scrape('zzz-nonexistent', 1), (error: unknown) => {
    assert.ok(error instanceof HttpError);
    assert.equal(error.status, 404);
    return true;
  });
  assert.equal(sink.writes.length, 0);
});

test('scrape skips a failing later page and keeps going', async () => {
  const sink = recordingSink();
  const { scraper, requested } = createScraper(
    {
      1: htmlResponse(resultsPageHtml([HEADPHONE_ITEMS[0]])),
      2: htmlResponse('oops', 500),
      3: htmlResponse(resultsPageHtml([HEADPHONE_ITEMS[1]]))
    },
    sink
  );

  const products = await scraper.scrape('headphones', 3);

  assert.equal(requested.length, 3);
  assert.deepEqual(
    products.map((product) => product.title),
    ['Studio Headphones', 'Travel Earbuds']
  );
  assert.equal(sink.writes[0].products.length, 2);
});

test('scrape returns the scraped products when persistence fails', async () => {
  const sink = recordingSink(false);
  const { scraper } = createScraper({ 1: htmlResponse(resultsPageHtml(HEADPHONE_ITEMS)) }, sink);

  const products = await scraper.scrape('headphones', 1);

  assert.equal(products.length, 3);
  assert.equal(sink.writes.length, 1);
});

test('scrape rejects page counts outside 1..10', async () => {
  const { scraper } = createScraper({}, recordingSink());

  await assert.rejects(scraper.scrape('headphones', 0), ValidationError);
  await assert.rejects(scraper.scrape('headphones', 11), ValidationError);
  await assert.rejects(scraper.scrape('headphones', 1.5), ValidationError);
});
