import type { Product } from '../search/types';
import { Logger } from '../utils/logger';

export interface ItemFixture {
  title?: string;
  href?: string;
  price?: string;
  rating?: string;
  reviews?: string;
  image?: string;
}

export function silentLogger(): Logger {
  return new Logger({ level: 'silent', format: 'json' });
}

export function itemHtml(item: ItemFixture): string {
  const parts: string[] = [];
  if (item.href !== undefined) {
    parts.push(`<a class="a-link-normal" href="${item.href}">link</a>`);
  }
  if (item.image !== undefined) {
    parts.push(`<img class="s-image" src="${item.image}" alt="">`);
  }
  if (item.title !== undefined) {
    parts.push(`<h2 class="a-size-medium"><span>${item.title}</span></h2>`);
  }
  if (item.rating !== undefined) {
    parts.push(`<i class="a-icon a-icon-star-small"><span class="a-icon-alt">${item.rating}</span></i>`);
  }
  if (item.reviews !== undefined) {
    parts.push(`<span data-component-type="s-client-side-analytics">${item.reviews}</span>`);
  }
  if (item.price !== undefined) {
    parts.push(`<span class="a-price"><span class="a-offscreen">${item.price}</span><span aria-hidden="true">ignored</span></span>`);
  }
  return `<div role="listitem" data-component-type="s-search-result">${parts.join('')}</div>`;
}

export function resultsPageHtml(items: ItemFixture[]): string {
  return `<!doctype html><html><body><div class="s-main-slot s-result-list">${items
    .map(itemHtml)
    .join('')}</div></body></html>`;
}

export const HEADPHONE_ITEMS: ItemFixture[] = [
  {
    title: 'Studio Headphones',
    href: '/dp/B0TEST0001?ref=sr_1_1',
    price: '$59.99',
    rating: '4.5 out of 5 stars',
    reviews: '1,234',
    image: 'https://images.example.test/studio.jpg'
  },
  {
    title: 'Travel Earbuds',
    href: '/dp/B0TEST0002',
    price: '$24.50',
    rating: '4.1 out of 5 stars',
    reviews: '87',
    image: 'https://images.example.test/earbuds.jpg'
  },
  {
    title: 'Budget Headset',
    href: '/dp/B0TEST0003',
    rating: '3.8 out of 5 stars',
    reviews: '12',
    image: 'https://images.example.test/headset.jpg'
  }
];

export function makeProduct(overrides: Partial<Product> = {}): Product {
  return {
    title: 'Sample Product',
    price: 10,
    rating: 4,
    reviewCount: 5,
    productUrl: 'https://www.amazon.com/dp/B0SAMPLE',
    imageUrl: 'https://images.example.test/sample.jpg',
    valid: true,
    timestamp: 1_700_000_000_000,
    ...overrides
  };
}

export function htmlResponse(body: string, status = 200): Response {
  return new Response(body, { status, headers: { 'content-type': 'text/html; charset=utf-8' } });
}
