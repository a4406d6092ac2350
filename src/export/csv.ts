import { mkdirSync, writeFileSync } from 'node:fs';
import { resolve } from 'node:path';

import type { ExporterConfig } from '../config';
import type { Product } from '../search/types';
import { Logger } from '../utils/logger';

interface CsvExporterDependencies {
  logger: Logger;
  config: ExporterConfig;
  outputDir: string;
  now?: () => Date;
}

export const CSV_HEADER = [
  'title',
  'price',
  'rating',
  'review_count',
  'product_url',
  'image_url',
  'valid',
  'timestamp'
];

function formatNumber(value: number | null): string {
  if (value === null || !Number.isFinite(value)) {
    return '';
  }
  return String(value);
}

const NEEDS_QUOTING = /[",\r\n]/;

export function escapeCsv(value: string): string {
  if (NEEDS_QUOTING.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

export function toCsvRow(product: Product): string {
  return [
    escapeCsv(product.title),
    formatNumber(product.price),
    formatNumber(product.rating),
    formatNumber(product.reviewCount),
    escapeCsv(product.productUrl ?? ''),
    escapeCsv(product.imageUrl ?? ''),
    product.valid ? 'true' : 'false',
    new Date(product.timestamp).toISOString()
  ].join(',');
}

export class CsvExporter {
  constructor(private readonly deps: CsvExporterDependencies) {}

  export(products: Product[], label: string): string | null {
    if (products.length === 0) {
      this.deps.logger.info('Nothing to export', { label });
      return null;
    }

    const now = (this.deps.now ?? (() => new Date()))();
    const stamp = now.toISOString().replace(/[:.]/g, '-');
    const fileName = `${this.deps.config.output_basename}-${label}-${stamp}.csv`;
    mkdirSync(this.deps.outputDir, { recursive: true });
    const outputPath = resolve(this.deps.outputDir, fileName);

    const rows = [CSV_HEADER.join(','), ...products.map(toCsvRow)];
    writeFileSync(outputPath, `${rows.join('\n')}\n`, 'utf-8');
    this.deps.logger.info('Exported products CSV', {
      outputPath,
      rows: products.length
    });

    return outputPath;
  }
}
