#!/usr/bin/env node
import { mkdirSync } from 'node:fs';
import { resolve } from 'node:path';
import { parseArgs } from 'node:util';

import { applyEnvOverrides, loadEnvConfig, loadSettings, type Settings } from './config';
import { ValidationError } from './errors';
import { CsvExporter } from './export/csv';
import { createSearchService } from './service/create-search-service';
import { toBoundaryResponse, type SearchService } from './service/search-service';
import type { Product } from './search/types';
import { ProductStore } from './storage/product-store';
import { isScratchSelection, isSearchTable, type ScratchSelection } from './storage/types';
import { Logger } from './utils/logger';

const USAGE = [
  'Usage:',
  '  search <query> [pages]',
  '  history <query>',
  '  filter <live|hist> [--min-price n] [--max-price n] [--min-rating n] [--sort field] [--order asc|desc] [--dedup]',
  '  all <live|hist>',
  '  clear <permanent|live-scratch|historical-scratch>',
  '  export <live|hist>'
].join('\n');

function ensureDirectories(paths: string[]) {
  paths.forEach((path) => {
    const resolved = resolve(process.cwd(), path);
    mkdirSync(resolved, { recursive: true });
  });
}

function printResult(payload: unknown) {
  process.stdout.write(`${JSON.stringify(payload)}\n`);
}

function parseNumberOption(name: string, raw: string | undefined): number | undefined {
  if (raw === undefined) {
    return undefined;
  }
  const parsed = Number(raw);
  if (!Number.isFinite(parsed)) {
    throw new ValidationError(`--${name} must be a number`);
  }
  return parsed;
}

function requireSelection(value: string | undefined): ScratchSelection {
  if (!value || !isScratchSelection(value)) {
    throw new ValidationError(`Expected 'live' or 'hist'\n${USAGE}`);
  }
  return value;
}

function printProducts(service: SearchService, products: Product[]) {
  printResult({ summary: service.summarize(products), products });
}

async function runCommand(service: SearchService, settings: Settings, logger: Logger, argv: string[]) {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      'min-price': { type: 'string' },
      'max-price': { type: 'string' },
      'min-rating': { type: 'string' },
      sort: { type: 'string' },
      order: { type: 'string' },
      dedup: { type: 'boolean', default: false }
    }
  });

  const [command, ...rest] = positionals;

  switch (command) {
    case 'search': {
      const pages = parseNumberOption('pages', rest[1]);
      printProducts(service, await service.search(rest[0] ?? '', pages));
      return;
    }
    case 'history':
      printProducts(service, await service.history(rest[0] ?? ''));
      return;
    case 'filter': {
      const selection = requireSelection(rest[0]);
      const options = {
        minPrice: parseNumberOption('min-price', values['min-price']),
        maxPrice: parseNumberOption('max-price', values['max-price']),
        minRating: parseNumberOption('min-rating', values['min-rating']),
        sortBy: values.sort,
        order: values.order
      };
      const products =
        selection === 'live'
          ? await service.filterLive(options)
          : await service.filterHistorical({ ...options, dedup: values.dedup });
      const total = (await service.allOf(selection)).length;
      printResult({ total, filtered: products.length, products });
      return;
    }
    case 'all':
      printProducts(service, await service.allOf(requireSelection(rest[0])));
      return;
    case 'clear': {
      const table = rest[0];
      if (!table || !isSearchTable(table)) {
        throw new ValidationError(`Unknown table '${table ?? ''}'\n${USAGE}`);
      }
      await service.clear(table);
      printResult({ cleared: table });
      return;
    }
    case 'export': {
      const selection = requireSelection(rest[0]);
      const exporter = new CsvExporter({
        logger: logger.child('export'),
        config: settings.exporter,
        outputDir: settings.paths.outputs_dir
      });
      printResult({ outputPath: exporter.export(await service.allOf(selection), selection) });
      return;
    }
    default:
      throw new ValidationError(USAGE);
  }
}

async function bootstrap() {
  const env = loadEnvConfig();
  const settings = applyEnvOverrides(loadSettings(), env);

  ensureDirectories([settings.paths.data_dir, settings.paths.outputs_dir]);

  const logger = new Logger({ level: settings.logging.level, format: settings.logging.format });

  logger.debug('Product search bootstrap complete', {
    appEnv: env.appEnv,
    dbFile: settings.paths.db_file,
    baseUrl: settings.http.base_url,
    timeoutMs: settings.http.timeout_ms,
    maxRetries: settings.http.retry.max_retries
  });

  let store: ProductStore | null = null;

  try {
    store = await ProductStore.open(settings.paths.db_file, logger.child('store'));
    const service = createSearchService(settings, store, logger);
    await runCommand(service, settings, logger, process.argv.slice(2));
  } catch (error) {
    const response = toBoundaryResponse(error);
    logger.error('Command failed', { status: response.status, error: response.message });
    printResult({ error: response });
    process.exitCode = 1;
  } finally {
    if (store) {
      await store.close().catch((error: unknown) => {
        logger.warn('Failed to close product store cleanly', {
          error: error instanceof Error ? error.message : String(error)
        });
      });
    }
  }
}

bootstrap().catch((error) => {
  // eslint-disable-next-line no-console
  console.error('Bootstrap failed', error);
  process.exitCode = 1;
});
