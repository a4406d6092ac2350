import { mkdirSync } from 'node:fs';
import { dirname, resolve } from 'node:path';

import { Mutex } from 'async-mutex';
import sqlite3 from 'sqlite3';

import { buildFilterQuery, hasThresholds, resolveFilter, type FilterOptions } from '../query/filter-engine';
import type { SearchResultsSink } from '../search/search-scraper';
import type { Product } from '../search/types';
import { describeError, type Logger } from '../utils/logger';
import { RECORD_COLUMNS, SEARCH_TABLES, TABLE_NAMES, type SearchRecordRow, type SearchTable } from './types';

const OPEN_FLAGS = sqlite3.OPEN_READWRITE | sqlite3.OPEN_CREATE;
export const IN_MEMORY_DB = ':memory:';

type SqlParam = string | number | null;

const INSERT_COLUMNS = RECORD_COLUMNS.filter((column) => column !== 'id');
const NEWEST_FIRST = 'timestamp DESC, id DESC';
// History rows are inserted already ordered, so ties keep insertion order.
const HISTORY_ORDER = 'timestamp DESC, id ASC';

function toProduct(row: SearchRecordRow): Product {
  return {
    title: row.title,
    price: row.price,
    rating: row.rating,
    reviewCount: row.review_count,
    productUrl: row.product_url,
    imageUrl: row.image_url,
    valid: row.valid === 1,
    timestamp: row.timestamp
  };
}

function toInsertParams(query: string, product: Product): SqlParam[] {
  return [
    query,
    product.title,
    product.price,
    product.rating,
    product.reviewCount,
    product.productUrl,
    product.imageUrl,
    product.valid ? 1 : 0,
    product.timestamp
  ];
}

/**
 * One sqlite file holding the permanent table and the two scratch tables.
 * Every public operation runs under a single mutex, so a clear can never
 * land in the middle of a write or query on the shared connection.
 */
export class ProductStore implements SearchResultsSink {
  private readonly mutex = new Mutex();

  private constructor(private readonly db: sqlite3.Database, private readonly logger: Logger) {}

  static async open(dbFile: string, logger: Logger): Promise<ProductStore> {
    let location = IN_MEMORY_DB;
    if (dbFile !== IN_MEMORY_DB) {
      location = resolve(process.cwd(), dbFile);
      mkdirSync(dirname(location), { recursive: true });
    }

    const database = await new Promise<sqlite3.Database>((resolveDb, rejectDb) => {
      const db = new sqlite3.Database(location, OPEN_FLAGS, (err) => {
        if (err) {
          rejectDb(err);
          return;
        }
        resolveDb(db);
      });
    });

    const store = new ProductStore(database, logger);
    for (const table of SEARCH_TABLES) {
      await store.initialize(table);
    }
    return store;
  }

  private exec(sql: string): Promise<void> {
    return new Promise((resolveExec, rejectExec) => {
      this.db.exec(sql, (err) => {
        if (err) {
          rejectExec(err);
          return;
        }
        resolveExec();
      });
    });
  }

  private run(sql: string, params: SqlParam[]): Promise<number> {
    return new Promise((resolveRun, rejectRun) => {
      this.db.run(sql, params, function runCallback(err) {
        if (err) {
          rejectRun(err);
          return;
        }
        resolveRun(this.changes ?? 0);
      });
    });
  }

  private selectAll<T>(sql: string, params: SqlParam[] = []): Promise<T[]> {
    return new Promise((resolveAll, rejectAll) => {
      this.db.all(sql, params, (err, rows) => {
        if (err) {
          rejectAll(err);
          return;
        }
        resolveAll(rows as T[]);
      });
    });
  }

  private async transaction<T>(label: string, work: () => Promise<T>): Promise<T> {
    await this.exec('BEGIN');
    try {
      const result = await work();
      await this.exec('COMMIT');
      return result;
    } catch (error) {
      try {
        await this.exec('ROLLBACK');
      } catch (rollbackError) {
        this.logger.error('Rollback failed', { operation: label, error: describeError(rollbackError) });
      }
      throw error;
    }
  }

  private async createTable(table: SearchTable): Promise<void> {
    const name = TABLE_NAMES[table];
    await this.exec(`
      CREATE TABLE IF NOT EXISTS ${name} (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        query TEXT NOT NULL,
        title TEXT NOT NULL,
        price REAL,
        rating REAL,
        review_count INTEGER,
        product_url TEXT,
        image_url TEXT,
        valid INTEGER NOT NULL,
        timestamp INTEGER NOT NULL
      )
    `);
    await this.exec(`CREATE INDEX IF NOT EXISTS idx_${name}_timestamp ON ${name}(timestamp)`);
    if (table === 'permanent') {
      await this.exec(`CREATE INDEX IF NOT EXISTS idx_${name}_query ON ${name}(query)`);
    }
  }

  private async deleteAll(table: SearchTable): Promise<number> {
    return this.run(`DELETE FROM ${TABLE_NAMES[table]}`, []);
  }

  private async insertAll(table: SearchTable, query: string, products: Product[]): Promise<void> {
    const placeholders = INSERT_COLUMNS.map(() => '?').join(', ');
    const sql = `INSERT INTO ${TABLE_NAMES[table]} (${INSERT_COLUMNS.join(', ')}) VALUES (${placeholders})`;
    for (const product of products) {
      await this.run(sql, toInsertParams(query, product));
    }
  }

  private async selectRows(table: SearchTable, whereSql: string, params: SqlParam[]): Promise<SearchRecordRow[]> {
    const order = table === 'historical-scratch' ? HISTORY_ORDER : NEWEST_FIRST;
    return this.selectAll<SearchRecordRow>(
      `SELECT ${RECORD_COLUMNS.join(', ')} FROM ${TABLE_NAMES[table]}${whereSql} ORDER BY ${order}`,
      params
    );
  }

  async initialize(table: SearchTable): Promise<void> {
    await this.mutex.runExclusive(() => this.createTable(table));
  }

  /** Empties one table. Failures roll back and are re-raised. */
  async clear(table: SearchTable): Promise<void> {
    await this.mutex.runExclusive(async () => {
      try {
        const removed = await this.transaction(`clear:${table}`, () => this.deleteAll(table));
        this.logger.info('Cleared table', { table, removed });
      } catch (error) {
        this.logger.error('Failed to clear table', { table, error: describeError(error) });
        throw error;
      }
    });
  }

  /** Inserts every product in one transaction; rolls back and rethrows on failure. */
  async write(table: SearchTable, query: string, products: Product[]): Promise<number> {
    return this.mutex.runExclusive(async () => {
      await this.transaction(`write:${table}`, () => this.insertAll(table, query, products));
      return products.length;
    });
  }

  /**
   * Persists a live search: live-scratch is emptied, then the products go to
   * permanent and live-scratch. Each step commits on its own, so a crash
   * between them can leave the two tables out of step. Never rejects.
   */
  async writeSearch(query: string, products: Product[]): Promise<boolean> {
    return this.mutex.runExclusive(async () => {
      try {
        await this.transaction('clear:live-scratch', () => this.deleteAll('live-scratch'));
        await this.transaction('write:permanent', () => this.insertAll('permanent', query, products));
        await this.transaction('write:live-scratch', () => this.insertAll('live-scratch', query, products));
        this.logger.info('Saved search results', { query, products: products.length });
        return true;
      } catch (error) {
        this.logger.error('Failed to save search results', { query, error: describeError(error) });
        return false;
      }
    });
  }

  async query(table: SearchTable, options: FilterOptions = {}): Promise<Product[]> {
    const filter = resolveFilter(options);
    const allowDedup = table === 'historical-scratch';
    if (filter.dedup && !allowDedup) {
      this.logger.debug('Ignoring dedup flag outside the historical table', { table });
    }

    const statement = buildFilterQuery(TABLE_NAMES[table], RECORD_COLUMNS, filter, allowDedup);
    const rows = await this.mutex.runExclusive(() => this.selectAll<SearchRecordRow>(statement.sql, statement.params));

    this.logger.debug('Filtered table', {
      table,
      filtering: hasThresholds(filter),
      sortBy: filter.sortBy,
      order: filter.order,
      dedup: filter.dedup && allowDedup,
      matched: rows.length
    });
    return rows.map(toProduct);
  }

  async all(table: SearchTable): Promise<Product[]> {
    const rows = await this.mutex.runExclusive(() => this.selectRows(table, '', []));
    return rows.map(toProduct);
  }

  async count(table: SearchTable): Promise<number> {
    const rows = await this.mutex.runExclusive(() =>
      this.selectAll<{ total: number }>(`SELECT COUNT(*) AS total FROM ${TABLE_NAMES[table]}`)
    );
    return rows[0]?.total ?? 0;
  }

  /**
   * Replaces historical-scratch with every permanent row for `queryText`,
   * newest first. Failures roll back and are re-raised.
   */
  async copyToHistory(queryText: string): Promise<Product[]> {
    return this.mutex.runExclusive(async () => {
      try {
        const rows = await this.transaction('copy:historical-scratch', async () => {
          await this.deleteAll('historical-scratch');
          const matched = await this.selectRows('permanent', ' WHERE query = ?', [queryText]);
          for (const row of matched) {
            await this.insertAll('historical-scratch', row.query, [toProduct(row)]);
          }
          return matched;
        });
        this.logger.info('Copied history rows', { query: queryText, rows: rows.length });
        return rows.map(toProduct);
      } catch (error) {
        this.logger.error('Failed to copy history rows', { query: queryText, error: describeError(error) });
        throw error;
      }
    });
  }

  async close(): Promise<void> {
    await new Promise<void>((resolveClose, rejectClose) => {
      this.db.close((err) => {
        if (err) {
          rejectClose(err);
          return;
        }
        resolveClose();
      });
    });
  }
}
