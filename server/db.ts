import { drizzle } from 'drizzle-orm/postgres-js';
import { and, eq, ilike } from 'drizzle-orm';
import postgres from 'postgres';
import { brands, products, type CatalogueTable, type NamedRecord } from '@shared/schema';
import { TtlCache } from './cache';
import { isDatabaseConfigured, type DatabaseConfig } from './config';
import { errorMessage, log, logDebug } from './log';

export const SUGGESTION_LIMIT = 10;

export interface CatalogueSource {
  fetchBrandNames(prefix: string): Promise<NamedRecord[]>;
  fetchProductNames(prefix: string): Promise<NamedRecord[]>;
}

export interface DatabaseStats {
  cacheEntries: number;
  cacheTables: string[];
  connectionPoolActive: boolean;
}

interface Lease {
  sql: postgres.Sql;
  pooled: boolean;
  release: () => Promise<void>;
}

export interface DatabaseManagerOptions {
  cache?: TtlCache<NamedRecord[]>;
  cacheTtlMs?: number;
  useConnectionPool?: boolean;
}

export function escapeLikePattern(value: string): string {
  return value.replace(/[\\%_]/g, (ch) => `\\${ch}`);
}

export class DatabaseManager implements CatalogueSource {
  private pool: postgres.Sql | null = null;
  private readonly cache: TtlCache<NamedRecord[]>;
  private readonly useConnectionPool: boolean;
  private readonly configured: boolean;

  constructor(private readonly config: DatabaseConfig, options: DatabaseManagerOptions = {}) {
    this.cache = options.cache ?? new TtlCache<NamedRecord[]>({ ttlMs: options.cacheTtlMs ?? 60 * 60 * 1000, name: 'Lookup Cache' });
    this.useConnectionPool = options.useConnectionPool ?? true;
    this.configured = isDatabaseConfigured(config);

    if (!this.configured) {
      console.warn('[DB] Database not configured - brand and product lookups will return no results');
    } else if (this.useConnectionPool) {
      this.initializeConnectionPool();
    }
  }

  isReady(): boolean {
    return this.configured;
  }

  fetchBrandNames(prefix: string): Promise<NamedRecord[]> {
    return this.fetchData('Brand', prefix);
  }

  fetchProductNames(prefix: string): Promise<NamedRecord[]> {
    return this.fetchData('Product', prefix);
  }

  async closeConnectionPool(): Promise<void> {
    const pool = this.pool;
    if (!pool) return;
    this.pool = null;
    await pool.end({ timeout: 5 });
    log('Connection pool closed', 'DB');
  }

  getStats(): DatabaseStats {
    const { size, keys } = this.cache.stats();
    return {
      cacheEntries: size,
      cacheTables: Array.from(new Set(keys.map((key) => key.split(':')[0]))),
      connectionPoolActive: this.pool !== null,
    };
  }

  private initializeConnectionPool(): void {
    if (this.pool) return;
    try {
      this.pool = this.connect(this.config.poolMax);
      log(`Database connection pool initialized (max ${this.config.poolMax})`, 'DB');
    } catch (error) {
      console.error(`[DB] Failed to initialize connection pool: ${errorMessage(error)}`);
      this.pool = null;
    }
  }

  private connect(max: number): postgres.Sql {
    const options = {
      max,
      connect_timeout: 10,
      idle_timeout: 20,
      max_lifetime: 60 * 30,
      onnotice: () => {},
    };
    const { url, host, port, user, password, database } = this.config;
    return url ? postgres(url, options) : postgres({ ...options, host, port, user, password, database });
  }

  private async checkout(): Promise<Lease> {
    const pool = this.pool;
    if (pool) {
      try {
        const reserved = await reserveWithin(pool, this.config.checkoutTimeoutMs);
        return {
          sql: reserved,
          pooled: true,
          release: async () => reserved.release(),
        };
      } catch (error) {
        console.warn(`[DB] Failed to get pooled connection, falling back: ${errorMessage(error)}`);
      }
    }

    const direct = this.connect(1);
    return {
      sql: direct,
      pooled: false,
      release: async () => {
        try {
          await direct.end({ timeout: 5 });
        } catch (error) {
          console.error(`[DB] Error closing connection: ${errorMessage(error)}`);
        }
      },
    };
  }

  private async fetchData(table: CatalogueTable, text: string): Promise<NamedRecord[]> {
    if (!this.configured) return [];

    try {
      return await this.cache.getOrLoad(`${table}:${text.toLowerCase()}`, () => this.queryTable(table, text));
    } catch (error) {
      console.error(`[DB] Error fetching data from ${table}: ${errorMessage(error)}`);
      return [];
    }
  }

  private async queryTable(table: CatalogueTable, text: string): Promise<NamedRecord[]> {
    const lease = await this.checkout();
    try {
      const db = drizzle(lease.sql);
      const pattern = `${escapeLikePattern(text)}%`;
      logDebug(`Querying ${table} for "${pattern}" (${lease.pooled ? 'pooled' : 'direct'})`, 'DB');

      const rows =
        table === 'Product'
          ? await db
              .selectDistinct({ id: products.id, name: products.name })
              .from(products)
              .where(and(ilike(products.name, pattern), eq(products.isPublished, true)))
              .limit(SUGGESTION_LIMIT)
          : await db
              .selectDistinct({ id: brands.id, name: brands.name })
              .from(brands)
              .where(ilike(brands.name, pattern))
              .limit(SUGGESTION_LIMIT);

      const result = rows.filter((row): row is NamedRecord => row.id !== null);
      log(`Fetched ${result.length} items from ${table}`, 'DB');
      return result;
    } finally {
      await lease.release();
    }
  }
}

/**
 * Check a connection out of the pool, giving up after `timeoutMs`. A connection
 * that arrives after the deadline goes straight back to the pool.
 */
export function reserveWithin<R extends { release(): void }>(
  pool: { reserve(): Promise<R> },
  timeoutMs: number,
): Promise<R> {
  return new Promise((resolve, reject) => {
    let settled = false;
    const timer = setTimeout(() => {
      settled = true;
      reject(new Error(`pool checkout timed out after ${timeoutMs}ms`));
    }, timeoutMs);

    pool.reserve().then(
      (reserved) => {
        if (settled) {
          reserved.release();
          return;
        }
        settled = true;
        clearTimeout(timer);
        resolve(reserved);
      },
      (error: unknown) => {
        if (settled) {
          console.warn(`[DB] Late pool checkout failed: ${errorMessage(error)}`);
          return;
        }
        settled = true;
        clearTimeout(timer);
        reject(error);
      },
    );
  });
}
