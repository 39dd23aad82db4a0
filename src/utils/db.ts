/**
 * PostgreSQL access for the encrypted repositories.
 *
 * Repositories depend on the narrow {@link Queryable} interface rather than
 * a pool, so tests can hand them an in-process stand-in.
 *
 * @module utils/db
 */

import pg from 'pg';

const { Pool } = pg;

export interface DbConfig {
  host: string;
  port: number;
  database: string;
  user: string;
  password: string;
  max: number;
  idleTimeoutMillis: number;
  connectionTimeoutMillis: number;
  ssl?: boolean;
}

/** The single query method repositories use. */
export interface Queryable {
  query<T extends pg.QueryResultRow = pg.QueryResultRow>(
    text: string,
    params?: unknown[],
  ): Promise<pg.QueryResult<T>>;
}

/**
 * Build database configuration from environment variables with sensible defaults.
 */
export function getDbConfig(env: Record<string, string | undefined> = process.env): DbConfig {
  return {
    host: env['DB_HOST'] ?? 'localhost',
    port: parseInt(env['DB_PORT'] ?? '5432', 10),
    database: env['DB_NAME'] ?? 'pos',
    user: env['DB_USER'] ?? 'postgres',
    password: env['DB_PASSWORD'] ?? '',
    max: parseInt(env['DB_POOL_MAX'] ?? '20', 10),
    idleTimeoutMillis: parseInt(env['DB_IDLE_TIMEOUT'] ?? '30000', 10),
    connectionTimeoutMillis: parseInt(env['DB_CONNECT_TIMEOUT'] ?? '5000', 10),
    ssl: env['DB_SSL'] === 'true',
  };
}

export function createPool(config?: Partial<DbConfig>): pg.Pool {
  const dbConfig = { ...getDbConfig(), ...config };
  return new Pool({
    host: dbConfig.host,
    port: dbConfig.port,
    database: dbConfig.database,
    user: dbConfig.user,
    password: dbConfig.password,
    max: dbConfig.max,
    idleTimeoutMillis: dbConfig.idleTimeoutMillis,
    connectionTimeoutMillis: dbConfig.connectionTimeoutMillis,
    ssl: dbConfig.ssl ? { rejectUnauthorized: false } : undefined,
  });
}

/** Expose a pool through the {@link Queryable} interface. */
export function toQueryable(pool: pg.Pool): Queryable {
  return {
    query<T extends pg.QueryResultRow = pg.QueryResultRow>(text: string, params?: unknown[]) {
      return pool.query<T>(text, params);
    },
  };
}
