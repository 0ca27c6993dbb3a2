// src/config/database.ts
import { Pool } from 'pg';
import { logger } from '../utils/logger';
import type { EnvironmentConfig } from './environment';

export type DbRow = Record<string, unknown>;

export interface QueryResultLike {
  rows: DbRow[];
  rowCount: number | null;
}

export interface Queryable {
  query(text: string, params?: unknown[]): Promise<QueryResultLike>;
}

export interface DatabaseClient extends Queryable {
  release(): void;
}

export interface DatabasePool extends Queryable {
  connect(): Promise<DatabaseClient>;
  end(): Promise<void>;
}

export function createPool(config: EnvironmentConfig): DatabasePool {
  const pool = new Pool({
    host: config.DB_HOST,
    port: config.DB_PORT,
    database: config.DB_NAME,
    user: config.DB_USER,
    password: config.DB_PASSWORD,
    ssl: config.DB_SSL ? { rejectUnauthorized: false } : undefined,
    max: 10, // Maximum number of clients in the pool
    idleTimeoutMillis: 30000, // Close idle clients after 30 seconds
    connectionTimeoutMillis: 10000 // Return an error after 10 seconds if connection could not be established
  });

  pool.on('error', err => {
    logger.error('Unexpected database error:', err);
  });

  return pool;
}

// Test connection on startup
export async function testConnection(pool: Queryable): Promise<boolean> {
  try {
    await pool.query('SELECT NOW()');
    logger.info('Database connection test successful');
    return true;
  } catch (error) {
    logger.error('Database connection test failed:', error);
    return false;
  }
}
