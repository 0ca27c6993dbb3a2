import type { DatabasePool, DbRow, Queryable } from '../../config/database';
import { errorMessage } from '../../utils/errors';
import { logger as defaultLogger, Logger } from '../../utils/logger';

export class DuplicateEntryError extends Error {
  constructor(
    public readonly constraint?: string,
    public readonly detail?: string
  ) {
    super('Duplicate entry');
    this.name = 'DuplicateEntryError';
  }
}

export class StoreError extends Error {
  constructor(
    message: string,
    public readonly code?: string
  ) {
    super(message);
    this.name = 'StoreError';
  }
}

function pgField(error: unknown, field: 'code' | 'constraint' | 'detail'): string | undefined {
  if (typeof error === 'object' && error !== null && field in error) {
    const value: unknown = Reflect.get(error, field);
    return typeof value === 'string' ? value : undefined;
  }
  return undefined;
}

export abstract class BaseService {
  constructor(
    protected readonly db: DatabasePool,
    protected readonly logger: Logger = defaultLogger
  ) {}

  protected async executeQuery(sql: string, params: unknown[] = [], client: Queryable = this.db): Promise<DbRow[]> {
    const start = Date.now();
    try {
      const result = await client.query(sql, params);
      this.logger.debug('Executed query', { duration: Date.now() - start, rows: result.rowCount });
      return result.rows;
    } catch (error) {
      throw this.translateError(error, sql);
    }
  }

  protected async executeSingleQuery(sql: string, params: unknown[] = [], client: Queryable = this.db): Promise<DbRow | null> {
    const results = await this.executeQuery(sql, params, client);
    return results.length > 0 ? results[0] : null;
  }

  /**
   * Run `work` inside BEGIN/COMMIT on a dedicated client; any failure rolls
   * the whole unit back before it is rethrown.
   */
  protected async withTransaction<T>(work: (client: Queryable) => Promise<T>): Promise<T> {
    const client = await this.db.connect();
    try {
      await client.query('BEGIN');
      const result = await work(client);
      await client.query('COMMIT');
      return result;
    } catch (error) {
      try {
        await client.query('ROLLBACK');
      } catch (rollbackError) {
        this.logger.error('Rollback failed:', rollbackError);
      }
      throw error instanceof DuplicateEntryError || error instanceof StoreError
        ? error
        : this.translateError(error, 'transaction');
    } finally {
      client.release();
    }
  }

  private translateError(error: unknown, sql: string): Error {
    const code = pgField(error, 'code');
    if (code === '23505') {
      const constraint = pgField(error, 'constraint');
      const detail = pgField(error, 'detail');
      this.logger.warn('Duplicate key violation', { constraint, detail });
      return new DuplicateEntryError(constraint, detail);
    }
    this.logger.error(`Database query error: ${sql}`, error);
    return new StoreError(`Database error: ${errorMessage(error)}`, code);
  }
}
