import { Inject, Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { Pool } from 'pg';
import { APP_CONFIG, type AppConfig } from '../config/app.config';

export type SqlRow = Record<string, unknown>;

export interface SqlClient {
  query(text: string, params?: unknown[]): Promise<{ rows: SqlRow[] }>;
}

/** What the PostgreSQL-backed stores need from the database layer. */
export interface SqlExecutor extends SqlClient {
  transaction<T>(work: (client: SqlClient) => Promise<T>): Promise<T>;
}

@Injectable()
export class DatabaseService implements SqlExecutor, OnModuleDestroy {
  private readonly logger = new Logger(DatabaseService.name);
  private readonly pool: Pool;

  constructor(@Inject(APP_CONFIG) config: AppConfig) {
    this.pool = new Pool({
      connectionString: config.storage.databaseUrl,
      max: 5,
    });
    this.pool.on('error', (err) => this.logger.error(`Idle client error: ${err.message}`));
  }

  async query(text: string, params: unknown[] = []) {
    const res = await this.pool.query<SqlRow>(text, params);
    return { rows: res.rows };
  }

  async transaction<T>(work: (client: SqlClient) => Promise<T>): Promise<T> {
    const client = await this.pool.connect();
    try {
      await client.query('begin');
      const result = await work({
        query: async (text, params = []) => ({
          rows: (await client.query<SqlRow>(text, params)).rows,
        }),
      });
      await client.query('commit');
      return result;
    } catch (err) {
      await client.query('rollback').catch((rollbackErr: unknown) =>
        this.logger.error(`Rollback failed: ${String(rollbackErr)}`),
      );
      throw err;
    } finally {
      client.release();
    }
  }

  async onModuleDestroy() {
    await this.pool.end();
  }
}
