import { Logger, OnModuleDestroy } from '@nestjs/common';
import { Pool, PoolConfig, QueryResult, QueryResultRow } from 'pg';
import { DEFAULT_DATA_SOURCE_NAME } from '../datasource.constants';
import { PoolSettings } from '../types/pool-settings';

/**
 * Pool statistics
 */
export interface PoolStats {
  totalCount: number;
  idleCount: number;
  waitingCount: number;
}

/**
 * A named PostgreSQL pool
 * Settings are collected first, then `init()` creates the underlying pg Pool.
 * Clients are only opened when the first query runs.
 */
export class PoolDataSource implements OnModuleDestroy {
  private readonly logger = new Logger(PoolDataSource.name);

  private name = DEFAULT_DATA_SOURCE_NAME;
  private settings: Partial<PoolSettings> = {};
  private pool?: Pool;

  getName(): string {
    return this.name;
  }

  setName(name: string): void {
    this.name = name;
  }

  /**
   * Merge settings; later calls override earlier ones
   */
  configure(settings: Partial<PoolSettings>): this {
    if (this.pool) {
      throw new Error(
        `Data source '${this.name}' is already initialized and cannot be reconfigured`,
      );
    }
    this.settings = { ...this.settings, ...settings };
    return this;
  }

  getSettings(): Partial<PoolSettings> {
    return { ...this.settings };
  }

  isInitialized(): boolean {
    return this.pool !== undefined;
  }

  toPoolConfig(): PoolConfig {
    const settings = this.settings;
    return {
      connectionString: settings.connectionString,
      host: settings.host,
      port: settings.port,
      user: settings.user,
      password: settings.password,
      database: settings.database,
      application_name: settings.applicationName ?? this.name,
      ssl: settings.ssl,
      max: settings.max,
      min: settings.min,
      idleTimeoutMillis: settings.idleTimeoutMillis,
      connectionTimeoutMillis: settings.connectionTimeoutMillis,
      maxUses: settings.maxUses,
      maxLifetimeSeconds: settings.maxLifetimeSeconds,
      statement_timeout: settings.statementTimeout,
      query_timeout: settings.queryTimeout,
      idle_in_transaction_session_timeout:
        settings.idleInTransactionSessionTimeout,
      allowExitOnIdle: settings.allowExitOnIdle,
      keepAlive: settings.keepAlive,
      keepAliveInitialDelayMillis: settings.keepAliveInitialDelayMillis,
    };
  }

  /**
   * Create the pg Pool. Calling it again is a no-op.
   */
  init(): void {
    if (this.pool) {
      return;
    }

    const pool = new Pool(this.toPoolConfig());
    pool.on('error', (error) => {
      this.logger.error(
        `Unexpected error on idle client in data source '${this.name}': ${error.message}`,
      );
    });
    this.pool = pool;

    this.logger.log(
      `Data source '${this.name}' initialized (max ${this.settings.max ?? 10} connections)`,
    );
  }

  getPool(): Pool {
    if (!this.pool) {
      throw new Error(`Data source '${this.name}' has not been initialized`);
    }
    return this.pool;
  }

  async query<R extends QueryResultRow = QueryResultRow>(
    text: string,
    values?: unknown[],
  ): Promise<QueryResult<R>> {
    return this.getPool().query<R>(text, values);
  }

  getStats(): PoolStats {
    if (!this.pool) {
      return { totalCount: 0, idleCount: 0, waitingCount: 0 };
    }
    return {
      totalCount: this.pool.totalCount,
      idleCount: this.pool.idleCount,
      waitingCount: this.pool.waitingCount,
    };
  }

  /**
   * End the pool. Calling it again is a no-op.
   */
  async close(): Promise<void> {
    const pool = this.pool;
    if (!pool) {
      return;
    }
    this.pool = undefined;

    this.logger.log(`Closing data source '${this.name}'...`);
    await pool.end();
  }

  async onModuleDestroy() {
    await this.close();
  }
}
