/**
 * QueryExecutor
 * - Owns the process-wide pg Pool: uninitialized -> connecting -> connected, back to uninitialized on disconnect
 * - Four primitives that differ only in result shape; each holds one pooled client for one round trip
 * - Backend failures are logged with truncated SQL and re-raised as QueryExecutionError
 * - Zero rows is a result (`null` / `[]`), never an error
 */
// src/modules/infra/database/query-executor.service.ts
import { Inject, Injectable, Logger, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import type { Pool, PoolClient, QueryResult } from 'pg';
import { CommandStatusZ } from '@unwind/types-zod';
import type { CommandStatus, Identity, PoolState } from '@unwind/types-zod';
import {
  DatabaseConfigError,
  QueryExecutionError,
  type DatabaseConfigKey,
  type QueryFailureCode,
} from '@/common/errors/data-access.error';
import { maskSubject, truncateSql } from '@/common/utils/redact.util';
import { DATABASE_CONFIG, PG_POOL_FACTORY } from './database.config';
import type { DatabaseConfig, PoolFactory } from './database.config';
import { ScopedQueryExecutor } from './scoped-query-executor';

export type Row = Record<string, unknown>;

export interface QueryOptions {
  /** Correlation tag for logs; never substituted into the SQL text. */
  identity?: Identity | null;
}

export interface PoolStats {
  total: number;
  idle: number;
  waiting: number;
}

// SQLSTATE codes are five characters with at least one digit, unlike Node errno codes such as EPIPE.
function sqlStateOf(err: unknown): string | undefined {
  if (typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'string') {
    return /^(?=.*\d)[0-9A-Z]{5}$/.test(err.code) ? err.code : undefined;
  }
  return undefined;
}

const QUERY_CANCELED = '57014';

/** Errors without a SQLSTATE come from the connection itself; such clients are discarded. */
function isConnectionFault(err: unknown): err is Error {
  return err instanceof Error && sqlStateOf(err) === undefined;
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Backend status string in the form psql prints it (`UPDATE 1`, `INSERT 0 1`). */
export function toCommandStatus(result: QueryResult): CommandStatus {
  const command = result.command;
  if (result.rowCount === null) return CommandStatusZ.parse({ command, rowCount: 0, tag: command });

  const rowCount = result.rowCount;
  const tag =
    command === 'INSERT' ? `INSERT ${result.oid ?? 0} ${rowCount}` : `${command} ${rowCount}`;
  return CommandStatusZ.parse({ command, rowCount, tag });
}

@Injectable()
export class QueryExecutor implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(QueryExecutor.name);
  private pool: Pool | null = null;
  private connecting: Promise<Pool> | null = null;

  constructor(
    @Inject(DATABASE_CONFIG) private readonly config: DatabaseConfig,
    @Inject(PG_POOL_FACTORY) private readonly createPool: PoolFactory,
  ) {}

  get state(): PoolState {
    if (this.pool) return 'connected';
    if (this.connecting) return 'connecting';
    return 'uninitialized';
  }

  async onModuleInit() {
    await this.connect();
  }

  async onModuleDestroy() {
    await this.disconnect();
  }

  /**
   * Create the pool and warm `minSize` connections.
   * A second call while connected is a no-op; a call during a pending connect joins it.
   * @throws DatabaseConfigError when host or password is missing, or min exceeds max
   */
  async connect(): Promise<void> {
    if (this.pool) {
      this.logger.warn('Database pool already exists. Skipping connection.');
      return;
    }
    await this.ensurePool();
  }

  /** Close every pooled connection; the next operation connects again. */
  async disconnect(): Promise<void> {
    const pending = this.connecting;
    if (pending) {
      try {
        await pending;
      } catch (err) {
        this.logger.debug(`Pending connect failed before disconnect: ${describe(err)}`);
      }
    }

    const pool = this.pool;
    if (!pool) return;
    this.pool = null;
    await pool.end();
    this.logger.log('Database pool closed');
  }

  stats(): PoolStats {
    if (!this.pool) return { total: 0, idle: 0, waiting: 0 };
    return {
      total: this.pool.totalCount,
      idle: this.pool.idleCount,
      waiting: this.pool.waitingCount,
    };
  }

  /** First row, or `null` when nothing matched. */
  async fetchOne<T extends Row = Row>(
    sql: string,
    params: readonly unknown[] = [],
    options?: QueryOptions,
  ): Promise<T | null> {
    return this.run('fetchOne', sql, params, options, async (client, values) => {
      const { rows } = await client.query<T>(sql, values);
      return rows[0] ?? null;
    });
  }

  /** All rows in backend order; `[]` when nothing matched. */
  async fetchAll<T extends Row = Row>(
    sql: string,
    params: readonly unknown[] = [],
    options?: QueryOptions,
  ): Promise<T[]> {
    return this.run('fetchAll', sql, params, options, async (client, values) => {
      const { rows } = await client.query<T>(sql, values);
      return rows;
    });
  }

  /** Mutating statement without RETURNING. */
  async execute(
    sql: string,
    params: readonly unknown[] = [],
    options?: QueryOptions,
  ): Promise<CommandStatus> {
    return this.run('execute', sql, params, options, async (client, values) => {
      const result = await client.query(sql, values);
      return toCommandStatus(result);
    });
  }

  /**
   * Mutating statement with RETURNING.
   * `null` means the predicate matched no row (not found, or precondition not met).
   */
  async executeReturning<T extends Row = Row>(
    sql: string,
    params: readonly unknown[] = [],
    options?: QueryOptions,
  ): Promise<T | null> {
    return this.run('executeReturning', sql, params, options, async (client, values) => {
      const { rows } = await client.query<T>(sql, values);
      return rows[0] ?? null;
    });
  }

  async ping(): Promise<void> {
    await this.run('ping', 'SELECT 1', [], undefined, (client) => client.query('SELECT 1'));
  }

  /** Executor whose every statement binds `identity.sub` as `$1`. */
  scoped(identity: Identity): ScopedQueryExecutor {
    return new ScopedQueryExecutor(this, identity);
  }

  private ensurePool(): Promise<Pool> {
    if (this.pool) return Promise.resolve(this.pool);
    if (!this.connecting) {
      this.connecting = this.openPool().finally(() => {
        this.connecting = null;
      });
    }
    return this.connecting;
  }

  /**
   * Start the checkout in the caller's tick, so a `disconnect()` issued after the call
   * ends the pool only once this client is released.
   */
  private acquire(): Promise<PoolClient> {
    if (this.pool) return this.pool.connect();
    return this.ensurePool().then((pool) => pool.connect());
  }

  private async openPool(): Promise<Pool> {
    const cfg = this.config;
    const missing: DatabaseConfigKey[] = [];
    if (!cfg.host) missing.push('PG_HOST');
    if (!cfg.password) missing.push('PG_PASSWORD');
    if (missing.length > 0) {
      throw new DatabaseConfigError(
        missing,
        `Missing required database credentials. Please set ${missing.join(' and ')}`,
      );
    }
    if (cfg.minSize > cfg.maxSize) {
      throw new DatabaseConfigError(
        ['PG_POOL_MIN'],
        `PG_POOL_MIN (${cfg.minSize}) exceeds PG_POOL_MAX (${cfg.maxSize})`,
      );
    }

    const pool = this.createPool({
      host: cfg.host,
      port: cfg.port,
      database: cfg.database,
      user: cfg.user,
      password: cfg.password,
      min: cfg.minSize,
      max: cfg.maxSize,
      statement_timeout: cfg.commandTimeoutMs,
      query_timeout: cfg.commandTimeoutMs,
      connectionTimeoutMillis: cfg.commandTimeoutMs,
    });

    pool.on('error', (err: Error) => {
      this.logger.error(`Idle client error: ${err.message}`, err.stack);
    });

    // Open the minimum up front so bad credentials fail here and not mid-request.
    const warm = await Promise.allSettled(
      Array.from({ length: cfg.minSize }, () => pool.connect()),
    );
    let failure: unknown = undefined;
    for (const r of warm) {
      if (r.status === 'fulfilled') r.value.release();
      else failure ??= r.reason;
    }
    if (failure !== undefined) {
      this.logger.error(`Failed to create database pool: ${describe(failure)}`);
      await pool.end();
      throw failure;
    }

    this.pool = pool;
    this.logger.log(
      `Database pool created: ${cfg.host}:${cfg.port}/${cfg.database} (pool size: ${cfg.minSize}-${cfg.maxSize})`,
    );
    return pool;
  }

  /**
   * Acquire one client, run `work`, release the client on every exit path.
   * Clients that failed at the connection level are released with the error so the pool drops them.
   */
  private async run<R>(
    op: string,
    sql: string,
    params: readonly unknown[],
    options: QueryOptions | undefined,
    work: (client: PoolClient, values: unknown[]) => Promise<R>,
  ): Promise<R> {
    const tag = maskSubject(options?.identity?.sub);
    let client: PoolClient | undefined;
    let failure: unknown = undefined;

    try {
      client = await this.acquire();
      this.logger.debug(`${op}: ${truncateSql(sql, 60)} (identity: ${tag})`);
      return await work(client, [...params]);
    } catch (err) {
      failure = err;
      if (err instanceof DatabaseConfigError) throw err;
      throw this.toExecutionError(sql, tag, err);
    } finally {
      client?.release(isConnectionFault(failure) ? failure : undefined);
    }
  }

  private toExecutionError(sql: string, tag: string, err: unknown): QueryExecutionError {
    const cause = err instanceof Error ? err : new Error(String(err));
    const sqlState = sqlStateOf(err);
    const code: QueryFailureCode =
      sqlState === QUERY_CANCELED || /timeout/i.test(cause.message) ? 'QUERY_TIMEOUT' : 'QUERY_FAILED';
    const short = truncateSql(sql);

    this.logger.error(`Query failed: ${short} (identity: ${tag}) Error: ${cause.message}`);
    return new QueryExecutionError({ code, sql: short, sqlState }, cause);
  }
}
