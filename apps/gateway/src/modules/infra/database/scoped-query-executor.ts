// src/modules/infra/database/scoped-query-executor.ts
import type { CommandStatus, Identity } from '@unwind/types-zod';
import { UnscopedQueryError } from '@/common/errors/data-access.error';
import { truncateSql } from '@/common/utils/redact.util';
import type { QueryExecutor, Row } from './query-executor.service';

// `$1` not followed by another digit (so `$10` does not count).
const SUBJECT_PLACEHOLDER = /\$1(?!\d)/;

/**
 * User-scoped view of the executor.
 * The subject is always bound as `$1`; caller parameters follow as `$2..$n`.
 * A statement that never references `$1` cannot filter by owner and is refused
 * before a connection is taken from the pool.
 */
export class ScopedQueryExecutor {
  constructor(
    private readonly executor: QueryExecutor,
    readonly identity: Identity,
  ) {}

  fetchOne<T extends Row = Row>(sql: string, params: readonly unknown[] = []): Promise<T | null> {
    return this.guard(sql, () => this.executor.fetchOne<T>(sql, this.bind(params), this.options()));
  }

  fetchAll<T extends Row = Row>(sql: string, params: readonly unknown[] = []): Promise<T[]> {
    return this.guard(sql, () => this.executor.fetchAll<T>(sql, this.bind(params), this.options()));
  }

  execute(sql: string, params: readonly unknown[] = []): Promise<CommandStatus> {
    return this.guard(sql, () => this.executor.execute(sql, this.bind(params), this.options()));
  }

  executeReturning<T extends Row = Row>(
    sql: string,
    params: readonly unknown[] = [],
  ): Promise<T | null> {
    return this.guard(sql, () =>
      this.executor.executeReturning<T>(sql, this.bind(params), this.options()),
    );
  }

  private guard<R>(sql: string, run: () => Promise<R>): Promise<R> {
    if (!SUBJECT_PLACEHOLDER.test(sql)) {
      return Promise.reject(new UnscopedQueryError(truncateSql(sql)));
    }
    return run();
  }

  private bind(params: readonly unknown[]): unknown[] {
    return [this.identity.sub, ...params];
  }

  private options() {
    return { identity: this.identity };
  }
}
