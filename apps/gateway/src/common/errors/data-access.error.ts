// src/common/errors/data-access.error.ts

/** Base class for failures raised by the data-access layer. */
export class DataAccessError extends Error {
  readonly code: string;

  constructor(code: string, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'DataAccessError';
    this.code = code;
  }

  toJSON(): Record<string, unknown> {
    const json: Record<string, unknown> = {
      code: this.code,
      message: this.message,
    };
    if (this.cause !== undefined) {
      json.cause = serializeCause(this.cause);
    }
    return json;
  }
}

// --- Configuration ---

export type DatabaseConfigKey = 'PG_HOST' | 'PG_PASSWORD' | 'PG_POOL_MIN';

/** Database settings that are required (or inconsistent) at connect time. */
export class DatabaseConfigError extends DataAccessError {
  declare readonly code: 'DB_CONFIG_INVALID';
  readonly keys: readonly DatabaseConfigKey[];

  constructor(keys: readonly DatabaseConfigKey[], message: string) {
    super('DB_CONFIG_INVALID', message);
    this.name = 'DatabaseConfigError';
    this.keys = keys;
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), keys: this.keys };
  }
}

// --- Execution ---

export type QueryFailureCode = 'QUERY_FAILED' | 'QUERY_TIMEOUT';

export interface QueryFailureDetails {
  code: QueryFailureCode;
  /** SQL text, already truncated for logging */
  sql: string;
  /** SQLSTATE reported by the backend, when there is one */
  sqlState?: string;
}

/**
 * A statement failed in the backend, timed out, or lost its connection.
 * Parameters are deliberately absent: they may carry user data.
 */
export class QueryExecutionError extends DataAccessError {
  declare readonly code: QueryFailureCode;
  readonly sql: string;
  readonly sqlState?: string;

  constructor(details: QueryFailureDetails, cause?: Error) {
    super(
      details.code,
      details.code === 'QUERY_TIMEOUT'
        ? `Query timed out: ${details.sql}`
        : `Query failed: ${details.sql}`,
      cause ? { cause } : undefined,
    );
    this.name = 'QueryExecutionError';
    this.sql = details.sql;
    this.sqlState = details.sqlState;
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      sql: this.sql,
      ...(this.sqlState !== undefined ? { sqlState: this.sqlState } : {}),
    };
  }
}

/** An identity-scoped statement that never references the subject placeholder. */
export class UnscopedQueryError extends DataAccessError {
  declare readonly code: 'QUERY_UNSCOPED';
  readonly sql: string;

  constructor(sql: string) {
    super('QUERY_UNSCOPED', `Scoped query does not bind the subject as $1: ${sql}`);
    this.name = 'UnscopedQueryError';
    this.sql = sql;
  }
}

function serializeCause(err: unknown): unknown {
  if (err instanceof DataAccessError) return err.toJSON();
  if (err instanceof Error) {
    return { name: err.name, message: err.message };
  }
  return err;
}
