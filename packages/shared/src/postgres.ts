import pg, { Pool, type PoolClient, type PoolConfig } from 'pg';

let int8Configured = false;

function configureGlobalParsers(): void {
  if (int8Configured) {
    return;
  }
  pg.types.setTypeParser(pg.types.builtins.INT8, (value: string) => Number.parseInt(value, 10));
  int8Configured = true;
}

export function quoteIdentifier(input: string): string {
  return `"${input.replace(/"/g, '""')}"`;
}

export type PostgresErrorLogger = {
  error(payload: Record<string, unknown>, message: string): void;
};

export interface PostgresAcquireOptions {
  setSearchPath?: boolean;
}

export interface PostgresPoolOptions extends PoolConfig {
  schema?: string;
  statementTimeoutMs?: number;
  logger?: PostgresErrorLogger;
}

export interface PostgresHelpers {
  getClient(options?: PostgresAcquireOptions): Promise<PoolClient>;
  withConnection<T>(fn: (client: PoolClient) => Promise<T>, options?: PostgresAcquireOptions): Promise<T>;
  withTransaction<T>(fn: (client: PoolClient) => Promise<T>, options?: PostgresAcquireOptions): Promise<T>;
  closePool(): Promise<void>;
  getPool(): Pool;
}

const consoleLogger: PostgresErrorLogger = {
  error(payload, message) {
    console.error(`[postgres] ${message}`, payload);
  }
};

/**
 * Builds the session statements run on every checked-out client.
 * The search path is skipped when the caller needs the raw connection,
 * e.g. to create the schema itself.
 */
export function buildSessionStatements(
  options: Pick<PostgresPoolOptions, 'schema' | 'statementTimeoutMs'>,
  acquire?: PostgresAcquireOptions
): string[] {
  const statements: string[] = [];
  if (options.schema && acquire?.setSearchPath !== false) {
    statements.push(`SET search_path TO ${quoteIdentifier(options.schema)}, public`);
  }
  if (options.statementTimeoutMs && options.statementTimeoutMs > 0) {
    statements.push(`SET statement_timeout = ${Math.trunc(options.statementTimeoutMs)}`);
  }
  return statements;
}

export function createPostgresPool(options: PostgresPoolOptions = {}): PostgresHelpers {
  configureGlobalParsers();
  const { schema, statementTimeoutMs, logger = consoleLogger, ...poolConfig } = options;
  const pool = new Pool(poolConfig);

  pool.on('error', (err: Error) => {
    logger.error({ err }, 'unexpected error on idle client');
  });

  async function getClient(acquire?: PostgresAcquireOptions): Promise<PoolClient> {
    const client = await pool.connect();
    try {
      for (const statement of buildSessionStatements({ schema, statementTimeoutMs }, acquire)) {
        await client.query(statement);
      }
    } catch (err) {
      client.release();
      throw err;
    }
    return client;
  }

  async function withConnection<T>(fn: (client: PoolClient) => Promise<T>, acquire?: PostgresAcquireOptions): Promise<T> {
    const client = await getClient(acquire);
    try {
      return await fn(client);
    } finally {
      client.release();
    }
  }

  async function withTransaction<T>(fn: (client: PoolClient) => Promise<T>, acquire?: PostgresAcquireOptions): Promise<T> {
    return withConnection(async (client) => {
      await client.query('BEGIN');
      try {
        const result = await fn(client);
        await client.query('COMMIT');
        return result;
      } catch (err) {
        try {
          await client.query('ROLLBACK');
        } catch (rollbackErr) {
          logger.error({ err: rollbackErr }, 'failed to rollback transaction');
        }
        throw err;
      }
    }, acquire);
  }

  async function closePool(): Promise<void> {
    await pool.end();
  }

  function getPool(): Pool {
    return pool;
  }

  return {
    getClient,
    withConnection,
    withTransaction,
    closePool,
    getPool
  };
}
