import type { PoolClient } from 'pg';
import { createPostgresPool, quoteIdentifier, type PostgresAcquireOptions, type PostgresHelpers } from '@aquifer/shared';
import { runMigrations } from './migrations';
import { loadServiceConfig } from '../config/serviceConfig';

let poolHelpers: PostgresHelpers | null = null;
let schemaReadyPromise: Promise<void> | null = null;

function helpers(): PostgresHelpers {
  if (!poolHelpers) {
    const { database } = loadServiceConfig();
    poolHelpers = createPostgresPool({
      connectionString: database.url,
      max: database.maxConnections,
      idleTimeoutMillis: database.idleTimeoutMs,
      connectionTimeoutMillis: database.connectionTimeoutMs,
      statementTimeoutMs: database.statementTimeoutMs,
      schema: database.schema
    });
  }
  return poolHelpers;
}

async function prepareSchema(): Promise<void> {
  const { database } = loadServiceConfig();
  // The schema has to exist before the search path can point at it.
  const rawClient = await helpers().getClient({ setSearchPath: false });
  try {
    await rawClient.query(`CREATE SCHEMA IF NOT EXISTS ${quoteIdentifier(database.schema)}`);
  } finally {
    rawClient.release();
  }

  await helpers().withConnection(async (client) => {
    await runMigrations(client);
  });
}

export async function ensureSchemaReady(): Promise<void> {
  if (!schemaReadyPromise) {
    schemaReadyPromise = prepareSchema().catch((err) => {
      schemaReadyPromise = null;
      throw err;
    });
  }

  await schemaReadyPromise;
}

export async function withConnection<T>(
  fn: (client: PoolClient) => Promise<T>,
  options?: PostgresAcquireOptions
): Promise<T> {
  return helpers().withConnection(fn, options);
}

export async function withTransaction<T>(
  fn: (client: PoolClient) => Promise<T>,
  options?: PostgresAcquireOptions
): Promise<T> {
  return helpers().withTransaction(fn, options);
}

export async function closePool(): Promise<void> {
  if (!poolHelpers) {
    return;
  }
  const current = poolHelpers;
  poolHelpers = null;
  schemaReadyPromise = null;
  await current.closePool();
}
