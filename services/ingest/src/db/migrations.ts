import type { PoolClient } from 'pg';

type Migration = {
  id: string;
  statements: string[];
};

const MIGRATION_TABLE = 'ingest_schema_migrations';

const migrations: Migration[] = [
  {
    id: '001_ingest_datasets',
    statements: [
      `CREATE TABLE IF NOT EXISTS datasets (
         id UUID PRIMARY KEY,
         project_id TEXT NOT NULL,
         filename TEXT NOT NULL,
         storage_handle TEXT,
         headers JSONB NOT NULL DEFAULT '[]'::jsonb,
         columns JSONB NOT NULL DEFAULT '[]'::jsonb,
         row_count INTEGER NOT NULL DEFAULT 0,
         status TEXT NOT NULL DEFAULT 'UPLOADED',
         revision INTEGER NOT NULL DEFAULT 0,
         mapping JSONB,
         confirmed_mapping JSONB,
         error TEXT,
         retryable BOOLEAN NOT NULL DEFAULT FALSE,
         failed_stage TEXT,
         last_ingest JSONB,
         created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
         updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
         CONSTRAINT datasets_status_check
           CHECK (status IN ('UPLOADED', 'ANALYZING', 'ANALYZED', 'CONFIRMED', 'INGESTING', 'INGESTED', 'FAILED')),
         CONSTRAINT datasets_mapping_state_check
           CHECK (mapping IS NULL OR status IN ('ANALYZED', 'CONFIRMED', 'INGESTED')),
         CONSTRAINT datasets_error_state_check
           CHECK (error IS NULL OR status = 'FAILED')
       );`,
      `CREATE INDEX IF NOT EXISTS idx_datasets_project_created
         ON datasets(project_id, created_at DESC);`,
      `CREATE TABLE IF NOT EXISTS raw_sources (
         dataset_id UUID PRIMARY KEY REFERENCES datasets(id) ON DELETE CASCADE,
         headers JSONB NOT NULL,
         row_count INTEGER NOT NULL,
         created_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
       );`,
      `CREATE TABLE IF NOT EXISTS raw_records (
         dataset_id UUID NOT NULL REFERENCES raw_sources(dataset_id) ON DELETE CASCADE,
         row_number INTEGER NOT NULL,
         cells JSONB NOT NULL,
         PRIMARY KEY (dataset_id, row_number)
       );`
    ]
  },
  {
    id: '002_ingest_normalized_store',
    statements: [
      `CREATE TABLE IF NOT EXISTS unified_objects (
         id UUID PRIMARY KEY,
         project_id TEXT NOT NULL,
         external_id TEXT NOT NULL,
         name TEXT NOT NULL,
         latitude DOUBLE PRECISION,
         longitude DOUBLE PRECISION,
         extra JSONB NOT NULL DEFAULT '{}'::jsonb,
         source_dataset_ids TEXT[] NOT NULL DEFAULT '{}'::text[],
         created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
         updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
         UNIQUE (project_id, external_id)
       );`,
      `CREATE TABLE IF NOT EXISTS unified_readings (
         id BIGSERIAL PRIMARY KEY,
         project_id TEXT NOT NULL,
         object_id UUID NOT NULL REFERENCES unified_objects(id) ON DELETE CASCADE,
         metric_key TEXT NOT NULL,
         observed_at TIMESTAMPTZ NOT NULL,
         value DOUBLE PRECISION NOT NULL,
         extra JSONB NOT NULL DEFAULT '{}'::jsonb,
         dataset_id UUID,
         UNIQUE (object_id, metric_key, observed_at)
       );`,
      `CREATE INDEX IF NOT EXISTS idx_unified_readings_project_metric_time
         ON unified_readings(project_id, metric_key, observed_at);`,
      `CREATE TABLE IF NOT EXISTS metric_catalog (
         project_id TEXT NOT NULL,
         metric_key TEXT NOT NULL,
         label TEXT NOT NULL,
         unit TEXT,
         description TEXT NOT NULL DEFAULT '',
         is_core BOOLEAN NOT NULL DEFAULT FALSE,
         created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
         PRIMARY KEY (project_id, metric_key)
       );`
    ]
  }
];

export async function runMigrations(client: PoolClient): Promise<void> {
  await client.query(`
    CREATE TABLE IF NOT EXISTS ${MIGRATION_TABLE} (
      id TEXT PRIMARY KEY,
      applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    );
  `);

  const { rows } = await client.query<{ id: string }>(`SELECT id FROM ${MIGRATION_TABLE}`);
  const applied = new Set(rows.map((row) => row.id));

  for (const migration of migrations) {
    if (applied.has(migration.id)) {
      continue;
    }

    await client.query('BEGIN');
    try {
      for (const statement of migration.statements) {
        await client.query(statement);
      }
      await client.query(`INSERT INTO ${MIGRATION_TABLE} (id) VALUES ($1) ON CONFLICT DO NOTHING`, [migration.id]);
      await client.query('COMMIT');
    } catch (err) {
      await client.query('ROLLBACK');
      throw err;
    }
  }
}
