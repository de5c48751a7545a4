import { randomUUID } from 'node:crypto';
import type { PoolClient } from 'pg';
import { StaleTransitionError } from '../errors/ingestErrors';
import type { DatasetStatePatch, ExpectedState, NewDataset } from '../stores/types';
import type { Dataset, DatasetRow } from './types';

const RAW_INSERT_CHUNK = 1_000;

export function toDataset(row: DatasetRow): Dataset {
  return {
    id: row.id,
    projectId: row.project_id,
    filename: row.filename,
    storageHandle: row.storage_handle,
    headers: Array.isArray(row.headers) ? row.headers : [],
    columns: Array.isArray(row.columns) ? row.columns : [],
    rowCount: row.row_count,
    status: row.status,
    revision: row.revision,
    mapping: row.mapping,
    confirmedMapping: row.confirmed_mapping,
    error: row.error,
    retryable: row.retryable,
    failedStage: row.failed_stage,
    lastIngest: row.last_ingest,
    createdAt: row.created_at,
    updatedAt: row.updated_at
  } satisfies Dataset;
}

function toJson(value: unknown): string | null {
  return value === null || value === undefined ? null : JSON.stringify(value);
}

/** Inserts the dataset record, its raw source and every raw row. Run inside a transaction. */
export async function insertDataset(client: PoolClient, input: NewDataset): Promise<Dataset> {
  const id = randomUUID();
  const { rows } = await client.query<DatasetRow>(
    `INSERT INTO datasets (id, project_id, filename, storage_handle, headers, columns, row_count)
     VALUES ($1, $2, $3, $4, $5::jsonb, $6::jsonb, $7)
     RETURNING *`,
    [
      id,
      input.projectId,
      input.filename,
      input.storageHandle,
      JSON.stringify(input.headers),
      JSON.stringify(input.columns),
      input.rows.length
    ]
  );

  await client.query(
    `INSERT INTO raw_sources (dataset_id, headers, row_count) VALUES ($1, $2::jsonb, $3)`,
    [id, JSON.stringify(input.headers), input.rows.length]
  );

  for (let offset = 0; offset < input.rows.length; offset += RAW_INSERT_CHUNK) {
    const chunk = input.rows.slice(offset, offset + RAW_INSERT_CHUNK);
    await client.query(
      `INSERT INTO raw_records (dataset_id, row_number, cells)
       SELECT $1, numbered.row_number, numbered.cells
         FROM unnest($2::int[], $3::jsonb[]) AS numbered(row_number, cells)`,
      [id, chunk.map((_row, index) => offset + index + 1), chunk.map((row) => JSON.stringify(row))]
    );
  }

  return toDataset(rows[0]);
}

export async function fetchDataset(client: PoolClient, datasetId: string): Promise<Dataset | null> {
  const { rows } = await client.query<DatasetRow>('SELECT * FROM datasets WHERE id = $1', [datasetId]);
  return rows.length > 0 ? toDataset(rows[0]) : null;
}

/**
 * Compare-and-set on (status, revision). Fields of the patch left
 * undefined keep their stored value.
 */
export async function transitionDataset(
  client: PoolClient,
  datasetId: string,
  expected: ExpectedState,
  patch: DatasetStatePatch
): Promise<Dataset> {
  const { rows } = await client.query<DatasetRow>(
    `UPDATE datasets
        SET status = $4,
            revision = revision + 1,
            mapping = $5::jsonb,
            error = $6,
            retryable = $7,
            failed_stage = $8,
            confirmed_mapping = CASE WHEN $9::boolean THEN $10::jsonb ELSE confirmed_mapping END,
            last_ingest = CASE WHEN $11::boolean THEN $12::jsonb ELSE last_ingest END,
            updated_at = NOW()
      WHERE id = $1 AND status = $2 AND revision = $3
      RETURNING *`,
    [
      datasetId,
      expected.status,
      expected.revision,
      patch.status,
      toJson(patch.mapping),
      patch.error,
      patch.retryable,
      patch.failedStage,
      patch.confirmedMapping !== undefined,
      toJson(patch.confirmedMapping),
      patch.lastIngest !== undefined,
      toJson(patch.lastIngest)
    ]
  );

  if (rows.length > 0) {
    return toDataset(rows[0]);
  }

  const current = await fetchDataset(client, datasetId);
  throw new StaleTransitionError(
    datasetId,
    { status: expected.status, revision: expected.revision },
    current ? { status: current.status, revision: current.revision } : { status: expected.status, revision: null }
  );
}
