import type { PoolClient } from 'pg';
import type { RawRecordRow, RawRow } from './types';

function toRawRow(row: RawRecordRow): RawRow {
  return {
    rowNumber: row.row_number,
    values: row.cells ?? {}
  } satisfies RawRow;
}

export async function fetchRawHeaders(client: PoolClient, datasetId: string): Promise<string[] | null> {
  const { rows } = await client.query<{ headers: string[] | null }>(
    'SELECT headers FROM raw_sources WHERE dataset_id = $1',
    [datasetId]
  );
  if (rows.length === 0 || !Array.isArray(rows[0].headers)) {
    return null;
  }
  return rows[0].headers;
}

/** Rows after `afterRowNumber`, in row order. */
export async function fetchRawPage(
  client: PoolClient,
  datasetId: string,
  afterRowNumber: number,
  limit: number
): Promise<RawRow[]> {
  const { rows } = await client.query<RawRecordRow>(
    `SELECT dataset_id, row_number, cells
       FROM raw_records
      WHERE dataset_id = $1 AND row_number > $2
      ORDER BY row_number
      LIMIT $3`,
    [datasetId, afterRowNumber, limit]
  );
  return rows.map(toRawRow);
}
