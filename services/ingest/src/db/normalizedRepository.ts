import { randomUUID } from 'node:crypto';
import type { PoolClient } from 'pg';
import type {
  MetricCatalogInput,
  ObjectQuery,
  ReadingQuery,
  UnifiedObjectInput,
  UnifiedReadingInput
} from '../stores/types';
import type {
  MetricCatalogEntry,
  MetricCatalogRow,
  UnifiedObject,
  UnifiedObjectRow,
  UnifiedReading,
  UnifiedReadingRow
} from './types';

export type SqlQuery = {
  text: string;
  values: unknown[];
};

function toUnifiedObject(row: UnifiedObjectRow): UnifiedObject {
  return {
    id: row.id,
    projectId: row.project_id,
    externalId: row.external_id,
    name: row.name,
    latitude: row.latitude,
    longitude: row.longitude,
    extra: row.extra ?? {},
    sourceDatasetIds: row.source_dataset_ids ?? [],
    createdAt: row.created_at,
    updatedAt: row.updated_at
  } satisfies UnifiedObject;
}

function toUnifiedReading(row: UnifiedReadingRow): UnifiedReading {
  return {
    id: row.id,
    projectId: row.project_id,
    objectId: row.object_id,
    externalId: row.external_id,
    metric: row.metric_key,
    timestamp: row.observed_at,
    value: row.value,
    extra: row.extra ?? {},
    datasetId: row.dataset_id
  } satisfies UnifiedReading;
}

function toMetricCatalogEntry(row: MetricCatalogRow): MetricCatalogEntry {
  return {
    projectId: row.project_id,
    key: row.metric_key,
    label: row.label,
    unit: row.unit,
    description: row.description,
    isCore: row.is_core,
    createdAt: row.created_at
  } satisfies MetricCatalogEntry;
}

/**
 * Coordinates only overwrite when the new row has them, extra keys are
 * merged, and the contributing dataset is appended once.
 */
export async function upsertObjects(
  client: PoolClient,
  projectId: string,
  objects: UnifiedObjectInput[]
): Promise<Map<string, string>> {
  const ids = new Map<string, string>();
  if (objects.length === 0) {
    return ids;
  }

  const { rows } = await client.query<{ id: string; external_id: string }>(
    `INSERT INTO unified_objects (id, project_id, external_id, name, latitude, longitude, extra, source_dataset_ids)
     SELECT input.id, $1, input.external_id, input.name, input.latitude, input.longitude, input.extra, ARRAY[input.dataset_id]
       FROM unnest($2::uuid[], $3::text[], $4::text[], $5::float8[], $6::float8[], $7::jsonb[], $8::text[])
         AS input(id, external_id, name, latitude, longitude, extra, dataset_id)
     ON CONFLICT (project_id, external_id) DO UPDATE
       SET name = EXCLUDED.name,
           latitude = COALESCE(EXCLUDED.latitude, unified_objects.latitude),
           longitude = COALESCE(EXCLUDED.longitude, unified_objects.longitude),
           extra = unified_objects.extra || EXCLUDED.extra,
           source_dataset_ids = CASE
             WHEN EXCLUDED.source_dataset_ids[1] = ANY(unified_objects.source_dataset_ids)
               THEN unified_objects.source_dataset_ids
             ELSE unified_objects.source_dataset_ids || EXCLUDED.source_dataset_ids
           END,
           updated_at = NOW()
     RETURNING id, external_id`,
    [
      projectId,
      objects.map(() => randomUUID()),
      objects.map((object) => object.externalId),
      objects.map((object) => object.name),
      objects.map((object) => object.latitude),
      objects.map((object) => object.longitude),
      objects.map((object) => JSON.stringify(object.extra)),
      objects.map((object) => object.datasetId)
    ]
  );

  for (const row of rows) {
    ids.set(row.external_id, row.id);
  }
  return ids;
}

export async function upsertReadings(
  client: PoolClient,
  projectId: string,
  readings: UnifiedReadingInput[]
): Promise<number> {
  if (readings.length === 0) {
    return 0;
  }

  const result = await client.query(
    `INSERT INTO unified_readings (project_id, object_id, metric_key, observed_at, value, extra, dataset_id)
     SELECT $1, input.object_id, input.metric_key, input.observed_at, input.value, input.extra, input.dataset_id
       FROM unnest($2::uuid[], $3::text[], $4::timestamptz[], $5::float8[], $6::jsonb[], $7::uuid[])
         AS input(object_id, metric_key, observed_at, value, extra, dataset_id)
     ON CONFLICT (object_id, metric_key, observed_at) DO UPDATE
       SET value = EXCLUDED.value,
           extra = EXCLUDED.extra,
           dataset_id = EXCLUDED.dataset_id`,
    [
      projectId,
      readings.map((reading) => reading.objectId),
      readings.map((reading) => reading.metric),
      readings.map((reading) => reading.timestamp.toISOString()),
      readings.map((reading) => reading.value),
      readings.map((reading) => JSON.stringify(reading.extra)),
      readings.map((reading) => reading.datasetId)
    ]
  );
  return result.rowCount ?? 0;
}

export async function insertMissingMetrics(
  client: PoolClient,
  projectId: string,
  metrics: MetricCatalogInput[]
): Promise<void> {
  if (metrics.length === 0) {
    return;
  }
  await client.query(
    `INSERT INTO metric_catalog (project_id, metric_key, label, unit)
     SELECT $1, input.metric_key, input.label, input.unit
       FROM unnest($2::text[], $3::text[], $4::text[]) AS input(metric_key, label, unit)
     ON CONFLICT (project_id, metric_key) DO NOTHING`,
    [
      projectId,
      metrics.map((metric) => metric.key),
      metrics.map((metric) => metric.label),
      metrics.map((metric) => metric.unit)
    ]
  );
}

export function buildObjectsQuery(projectId: string, query: ObjectQuery): SqlQuery {
  const values: unknown[] = [projectId];
  const conditions = ['project_id = $1'];
  if (query.externalId) {
    values.push(query.externalId);
    conditions.push(`external_id = $${values.length}`);
  }
  values.push(query.limit, query.offset);
  return {
    text: `SELECT * FROM unified_objects WHERE ${conditions.join(' AND ')} ORDER BY external_id LIMIT $${values.length - 1} OFFSET $${values.length}`,
    values
  };
}

export function buildReadingsQuery(projectId: string, query: ReadingQuery): SqlQuery {
  const values: unknown[] = [projectId];
  const conditions = ['r.project_id = $1'];
  if (query.externalId) {
    values.push(query.externalId);
    conditions.push(`o.external_id = $${values.length}`);
  }
  if (query.metric) {
    values.push(query.metric);
    conditions.push(`r.metric_key = $${values.length}`);
  }
  if (query.from) {
    values.push(query.from.toISOString());
    conditions.push(`r.observed_at >= $${values.length}`);
  }
  if (query.to) {
    values.push(query.to.toISOString());
    conditions.push(`r.observed_at < $${values.length}`);
  }
  values.push(query.limit, query.offset);
  return {
    text:
      'SELECT r.id, r.project_id, r.object_id, o.external_id, r.metric_key, r.observed_at, r.value, r.extra, r.dataset_id ' +
      'FROM unified_readings r JOIN unified_objects o ON o.id = r.object_id ' +
      `WHERE ${conditions.join(' AND ')} ORDER BY r.observed_at, r.id LIMIT $${values.length - 1} OFFSET $${values.length}`,
    values
  };
}

export async function listObjects(client: PoolClient, projectId: string, query: ObjectQuery): Promise<UnifiedObject[]> {
  const { text, values } = buildObjectsQuery(projectId, query);
  const { rows } = await client.query<UnifiedObjectRow>(text, values);
  return rows.map(toUnifiedObject);
}

export async function listReadings(client: PoolClient, projectId: string, query: ReadingQuery): Promise<UnifiedReading[]> {
  const { text, values } = buildReadingsQuery(projectId, query);
  const { rows } = await client.query<UnifiedReadingRow>(text, values);
  return rows.map(toUnifiedReading);
}

export async function listMetrics(client: PoolClient, projectId: string): Promise<MetricCatalogEntry[]> {
  const { rows } = await client.query<MetricCatalogRow>(
    'SELECT * FROM metric_catalog WHERE project_id = $1 ORDER BY metric_key',
    [projectId]
  );
  return rows.map(toMetricCatalogEntry);
}
