import type { Dataset, ExtraFields, ExtraValue, IngestSummary, RawCellValue, RawRow, RowRejection } from '../db/types';
import { IngestError } from '../errors/ingestErrors';
import { ownValue } from '../mapping/columns';
import type { ColumnMapping, IngestionMode } from '../mapping/types';
import { validateMapping } from '../mapping/validation';
import type {
  MetricCatalogInput,
  NormalizedStore,
  NormalizedWriter,
  UnifiedObjectInput,
  UnifiedReadingInput
} from '../stores/types';
import { coerceExtraValue, isBlankCell, parseCoordinate, parseMetricValue } from './cellParsers';
import { synthesizeEntityId } from './identity';
import { describeMetric } from './metricCatalog';
import { parseTimestamp, type TimestampFormat } from './timestamps';

export type EtlPolicy = {
  batchSize: number;
  maxRowErrors: number;
  /** Fraction of rows that produced nothing at which the whole ingestion fails. */
  rejectionThreshold: number;
  timestampFormats: readonly TimestampFormat[];
};

export type IngestRequest = {
  dataset: Pick<Dataset, 'id' | 'projectId'>;
  mapping: ColumnMapping;
  /** Headers of the raw source as they are now, not as they were at confirmation. */
  headers: readonly string[];
  rows: AsyncIterable<RawRow[]> | Iterable<RawRow[]>;
  signal?: AbortSignal;
};

export type IngestResult = IngestSummary;

type ObjectDraft = Omit<UnifiedObjectInput, 'datasetId'>;

type ReadingDraft = {
  externalId: string;
  metric: MetricCatalogInput;
  timestamp: Date;
  value: number;
  extra: ExtraFields;
};

type RowOutcome = {
  object: ObjectDraft | null;
  reading: ReadingDraft | null;
  rejection: RowRejection | null;
};

type RowContext = {
  mapping: ColumnMapping;
  mode: IngestionMode;
  defaultMetric: MetricCatalogInput | null;
  timestampFormats: readonly TimestampFormat[];
};

class RejectionLog {
  readonly entries: RowRejection[] = [];
  additional = 0;
  rowsRejected = 0;
  rowsWithoutOutput = 0;

  constructor(
    private readonly cap: number,
    private readonly mode: IngestionMode
  ) {}

  /**
   * Entity mappings produce output as long as the object is written. Mappings
   * that read time series only produce output when the reading survives.
   */
  record(rejection: RowRejection): void {
    this.rowsRejected += 1;
    if (rejection.scope === 'row' || this.mode !== 'entity') {
      this.rowsWithoutOutput += 1;
    }
    if (this.entries.length < this.cap) {
      this.entries.push(rejection);
    } else {
      this.additional += 1;
    }
  }

  summary(): string | null {
    return this.additional > 0 ? `${this.additional} additional rows rejected` : null;
  }
}

function rejectRow(row: RawRow, column: string | null, reason: string, scope: RowRejection['scope']): RowRejection {
  return { row: row.rowNumber, column, reason, scope };
}

function cellOf(row: RawRow, column: string): RawCellValue | undefined {
  return ownValue(row.values, column);
}

function collectExtra(row: RawRow, mapping: ColumnMapping): ExtraFields {
  const extra = new Map<string, ExtraValue>();
  for (const [column, category] of Object.entries(mapping.columns)) {
    if (category === 'IGNORED') {
      continue;
    }
    extra.set(column, coerceExtraValue(cellOf(row, column)));
  }
  return Object.fromEntries(extra);
}

export function normalizeRow(row: RawRow, context: RowContext): RowOutcome {
  const { roles } = context.mapping;

  let latitude: number | null = null;
  let longitude: number | null = null;
  if (roles.LATITUDE) {
    const parsed = parseCoordinate(cellOf(row, roles.LATITUDE), 'latitude');
    if (!parsed.ok) {
      return { object: null, reading: null, rejection: rejectRow(row, roles.LATITUDE, parsed.reason, 'row') };
    }
    latitude = parsed.value;
  }
  if (roles.LONGITUDE) {
    const parsed = parseCoordinate(cellOf(row, roles.LONGITUDE), 'longitude');
    if (!parsed.ok) {
      return { object: null, reading: null, rejection: rejectRow(row, roles.LONGITUDE, parsed.reason, 'row') };
    }
    longitude = parsed.value;
  }

  const entityCell = roles.ENTITY_ID ? cellOf(row, roles.ENTITY_ID) : null;
  let externalId: string;
  if (!isBlankCell(entityCell) && entityCell) {
    externalId = entityCell.trim();
  } else if (latitude !== null && longitude !== null) {
    externalId = synthesizeEntityId(latitude, longitude);
  } else {
    return {
      object: null,
      reading: null,
      rejection: rejectRow(row, roles.ENTITY_ID ?? null, 'row has neither an entity identifier nor coordinates', 'row')
    };
  }

  const extra = collectExtra(row, context.mapping);
  const object: ObjectDraft = { externalId, name: externalId, latitude, longitude, extra };

  // A mapped TIMESTAMP or METRIC_VALUE is checked even when the mapping only
  // supports entity ingestion; the entity is kept either way.
  let timestamp: Date | null = null;
  if (roles.TIMESTAMP) {
    const parsed = parseTimestamp(cellOf(row, roles.TIMESTAMP), context.timestampFormats);
    if (!parsed.ok) {
      return { object, reading: null, rejection: rejectRow(row, roles.TIMESTAMP, parsed.reason, 'reading') };
    }
    timestamp = parsed.value;
  }

  let value: number | null = null;
  if (roles.METRIC_VALUE) {
    const parsed = parseMetricValue(cellOf(row, roles.METRIC_VALUE));
    if (!parsed.ok) {
      return { object, reading: null, rejection: rejectRow(row, roles.METRIC_VALUE, parsed.reason, 'reading') };
    }
    value = parsed.value;
  }

  if (context.mode === 'entity' || timestamp === null || value === null) {
    return { object, reading: null, rejection: null };
  }

  let metric = context.defaultMetric;
  if (roles.METRIC_NAME) {
    const cell = cellOf(row, roles.METRIC_NAME);
    metric = cell && !isBlankCell(cell) ? describeMetric(cell) : context.defaultMetric;
  }
  if (!metric) {
    return {
      object,
      reading: null,
      rejection: rejectRow(row, roles.METRIC_NAME ?? null, 'metric name is empty', 'reading')
    };
  }

  return {
    object,
    reading: { externalId, metric, timestamp, value, extra },
    rejection: null
  };
}

function resolveDefaultMetric(mapping: ColumnMapping, mode: IngestionMode): MetricCatalogInput | null {
  if (mode === 'entity') {
    return null;
  }
  const declared = mapping.metricName ?? mapping.roles.METRIC_VALUE ?? null;
  const metric = declared ? describeMetric(declared) : null;
  if (!metric && !mapping.roles.METRIC_NAME) {
    throw new IngestError(
      'metric_name_unresolved',
      'No METRIC_NAME column is mapped and no usable metric name was declared'
    );
  }
  return metric;
}

async function* toAsync(rows: AsyncIterable<RawRow[]> | Iterable<RawRow[]>): AsyncIterable<RawRow[]> {
  yield* rows;
}

/**
 * Folds a later row for the same entity into an earlier one with the same
 * precedence the store applies to repeated upserts: the later name and
 * coordinates win, missing coordinates keep the earlier ones, extra keys merge.
 */
function mergeOccurrence(earlier: ObjectDraft, later: ObjectDraft): ObjectDraft {
  return {
    externalId: later.externalId,
    name: later.name,
    latitude: later.latitude ?? earlier.latitude,
    longitude: later.longitude ?? earlier.longitude,
    extra: { ...earlier.extra, ...later.extra }
  };
}

function readingKey(reading: Pick<UnifiedReadingInput, 'objectId' | 'metric' | 'timestamp'>): string {
  return `${reading.objectId}\u0000${reading.metric}\u0000${reading.timestamp.toISOString()}`;
}

export type EtlEngineDependencies = {
  store: NormalizedStore;
  policy: EtlPolicy;
  clock?: { now: () => Date };
};

export function createEtlEngine(deps: EtlEngineDependencies) {
  const { store, policy } = deps;
  const now = deps.clock?.now ?? (() => new Date());

  async function writeBatch(
    writer: NormalizedWriter,
    request: IngestRequest,
    outcomes: RowOutcome[],
    state: { objectIds: Map<string, string>; metrics: Set<string>; readingKeys: Set<string> }
  ): Promise<void> {
    const { projectId, id: datasetId } = request.dataset;

    const pendingObjects = new Map<string, UnifiedObjectInput>();
    for (const outcome of outcomes) {
      const object = outcome.object;
      if (!object) {
        continue;
      }
      const earlier = pendingObjects.get(object.externalId);
      pendingObjects.set(object.externalId, { ...(earlier ? mergeOccurrence(earlier, object) : object), datasetId });
    }
    if (pendingObjects.size > 0) {
      const ids = await writer.upsertObjects(projectId, Array.from(pendingObjects.values()));
      for (const [externalId, objectId] of ids) {
        state.objectIds.set(externalId, objectId);
      }
    }

    const pendingMetrics = new Map<string, MetricCatalogInput>();
    const pendingReadings = new Map<string, UnifiedReadingInput>();
    for (const outcome of outcomes) {
      const reading = outcome.reading;
      if (!reading) {
        continue;
      }
      const objectId = state.objectIds.get(reading.externalId);
      if (!objectId) {
        throw new IngestError('storage_unavailable', `Entity ${reading.externalId} was not returned by the store`);
      }
      if (!state.metrics.has(reading.metric.key)) {
        pendingMetrics.set(reading.metric.key, reading.metric);
      }
      const input: UnifiedReadingInput = {
        objectId,
        metric: reading.metric.key,
        timestamp: reading.timestamp,
        value: reading.value,
        extra: reading.extra,
        datasetId
      };
      // Last row wins when a batch repeats (entity, metric, timestamp).
      pendingReadings.set(readingKey(input), input);
    }

    if (pendingMetrics.size > 0) {
      await writer.ensureMetrics(projectId, Array.from(pendingMetrics.values()));
      for (const key of pendingMetrics.keys()) {
        state.metrics.add(key);
      }
    }
    if (pendingReadings.size > 0) {
      await writer.upsertReadings(projectId, Array.from(pendingReadings.values()));
      for (const key of pendingReadings.keys()) {
        state.readingKeys.add(key);
      }
    }
  }

  async function ingest(request: IngestRequest): Promise<IngestResult> {
    const validation = validateMapping(request.mapping, request.headers);
    if (!validation.ok) {
      throw new IngestError(
        'mapping_drift',
        'The confirmed mapping no longer matches the dataset headers',
        { details: validation.error.issues }
      );
    }

    const { mapping, mode } = validation;
    const context: RowContext = {
      mapping,
      mode,
      defaultMetric: resolveDefaultMetric(mapping, mode),
      timestampFormats: policy.timestampFormats
    };
    const rejections = new RejectionLog(policy.maxRowErrors, mode);
    const state = {
      objectIds: new Map<string, string>(),
      metrics: new Set<string>(),
      readingKeys: new Set<string>()
    };
    let rowsProcessed = 0;

    try {
      await store.transaction(async (writer) => {
        for await (const batch of toAsync(request.rows)) {
          if (request.signal?.aborted) {
            throw new IngestError('cancelled', 'Ingestion was cancelled before completion');
          }

          const outcomes = batch.map((row) => normalizeRow(row, context));
          for (const outcome of outcomes) {
            if (outcome.rejection) {
              rejections.record(outcome.rejection);
            }
          }
          rowsProcessed += batch.length;

          await writeBatch(writer, request, outcomes, state);
        }

        if (rowsProcessed > 0 && rejections.rowsWithoutOutput / rowsProcessed >= policy.rejectionThreshold) {
          throw new IngestError(
            'rejection_threshold_exceeded',
            `${rejections.rowsWithoutOutput} of ${rowsProcessed} rows were rejected`,
            { details: { rejections: rejections.entries, additionalRejections: rejections.additional } }
          );
        }
      });
    } catch (err) {
      if (err instanceof IngestError) {
        throw err;
      }
      const message = err instanceof Error ? err.message : 'Unknown storage failure';
      throw new IngestError('storage_unavailable', `Normalized store failed: ${message}`, { cause: err });
    }

    return {
      mode,
      entitiesWritten: state.objectIds.size,
      readingsWritten: state.readingKeys.size,
      rowsProcessed,
      rowsRejected: rejections.rowsRejected,
      rowsWithoutOutput: rejections.rowsWithoutOutput,
      rejections: rejections.entries,
      additionalRejections: rejections.additional,
      message: rejections.summary(),
      completedAt: now().toISOString()
    } satisfies IngestResult;
  }

  return { ingest };
}

export type EtlEngine = ReturnType<typeof createEtlEngine>;
