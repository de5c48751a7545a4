import type {
  Dataset,
  ExtraFields,
  IngestSummary,
  MetricCatalogEntry,
  RawRow,
  UnifiedObject,
  UnifiedReading
} from '../db/types';
import type { DatasetStatus, FailedStage } from '../lifecycle/stateMachine';
import type { ColumnMapping, HeaderColumn } from '../mapping/types';

export type NewDataset = {
  projectId: string;
  filename: string;
  storageHandle: string | null;
  headers: string[];
  columns: HeaderColumn[];
  rows: Record<string, string | null>[];
};

/**
 * Target state of a guarded transition. `confirmedMapping` and `lastIngest`
 * are left untouched when undefined.
 */
export type DatasetStatePatch = {
  status: DatasetStatus;
  mapping: ColumnMapping | null;
  error: string | null;
  retryable: boolean;
  failedStage: FailedStage | null;
  confirmedMapping?: ColumnMapping | null;
  lastIngest?: IngestSummary | null;
};

export type ExpectedState = {
  status: DatasetStatus;
  revision: number;
};

export interface DatasetStore {
  /** Persists the dataset record and its raw rows together. */
  create(input: NewDataset): Promise<Dataset>;
  get(datasetId: string): Promise<Dataset | null>;
  /**
   * Compare-and-set on (status, revision). Increments the revision on success,
   * throws StaleTransitionError when the stored state moved on.
   */
  transition(datasetId: string, expected: ExpectedState, patch: DatasetStatePatch): Promise<Dataset>;
}

export interface RawRecordStore {
  readHeaders(datasetId: string): Promise<string[] | null>;
  readSample(datasetId: string, limit: number): Promise<RawRow[]>;
  iterate(datasetId: string, batchSize: number): AsyncIterable<RawRow[]>;
}

export type UnifiedObjectInput = {
  externalId: string;
  name: string;
  latitude: number | null;
  longitude: number | null;
  extra: ExtraFields;
  datasetId: string;
};

export type UnifiedReadingInput = {
  objectId: string;
  metric: string;
  timestamp: Date;
  value: number;
  extra: ExtraFields;
  datasetId: string;
};

export type MetricCatalogInput = {
  key: string;
  label: string;
  unit: string | null;
};

export interface NormalizedWriter {
  /** Upserts by (project, externalId); returns externalId -> object id. */
  upsertObjects(projectId: string, objects: UnifiedObjectInput[]): Promise<Map<string, string>>;
  /** Upserts by (object, metric, timestamp); returns the number of readings written. */
  upsertReadings(projectId: string, readings: UnifiedReadingInput[]): Promise<number>;
  /** Creates catalog entries that do not exist yet. */
  ensureMetrics(projectId: string, metrics: MetricCatalogInput[]): Promise<void>;
}

export type ObjectQuery = {
  externalId?: string;
  limit: number;
  offset: number;
};

export type ReadingQuery = {
  externalId?: string;
  metric?: string;
  from?: Date;
  to?: Date;
  limit: number;
  offset: number;
};

export interface NormalizedStore {
  /** Runs `fn` atomically: every write commits or none does. */
  transaction<T>(fn: (writer: NormalizedWriter) => Promise<T>): Promise<T>;
  listObjects(projectId: string, query: ObjectQuery): Promise<UnifiedObject[]>;
  listReadings(projectId: string, query: ReadingQuery): Promise<UnifiedReading[]>;
  listMetrics(projectId: string): Promise<MetricCatalogEntry[]>;
}

export type IngestStores = {
  datasets: DatasetStore;
  raw: RawRecordStore;
  normalized: NormalizedStore;
};
