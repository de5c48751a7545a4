import type { DatasetStatus, FailedStage } from '../lifecycle/stateMachine';
import type { ColumnMapping, HeaderColumn, IngestionMode } from '../mapping/types';

export type ExtraValue = string | number | null;

export type ExtraFields = Record<string, ExtraValue>;

export type RowRejection = {
  /** 1-based data row number, header excluded. */
  row: number;
  column: string | null;
  reason: string;
  /** `row` when nothing was written for the row, `reading` when only the reading was dropped. */
  scope: 'row' | 'reading';
};

export type IngestSummary = {
  mode: IngestionMode;
  entitiesWritten: number;
  readingsWritten: number;
  rowsProcessed: number;
  rowsRejected: number;
  rowsWithoutOutput: number;
  rejections: RowRejection[];
  additionalRejections: number;
  message: string | null;
  completedAt: string;
};

export type Dataset = {
  id: string;
  projectId: string;
  filename: string;
  storageHandle: string | null;
  headers: string[];
  columns: HeaderColumn[];
  rowCount: number;
  status: DatasetStatus;
  revision: number;
  mapping: ColumnMapping | null;
  confirmedMapping: ColumnMapping | null;
  error: string | null;
  retryable: boolean;
  failedStage: FailedStage | null;
  lastIngest: IngestSummary | null;
  createdAt: Date;
  updatedAt: Date;
};

export type DatasetRow = {
  id: string;
  project_id: string;
  filename: string;
  storage_handle: string | null;
  headers: string[];
  columns: HeaderColumn[];
  row_count: number;
  status: DatasetStatus;
  revision: number;
  mapping: ColumnMapping | null;
  confirmed_mapping: ColumnMapping | null;
  error: string | null;
  retryable: boolean;
  failed_stage: FailedStage | null;
  last_ingest: IngestSummary | null;
  created_at: Date;
  updated_at: Date;
};

export type RawCellValue = string | null;

export type RawRow = {
  rowNumber: number;
  values: Record<string, RawCellValue>;
};

export type RawRecordRow = {
  dataset_id: string;
  row_number: number;
  cells: Record<string, RawCellValue>;
};

export type UnifiedObject = {
  id: string;
  projectId: string;
  externalId: string;
  name: string;
  latitude: number | null;
  longitude: number | null;
  extra: ExtraFields;
  sourceDatasetIds: string[];
  createdAt: Date;
  updatedAt: Date;
};

export type UnifiedObjectRow = {
  id: string;
  project_id: string;
  external_id: string;
  name: string;
  latitude: number | null;
  longitude: number | null;
  extra: ExtraFields | null;
  source_dataset_ids: string[] | null;
  created_at: Date;
  updated_at: Date;
};

export type UnifiedReading = {
  id: number;
  projectId: string;
  objectId: string;
  externalId: string;
  metric: string;
  timestamp: Date;
  value: number;
  extra: ExtraFields;
  datasetId: string | null;
};

export type UnifiedReadingRow = {
  id: number;
  project_id: string;
  object_id: string;
  external_id: string;
  metric_key: string;
  observed_at: Date;
  value: number;
  extra: ExtraFields | null;
  dataset_id: string | null;
};

export type MetricCatalogEntry = {
  projectId: string;
  key: string;
  label: string;
  unit: string | null;
  description: string;
  isCore: boolean;
  createdAt: Date;
};

export type MetricCatalogRow = {
  project_id: string;
  metric_key: string;
  label: string;
  unit: string | null;
  description: string;
  is_core: boolean;
  created_at: Date;
};
