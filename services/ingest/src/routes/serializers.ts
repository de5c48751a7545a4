import type { Dataset, IngestSummary, MetricCatalogEntry, UnifiedObject, UnifiedReading } from '../db/types';
import type { MappingProposal } from '../inference/types';
import type { HeaderColumn, ColumnMapping } from '../mapping/types';
import { isTerminal, type DatasetStatus, type FailedStage } from '../lifecycle/stateMachine';

export type SerializedDataset = {
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
  terminal: boolean;
  failedStage: FailedStage | null;
  lastIngest: IngestSummary | null;
  createdAt: string;
  updatedAt: string;
};

export function serializeDataset(dataset: Dataset): SerializedDataset {
  return {
    id: dataset.id,
    projectId: dataset.projectId,
    filename: dataset.filename,
    storageHandle: dataset.storageHandle,
    headers: dataset.headers,
    columns: dataset.columns,
    rowCount: dataset.rowCount,
    status: dataset.status,
    revision: dataset.revision,
    mapping: dataset.mapping,
    confirmedMapping: dataset.confirmedMapping,
    error: dataset.error,
    retryable: dataset.retryable,
    terminal: isTerminal(dataset),
    failedStage: dataset.failedStage,
    lastIngest: dataset.lastIngest,
    createdAt: dataset.createdAt.toISOString(),
    updatedAt: dataset.updatedAt.toISOString()
  } satisfies SerializedDataset;
}

export function serializeProposal(proposal: MappingProposal) {
  return {
    provider: proposal.provider,
    fallback: proposal.fallback,
    sampledRows: proposal.sampledRows,
    mapping: proposal.mapping
  };
}

export function serializeObject(object: UnifiedObject) {
  return {
    id: object.id,
    projectId: object.projectId,
    externalId: object.externalId,
    name: object.name,
    latitude: object.latitude,
    longitude: object.longitude,
    extra: object.extra,
    sourceDatasetIds: object.sourceDatasetIds,
    createdAt: object.createdAt.toISOString(),
    updatedAt: object.updatedAt.toISOString()
  };
}

export function serializeReading(reading: UnifiedReading) {
  return {
    id: reading.id,
    objectId: reading.objectId,
    externalId: reading.externalId,
    metric: reading.metric,
    timestamp: reading.timestamp.toISOString(),
    value: reading.value,
    extra: reading.extra,
    datasetId: reading.datasetId
  };
}

export function serializeMetric(entry: MetricCatalogEntry) {
  return {
    key: entry.key,
    label: entry.label,
    unit: entry.unit,
    description: entry.description,
    isCore: entry.isCore,
    createdAt: entry.createdAt.toISOString()
  };
}
