import type { DatasetStatus } from '../lifecycle/stateMachine';

export type ValidationIssue = {
  field: string;
  code: 'invalid_shape' | 'unknown_column' | 'duplicate_column' | 'insufficient_roles';
  message: string;
};

export class MappingValidationError extends Error {
  constructor(
    message: string,
    public readonly issues: ValidationIssue[]
  ) {
    super(message);
    this.name = 'MappingValidationError';
  }
}

export class InferenceUnavailableError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'InferenceUnavailableError';
  }
}

export type TransitionPosition = {
  status: DatasetStatus;
  revision: number | null;
};

export class StaleTransitionError extends Error {
  constructor(
    public readonly datasetId: string,
    public readonly expected: TransitionPosition,
    public readonly actual: TransitionPosition
  ) {
    super(
      `Dataset ${datasetId} moved to ${actual.status} (revision ${actual.revision ?? 'unknown'}) ` +
        `while a transition from ${expected.status} was requested`
    );
    this.name = 'StaleTransitionError';
  }
}

export class InvalidTransitionError extends Error {
  constructor(
    public readonly from: DatasetStatus,
    public readonly to: DatasetStatus
  ) {
    super(`Dataset cannot move from ${from} to ${to}`);
    this.name = 'InvalidTransitionError';
  }
}

export type IngestErrorCode =
  | 'mapping_drift'
  | 'rejection_threshold_exceeded'
  | 'cancelled'
  | 'storage_unavailable'
  | 'metric_name_unresolved';

const RETRYABLE_INGEST_CODES = new Set<IngestErrorCode>([
  'mapping_drift',
  'rejection_threshold_exceeded',
  'cancelled',
  'storage_unavailable'
]);

export class IngestError extends Error {
  public readonly retryable: boolean;
  public readonly details: unknown;

  constructor(
    public readonly code: IngestErrorCode,
    message: string,
    options?: { cause?: unknown; details?: unknown }
  ) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'IngestError';
    this.retryable = RETRYABLE_INGEST_CODES.has(code);
    this.details = options?.details;
  }
}

export class DatasetNotFoundError extends Error {
  constructor(public readonly datasetId: string) {
    super(`Dataset ${datasetId} not found`);
    this.name = 'DatasetNotFoundError';
  }
}

export class RetryNotAllowedError extends Error {
  constructor(
    public readonly datasetId: string,
    message: string
  ) {
    super(message);
    this.name = 'RetryNotAllowedError';
  }
}

export class InvalidUploadError extends Error {
  constructor(
    message: string,
    public readonly problems: { problem: string; header?: string }[] = []
  ) {
    super(message);
    this.name = 'InvalidUploadError';
  }
}

/** The raw rows behind a dataset are gone or empty; the dataset can never be analyzed. */
export class RawSourceMissingError extends Error {
  constructor(public readonly datasetId: string) {
    super(`Raw records for dataset ${datasetId} are missing or empty`);
    this.name = 'RawSourceMissingError';
  }
}
