import { InvalidTransitionError } from '../errors/ingestErrors';

export const DATASET_STATUSES = [
  'UPLOADED',
  'ANALYZING',
  'ANALYZED',
  'CONFIRMED',
  'INGESTING',
  'INGESTED',
  'FAILED'
] as const;

export type DatasetStatus = (typeof DATASET_STATUSES)[number];

/** Stage a dataset was in when it failed; decides what a retry re-drives. */
export type FailedStage = 'ANALYZING' | 'ANALYZED' | 'CONFIRMED' | 'INGESTING';

const TRANSITIONS: Record<DatasetStatus, readonly DatasetStatus[]> = {
  UPLOADED: ['ANALYZING'],
  ANALYZING: ['ANALYZED', 'FAILED'],
  ANALYZED: ['ANALYZING', 'CONFIRMED', 'FAILED'],
  CONFIRMED: ['INGESTING', 'FAILED'],
  INGESTING: ['INGESTED', 'FAILED'],
  INGESTED: [],
  FAILED: ['ANALYZING', 'INGESTING']
};

export type DatasetStateSnapshot = {
  status: DatasetStatus;
  retryable: boolean;
};

/**
 * FAILED may only be left when the failure was retryable; a permanent
 * failure is terminal just like INGESTED.
 */
export function canTransition(from: DatasetStateSnapshot, to: DatasetStatus): boolean {
  if (from.status === 'FAILED' && !from.retryable) {
    return false;
  }
  return TRANSITIONS[from.status].includes(to);
}

export function assertTransition(from: DatasetStateSnapshot, to: DatasetStatus): void {
  if (!canTransition(from, to)) {
    throw new InvalidTransitionError(from.status, to);
  }
}

export function isTerminal(state: DatasetStateSnapshot): boolean {
  if (state.status === 'FAILED') {
    return !state.retryable;
  }
  return TRANSITIONS[state.status].length === 0;
}
