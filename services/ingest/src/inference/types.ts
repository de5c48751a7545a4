import type { RawCellValue } from '../db/types';
import type { ColumnMapping } from '../mapping/types';

export const MAX_SAMPLE_ROWS = 10;

export type SampleRow = Record<string, RawCellValue>;

export type ProposalRequest = {
  headers: readonly string[];
  sampleRows: readonly SampleRow[];
};

export type ProviderCallOptions = {
  signal: AbortSignal;
};

/**
 * A capability that guesses a mapping. Providers return the raw proposal;
 * the inference service owns validation and the empty fallback.
 * Throw InferenceUnavailableError when the capability cannot be reached.
 */
export interface MappingInferenceProvider {
  readonly name: string;
  propose(request: ProposalRequest, options: ProviderCallOptions): Promise<unknown>;
}

export type MappingProposal = {
  mapping: ColumnMapping;
  provider: string;
  /** True when the provider answer was unusable and the empty mapping was substituted. */
  fallback: boolean;
  sampledRows: number;
};
