import type { FastifyBaseLogger } from 'fastify';
import { InferenceUnavailableError } from '../errors/ingestErrors';
import {
  CANONICAL_ROLES,
  columnMappingInputSchema,
  compactRoles,
  createEmptyMapping,
  type ColumnCategory,
  type ColumnMapping
} from '../mapping/types';
import { ownValue } from '../mapping/columns';
import {
  MAX_SAMPLE_ROWS,
  type MappingInferenceProvider,
  type MappingProposal,
  type ProposalRequest,
  type SampleRow
} from './types';

export type MappingInferenceServiceDependencies = {
  provider: MappingInferenceProvider;
  timeoutMs: number;
  /** Default rowLimit; never above MAX_SAMPLE_ROWS. */
  sampleRows: number;
};

export type ProposeInput = {
  headers: readonly string[];
  sampleRows: readonly SampleRow[];
  rowLimit?: number;
  logger?: Pick<FastifyBaseLogger, 'warn' | 'debug'>;
};

export function clampRowLimit(value: number | undefined, fallback: number): number {
  const candidate = value === undefined || !Number.isFinite(value) ? fallback : Math.trunc(value);
  return Math.min(Math.max(candidate, 0), MAX_SAMPLE_ROWS);
}

/**
 * Brings an arbitrary provider answer into the mapping shape for these
 * headers: unknown columns and roles sharing a column are dropped, every
 * other header is classified, unset roles get confidence 0. Returns null
 * when the answer is not a mapping at all.
 */
export function sanitizeProposal(raw: unknown, headers: readonly string[]): ColumnMapping | null {
  const parsed = columnMappingInputSchema.safeParse(raw);
  if (!parsed.success) {
    return null;
  }

  const headerSet = new Set(headers);
  const proposedRoles = compactRoles(parsed.data.roles);
  const roles: ColumnMapping['roles'] = {};
  const confidence: ColumnMapping['confidence'] = {};
  const claimed = new Set<string>();

  for (const role of CANONICAL_ROLES) {
    const column = proposedRoles[role];
    if (column && headerSet.has(column) && !claimed.has(column)) {
      roles[role] = column;
      claimed.add(column);
      confidence[role] = parsed.data.confidence[role] ?? 0;
    } else {
      confidence[role] = 0;
    }
  }

  const columns = new Map<string, ColumnCategory>();
  for (const header of headers) {
    if (!claimed.has(header)) {
      columns.set(header, ownValue(parsed.data.columns, header) ?? 'TEXT');
    }
  }

  return { roles, columns: Object.fromEntries(columns), confidence, metricName: parsed.data.metricName ?? null };
}

export function createMappingInferenceService(deps: MappingInferenceServiceDependencies) {
  const { provider } = deps;

  async function callProvider(request: ProposalRequest): Promise<unknown> {
    const controller = new AbortController();
    // Providers that ignore the signal are still cut off by the race below.
    const timedOut = new Promise<never>((_resolve, reject) => {
      controller.signal.addEventListener(
        'abort',
        () =>
          reject(
            new InferenceUnavailableError(`Mapping inference (${provider.name}) timed out after ${deps.timeoutMs}ms`)
          ),
        { once: true }
      );
    });
    const timeout = setTimeout(() => controller.abort(), deps.timeoutMs);
    try {
      return await Promise.race([provider.propose(request, { signal: controller.signal }), timedOut]);
    } catch (err) {
      if (err instanceof InferenceUnavailableError) {
        throw err;
      }
      throw new InferenceUnavailableError(`Mapping inference (${provider.name}) failed`, { cause: err });
    } finally {
      clearTimeout(timeout);
    }
  }

  /**
   * Proposes a mapping. Reads at most rowLimit sample rows, mutates nothing,
   * and answers with the empty mapping when the provider's answer is
   * unusable. Throws InferenceUnavailableError only when the provider
   * cannot be reached or does not answer in time.
   */
  async function propose(input: ProposeInput): Promise<MappingProposal> {
    const rowLimit = clampRowLimit(input.rowLimit, deps.sampleRows);
    const sampleRows = input.sampleRows.slice(0, rowLimit);

    const raw = await callProvider({ headers: input.headers, sampleRows });
    const mapping = sanitizeProposal(raw, input.headers);
    if (!mapping) {
      input.logger?.warn({ provider: provider.name }, 'mapping inference returned no usable proposal');
      return {
        mapping: createEmptyMapping(input.headers),
        provider: provider.name,
        fallback: true,
        sampledRows: sampleRows.length
      };
    }

    input.logger?.debug({ provider: provider.name, roles: mapping.roles }, 'mapping proposal received');
    return { mapping, provider: provider.name, fallback: false, sampledRows: sampleRows.length };
  }

  return { propose, providerName: provider.name };
}

export type MappingInferenceService = ReturnType<typeof createMappingInferenceService>;
