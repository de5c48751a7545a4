import type { FastifyBaseLogger } from 'fastify';
import type { Dataset, RawRow } from '../db/types';
import {
  DatasetNotFoundError,
  IngestError,
  InferenceUnavailableError,
  InvalidUploadError,
  RawSourceMissingError,
  RetryNotAllowedError,
  StaleTransitionError
} from '../errors/ingestErrors';
import type { EtlEngine, IngestResult } from '../etl/engine';
import type { MappingInferenceService } from '../inference/service';
import { MAX_SAMPLE_ROWS, type MappingProposal } from '../inference/types';
import { describeColumns, findHeaderProblems } from '../mapping/columns';
import type { ColumnMapping } from '../mapping/types';
import { assertValidMapping } from '../mapping/validation';
import type { DatasetStatePatch, IngestStores } from '../stores/types';
import { assertTransition, type DatasetStatus, type FailedStage } from './stateMachine';

export type OperationContext = {
  actor: string | null;
  logger: FastifyBaseLogger;
  /** Aborts a running ingestion between row batches. */
  signal?: AbortSignal;
};

export type LifecycleObserver = {
  onTransition(from: DatasetStatus, to: DatasetStatus): void;
  onIngested(result: IngestResult): void;
};

export type UploadInput = {
  projectId: string;
  filename: string;
  storageHandle?: string | null;
  headers: string[];
  rows: Record<string, string | null>[];
};

export type AnalyzeOptions = {
  expectedRevision?: number;
  rowLimit?: number;
};

export type ConfirmInput = {
  mapping: unknown;
  metricName?: string | null;
  expectedRevision?: number;
};

export type RetryTarget = 'analyze' | 'ingest';

export type RetryOptions = {
  target?: RetryTarget;
  expectedRevision?: number;
};

export type AnalyzeOutcome = {
  dataset: Dataset;
  proposal: MappingProposal;
};

export type IngestOutcome = {
  dataset: Dataset;
  result: IngestResult;
};

export type RetryOutcome =
  | ({ target: 'analyze' } & AnalyzeOutcome)
  | ({ target: 'ingest' } & IngestOutcome);

export type DatasetControllerDependencies = {
  stores: IngestStores;
  inference: MappingInferenceService;
  engine: EtlEngine;
  batchSize: number;
  /** Age after which an ANALYZING or INGESTING dataset is treated as abandoned. */
  staleAfterMs: number;
  observer?: LifecycleObserver;
  clock?: { now: () => Date };
};

const CLEARED_FAILURE = {
  error: null,
  retryable: false,
  failedStage: null
} as const;

function mappingWithMetricName(mapping: unknown, metricName: string | null | undefined): unknown {
  if (metricName === undefined || mapping === null || typeof mapping !== 'object' || Array.isArray(mapping)) {
    return mapping;
  }
  return { ...mapping, metricName };
}

function describeError(err: unknown): string {
  return err instanceof Error ? err.message : 'Unknown error';
}

export function defaultRetryTarget(dataset: Pick<Dataset, 'failedStage' | 'confirmedMapping'>): RetryTarget {
  if ((dataset.failedStage === 'INGESTING' || dataset.failedStage === 'CONFIRMED') && dataset.confirmedMapping) {
    return 'ingest';
  }
  return 'analyze';
}

/**
 * Single writer of dataset status. Every change goes through a
 * compare-and-set on (status, revision); a caller that lost a race gets
 * StaleTransitionError and is expected to re-read the dataset.
 */
export function createDatasetController(deps: DatasetControllerDependencies) {
  const { stores, inference, engine } = deps;
  const now = deps.clock?.now ?? (() => new Date());

  async function load(datasetId: string): Promise<Dataset> {
    const dataset = await stores.datasets.get(datasetId);
    if (!dataset) {
      throw new DatasetNotFoundError(datasetId);
    }
    return dataset;
  }

  function checkRevision(dataset: Dataset, expectedRevision: number | undefined): void {
    if (expectedRevision !== undefined && expectedRevision !== dataset.revision) {
      throw new StaleTransitionError(
        dataset.id,
        { status: dataset.status, revision: expectedRevision },
        { status: dataset.status, revision: dataset.revision }
      );
    }
  }

  async function transition(
    dataset: Dataset,
    patch: DatasetStatePatch,
    context: OperationContext
  ): Promise<Dataset> {
    assertTransition(dataset, patch.status);
    const next = await stores.datasets.transition(
      dataset.id,
      { status: dataset.status, revision: dataset.revision },
      patch
    );
    context.logger.info(
      { datasetId: dataset.id, from: dataset.status, to: next.status, revision: next.revision, actor: context.actor },
      'dataset transitioned'
    );
    deps.observer?.onTransition(dataset.status, next.status);
    return next;
  }

  /**
   * Records a failure and hands the original error back to the caller. A
   * failure that cannot be recorded because the dataset moved on is logged;
   * the original error still wins.
   */
  async function recordFailure(
    dataset: Dataset,
    failedStage: FailedStage,
    err: unknown,
    retryable: boolean,
    context: OperationContext
  ): Promise<never> {
    try {
      await transition(
        dataset,
        {
          status: 'FAILED',
          mapping: null,
          error: describeError(err),
          retryable,
          failedStage
        },
        context
      );
    } catch (recordErr) {
      context.logger.error(
        { err: recordErr, datasetId: dataset.id, cause: describeError(err) },
        'failed to record dataset failure'
      );
    }
    throw err;
  }

  async function upload(input: UploadInput, context: OperationContext): Promise<Dataset> {
    const problems = findHeaderProblems(input.headers);
    if (problems.length > 0) {
      const summary = problems
        .map((entry) => (entry.header === undefined ? entry.problem : `${entry.problem}: "${entry.header}"`))
        .join(', ');
      throw new InvalidUploadError(`Upload has an unusable header row (${summary})`, problems);
    }

    const dataset = await stores.datasets.create({
      projectId: input.projectId,
      filename: input.filename,
      storageHandle: input.storageHandle ?? null,
      headers: input.headers,
      columns: describeColumns(input.headers),
      rows: input.rows
    });
    context.logger.info(
      { datasetId: dataset.id, projectId: dataset.projectId, rowCount: dataset.rowCount, actor: context.actor },
      'dataset uploaded'
    );
    return dataset;
  }

  async function get(datasetId: string): Promise<Dataset> {
    return load(datasetId);
  }

  async function runAnalysis(
    dataset: Dataset,
    options: AnalyzeOptions,
    context: OperationContext
  ): Promise<AnalyzeOutcome> {
    const analyzing = await transition(
      dataset,
      { status: 'ANALYZING', mapping: null, ...CLEARED_FAILURE },
      context
    );

    let headers: string[] | null;
    let sampleRows: RawRow[];
    try {
      headers = await stores.raw.readHeaders(analyzing.id);
      sampleRows = headers && headers.length > 0 ? await stores.raw.readSample(analyzing.id, MAX_SAMPLE_ROWS) : [];
    } catch (err) {
      context.logger.error({ err, datasetId: analyzing.id }, 'raw source could not be read');
      return recordFailure(analyzing, 'ANALYZING', err, true, context);
    }
    if (!headers || headers.length === 0 || sampleRows.length === 0) {
      return recordFailure(analyzing, 'ANALYZING', new RawSourceMissingError(analyzing.id), false, context);
    }

    let proposal: MappingProposal;
    try {
      proposal = await inference.propose({
        headers,
        sampleRows: sampleRows.map((row) => row.values),
        rowLimit: options.rowLimit,
        logger: context.logger
      });
    } catch (err) {
      context.logger.warn({ err, datasetId: analyzing.id }, 'mapping inference unavailable');
      return recordFailure(analyzing, 'ANALYZING', err, err instanceof InferenceUnavailableError, context);
    }

    const analyzed = await transition(
      analyzing,
      { status: 'ANALYZED', mapping: proposal.mapping, ...CLEARED_FAILURE },
      context
    );
    return { dataset: analyzed, proposal };
  }

  /**
   * Analyze boundary. May be repeated from UPLOADED, ANALYZED and a
   * retryable FAILED; each run replaces the stored proposal.
   */
  async function analyze(
    datasetId: string,
    options: AnalyzeOptions,
    context: OperationContext
  ): Promise<AnalyzeOutcome> {
    const dataset = await load(datasetId);
    checkRevision(dataset, options.expectedRevision);
    return runAnalysis(dataset, options, context);
  }

  async function runIngest(
    dataset: Dataset,
    mapping: ColumnMapping,
    context: OperationContext
  ): Promise<IngestOutcome> {
    const ingesting = await transition(
      dataset,
      { status: 'INGESTING', mapping: null, ...CLEARED_FAILURE, confirmedMapping: mapping },
      context
    );

    let result: IngestResult;
    try {
      const headers = (await stores.raw.readHeaders(ingesting.id)) ?? [];
      result = await engine.ingest({
        dataset: ingesting,
        mapping,
        headers,
        rows: stores.raw.iterate(ingesting.id, deps.batchSize),
        signal: context.signal
      });
    } catch (err) {
      const retryable = err instanceof IngestError ? err.retryable : true;
      context.logger.error({ err, datasetId: ingesting.id }, 'dataset ingestion failed');
      return recordFailure(ingesting, 'INGESTING', err, retryable, context);
    }

    const ingested = await transition(
      ingesting,
      { status: 'INGESTED', mapping, ...CLEARED_FAILURE, lastIngest: result },
      context
    );
    if (result.rowsRejected > 0) {
      context.logger.warn(
        { datasetId: ingested.id, rowsRejected: result.rowsRejected, rowsProcessed: result.rowsProcessed },
        'dataset ingested with rejected rows'
      );
    }
    deps.observer?.onIngested(result);
    return { dataset: ingested, result };
  }

  /**
   * Confirm boundary. A mapping that fails the confirmation gate is
   * reported without touching the dataset; an accepted one is stored and
   * ingested straight away.
   */
  async function confirm(datasetId: string, input: ConfirmInput, context: OperationContext): Promise<IngestOutcome> {
    const dataset = await load(datasetId);
    checkRevision(dataset, input.expectedRevision);
    assertTransition(dataset, 'CONFIRMED');

    const { mapping } = assertValidMapping(mappingWithMetricName(input.mapping, input.metricName), dataset.headers);

    const confirmed = await transition(
      dataset,
      { status: 'CONFIRMED', mapping, ...CLEARED_FAILURE, confirmedMapping: mapping },
      context
    );
    return runIngest(confirmed, mapping, context);
  }

  function isAbandoned(dataset: Dataset): dataset is Dataset & { status: 'ANALYZING' | 'INGESTING' } {
    return (
      (dataset.status === 'ANALYZING' || dataset.status === 'INGESTING') &&
      now().getTime() - dataset.updatedAt.getTime() >= deps.staleAfterMs
    );
  }

  /**
   * A worker that died mid-analysis or mid-ingestion leaves the dataset in a
   * working state nobody will finish. Once it is older than the lease it is
   * marked as a retryable failure of that stage, through the same
   * compare-and-set as every other move.
   */
  async function releaseAbandoned(dataset: Dataset, context: OperationContext): Promise<Dataset> {
    if (!isAbandoned(dataset)) {
      return dataset;
    }
    context.logger.warn(
      { datasetId: dataset.id, status: dataset.status, updatedAt: dataset.updatedAt.toISOString() },
      'releasing abandoned dataset'
    );
    return transition(
      dataset,
      {
        status: 'FAILED',
        mapping: null,
        error: `Dataset was left ${dataset.status} since ${dataset.updatedAt.toISOString()}`,
        retryable: true,
        failedStage: dataset.status
      },
      context
    );
  }

  async function retry(datasetId: string, options: RetryOptions, context: OperationContext): Promise<RetryOutcome> {
    const loaded = await load(datasetId);
    checkRevision(loaded, options.expectedRevision);
    const dataset = await releaseAbandoned(loaded, context);
    if (dataset.status !== 'FAILED' || !dataset.retryable) {
      throw new RetryNotAllowedError(
        dataset.id,
        dataset.status === 'FAILED'
          ? `Dataset ${dataset.id} failed permanently: ${dataset.error ?? 'no reason recorded'}`
          : `Dataset ${dataset.id} is ${dataset.status}; only retryable failures can be retried`
      );
    }

    const target = options.target ?? defaultRetryTarget(dataset);
    if (target === 'analyze') {
      const outcome = await runAnalysis(dataset, {}, context);
      return { target, ...outcome };
    }

    if (!dataset.confirmedMapping) {
      throw new RetryNotAllowedError(dataset.id, `Dataset ${dataset.id} has no confirmed mapping to ingest with`);
    }
    const outcome = await runIngest(dataset, dataset.confirmedMapping, context);
    return { target, ...outcome };
  }

  return { upload, get, analyze, confirm, retry };
}

export type DatasetController = ReturnType<typeof createDatasetController>;
