import assert from 'node:assert/strict';
import { mock, test } from 'node:test';
import {
  IngestError,
  InferenceUnavailableError,
  InvalidTransitionError,
  InvalidUploadError,
  MappingValidationError,
  RawSourceMissingError,
  RetryNotAllowedError,
  StaleTransitionError
} from '../../src/errors/ingestErrors';
import { createEtlEngine } from '../../src/etl/engine';
import { DEFAULT_TIMESTAMP_FORMATS } from '../../src/etl/timestamps';
import { createHeuristicMappingProvider } from '../../src/inference/heuristicProvider';
import { createMappingInferenceService } from '../../src/inference/service';
import type { MappingInferenceProvider } from '../../src/inference/types';
import { assertValidMapping } from '../../src/mapping/validation';
import { createDatasetController, defaultRetryTarget, type LifecycleObserver } from '../../src/lifecycle/controller';
import { asLogger, createLoggerFake, createMemoryStores } from '../helpers/memoryStores';

const WELL_HEADERS = ['Well_ID', 'Lat_N', 'Long_E', 'Depth_M', 'Status'];

function wellRows(count: number): Record<string, string | null>[] {
  const rows: Record<string, string | null>[] = [];
  for (let index = 1; index <= count; index += 1) {
    rows.push({ Well_ID: `W${index}`, Lat_N: '12.9', Long_E: '77.5', Depth_M: String(index * 10), Status: 'active' });
  }
  return rows;
}

function setup(options: { provider?: MappingInferenceProvider; rejectionThreshold?: number } = {}) {
  const stores = createMemoryStores();
  const logger = createLoggerFake();
  const transitions: string[] = [];
  let now = new Date('2024-03-01T12:00:30.000Z');
  const observer: LifecycleObserver = {
    onTransition: (from, to) => {
      transitions.push(`${from}->${to}`);
    },
    onIngested: mock.fn()
  };
  const controller = createDatasetController({
    stores,
    inference: createMappingInferenceService({
      provider: options.provider ?? createHeuristicMappingProvider(),
      timeoutMs: 200,
      sampleRows: 10
    }),
    engine: createEtlEngine({
      store: stores.normalized,
      policy: {
        batchSize: 50,
        maxRowErrors: 100,
        rejectionThreshold: options.rejectionThreshold ?? 0.5,
        timestampFormats: DEFAULT_TIMESTAMP_FORMATS
      }
    }),
    batchSize: 50,
    staleAfterMs: 60_000,
    clock: { now: () => now },
    observer
  });
  const context = { actor: 'analyst@example.com', logger: asLogger(logger) };
  const advance = (ms: number) => {
    now = new Date(now.getTime() + ms);
  };
  return { stores, logger, controller, context, transitions, advance };
}

async function uploadWells(harness: ReturnType<typeof setup>, count = 1) {
  return harness.controller.upload(
    { projectId: 'project-1', filename: 'wells.csv', headers: WELL_HEADERS, rows: wellRows(count) },
    harness.context
  );
}

const WELL_MAPPING = { roles: { ENTITY_ID: 'Well_ID', LATITUDE: 'Lat_N', LONGITUDE: 'Long_E' } };

test('upload stores the dataset as UPLOADED with derived column names', async () => {
  const harness = setup();
  const dataset = await uploadWells(harness, 3);

  assert.equal(dataset.status, 'UPLOADED');
  assert.equal(dataset.rowCount, 3);
  assert.deepEqual(
    dataset.columns.map((column) => column.variable),
    ['well_id', 'lat_n', 'long_e', 'depth_m', 'status']
  );
});

test('upload rejects duplicate headers', async () => {
  const harness = setup();
  await assert.rejects(
    harness.controller.upload(
      { projectId: 'project-1', filename: 'bad.csv', headers: ['Site', 'Site'], rows: [] },
      harness.context
    ),
    (err: unknown) => {
      assert.ok(err instanceof InvalidUploadError);
      assert.equal(err.message, 'Upload has an unusable header row (duplicate_header: "Site")');
      return true;
    }
  );
});

test('analyze proposes a mapping and stores it on the dataset', async () => {
  const harness = setup();
  const dataset = await uploadWells(harness);

  const outcome = await harness.controller.analyze(dataset.id, {}, harness.context);

  assert.equal(outcome.dataset.status, 'ANALYZED');
  assert.equal(outcome.proposal.provider, 'heuristic');
  assert.equal(outcome.proposal.fallback, false);
  assert.deepEqual(outcome.proposal.mapping.roles, { ENTITY_ID: 'Well_ID', LATITUDE: 'Lat_N', LONGITUDE: 'Long_E' });
  assert.deepEqual(outcome.dataset.mapping, outcome.proposal.mapping);
  assert.deepEqual(harness.transitions, ['UPLOADED->ANALYZING', 'ANALYZING->ANALYZED']);
});

test('inference outage marks the dataset FAILED and retryable', async () => {
  const harness = setup({
    provider: {
      name: 'flaky',
      propose: async () => {
        throw new InferenceUnavailableError('provider returned 503');
      }
    }
  });
  const dataset = await uploadWells(harness);

  await assert.rejects(
    harness.controller.analyze(dataset.id, {}, harness.context),
    (err: unknown) => err instanceof InferenceUnavailableError
  );

  const failed = await harness.controller.get(dataset.id);
  assert.equal(failed.status, 'FAILED');
  assert.equal(failed.retryable, true);
  assert.equal(failed.failedStage, 'ANALYZING');
  assert.equal(failed.error, 'provider returned 503');
  assert.equal(defaultRetryTarget(failed), 'analyze');
});

test('analysis of a dataset whose raw rows are gone fails permanently', async () => {
  const harness = setup();
  const dataset = await uploadWells(harness);
  harness.stores.raw.drop(dataset.id);

  await assert.rejects(
    harness.controller.analyze(dataset.id, {}, harness.context),
    (err: unknown) => err instanceof RawSourceMissingError
  );

  const failed = await harness.controller.get(dataset.id);
  assert.equal(failed.status, 'FAILED');
  assert.equal(failed.retryable, false);
  await assert.rejects(
    harness.controller.retry(dataset.id, {}, harness.context),
    (err: unknown) => err instanceof RetryNotAllowedError
  );
});

test('confirm validates, ingests and records the result', async () => {
  const harness = setup();
  const dataset = await uploadWells(harness, 2);
  await harness.controller.analyze(dataset.id, {}, harness.context);

  const outcome = await harness.controller.confirm(dataset.id, { mapping: WELL_MAPPING }, harness.context);

  assert.equal(outcome.dataset.status, 'INGESTED');
  assert.equal(outcome.result.entitiesWritten, 2);
  assert.deepEqual(outcome.dataset.lastIngest, outcome.result);
  assert.deepEqual(harness.transitions.slice(2), [
    'ANALYZED->CONFIRMED',
    'CONFIRMED->INGESTING',
    'INGESTING->INGESTED'
  ]);
});

test('an invalid mapping is rejected without changing the dataset', async () => {
  const harness = setup();
  const dataset = await uploadWells(harness);
  const analyzed = (await harness.controller.analyze(dataset.id, {}, harness.context)).dataset;

  await assert.rejects(
    harness.controller.confirm(
      dataset.id,
      { mapping: { roles: { ENTITY_ID: 'Missing', LATITUDE: 'Lat_N' } } },
      harness.context
    ),
    (err: unknown) => {
      assert.ok(err instanceof MappingValidationError);
      assert.deepEqual(
        err.issues.map((issue) => issue.code),
        ['unknown_column']
      );
      return true;
    }
  );

  const after = await harness.controller.get(dataset.id);
  assert.equal(after.status, 'ANALYZED');
  assert.equal(after.revision, analyzed.revision);
});

test('confirm before analysis is an invalid transition', async () => {
  const harness = setup();
  const dataset = await uploadWells(harness);

  await assert.rejects(
    harness.controller.confirm(dataset.id, { mapping: WELL_MAPPING }, harness.context),
    (err: unknown) => err instanceof InvalidTransitionError && err.from === 'UPLOADED' && err.to === 'CONFIRMED'
  );
});

test('two concurrent confirms produce one ingestion and one stale transition', async () => {
  const harness = setup();
  const dataset = await uploadWells(harness);
  await harness.controller.analyze(dataset.id, {}, harness.context);

  const results = await Promise.allSettled([
    harness.controller.confirm(dataset.id, { mapping: WELL_MAPPING }, harness.context),
    harness.controller.confirm(dataset.id, { mapping: WELL_MAPPING }, harness.context)
  ]);

  const fulfilled = results.filter((result) => result.status === 'fulfilled');
  const rejected = results.filter((result): result is PromiseRejectedResult => result.status === 'rejected');
  assert.equal(fulfilled.length, 1);
  assert.equal(rejected.length, 1);
  assert.ok(rejected[0].reason instanceof StaleTransitionError);
  assert.equal((await harness.controller.get(dataset.id)).status, 'INGESTED');
});

test('a stale expected revision is refused before anything changes', async () => {
  const harness = setup();
  const dataset = await uploadWells(harness);

  await assert.rejects(
    harness.controller.analyze(dataset.id, { expectedRevision: dataset.revision + 5 }, harness.context),
    (err: unknown) => err instanceof StaleTransitionError
  );
  assert.equal((await harness.controller.get(dataset.id)).status, 'UPLOADED');
});

test('header drift after confirmation fails retryably and retry re-ingests', async () => {
  const harness = setup();
  const dataset = await uploadWells(harness, 2);
  await harness.controller.analyze(dataset.id, {}, harness.context);
  harness.stores.raw.replaceHeaders(dataset.id, ['Site', 'Lat_N', 'Long_E', 'Depth_M', 'Status']);

  await assert.rejects(harness.controller.confirm(dataset.id, { mapping: WELL_MAPPING }, harness.context));

  const failed = await harness.controller.get(dataset.id);
  assert.equal(failed.status, 'FAILED');
  assert.equal(failed.retryable, true);
  assert.equal(failed.failedStage, 'INGESTING');
  assert.equal(failed.error, 'The confirmed mapping no longer matches the dataset headers');
  assert.deepEqual(failed.confirmedMapping?.roles, WELL_MAPPING.roles);
  assert.equal(defaultRetryTarget(failed), 'ingest');

  harness.stores.raw.replaceHeaders(dataset.id, WELL_HEADERS);
  const retried = await harness.controller.retry(dataset.id, {}, harness.context);

  assert.equal(retried.target, 'ingest');
  assert.equal(retried.dataset.status, 'INGESTED');
  assert.equal(retried.dataset.error, null);
});

test('too many rejected rows leave the dataset FAILED instead of INGESTED', async () => {
  const harness = setup();
  const dataset = await harness.controller.upload(
    {
      projectId: 'project-1',
      filename: 'broken.csv',
      headers: WELL_HEADERS,
      rows: [
        { Well_ID: 'W1', Lat_N: 'x', Long_E: '77.5', Depth_M: '1', Status: 'a' },
        { Well_ID: 'W2', Lat_N: '12.9', Long_E: '77.5', Depth_M: '1', Status: 'a' }
      ]
    },
    harness.context
  );
  await harness.controller.analyze(dataset.id, {}, harness.context);

  await assert.rejects(harness.controller.confirm(dataset.id, { mapping: WELL_MAPPING }, harness.context));

  const failed = await harness.controller.get(dataset.id);
  assert.equal(failed.status, 'FAILED');
  assert.equal(failed.error, '1 of 2 rows were rejected');
  assert.equal(harness.stores.normalized.snapshot().objects.size, 0);
});

test('retry is refused for datasets that have not failed', async () => {
  const harness = setup();
  const dataset = await uploadWells(harness);

  await assert.rejects(
    harness.controller.retry(dataset.id, {}, harness.context),
    (err: unknown) =>
      err instanceof RetryNotAllowedError &&
      err.message === `Dataset ${dataset.id} is UPLOADED; only retryable failures can be retried`
  );
});

test('a raw source that cannot be read fails analysis retryably', async () => {
  const harness = setup();
  const dataset = await uploadWells(harness);
  const readSample = mock.method(harness.stores.raw, 'readSample', async () => {
    throw new Error('raw storage offline');
  });

  await assert.rejects(harness.controller.analyze(dataset.id, {}, harness.context), /raw storage offline/);

  const failed = await harness.controller.get(dataset.id);
  assert.equal(failed.status, 'FAILED');
  assert.equal(failed.retryable, true);
  assert.equal(failed.failedStage, 'ANALYZING');
  assert.equal(failed.error, 'raw storage offline');

  readSample.mock.restore();
  const retried = await harness.controller.retry(dataset.id, {}, harness.context);
  assert.equal(retried.target, 'analyze');
  assert.equal(retried.dataset.status, 'ANALYZED');
});

test('an analysis nobody finished can be retried once its lease runs out', async () => {
  const harness = setup();
  const dataset = await uploadWells(harness);
  await harness.stores.datasets.transition(
    dataset.id,
    { status: 'UPLOADED', revision: dataset.revision },
    { status: 'ANALYZING', mapping: null, error: null, retryable: false, failedStage: null }
  );

  await assert.rejects(
    harness.controller.retry(dataset.id, {}, harness.context),
    (err: unknown) => err instanceof RetryNotAllowedError
  );

  harness.advance(5 * 60_000);
  const retried = await harness.controller.retry(dataset.id, {}, harness.context);

  assert.equal(retried.target, 'analyze');
  assert.equal(retried.dataset.status, 'ANALYZED');
  assert.deepEqual(harness.transitions, ['ANALYZING->FAILED', 'FAILED->ANALYZING', 'ANALYZING->ANALYZED']);
  assert.equal(
    harness.logger.warn.mock.calls.some((call) => call.arguments[1] === 'releasing abandoned dataset'),
    true
  );
});

test('an ingestion nobody finished is released and re-driven with the confirmed mapping', async () => {
  const harness = setup();
  const dataset = await uploadWells(harness, 2);
  const analyzed = (await harness.controller.analyze(dataset.id, {}, harness.context)).dataset;
  const { mapping } = assertValidMapping(WELL_MAPPING, WELL_HEADERS);
  const confirmed = await harness.stores.datasets.transition(
    analyzed.id,
    { status: 'ANALYZED', revision: analyzed.revision },
    { status: 'CONFIRMED', mapping, error: null, retryable: false, failedStage: null, confirmedMapping: mapping }
  );
  await harness.stores.datasets.transition(
    confirmed.id,
    { status: 'CONFIRMED', revision: confirmed.revision },
    { status: 'INGESTING', mapping: null, error: null, retryable: false, failedStage: null }
  );
  harness.advance(5 * 60_000);

  const retried = await harness.controller.retry(dataset.id, {}, harness.context);

  assert.equal(retried.target, 'ingest');
  assert.equal(retried.dataset.status, 'INGESTED');
  assert.equal(harness.stores.normalized.snapshot().objects.size, 2);
});

test('a cancelled ingestion leaves the dataset FAILED and retryable', async () => {
  const harness = setup();
  const dataset = await uploadWells(harness, 2);
  await harness.controller.analyze(dataset.id, {}, harness.context);
  const abort = new AbortController();
  abort.abort(new Error('client disconnected'));

  await assert.rejects(
    harness.controller.confirm(dataset.id, { mapping: WELL_MAPPING }, { ...harness.context, signal: abort.signal }),
    (err: unknown) => err instanceof IngestError && err.code === 'cancelled'
  );

  const failed = await harness.controller.get(dataset.id);
  assert.equal(failed.status, 'FAILED');
  assert.equal(failed.retryable, true);
  assert.equal(failed.failedStage, 'INGESTING');
  assert.equal(harness.stores.normalized.snapshot().objects.size, 0);
});
