import assert from 'node:assert/strict';
import { test } from 'node:test';
import { EnvConfigError } from '@aquifer/shared';
import { loadServiceConfig } from '../../src/config/serviceConfig';

test('defaults describe a local heuristic deployment', () => {
  const config = loadServiceConfig({ env: { NODE_ENV: 'test' } });

  assert.equal(config.port, 4300);
  assert.equal(config.logLevel, 'info');
  assert.equal(config.database.schema, 'ingest');
  assert.equal(config.inference.provider, 'heuristic');
  assert.equal(config.inference.sampleRows, 10);
  assert.deepEqual(config.etl, {
    batchSize: 500,
    maxRowErrors: 100,
    rejectionThreshold: 0.5,
    timestampFormats: ['iso-datetime', 'iso-date', 'datetime-space', 'ymd-slash', 'dmy-slash', 'dmy-dash']
  });
  assert.equal(config.lifecycle.staleAfterMs, 900_000);
});

test('reads ingestion policy from the environment', () => {
  const config = loadServiceConfig({
    env: {
      PORT: '8080',
      LOG_LEVEL: 'DEBUG',
      INGEST_BATCH_SIZE: '50',
      INGEST_REJECTION_THRESHOLD: '0.25',
      INGEST_TIMESTAMP_FORMATS: 'epoch-seconds, ISO-DATE',
      INGEST_INFERENCE_PROVIDER: 'openai',
      INGEST_OPENAI_API_KEY: 'test-secret'
    }
  });

  assert.equal(config.port, 8080);
  assert.equal(config.logLevel, 'debug');
  assert.equal(config.etl.batchSize, 50);
  assert.equal(config.etl.rejectionThreshold, 0.25);
  assert.deepEqual(config.etl.timestampFormats, ['epoch-seconds', 'iso-date']);
  assert.equal(config.inference.provider, 'openai');
  assert.equal(config.inference.openAi.apiKey, 'test-secret');
});

test('the openai provider needs an api key', () => {
  assert.throws(
    () => loadServiceConfig({ env: { INGEST_INFERENCE_PROVIDER: 'openai' } }),
    (err: unknown) =>
      err instanceof EnvConfigError &&
      err.issues.includes('INGEST_OPENAI_API_KEY: required when INGEST_INFERENCE_PROVIDER is openai')
  );
});

test('unknown timestamp formats are refused', () => {
  assert.throws(
    () => loadServiceConfig({ env: { INGEST_TIMESTAMP_FORMATS: 'iso-date,julian' } }),
    (err: unknown) =>
      err instanceof EnvConfigError && err.issues.includes('INGEST_TIMESTAMP_FORMATS: unknown formats julian')
  );
});

test('out of range values are reported together', () => {
  assert.throws(
    () => loadServiceConfig({ env: { INGEST_REJECTION_THRESHOLD: '1.5', INGEST_INFERENCE_SAMPLE_ROWS: '25' } }),
    (err: unknown) => err instanceof EnvConfigError && err.issues.length === 2
  );
});
