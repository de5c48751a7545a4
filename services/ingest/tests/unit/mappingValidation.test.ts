import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { MappingValidationError } from '../../src/errors/ingestErrors';
import { assertValidMapping, validateMapping } from '../../src/mapping/validation';

const HEADERS = ['Well_ID', 'Lat_N', 'Long_E', 'Depth_M', 'Status'];

describe('validateMapping', () => {
  it('accepts an entity mapping and classifies the remaining headers', () => {
    const result = validateMapping(
      {
        roles: { ENTITY_ID: 'Well_ID', LATITUDE: 'Lat_N', LONGITUDE: 'Long_E', TIMESTAMP: null },
        columns: { Depth_M: 'NUMERICAL' },
        confidence: { ENTITY_ID: 0.9, TIMESTAMP: 0.1 }
      },
      HEADERS
    );

    assert.ok(result.ok);
    assert.equal(result.mode, 'entity');
    assert.deepEqual(result.mapping, {
      roles: { ENTITY_ID: 'Well_ID', LATITUDE: 'Lat_N', LONGITUDE: 'Long_E' },
      columns: { Depth_M: 'NUMERICAL', Status: 'TEXT' },
      confidence: { ENTITY_ID: 0.9 },
      metricName: null
    });
  });

  it('resolves time-series and combined modes', () => {
    const timeseries = validateMapping({ roles: { TIMESTAMP: 'Status', METRIC_VALUE: 'Depth_M' } }, HEADERS);
    assert.ok(timeseries.ok);
    assert.equal(timeseries.mode, 'timeseries');

    const both = validateMapping(
      { roles: { ENTITY_ID: 'Well_ID', TIMESTAMP: 'Status', METRIC_VALUE: 'Depth_M' } },
      HEADERS
    );
    assert.ok(both.ok);
    assert.equal(both.mode, 'both');
  });

  it('reports columns missing from the headers', () => {
    const result = validateMapping({ roles: { ENTITY_ID: 'Site' }, columns: { Notes: 'TEXT' } }, HEADERS);
    assert.equal(result.ok, false);
    if (!result.ok) {
      assert.deepEqual(
        result.error.issues.map((issue) => [issue.field, issue.code]),
        [
          ['roles.ENTITY_ID', 'unknown_column'],
          ['columns.Notes', 'unknown_column']
        ]
      );
    }
  });

  it('reports a column assigned to two roles', () => {
    const result = validateMapping({ roles: { ENTITY_ID: 'Well_ID', METRIC_NAME: 'Well_ID' } }, HEADERS);
    assert.equal(result.ok, false);
    if (!result.ok) {
      assert.deepEqual(result.error.issues, [
        {
          field: 'roles.METRIC_NAME',
          code: 'duplicate_column',
          message: 'Column "Well_ID" is already assigned to ENTITY_ID'
        }
      ]);
    }
  });

  it('requires at least one ingestion mode', () => {
    const result = validateMapping({ roles: { LATITUDE: 'Lat_N', TIMESTAMP: 'Status' } }, HEADERS);
    assert.equal(result.ok, false);
    if (!result.ok) {
      assert.deepEqual(
        result.error.issues.map((issue) => issue.code),
        ['insufficient_roles']
      );
    }
  });

  it('rejects payloads that are not mappings', () => {
    const result = validateMapping({ roles: { HEIGHT: 'Depth_M' } }, HEADERS);
    assert.equal(result.ok, false);
    if (!result.ok) {
      assert.equal(result.error.issues[0].code, 'invalid_shape');
    }
  });
});

describe('assertValidMapping', () => {
  it('throws the validation error', () => {
    assert.throws(() => assertValidMapping('mapping', HEADERS), MappingValidationError);
  });

  it('treats headers named after object members as ordinary columns', () => {
    const { mapping } = assertValidMapping({ roles: { ENTITY_ID: 'id' } }, ['id', 'constructor', '__proto__']);

    assert.deepEqual(Object.entries(mapping.columns), [
      ['constructor', 'TEXT'],
      ['__proto__', 'TEXT']
    ]);
  });
});
