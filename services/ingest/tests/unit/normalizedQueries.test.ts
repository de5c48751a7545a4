import assert from 'node:assert/strict';
import { test } from 'node:test';
import { buildObjectsQuery, buildReadingsQuery } from '../../src/db/normalizedRepository';
import { parseObjectsQuery, parseReadingsQuery } from '../../src/schemas/datasets';

test('objects query pages by external id', () => {
  const query = buildObjectsQuery('project-1', parseObjectsQuery({ externalId: 'W1', limit: '5' }));

  assert.equal(
    query.text,
    'SELECT * FROM unified_objects WHERE project_id = $1 AND external_id = $2 ORDER BY external_id LIMIT $3 OFFSET $4'
  );
  assert.deepEqual(query.values, ['project-1', 'W1', 5, 0]);
});

test('readings query binds every filter in order', () => {
  const query = buildReadingsQuery(
    'project-1',
    parseReadingsQuery({
      metric: 'ph',
      from: '2024-01-01T00:00:00Z',
      to: '2024-02-01T00:00:00+01:00',
      offset: '20'
    })
  );

  assert.equal(
    query.text,
    'SELECT r.id, r.project_id, r.object_id, o.external_id, r.metric_key, r.observed_at, r.value, r.extra, r.dataset_id ' +
      'FROM unified_readings r JOIN unified_objects o ON o.id = r.object_id ' +
      'WHERE r.project_id = $1 AND r.metric_key = $2 AND r.observed_at >= $3 AND r.observed_at < $4 ' +
      'ORDER BY r.observed_at, r.id LIMIT $5 OFFSET $6'
  );
  assert.deepEqual(query.values, [
    'project-1',
    'ph',
    '2024-01-01T00:00:00.000Z',
    '2024-01-31T23:00:00.000Z',
    100,
    20
  ]);
});

test('readings query rejects an inverted window', () => {
  assert.throws(() => parseReadingsQuery({ from: '2024-02-01T00:00:00Z', to: '2024-01-01T00:00:00Z' }));
});

test('page size is capped', () => {
  assert.throws(() => parseObjectsQuery({ limit: '5000' }));
});
