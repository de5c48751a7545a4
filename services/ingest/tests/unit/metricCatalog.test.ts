import assert from 'node:assert/strict';
import { test } from 'node:test';
import { describeMetric } from '../../src/etl/metricCatalog';

test('units in brackets are split from the label', () => {
  assert.deepEqual(describeMetric('Water Level (m)'), { key: 'water_level_m', label: 'Water Level', unit: 'm' });
  assert.deepEqual(describeMetric('Conductivity [uS/cm]'), {
    key: 'conductivity_us_cm',
    label: 'Conductivity',
    unit: 'uS/cm'
  });
});

test('names without a unit keep their label', () => {
  assert.deepEqual(describeMetric(' pH '), { key: 'ph', label: 'pH', unit: null });
});

test('the same quantity in different units stays distinct', () => {
  assert.notEqual(describeMetric('Depth (m)')?.key, describeMetric('Depth (ft)')?.key);
});

test('names without any usable characters have no catalog identity', () => {
  assert.equal(describeMetric('  '), null);
  assert.equal(describeMetric('(%)'), null);
});
