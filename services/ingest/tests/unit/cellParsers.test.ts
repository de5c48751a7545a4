import assert from 'node:assert/strict';
import { test } from 'node:test';
import {
  coerceExtraValue,
  isBlankCell,
  parseCoordinate,
  parseMetricValue,
  parseNumericCell
} from '../../src/etl/cellParsers';

test('isBlankCell treats whitespace and missing cells as blank', () => {
  assert.equal(isBlankCell(null), true);
  assert.equal(isBlankCell(undefined), true);
  assert.equal(isBlankCell('  '), true);
  assert.equal(isBlankCell('0'), false);
});

test('parseNumericCell accepts plain numbers and a decimal comma', () => {
  assert.equal(parseNumericCell(' 12.5 '), 12.5);
  assert.equal(parseNumericCell('12,5'), 12.5);
  assert.equal(parseNumericCell('-1e3'), -1000);
  assert.equal(parseNumericCell('.5'), 0.5);
  assert.equal(parseNumericCell('1,234,567'), null);
  assert.equal(parseNumericCell('12m'), null);
  assert.equal(parseNumericCell(''), null);
});

test('parseCoordinate allows blanks but rejects malformed or out of range values', () => {
  assert.deepEqual(parseCoordinate('', 'latitude'), { ok: true, value: null });
  assert.deepEqual(parseCoordinate('-33.9', 'latitude'), { ok: true, value: -33.9 });
  assert.deepEqual(parseCoordinate('91', 'latitude'), { ok: false, reason: 'latitude 91 is outside [-90, 90]' });
  assert.deepEqual(parseCoordinate('181', 'longitude'), {
    ok: false,
    reason: 'longitude 181 is outside [-180, 180]'
  });
  assert.deepEqual(parseCoordinate('N12', 'latitude'), { ok: false, reason: 'latitude "N12" is not numeric' });
});

test('parseMetricValue requires a number', () => {
  assert.deepEqual(parseMetricValue('4.2'), { ok: true, value: 4.2 });
  assert.deepEqual(parseMetricValue(null), { ok: false, reason: 'metric value is empty' });
  assert.deepEqual(parseMetricValue('n/a'), { ok: false, reason: 'metric value "n/a" is not numeric' });
});

test('coerceExtraValue keeps numbers numeric and trims text', () => {
  assert.equal(coerceExtraValue('10'), 10);
  assert.equal(coerceExtraValue(' active '), 'active');
  assert.equal(coerceExtraValue(''), null);
  assert.equal(coerceExtraValue(undefined), null);
  assert.equal(coerceExtraValue('007A'), '007A');
});

test('coerceExtraValue keeps text whose numeric form would lose information', () => {
  assert.equal(coerceExtraValue('12.25'), 12.25);
  assert.equal(coerceExtraValue('-3'), -3);
  assert.equal(coerceExtraValue('00123'), '00123');
  assert.equal(coerceExtraValue('12345678901234567890'), '12345678901234567890');
  assert.equal(coerceExtraValue('1e400'), '1e400');
  assert.equal(coerceExtraValue('2.50'), '2.50');
});
