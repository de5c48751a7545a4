import assert from 'node:assert/strict';
import { test } from 'node:test';
import { DEFAULT_TIMESTAMP_FORMATS, isTimestampFormat, parseTimestamp } from '../../src/etl/timestamps';

function iso(value: string, formats = DEFAULT_TIMESTAMP_FORMATS): string | null {
  const parsed = parseTimestamp(value, formats);
  return parsed.ok ? parsed.value.toISOString() : null;
}

test('ISO values honour explicit offsets and default to UTC', () => {
  assert.equal(iso('2024-03-01T10:15:00+02:00'), '2024-03-01T08:15:00.000Z');
  assert.equal(iso('2024-03-01T10:15:00.25Z'), '2024-03-01T10:15:00.250Z');
  assert.equal(iso('2024-03-01T10:15'), '2024-03-01T10:15:00.000Z');
  assert.equal(iso('2024-03-01'), '2024-03-01T00:00:00.000Z');
});

test('day-first formats are read as day, month, year', () => {
  assert.equal(iso('05/04/2024'), '2024-04-05T00:00:00.000Z');
  assert.equal(iso('05-04-2024 13:30'), '2024-04-05T13:30:00.000Z');
  assert.equal(iso('2024/4/5 06:00:30'), '2024-04-05T06:00:30.000Z');
  assert.equal(iso('2024-04-05 06:00'), '2024-04-05T06:00:00.000Z');
});

test('impossible dates and bare numbers are rejected', () => {
  assert.equal(iso('31/02/2024'), null);
  assert.equal(iso('2024-13-01'), null);
  assert.equal(iso('10'), null);
  assert.deepEqual(parseTimestamp('  ', DEFAULT_TIMESTAMP_FORMATS), { ok: false, reason: 'timestamp is empty' });
});

test('epoch formats only apply when enabled', () => {
  assert.equal(iso('1700000000'), null);
  assert.equal(iso('1700000000', ['epoch-seconds']), '2023-11-14T22:13:20.000Z');
  assert.equal(iso('1700000000000', ['epoch-millis']), '2023-11-14T22:13:20.000Z');
});

test('format order decides ambiguous dates', () => {
  assert.equal(iso('04/05/2024', ['mdy-slash', 'dmy-slash']), '2024-04-05T00:00:00.000Z');
  assert.equal(iso('04/05/2024', ['dmy-slash', 'mdy-slash']), '2024-05-04T00:00:00.000Z');
});

test('isTimestampFormat recognises configured names only', () => {
  assert.equal(isTimestampFormat('dmy-dot'), true);
  assert.equal(isTimestampFormat('rfc2822'), false);
});
