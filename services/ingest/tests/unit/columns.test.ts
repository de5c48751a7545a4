import assert from 'node:assert/strict';
import { test } from 'node:test';
import { describeColumns, findHeaderProblems, slugifyHeader } from '../../src/mapping/columns';

test('slugifyHeader lowercases and collapses punctuation', () => {
  assert.equal(slugifyHeader('  Water Level (m) '), 'water_level_m');
  assert.equal(slugifyHeader('Lat_N'), 'lat_n');
  assert.equal(slugifyHeader('%%'), '');
});

test('describeColumns keeps variable names unique and fills blanks', () => {
  assert.deepEqual(describeColumns(['Depth (m)', 'depth-m', '', 'Status']), [
    { original: 'Depth (m)', variable: 'depth_m' },
    { original: 'depth-m', variable: 'depth_m_2' },
    { original: '', variable: 'column_3' },
    { original: 'Status', variable: 'status' }
  ]);
});

test('findHeaderProblems flags empty header rows and repeated names', () => {
  assert.deepEqual(findHeaderProblems([]), [{ problem: 'empty' }]);
  assert.deepEqual(findHeaderProblems(['a', 'b', 'a']), [{ problem: 'duplicate_header', header: 'a' }]);
  assert.deepEqual(findHeaderProblems(['a', 'b']), []);
});
