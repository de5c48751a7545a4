import test from 'node:test';
import assert from 'node:assert/strict';
import { z } from 'zod';
import {
  EnvConfigError,
  booleanVar,
  integerVar,
  loadEnvConfig,
  numberVar,
  stringListVar,
  stringVar
} from '../src/envConfig';

const schema = z.object({
  FLAG: booleanVar({ defaultValue: false }),
  SIZE: integerVar({ defaultValue: 10, min: 1, max: 100 }),
  RATIO: numberVar({ defaultValue: 0.5, min: 0, max: 1 }),
  MODE: stringVar({ defaultValue: 'fast', lowercase: true, oneOf: ['fast', 'slow'] }),
  NAMES: stringListVar({ unique: true }),
  TOKEN: stringVar()
});

test('applies defaults for missing variables', () => {
  const config = loadEnvConfig(schema, { env: {} });
  assert.deepEqual(config, {
    FLAG: false,
    SIZE: 10,
    RATIO: 0.5,
    MODE: 'fast',
    NAMES: [],
    TOKEN: undefined
  });
});

test('parses provided values', () => {
  const config = loadEnvConfig(schema, {
    env: {
      FLAG: 'on',
      SIZE: '42',
      RATIO: '0.25',
      MODE: ' SLOW ',
      NAMES: 'a, b a',
      TOKEN: ' test-secret '
    }
  });
  assert.equal(config.FLAG, true);
  assert.equal(config.SIZE, 42);
  assert.equal(config.RATIO, 0.25);
  assert.equal(config.MODE, 'slow');
  assert.deepEqual(config.NAMES, ['a', 'b']);
  assert.equal(config.TOKEN, 'test-secret');
});

test('collects every invalid variable into one error', () => {
  assert.throws(
    () =>
      loadEnvConfig(schema, {
        env: { FLAG: 'maybe', SIZE: '1000', MODE: 'medium' },
        context: 'unit'
      }),
    (error: unknown) => {
      assert(error instanceof EnvConfigError);
      assert.match(error.message, /^\[unit\] Invalid environment configuration/);
      assert.equal(error.issues.length, 3);
      assert.equal(error.issues[1], 'SIZE: SIZE must be <= 100');
      assert.equal(error.issues[2], 'MODE: MODE must be one of: fast, slow');
      return true;
    }
  );
});

test('rejects non-integer values for integer variables', () => {
  assert.throws(() => loadEnvConfig(z.object({ COUNT: integerVar() }), { env: { COUNT: '1.5' } }), /COUNT: Expected COUNT to be an integer/);
});

test('reports missing required variables', () => {
  assert.throws(
    () => loadEnvConfig(z.object({ URL: stringVar({ required: true, description: 'database url' }) }), { env: {} }),
    /URL: Missing required database url/
  );
});
