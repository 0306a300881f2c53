import test from 'node:test';
import assert from 'node:assert/strict';
import { z } from 'zod';
import { booleanVar, EnvConfigError, hostVar, integerVar, loadEnvConfig, portVar, stringVar } from '../src';

test('booleanVar accepts common spellings and falls back to its default', () => {
  const schema = z.object({ FLAG: booleanVar({ defaultValue: false }) });
  assert.deepEqual(loadEnvConfig(schema, { env: { FLAG: 'YES' } }), { FLAG: true });
  assert.deepEqual(loadEnvConfig(schema, { env: { FLAG: 'off' } }), { FLAG: false });
  assert.deepEqual(loadEnvConfig(schema, { env: { FLAG: '  ' } }), { FLAG: false });
});

test('booleanVar reports unknown values', () => {
  const schema = z.object({ FLAG: booleanVar() });
  assert.throws(
    () => loadEnvConfig(schema, { env: { FLAG: 'maybe' }, context: 'test' }),
    (error: unknown) => {
      assert.ok(error instanceof EnvConfigError);
      assert.equal(
        error.message,
        "[test] Invalid environment configuration\n  - FLAG: Invalid FLAG. Accepted boolean values: '1', 'true', 'yes', 'on', '0', 'false', 'no', 'off'"
      );
      return true;
    }
  );
});

test('integerVar enforces bounds', () => {
  const schema = z.object({ PORT: portVar({ defaultPort: 4000 }) });
  assert.deepEqual(loadEnvConfig(schema, { env: {} }), { PORT: 4000 });
  assert.deepEqual(loadEnvConfig(schema, { env: { PORT: '8080' } }), { PORT: 8080 });
  assert.throws(
    () => loadEnvConfig(schema, { env: { PORT: '70000' } }),
    (error: unknown) => error instanceof EnvConfigError && error.issues[0] === 'PORT: port must be <= 65535'
  );
});

test('integerVar rejects non-numeric input', () => {
  const schema = z.object({ LIMIT: integerVar({ required: true }) });
  assert.throws(
    () => loadEnvConfig(schema, { env: { LIMIT: 'many' } }),
    (error: unknown) => error instanceof EnvConfigError && error.issues[0] === 'LIMIT: Expected LIMIT to be an integer'
  );
});

test('stringVar trims, lowercases and applies defaults', () => {
  const schema = z.object({
    NAME: stringVar({ lowercase: true }),
    MODE: stringVar({ defaultValue: 'auto' }),
    HOST: hostVar()
  });
  assert.deepEqual(loadEnvConfig(schema, { env: { NAME: '  Events ' } }), {
    NAME: 'events',
    MODE: 'auto',
    HOST: '127.0.0.1'
  });
});

test('stringVar keeps raw values when trimming is disabled', () => {
  const schema = z.object({ TOKEN: stringVar({ trim: false }) });
  assert.deepEqual(loadEnvConfig(schema, { env: { TOKEN: ' ?sig=test-signature' } }), {
    TOKEN: ' ?sig=test-signature'
  });
  assert.deepEqual(loadEnvConfig(schema, { env: { TOKEN: '   ' } }), { TOKEN: undefined });
});

test('required variables report every missing name', () => {
  const schema = z.object({
    DATABASE: stringVar({ required: true }),
    TABLE: stringVar({ required: true })
  });
  assert.throws(
    () => loadEnvConfig(schema, { env: {} }),
    (error: unknown) => {
      assert.ok(error instanceof EnvConfigError);
      assert.deepEqual(error.issues, ['DATABASE: Missing required DATABASE', 'TABLE: Missing required TABLE']);
      return true;
    }
  );
});
