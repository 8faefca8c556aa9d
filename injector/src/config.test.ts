import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { ValidationError } from '../../src/validation.js';
import { configFromEnv, DEFAULT_PORT, loadInstrumentations, parseInstrumentations } from './config.js';

describe('configFromEnv', () => {
  it('applies defaults', () => {
    assert.deepEqual(configFromEnv({}), {
      port: DEFAULT_PORT,
      instrumentationsFile: undefined,
      licenseKeySecretName: 'newrelic-key-secret',
      licenseKeySecretKey: 'new_relic_license_key',
    });
  });

  it('reads every variable', () => {
    assert.deepEqual(
      configFromEnv({
        PORT: '9443',
        INSTRUMENTATIONS_FILE: '/etc/injector/instrumentations.json',
        LICENSE_KEY_SECRET_NAME: 'team-license',
        LICENSE_KEY_SECRET_KEY: 'license',
      }),
      {
        port: 9443,
        instrumentationsFile: '/etc/injector/instrumentations.json',
        licenseKeySecretName: 'team-license',
        licenseKeySecretKey: 'license',
      }
    );
  });

  it('rejects an invalid port', () => {
    assert.throws(
      () => configFromEnv({ PORT: 'https' }),
      (err: Error) => err instanceof ValidationError && err.field === 'PORT'
    );
    assert.throws(() => configFromEnv({ PORT: '70000' }), ValidationError);
  });
});

describe('parseInstrumentations', () => {
  it('validates every entry', () => {
    const list = parseInstrumentations(
      JSON.stringify([
        { metadata: { name: 'default', namespace: 'shop' }, spec: { java: { image: 'agents/java:8' } } },
        { metadata: { name: 'go', namespace: 'observability' }, spec: { go: { image: 'agents/go:1' } } },
      ])
    );
    assert.deepEqual(list.map((i) => `${i.metadata.namespace}/${i.metadata.name}`), ['shop/default', 'observability/go']);
  });

  it('names the failing entry', () => {
    assert.throws(
      () => parseInstrumentations(JSON.stringify([{ metadata: { name: 'a', namespace: 'b' } }, { metadata: {} }])),
      (err: Error) => err instanceof ValidationError && err.message === 'instrumentations[1]: metadata.name is required'
    );
  });

  it('rejects invalid JSON and non-arrays', () => {
    assert.throws(() => parseInstrumentations('{not json'), /not valid JSON/);
    assert.throws(() => parseInstrumentations('{}'), /must contain a JSON array/);
  });
});

describe('loadInstrumentations', () => {
  it('returns nothing without a file', async () => {
    assert.deepEqual(await loadInstrumentations(configFromEnv({})), []);
  });

  it('reads the configured file', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'injector-config-'));
    try {
      const file = join(dir, 'instrumentations.json');
      await writeFile(file, JSON.stringify([{ metadata: { name: 'default', namespace: 'shop' } }]));
      const list = await loadInstrumentations(configFromEnv({ INSTRUMENTATIONS_FILE: file }));
      assert.deepEqual(list, [{ metadata: { name: 'default', namespace: 'shop' }, spec: {} }]);
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });
});
