import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import type { V1Namespace, V1Pod } from '@kubernetes/client-node';
import type { Instrumentation } from '../../src/types.js';
import { selectLanguageInstrumentations, targetContainerNames } from './eligibility.js';

process.env.LOG_LEVEL = 'silent';

function inst(namespace: string, name: string): Instrumentation {
  return { metadata: { name, namespace }, spec: {} };
}

function pod(annotations: Record<string, string>): V1Pod {
  return {
    metadata: { name: 'web-1', namespace: 'shop', annotations },
    spec: { containers: [{ name: 'app' }, { name: 'sidecar' }] },
  };
}

const shop: V1Namespace = { metadata: { name: 'shop' } };

describe('selectLanguageInstrumentations', () => {
  it('picks the only instrumentation of the namespace for "true"', () => {
    const local = inst('shop', 'default');
    const selected = selectLanguageInstrumentations(
      shop,
      pod({ 'instrumentation.newrelic.com/inject-java': 'true' }),
      [inst('other', 'default'), local]
    );
    assert.deepEqual(selected, { java: local });
  });

  it('falls back to the only instrumentation overall', () => {
    const only = inst('observability', 'cluster-wide');
    const selected = selectLanguageInstrumentations(shop, pod({ 'instrumentation.newrelic.com/inject-python': 'true' }), [only]);
    assert.deepEqual(selected, { python: only });
  });

  it('skips "true" when the choice is ambiguous', () => {
    const selected = selectLanguageInstrumentations(
      shop,
      pod({ 'instrumentation.newrelic.com/inject-java': 'true' }),
      [inst('shop', 'a'), inst('shop', 'b')]
    );
    assert.deepEqual(selected, {});
  });

  it('resolves names and namespace/name references', () => {
    const a = inst('shop', 'a');
    const b = inst('observability', 'b');
    const selected = selectLanguageInstrumentations(
      shop,
      pod({
        'instrumentation.newrelic.com/inject-java': 'a',
        'instrumentation.newrelic.com/inject-nodejs': 'observability/b',
        'instrumentation.newrelic.com/inject-php': 'missing',
      }),
      [a, b]
    );
    assert.deepEqual(selected, { java: a, nodejs: b });
  });

  it('honours namespace annotations unless the pod says "false"', () => {
    const a = inst('shop', 'a');
    const ns: V1Namespace = {
      metadata: {
        name: 'shop',
        annotations: {
          'instrumentation.newrelic.com/inject-java': 'true',
          'instrumentation.newrelic.com/inject-dotnet': 'true',
        },
      },
    };
    const selected = selectLanguageInstrumentations(ns, pod({ 'instrumentation.newrelic.com/inject-dotnet': 'false' }), [a]);
    assert.deepEqual(selected, { java: a });
  });
});

describe('targetContainerNames', () => {
  it('reads the container-names annotation', () => {
    assert.deepEqual(
      targetContainerNames(shop, pod({ 'instrumentation.newrelic.com/container-names': 'app, sidecar,' })),
      ['app', 'sidecar']
    );
  });

  it('defaults to the first container', () => {
    assert.deepEqual(targetContainerNames(shop, pod({})), ['app']);
  });
});
