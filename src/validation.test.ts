import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { validateEnv, validateInstrumentation, ValidationError } from './validation.js';

describe('validateEnv', () => {
  it('accepts agent and OpenTelemetry variables', () => {
    assert.doesNotThrow(() =>
      validateEnv([
        { name: 'NEW_RELIC_LOG_LEVEL', value: 'info' },
        { name: 'OTEL_EXPORTER_OTLP_HEADERS', value: 'x=1' },
      ])
    );
  });

  it('rejects any other name with the offending name in the message', () => {
    assert.throws(
      () => validateEnv([{ name: 'OTEL_LOG_LEVEL', value: 'debug' }, { name: 'JAVA_OPTS', value: '-Xmx1g' }], 'spec.java.env'),
      (err: Error) =>
        err instanceof ValidationError &&
        err.field === 'spec.java.env' &&
        err.message === 'env name should start with "NEW_RELIC_" or "OTEL_": JAVA_OPTS'
    );
  });
});

describe('validateInstrumentation', () => {
  it('accepts a minimal instrumentation', () => {
    const inst = validateInstrumentation({ metadata: { name: 'default', namespace: 'shop' } });
    assert.deepEqual(inst, { metadata: { name: 'default', namespace: 'shop' }, spec: {} });
  });

  it('parses a full instrumentation', () => {
    const inst = validateInstrumentation({
      metadata: { name: 'default', namespace: 'shop' },
      spec: {
        exporter: { endpoint: 'http://collector:4318' },
        resource: { attributes: { team: 'payments' }, addK8sUIDAttributes: true },
        propagators: ['tracecontext', 'b3'],
        sampler: { type: 'traceidratio', argument: '0.1' },
        env: [{ name: 'OTEL_LOG_LEVEL', value: 'debug' }],
        licenseKeySecret: 'team-license',
        java: {
          image: 'agents/java:8',
          env: [{ name: 'NEW_RELIC_LOG_FILE_NAME', value: 'STDOUT' }],
          resources: { limits: { cpu: '200m', memory: '128Mi' } },
        },
      },
    });
    assert.deepEqual(inst.spec.propagators, ['tracecontext', 'b3']);
    assert.equal(inst.spec.sampler?.type, 'traceidratio');
    assert.equal(inst.spec.resource?.addK8sUIDAttributes, true);
    assert.deepEqual(inst.spec.resource?.attributes, { team: 'payments' });
    assert.equal(inst.spec.java?.image, 'agents/java:8');
    assert.deepEqual(inst.spec.java?.resources, { limits: { cpu: '200m', memory: '128Mi' } });
    assert.equal(inst.spec.licenseKeySecret, 'team-license');
  });

  it('keeps env sources', () => {
    const inst = validateInstrumentation({
      metadata: { name: 'default', namespace: 'shop' },
      spec: {
        env: [{ name: 'NEW_RELIC_LICENSE_KEY', valueFrom: { secretKeyRef: { name: 'nr', key: 'license' } } }],
      },
    });
    assert.deepEqual(inst.spec.env, [{ name: 'NEW_RELIC_LICENSE_KEY', valueFrom: { secretKeyRef: { name: 'nr', key: 'license' } } }]);
  });

  it('rejects missing metadata', () => {
    assert.throws(
      () => validateInstrumentation({ spec: {} }),
      (err: Error) => err instanceof ValidationError && err.field === 'metadata'
    );
    assert.throws(
      () => validateInstrumentation({ metadata: { name: 'default' } }),
      (err: Error) => err instanceof ValidationError && err.field === 'metadata.namespace'
    );
  });

  it('rejects unknown propagators and sampler types', () => {
    assert.throws(
      () => validateInstrumentation({ metadata: { name: 'a', namespace: 'b' }, spec: { propagators: ['zipkin'] } }),
      (err: Error) => err instanceof ValidationError && err.field === 'spec.propagators'
    );
    assert.throws(
      () => validateInstrumentation({ metadata: { name: 'a', namespace: 'b' }, spec: { sampler: { type: 'sometimes' } } }),
      (err: Error) => err instanceof ValidationError && err.field === 'spec.sampler.type'
    );
  });

  it('rejects disallowed env names in agent blocks', () => {
    assert.throws(
      () =>
        validateInstrumentation({
          metadata: { name: 'a', namespace: 'b' },
          spec: { python: { image: 'agents/python:1', env: [{ name: 'PYTHONPATH', value: '/x' }] } },
        }),
      (err: Error) => err instanceof ValidationError && err.field === 'spec.python.env'
    );
  });

  it('rejects non-string attribute values and env sources with two kinds', () => {
    assert.throws(
      () => validateInstrumentation({ metadata: { name: 'a', namespace: 'b' }, spec: { resource: { attributes: { n: 1 } } } }),
      ValidationError
    );
    assert.throws(
      () =>
        validateInstrumentation({
          metadata: { name: 'a', namespace: 'b' },
          spec: {
            env: [
              {
                name: 'OTEL_X',
                valueFrom: { fieldRef: { fieldPath: 'metadata.name' }, secretKeyRef: { name: 's', key: 'k' } },
              },
            ],
          },
        }),
      /exactly one source/
    );
  });

  it('rejects a non-object', () => {
    assert.throws(() => validateInstrumentation('default'), ValidationError);
  });
});
