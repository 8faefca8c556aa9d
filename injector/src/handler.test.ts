/**
 * Webhook tests: AdmissionReview request/response, annotation opt-in, patch contents.
 */

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import type { V1Container, V1Namespace, V1Pod, V1ReplicaSet } from '@kubernetes/client-node';
import { createDefaultAgentInjectors } from '../../src/agents.js';
import { createSdkInjector } from '../../src/inject.js';
import type { ClusterReader } from '../../src/owners.js';
import { ObjectNotFoundError } from '../../src/owners.js';
import type { Instrumentation } from '../../src/types.js';
import { handleAdmissionReview } from './handler.js';
import type { JsonPatchOp } from './patch.js';
import type { WebhookDeps } from './types.js';

process.env.LOG_LEVEL = 'silent';

const validRequestUid = '705ab4f5-6393-11e8-b7cc-42010a800002';

const reader: ClusterReader = {
  getReplicaSet: async (namespace, name): Promise<V1ReplicaSet> => {
    throw new ObjectNotFoundError('replicaset', name, namespace);
  },
  getNamespace: async (name): Promise<V1Namespace> => ({ metadata: { name } }),
};

const javaInstrumentation: Instrumentation = {
  metadata: { name: 'default', namespace: 'shop' },
  spec: { java: { image: 'agents/java:8' } },
};

function deps(overrides: Partial<WebhookDeps> = {}): WebhookDeps {
  return {
    reader,
    injector: createSdkInjector({ reader, agents: createDefaultAgentInjectors() }),
    instrumentations: [javaInstrumentation],
    ...overrides,
  };
}

function makeRequest(pod: unknown, operation = 'CREATE', uid = validRequestUid) {
  return {
    apiVersion: 'admission.k8s.io/v1',
    kind: 'AdmissionReview',
    request: {
      uid,
      kind: { group: '', version: 'v1', kind: 'Pod' },
      resource: { group: '', version: 'v1', resource: 'pods' },
      namespace: 'shop',
      name: 'web-1',
      operation,
      object: pod,
    },
  };
}

function javaPod(): V1Pod {
  return {
    metadata: { name: 'web-1', annotations: { 'instrumentation.newrelic.com/inject-java': 'true' } },
    spec: { containers: [{ name: 'app', image: 'shop/web:2.1' }] },
  };
}

function decodePatch(patch: string | undefined): JsonPatchOp[] {
  assert.ok(patch);
  const parsed: unknown = JSON.parse(Buffer.from(patch, 'base64').toString('utf8'));
  assert.ok(Array.isArray(parsed));
  return parsed;
}

describe('handleAdmissionReview', () => {
  it('returns allowed: false when body has no request', async () => {
    const res = await handleAdmissionReview({}, deps());
    assert.equal(res.response.allowed, false);
    assert.equal(res.response.status?.message, 'Invalid AdmissionReview: missing request');
  });

  it('returns 400 when request.uid is missing', async () => {
    const res = await handleAdmissionReview(
      { apiVersion: 'admission.k8s.io/v1', kind: 'AdmissionReview', request: { operation: 'CREATE' } },
      deps()
    );
    assert.equal(res.response.allowed, false);
    assert.equal(res.response.status?.code, 400);
    assert.equal(res.response.status?.message, 'Invalid AdmissionReview: missing request.uid');
  });

  it('allows other operations untouched', async () => {
    const res = await handleAdmissionReview(makeRequest(javaPod(), 'DELETE'), deps());
    assert.equal(res.response.allowed, true);
    assert.equal(res.response.uid, validRequestUid);
    assert.equal(res.response.patch, undefined);
  });

  it('rejects an object that is not a pod', async () => {
    const res = await handleAdmissionReview(makeRequest({ spec: {} }), deps());
    assert.equal(res.response.allowed, false);
    assert.equal(res.response.status?.message, 'Invalid Pod: missing metadata');
  });

  it('returns no patch when no language is requested', async () => {
    const pod = javaPod();
    pod.metadata = { name: 'web-1' };
    const res = await handleAdmissionReview(makeRequest(pod), deps());
    assert.equal(res.response.allowed, true);
    assert.equal(res.response.patch, undefined);
  });

  it('patches containers, init containers and volumes for an annotated pod', async () => {
    const res = await handleAdmissionReview(makeRequest(javaPod()), deps());
    assert.equal(res.response.allowed, true);
    assert.equal(res.response.uid, validRequestUid);
    assert.equal(res.response.patchType, 'JSONPatch');
    const ops = decodePatch(res.response.patch);
    assert.deepEqual(
      ops.map((op) => `${op.op} ${op.path}`),
      ['replace /spec/containers', 'add /spec/initContainers', 'add /spec/volumes']
    );
    const containers: V1Container[] = Array.isArray(ops[0].value) ? ops[0].value : [];
    const env = containers[0]?.env ?? [];
    assert.equal(env.find((e) => e.name === 'OTEL_SERVICE_NAME')?.value, 'web-1');
    assert.equal(env[env.length - 1].name, 'OTEL_RESOURCE_ATTRIBUTES');
    assert.equal(
      env[env.length - 1].value,
      'k8s.container.name=app,k8s.namespace.name=shop,k8s.node.name=$(OTEL_RESOURCE_ATTRIBUTES_NODE_NAME),' +
        'k8s.pod.name=web-1,service.instance.id=shop.web-1.app,service.version=2.1'
    );
  });

  it('reads opt-in from namespace annotations', async () => {
    const pod = javaPod();
    pod.metadata = { name: 'web-1' };
    const annotatedReader: ClusterReader = {
      ...reader,
      getNamespace: async (name) => ({
        metadata: { name, annotations: { 'instrumentation.newrelic.com/inject-java': 'default' } },
      }),
    };
    const res = await handleAdmissionReview(makeRequest(pod), deps({ reader: annotatedReader }));
    assert.equal(res.response.patchType, 'JSONPatch');
  });

  it('still uses pod annotations when the namespace cannot be read', async () => {
    const failingReader: ClusterReader = {
      ...reader,
      getNamespace: async (name) => {
        throw new ObjectNotFoundError('namespace', name);
      },
    };
    const res = await handleAdmissionReview(makeRequest(javaPod()), deps({ reader: failingReader }));
    assert.equal(res.response.allowed, true);
    assert.equal(res.response.patchType, 'JSONPatch');
  });

  it('admits the pod with a warning when injection fails', async () => {
    const res = await handleAdmissionReview(
      makeRequest(javaPod()),
      deps({
        injector: {
          inject: async () => {
            throw new Error('boom');
          },
        },
      })
    );
    assert.equal(res.response.allowed, true);
    assert.equal(res.response.patch, undefined);
    assert.deepEqual(res.response.warnings, ['agent injection failed: boom']);
  });

  it('returns no patch for a pod that is already injected', async () => {
    const d = deps();
    const pod = javaPod();
    await d.injector.inject({ java: javaInstrumentation }, { metadata: { name: 'shop' } }, pod, 'app');
    const res = await handleAdmissionReview(makeRequest(pod), d);
    assert.equal(res.response.allowed, true);
    assert.equal(res.response.patch, undefined);
  });
});
