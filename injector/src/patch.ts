/**
 * Build the JSON Patch (RFC 6902) that turns the admitted pod into the injected one.
 * Only the spec fields the engine touches are compared; each differing field is written whole.
 */

import type { V1Pod, V1PodSpec } from '@kubernetes/client-node';

export type JsonPatchOp = { op: 'add' | 'remove' | 'replace'; path: string; value?: unknown };

const PATCHED_FIELDS: readonly (keyof V1PodSpec)[] = ['containers', 'initContainers', 'volumes', 'shareProcessNamespace'];

function sameValue(a: unknown, b: unknown): boolean {
  return JSON.stringify(a) === JSON.stringify(b);
}

/** Operations that take `original` to `mutated`; empty when nothing changed. */
export function buildPatch(original: V1Pod, mutated: V1Pod): JsonPatchOp[] {
  const ops: JsonPatchOp[] = [];
  if (!mutated.spec) return ops;
  if (!original.spec) {
    return [{ op: 'add', path: '/spec', value: mutated.spec }];
  }
  for (const field of PATCHED_FIELDS) {
    const before = original.spec[field];
    const after = mutated.spec[field];
    if (after === undefined || sameValue(before, after)) continue;
    ops.push({ op: before === undefined ? 'add' : 'replace', path: `/spec/${field}`, value: after });
  }
  return ops;
}

/** Base64 of the JSON-encoded operations, as AdmissionReview responses carry them. */
export function encodePatch(ops: readonly JsonPatchOp[]): string {
  return Buffer.from(JSON.stringify(ops), 'utf8').toString('base64');
}
