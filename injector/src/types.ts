/**
 * Kubernetes AdmissionReview types for the mutating webhook (admission.k8s.io/v1).
 */

import type { V1Pod } from '@kubernetes/client-node';
import type { ClusterReader } from '../../src/owners.js';
import type { SdkInjector } from '../../src/inject.js';
import type { Instrumentation } from '../../src/types.js';

export const ADMISSION_API_VERSION = 'admission.k8s.io/v1';
export const ADMISSION_KIND = 'AdmissionReview';

/** AdmissionReview request as sent by the API server. */
export interface AdmissionRequest {
  uid: string;
  namespace?: string;
  operation: 'CREATE' | 'UPDATE' | 'DELETE' | 'CONNECT';
  /** Untrusted until checked by isPod. */
  object?: unknown;
}

/** AdmissionReview request body (what we receive). */
export interface AdmissionReviewRequest {
  apiVersion: string;
  kind: string;
  request?: AdmissionRequest | null;
}

/** AdmissionReview response body (what we return). */
export interface AdmissionReviewResponse {
  apiVersion: string;
  kind: string;
  response: {
    uid: string;
    allowed: boolean;
    status?: { code: number; message: string };
    patchType?: 'JSONPatch';
    patch?: string;
    warnings?: string[];
  };
}

/** What the handler needs from the rest of the process. */
export interface WebhookDeps {
  injector: SdkInjector;
  reader: ClusterReader;
  instrumentations: readonly Instrumentation[];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value != null && typeof value === 'object' && !Array.isArray(value);
}

/** Shape check for request.object: metadata object and, when present, a spec whose containers are named. */
export function isPod(value: unknown): value is V1Pod {
  if (!isRecord(value) || !isRecord(value.metadata)) return false;
  const spec = value.spec;
  if (spec === undefined) return true;
  if (!isRecord(spec)) return false;
  const containers = spec.containers;
  return (
    Array.isArray(containers) &&
    containers.every((c: unknown) => isRecord(c) && typeof c.name === 'string')
  );
}

/** Extracts the request of an AdmissionReview body, or a reason it has none usable. */
export function parseAdmissionRequest(body: unknown): AdmissionRequest | string {
  if (!isRecord(body) || !('request' in body)) {
    return 'Invalid AdmissionReview: missing request';
  }
  const req = body.request;
  if (!isRecord(req)) {
    return 'Invalid AdmissionReview: missing request';
  }
  const uid = req.uid;
  if (typeof uid !== 'string' || uid === '') {
    return 'Invalid AdmissionReview: missing request.uid';
  }
  const operation = req.operation;
  if (operation !== 'CREATE' && operation !== 'UPDATE' && operation !== 'DELETE' && operation !== 'CONNECT') {
    return 'Invalid AdmissionReview: unknown request.operation';
  }
  return {
    uid,
    namespace: typeof req.namespace === 'string' ? req.namespace : undefined,
    operation,
    object: req.object,
  };
}
