/**
 * AdmissionReview request/response handling.
 * Parses the request, selects instrumentations from annotations, runs the engine on a copy of the
 * pod and returns the difference as a JSON Patch. A well-formed request is never denied.
 */

import type { V1Namespace } from '@kubernetes/client-node';
import { errorMessage, logDebug, logError, logInfo, logWarn } from '../../src/logger.js';
import type { AdmissionReviewResponse, WebhookDeps } from './types.js';
import { ADMISSION_API_VERSION, ADMISSION_KIND, isPod, parseAdmissionRequest } from './types.js';
import { selectLanguageInstrumentations, targetContainerNames } from './eligibility.js';
import { buildPatch, encodePatch } from './patch.js';

async function resolveNamespace(deps: WebhookDeps, name: string): Promise<V1Namespace> {
  try {
    return await deps.reader.getNamespace(name);
  } catch (err) {
    logWarn('Cannot read namespace; namespace annotations are ignored', { namespace: name, error: errorMessage(err) });
    return { metadata: { name } };
  }
}

/**
 * Handle a single AdmissionReview request body and return the response body.
 * The patch is base64-encoded per the Kubernetes API.
 */
export async function handleAdmissionReview(body: unknown, deps: WebhookDeps): Promise<AdmissionReviewResponse> {
  const response: AdmissionReviewResponse = {
    apiVersion: ADMISSION_API_VERSION,
    kind: ADMISSION_KIND,
    response: {
      uid: '',
      allowed: true,
    },
  };

  const req = parseAdmissionRequest(body);
  if (typeof req === 'string') {
    response.response.allowed = false;
    response.response.status = { code: 400, message: req };
    return response;
  }

  response.response.uid = req.uid;

  if (req.operation !== 'CREATE' && req.operation !== 'UPDATE') {
    return response;
  }

  const pod = req.object;
  if (!isPod(pod)) {
    response.response.allowed = false;
    response.response.status = { code: 400, message: 'Invalid Pod: missing metadata' };
    return response;
  }

  const namespaceName = req.namespace ?? pod.metadata?.namespace ?? '';
  const namespace = await resolveNamespace(deps, namespaceName);
  const selected = selectLanguageInstrumentations(namespace, pod, deps.instrumentations);
  const languages = Object.keys(selected);
  const podName = pod.metadata?.name ?? pod.metadata?.generateName;
  if (languages.length === 0) {
    logDebug('No instrumentation requested for pod', { namespace: namespaceName, pod: podName });
    return response;
  }

  const mutated = structuredClone(pod);
  try {
    for (const containerName of targetContainerNames(namespace, pod)) {
      await deps.injector.inject(selected, namespace, mutated, containerName);
    }
  } catch (err) {
    logError('Agent injection failed; admitting pod unchanged', {
      namespace: namespaceName,
      pod: podName,
      error: errorMessage(err),
    });
    response.response.warnings = [`agent injection failed: ${errorMessage(err)}`];
    return response;
  }

  const ops = buildPatch(pod, mutated);
  if (ops.length === 0) {
    return response;
  }
  logInfo('Injecting agents into pod', { namespace: namespaceName, pod: podName, languages, operations: ops.length });
  response.response.patchType = 'JSONPatch';
  response.response.patch = encodePatch(ops);
  return response;
}
