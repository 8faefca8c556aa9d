/**
 * ClusterReader backed by the Kubernetes API.
 * Kubeconfig follows the standard loading rules: KUBECONFIG, ~/.kube/config, then the
 * in-cluster service account.
 */

import * as k8s from '@kubernetes/client-node';
import type { ClusterReader } from './owners.js';
import { ObjectNotFoundError } from './owners.js';

export function loadKubeConfig(): k8s.KubeConfig {
  const kc = new k8s.KubeConfig();
  kc.loadFromDefault();
  return kc;
}

function translateNotFound(err: unknown, kind: string, name: string, namespace?: string): unknown {
  if (err instanceof k8s.HttpError && err.statusCode === 404) {
    return new ObjectNotFoundError(kind, name, namespace);
  }
  return err;
}

export function createClusterReader(kc: k8s.KubeConfig): ClusterReader {
  const apps = kc.makeApiClient(k8s.AppsV1Api);
  const core = kc.makeApiClient(k8s.CoreV1Api);

  return {
    async getReplicaSet(namespace, name) {
      try {
        const res = await apps.readNamespacedReplicaSet(name, namespace);
        return res.body;
      } catch (err) {
        throw translateNotFound(err, 'replicaset', name, namespace);
      }
    },
    async getNamespace(name) {
      try {
        const res = await core.readNamespace(name);
        return res.body;
      } catch (err) {
        throw translateNotFound(err, 'namespace', name);
      }
    },
  };
}
