/**
 * Owner-reference walk: maps a pod's controllers (ReplicaSet → Deployment, StatefulSet, Job, ...)
 * to k8s.<kind>.name / k8s.<kind>.uid resource attributes.
 * Lookups are best effort; a failed read ends that branch and is logged, never thrown.
 */

import type { V1Namespace, V1ObjectMeta, V1ReplicaSet } from '@kubernetes/client-node';
import { MAX_OWNER_DEPTH, REPLICASET_BACKOFF, TopologyAttribute } from './constants.js';
import type { TopologyAttributeKey } from './constants.js';
import { errorMessage, logDebug, logError, logWarn } from './logger.js';
import { retryOnError } from './retry.js';
import type { BackoffPolicy, RetryHooks } from './retry.js';
import type { AttributeMap } from './types.js';

/** Read access to the cluster objects the engine needs. */
export interface ClusterReader {
  getReplicaSet(namespace: string, name: string): Promise<V1ReplicaSet>;
  getNamespace(name: string): Promise<V1Namespace>;
}

/** Thrown by a ClusterReader when the requested object does not exist (yet). */
export class ObjectNotFoundError extends Error {
  constructor(
    public readonly kind: string,
    public readonly objectName: string,
    public readonly namespace?: string
  ) {
    super(`${kind} ${namespace ? `${namespace}/` : ''}${objectName} not found`);
    this.name = 'ObjectNotFoundError';
    Object.setPrototypeOf(this, ObjectNotFoundError.prototype);
  }
}

export interface OwnerResolutionOptions {
  policy?: BackoffPolicy;
  retryHooks?: RetryHooks;
  maxDepth?: number;
}

type OwnerKeys = { name: TopologyAttributeKey; uid: TopologyAttributeKey };

const OWNER_KINDS = new Map<string, OwnerKeys>([
  ['replicaset', { name: TopologyAttribute.ReplicaSetName, uid: TopologyAttribute.ReplicaSetUid }],
  ['deployment', { name: TopologyAttribute.DeploymentName, uid: TopologyAttribute.DeploymentUid }],
  ['statefulset', { name: TopologyAttribute.StatefulSetName, uid: TopologyAttribute.StatefulSetUid }],
  ['daemonset', { name: TopologyAttribute.DaemonSetName, uid: TopologyAttribute.DaemonSetUid }],
  ['job', { name: TopologyAttribute.JobName, uid: TopologyAttribute.JobUid }],
  ['cronjob', { name: TopologyAttribute.CronJobName, uid: TopologyAttribute.CronJobUid }],
]);

function isNotFound(err: unknown): boolean {
  return err instanceof ObjectNotFoundError;
}

/**
 * Resolves owner attributes for an object in `namespace`.
 * A ReplicaSet owner is fetched (with retry while it is not found) so that its Deployment surfaces too.
 */
export async function resolveOwnerAttributes(
  reader: ClusterReader,
  namespace: string,
  objectMeta: V1ObjectMeta | undefined,
  includeUid: boolean,
  options: OwnerResolutionOptions = {}
): Promise<AttributeMap> {
  const attributes: AttributeMap = {};
  await collect(reader, namespace, objectMeta, includeUid, options, attributes, 0);
  return attributes;
}

async function collect(
  reader: ClusterReader,
  namespace: string,
  objectMeta: V1ObjectMeta | undefined,
  includeUid: boolean,
  options: OwnerResolutionOptions,
  attributes: AttributeMap,
  depth: number
): Promise<void> {
  const maxDepth = options.maxDepth ?? MAX_OWNER_DEPTH;
  for (const owner of objectMeta?.ownerReferences ?? []) {
    const kind = owner.kind.toLowerCase();
    const keys = OWNER_KINDS.get(kind);
    if (!keys) continue;

    attributes[keys.name] = owner.name;
    if (includeUid) {
      attributes[keys.uid] = owner.uid;
    }
    if (kind !== 'replicaset') continue;

    if (depth + 1 >= maxDepth) {
      logWarn('Owner chain deeper than allowed; not following', { namespace, replicaset: owner.name, depth });
      continue;
    }

    let replicaSet: V1ReplicaSet;
    try {
      replicaSet = await retryOnError(
        options.policy ?? REPLICASET_BACKOFF,
        isNotFound,
        (attempt) => {
          if (attempt > 1) logDebug('Retrying replicaset lookup', { namespace, replicaset: owner.name, attempt });
          return reader.getReplicaSet(namespace, owner.name);
        },
        options.retryHooks
      );
    } catch (err) {
      logError('failed to get replicaset', { namespace, replicaset: owner.name, error: errorMessage(err) });
      continue;
    }
    await collect(reader, namespace, replicaSet.metadata, includeUid, options, attributes, depth + 1);
  }
}
