/**
 * Builds the OTEL_RESOURCE_ATTRIBUTES content for a container.
 * Precedence: attributes already declared in the container's variable win, then user-declared
 * attributes from the instrumentation, then topology computed from the pod and its owners.
 */

import type { V1EnvVar, V1Namespace, V1Pod } from '@kubernetes/client-node';
import { ENV_RESOURCE_ATTRIBUTES, TopologyAttribute } from './constants.js';
import { indexOfEnv } from './env.js';
import { resolveOwnerAttributes } from './owners.js';
import type { ClusterReader, OwnerResolutionOptions } from './owners.js';
import type { AttributeMap, Instrumentation } from './types.js';

/**
 * Keys already present in the OTEL_RESOURCE_ATTRIBUTES variable of `envs`.
 * Pairs that do not split into exactly key and value are ignored.
 */
export function parseDeclaredAttributeKeys(envs: readonly V1EnvVar[] | undefined): Set<string> {
  const declared = new Set<string>();
  const idx = indexOfEnv(envs, ENV_RESOURCE_ATTRIBUTES);
  if (!envs || idx === -1) return declared;
  for (const pair of (envs[idx].value ?? '').split(',')) {
    const parts = pair.trim().split('=');
    if (parts.length !== 2) continue;
    declared.add(parts[0]);
  }
  return declared;
}

/** service.instance.id as namespace.pod.container; empty when any part is unknown. */
export function createServiceInstanceId(namespaceName: string, podName: string, containerName: string): string {
  if (namespaceName === '' || podName === '' || containerName === '') return '';
  return [namespaceName, podName, containerName].join('.');
}

export interface BuildResourceMapOptions {
  /** Keys to leave alone. Defaults to those declared in the container at containerIndex. */
  declared?: ReadonlySet<string>;
  owners?: OwnerResolutionOptions;
}

/**
 * Attribute map for the container at `containerIndex`. Empty values are never included;
 * the pod name in particular is empty while the pod is still a template.
 */
export async function buildResourceMap(
  reader: ClusterReader,
  instrumentation: Instrumentation,
  namespace: V1Namespace,
  pod: V1Pod,
  containerIndex: number,
  options: BuildResourceMapOptions = {}
): Promise<AttributeMap> {
  const container = pod.spec?.containers[containerIndex];
  const declared = options.declared ?? parseDeclaredAttributeKeys(container?.env);
  const resource = instrumentation.spec.resource;

  const res: AttributeMap = {};
  for (const [key, value] of Object.entries(resource?.attributes ?? {})) {
    if (!declared.has(key)) {
      res[key] = value;
    }
  }

  const namespaceName = namespace.metadata?.name ?? '';
  const containerName = container?.name ?? '';
  const podName = pod.metadata?.name ?? '';
  const topology: AttributeMap = {
    [TopologyAttribute.NamespaceName]: namespaceName,
    [TopologyAttribute.ContainerName]: containerName,
    [TopologyAttribute.PodName]: podName,
    [TopologyAttribute.PodUid]: pod.metadata?.uid ?? '',
    [TopologyAttribute.NodeName]: pod.spec?.nodeName ?? '',
    [TopologyAttribute.ServiceInstanceId]: createServiceInstanceId(namespaceName, podName, containerName),
  };
  const owners = await resolveOwnerAttributes(
    reader,
    namespaceName,
    pod.metadata,
    resource?.addK8sUIDAttributes === true,
    options.owners
  );
  Object.assign(topology, owners);

  for (const [key, value] of Object.entries(topology)) {
    if (!declared.has(key) && value !== '') {
      res[key] = value;
    }
  }
  return res;
}

/** key=value pairs in sorted key order, comma separated. */
export function resourceMapToStr(res: AttributeMap): string {
  return Object.keys(res)
    .sort()
    .map((key) => `${key}=${res[key]}`)
    .join(',');
}
