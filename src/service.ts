import type { V1Pod } from '@kubernetes/client-node';
import { TopologyAttribute } from './constants.js';
import type { AttributeMap } from './types.js';

const SERVICE_NAME_SOURCES = [
  TopologyAttribute.DeploymentName,
  TopologyAttribute.StatefulSetName,
  TopologyAttribute.JobName,
  TopologyAttribute.CronJobName,
  TopologyAttribute.PodName,
] as const;

/** Workload name, else pod name, else the name of the container at `index`. */
export function chooseServiceName(pod: V1Pod, attributes: AttributeMap, index: number): string {
  for (const key of SERVICE_NAME_SOURCES) {
    const name = attributes[key];
    if (name) return name;
  }
  return pod.spec?.containers[index]?.name ?? '';
}

/**
 * Image tag of the container at `index`, or undefined.
 * `registry:5000/app` has no tag: the last colon segment there is a registry port.
 */
export function chooseServiceVersion(pod: V1Pod, index: number): string | undefined {
  const image = pod.spec?.containers[index]?.image;
  if (!image) return undefined;
  const withoutDigest = image.split('@')[0];
  const parts = withoutDigest.split(':');
  if (parts.length < 2) return undefined;
  const tag = parts[parts.length - 1];
  if (tag === '' || tag.includes('/')) return undefined;
  return tag;
}
