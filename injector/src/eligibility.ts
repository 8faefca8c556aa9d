/**
 * Annotation-based opt-in: which instrumentation applies to each language of a pod, and
 * which containers receive it. Pod annotations take precedence over namespace annotations.
 */

import type { V1Namespace, V1Pod } from '@kubernetes/client-node';
import { ANNOTATION_CONTAINER_NAMES, injectAnnotation } from '../../src/constants.js';
import { annotationValue } from '../../src/inject.js';
import { logWarn } from '../../src/logger.js';
import { LANGUAGES } from '../../src/types.js';
import type { Instrumentation, LanguageInstrumentations } from '../../src/types.js';

export { annotationValue };

/**
 * Resolves one annotation value:
 * "true" picks the only instrumentation in the pod's namespace, or the only one overall;
 * anything else names one as `name` (pod's namespace) or `namespace/name`.
 */
function resolveInstrumentation(
  value: string,
  namespaceName: string,
  instrumentations: readonly Instrumentation[]
): Instrumentation | string {
  if (value.toLowerCase() === 'true') {
    const local = instrumentations.filter((i) => i.metadata.namespace === namespaceName);
    if (local.length === 1) return local[0];
    if (local.length === 0 && instrumentations.length === 1) return instrumentations[0];
    return local.length > 1 || instrumentations.length > 1
      ? 'more than one instrumentation available; name one in the annotation'
      : 'no instrumentation available';
  }
  const slash = value.indexOf('/');
  const namespace = slash === -1 ? namespaceName : value.slice(0, slash);
  const name = slash === -1 ? value : value.slice(slash + 1);
  const match = instrumentations.find((i) => i.metadata.namespace === namespace && i.metadata.name === name);
  return match ?? `instrumentation ${namespace}/${name} not found`;
}

/** Language → instrumentation for every inject-<language> annotation that is set and not "false". */
export function selectLanguageInstrumentations(
  namespace: V1Namespace,
  pod: V1Pod,
  instrumentations: readonly Instrumentation[]
): LanguageInstrumentations {
  const namespaceName = namespace.metadata?.name ?? pod.metadata?.namespace ?? '';
  const selected: LanguageInstrumentations = {};
  for (const language of LANGUAGES) {
    const value = annotationValue(namespace, pod, injectAnnotation(language)).trim();
    if (value === '' || value.toLowerCase() === 'false') continue;

    const resolved = resolveInstrumentation(value, namespaceName, instrumentations);
    if (typeof resolved === 'string') {
      logWarn('Cannot resolve instrumentation for language; skipping', {
        language,
        namespace: namespaceName,
        pod: pod.metadata?.name ?? pod.metadata?.generateName,
        annotation: value,
        reason: resolved,
      });
      continue;
    }
    selected[language] = resolved;
  }
  return selected;
}

/** Names listed in the container-names annotation, or the first container's name. */
export function targetContainerNames(namespace: V1Namespace, pod: V1Pod): string[] {
  const names = annotationValue(namespace, pod, ANNOTATION_CONTAINER_NAMES)
    .split(',')
    .map((n) => n.trim())
    .filter((n) => n !== '');
  if (names.length > 0) return names;
  const first = pod.spec?.containers[0]?.name;
  return first ? [first] : [];
}
