/**
 * Per-language injection: delegates agent preparation to an AgentInjector, then stamps the
 * agent and OpenTelemetry configuration into the container that runs the agent.
 * Re-running on an already injected pod changes nothing.
 */

import type { V1Container, V1EnvVar, V1Namespace, V1Pod } from '@kubernetes/client-node';
import type { AgentInjector } from './agents.js';
import { buildResourceMap, parseDeclaredAttributeKeys, resourceMapToStr } from './attributes.js';
import {
  ANNOTATION_GO_CONTAINER_NAMES,
  AUTO_INJECTION_LABELS,
  DEFAULT_LICENSE_KEY_SECRET,
  ENV_APP_NAME,
  ENV_EXPORTER_OTLP_ENDPOINT,
  ENV_LABELS,
  ENV_LICENSE_KEY,
  ENV_NODE_NAME,
  ENV_POD_NAME,
  ENV_POD_UID,
  ENV_PROPAGATORS,
  ENV_RESOURCE_ATTRIBUTES,
  ENV_SERVICE_NAME,
  ENV_TRACES_SAMPLER,
  ENV_TRACES_SAMPLER_ARG,
  TopologyAttribute,
} from './constants.js';
import { indexOfEnv, insertEnvIfAbsent, moveEnvToEnd } from './env.js';
import { errorMessage, logDebug, logInfo, logWarn } from './logger.js';
import type { ClusterReader, OwnerResolutionOptions } from './owners.js';
import { chooseServiceName, chooseServiceVersion } from './service.js';
import { LANGUAGES } from './types.js';
import type { AttributeMap, Instrumentation, Language, LanguageInstrumentations } from './types.js';

export interface SdkInjectorOptions {
  reader: ClusterReader;
  agents: readonly AgentInjector[];
  /** Secret key holding the license key; the secret name comes from the instrumentation or the default. */
  licenseKeySecretKey?: string;
  /** Default secret name when the instrumentation names none. */
  licenseKeySecretName?: string;
  owners?: OwnerResolutionOptions;
}

export interface SdkInjector {
  /** Injects every configured language into `pod` (mutated in place) and returns it. */
  inject(
    instrumentations: LanguageInstrumentations,
    namespace: V1Namespace,
    pod: V1Pod,
    containerName: string
  ): Promise<V1Pod>;
}

/** Index of the first container named `containerName`, falling back to 0. */
export function getContainerIndex(containerName: string, pod: V1Pod): number {
  const idx = pod.spec?.containers.findIndex((c) => c.name === containerName) ?? -1;
  return idx === -1 ? 0 : idx;
}

/** Annotation value, the pod's taking precedence over the namespace's. */
export function annotationValue(namespace: V1Namespace, pod: V1Pod, key: string): string {
  return pod.metadata?.annotations?.[key] ?? namespace.metadata?.annotations?.[key] ?? '';
}

function fieldRefEnv(name: string, fieldPath: string): V1EnvVar {
  return { name, valueFrom: { fieldRef: { fieldPath } } };
}

function envReference(name: string): string {
  return `$(${name})`;
}

export function createSdkInjector(options: SdkInjectorOptions): SdkInjector {
  const agents = new Map<Language, AgentInjector>(options.agents.map((a) => [a.language, a]));
  const secretKey = options.licenseKeySecretKey ?? DEFAULT_LICENSE_KEY_SECRET.key;
  const defaultSecretName = options.licenseKeySecretName ?? DEFAULT_LICENSE_KEY_SECRET.name;

  function injectAgentConfig(
    instrumentation: Instrumentation,
    container: V1Container,
    serviceName: string
  ): void {
    let env = insertEnvIfAbsent(container.env, { name: ENV_APP_NAME, value: serviceName });
    env = insertEnvIfAbsent(env, {
      name: ENV_LICENSE_KEY,
      valueFrom: {
        secretKeyRef: {
          name: instrumentation.spec.licenseKeySecret ?? defaultSecretName,
          key: secretKey,
          optional: true,
        },
      },
    });
    env = insertEnvIfAbsent(env, { name: ENV_LABELS, value: AUTO_INJECTION_LABELS });
    for (const common of instrumentation.spec.env ?? []) {
      env = insertEnvIfAbsent(env, common);
    }
    container.env = env;
  }

  /**
   * agentIndex is the container that receives the variables; appIndex the one whose telemetry is
   * described. They differ only for sidecar agents.
   */
  async function injectCommonSdkConfig(
    instrumentation: Instrumentation,
    namespace: V1Namespace,
    pod: V1Pod,
    agentIndex: number,
    appIndex: number
  ): Promise<void> {
    const containers = pod.spec?.containers ?? [];
    const container = containers[agentIndex];
    const { spec } = instrumentation;
    // Keys declared by either container, counting the common env about to be added, are not emitted.
    const agentEnv = (spec.env ?? []).reduce((env, common) => insertEnvIfAbsent(env, common), container.env ?? []);
    const declared = new Set([
      ...parseDeclaredAttributeKeys(agentEnv),
      ...parseDeclaredAttributeKeys(containers[appIndex]?.env),
    ]);
    const attributes: AttributeMap = await buildResourceMap(options.reader, instrumentation, namespace, pod, appIndex, {
      declared,
      owners: options.owners,
    });
    const serviceName = chooseServiceName(pod, attributes, appIndex);

    injectAgentConfig(instrumentation, container, serviceName);
    let env = insertEnvIfAbsent(container.env, { name: ENV_SERVICE_NAME, value: serviceName });

    if (spec.exporter?.endpoint) {
      env = insertEnvIfAbsent(env, { name: ENV_EXPORTER_OTLP_ENDPOINT, value: spec.exporter.endpoint });
    }

    // Values unknown at admission are filled in by the kubelet through the downward API.
    const fallback = (key: string, envName: string, fieldPath: string): void => {
      if (attributes[key] || declared.has(key)) return;
      env = insertEnvIfAbsent(env, fieldRefEnv(envName, fieldPath));
      attributes[key] = envReference(envName);
    };
    fallback(TopologyAttribute.PodName, ENV_POD_NAME, 'metadata.name');
    if (spec.resource?.addK8sUIDAttributes) {
      fallback(TopologyAttribute.PodUid, ENV_POD_UID, 'metadata.uid');
    }
    if (!declared.has(TopologyAttribute.ServiceVersion)) {
      const version = chooseServiceVersion(pod, appIndex);
      if (version) {
        attributes[TopologyAttribute.ServiceVersion] = version;
      }
    }
    fallback(TopologyAttribute.NodeName, ENV_NODE_NAME, 'spec.nodeName');

    const resStr = resourceMapToStr(attributes);
    const resIdx = indexOfEnv(env, ENV_RESOURCE_ATTRIBUTES);
    if (resIdx === -1) {
      if (resStr !== '') {
        env = insertEnvIfAbsent(env, { name: ENV_RESOURCE_ATTRIBUTES, value: resStr });
      }
    } else if (resStr !== '') {
      const existing = env[resIdx];
      if (existing.valueFrom) {
        logWarn('Resource attributes variable uses valueFrom; not extending it', {
          namespace: namespace.metadata?.name,
          pod: pod.metadata?.name ?? pod.metadata?.generateName,
          container: container.name,
        });
      } else {
        const current = existing.value ?? '';
        const separator = current === '' || current.endsWith(',') ? '' : ',';
        env[resIdx] = { ...existing, value: `${current}${separator}${resStr}` };
      }
    }

    if (spec.propagators && spec.propagators.length > 0) {
      env = insertEnvIfAbsent(env, { name: ENV_PROPAGATORS, value: spec.propagators.join(',') });
    }

    // Configure the sampler only when the instrumentation sets one and the user set neither variable.
    if (
      spec.sampler?.type &&
      indexOfEnv(env, ENV_TRACES_SAMPLER) === -1 &&
      indexOfEnv(env, ENV_TRACES_SAMPLER_ARG) === -1
    ) {
      env = insertEnvIfAbsent(env, { name: ENV_TRACES_SAMPLER, value: spec.sampler.type });
      if (spec.sampler.argument) {
        env = insertEnvIfAbsent(env, { name: ENV_TRACES_SAMPLER_ARG, value: spec.sampler.argument });
      }
    }

    // OTEL_RESOURCE_ATTRIBUTES may reference the variables above, so it must come after them.
    container.env = moveEnvToEnd(env, indexOfEnv(env, ENV_RESOURCE_ATTRIBUTES));
  }

  async function injectLanguage(
    language: Language,
    instrumentation: Instrumentation,
    namespace: V1Namespace,
    pod: V1Pod,
    containerIndex: number
  ): Promise<void> {
    const agentSpec = instrumentation.spec[language];
    const agent = agents.get(language);
    const context = {
      language,
      namespace: namespace.metadata?.name,
      pod: pod.metadata?.name ?? pod.metadata?.generateName,
      instrumentation: `${instrumentation.metadata.namespace}/${instrumentation.metadata.name}`,
    };
    if (!agentSpec) {
      logDebug('Instrumentation has no agent for language; skipping', context);
      return;
    }
    if (!agent) {
      logWarn('No agent injector registered for language; skipping', context);
      return;
    }

    // Sidecar agents support a single application container per pod.
    const appIndex = agent.sidecar
      ? getContainerIndex(annotationValue(namespace, pod, ANNOTATION_GO_CONTAINER_NAMES).split(',')[0].trim(), pod)
      : containerIndex;
    const containerName = pod.spec?.containers[appIndex]?.name;

    logDebug(`injecting ${language} instrumentation into pod`, { ...context, container: containerName });
    try {
      agent.apply(agentSpec, pod, appIndex, namespace);
    } catch (err) {
      logInfo(`Skipping ${language} agent injection`, { ...context, container: containerName, reason: errorMessage(err) });
      return;
    }

    const agentIndex = agent.sidecar ? (pod.spec?.containers.length ?? 1) - 1 : appIndex;
    await injectCommonSdkConfig(instrumentation, namespace, pod, agentIndex, appIndex);
  }

  return {
    async inject(instrumentations, namespace, pod, containerName) {
      if (!pod.spec || pod.spec.containers.length < 1) {
        return pod;
      }
      const index = getContainerIndex(containerName, pod);
      for (const language of LANGUAGES) {
        const instrumentation = instrumentations[language];
        if (!instrumentation) continue;
        await injectLanguage(language, instrumentation, namespace, pod, index);
      }
      return pod;
    },
  };
}
