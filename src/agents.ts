/**
 * Default per-language agent injectors.
 * In-process agents are copied by an init container into a shared emptyDir volume that the
 * application container mounts; the runtime is pointed at them through language env vars.
 * The Go agent runs out of process, in a privileged sidecar sharing the pod's process namespace.
 */

import type { V1Container, V1EnvVar, V1Namespace, V1Pod } from '@kubernetes/client-node';
import { ANNOTATION_GO_TARGET_EXE } from './constants.js';
import { indexOfEnv, insertEnvIfAbsent } from './env.js';
import { annotationValue } from './inject.js';
import type { AgentSpec, Language } from './types.js';

/** The agent cannot be prepared for this container; the engine skips the language. */
export class AgentInjectionError extends Error {
  constructor(
    message: string,
    public readonly language: Language
  ) {
    super(message);
    this.name = 'AgentInjectionError';
    Object.setPrototypeOf(this, AgentInjectionError.prototype);
  }
}

export interface AgentInjector {
  readonly language: Language;
  /** True when the agent runs in its own container appended to the pod. */
  readonly sidecar: boolean;
  /**
   * Prepares the agent for the container at `containerIndex`, mutating and returning `pod`.
   * Annotations the agent reads are looked up on the pod, then on `namespace`.
   */
  apply(agent: AgentSpec, pod: V1Pod, containerIndex: number, namespace?: V1Namespace): V1Pod;
}

/** How a language variable is combined with a value the application already sets. */
type EnvMerge =
  | { mode: 'append' | 'prepend'; separator: string }
  | { mode: 'keep' };

interface AgentEnv {
  name: string;
  value: string;
  merge: EnvMerge;
}

interface InProcessAgent {
  language: Exclude<Language, 'go'>;
  env: (mountPath: string) => AgentEnv[];
}

/** Where agent images keep the files to copy. */
const AGENT_SOURCE_PATH = '/instrumentation/.';

const IN_PROCESS_AGENTS: InProcessAgent[] = [
  {
    language: 'java',
    env: (dir) => [
      { name: 'JAVA_TOOL_OPTIONS', value: `-javaagent:${dir}/newrelic-agent.jar`, merge: { mode: 'append', separator: ' ' } },
    ],
  },
  {
    language: 'nodejs',
    env: (dir) => [
      { name: 'NODE_OPTIONS', value: `--require ${dir}/newrelicinstrumentation.js`, merge: { mode: 'append', separator: ' ' } },
    ],
  },
  {
    language: 'python',
    env: (dir) => [{ name: 'PYTHONPATH', value: dir, merge: { mode: 'prepend', separator: ':' } }],
  },
  {
    language: 'dotnet',
    env: (dir) => [
      { name: 'CORECLR_ENABLE_PROFILING', value: '1', merge: { mode: 'keep' } },
      { name: 'CORECLR_PROFILER', value: '{36032161-FFC0-4B61-B559-F6C5D41BAE5A}', merge: { mode: 'keep' } },
      { name: 'CORECLR_PROFILER_PATH', value: `${dir}/libNewRelicProfiler.so`, merge: { mode: 'keep' } },
      { name: 'CORECLR_NEWRELIC_HOME', value: dir, merge: { mode: 'keep' } },
    ],
  },
  {
    language: 'php',
    env: (dir) => [{ name: 'PHP_INI_SCAN_DIR', value: `${dir}/php-agent/ini`, merge: { mode: 'append', separator: ':' } }],
  },
];

export const GO_SIDECAR_NAME = 'newrelic-go-agent';
export const GO_TARGET_EXE_ENV = 'OTEL_GO_AUTO_TARGET_EXE';

function agentResourceName(language: Language): string {
  return `newrelic-instrumentation-${language}`;
}

function appendByName<T extends { name: string }>(items: T[] | undefined, item: T): T[] {
  const list = items ?? [];
  if (!list.some((existing) => existing.name === item.name)) {
    list.push(item);
  }
  return list;
}

/** Sets or extends one language variable; the caller has already rejected valueFrom variables. */
function mergeEnv(envs: V1EnvVar[] | undefined, agentEnv: AgentEnv): V1EnvVar[] {
  const list = envs ?? [];
  const idx = indexOfEnv(list, agentEnv.name);
  if (idx === -1) {
    list.push({ name: agentEnv.name, value: agentEnv.value });
    return list;
  }
  const existing = list[idx];
  const current = existing.value ?? '';
  const merge = agentEnv.merge;
  if (merge.mode === 'keep' || current.includes(agentEnv.value)) {
    return list;
  }
  if (current === '') {
    existing.value = agentEnv.value;
  } else if (merge.mode === 'append') {
    existing.value = `${current}${merge.separator}${agentEnv.value}`;
  } else {
    existing.value = `${agentEnv.value}${merge.separator}${current}`;
  }
  return list;
}

function targetContainer(pod: V1Pod, containerIndex: number, language: Language): V1Container {
  const container = pod.spec?.containers[containerIndex];
  if (!container) {
    throw new AgentInjectionError(`pod has no container at index ${containerIndex}`, language);
  }
  return container;
}

function createInProcessInjector(definition: InProcessAgent): AgentInjector {
  const { language } = definition;
  const resourceName = agentResourceName(language);
  const mountPath = `/${resourceName}`;

  return {
    language,
    sidecar: false,
    apply(agent: AgentSpec, pod: V1Pod, containerIndex: number): V1Pod {
      if (!agent.image) {
        throw new AgentInjectionError(`no ${language} agent image configured`, language);
      }
      const spec = pod.spec;
      const container = targetContainer(pod, containerIndex, language);
      if (!spec) return pod;

      // Validate every variable before touching the pod so a failure leaves it unchanged.
      const agentEnvs = definition.env(mountPath);
      for (const agentEnv of agentEnvs) {
        const idx = indexOfEnv(container.env, agentEnv.name);
        if (idx !== -1 && container.env?.[idx].valueFrom) {
          throw new AgentInjectionError(`the container defines env var ${agentEnv.name} with valueFrom`, language);
        }
      }

      for (const agentEnv of agentEnvs) {
        container.env = mergeEnv(container.env, agentEnv);
      }
      for (const env of agent.env ?? []) {
        container.env = insertEnvIfAbsent(container.env, env);
      }
      container.volumeMounts = appendByName(container.volumeMounts, { name: resourceName, mountPath });
      spec.volumes = appendByName(spec.volumes, { name: resourceName, emptyDir: {} });
      spec.initContainers = appendByName(spec.initContainers, {
        name: resourceName,
        image: agent.image,
        command: ['cp', '-a', AGENT_SOURCE_PATH, mountPath],
        volumeMounts: [{ name: resourceName, mountPath }],
        ...(agent.resources && { resources: agent.resources }),
      });
      return pod;
    },
  };
}

function createGoInjector(): AgentInjector {
  return {
    language: 'go',
    sidecar: true,
    apply(agent: AgentSpec, pod: V1Pod, containerIndex: number, namespace: V1Namespace = {}): V1Pod {
      if (!agent.image) {
        throw new AgentInjectionError('no go agent image configured', 'go');
      }
      const spec = pod.spec;
      targetContainer(pod, containerIndex, 'go');
      if (!spec) return pod;
      if (spec.containers.some((c) => c.name === GO_SIDECAR_NAME)) {
        throw new AgentInjectionError('go agent sidecar already present', 'go');
      }
      const targetExe = annotationValue(namespace, pod, ANNOTATION_GO_TARGET_EXE);
      if (!targetExe) {
        throw new AgentInjectionError(`annotation ${ANNOTATION_GO_TARGET_EXE} is required for go instrumentation`, 'go');
      }

      let env: V1EnvVar[] = [{ name: GO_TARGET_EXE_ENV, value: targetExe }];
      for (const extra of agent.env ?? []) {
        env = insertEnvIfAbsent(env, extra);
      }
      spec.shareProcessNamespace = true;
      spec.containers.push({
        name: GO_SIDECAR_NAME,
        image: agent.image,
        securityContext: { privileged: true, runAsUser: 0 },
        env,
        ...(agent.resources && { resources: agent.resources }),
      });
      return pod;
    },
  };
}

/** One injector per supported language. */
export function createDefaultAgentInjectors(): AgentInjector[] {
  return [...IN_PROCESS_AGENTS.map(createInProcessInjector), createGoInjector()];
}
