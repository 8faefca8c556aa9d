/**
 * Instrumentation configuration consumed by the injection engine.
 * Kubernetes object shapes (pods, containers, env vars) come from @kubernetes/client-node.
 */

import type { V1EnvVar, V1ResourceRequirements } from '@kubernetes/client-node';

/** Languages in the order their agents are applied. */
export const LANGUAGES = ['java', 'nodejs', 'python', 'dotnet', 'php', 'go'] as const;

export type Language = (typeof LANGUAGES)[number];

export const PROPAGATORS = ['tracecontext', 'baggage', 'b3', 'b3multi', 'jaeger', 'xray', 'ottrace', 'none'] as const;

export type Propagator = (typeof PROPAGATORS)[number];

export const SAMPLER_TYPES = [
  'always_on',
  'always_off',
  'traceidratio',
  'parentbased_always_on',
  'parentbased_always_off',
  'parentbased_traceidratio',
  'jaeger_remote',
  'parentbased_jaeger_remote',
  'xray',
] as const;

export type SamplerType = (typeof SAMPLER_TYPES)[number];

export interface Sampler {
  type?: SamplerType;
  /** Sampler argument, e.g. the ratio for traceidratio. */
  argument?: string;
}

export interface Exporter {
  /** OTLP endpoint written to OTEL_EXPORTER_OTLP_ENDPOINT. */
  endpoint?: string;
}

export interface ResourceConfig {
  /** Attributes added to OTEL_RESOURCE_ATTRIBUTES ahead of computed ones. */
  attributes?: Record<string, string>;
  /** Also emit k8s.<kind>.uid for owners and a downward-API pod UID. */
  addK8sUIDAttributes?: boolean;
}

/** Per-language agent block. */
export interface AgentSpec {
  /** Image carrying the agent files (or the agent itself, for sidecar agents). */
  image: string;
  env?: V1EnvVar[];
  resources?: V1ResourceRequirements;
}

export interface InstrumentationSpec {
  exporter?: Exporter;
  resource?: ResourceConfig;
  propagators?: Propagator[];
  sampler?: Sampler;
  /** Env vars applied to every instrumented container, whatever the language. */
  env?: V1EnvVar[];
  /** Secret holding the license key. Defaults to newrelic-key-secret. */
  licenseKeySecret?: string;
  java?: AgentSpec;
  nodejs?: AgentSpec;
  python?: AgentSpec;
  dotnet?: AgentSpec;
  php?: AgentSpec;
  go?: AgentSpec;
}

export interface Instrumentation {
  metadata: { name: string; namespace: string };
  spec: InstrumentationSpec;
}

/** Instrumentation selected for each language, resolved before the engine runs. */
export type LanguageInstrumentations = Partial<Record<Language, Instrumentation>>;

/** Resource attribute key → value. Serialized in sorted key order. */
export type AttributeMap = Record<string, string>;
