/**
 * Kubernetes APM agent injection engine.
 * Computes the agent and OpenTelemetry environment of instrumented containers.
 */

export { createSdkInjector, getContainerIndex, annotationValue } from './inject.js';
export type { SdkInjector, SdkInjectorOptions } from './inject.js';

export { AgentInjectionError, createDefaultAgentInjectors, GO_SIDECAR_NAME } from './agents.js';
export type { AgentInjector } from './agents.js';

export {
  buildResourceMap,
  createServiceInstanceId,
  parseDeclaredAttributeKeys,
  resourceMapToStr,
} from './attributes.js';
export { chooseServiceName, chooseServiceVersion } from './service.js';
export { ObjectNotFoundError, resolveOwnerAttributes } from './owners.js';
export type { ClusterReader, OwnerResolutionOptions } from './owners.js';
export { createClusterReader, loadKubeConfig } from './cluster.js';
export { indexOfEnv, insertEnvIfAbsent, moveEnvToEnd } from './env.js';
export { backoffDelay, retryOnError } from './retry.js';
export type { BackoffPolicy, RetryHooks } from './retry.js';

export {
  ANNOTATION_CONTAINER_NAMES,
  ANNOTATION_GO_CONTAINER_NAMES,
  ANNOTATION_GO_TARGET_EXE,
  injectAnnotation,
  REPLICASET_BACKOFF,
  TopologyAttribute,
} from './constants.js';

export type {
  AgentSpec,
  AttributeMap,
  Instrumentation,
  InstrumentationSpec,
  Language,
  LanguageInstrumentations,
  Propagator,
  SamplerType,
} from './types.js';
export { LANGUAGES } from './types.js';

export { validateEnv, validateInstrumentation, ValidationError } from './validation.js';
