import {
  SEMRESATTRS_K8S_CONTAINER_NAME,
  SEMRESATTRS_K8S_CRONJOB_NAME,
  SEMRESATTRS_K8S_CRONJOB_UID,
  SEMRESATTRS_K8S_DAEMONSET_NAME,
  SEMRESATTRS_K8S_DAEMONSET_UID,
  SEMRESATTRS_K8S_DEPLOYMENT_NAME,
  SEMRESATTRS_K8S_DEPLOYMENT_UID,
  SEMRESATTRS_K8S_JOB_NAME,
  SEMRESATTRS_K8S_JOB_UID,
  SEMRESATTRS_K8S_NAMESPACE_NAME,
  SEMRESATTRS_K8S_NODE_NAME,
  SEMRESATTRS_K8S_POD_NAME,
  SEMRESATTRS_K8S_POD_UID,
  SEMRESATTRS_K8S_REPLICASET_NAME,
  SEMRESATTRS_K8S_REPLICASET_UID,
  SEMRESATTRS_K8S_STATEFULSET_NAME,
  SEMRESATTRS_K8S_STATEFULSET_UID,
  SEMRESATTRS_SERVICE_INSTANCE_ID,
  SEMRESATTRS_SERVICE_VERSION,
} from '@opentelemetry/semantic-conventions';
import type { BackoffPolicy } from './retry.js';

/** Exit code: configuration or validation error (unreadable or invalid instrumentations file). */
export const EXIT_CONFIG = 1;
/** Exit code: runtime fatal error (server failed to listen). */
export const EXIT_RUNTIME = 2;

/**
 * Resource attribute keys the engine computes itself.
 * User-declared attributes may use any key; these are the only ones derived from the pod.
 */
export const TopologyAttribute = {
  NamespaceName: SEMRESATTRS_K8S_NAMESPACE_NAME,
  ContainerName: SEMRESATTRS_K8S_CONTAINER_NAME,
  PodName: SEMRESATTRS_K8S_POD_NAME,
  PodUid: SEMRESATTRS_K8S_POD_UID,
  NodeName: SEMRESATTRS_K8S_NODE_NAME,
  ServiceInstanceId: SEMRESATTRS_SERVICE_INSTANCE_ID,
  ServiceVersion: SEMRESATTRS_SERVICE_VERSION,
  ReplicaSetName: SEMRESATTRS_K8S_REPLICASET_NAME,
  ReplicaSetUid: SEMRESATTRS_K8S_REPLICASET_UID,
  DeploymentName: SEMRESATTRS_K8S_DEPLOYMENT_NAME,
  DeploymentUid: SEMRESATTRS_K8S_DEPLOYMENT_UID,
  StatefulSetName: SEMRESATTRS_K8S_STATEFULSET_NAME,
  StatefulSetUid: SEMRESATTRS_K8S_STATEFULSET_UID,
  DaemonSetName: SEMRESATTRS_K8S_DAEMONSET_NAME,
  DaemonSetUid: SEMRESATTRS_K8S_DAEMONSET_UID,
  JobName: SEMRESATTRS_K8S_JOB_NAME,
  JobUid: SEMRESATTRS_K8S_JOB_UID,
  CronJobName: SEMRESATTRS_K8S_CRONJOB_NAME,
  CronJobUid: SEMRESATTRS_K8S_CRONJOB_UID,
} as const;

export type TopologyAttributeKey = (typeof TopologyAttribute)[keyof typeof TopologyAttribute];

// --- Environment variables written into instrumented containers ---

export const ENV_APP_NAME = 'NEW_RELIC_APP_NAME';
export const ENV_LICENSE_KEY = 'NEW_RELIC_LICENSE_KEY';
export const ENV_LABELS = 'NEW_RELIC_LABELS';
export const ENV_SERVICE_NAME = 'OTEL_SERVICE_NAME';
export const ENV_EXPORTER_OTLP_ENDPOINT = 'OTEL_EXPORTER_OTLP_ENDPOINT';
export const ENV_RESOURCE_ATTRIBUTES = 'OTEL_RESOURCE_ATTRIBUTES';
export const ENV_PROPAGATORS = 'OTEL_PROPAGATORS';
export const ENV_TRACES_SAMPLER = 'OTEL_TRACES_SAMPLER';
export const ENV_TRACES_SAMPLER_ARG = 'OTEL_TRACES_SAMPLER_ARG';
export const ENV_POD_NAME = 'OTEL_RESOURCE_ATTRIBUTES_POD_NAME';
export const ENV_POD_UID = 'OTEL_RESOURCE_ATTRIBUTES_POD_UID';
export const ENV_NODE_NAME = 'OTEL_RESOURCE_ATTRIBUTES_NODE_NAME';

/** Value of NEW_RELIC_LABELS marking containers configured by the injector. */
export const AUTO_INJECTION_LABELS = 'operator:auto-injection';

/** Secret holding the license key; the reference is optional so pods still start without it. */
export const DEFAULT_LICENSE_KEY_SECRET = {
  name: 'newrelic-key-secret',
  key: 'new_relic_license_key',
} as const;

/** User env var names must carry one of these prefixes. */
export const ALLOWED_ENV_PREFIXES = ['NEW_RELIC_', 'OTEL_'] as const;

// --- Annotations ---

export const ANNOTATION_PREFIX = 'instrumentation.newrelic.com';
export const ANNOTATION_CONTAINER_NAMES = `${ANNOTATION_PREFIX}/container-names`;
export const ANNOTATION_GO_CONTAINER_NAMES = `${ANNOTATION_PREFIX}/go-container-names`;
export const ANNOTATION_GO_TARGET_EXE = `${ANNOTATION_PREFIX}/otel-go-auto-target-exe`;

/** `instrumentation.newrelic.com/inject-java` and friends. */
export function injectAnnotation(language: string): string {
  return `${ANNOTATION_PREFIX}/inject-${language}`;
}

// --- Ownership lookup ---

/** A freshly created ReplicaSet may not be readable yet; poll for it before giving up. */
export const REPLICASET_BACKOFF: BackoffPolicy = {
  initialDelayMs: 10,
  factor: 1.5,
  jitter: 0.1,
  steps: 20,
  capMs: 2_000,
};

/** Owner chains are one hop deep in practice (Pod → ReplicaSet → Deployment). */
export const MAX_OWNER_DEPTH = 5;
