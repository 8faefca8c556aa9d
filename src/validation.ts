/**
 * Instrumentation validation and normalization.
 * Instrumentations arrive as untrusted JSON; this turns them into typed objects or throws
 * ValidationError naming the offending field.
 */

import type {
  V1EnvVar,
  V1EnvVarSource,
  V1ResourceRequirements,
} from '@kubernetes/client-node';
import { ALLOWED_ENV_PREFIXES } from './constants.js';
import { LANGUAGES, PROPAGATORS, SAMPLER_TYPES } from './types.js';
import type {
  AgentSpec,
  Instrumentation,
  InstrumentationSpec,
  Propagator,
  SamplerType,
} from './types.js';

export class ValidationError extends Error {
  constructor(
    message: string,
    public readonly field?: string
  ) {
    super(message);
    this.name = 'ValidationError';
    Object.setPrototypeOf(this, ValidationError.prototype);
  }
}

function assert(condition: boolean, message: string, field?: string): asserts condition {
  if (!condition) {
    throw new ValidationError(message, field);
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value != null && typeof value === 'object' && !Array.isArray(value);
}

function optionalString(value: unknown, field: string): string | undefined {
  if (value === undefined) return undefined;
  assert(typeof value === 'string', `${field} must be a string`, field);
  return value;
}

function requiredString(value: unknown, field: string): string {
  assert(typeof value === 'string' && value !== '', `${field} is required`, field);
  return value;
}

function optionalBoolean(value: unknown, field: string): boolean | undefined {
  if (value === undefined) return undefined;
  assert(typeof value === 'boolean', `${field} must be a boolean`, field);
  return value;
}

function stringMap(value: unknown, field: string): Record<string, string> {
  assert(isRecord(value), `${field} must be an object`, field);
  const out: Record<string, string> = {};
  for (const [key, v] of Object.entries(value)) {
    assert(typeof v === 'string', `${field}.${key} must be a string`, field);
    out[key] = v;
  }
  return out;
}

function oneOf<T extends string>(allowed: readonly T[], value: unknown, field: string): T {
  const match = allowed.find((candidate) => candidate === value);
  assert(match !== undefined, `${field} must be one of ${allowed.join(', ')}`, field);
  return match;
}

function keySelector(value: unknown, field: string): { name: string; key: string; optional?: boolean } {
  assert(isRecord(value), `${field} must be an object`, field);
  const optional = optionalBoolean(value.optional, `${field}.optional`);
  return {
    name: requiredString(value.name, `${field}.name`),
    key: requiredString(value.key, `${field}.key`),
    ...(optional !== undefined && { optional }),
  };
}

function envVarSource(value: unknown, field: string): V1EnvVarSource {
  assert(isRecord(value), `${field} must be an object`, field);
  const source: V1EnvVarSource = {};
  if (value.fieldRef !== undefined) {
    const ref = value.fieldRef;
    assert(isRecord(ref), `${field}.fieldRef must be an object`, field);
    const apiVersion = optionalString(ref.apiVersion, `${field}.fieldRef.apiVersion`);
    source.fieldRef = {
      fieldPath: requiredString(ref.fieldPath, `${field}.fieldRef.fieldPath`),
      ...(apiVersion !== undefined && { apiVersion }),
    };
  }
  if (value.resourceFieldRef !== undefined) {
    const ref = value.resourceFieldRef;
    assert(isRecord(ref), `${field}.resourceFieldRef must be an object`, field);
    const containerName = optionalString(ref.containerName, `${field}.resourceFieldRef.containerName`);
    const divisor = optionalString(ref.divisor, `${field}.resourceFieldRef.divisor`);
    source.resourceFieldRef = {
      resource: requiredString(ref.resource, `${field}.resourceFieldRef.resource`),
      ...(containerName !== undefined && { containerName }),
      ...(divisor !== undefined && { divisor }),
    };
  }
  if (value.secretKeyRef !== undefined) {
    source.secretKeyRef = keySelector(value.secretKeyRef, `${field}.secretKeyRef`);
  }
  if (value.configMapKeyRef !== undefined) {
    source.configMapKeyRef = keySelector(value.configMapKeyRef, `${field}.configMapKeyRef`);
  }
  assert(Object.keys(source).length === 1, `${field} must set exactly one source`, field);
  return source;
}

function envList(value: unknown, field: string): V1EnvVar[] {
  assert(Array.isArray(value), `${field} must be an array`, field);
  return value.map((item: unknown, i) => {
    const itemField = `${field}[${i}]`;
    assert(isRecord(item), `${itemField} must be an object`, field);
    const env: V1EnvVar = { name: requiredString(item.name, `${itemField}.name`) };
    const v = optionalString(item.value, `${itemField}.value`);
    if (v !== undefined) env.value = v;
    if (item.valueFrom !== undefined) env.valueFrom = envVarSource(item.valueFrom, `${itemField}.valueFrom`);
    return env;
  });
}

function resources(value: unknown, field: string): V1ResourceRequirements {
  assert(isRecord(value), `${field} must be an object`, field);
  const out: V1ResourceRequirements = {};
  if (value.limits !== undefined) out.limits = stringMap(value.limits, `${field}.limits`);
  if (value.requests !== undefined) out.requests = stringMap(value.requests, `${field}.requests`);
  return out;
}

/** Throws unless every variable name carries an agent or OpenTelemetry prefix. */
export function validateEnv(envs: readonly V1EnvVar[], field = 'env'): void {
  for (const env of envs) {
    if (!ALLOWED_ENV_PREFIXES.some((prefix) => env.name.startsWith(prefix))) {
      throw new ValidationError(
        `env name should start with "${ALLOWED_ENV_PREFIXES[0]}" or "${ALLOWED_ENV_PREFIXES[1]}": ${env.name}`,
        field
      );
    }
  }
}

function agentSpec(value: unknown, field: string): AgentSpec {
  assert(isRecord(value), `${field} must be an object`, field);
  const agent: AgentSpec = { image: optionalString(value.image, `${field}.image`) ?? '' };
  if (value.env !== undefined) {
    agent.env = envList(value.env, `${field}.env`);
    validateEnv(agent.env, `${field}.env`);
  }
  if (value.resources !== undefined) agent.resources = resources(value.resources, `${field}.resources`);
  return agent;
}

function instrumentationSpec(value: unknown): InstrumentationSpec {
  if (value === undefined) return {};
  assert(isRecord(value), 'spec must be an object', 'spec');
  const spec: InstrumentationSpec = {};

  if (value.exporter !== undefined) {
    const exporter = value.exporter;
    assert(isRecord(exporter), 'spec.exporter must be an object', 'spec.exporter');
    spec.exporter = { endpoint: optionalString(exporter.endpoint, 'spec.exporter.endpoint') };
  }
  if (value.resource !== undefined) {
    const resource = value.resource;
    assert(isRecord(resource), 'spec.resource must be an object', 'spec.resource');
    spec.resource = {
      ...(resource.attributes !== undefined && {
        attributes: stringMap(resource.attributes, 'spec.resource.attributes'),
      }),
      addK8sUIDAttributes: optionalBoolean(resource.addK8sUIDAttributes, 'spec.resource.addK8sUIDAttributes'),
    };
  }
  if (value.propagators !== undefined) {
    const propagators = value.propagators;
    assert(Array.isArray(propagators), 'spec.propagators must be an array', 'spec.propagators');
    spec.propagators = propagators.map(
      (p: unknown): Propagator => oneOf(PROPAGATORS, p, 'spec.propagators')
    );
  }
  if (value.sampler !== undefined) {
    const sampler = value.sampler;
    assert(isRecord(sampler), 'spec.sampler must be an object', 'spec.sampler');
    const type: SamplerType | undefined =
      sampler.type === undefined ? undefined : oneOf(SAMPLER_TYPES, sampler.type, 'spec.sampler.type');
    spec.sampler = { type, argument: optionalString(sampler.argument, 'spec.sampler.argument') };
  }
  if (value.env !== undefined) {
    spec.env = envList(value.env, 'spec.env');
    validateEnv(spec.env, 'spec.env');
  }
  const licenseKeySecret = optionalString(value.licenseKeySecret, 'spec.licenseKeySecret');
  if (licenseKeySecret !== undefined) spec.licenseKeySecret = licenseKeySecret;

  for (const language of LANGUAGES) {
    if (value[language] !== undefined) {
      spec[language] = agentSpec(value[language], `spec.${language}`);
    }
  }
  return spec;
}

/** Parses an untrusted object into an Instrumentation. Throws ValidationError on the first problem. */
export function validateInstrumentation(value: unknown): Instrumentation {
  assert(isRecord(value), 'instrumentation must be an object');
  const metadata = value.metadata;
  assert(isRecord(metadata), 'metadata is required', 'metadata');
  return {
    metadata: {
      name: requiredString(metadata.name, 'metadata.name'),
      namespace: requiredString(metadata.namespace, 'metadata.namespace'),
    },
    spec: instrumentationSpec(value.spec),
  };
}
