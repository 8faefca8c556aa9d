/**
 * Webhook configuration from the environment, and the instrumentations file it points at.
 *
 * PORT                     listen port (default 8443)
 * INSTRUMENTATIONS_FILE    JSON array of instrumentations; none configured when unset
 * LICENSE_KEY_SECRET_NAME  default license key secret (default newrelic-key-secret)
 * LICENSE_KEY_SECRET_KEY   key inside that secret (default new_relic_license_key)
 */

import { readFile } from 'node:fs/promises';
import { DEFAULT_LICENSE_KEY_SECRET } from '../../src/constants.js';
import type { Instrumentation } from '../../src/types.js';
import { validateInstrumentation, ValidationError } from '../../src/validation.js';

export const DEFAULT_PORT = 8443;

export interface InjectorConfig {
  port: number;
  instrumentationsFile?: string;
  licenseKeySecretName: string;
  licenseKeySecretKey: string;
}

function nonEmpty(value: string | undefined): string | undefined {
  return value !== undefined && value !== '' ? value : undefined;
}

function parsePort(value: string | undefined): number {
  if (value === undefined || value === '') return DEFAULT_PORT;
  const port = Number(value);
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new ValidationError(`PORT must be an integer between 1 and 65535: ${value}`, 'PORT');
  }
  return port;
}

export function configFromEnv(env: NodeJS.ProcessEnv = process.env): InjectorConfig {
  return {
    port: parsePort(env.PORT),
    instrumentationsFile: nonEmpty(env.INSTRUMENTATIONS_FILE),
    licenseKeySecretName: nonEmpty(env.LICENSE_KEY_SECRET_NAME) ?? DEFAULT_LICENSE_KEY_SECRET.name,
    licenseKeySecretKey: nonEmpty(env.LICENSE_KEY_SECRET_KEY) ?? DEFAULT_LICENSE_KEY_SECRET.key,
  };
}

/** Parses the instrumentations file content. Throws ValidationError naming the failing entry. */
export function parseInstrumentations(content: string): Instrumentation[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ValidationError(`instrumentations file is not valid JSON: ${message}`);
  }
  if (!Array.isArray(parsed)) {
    throw new ValidationError('instrumentations file must contain a JSON array');
  }
  return parsed.map((item: unknown, i) => {
    try {
      return validateInstrumentation(item);
    } catch (err) {
      if (err instanceof ValidationError) {
        throw new ValidationError(`instrumentations[${i}]: ${err.message}`, err.field);
      }
      throw err;
    }
  });
}

export async function loadInstrumentations(config: InjectorConfig): Promise<Instrumentation[]> {
  if (!config.instrumentationsFile) return [];
  const content = await readFile(config.instrumentationsFile, 'utf8');
  return parseInstrumentations(content);
}
