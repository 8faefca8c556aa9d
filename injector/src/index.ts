/**
 * Agent injector: mutating admission webhook around the injection engine.
 * Entrypoint: start the webhook server or export for programmatic use.
 * Exit codes: EXIT_CONFIG (1) = invalid configuration, EXIT_RUNTIME (2) = server failure.
 */

import { fileURLToPath } from 'node:url';
import { resolve } from 'node:path';
import { createDefaultAgentInjectors } from '../../src/agents.js';
import { createClusterReader, loadKubeConfig } from '../../src/cluster.js';
import { EXIT_CONFIG, EXIT_RUNTIME } from '../../src/constants.js';
import { createSdkInjector } from '../../src/inject.js';
import { errorMessage, logError, logInfo } from '../../src/logger.js';
import type { Instrumentation } from '../../src/types.js';
import { ValidationError } from '../../src/validation.js';
import { configFromEnv, loadInstrumentations } from './config.js';
import type { InjectorConfig } from './config.js';
import { startServer } from './server.js';

export { handleAdmissionReview } from './handler.js';
export { selectLanguageInstrumentations, targetContainerNames } from './eligibility.js';
export { buildPatch, encodePatch } from './patch.js';
export type { JsonPatchOp } from './patch.js';
export { createWebhookServer, startServer } from './server.js';
export { configFromEnv, loadInstrumentations, parseInstrumentations } from './config.js';
export type { InjectorConfig } from './config.js';
export type { AdmissionReviewRequest, AdmissionReviewResponse, WebhookDeps } from './types.js';

async function main(): Promise<void> {
  let config: InjectorConfig;
  let instrumentations: Instrumentation[];
  try {
    config = configFromEnv();
    instrumentations = await loadInstrumentations(config);
  } catch (err) {
    logError('Invalid config: ' + errorMessage(err), err instanceof ValidationError && err.field ? { field: err.field } : undefined);
    process.exitCode = EXIT_CONFIG;
    return;
  }

  const reader = createClusterReader(loadKubeConfig());
  const injector = createSdkInjector({
    reader,
    agents: createDefaultAgentInjectors(),
    licenseKeySecretName: config.licenseKeySecretName,
    licenseKeySecretKey: config.licenseKeySecretKey,
  });

  const server = startServer({ port: config.port, deps: { injector, reader, instrumentations } });
  server.on('error', (err) => {
    logError('Webhook server failed', { error: errorMessage(err) });
    process.exit(EXIT_RUNTIME);
  });

  function shutdown(signal: string): void {
    logInfo(`Received ${signal}, closing webhook server`);
    server.close(() => process.exit(0));
  }
  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

const __filename = fileURLToPath(import.meta.url);
const isMain = process.argv[1] && resolve(process.argv[1]) === resolve(__filename);

if (isMain) {
  main().catch((err: unknown) => {
    logError('Entrypoint failed', { error: errorMessage(err) });
    process.exit(EXIT_RUNTIME);
  });
}
