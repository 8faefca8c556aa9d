/**
 * HTTP server for the mutating webhook.
 * Expects POST with AdmissionReview JSON body; returns AdmissionReview JSON response.
 * The API server requires HTTPS; terminate TLS in front of this server or in the deployment.
 */

import { createServer } from 'node:http';
import type { Server } from 'node:http';
import { errorMessage, logError, logInfo } from '../../src/logger.js';
import { DEFAULT_PORT } from './config.js';
import { handleAdmissionReview } from './handler.js';
import type { WebhookDeps } from './types.js';

export interface ServerOptions {
  port?: number;
  deps: WebhookDeps;
}

/**
 * Create and return an HTTP server that handles POST / and POST /mutate with AdmissionReview.
 * Does not start listening; call server.listen().
 */
export function createWebhookServer(options: ServerOptions): { server: Server; port: number } {
  const port = options.port ?? DEFAULT_PORT;

  const server = createServer((req, res) => {
    const path = (req.url ?? '').split('?')[0];
    if (req.method !== 'POST' || (path !== '/' && path !== '/mutate')) {
      res.writeHead(404, { 'Content-Type': 'text/plain' });
      res.end('Not Found');
      return;
    }

    const chunks: Buffer[] = [];
    req.on('data', (chunk: Buffer) => chunks.push(chunk));
    req.on('end', () => {
      const body = Buffer.concat(chunks).toString('utf8');
      let parsed: unknown;
      try {
        parsed = JSON.parse(body);
      } catch {
        res.writeHead(400, { 'Content-Type': 'application/json' });
        res.end(JSON.stringify({ error: 'Invalid JSON body' }));
        return;
      }

      handleAdmissionReview(parsed, options.deps)
        .then((response) => {
          res.writeHead(200, { 'Content-Type': 'application/json' });
          res.end(JSON.stringify(response));
        })
        .catch((err: unknown) => {
          logError('Admission review failed', { error: errorMessage(err) });
          res.writeHead(500, { 'Content-Type': 'text/plain' });
          res.end('Internal Server Error');
        });
    });
    req.on('error', (err) => {
      logError('Request stream failed', { error: errorMessage(err) });
      res.writeHead(500, { 'Content-Type': 'text/plain' });
      res.end('Internal Server Error');
    });
  });

  return { server, port };
}

/** Start the webhook server. */
export function startServer(options: ServerOptions): Server {
  const { server, port } = createWebhookServer(options);
  server.listen(port, () => {
    logInfo(`Agent injector listening on port ${port}`, {
      instrumentations: options.deps.instrumentations.length,
    });
  });
  return server;
}
