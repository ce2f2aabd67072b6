/**
 * Proxy application — routes `/<cluster>/...` to that cluster's head node.
 *
 * GET /_proxy/health   liveness of the proxy itself
 * GET /_proxy/routes   clusters currently held in the route cache
 * *   /<cluster>/...   forwarded (see forwarder.ts)
 *
 * `_` cannot start a cluster name, so the /_proxy prefix never shadows one.
 * WebSocket upgrades never reach express; server.ts hands them to the
 * handler from createUpgradeHandler().
 */

import crypto from 'node:crypto';
import type { IncomingMessage } from 'node:http';
import type { Duplex } from 'node:stream';
import express, { type ErrorRequestHandler } from 'express';
import { RaygateError } from '@raygate/shared';
import type { ErrorBody } from '@raygate/shared';
import type { ClusterResolver } from './clusterResolver.js';
import { forwardRequest } from './forwarder.js';
import { parseClusterRoute } from './routeParser.js';
import { rejectUpgrade, tunnelUpgrade } from './upgradeTunnel.js';

export interface ProxyAppOptions {
  resolver: ClusterResolver;
  upstreamTimeoutMs: number;
}

export function createProxyApp(options: ProxyAppOptions): express.Express {
  const { resolver } = options;
  const app = express();
  app.disable('x-powered-by');

  app.get('/_proxy/health', (_req, res) => {
    res.json({ healthy: true, timestamp: Date.now() });
  });

  app.get('/_proxy/routes', (_req, res) => {
    res.json({ routes: resolver.entries() });
  });

  app.use((req, res, next) => {
    const requestId = requestIdOf(req);
    const route = parseClusterRoute(req.originalUrl);
    if (!route) {
      sendError(res, 404, `No cluster in request path: ${req.path}`);
      return;
    }

    resolver
      .resolve(route.cluster)
      .then((target) => {
        if (!target) {
          sendError(res, 404, `Unknown cluster: ${route.cluster}`);
          return;
        }

        console.log(
          `[proxy] ${requestId}: Routing ${req.method} /${route.cluster}${route.path} → ${target.hostname}:${target.port}`,
        );
        forwardRequest(req, res, target, route, {
          requestId,
          timeoutMs: options.upstreamTimeoutMs,
          onUpstreamError: () => resolver.invalidate(route.cluster),
        });
      })
      .catch(next);
  });

  app.use(errorHandler);

  return app;
}

/** Handler for the HTTP server's 'upgrade' event. */
export function createUpgradeHandler(
  options: ProxyAppOptions,
): (req: IncomingMessage, socket: Duplex, head: Buffer) => void {
  const { resolver } = options;

  return (req, socket, head) => {
    const requestId = requestIdOf(req);
    // Node detaches its own error listener before emitting 'upgrade'
    socket.on('error', (err: Error) => {
      console.error(`[proxy] ${requestId}: Upgrade socket error: ${err.message}`);
      socket.destroy();
    });

    const route = parseClusterRoute(req.url || '/');
    if (!route) {
      rejectUpgrade(socket, 404, 'Not Found', `No cluster in request path: ${req.url}`);
      return;
    }

    resolver
      .resolve(route.cluster)
      .then((target) => {
        if (socket.destroyed) {
          console.log(`[proxy] ${requestId}: Client left before cluster ${route.cluster} was resolved`);
          return;
        }
        if (!target) {
          rejectUpgrade(socket, 404, 'Not Found', `Unknown cluster: ${route.cluster}`);
          return;
        }
        tunnelUpgrade(req, socket, head, target, route, {
          requestId,
          connectTimeoutMs: options.upstreamTimeoutMs,
          onUpstreamError: () => resolver.invalidate(route.cluster),
        });
      })
      .catch((err: unknown) => {
        const message = err instanceof Error ? err.message : String(err);
        console.error(`[proxy] ${requestId}: Upgrade for cluster ${route.cluster} failed: ${message}`);
        if (!socket.destroyed) {
          rejectUpgrade(socket, 502, 'Bad Gateway', message);
        }
      });
  };
}

function requestIdOf(req: IncomingMessage): string {
  const header = req.headers['x-request-id'];
  const value = Array.isArray(header) ? header[0] : header;
  return value || crypto.randomUUID();
}

function sendError(res: express.Response, status: number, message: string): void {
  const body: ErrorBody = { success: false, error: message };
  res.status(status).json(body);
}

const errorHandler: ErrorRequestHandler = (err: unknown, req, res, _next) => {
  const status = err instanceof RaygateError ? err.statusCode : 500;
  const message = err instanceof Error ? err.message : String(err);
  console.error(`[proxy] ${req.method} ${req.originalUrl} failed: ${message}`);

  if (res.headersSent) {
    res.destroy();
    return;
  }
  sendError(res, status, message);
};
