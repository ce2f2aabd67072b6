/**
 * Request forwarder — streams a request to a cluster head node and the
 * response back to the client.
 *
 * Bodies are piped, never buffered. Hop-by-hop headers are dropped in both
 * directions and x-forwarded-* headers describe the original request.
 */

import http, { type IncomingHttpHeaders, type IncomingMessage, type ServerResponse } from 'node:http';
import { pipeline } from 'node:stream';
import { TLSSocket } from 'node:tls';
import type { ClusterRoute, ErrorBody } from '@raygate/shared';
import type { UpstreamTarget } from './clusterResolver.js';

const HOP_BY_HOP = new Set([
  'connection',
  'keep-alive',
  'proxy-authenticate',
  'proxy-authorization',
  'proxy-connection',
  'te',
  'trailer',
  'transfer-encoding',
  'upgrade',
  'host',
]);

export interface ForwardOptions {
  requestId: string;
  timeoutMs: number;
  /** Called when the upstream could not be reached or timed out */
  onUpstreamError?: (err: Error) => void;
}

/** Copy end-to-end headers and add the x-forwarded-* set. */
export function buildForwardHeaders(
  req: IncomingMessage,
  route: ClusterRoute,
  requestId: string,
): Record<string, string | string[]> {
  const headers = copyEndToEnd(req.headers);

  const remote = req.socket.remoteAddress;
  const priorFor = joined(req.headers['x-forwarded-for']);
  if (remote) {
    headers['x-forwarded-for'] = priorFor ? `${priorFor}, ${remote}` : remote;
  }

  const originalHost = joined(req.headers['x-forwarded-host']) || req.headers.host;
  if (originalHost) {
    headers['x-forwarded-host'] = originalHost;
  }

  headers['x-forwarded-proto'] = req.socket instanceof TLSSocket ? 'https' : 'http';
  headers['x-forwarded-prefix'] = `/${route.cluster}`;
  headers['x-request-id'] = requestId;
  return headers;
}

/**
 * Forward `req` to the upstream and pipe the answer into `res`.
 * Failures before the response starts become a 502 (504 on timeout).
 */
export function forwardRequest(
  req: IncomingMessage,
  res: ServerResponse,
  target: UpstreamTarget,
  route: ClusterRoute,
  options: ForwardOptions,
): void {
  let timedOut = false;

  const upstreamReq = http.request(
    {
      hostname: target.hostname,
      port: target.port,
      method: req.method,
      path: route.path,
      headers: {
        ...buildForwardHeaders(req, route, options.requestId),
        host: `${target.hostname}:${target.port}`,
      },
    },
    (upstreamRes) => {
      res.writeHead(upstreamRes.statusCode || 502, copyEndToEnd(upstreamRes.headers));
      // pipeline destroys `res` if the upstream closes mid-body
      pipeline(upstreamRes, res, (err) => {
        if (err) {
          console.error(
            `[proxy] ${options.requestId}: Response from cluster ${route.cluster} broke off: ${err.message}`,
          );
          options.onUpstreamError?.(err);
          return;
        }
        console.log(
          `[proxy] ${options.requestId}: ${req.method} /${route.cluster}${route.path} → ${upstreamRes.statusCode}`,
        );
      });
    },
  );

  upstreamReq.setTimeout(options.timeoutMs, () => {
    timedOut = true;
    upstreamReq.destroy(new Error(`Upstream timed out after ${options.timeoutMs}ms`));
  });

  upstreamReq.on('error', (err: Error) => {
    if (res.destroyed) {
      // client already gone; nothing to answer
      return;
    }
    console.error(
      `[proxy] ${options.requestId}: Upstream ${target.hostname}:${target.port} for cluster ${route.cluster} failed: ${err.message}`,
    );
    options.onUpstreamError?.(err);

    if (res.headersSent) {
      res.destroy(err);
      return;
    }

    const status = timedOut ? 504 : 502;
    const body: ErrorBody = {
      success: false,
      error: timedOut
        ? `Cluster ${route.cluster} did not respond within ${options.timeoutMs}ms`
        : `Cluster ${route.cluster} is unreachable: ${err.message}`,
    };
    res.writeHead(status, { 'content-type': 'application/json' });
    res.end(JSON.stringify(body));
  });

  // Client went away before the response finished
  res.on('close', () => {
    if (!res.writableFinished) {
      upstreamReq.destroy();
    }
  });

  req.pipe(upstreamReq);
}

/** Drops the fixed hop-by-hop set plus every header named in `Connection`. */
function copyEndToEnd(source: IncomingHttpHeaders): Record<string, string | string[]> {
  const listed = new Set(
    (joined(source.connection) || '')
      .split(',')
      .map((token) => token.trim().toLowerCase())
      .filter((token) => token.length > 0),
  );

  const headers: Record<string, string | string[]> = {};
  for (const [key, value] of Object.entries(source)) {
    const name = key.toLowerCase();
    if (value === undefined || HOP_BY_HOP.has(name) || listed.has(name)) continue;
    headers[key] = value;
  }
  return headers;
}

function joined(value: string | string[] | undefined): string | undefined {
  return Array.isArray(value) ? value.join(', ') : value;
}
