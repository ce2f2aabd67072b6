/**
 * Upgrade tunnel — carries WebSocket (HTTP Upgrade) connections to a head node.
 *
 * Node hands upgrade requests to the server's 'upgrade' event with the raw
 * socket, bypassing express. The request line and headers are replayed over a
 * fresh TCP connection to the upstream, after which both sockets are piped
 * into each other and the proxy no longer looks at the bytes.
 */

import * as net from 'node:net';
import type { IncomingMessage } from 'node:http';
import type { Duplex } from 'node:stream';
import type { ClusterRoute } from '@raygate/shared';
import type { UpstreamTarget } from './clusterResolver.js';
import { buildForwardHeaders } from './forwarder.js';

export interface TunnelOptions {
  requestId: string;
  /** Time allowed to establish the upstream connection */
  connectTimeoutMs: number;
  onUpstreamError?: (err: Error) => void;
}

/** Serialize the upgrade request for the upstream connection. */
export function buildUpgradeRequest(
  req: IncomingMessage,
  target: UpstreamTarget,
  route: ClusterRoute,
  requestId: string,
): string {
  // Host and the upgrade pair are set AFTER the spread so forwarded values can't override them
  const headers: Record<string, string | string[]> = {
    ...buildForwardHeaders(req, route, requestId),
    host: `${target.hostname}:${target.port}`,
    connection: 'Upgrade',
    upgrade: req.headers.upgrade || 'websocket',
  };

  let raw = `${req.method || 'GET'} ${route.path} HTTP/1.1\r\n`;
  for (const [key, value] of Object.entries(headers)) {
    for (const item of Array.isArray(value) ? value : [value]) {
      raw += `${key}: ${item}\r\n`;
    }
  }
  return raw + '\r\n';
}

/** Write a minimal HTTP error response on a raw socket and close it. */
export function rejectUpgrade(socket: Duplex, status: number, reason: string, message: string): void {
  const body = JSON.stringify({ success: false, error: message });
  socket.end(
    `HTTP/1.1 ${status} ${reason}\r\n` +
      'Content-Type: application/json\r\n' +
      `Content-Length: ${Buffer.byteLength(body, 'utf-8')}\r\n` +
      'Connection: close\r\n' +
      '\r\n' +
      body,
  );
}

export function tunnelUpgrade(
  req: IncomingMessage,
  clientSocket: Duplex,
  head: Buffer,
  target: UpstreamTarget,
  route: ClusterRoute,
  options: TunnelOptions,
): void {
  let connected = false;

  const upstream = net.connect({ host: target.hostname, port: target.port });
  upstream.setTimeout(options.connectTimeoutMs);

  upstream.once('connect', () => {
    connected = true;
    upstream.setTimeout(0);

    upstream.write(buildUpgradeRequest(req, target, route, options.requestId));
    if (head.length > 0) {
      upstream.write(head);
    }

    upstream.pipe(clientSocket);
    clientSocket.pipe(upstream);
    console.log(`[proxy] ${options.requestId}: Tunnel open /${route.cluster}${route.path} → ${target.hostname}:${target.port}`);
  });

  upstream.on('timeout', () => {
    upstream.destroy(new Error(`Upstream connect timed out after ${options.connectTimeoutMs}ms`));
  });

  upstream.on('error', (err: Error) => {
    console.error(`[proxy] ${options.requestId}: Tunnel to ${target.hostname}:${target.port} failed: ${err.message}`);
    options.onUpstreamError?.(err);
    if (connected) {
      clientSocket.destroy();
    } else {
      rejectUpgrade(clientSocket, 502, 'Bad Gateway', `Cluster ${route.cluster} is unreachable: ${err.message}`);
    }
  });

  upstream.on('close', () => {
    // on the error path rejectUpgrade has already ended the client socket
    if (connected) {
      clientSocket.end();
    }
  });

  clientSocket.on('error', (err: Error) => {
    console.error(`[proxy] ${options.requestId}: Client socket error: ${err.message}`);
    upstream.destroy();
  });

  clientSocket.on('close', () => {
    upstream.destroy();
  });
}
