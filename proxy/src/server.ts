/**
 * Proxy Server — TLS termination in front of the Ray cluster head nodes.
 *
 * Listens on 8443 inside the container. Requests for /<cluster>/... are
 * resolved through the manager and forwarded over plain HTTP inside the
 * Kubernetes network.
 */

import https from 'node:https';
import { loadConfig } from './config.js';
import { loadTlsMaterial } from './tls.js';
import { createManagerLookup } from './managerClient.js';
import { ClusterResolver } from './clusterResolver.js';
import { createProxyApp, createUpgradeHandler } from './app.js';

const config = loadConfig();

const resolver = new ClusterResolver(
  createManagerLookup({
    baseUrl: config.managerUrl,
    timeoutMs: config.managerTimeoutMs,
    namespace: config.namespace,
  }),
  { ttlMs: config.routeCacheTtlMs },
);

const appOptions = { resolver, upstreamTimeoutMs: config.upstreamTimeoutMs };
const server = https.createServer(loadTlsMaterial(config), createProxyApp(appOptions));
server.on('upgrade', createUpgradeHandler(appOptions));

server.on('tlsClientError', (err: Error) => {
  console.error(`[proxy] TLS handshake failed: ${err.message}`);
});

server.listen(config.port, config.host, () => {
  console.log(`[proxy] Listening on https://${config.host}:${config.port} (manager ${config.managerUrl})`);
});

for (const signal of ['SIGTERM', 'SIGINT'] as const) {
  process.once(signal, () => {
    console.log(`[proxy] ${signal} received, shutting down`);
    server.close((err) => {
      if (err) {
        console.error(`[proxy] Error during shutdown: ${err.message}`);
        process.exit(1);
      }
      process.exit(0);
    });
    server.closeIdleConnections();
  });
}
