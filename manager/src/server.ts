/**
 * Manager Server — HTTP API in front of kubectl/helm for Ray clusters.
 *
 * Runs in-cluster with a service account allowed to manage RayCluster
 * resources; the Ray Helm chart is expected in CHART_DIR.
 */

import { loadConfig } from './config.js';
import { createApp } from './app.js';
import { KubectlClusterDaoFactory } from './clusterDao.js';

const config = loadConfig();

const factory = new KubectlClusterDaoFactory({
  chartDir: config.chartDir,
  timeoutMs: config.commandTimeoutMs,
});

const app = createApp({ factory, namespace: config.namespace });

const server = app.listen(config.port, '0.0.0.0', () => {
  console.log(`[manager] Cluster manager listening on port ${config.port} (namespace ${config.namespace})`);
});

for (const signal of ['SIGTERM', 'SIGINT'] as const) {
  process.once(signal, () => {
    console.log(`[manager] ${signal} received, shutting down`);
    server.close((err) => {
      if (err) {
        console.error(`[manager] Error during shutdown: ${err.message}`);
        process.exit(1);
      }
      process.exit(0);
    });
  });
}
