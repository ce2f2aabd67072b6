/**
 * Manager health — listing RayClusters proves kubectl can reach the API
 * server with the service account's permissions.
 */

import type { ClusterDao } from './clusterDao.js';

export interface HealthStatus {
  healthy: boolean;
  namespace: string;
  clusters: number;
  timestamp: number;
  error?: string;
}

export async function checkHealth(dao: ClusterDao): Promise<HealthStatus> {
  try {
    const clusters = await dao.getAll();
    return {
      healthy: true,
      namespace: dao.namespace,
      clusters: clusters.length,
      timestamp: Date.now(),
    };
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    console.error(`[manager] Health check failed: ${message}`);
    return {
      healthy: false,
      namespace: dao.namespace,
      clusters: 0,
      timestamp: Date.now(),
      error: message,
    };
  }
}
