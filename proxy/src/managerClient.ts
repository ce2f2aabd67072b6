/**
 * Manager client — asks the cluster manager where a cluster's head node lives.
 */

import axios from 'axios';
import { z } from 'zod';
import { UpstreamError } from '@raygate/shared';
import type { ClusterDetails } from '@raygate/shared';

/** Resolves a cluster name to its head service, or null if it does not exist. */
export type ClusterLookup = (name: string) => Promise<ClusterDetails | null>;

export interface ManagerLookupOptions {
  baseUrl: string;
  timeoutMs: number;
  namespace?: string;
}

const ClusterDetailsSchema = z.object({
  name: z.string(),
  host: z.string(),
  ip: z.string(),
  port: z.string(),
});

export function createManagerLookup(options: ManagerLookupOptions): ClusterLookup {
  const client = axios.create({
    baseURL: options.baseUrl,
    timeout: options.timeoutMs,
    headers: { accept: 'application/json' },
  });

  return async (name: string): Promise<ClusterDetails | null> => {
    try {
      const response = await client.get<unknown>(`/clusters/${encodeURIComponent(name)}`, {
        params: options.namespace ? { namespace: options.namespace } : undefined,
      });

      const parsed = ClusterDetailsSchema.safeParse(response.data);
      if (!parsed.success) {
        throw new UpstreamError(`Manager returned malformed details for cluster ${name}`);
      }
      return parsed.data;
    } catch (err) {
      if (err instanceof UpstreamError) {
        throw err;
      }
      if (axios.isAxiosError(err)) {
        if (err.response?.status === 404) {
          return null;
        }
        const reason = err.response ? `status ${err.response.status}` : err.code || err.message;
        throw new UpstreamError(`Manager lookup for cluster ${name} failed: ${reason}`);
      }
      throw err;
    }
  };
}
