/**
 * Cluster Resolver — maps cluster names to the address of their head node.
 *
 * Answers (including "no such cluster") are cached for `ttlMs` so that every
 * proxied request does not cost a manager round trip. A forwarding failure
 * invalidates the entry; the next request asks the manager again. Expired
 * entries are swept on insert and at most `maxEntries` are held.
 */

import { UpstreamError } from '@raygate/shared';
import type { ClusterLookup } from './managerClient.js';

/** Where requests for a cluster are sent. */
export interface UpstreamTarget {
  cluster: string;
  /** Head service cluster IP */
  hostname: string;
  port: number;
}

export interface ResolverOptions {
  ttlMs: number;
  /** Cache capacity; the oldest entry is evicted beyond it (default 1000) */
  maxEntries?: number;
  /** Clock override for tests */
  now?: () => number;
}

const DEFAULT_MAX_ENTRIES = 1000;

interface CacheEntry {
  target: UpstreamTarget | null;
  expiresAt: number;
}

export class ClusterResolver {
  private readonly cache = new Map<string, CacheEntry>();
  private readonly pending = new Map<string, Promise<UpstreamTarget | null>>();
  private readonly now: () => number;

  constructor(
    private readonly lookup: ClusterLookup,
    private readonly options: ResolverOptions,
  ) {
    this.now = options.now ?? Date.now;
  }

  /**
   * Find the upstream for a cluster.
   *
   * @returns null if the manager does not know the cluster
   * @throws UpstreamError if the manager is unreachable or the port is unusable
   */
  async resolve(cluster: string): Promise<UpstreamTarget | null> {
    const cached = this.cache.get(cluster);
    if (cached) {
      if (cached.expiresAt > this.now()) {
        return cached.target;
      }
      this.cache.delete(cluster);
    }

    const inFlight = this.pending.get(cluster);
    if (inFlight) {
      return inFlight;
    }

    const request = this.fetch(cluster).finally(() => {
      this.pending.delete(cluster);
    });
    this.pending.set(cluster, request);
    return request;
  }

  invalidate(cluster: string): void {
    this.cache.delete(cluster);
  }

  /** Number of cached answers, expired ones not yet swept included. */
  get size(): number {
    return this.cache.size;
  }

  /** Live cache entries that point at a cluster (diagnostics). */
  entries(): UpstreamTarget[] {
    const now = this.now();
    const targets: UpstreamTarget[] = [];
    for (const entry of this.cache.values()) {
      if (entry.target && entry.expiresAt > now) {
        targets.push(entry.target);
      }
    }
    return targets;
  }

  private async fetch(cluster: string): Promise<UpstreamTarget | null> {
    const details = await this.lookup(cluster);

    let target: UpstreamTarget | null = null;
    if (details) {
      const port = Number(details.port);
      if (!Number.isInteger(port) || port < 1 || port > 65535) {
        throw new UpstreamError(`Cluster ${cluster} exposes an unusable head port: ${details.port}`);
      }
      target = { cluster, hostname: details.ip, port };
    }

    if (this.options.ttlMs > 0) {
      this.store(cluster, target);
    }
    return target;
  }

  private store(cluster: string, target: UpstreamTarget | null): void {
    const now = this.now();
    for (const [name, entry] of this.cache) {
      if (entry.expiresAt <= now) {
        this.cache.delete(name);
      }
    }

    // Map iteration follows insertion order: re-inserting moves a name to the back
    this.cache.delete(cluster);
    const maxEntries = this.options.maxEntries ?? DEFAULT_MAX_ENTRIES;
    for (const name of this.cache.keys()) {
      if (this.cache.size < maxEntries) break;
      this.cache.delete(name);
    }

    this.cache.set(cluster, { target, expiresAt: now + this.options.ttlMs });
  }
}
