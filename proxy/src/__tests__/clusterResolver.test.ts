import { describe, it, expect, vi, beforeEach } from 'vitest';
import { UpstreamError } from '@raygate/shared';
import type { ClusterDetails } from '@raygate/shared';
import { ClusterResolver } from '../clusterResolver.js';

const lookup = vi.fn<(name: string) => Promise<ClusterDetails | null>>();
let clock = 1_000;

function details(name: string, port = '8265'): ClusterDetails {
  return { name, host: `${name}-ray-head`, ip: '10.96.14.2', port };
}

function makeResolver(ttlMs = 30_000): ClusterResolver {
  return new ClusterResolver(lookup, { ttlMs, now: () => clock });
}

beforeEach(() => {
  clock = 1_000;
  lookup.mockReset();
});

describe('ClusterResolver', () => {
  it('resolves a cluster to its head service address', async () => {
    lookup.mockResolvedValue(details('demo'));

    await expect(makeResolver().resolve('demo')).resolves.toEqual({
      cluster: 'demo',
      hostname: '10.96.14.2',
      port: 8265,
    });
    expect(lookup).toHaveBeenCalledWith('demo');
  });

  it('serves repeated resolves from the cache within the TTL', async () => {
    lookup.mockResolvedValue(details('demo'));
    const resolver = makeResolver();

    await resolver.resolve('demo');
    clock += 29_999;
    await resolver.resolve('demo');

    expect(lookup).toHaveBeenCalledTimes(1);
  });

  it('asks the manager again once the entry expires', async () => {
    lookup.mockResolvedValue(details('demo'));
    const resolver = makeResolver();

    await resolver.resolve('demo');
    clock += 30_000;
    await resolver.resolve('demo');

    expect(lookup).toHaveBeenCalledTimes(2);
  });

  it('caches unknown clusters as well', async () => {
    lookup.mockResolvedValue(null);
    const resolver = makeResolver();

    await expect(resolver.resolve('ghost')).resolves.toBeNull();
    await expect(resolver.resolve('ghost')).resolves.toBeNull();
    expect(lookup).toHaveBeenCalledTimes(1);
  });

  it('drops an entry on invalidate', async () => {
    lookup.mockResolvedValue(details('demo'));
    const resolver = makeResolver();

    await resolver.resolve('demo');
    resolver.invalidate('demo');
    await resolver.resolve('demo');

    expect(lookup).toHaveBeenCalledTimes(2);
  });

  it('shares one lookup between concurrent resolves', async () => {
    let release: (value: ClusterDetails) => void = () => {};
    lookup.mockReturnValue(new Promise<ClusterDetails>((resolve) => (release = resolve)));
    const resolver = makeResolver();

    const first = resolver.resolve('demo');
    const second = resolver.resolve('demo');
    release(details('demo'));

    const [a, b] = await Promise.all([first, second]);
    expect(a).toEqual(b);
    expect(lookup).toHaveBeenCalledTimes(1);
  });

  it('rejects named or out-of-range head ports without caching them', async () => {
    lookup.mockResolvedValue(details('demo', 'dashboard'));
    const resolver = makeResolver();

    const err = await resolver.resolve('demo').catch((e: unknown) => e);
    expect(err).toBeInstanceOf(UpstreamError);
    expect(err).toMatchObject({ message: 'Cluster demo exposes an unusable head port: dashboard', statusCode: 502 });

    await resolver.resolve('demo').catch(() => null);
    expect(lookup).toHaveBeenCalledTimes(2);
  });

  it('lets manager failures propagate', async () => {
    lookup.mockRejectedValue(new UpstreamError('Manager lookup for cluster demo failed: ECONNREFUSED'));

    await expect(makeResolver().resolve('demo')).rejects.toThrow('Manager lookup for cluster demo failed: ECONNREFUSED');
  });

  it('does not cache when the TTL is zero', async () => {
    lookup.mockResolvedValue(details('demo'));
    const resolver = makeResolver(0);

    await resolver.resolve('demo');
    await resolver.resolve('demo');

    expect(lookup).toHaveBeenCalledTimes(2);
    expect(resolver.entries()).toEqual([]);
  });

  it('lists live cached targets', async () => {
    lookup.mockImplementation(async (name) => (name === 'ghost' ? null : details(name)));
    const resolver = makeResolver();

    await resolver.resolve('alpha');
    await resolver.resolve('ghost');
    clock += 10_000;
    await resolver.resolve('beta');

    expect(resolver.entries()).toEqual([
      { cluster: 'alpha', hostname: '10.96.14.2', port: 8265 },
      { cluster: 'beta', hostname: '10.96.14.2', port: 8265 },
    ]);

    clock += 25_000;
    expect(resolver.entries()).toEqual([{ cluster: 'beta', hostname: '10.96.14.2', port: 8265 }]);
  });

  it('sweeps expired answers so unknown names do not pile up', async () => {
    lookup.mockResolvedValue(null);
    const resolver = makeResolver();

    for (let i = 0; i < 50; i++) {
      await resolver.resolve(`scan-${i}`);
      clock += 30_000;
    }

    expect(resolver.size).toBe(1);
  });

  it('forgets an expired entry even when the refresh fails', async () => {
    lookup
      .mockResolvedValueOnce(details('demo'))
      .mockRejectedValueOnce(new UpstreamError('Manager lookup for cluster demo failed: ECONNREFUSED'));
    const resolver = makeResolver();

    await resolver.resolve('demo');
    clock += 30_000;
    await expect(resolver.resolve('demo')).rejects.toThrow(UpstreamError);

    expect(resolver.size).toBe(0);
  });

  it('evicts the oldest answer beyond maxEntries', async () => {
    lookup.mockImplementation(async (name) => details(name));
    const resolver = new ClusterResolver(lookup, { ttlMs: 30_000, maxEntries: 2, now: () => clock });

    await resolver.resolve('alpha');
    await resolver.resolve('beta');
    await resolver.resolve('gamma');
    expect(resolver.size).toBe(2);

    await resolver.resolve('beta');
    expect(lookup).toHaveBeenCalledTimes(3);
    await resolver.resolve('alpha');
    expect(lookup).toHaveBeenCalledTimes(4);
    expect(resolver.entries().map((target) => target.cluster)).toEqual(['gamma', 'alpha']);
  });
});
