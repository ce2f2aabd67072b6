import { isValidClusterName } from '@raygate/shared';
import type { ClusterRoute } from '@raygate/shared';

/**
 * Split `/<cluster>/<rest>?<query>` into the cluster name and the path
 * forwarded to its head node.
 *
 * @param url - Request target as received (path + query)
 * @returns null when the first segment is not a valid cluster name
 */
export function parseClusterRoute(url: string): ClusterRoute | null {
  const queryStart = url.indexOf('?');
  const pathname = queryStart === -1 ? url : url.slice(0, queryStart);
  const search = queryStart === -1 ? '' : url.slice(queryStart);

  const match = /^\/([^/]+)(\/.*)?$/.exec(pathname);
  if (!match) {
    return null;
  }

  const cluster = match[1];
  if (!isValidClusterName(cluster)) {
    return null;
  }

  const rest: string | undefined = match[2];
  return { cluster, path: (rest || '/') + search };
}
