/**
 * Kubernetes naming rules for the identifiers that reach kubectl and helm.
 *
 * Cluster names become Helm release names (max 53 chars) and the prefix of
 * the head service name; namespaces are plain RFC 1123 labels (max 63).
 */

const LABEL = /^[a-z0-9]([-a-z0-9]*[a-z0-9])?$/;

export const MAX_CLUSTER_NAME_LENGTH = 53;
export const MAX_NAMESPACE_LENGTH = 63;

export function isValidClusterName(name: string): boolean {
  return name.length <= MAX_CLUSTER_NAME_LENGTH && LABEL.test(name);
}

export function isValidNamespace(namespace: string): boolean {
  return namespace.length <= MAX_NAMESPACE_LENGTH && LABEL.test(namespace);
}
