export { isValidClusterName, isValidNamespace, MAX_CLUSTER_NAME_LENGTH, MAX_NAMESPACE_LENGTH } from './names.js';
export { RaygateError, CommandError, NotFoundError, ValidationError, ConfigError, UpstreamError } from './errors.js';
export type {
  ClusterSummary,
  ClusterDetails,
  CreateClusterRequest,
  ClusterRoute,
  ErrorBody,
} from './types.js';
