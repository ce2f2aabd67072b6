/** Cluster entry as listed by the manager. */
export interface ClusterSummary {
  name: string;
}

/** Head service coordinates of a Ray cluster. */
export interface ClusterDetails {
  name: string;
  /** Service name of the head node (`<name>-ray-head`) */
  host: string;
  /** Cluster IP of the head service */
  ip: string;
  /** First target port of the head service, as printed by kubectl */
  port: string;
}

/** Body of POST /clusters. */
export interface CreateClusterRequest {
  name: string;
}

/** Proxied URL split into the cluster name and the path to forward. */
export interface ClusterRoute {
  cluster: string;
  path: string;
}

/** Error payload returned by both services. */
export interface ErrorBody {
  success: false;
  error: string;
}
