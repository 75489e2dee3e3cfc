/**
 * @cloudctl/cloud-api
 *
 * Typed client for the cloud-management API: clusters, volumes, storage
 * cluster info, version and health.
 */

export { CloudApiClient, healthFromError, type CloudApiClientOptions } from './client.js';
export { withDeadline, DEFAULT_REQUEST_TIMEOUT_MS } from './deadline.js';
export type { CloudApi, ClusterFindRequest, VolumeFindRequest, RequestOptions } from './types.js';
export {
  HEALTH_STATUSES,
  clusterResponseSchema,
  volumeResponseSchema,
  storageClusterInfoSchema,
  healthResponseSchema,
  versionResponseSchema,
  type ClusterResponse,
  type ClusterCondition,
  type ClusterLastError,
  type ClusterStatus,
  type VolumeResponse,
  type StorageClusterInfo,
  type StorageServer,
  type HealthResponse,
  type VersionResponse,
} from './schemas.js';
