/**
 * @cloudctl/cloud-api - Client Contract
 */

import type {
  ClusterResponse,
  HealthResponse,
  StorageClusterInfo,
  VersionResponse,
  VolumeResponse,
} from './schemas.js';

export interface RequestOptions {
  /** Aborts the request; the dashboard passes a deadline signal here. */
  signal?: AbortSignal;
}

export interface ClusterFindRequest {
  id?: string;
  name?: string;
  tenant?: string;
  projectId?: string;
  partitionId?: string;
  purpose?: string;
}

export interface VolumeFindRequest {
  volumeId?: string;
  projectId?: string;
  partitionId?: string;
  tenantId?: string;
}

/**
 * The part of the cloud API that cloudctl consumes.
 * Every method rejects with ApiError on a non-2xx answer or transport failure.
 */
export interface CloudApi {
  findClusters(request: ClusterFindRequest, options?: RequestOptions): Promise<ClusterResponse[]>;
  findVolumes(request: VolumeFindRequest, options?: RequestOptions): Promise<VolumeResponse[]>;
  storageClusterInfo(partitionId: string | undefined, options?: RequestOptions): Promise<StorageClusterInfo[]>;
  versionInfo(options?: RequestOptions): Promise<VersionResponse>;
  health(options?: RequestOptions): Promise<HealthResponse>;
}
