/**
 * @cloudctl/cloud-api - Payload Schemas
 *
 * Resource records are decoded leniently: a field with an unexpected type
 * decodes as absent, so one odd record never rejects a whole list. Callers
 * classify absent fields as unknown.
 */

import { z } from 'zod';

const optionalString = z.string().nullish().catch(undefined);
const optionalNumber = z.number().nullish().catch(undefined);

function lenientList<T extends z.ZodTypeAny>(item: T) {
  return z.array(item).nullish().catch(undefined);
}

// ============================================================================
// Clusters
// ============================================================================

export const clusterConditionSchema = z
  .object({
    type: optionalString,
    status: optionalString,
    message: optionalString,
    reason: optionalString,
    lastUpdateTime: optionalString,
    lastTransitionTime: optionalString,
  })
  .catch({});

export const clusterLastErrorSchema = z
  .object({
    description: optionalString,
    taskID: optionalString,
    lastUpdateTime: optionalString,
    codes: z.array(z.string()).nullish().catch(undefined),
  })
  .catch({});

export const clusterStatusSchema = z.object({
  conditions: lenientList(clusterConditionSchema),
  lastOperation: z
    .object({
      state: optionalString,
      type: optionalString,
      description: optionalString,
      progress: optionalNumber,
      lastUpdateTime: optionalString,
    })
    .nullish()
    .catch(undefined),
  lastErrors: lenientList(clusterLastErrorSchema),
});

export const clusterResponseSchema = z
  .object({
    ID: optionalString,
    Name: optionalString,
    Tenant: optionalString,
    ProjectID: optionalString,
    PartitionID: optionalString,
    Purpose: optionalString,
    Status: clusterStatusSchema.nullish().catch(undefined),
  })
  .catch({});

export type ClusterCondition = z.infer<typeof clusterConditionSchema>;
export type ClusterLastError = z.infer<typeof clusterLastErrorSchema>;
export type ClusterStatus = z.infer<typeof clusterStatusSchema>;
export type ClusterResponse = z.infer<typeof clusterResponseSchema>;

// ============================================================================
// Volumes
// ============================================================================

export const volumeResponseSchema = z
  .object({
    volumeID: optionalString,
    volumeName: optionalString,
    partitionID: optionalString,
    tenantID: optionalString,
    projectID: optionalString,
    state: optionalString,
    protectionState: optionalString,
    size: optionalNumber,
    statistics: z
      .object({
        physicalUsedStorage: optionalNumber,
        logicalUsedStorage: optionalNumber,
        compressionRatio: optionalNumber,
      })
      .nullish()
      .catch(undefined),
    connectedHosts: z.array(z.string()).nullish().catch(undefined),
  })
  .catch({});

export type VolumeResponse = z.infer<typeof volumeResponseSchema>;

export const storageServerSchema = z
  .object({
    name: optionalString,
    state: optionalString,
    serverid: optionalString,
  })
  .catch({});

export const storageClusterInfoSchema = z
  .object({
    partition: optionalString,
    uuid: optionalString,
    health: z
      .object({
        state: optionalString,
        numdegradedvolumes: optionalNumber,
        numinactivenodes: optionalNumber,
      })
      .nullish()
      .catch(undefined),
    servers: lenientList(storageServerSchema),
    statistics: z
      .object({
        freePhysicalStorage: optionalNumber,
        physicalUsedStorage: optionalNumber,
        compressionRatio: optionalNumber,
      })
      .nullish()
      .catch(undefined),
  })
  .catch({});

export type StorageServer = z.infer<typeof storageServerSchema>;
export type StorageClusterInfo = z.infer<typeof storageClusterInfoSchema>;

// ============================================================================
// Version & Health
// ============================================================================

export const versionResponseSchema = z.object({
  version: z.string(),
  revision: z.string().optional(),
  gitsha1: z.string().optional(),
  builddate: z.string().optional(),
});

export type VersionResponse = z.infer<typeof versionResponseSchema>;

export const HEALTH_STATUSES = ['healthy', 'degraded', 'partial-unhealthy', 'unhealthy'] as const;

export const healthResponseSchema = z.object({
  status: z.string(),
  message: z.string().nullish().transform((m) => m ?? ''),
  services: z.record(z.string(), z.unknown()).optional(),
});

export type HealthResponse = z.infer<typeof healthResponseSchema>;

export const clusterListSchema = z.array(clusterResponseSchema);
export const volumeListSchema = z.array(volumeResponseSchema);
export const storageClusterInfoListSchema = z.array(storageClusterInfoSchema);
