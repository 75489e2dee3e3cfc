/**
 * Reducers from API resource lists to per-render histograms.
 *
 * Every function here is pure and total: records with missing or unexpected
 * fields land in the designated unknown/other bucket, and each histogram's
 * buckets sum to the number of records it was built from.
 */

import type { ClusterResponse, StorageClusterInfo, VolumeResponse } from '@cloudctl/cloud-api';
import { parseRfc3339 } from '@cloudctl/shared';

export type Histogram<K extends string> = Record<K, number>;

export interface ProblemRecord {
  name: string;
  message: string;
  time: Date;
}

// ============================================================================
// Histogram Helpers
// ============================================================================

/** Maps a state string onto a bucket, `fallback` for anything unrecognized. */
export function bucketOf<K extends string>(
  state: string | null | undefined,
  buckets: readonly K[],
  fallback: K,
): K {
  const match = buckets.find((b) => b === state);
  return match ?? fallback;
}

export function histogramValues<K extends string>(histogram: Histogram<K>, order: readonly K[]): number[] {
  return order.map((bucket) => histogram[bucket]);
}

export function isAllZero<K extends string>(histogram: Histogram<K>): boolean {
  return Object.values<number>(histogram).every((count) => count === 0);
}

/** Integer percentage, clamped to 0..100; undefined when there is nothing to divide by. */
export function percentOf(count: number, total: number): number | undefined {
  if (!(total > 0)) {
    return undefined;
  }
  return Math.min(100, Math.max(0, Math.floor((count * 100) / total)));
}

/** Newest first; records with equal timestamps keep their fetch order. */
export function sortByRecency(records: readonly ProblemRecord[]): ProblemRecord[] {
  return [...records].sort((a, b) => b.time.getTime() - a.time.getTime());
}

export function problemRows(records: readonly ProblemRecord[]): string[][] {
  return sortByRecency(records).map((r) => [r.name, r.message]);
}

// ============================================================================
// Clusters
// ============================================================================

export const CLUSTER_OPERATION_BUCKETS = ['Succeeded', 'Processing', 'Unhealthy'] as const;
export type ClusterOperationBucket = (typeof CLUSTER_OPERATION_BUCKETS)[number];

export const CLUSTER_CONDITION_TYPES = [
  'APIServerAvailable',
  'ControlPlaneHealthy',
  'EveryNodeReady',
  'SystemComponentsHealthy',
] as const;
export type ClusterConditionType = (typeof CLUSTER_CONDITION_TYPES)[number];

const HEALTHY_CONDITION_STATUSES = ['true', 'progressing'];

export interface ClusterSummary {
  total: number;
  operation: Histogram<ClusterOperationBucket>;
  /** Clusters whose condition of that type is True or Progressing. */
  healthyConditions: Histogram<ClusterConditionType>;
  problems: ProblemRecord[];
  lastErrors: ProblemRecord[];
}

export function summarizeClusters(clusters: readonly ClusterResponse[]): ClusterSummary {
  const summary: ClusterSummary = {
    total: clusters.length,
    operation: { Succeeded: 0, Processing: 0, Unhealthy: 0 },
    healthyConditions: {
      APIServerAvailable: 0,
      ControlPlaneHealthy: 0,
      EveryNodeReady: 0,
      SystemComponentsHealthy: 0,
    },
    problems: [],
    lastErrors: [],
  };

  for (const cluster of clusters) {
    const state = cluster.Status?.lastOperation?.state;
    if (!state) {
      // without an operation state nothing else about the cluster is trusted
      summary.operation.Unhealthy++;
      continue;
    }
    summary.operation[bucketOf<ClusterOperationBucket>(state, ['Succeeded', 'Processing'], 'Unhealthy')]++;

    const name = cluster.Name;

    for (const condition of cluster.Status?.conditions ?? []) {
      if (!condition || !condition.status || !condition.type) {
        continue;
      }

      if (!HEALTHY_CONDITION_STATUSES.includes(condition.status.toLowerCase())) {
        const time = parseRfc3339(condition.lastUpdateTime);
        if (!name || !condition.message || !time) {
          continue;
        }
        summary.problems.push({ name, message: `(${condition.type}) ${condition.message}`, time });
        continue;
      }

      const type = CLUSTER_CONDITION_TYPES.find((t) => t === condition.type);
      if (type) {
        summary.healthyConditions[type]++;
      }
    }

    for (const lastError of cluster.Status?.lastErrors ?? []) {
      const time = parseRfc3339(lastError?.lastUpdateTime);
      if (!name || !lastError?.description || !time) {
        continue;
      }
      summary.lastErrors.push({ name, message: lastError.description, time });
    }
  }

  return summary;
}

// ============================================================================
// Volumes
// ============================================================================

export const VOLUME_STATE_BUCKETS = ['Available', 'Failed', 'Unknown', 'Other'] as const;
export type VolumeStateBucket = (typeof VOLUME_STATE_BUCKETS)[number];

export const PROTECTION_STATE_BUCKETS = ['FullyProtected', 'Degraded', 'ReadOnly', 'NotAvailable', 'Unknown'] as const;
export type ProtectionStateBucket = (typeof PROTECTION_STATE_BUCKETS)[number];

export interface VolumeSummary {
  total: number;
  state: Histogram<VolumeStateBucket>;
  protection: Histogram<ProtectionStateBucket>;
  /** Summed physical used storage in bytes. */
  physicalUsed: number;
}

export function summarizeVolumes(volumes: readonly VolumeResponse[]): VolumeSummary {
  const summary: VolumeSummary = {
    total: volumes.length,
    state: { Available: 0, Failed: 0, Unknown: 0, Other: 0 },
    protection: { FullyProtected: 0, Degraded: 0, ReadOnly: 0, NotAvailable: 0, Unknown: 0 },
    physicalUsed: 0,
  };

  for (const volume of volumes) {
    if (!volume.state || !volume.protectionState) {
      summary.state.Other++;
      summary.protection.Unknown++;
      continue;
    }

    summary.state[bucketOf<VolumeStateBucket>(volume.state, ['Available', 'Failed', 'Unknown'], 'Other')]++;
    summary.protection[bucketOf<ProtectionStateBucket>(volume.protectionState, PROTECTION_STATE_BUCKETS, 'Unknown')]++;

    const used = volume.statistics?.physicalUsedStorage;
    if (typeof used === 'number') {
      summary.physicalUsed += used;
    }
  }

  return summary;
}

// ============================================================================
// Storage Clusters
// ============================================================================

export const STORAGE_HEALTH_BUCKETS = ['OK', 'Warning', 'Error', 'Other'] as const;
export type StorageHealthBucket = (typeof STORAGE_HEALTH_BUCKETS)[number];

export const SERVER_STATE_BUCKETS = ['Enabled', 'Disabled', 'Failed', 'Other'] as const;
export type ServerStateBucket = (typeof SERVER_STATE_BUCKETS)[number];

export interface StorageSummary {
  total: number;
  health: Histogram<StorageHealthBucket>;
  servers: Histogram<ServerStateBucket>;
  physicalFree: number;
  physicalUsed: number;
  /** Mean compression ratio over all storage clusters. */
  compressionRatio: number;
}

export function summarizeStorageClusters(clusters: readonly StorageClusterInfo[]): StorageSummary {
  const summary: StorageSummary = {
    total: clusters.length,
    health: { OK: 0, Warning: 0, Error: 0, Other: 0 },
    servers: { Enabled: 0, Disabled: 0, Failed: 0, Other: 0 },
    physicalFree: 0,
    physicalUsed: 0,
    compressionRatio: 0,
  };

  let ratioSum = 0;
  for (const cluster of clusters) {
    const state = cluster.health?.state;
    // a cluster without a health state contributes nothing else
    if (state === undefined || state === null) {
      summary.health.Other++;
      continue;
    }
    summary.health[bucketOf<StorageHealthBucket>(state, ['OK', 'Warning', 'Error'], 'Other')]++;

    for (const server of cluster.servers ?? []) {
      summary.servers[bucketOf<ServerStateBucket>(server.state, ['Enabled', 'Disabled', 'Failed'], 'Other')]++;
    }

    const stats = cluster.statistics;
    if (
      typeof stats?.freePhysicalStorage === 'number' &&
      typeof stats.physicalUsedStorage === 'number' &&
      typeof stats.compressionRatio === 'number'
    ) {
      summary.physicalFree += stats.freePhysicalStorage;
      summary.physicalUsed += stats.physicalUsedStorage;
      ratioSum += stats.compressionRatio;
    }
  }

  summary.compressionRatio = clusters.length > 0 ? ratioSum / clusters.length : 0;
  return summary;
}
