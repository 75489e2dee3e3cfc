/**
 * @cloudctl/cloud-api - HTTP Client
 * Typed client for the cloud-management REST API
 */

import type { z } from 'zod';
import { ApiError, CloudctlError, errorMessage } from '@cloudctl/shared';
import {
  clusterListSchema,
  healthResponseSchema,
  storageClusterInfoListSchema,
  versionResponseSchema,
  volumeListSchema,
  type ClusterResponse,
  type HealthResponse,
  type StorageClusterInfo,
  type VersionResponse,
  type VolumeResponse,
} from './schemas.js';
import type { CloudApi, ClusterFindRequest, RequestOptions, VolumeFindRequest } from './types.js';

export interface CloudApiClientOptions {
  /** Base URL including the API base path, e.g. https://api.example.test/cloud */
  baseUrl: string;
  apiToken?: string;
  userAgent?: string;
  fetch?: typeof fetch;
}

interface RequestSpec {
  operation: string;
  method: 'GET' | 'POST';
  path: string;
  query?: Record<string, string | undefined>;
  body?: unknown;
}

// Empty filter values mean "no filter".
function orUndefined(value: string | undefined): string | undefined {
  return value ? value : undefined;
}

export class CloudApiClient implements CloudApi {
  private readonly baseUrl: string;
  private readonly apiToken?: string;
  private readonly userAgent: string;
  private readonly fetchImpl: typeof fetch;

  constructor(options: CloudApiClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.apiToken = options.apiToken;
    this.userAgent = options.userAgent || 'cloudctl';
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
  }

  async findClusters(request: ClusterFindRequest, options: RequestOptions = {}): Promise<ClusterResponse[]> {
    return this.request(
      {
        operation: 'find clusters',
        method: 'POST',
        path: '/v1/cluster/find',
        query: { returnMachines: 'false' },
        body: {
          id: orUndefined(request.id),
          name: orUndefined(request.name),
          tenant: orUndefined(request.tenant),
          projectID: orUndefined(request.projectId),
          partitionID: orUndefined(request.partitionId),
          purpose: orUndefined(request.purpose),
        },
      },
      clusterListSchema,
      options,
    );
  }

  async findVolumes(request: VolumeFindRequest, options: RequestOptions = {}): Promise<VolumeResponse[]> {
    return this.request(
      {
        operation: 'find volumes',
        method: 'POST',
        path: '/v1/volume/find',
        body: {
          volumeID: orUndefined(request.volumeId),
          projectID: orUndefined(request.projectId),
          partitionID: orUndefined(request.partitionId),
          tenantID: orUndefined(request.tenantId),
        },
      },
      volumeListSchema,
      options,
    );
  }

  async storageClusterInfo(
    partitionId: string | undefined,
    options: RequestOptions = {},
  ): Promise<StorageClusterInfo[]> {
    return this.request(
      {
        operation: 'storage cluster info',
        method: 'GET',
        path: '/v1/volume/clusterinfo',
        query: { partitionid: orUndefined(partitionId) },
      },
      storageClusterInfoListSchema,
      options,
    );
  }

  async versionInfo(options: RequestOptions = {}): Promise<VersionResponse> {
    return this.request({ operation: 'api version', method: 'GET', path: '/v1/version' }, versionResponseSchema, options);
  }

  /**
   * The API answers 500 with a regular health payload when it is unhealthy;
   * that case rejects with ApiError, use `healthFromError` to recover it.
   */
  async health(options: RequestOptions = {}): Promise<HealthResponse> {
    return this.request({ operation: 'api health', method: 'GET', path: '/v1/health' }, healthResponseSchema, options);
  }

  // ==========================================================================
  // Transport
  // ==========================================================================

  private url(path: string, query: Record<string, string | undefined> = {}): string {
    const params = new URLSearchParams();
    for (const [key, value] of Object.entries(query)) {
      if (value !== undefined) params.set(key, value);
    }
    const qs = params.toString();
    return `${this.baseUrl}${path}${qs ? `?${qs}` : ''}`;
  }

  private async request<S extends z.ZodTypeAny>(
    spec: RequestSpec,
    schema: S,
    options: RequestOptions,
  ): Promise<z.output<S>> {
    const headers: Record<string, string> = {
      Accept: 'application/json',
      'User-Agent': this.userAgent,
    };
    if (spec.body !== undefined) {
      headers['Content-Type'] = 'application/json';
    }
    if (this.apiToken) {
      headers.Authorization = `Bearer ${this.apiToken}`;
    }

    let response: Response;
    try {
      response = await this.fetchImpl(this.url(spec.path, spec.query), {
        method: spec.method,
        headers,
        body: spec.body !== undefined ? JSON.stringify(spec.body) : undefined,
        signal: options.signal,
      });
    } catch (error) {
      // A deadline abort carries its own typed reason.
      const reason: unknown = options.signal?.aborted ? options.signal.reason : undefined;
      if (reason instanceof CloudctlError) {
        throw reason;
      }
      throw new ApiError(`${spec.operation}: ${errorMessage(error)}`, 0);
    }

    const text = await response.text();
    let payload: unknown;
    if (text) {
      try {
        payload = JSON.parse(text);
      } catch {
        payload = text;
      }
    }

    if (!response.ok) {
      throw new ApiError(
        `${spec.operation} failed with status ${response.status}: ${describePayload(payload, response.statusText)}`,
        response.status,
        payload,
      );
    }

    const parsed = schema.safeParse(payload);
    if (!parsed.success) {
      throw new ApiError(`${spec.operation}: unexpected response payload`, response.status, payload, {
        issues: parsed.error.issues.slice(0, 3).map((i) => `${i.path.join('.')}: ${i.message}`),
      });
    }
    return parsed.data;
  }
}

function describePayload(payload: unknown, fallback: string): string {
  if (payload && typeof payload === 'object' && 'message' in payload && typeof payload.message === 'string') {
    return payload.message;
  }
  if (typeof payload === 'string' && payload.trim()) {
    return payload.trim();
  }
  return fallback || 'no response body';
}

/**
 * Recovers the health payload the API sends along with a 500 when it is
 * unhealthy or degraded. Any other error yields undefined.
 */
export function healthFromError(error: unknown): HealthResponse | undefined {
  if (!(error instanceof ApiError) || error.statusCode !== 500) {
    return undefined;
  }
  const parsed = healthResponseSchema.safeParse(error.body);
  return parsed.success ? parsed.data : undefined;
}
