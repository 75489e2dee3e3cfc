import type { ClusterCondition, ClusterResponse } from '@cloudctl/cloud-api';

export const T = '2024-05-01T12:00:00Z';
export const T_MINUS_1H = '2024-05-01T11:00:00Z';
export const T_MINUS_3H = '2024-05-01T09:00:00Z';

export function cluster(
  name: string,
  state: string | undefined,
  conditions: ClusterCondition[] = [],
  lastErrors: Array<{ description?: string; lastUpdateTime?: string }> = [],
): ClusterResponse {
  return {
    ID: `${name}-id`,
    Name: name,
    Tenant: 't1',
    Status: {
      lastOperation: state === undefined ? undefined : { state },
      conditions,
      lastErrors,
    },
  };
}

export function condition(type: string, status: string, message?: string, lastUpdateTime?: string): ClusterCondition {
  return { type, status, message, lastUpdateTime };
}
