/**
 * Cloud API Client Tests
 */

import { ApiError, FetchTimeoutError } from '@cloudctl/shared';
import { CloudApiClient, healthFromError } from '../client.js';

type FetchArgs = Parameters<typeof fetch>;

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

function createClient(respond: (url: string, init?: RequestInit) => Promise<Response>) {
  const fetchMock = jest.fn((input: FetchArgs[0], init?: FetchArgs[1]) => respond(String(input), init));
  const client = new CloudApiClient({
    baseUrl: 'https://api.example.test/cloud/',
    apiToken: 'test-token',
    fetch: fetchMock,
  });
  return { client, fetchMock };
}

describe('CloudApiClient', () => {
  describe('findClusters', () => {
    it('should post the filter without empty values', async () => {
      const { client, fetchMock } = createClient(async () => jsonResponse([]));

      await client.findClusters({ tenant: 't1', partitionId: '', purpose: 'production' });

      expect(fetchMock).toHaveBeenCalledTimes(1);
      const [url, init] = fetchMock.mock.calls[0];
      expect(url).toBe('https://api.example.test/cloud/v1/cluster/find?returnMachines=false');
      expect(init?.method).toBe('POST');
      expect(JSON.parse(String(init?.body))).toEqual({ tenant: 't1', purpose: 'production' });
      expect(init?.headers).toMatchObject({
        Authorization: 'Bearer test-token',
        'Content-Type': 'application/json',
      });
    });

    it('should decode records leniently', async () => {
      const { client } = createClient(async () =>
        jsonResponse([
          { Name: 'c1', Status: { lastOperation: { state: 'Succeeded' } } },
          { Name: 42, Status: { lastOperation: { state: null } } },
          'not-a-cluster',
        ]),
      );

      const clusters = await client.findClusters({});

      expect(clusters).toHaveLength(3);
      expect(clusters[0].Name).toBe('c1');
      expect(clusters[0].Status?.lastOperation?.state).toBe('Succeeded');
      expect(clusters[1].Name).toBeUndefined();
      expect(clusters[1].Status?.lastOperation?.state).toBeNull();
      expect(clusters[2]).toEqual({});
    });

    it('should reject a non-list payload', async () => {
      const { client } = createClient(async () => jsonResponse({ clusters: [] }));

      await expect(client.findClusters({})).rejects.toThrow('find clusters: unexpected response payload');
    });
  });

  describe('findVolumes', () => {
    it('should send tenant and partition as separate filters', async () => {
      const { client, fetchMock } = createClient(async () => jsonResponse([]));

      await client.findVolumes({ tenantId: 't1', partitionId: 'p1' });

      const [url, init] = fetchMock.mock.calls[0];
      expect(url).toBe('https://api.example.test/cloud/v1/volume/find');
      expect(JSON.parse(String(init?.body))).toEqual({ tenantID: 't1', partitionID: 'p1' });
    });
  });

  describe('storageClusterInfo', () => {
    it('should pass the partition as query parameter', async () => {
      const { client, fetchMock } = createClient(async () => jsonResponse([{ uuid: 'sc1' }]));

      const infos = await client.storageClusterInfo('p1');

      expect(fetchMock.mock.calls[0][0]).toBe('https://api.example.test/cloud/v1/volume/clusterinfo?partitionid=p1');
      expect(fetchMock.mock.calls[0][1]?.body).toBeUndefined();
      expect(infos).toEqual([{ uuid: 'sc1' }]);
    });

    it('should surface forbidden answers as ApiError 403', async () => {
      const { client } = createClient(async () => jsonResponse({ message: 'access denied' }, 403));

      const error = await client.storageClusterInfo(undefined).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ApiError);
      expect((error as ApiError).isForbidden).toBe(true);
      expect((error as ApiError).message).toBe('storage cluster info failed with status 403: access denied');
    });
  });

  describe('errors', () => {
    it('should wrap transport failures', async () => {
      const { client } = createClient(async () => {
        throw new TypeError('fetch failed');
      });

      const error = await client.versionInfo().catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ApiError);
      expect((error as ApiError).statusCode).toBe(0);
      expect((error as ApiError).message).toBe('api version: fetch failed');
    });

    it('should rethrow the abort reason of a deadline', async () => {
      const { client } = createClient(async () => {
        throw new Error('This operation was aborted');
      });
      const controller = new AbortController();
      const reason = new FetchTimeoutError('api version', 5000);
      controller.abort(reason);

      await expect(client.versionInfo({ signal: controller.signal })).rejects.toBe(reason);
    });

    it('should fall back to the status text without a body', async () => {
      const { client } = createClient(async () => new Response(null, { status: 502, statusText: 'Bad Gateway' }));

      await expect(client.versionInfo()).rejects.toThrow('api version failed with status 502: Bad Gateway');
    });
  });

  describe('health', () => {
    it('should return a healthy payload', async () => {
      const { client } = createClient(async () => jsonResponse({ status: 'healthy', message: null }));

      await expect(client.health()).resolves.toEqual({ status: 'healthy', message: '' });
    });

    it('should expose the unhealthy payload of a 500 answer', async () => {
      const { client } = createClient(async () =>
        jsonResponse({ status: 'unhealthy', message: 'database unreachable' }, 500),
      );

      const error = await client.health().catch((e: unknown) => e);

      expect(healthFromError(error)).toEqual({ status: 'unhealthy', message: 'database unreachable' });
    });

    it('should not treat other failures as health payloads', () => {
      expect(healthFromError(new ApiError('boom', 500, 'internal error'))).toBeUndefined();
      expect(healthFromError(new ApiError('boom', 503, { status: 'unhealthy' }))).toBeUndefined();
      expect(healthFromError(new Error('boom'))).toBeUndefined();
    });
  });
});
