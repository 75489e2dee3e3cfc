/**
 * Dashboard Event Loop Tests
 */

import type { CloudApi, ClusterResponse } from '@cloudctl/cloud-api';
import { Dashboard } from '../tui/dashboard.js';
import { runDashboard } from '../tui/run.js';
import { FakeTerminal, createFakeApi, createTestLogger, deferred, flushPromises } from './helpers/fakes.js';

function setup(refreshIntervalMs = 60_000, configure?: (api: jest.Mocked<CloudApi>) => void) {
  const api = createFakeApi();
  configure?.(api);
  const terminal = new FakeTerminal({ width: 120, height: 40 });
  const logger = createTestLogger();
  const dashboard = new Dashboard({
    api,
    canvas: terminal,
    logger,
    filter: {},
    client: { version: '0.4.0-test', gitSha: 'abc1234' },
    requestTimeoutMs: 1000,
  });
  const controller = new AbortController();
  const done = runDashboard(terminal, dashboard, { refreshIntervalMs, logger, signal: controller.signal });
  return { api, terminal, dashboard, done, controller };
}

describe('runDashboard', () => {
  it('should lay out and render on start', async () => {
    const { api, terminal, done } = setup();
    await flushPromises();

    expect(terminal.paragraphNamed('Cloud Dashboard').rect).toEqual({ x1: 0, y1: 0, x2: 95, y2: 5 });
    expect(api.versionInfo).toHaveBeenCalledTimes(1);

    terminal.key('q');
    await done;
  });

  it('should stop on q and unsubscribe', async () => {
    const { terminal, done } = setup();

    terminal.key('q');
    await expect(done).resolves.toBeUndefined();
    expect(terminal.listenerCount).toBe(0);
  });

  it('should stop on ctrl-c', async () => {
    const { terminal, done } = setup();

    terminal.key('C-c');
    await expect(done).resolves.toBeUndefined();
  });

  it('should stop when aborted', async () => {
    const { terminal, done, controller } = setup();

    controller.abort();
    await expect(done).resolves.toBeUndefined();
    expect(terminal.listenerCount).toBe(0);
  });

  it('should switch tabs with number keys', async () => {
    const { api, terminal, dashboard, done } = setup();
    await flushPromises();

    terminal.key('2');
    await flushPromises();

    expect(dashboard.activeTab.name).toBe('Volumes');
    expect(terminal.clears).toBe(1);
    expect(api.findVolumes).toHaveBeenCalledTimes(1);

    terminal.key('7');
    terminal.key('0');
    expect(dashboard.activeTab.name).toBe('Volumes');
    expect(terminal.clears).toBe(1);

    terminal.key('q');
    await done;
  });

  it('should cycle tabs with tab', async () => {
    const { api, terminal, dashboard, done } = setup();
    await flushPromises();

    terminal.key('tab');
    expect(dashboard.activeTabIndex).toBe(1);
    await flushPromises();
    expect(api.findVolumes).toHaveBeenCalledTimes(1);

    terminal.key('tab');
    expect(dashboard.activeTabIndex).toBe(0);
    await flushPromises();
    expect(api.findClusters).toHaveBeenCalledTimes(2);
    expect(terminal.clears).toBe(2);

    terminal.key('q');
    await done;
  });

  it('should hold a tab switch until the running render finishes', async () => {
    const clusters = deferred<ClusterResponse[]>();
    const { api, terminal, dashboard, done } = setup(60_000, (fake) => {
      fake.findClusters.mockReturnValueOnce(clusters.promise);
    });
    await flushPromises();

    terminal.key('2');
    expect(dashboard.activeTab.name).toBe('Clusters');
    expect(terminal.clears).toBe(0);

    clusters.resolve([]);
    await flushPromises();
    await flushPromises();

    expect(dashboard.activeTab.name).toBe('Volumes');
    expect(terminal.clears).toBe(1);
    expect(api.findClusters).toHaveBeenCalledTimes(1);
    expect(api.findVolumes).toHaveBeenCalledTimes(1);
    expect(terminal.drawnSinceClear).toEqual(['Filters', 'Tabs', 'Volume Infos', 'Cloud Dashboard']);

    terminal.key('q');
    await done;
  });

  it('should apply several queued actions with a single render', async () => {
    const clusters = deferred<ClusterResponse[]>();
    const { api, terminal, dashboard, done } = setup(60_000, (fake) => {
      fake.findClusters.mockReturnValueOnce(clusters.promise);
    });
    await flushPromises();

    terminal.key('tab');
    terminal.key('tab');
    terminal.key('2');
    terminal.emit({ type: 'resize', width: 80, height: 30 });
    expect(terminal.paragraphNamed('Cloud Dashboard').rect).toEqual({ x1: 0, y1: 0, x2: 95, y2: 5 });

    clusters.resolve([]);
    await flushPromises();
    await flushPromises();

    expect(dashboard.activeTab.name).toBe('Volumes');
    expect(terminal.paragraphNamed('Cloud Dashboard').rect).toEqual({ x1: 0, y1: 0, x2: 55, y2: 5 });
    expect(terminal.clears).toBe(4);
    expect(api.versionInfo).toHaveBeenCalledTimes(2);
    expect(api.findVolumes).toHaveBeenCalledTimes(1);

    terminal.key('q');
    await done;
  });

  it('should not apply queued actions after quitting', async () => {
    const clusters = deferred<ClusterResponse[]>();
    const { api, terminal, dashboard, done } = setup(60_000, (fake) => {
      fake.findClusters.mockReturnValueOnce(clusters.promise);
    });
    await flushPromises();

    terminal.key('2');
    terminal.key('q');
    await done;

    clusters.resolve([]);
    await flushPromises();

    expect(dashboard.activeTab.name).toBe('Clusters');
    expect(terminal.clears).toBe(0);
    expect(api.findVolumes).not.toHaveBeenCalled();
  });

  it('should refresh on r', async () => {
    const { api, terminal, done } = setup();
    await flushPromises();

    terminal.key('r');
    await flushPromises();

    expect(api.versionInfo).toHaveBeenCalledTimes(2);
    expect(terminal.clears).toBe(0);

    terminal.key('q');
    await done;
  });

  it('should re-layout on resize', async () => {
    const { terminal, done } = setup();
    await flushPromises();

    terminal.emit({ type: 'resize', width: 80, height: 30 });

    expect(terminal.paragraphNamed('Cloud Dashboard').rect).toEqual({ x1: 0, y1: 0, x2: 55, y2: 5 });
    expect(terminal.tabs().rect).toEqual({ x1: 0, y1: 29, x2: 80, y2: 30 });
    expect(terminal.clears).toBe(1);

    terminal.key('q');
    await done;
  });

  it('should refresh on every tick', async () => {
    jest.useFakeTimers();
    try {
      const { api, terminal, done } = setup(3000);
      await jest.advanceTimersByTimeAsync(0);
      expect(api.versionInfo).toHaveBeenCalledTimes(1);

      await jest.advanceTimersByTimeAsync(3000);
      expect(api.versionInfo).toHaveBeenCalledTimes(2);

      await jest.advanceTimersByTimeAsync(6000);
      expect(api.versionInfo).toHaveBeenCalledTimes(4);

      terminal.key('q');
      await done;

      await jest.advanceTimersByTimeAsync(6000);
      expect(api.versionInfo).toHaveBeenCalledTimes(4);
    } finally {
      jest.useRealTimers();
    }
  });
});
