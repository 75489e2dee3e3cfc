/**
 * Dashboard Command Tests
 */

import { ConfigError } from '@cloudctl/shared';
import { parseDashboardOptions, startDashboard } from '../commands/dashboard.cmd.js';
import { THEMES } from '../tui/theme.js';
import { FakeTerminal, createFakeApi, createTestLogger } from './helpers/fakes.js';

describe('parseDashboardOptions', () => {
  it('should apply defaults', () => {
    expect(parseDashboardOptions({})).toEqual({
      filter: { tenant: undefined, partition: undefined, purpose: undefined },
      theme: THEMES.default,
      initialTab: 'Clusters',
      refreshIntervalMs: 3000,
    });
  });

  it('should read filters, theme, tab and interval', () => {
    const settings = parseDashboardOptions({
      tenant: 't1',
      partition: '',
      purpose: 'production',
      colorTheme: 'dark',
      initialTab: 'VOLUMES',
      refreshInterval: '1m30s',
    });

    expect(settings.filter).toEqual({ tenant: 't1', partition: undefined, purpose: 'production' });
    expect(settings.theme.name).toBe('dark');
    expect(settings.initialTab).toBe('Volumes');
    expect(settings.refreshIntervalMs).toBe(90_000);
  });

  it('should reject an unknown theme', () => {
    expect(() => parseDashboardOptions({ colorTheme: 'solarized' })).toThrow('unknown theme: solarized');
  });

  it('should reject an unknown initial tab', () => {
    expect(() => parseDashboardOptions({ initialTab: 'nodes' })).toThrow(ConfigError);
    expect(() => parseDashboardOptions({ initialTab: 'nodes' })).toThrow('tab with name "nodes" not found');
  });

  it('should reject bad refresh intervals', () => {
    expect(() => parseDashboardOptions({ refreshInterval: 'soon' })).toThrow('invalid refresh interval: soon');
    expect(() => parseDashboardOptions({ refreshInterval: '0s' })).toThrow('invalid refresh interval: 0s');
  });

  it('should reject options of the wrong type', () => {
    expect(() => parseDashboardOptions({ tenant: 42 })).toThrow('invalid option tenant: Expected string, received number');
  });
});

describe('startDashboard', () => {
  it('should close the terminal when the loop ends', async () => {
    const terminal = new FakeTerminal();
    const controller = new AbortController();
    controller.abort();

    await startDashboard(parseDashboardOptions({ initialTab: 'volumes' }), {
      api: createFakeApi(),
      logger: createTestLogger(),
      openTerminal: () => terminal,
      signal: controller.signal,
    });

    expect(terminal.closed).toBe(true);
    expect(terminal.tabs().active).toBe(1);
  });

  it('should close the terminal when startup fails', async () => {
    const terminal = new FakeTerminal();
    const settings = { ...parseDashboardOptions({}), initialTab: 'nodes' };

    await expect(
      startDashboard(settings, {
        api: createFakeApi(),
        logger: createTestLogger(),
        openTerminal: () => terminal,
      }),
    ).rejects.toThrow('tab with name "nodes" not found');
    expect(terminal.closed).toBe(true);
  });

  it('should pass the theme to the terminal', async () => {
    const openTerminal = jest.fn(() => new FakeTerminal());
    const controller = new AbortController();
    controller.abort();

    await startDashboard(parseDashboardOptions({ colorTheme: 'dark' }), {
      api: createFakeApi(),
      logger: createTestLogger(),
      openTerminal,
      signal: controller.signal,
    });

    expect(openTerminal).toHaveBeenCalledWith(THEMES.dark);
  });
});
