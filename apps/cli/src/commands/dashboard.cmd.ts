/**
 * cloudctl dashboard - live terminal dashboard
 */

import { Command } from 'commander';
import { z } from 'zod';
import { DEFAULT_REQUEST_TIMEOUT_MS, type CloudApi } from '@cloudctl/cloud-api';
import { createLogger, defaultLogFile, type LoggerLike } from '@cloudctl/logger';
import { ConfigError, getGitSha, getVersion, parseDuration } from '@cloudctl/shared';
import { DASHBOARD_TABS, Dashboard } from '../tui/dashboard.js';
import type { FilterContext } from '../tui/pane.js';
import { runDashboard } from '../tui/run.js';
import { openTerminal } from '../tui/terminal.js';
import { THEMES, THEME_NAMES, resolveTheme, type DashboardTheme } from '../tui/theme.js';
import type { Terminal } from '../tui/widgets.js';
import { apiContext, createApiClient, globalOptions } from '../lib/context.js';

// ============================================================================
// Options
// ============================================================================

export const dashboardOptionsSchema = z.object({
  partition: z.string().optional(),
  tenant: z.string().optional(),
  purpose: z.string().optional(),
  colorTheme: z.string().default('default'),
  initialTab: z.string().default('clusters'),
  refreshInterval: z.string().default('3s'),
});

export interface DashboardSettings {
  filter: FilterContext;
  theme: DashboardTheme;
  initialTab: string;
  refreshIntervalMs: number;
}

export function parseDashboardOptions(raw: unknown): DashboardSettings {
  const result = dashboardOptionsSchema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new ConfigError(`invalid option ${issue.path.join('.')}: ${issue.message}`);
  }
  const options = result.data;

  const refreshIntervalMs = parseDuration(options.refreshInterval);
  if (refreshIntervalMs === undefined || refreshIntervalMs <= 0) {
    throw new ConfigError(`invalid refresh interval: ${options.refreshInterval}`);
  }

  const initialTab = DASHBOARD_TABS.find((tab) => tab.name.toLowerCase() === options.initialTab.toLowerCase());
  if (!initialTab) {
    throw new ConfigError(`tab with name "${options.initialTab}" not found`, {
      available: DASHBOARD_TABS.map((tab) => tab.name.toLowerCase()),
    });
  }

  return {
    filter: {
      tenant: options.tenant || undefined,
      partition: options.partition || undefined,
      purpose: options.purpose || undefined,
    },
    theme: resolveTheme(options.colorTheme),
    initialTab: initialTab.name,
    refreshIntervalMs,
  };
}

// ============================================================================
// Run
// ============================================================================

export interface DashboardDeps {
  api: CloudApi;
  logger: LoggerLike;
  openTerminal: (theme: DashboardTheme) => Terminal;
  signal?: AbortSignal;
}

/** Owns the terminal for the lifetime of the dashboard and always restores it. */
export async function startDashboard(settings: DashboardSettings, deps: DashboardDeps): Promise<void> {
  const terminal = deps.openTerminal(settings.theme);
  try {
    const dashboard = new Dashboard({
      api: deps.api,
      canvas: terminal,
      filter: settings.filter,
      client: { version: getVersion(), gitSha: getGitSha() },
      logger: deps.logger,
      initialTab: settings.initialTab,
      requestTimeoutMs: DEFAULT_REQUEST_TIMEOUT_MS,
    });

    deps.logger.info('dashboard started', {
      tab: dashboard.activeTab.name,
      refreshIntervalMs: settings.refreshIntervalMs,
      ...settings.filter,
    });

    await runDashboard(terminal, dashboard, {
      refreshIntervalMs: settings.refreshIntervalMs,
      logger: deps.logger,
      signal: deps.signal,
    });
  } finally {
    terminal.close();
  }
}

// ============================================================================
// Command Factory
// ============================================================================

function helpText(): string {
  const tabs = DASHBOARD_TABS.map((tab) => `  ${tab.name.toLowerCase().padEnd(10)} ${tab.description}`);
  const themes = THEME_NAMES.map((name) => `  ${name.padEnd(10)} ${THEMES[name].description}`);
  return ['', 'Tabs:', ...tabs, '', 'Color themes:', ...themes, ''].join('\n');
}

export function createDashboardCommand(): Command {
  return new Command('dashboard')
    .description('Live terminal dashboard for cluster and volume health')
    .option('--partition <id>', 'show resources in this partition')
    .option('--tenant <id>', 'show resources of this tenant')
    .option('--purpose <purpose>', 'show clusters with this purpose')
    .option('--color-theme <name>', `color theme (${THEME_NAMES.join('|')})`, 'default')
    .option('--initial-tab <name>', 'tab to show on start', 'clusters')
    .option('--refresh-interval <duration>', 'refresh interval, e.g. 3s or 1m', '3s')
    .addHelpText('after', helpText())
    .action(async (options: unknown, command: Command) => {
      const settings = parseDashboardOptions(options);
      const api = createApiClient(apiContext(globalOptions(command)));
      const logger = createLogger({ file: defaultLogFile(), service: 'cloudctl-dashboard' });

      const controller = new AbortController();
      const stop = (): void => controller.abort();
      process.once('SIGTERM', stop);
      process.once('SIGHUP', stop);

      try {
        await startDashboard(settings, { api, logger, openTerminal, signal: controller.signal });
      } finally {
        process.removeListener('SIGTERM', stop);
        process.removeListener('SIGHUP', stop);
      }
    });
}
