/**
 * cloudctl health - one-shot API version and health check
 */

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { healthFromError, type CloudApi, type HealthResponse } from '@cloudctl/cloud-api';
import { errorMessage } from '@cloudctl/shared';
import { apiContext, createApiClient, globalOptions } from '../lib/context.js';

export interface HealthReport {
  version: string;
  health: HealthResponse;
}

/** Fetches version and health; an unhealthy API still yields a report. */
export async function fetchHealthReport(api: CloudApi): Promise<HealthReport> {
  const { version } = await api.versionInfo();

  let health: HealthResponse;
  try {
    health = await api.health();
  } catch (error) {
    const payload = healthFromError(error);
    if (!payload) {
      throw error;
    }
    health = payload;
  }

  return { version, health };
}

function colorStatus(status: string): string {
  switch (status) {
    case 'healthy':
      return chalk.green(status);
    case 'degraded':
    case 'partial-unhealthy':
      return chalk.yellow(status);
    case 'unhealthy':
      return chalk.red(status);
    default:
      return status;
  }
}

export function formatHealthReport(report: HealthReport): string {
  const lines = [`${chalk.cyan('cloud-api')} ${report.version}`, `${chalk.cyan('health')}    ${colorStatus(report.health.status)}`];
  if (report.health.message) {
    lines.push(`${chalk.cyan('message')}   ${report.health.message}`);
  }

  const services = Object.entries(report.health.services ?? {});
  if (services.length > 0) {
    lines.push('', chalk.cyan('services'));
    for (const [name, value] of services) {
      const status = value && typeof value === 'object' && 'status' in value ? String(value.status) : 'unknown';
      lines.push(`  ${name.padEnd(16)} ${colorStatus(status)}`);
    }
  }

  return lines.join('\n');
}

export function createHealthCommand(): Command {
  return new Command('health')
    .description('Check the cloud API version and health')
    .option('-j, --json', 'Output in JSON format')
    .action(async (options: { json?: boolean }, command: Command) => {
      const api = createApiClient(apiContext(globalOptions(command)));
      const spinner = ora('Checking API health...').start();

      let report: HealthReport;
      try {
        report = await fetchHealthReport(api);
      } catch (error) {
        spinner.fail(`Health check failed: ${errorMessage(error)}`);
        throw error;
      }
      spinner.succeed('Health check completed');

      console.log(options.json ? JSON.stringify(report, null, 2) : formatHealthReport(report));

      if (report.health.status === 'unhealthy') {
        process.exitCode = 1;
      }
    });
}
