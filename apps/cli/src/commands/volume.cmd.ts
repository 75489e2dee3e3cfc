/**
 * cloudctl volume - storage queries
 */

import { Command } from 'commander';
import chalk from 'chalk';
import type { CloudApi, StorageClusterInfo } from '@cloudctl/cloud-api';
import { humanizeSize } from '@cloudctl/shared';
import { percentOf, summarizeStorageClusters } from '../tui/classify.js';
import { apiContext, createApiClient, globalOptions } from '../lib/context.js';

export function formatClusterInfo(clusters: readonly StorageClusterInfo[]): string {
  if (clusters.length === 0) {
    return 'no storage clusters found';
  }

  const lines: string[] = [];
  for (const cluster of clusters) {
    const stats = cluster.statistics;
    const servers = (cluster.servers ?? []).map((s) => `${s.name ?? '?'}=${s.state ?? 'unknown'}`);

    lines.push(chalk.cyan(`${cluster.partition ?? '-'} ${cluster.uuid ?? ''}`.trim()));
    lines.push(`  health       ${cluster.health?.state ?? 'unknown'}`);
    lines.push(`  servers      ${servers.length > 0 ? servers.join(', ') : '-'}`);
    if (typeof stats?.freePhysicalStorage === 'number' && typeof stats.physicalUsedStorage === 'number') {
      lines.push(`  free         ${humanizeSize(stats.freePhysicalStorage)}`);
      lines.push(`  used         ${humanizeSize(stats.physicalUsedStorage)}`);
    }
    if (typeof stats?.compressionRatio === 'number') {
      lines.push(`  compression  ${stats.compressionRatio.toFixed(2)}`);
    }
  }

  const summary = summarizeStorageClusters(clusters);
  const free = percentOf(summary.physicalFree, summary.physicalFree + summary.physicalUsed);
  if (clusters.length > 1 && free !== undefined) {
    lines.push('', `total free physical space ${free}%`);
  }

  return lines.join('\n');
}

export async function showClusterInfo(api: CloudApi, partition: string | undefined, json: boolean): Promise<string> {
  const clusters = await api.storageClusterInfo(partition);
  return json ? JSON.stringify(clusters, null, 2) : formatClusterInfo(clusters);
}

export function createVolumeCommand(): Command {
  const volumeCmd = new Command('volume').description('Volume and storage cluster queries');

  volumeCmd
    .command('clusterinfo')
    .description('Show storage cluster infos')
    .option('--partition <id>', 'partition to filter')
    .option('-j, --json', 'Output in JSON format')
    .action(async (options: { partition?: string; json?: boolean }, command: Command) => {
      const api = createApiClient(apiContext(globalOptions(command)));
      console.log(await showClusterInfo(api, options.partition, Boolean(options.json)));
    });

  return volumeCmd;
}
