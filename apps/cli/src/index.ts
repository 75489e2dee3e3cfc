/**
 * @cloudctl/cli - Commander Program Definition
 *
 * Commands:
 * 1. dashboard - live terminal dashboard (clusters, volumes)
 * 2. health    - API version and health
 * 3. volume    - storage cluster info
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { getVersion } from '@cloudctl/shared';
import { createDashboardCommand } from './commands/dashboard.cmd.js';
import { createHealthCommand } from './commands/health.cmd.js';
import { createVolumeCommand } from './commands/volume.cmd.js';

const VERSION = getVersion();

export function createCLI(): Command {
  const program = new Command();

  program
    .name('cloudctl')
    .description('Command-line client for the cloud-management API')
    .version(VERSION)
    .option('--config <path>', 'contexts file (default: ./config.yaml, ~/.cloudctl/config.yaml)')
    .option('--context <name>', 'context from the contexts file to use')
    .option('--url <url>', 'API base url, overrides the context')
    .option('--api-token <token>', 'API token, overrides the context');

  program.addCommand(createDashboardCommand());
  program.addCommand(createHealthCommand());
  program.addCommand(createVolumeCommand());

  program.on('--help', () => {
    console.log('');
    console.log(chalk.yellow('Examples:'));
    console.log(chalk.gray('  cloudctl dashboard --tenant t1 --initial-tab volumes'));
    console.log(chalk.gray('  cloudctl health --json'));
    console.log(chalk.gray('  cloudctl volume clusterinfo --partition p1'));
    console.log('');
    console.log(chalk.yellow('Environment:'));
    console.log(chalk.gray('  CLOUDCTL_URL, CLOUDCTL_APITOKEN, CLOUDCTL_CONFIG, CLOUDCTL_LOG_FILE, LOG_LEVEL'));
    console.log('');
  });

  program.configureOutput({
    outputError: (str, write) => {
      write(chalk.red(`\nError: ${str}`));
    },
  });

  return program;
}
