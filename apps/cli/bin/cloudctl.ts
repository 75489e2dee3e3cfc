#!/usr/bin/env tsx
/**
 * @cloudctl/cli - Entry Point
 */

import chalk from 'chalk';
import { CloudctlError, errorMessage } from '@cloudctl/shared';
import { createCLI } from '../src/index.js';

async function main(): Promise<void> {
  const program = createCLI();

  if (!process.argv.slice(2).length) {
    program.outputHelp();
    return;
  }

  await program.parseAsync(process.argv);
}

main().catch((err: unknown) => {
  const code = err instanceof CloudctlError ? ` [${err.code}]` : '';
  console.error(chalk.red(`Fatal${code}:`), errorMessage(err));
  process.exit(1);
});
