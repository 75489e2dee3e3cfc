/**
 * Builds the API client from the program-wide options (--config, --context,
 * --url, --api-token) and the environment.
 */

import type { Command } from 'commander';
import { z } from 'zod';
import { CloudApiClient } from '@cloudctl/cloud-api';
import { ConfigError, getVersion, resolveContext, type ApiContext } from '@cloudctl/shared';

export const globalOptionsSchema = z.object({
  config: z.string().optional(),
  context: z.string().optional(),
  url: z.string().optional(),
  apiToken: z.string().optional(),
});

export type GlobalOptions = z.infer<typeof globalOptionsSchema>;

export function globalOptions(command: Command): GlobalOptions {
  const result = globalOptionsSchema.safeParse(command.optsWithGlobals());
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new ConfigError(`invalid option ${issue.path.join('.')}: ${issue.message}`);
  }
  return result.data;
}

export function apiContext(options: GlobalOptions, env: NodeJS.ProcessEnv = process.env): ApiContext {
  return resolveContext(
    {
      configPath: options.config,
      context: options.context,
      url: options.url,
      apiToken: options.apiToken,
    },
    env,
  );
}

export function createApiClient(context: ApiContext): CloudApiClient {
  return new CloudApiClient({
    baseUrl: context.url,
    apiToken: context.apiToken,
    userAgent: `cloudctl/${getVersion()}`,
  });
}
