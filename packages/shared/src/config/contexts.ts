/**
 * @cloudctl/shared - API Contexts
 *
 * A contexts file names one or more API endpoints and marks one as current:
 *
 *   current: prod
 *   contexts:
 *     prod:
 *       url: https://api.example.test/cloud
 *       api_token: <token>
 *
 * Resolution order for every field: command-line flag, environment, file.
 */

import { existsSync, readFileSync } from 'node:fs';
import { homedir } from 'node:os';
import { join } from 'node:path';
import { parse } from 'yaml';
import { z } from 'zod';
import { ConfigError } from '../errors/index.js';

// ============================================================================
// Schemas
// ============================================================================

export const contextSchema = z.object({
  url: z.string().min(1),
  api_token: z.string().optional(),
});

export const contextsFileSchema = z.object({
  current: z.string().optional(),
  previous: z.string().optional(),
  contexts: z.record(z.string(), contextSchema).default({}),
});

export type ContextsFile = z.infer<typeof contextsFileSchema>;

// ============================================================================
// Types
// ============================================================================

export interface ApiContext {
  name: string;
  url: string;
  apiToken?: string;
}

export interface ContextOverrides {
  configPath?: string;
  context?: string;
  url?: string;
  apiToken?: string;
}

export const DEFAULT_CONTEXT: ApiContext = {
  name: 'default',
  url: 'http://localhost:8080/cloud',
};

// ============================================================================
// File Loading
// ============================================================================

export function configFileCandidates(home: string = homedir()): string[] {
  return [
    join(process.cwd(), 'config.yaml'),
    join(home, '.cloudctl', 'config.yaml'),
    '/etc/cloudctl/config.yaml',
  ];
}

export function loadContextsFile(path: string): ContextsFile {
  let raw: unknown;
  try {
    raw = parse(readFileSync(path, 'utf-8'));
  } catch (error) {
    throw new ConfigError(`unable to read config ${path}: ${error instanceof Error ? error.message : String(error)}`, {
      path,
    });
  }

  const result = contextsFileSchema.safeParse(raw ?? {});
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new ConfigError(`invalid config ${path}: ${issue.path.join('.') || '(root)'} ${issue.message}`, { path });
  }
  return result.data;
}

function findConfigFile(overrides: ContextOverrides, env: NodeJS.ProcessEnv): string | undefined {
  const explicit = overrides.configPath || env.CLOUDCTL_CONFIG;
  if (explicit) {
    if (!existsSync(explicit)) {
      throw new ConfigError(`config file ${explicit} does not exist`, { path: explicit });
    }
    return explicit;
  }
  return configFileCandidates().find((p) => existsSync(p));
}

// ============================================================================
// Resolution
// ============================================================================

/**
 * Validates an API base URL. The path part is kept, it is the API base path.
 */
export function validateApiUrl(url: string): string {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    throw new ConfigError(`invalid url: ${url}, must be in the form scheme://host[:port]/basepath`, { url });
  }
  if (!parsed.host || !['http:', 'https:'].includes(parsed.protocol)) {
    throw new ConfigError(`invalid url: ${url}, must be in the form scheme://host[:port]/basepath`, { url });
  }
  return url.replace(/\/+$/, '');
}

export function resolveContext(
  overrides: ContextOverrides = {},
  env: NodeJS.ProcessEnv = process.env,
): ApiContext {
  let context: ApiContext = { ...DEFAULT_CONTEXT };

  const path = findConfigFile(overrides, env);
  if (path) {
    const file = loadContextsFile(path);
    const name = overrides.context || file.current;
    const entry = name ? file.contexts[name] : undefined;

    if (overrides.context && !entry) {
      throw new ConfigError(`context "${overrides.context}" not found in ${path}`, {
        path,
        available: Object.keys(file.contexts),
      });
    }
    if (name && entry) {
      context = { name, url: entry.url, apiToken: entry.api_token };
    }
  } else if (overrides.context) {
    throw new ConfigError(`context "${overrides.context}" requested but no config file found`);
  }

  const url = overrides.url || env.CLOUDCTL_URL || context.url;
  const apiToken = overrides.apiToken || env.CLOUDCTL_APITOKEN || context.apiToken;

  return {
    name: context.name,
    url: validateApiUrl(url),
    apiToken: apiToken || undefined,
  };
}
