/**
 * @cloudctl/shared
 *
 * Errors, configuration contexts, version info and formatting helpers
 * used by every cloudctl package.
 */

export {
  CloudctlError,
  ConfigError,
  TerminalInitError,
  ApiError,
  FetchTimeoutError,
  isForbidden,
  errorMessage,
} from './errors/index.js';

export {
  resolveContext,
  loadContextsFile,
  validateApiUrl,
  configFileCandidates,
  contextSchema,
  contextsFileSchema,
  DEFAULT_CONTEXT,
  type ApiContext,
  type ContextOverrides,
  type ContextsFile,
} from './config/contexts.js';

export { getVersion, getGitSha } from './constants/version.js';

export { humanizeSize } from './format/humanize.js';
export { parseRfc3339, formatClock, parseDuration } from './format/time.js';
