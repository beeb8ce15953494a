// @parley/server barrel export
export { VERSION } from '@parley/core';

export { createServer } from './main.ts';
export type { ParleyServer } from './main.ts';
export type { ServerConfig, ChannelsConfig, CompletionSettings } from './types.ts';
export {
  loadConfig,
  parseConfig,
  configPath,
  interpolateEnv,
  configuredProviders,
  resolveModel,
  toServerConfig,
  configSchema,
  CONFIG_DIR,
  DEFAULT_CONFIG_PATH,
  DEFAULT_MODEL,
  SUPPORTED_PROVIDERS,
} from './config.ts';
export type { ParleyConfig, ParleyConfigInput } from './config.ts';
