export {
  resolveClientConfig,
  loadClientConfig,
  readEnvFiles,
  defaultConfigPaths,
  ENV_KEYS,
} from './env-config.js';
export type { ConfigResolution, ResolveConfigOptions } from './env-config.js';
