/**
 * Config module exports.
 */

export type { ConfigFile, MergedConfig } from './config-schema.js';
export {
  DEFAULT_CONFIG,
  CONFIG_FILE_VERSION,
  CONFIG_FILE_NAME,
  configFileSchema,
} from './config-schema.js';
export { ConfigLoader, createConfigLoader, loadConfig } from './config-loader.js';
