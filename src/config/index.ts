/**
 * Configuration module: schema, defaults and file reader.
 *
 * @module config
 */

export { EngineConfigSchema, DEFAULT_ENGINE_CONFIG } from './schema.js';
export type { EngineConfig } from './schema.js';
export {
  ConfigError,
  DEFAULT_CONFIG_PATH,
  readEngineConfig,
  validateEngineConfig,
  toEngineOptions,
} from './reader.js';
