/**
 * Configuration loading utilities
 */
export {
  loadConfig,
  DEFAULT_CONFIG,
  validateVersion,
  validateNaming,
  validateSchemaPaths,
} from './ConfigLoader.js';
export type { HandlerKitConfig } from './ConfigLoader.js';
