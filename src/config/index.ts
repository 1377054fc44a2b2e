/**
 * Config module exports
 */

export {
  configSchema,
  parserConfigSchema,
  languagesConfigSchema,
  outputConfigSchema,
  cacheConfigSchema,
  summariesConfigSchema,
  DEFAULT_EXCLUDE,
  type Config,
  type ParserConfig,
  type LanguagesConfig,
  type OutputConfig,
  type CacheConfig,
  type SummariesConfig,
} from './schema.js';

export {
  loadConfig,
  getDefaultConfig,
  findConfig,
  loadConfigOrDefault,
  CONFIG_FILE_NAMES,
} from './loader.js';
