export { loadConfig, parseConfig, parseSimpleYaml, ConfigError } from './config.js';
export type { CollectorConfig, SinkConfig } from './config.js';
