export { loadServerConfig, ConfigError, DEFAULT_CONFIG, LOG_LEVELS } from './config';
export type { ServerConfig, LogLevel } from './config';
