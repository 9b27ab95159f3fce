export { DEFAULT_LOGGER_CONFIG, getLoggerConfigFromEnv, validateLoggerConfig } from './config.js';
export { createLogger, getComponentLogger, logger } from './logger.js';
export { LOG_LEVELS, type LoggerConfig, type LogLevel, type SpawnerLogger } from './types.js';
