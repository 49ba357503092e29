export { getLogger, resetLoggers, formatLabel, type Logger } from './pino-logger.js';
export { validateLoggerEnv, loggerEnvSchema, LOG_LEVELS, type LoggerEnvConfig } from './env.schema.js';
