export { formatLabel, getLogger, resetLogger, setLoggerTransports, type Logger } from './pino-logger.js';
export {
  loggerEnvSchema,
  logLevels,
  resolveLoggerEnv,
  validateLoggerEnv,
  type LogLevel,
  type LoggerEnvResolution,
  type LoggerEnvConfig,
} from './env.schema.js';
