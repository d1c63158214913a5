export {
  createLogger,
  withCorrelationId,
  generateCorrelationId,
  type Logger,
  type CreateLoggerOptions,
} from './logger.js';

export {
  AppError,
  ValidationError,
  ConfigurationError,
  ModelUnavailableError,
  PerItemError,
} from './errors.js';

export { EnvSchema, validateEnv, type Env } from './env.js';
