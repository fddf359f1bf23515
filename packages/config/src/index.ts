// Shared configuration: environment-driven defaults and structured logging.

export {
  loadConfig,
  getConfig,
  resetConfig,
  EnvironmentError,
  LOG_LEVELS,
  type SlicewiseConfig,
  type LogThreshold,
} from './env.js'

export {
  createLogger,
  type Logger,
  type LoggerOptions,
  type LogLevel,
  type LogFields,
} from './logger.js'
