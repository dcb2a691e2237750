export { createLogger, parseLogLevel, toError, Logger, LogLevel, type LogEntry } from './logger';
export {
  AppError,
  ValidationError,
  AuthenticationError,
  NotFoundError,
  ServiceUnavailableError,
  TransportError,
} from './errors';
export {
  secondsSchema,
  probabilitySchema,
  positiveIntSchema,
  portSchema,
  booleanFlagSchema,
  csvListSchema,
  formatIssues,
  parseConfig,
  parseBody,
} from './validation';
export {
  sleep,
  randomUniform,
  randomInt,
  secondsToMs,
  percentile,
  type RandomSource,
  type SleepFn,
  type Clock,
} from './timing';
