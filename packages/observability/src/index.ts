export { createServiceLogger, type ServiceLogger } from './logger';
export { createMetricsMiddleware } from './middleware/metricsMiddleware';
export {
  initializeMetrics,
  shutdownMetrics,
  recordRequestMetrics,
  recordLLMRequest,
  recordChaosActivation,
  recordLoadTaskOutcome,
  recordTurnLatency,
  type MetricsOptions,
} from './metrics';
export { withExponentialBackoff, type RetryOptions } from './retry';
