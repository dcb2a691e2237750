import { config as loadDotenv } from 'dotenv';
import { createServiceLogger, initializeMetrics, shutdownMetrics } from '@inferlab/observability';
import { loadConfig } from './config';
import { createApp, SERVICE_NAME, SERVICE_VERSION } from './app';

loadDotenv();

const logger = createServiceLogger(SERVICE_NAME);

async function bootstrap(): Promise<void> {
  const config = loadConfig();

  if (config.metricsPort !== undefined) {
    initializeMetrics({ serviceName: SERVICE_NAME, serviceVersion: SERVICE_VERSION, port: config.metricsPort });
    logger.info('Prometheus exporter started', { port: config.metricsPort });
  }

  const { app, chaos } = createApp({ config });

  const server = app.listen(config.port, () => {
    logger.info(`Mock LLM service listening on port ${config.port}`, {
      chaos: chaos.snapshot(),
      tokenCount: config.tokenCount,
      tokenDelaySeconds: config.tokenDelaySeconds,
    });
  });

  const shutdown = (signal: string) => {
    logger.info('Shutting down', { signal });
    server.close(error => {
      if (error) {
        logger.error('Server close failed', error);
        process.exit(1);
      }
      shutdownMetrics()
        .catch(metricsError => logger.error('Metrics shutdown failed', metricsError))
        .finally(() => process.exit(0));
    });
  };
  process.once('SIGTERM', () => shutdown('SIGTERM'));
  process.once('SIGINT', () => shutdown('SIGINT'));
}

if (process.env.NODE_ENV !== 'test') {
  bootstrap().catch(error => {
    logger.error('Mock LLM service failed to start', error);
    process.exit(1);
  });
}

export { bootstrap };
