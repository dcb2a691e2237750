import { config as loadDotenv } from 'dotenv';
import { secondsToMs, sleep } from '@inferlab/shared-utils';
import { createServiceLogger, initializeMetrics, shutdownMetrics } from '@inferlab/observability';
import { loadConfig, type LoadGeneratorConfig, type UserProfile } from './config';
import { AxiosTransport } from './http/transport';
import { InstrumentedClient } from './http/instrumentedClient';
import { LoadShapeScheduler, STAGED_RAMP_UP, constantShape } from './shape/loadShape';
import { RequestStats, formatSummary } from './stats/requestStats';
import { LoadRunner } from './runner/loadRunner';
import { waitForTarget } from './runner/targetProbe';
import { AI_USER_CLASS } from './users/aiUser';
import { CONVERSATION_USER_CLASS, IDLER_USER_CLASS } from './users/sessionUsers';
import type { UserClass } from './users/virtualUser';

loadDotenv();

const SERVICE_NAME = 'load-generator';

const logger = createServiceLogger(SERVICE_NAME);

export function buildUserClasses(profile: UserProfile): UserClass[] {
  return profile === 'session' ? [CONVERSATION_USER_CLASS, IDLER_USER_CLASS] : [AI_USER_CLASS];
}

export function buildScheduler(config: LoadGeneratorConfig): LoadShapeScheduler {
  return config.loadShape === 'constant'
    ? new LoadShapeScheduler(constantShape(config.users, config.spawnRate, config.runTimeSeconds))
    : new LoadShapeScheduler(STAGED_RAMP_UP);
}

/** Runs one load test; resolves with the process exit code. */
async function main(): Promise<number> {
  const config = loadConfig();

  if (config.metricsPort !== undefined) {
    initializeMetrics({ serviceName: SERVICE_NAME, port: config.metricsPort });
    logger.info('Prometheus exporter started', { port: config.metricsPort });
  }

  const transport = new AxiosTransport({
    baseURL: config.targetHost,
    timeoutMs: secondsToMs(config.requestTimeoutSeconds),
  });
  const stats = new RequestStats({ slowRequestThresholdMs: config.slowRequestThresholdMs });

  await waitForTarget(transport, { attempts: config.startupProbeAttempts });

  const scheduler = buildScheduler(config);
  const runner = new LoadRunner({
    scheduler,
    userClasses: buildUserClasses(config.userProfile),
    context: {
      client: new InstrumentedClient(transport, stats),
      stats,
      config,
      random: Math.random,
      sleep,
      now: Date.now,
    },
  });

  const stop = (signal: string) => {
    logger.info('Stopping load test', { signal });
    runner.requestStop();
  };
  process.once('SIGTERM', () => stop('SIGTERM'));
  process.once('SIGINT', () => stop('SIGINT'));

  logger.info('Load generator starting', {
    target: config.targetHost,
    profile: config.userProfile,
    shape: config.loadShape,
    durationSeconds: scheduler.totalDurationSeconds,
  });

  const summary = await runner.run();
  logger.info(`Load test summary\n${formatSummary(summary)}`, {
    totalRequests: summary.totalRequests,
    totalFailures: summary.totalFailures,
  });

  await shutdownMetrics();
  return summary.totalFailures > 0 ? 1 : 0;
}

if (process.env.NODE_ENV !== 'test') {
  main()
    .then(exitCode => {
      process.exitCode = exitCode;
    })
    .catch(error => {
      logger.error('Load generator failed', error);
      process.exit(1);
    });
}

export { main };
