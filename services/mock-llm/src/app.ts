import express, { Express, Request, Response } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { sleep, type Clock, type RandomSource, type SleepFn } from '@inferlab/shared-utils';
import { createMetricsMiddleware } from '@inferlab/observability';
import type { HealthResponse } from '@inferlab/shared-types';
import { DEFAULT_CONFIG, type MockLlmConfig } from './config';
import { ChaosController } from './chaos/chaosController';
import { InferenceSimulator } from './simulator/inferenceSimulator';
import { SessionStore } from './sessions/sessionStore';
import { createGenerativeRouter } from './routes/generative';
import { createAgentRouter } from './routes/agent';
import { createAdminRouter } from './routes/admin';
import { createSessionsRouter } from './routes/sessions';
import { requireAdminToken } from './middleware/adminAuth';
import { errorHandler, notFoundHandler } from './middleware/errorHandler';

export const SERVICE_NAME = 'mock-llm-service';
export const SERVICE_VERSION = '1.0.0';

const VERTEX_PREFIX = '/v1beta1/projects/:project/locations/:location/publishers/google';

export interface CreateAppOptions {
  config?: Partial<MockLlmConfig>;
  random?: RandomSource;
  sleep?: SleepFn;
  now?: Clock;
}

export interface AppContext {
  app: Express;
  config: MockLlmConfig;
  chaos: ChaosController;
  simulator: InferenceSimulator;
  sessions: SessionStore;
}

export function createApp(options: CreateAppOptions = {}): AppContext {
  const config: MockLlmConfig = { ...DEFAULT_CONFIG, ...options.config };
  const random = options.random ?? Math.random;
  const sleepFn = options.sleep ?? sleep;
  const now = options.now ?? Date.now;

  const chaos = new ChaosController({
    latencyMinSeconds: config.latencyMinSeconds,
    latencyMaxSeconds: config.latencyMaxSeconds,
  });
  const simulator = new InferenceSimulator(
    {
      tokenDelaySeconds: config.tokenDelaySeconds,
      tokenCount: config.tokenCount,
      embeddingDimension: config.embeddingDimension,
    },
    { chaos, random, sleep: sleepFn, now }
  );
  const sessions = new SessionStore([{ id: config.agentId, name: 'Mock Agent' }], {
    chaos,
    random,
    sleep: sleepFn,
  });

  const app: Express = express();

  app.use(createMetricsMiddleware(SERVICE_NAME));
  app.use(helmet());
  app.use(cors({ origin: config.allowedOrigins, credentials: true }));

  // Generative routes read their own bodies; mounted ahead of the JSON parser.
  const generativeRouter = createGenerativeRouter(simulator);
  app.use(['/v1beta', '/v1'], generativeRouter);
  app.use(VERTEX_PREFIX, generativeRouter);

  app.use(express.json({ limit: '10mb' }));

  app.get('/health', (_req: Request, res: Response) => {
    const body: HealthResponse = {
      status: 'healthy',
      timestamp: Math.floor(now() / 1000),
      config: chaos.snapshot(),
    };
    res.json(body);
  });

  app.get('/', (_req: Request, res: Response) => {
    res.json({
      service: 'Mock LLM Server',
      version: SERVICE_VERSION,
      config: {
        min_latency: config.latencyMinSeconds,
        max_latency: config.latencyMaxSeconds,
        token_delay: config.tokenDelaySeconds,
        token_count: config.tokenCount,
        embedding_dimension: config.embeddingDimension,
      },
    });
  });

  app.use('/admin', requireAdminToken(config.adminToken), createAdminRouter(chaos));
  app.use('/api/v1/agent', createAgentRouter({ chaos, random, sleep: sleepFn, now }));
  app.use(createSessionsRouter(sessions));

  app.use(errorHandler);
  app.use(notFoundHandler);

  return { app, config, chaos, simulator, sessions };
}
