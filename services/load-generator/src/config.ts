import { z } from 'zod';
import {
  parseConfig,
  booleanFlagSchema,
  positiveIntSchema,
  portSchema,
  secondsSchema,
} from '@inferlab/shared-utils';

export type UserProfile = 'ai' | 'session';
export type LoadShapeKind = 'staged' | 'constant';

const envSchema = z.object({
  TARGET_HOST: z.string().url().default('http://localhost:8000'),
  USER_PROFILE: z.enum(['ai', 'session']).default('ai'),
  AUTH_TOKEN: z.string().min(1).default('production-sim-token'),
  MOCK_LLM_RESPONSE: booleanFlagSchema.default(true),
  TARGET_AGENT_ID: z.string().min(1).optional(),
  POLL_TIMEOUT: secondsSchema.default(60),
  POLL_WAIT_FOR_DATA: secondsSchema.max(60).default(10),
  REQUEST_TIMEOUT: secondsSchema.default(30),
  SLOW_REQUEST_THRESHOLD_MS: z.coerce.number().nonnegative().default(4000),
  LOAD_SHAPE: z.enum(['staged', 'constant']).default('staged'),
  USERS: positiveIntSchema.default(10),
  SPAWN_RATE: z.coerce.number().positive().default(1),
  RUN_TIME: secondsSchema.default(60),
  STARTUP_PROBE_ATTEMPTS: z.coerce.number().int().nonnegative().default(5),
  METRICS_PORT: portSchema.optional(),
});

export interface LoadGeneratorConfig {
  targetHost: string;
  userProfile: UserProfile;
  authToken: string;
  mockLlmResponse: boolean;
  targetAgentId?: string;
  pollTimeoutSeconds: number;
  pollWaitForDataSeconds: number;
  requestTimeoutSeconds: number;
  slowRequestThresholdMs: number;
  loadShape: LoadShapeKind;
  users: number;
  spawnRate: number;
  runTimeSeconds: number;
  startupProbeAttempts: number;
  metricsPort?: number;
}

export const DEFAULT_CONFIG: LoadGeneratorConfig = {
  targetHost: 'http://localhost:8000',
  userProfile: 'ai',
  authToken: 'production-sim-token',
  mockLlmResponse: true,
  pollTimeoutSeconds: 60,
  pollWaitForDataSeconds: 10,
  requestTimeoutSeconds: 30,
  slowRequestThresholdMs: 4000,
  loadShape: 'staged',
  users: 10,
  spawnRate: 1,
  runTimeSeconds: 60,
  startupProbeAttempts: 5,
};

export function loadConfig(env: Record<string, string | undefined> = process.env): LoadGeneratorConfig {
  const parsed = parseConfig(envSchema, env);
  return {
    targetHost: parsed.TARGET_HOST,
    userProfile: parsed.USER_PROFILE,
    authToken: parsed.AUTH_TOKEN,
    mockLlmResponse: parsed.MOCK_LLM_RESPONSE,
    targetAgentId: parsed.TARGET_AGENT_ID,
    pollTimeoutSeconds: parsed.POLL_TIMEOUT,
    pollWaitForDataSeconds: parsed.POLL_WAIT_FOR_DATA,
    requestTimeoutSeconds: parsed.REQUEST_TIMEOUT,
    slowRequestThresholdMs: parsed.SLOW_REQUEST_THRESHOLD_MS,
    loadShape: parsed.LOAD_SHAPE,
    users: parsed.USERS,
    spawnRate: parsed.SPAWN_RATE,
    runTimeSeconds: parsed.RUN_TIME,
    startupProbeAttempts: parsed.STARTUP_PROBE_ATTEMPTS,
    metricsPort: parsed.METRICS_PORT,
  };
}
