import { z } from 'zod';
import {
  parseConfig,
  secondsSchema,
  positiveIntSchema,
  portSchema,
  csvListSchema,
} from '@inferlab/shared-utils';

const envSchema = z
  .object({
    PORT: portSchema.default(8000),
    MOCK_MIN_LATENCY: secondsSchema.default(0.5),
    MOCK_MAX_LATENCY: secondsSchema.default(2.0),
    MOCK_TOKEN_DELAY: secondsSchema.default(0.05),
    MOCK_TOKEN_COUNT: positiveIntSchema.default(20),
    MOCK_EMBEDDING_DIMENSION: z.coerce.number().int().min(2).default(768),
    MOCK_AGENT_ID: z.string().min(1).default('mock-agent'),
    ADMIN_TOKEN: z.string().min(1).optional(),
    ALLOWED_ORIGINS: csvListSchema.default('http://localhost:3000'),
    METRICS_PORT: portSchema.optional(),
  })
  .refine(env => env.MOCK_MIN_LATENCY <= env.MOCK_MAX_LATENCY, {
    message: 'MOCK_MIN_LATENCY must not exceed MOCK_MAX_LATENCY',
    path: ['MOCK_MIN_LATENCY'],
  });

export interface MockLlmConfig {
  port: number;
  latencyMinSeconds: number;
  latencyMaxSeconds: number;
  tokenDelaySeconds: number;
  tokenCount: number;
  embeddingDimension: number;
  agentId: string;
  adminToken?: string;
  allowedOrigins: string[];
  metricsPort?: number;
}

export const DEFAULT_CONFIG: MockLlmConfig = {
  port: 8000,
  latencyMinSeconds: 0.5,
  latencyMaxSeconds: 2.0,
  tokenDelaySeconds: 0.05,
  tokenCount: 20,
  embeddingDimension: 768,
  agentId: 'mock-agent',
  allowedOrigins: ['http://localhost:3000'],
};

export function loadConfig(env: Record<string, string | undefined> = process.env): MockLlmConfig {
  const parsed = parseConfig(envSchema, env);
  return {
    port: parsed.PORT,
    latencyMinSeconds: parsed.MOCK_MIN_LATENCY,
    latencyMaxSeconds: parsed.MOCK_MAX_LATENCY,
    tokenDelaySeconds: parsed.MOCK_TOKEN_DELAY,
    tokenCount: parsed.MOCK_TOKEN_COUNT,
    embeddingDimension: parsed.MOCK_EMBEDDING_DIMENSION,
    agentId: parsed.MOCK_AGENT_ID,
    adminToken: parsed.ADMIN_TOKEN,
    allowedOrigins: parsed.ALLOWED_ORIGINS,
    metricsPort: parsed.METRICS_PORT,
  };
}
