import { Router, Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import {
  ServiceUnavailableError,
  parseBody,
  randomUniform,
  secondsToMs,
  type RandomSource,
  type SleepFn,
  type Clock,
} from '@inferlab/shared-utils';
import {
  AnalysisMode,
  type AnalyzeResponse,
  type ChatResponse,
} from '@inferlab/shared-types';
import type { ChaosController } from '../chaos/chaosController';

const agentRequestSchema = z.object({
  query: z.string(),
  user_id: z.string(),
  mock_mode: z.boolean().default(false),
});

export interface AgentRouterDependencies {
  chaos: ChaosController;
  random: RandomSource;
  sleep: SleepFn;
  now: Clock;
  memoryUsageMb?: () => number;
}

function residentMemoryMb(): number {
  return process.memoryUsage().rss / 1024 / 1024;
}

/**
 * Burns CPU until `durationMs` has passed on `now`. Never yields, so every
 * other request on this process waits behind it.
 */
export function busyLoop(durationMs: number, now: Clock, random: RandomSource = Math.random): number {
  const endTime = now() + durationMs;
  let accumulator = 0;
  while (now() < endTime) {
    accumulator += Math.sqrt(Math.floor(random() * 10000) + 1) * random();
  }
  return accumulator;
}

export function createAgentRouter(deps: AgentRouterDependencies): Router {
  const router = Router();
  const memoryUsageMb = deps.memoryUsageMb ?? residentMemoryMb;

  router.post('/chat', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const request = parseBody(agentRequestSchema, req.body);

      const { latency_min, latency_max } = deps.chaos.snapshot();
      const delaySeconds = randomUniform(latency_min, latency_max, deps.random);
      await deps.sleep(secondsToMs(delaySeconds));

      if (deps.random() < deps.chaos.snapshot().error_rate) {
        throw new ServiceUnavailableError('Service Unavailable - Overwhelmed');
      }

      deps.chaos.leakIfActive();

      const response: ChatResponse = {
        response_text: `Simulated AI response to: ${request.query}`,
        processing_time: `${delaySeconds.toFixed(2)}s`,
        server_memory_usage_mb: memoryUsageMb(),
      };
      res.json(response);
    } catch (error) {
      next(error);
    }
  });

  router.post('/analyze', async (req: Request, res: Response, next: NextFunction) => {
    try {
      parseBody(agentRequestSchema, req.body);

      const snapshot = deps.chaos.snapshot();
      const targetMs = secondsToMs(snapshot.latency_min * 2);

      let response: AnalyzeResponse;
      if (snapshot.cpu_stress_active) {
        busyLoop(targetMs, deps.now, deps.random);
        response = { status: 'Heavy Analysis Complete', mode: AnalysisMode.CPU_BOUND };
      } else {
        await deps.sleep(targetMs);
        response = { status: 'Analysis Complete', mode: AnalysisMode.IO_BOUND };
      }
      res.json(response);
    } catch (error) {
      next(error);
    }
  });

  return router;
}
