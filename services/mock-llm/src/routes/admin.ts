import { Router, Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { parseBody, probabilitySchema } from '@inferlab/shared-utils';
import { createServiceLogger, recordChaosActivation } from '@inferlab/observability';
import { ChaosStatus, type ChaosStatusResponse } from '@inferlab/shared-types';
import type { ChaosController } from '../chaos/chaosController';

const logger = createServiceLogger('mock-llm-service', { component: 'chaos-admin' });

const errorRateSchema = z.object({ rate: probabilitySchema });

export function createAdminRouter(chaos: ChaosController): Router {
  const router = Router();

  const respond = (res: Response, scenario: string, status: ChaosStatus) => {
    recordChaosActivation(scenario, 'mock-llm-service');
    logger.warn('Chaos state changed', { scenario, state: chaos.snapshot() });
    const body: ChaosStatusResponse = { status };
    res.json(body);
  };

  router.post('/chaos/latency_spike', (_req: Request, res: Response) => {
    chaos.activateLatencySpike();
    respond(res, 'latency_spike', ChaosStatus.LATENCY_SPIKE);
  });

  router.post('/chaos/memory_leak', (_req: Request, res: Response) => {
    chaos.activateMemoryLeak();
    respond(res, 'memory_leak', ChaosStatus.MEMORY_LEAK);
  });

  router.post('/chaos/cpu_spike', (_req: Request, res: Response) => {
    chaos.activateCpuStress();
    respond(res, 'cpu_spike', ChaosStatus.CPU_STRESS);
  });

  router.post('/chaos/error_rate', (req: Request, res: Response, next: NextFunction) => {
    try {
      const { rate } = parseBody(errorRateSchema, req.body);
      chaos.setErrorRate(rate);
      respond(res, 'error_rate', ChaosStatus.ERROR_RATE);
    } catch (error) {
      next(error);
    }
  });

  router.post('/reset', (_req: Request, res: Response) => {
    chaos.reset();
    respond(res, 'reset', ChaosStatus.NORMALIZED);
  });

  return router;
}
