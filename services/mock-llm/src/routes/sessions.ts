import { Router, Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { ValidationError, formatIssues, parseBody, secondsToMs } from '@inferlab/shared-utils';
import { EventKind, EventSource } from '@inferlab/shared-types';
import type { SessionStore } from '../sessions/sessionStore';

const MAX_WAIT_FOR_DATA_SECONDS = 60;

const createSessionSchema = z.object({ agent_id: z.string().min(1) });

const createEventSchema = z.object({
  kind: z.nativeEnum(EventKind),
  source: z.nativeEnum(EventSource),
  message: z.string(),
});

const listEventsQuerySchema = z.object({
  min_offset: z.coerce.number().int().nonnegative().default(0),
  wait_for_data: z.coerce.number().nonnegative().max(MAX_WAIT_FOR_DATA_SECONDS).default(0),
});

export function createSessionsRouter(store: SessionStore): Router {
  const router = Router();

  router.get('/agents', (_req: Request, res: Response) => {
    res.json(store.listAgents());
  });

  router.post('/sessions', (req: Request, res: Response, next: NextFunction) => {
    try {
      const { agent_id } = parseBody(createSessionSchema, req.body);
      res.json(store.create(agent_id));
    } catch (error) {
      next(error);
    }
  });

  router.post('/sessions/:id/events', (req: Request, res: Response, next: NextFunction) => {
    try {
      const request = parseBody(createEventSchema, req.body);
      res.json(store.appendEvent(req.params.id, request));
    } catch (error) {
      next(error);
    }
  });

  router.get('/sessions/:id/events', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const query = listEventsQuerySchema.safeParse(req.query);
      if (!query.success) {
        throw new ValidationError('Invalid query parameters', formatIssues(query.error));
      }
      const events = await store.listEvents(
        req.params.id,
        query.data.min_offset,
        secondsToMs(query.data.wait_for_data)
      );
      res.json(events);
    } catch (error) {
      next(error);
    }
  });

  router.delete('/sessions/:id', (req: Request, res: Response, next: NextFunction) => {
    try {
      store.delete(req.params.id);
      res.status(204).end();
    } catch (error) {
      next(error);
    }
  });

  return router;
}
