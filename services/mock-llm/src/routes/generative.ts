import express, { Router, Request, Response, NextFunction } from 'express';
import { NotFoundError, ValidationError, parseBody } from '@inferlab/shared-utils';
import { createServiceLogger } from '@inferlab/observability';
import type {
  BatchEmbedContentsResponse,
  CountTokensResponse,
  EmbedContentResponse,
  PredictResponse,
} from '@inferlab/shared-types';
import { InferenceSimulator, toWireChunk } from '../simulator/inferenceSimulator';
import {
  batchEmbedRequestSchema,
  generateContentRequestSchema,
  predictRequestSchema,
} from '../simulator/requestSchemas';

const logger = createServiceLogger('mock-llm-service', { component: 'generative-api' });

export const STREAM_TERMINATOR = 'data: [DONE]\n\n';

export const SSE_HEADERS: Record<string, string> = {
  'Content-Type': 'text/event-stream',
  'Cache-Control': 'no-cache',
  Connection: 'keep-alive',
  'X-Accel-Buffering': 'no',
};

type ParsedBody = { ok: true; value: unknown } | { ok: false; error: string };

// Bodies are read as text so an unparseable embedding batch can still be answered.
function parseRawBody(body: unknown): ParsedBody {
  if (typeof body !== 'string') {
    return { ok: true, value: {} };
  }
  if (body.trim() === '') {
    return { ok: true, value: {} };
  }
  try {
    return { ok: true, value: JSON.parse(body) };
  } catch (error) {
    return { ok: false, error: error instanceof Error ? error.message : String(error) };
  }
}

function splitTarget(target: string): { model: string; action: string } {
  const separator = target.lastIndexOf(':');
  if (separator <= 0) {
    throw new NotFoundError('Model action', target);
  }
  return { model: target.slice(0, separator), action: target.slice(separator + 1) };
}

async function streamResponse(simulator: InferenceSimulator, model: string, res: Response): Promise<void> {
  let clientGone = false;
  res.on('close', () => {
    if (!res.writableEnded) {
      clientGone = true;
    }
  });

  res.status(200).set(SSE_HEADERS);
  res.flushHeaders();

  for await (const frame of simulator.streamGenerate(model)) {
    if (clientGone) {
      logger.debug('Stream client disconnected', { model });
      break;
    }
    if (frame.kind === 'chunk') {
      res.write(`data: ${JSON.stringify(toWireChunk(frame.chunk))}\n\n`);
    } else {
      res.write(STREAM_TERMINATOR);
    }
  }
  res.end();
}

export function createGenerativeRouter(simulator: InferenceSimulator): Router {
  const router = Router();

  router.post(
    '/models/:target',
    express.text({ type: () => true, limit: '20mb' }),
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        const { model, action } = splitTarget(req.params.target);
        const body = parseRawBody(req.body);

        switch (action) {
          case 'generateContent': {
            if (!body.ok) {
              throw new ValidationError('Request body is not valid JSON', body.error);
            }
            const request = parseBody(generateContentRequestSchema, body.value);
            const synthesis = await simulator.generate(request, model);
            logger.debug('Synthesized content', { model, kind: synthesis.kind, shapeId: synthesis.shapeId });
            res.json(synthesis.response);
            return;
          }

          case 'streamGenerateContent':
            await streamResponse(simulator, model, res);
            return;

          case 'embedContent': {
            const response: EmbedContentResponse = { embedding: { values: simulator.embedding(0) } };
            res.json(response);
            return;
          }

          case 'batchEmbedContents': {
            const parsed = body.ok ? batchEmbedRequestSchema.safeParse(body.value) : undefined;
            let vectors: number[][];
            if (parsed && parsed.success) {
              vectors = simulator.embedBatch(parsed.data.requests.length);
            } else {
              logger.warn('Malformed batch embedding request, returning fallback vector', { model });
              vectors = simulator.embedBatch(1);
            }
            const response: BatchEmbedContentsResponse = { embeddings: vectors.map(values => ({ values })) };
            res.json(response);
            return;
          }

          case 'predict': {
            const parsed = body.ok ? predictRequestSchema.safeParse(body.value) : undefined;
            if (parsed && parsed.success) {
              const response: PredictResponse = {
                predictions: simulator
                  .embedBatch(parsed.data.instances.length)
                  .map(values => ({ embeddings: { values } })),
              };
              res.json(response);
              return;
            }
            const response: EmbedContentResponse = { embedding: { values: simulator.embedding(0) } };
            res.json(response);
            return;
          }

          case 'countTokens': {
            const response: CountTokensResponse = { totalTokens: simulator.countTokens() };
            res.json(response);
            return;
          }

          default:
            throw new NotFoundError('Model action', action);
        }
      } catch (error) {
        if (res.headersSent) {
          logger.error('Stream aborted', error);
          res.end();
          return;
        }
        next(error);
      }
    }
  );

  return router;
}
