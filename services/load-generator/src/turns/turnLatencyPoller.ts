import { z } from 'zod';
import { secondsToMs, type Clock } from '@inferlab/shared-utils';
import { createServiceLogger, recordTurnLatency } from '@inferlab/observability';
import {
  EventKind,
  EventSource,
  type CreateEventRequest,
  type CreateSessionRequest,
  type SessionId,
} from '@inferlab/shared-types';
import type { HttpResponse } from '../http/transport';
import type { InstrumentedClient } from '../http/instrumentedClient';
import type { RequestStats } from '../stats/requestStats';
import { failure, type Outcome } from '../users/classification';

const logger = createServiceLogger('load-generator', { component: 'turn-latency-poller' });

export const TURN_REQUEST_TYPE = 'Conversation';

export const REQUEST_NAMES = {
  agents: '/agents',
  createSession: '/sessions (create)',
  send: '/sessions/{id}/events (send)',
  poll: '/sessions/{id}/events (poll)',
  deleteSession: '/sessions/{id} (delete)',
} as const;

const agentsSchema = z.array(z.object({ id: z.string() }).passthrough());
const sessionSchema = z.object({ id: z.string() }).passthrough();
const eventsSchema = z.array(
  z
    .object({
      offset: z.number().int().nonnegative(),
      source: z.string(),
      kind: z.string(),
    })
    .passthrough()
);

export interface TurnLatencyPollerOptions {
  pollTimeoutSeconds: number;
  pollWaitForDataSeconds: number;
}

export interface TurnResult {
  success: boolean;
  /** Wall time from send to reply detection, timeout or poll failure. */
  turnLatencyMs: number;
  reason?: string;
}

interface Session {
  id: SessionId;
  lastOffset: number;
}

function classifyAgents(response: HttpResponse): Outcome {
  if (response.status !== 200) {
    return failure(`Failed to list agents: ${response.status}`);
  }
  const agents = agentsSchema.safeParse(response.body);
  if (!agents.success) {
    return failure('Malformed agents response');
  }
  return agents.data.length > 0 ? { success: true } : failure('No agents found');
}

function classifySessionCreated(response: HttpResponse): Outcome {
  if (response.status !== 200) {
    return failure(`Failed to create session: ${response.status}`);
  }
  return sessionSchema.safeParse(response.body).success ? { success: true } : failure('Malformed session response');
}

function classifySend(response: HttpResponse): Outcome {
  return response.status === 200 ? { success: true } : failure(`Failed to send message: ${response.status}`);
}

function classifyPoll(response: HttpResponse): Outcome {
  if (response.status !== 200) {
    return failure(`Polling failed: ${response.status}`);
  }
  return eventsSchema.safeParse(response.body).success ? { success: true } : failure('Malformed events response');
}

function classifyDelete(response: HttpResponse): Outcome {
  return response.status === 200 || response.status === 204
    ? { success: true }
    : failure(`Failed to delete session: ${response.status}`);
}

/**
 * Measures conversation turns against a session-scoped event log: send a
 * customer message, then long-poll from the last seen offset until an agent
 * message shows up, a poll fails, or the deadline passes.
 */
export class TurnLatencyPoller {
  private session?: Session;

  constructor(
    private readonly client: InstrumentedClient,
    private readonly stats: RequestStats,
    private readonly options: TurnLatencyPollerOptions,
    private readonly now: Clock = Date.now
  ) {}

  get sessionId(): SessionId | undefined {
    return this.session?.id;
  }

  get lastOffset(): number {
    return this.session?.lastOffset ?? 0;
  }

  /** First agent the backend lists, if any. */
  async discoverAgent(): Promise<string | undefined> {
    const { response, outcome } = await this.client.send(
      { method: 'GET', path: '/agents', name: REQUEST_NAMES.agents },
      classifyAgents
    );
    if (!outcome.success || !response) {
      return undefined;
    }
    const agents = agentsSchema.safeParse(response.body);
    return agents.success && agents.data.length > 0 ? agents.data[0].id : undefined;
  }

  /** Creates a session unless one is open; resolves to whether one is open afterwards. */
  async ensureSession(agentId: string): Promise<boolean> {
    if (this.session) {
      return true;
    }

    const body: CreateSessionRequest = { agent_id: agentId };
    const { response, outcome } = await this.client.send(
      { method: 'POST', path: '/sessions', body, name: REQUEST_NAMES.createSession },
      classifySessionCreated
    );
    if (!outcome.success || !response) {
      return false;
    }

    const created = sessionSchema.safeParse(response.body);
    if (!created.success) {
      return false;
    }
    this.session = { id: created.data.id, lastOffset: 0 };
    return true;
  }

  /** Appends a customer message without waiting for the reply. */
  async postMessage(message: string, requestName: string = REQUEST_NAMES.send): Promise<Outcome> {
    if (!this.session) {
      return failure('No session');
    }
    const body: CreateEventRequest = { kind: EventKind.MESSAGE, source: EventSource.CUSTOMER, message };
    const { outcome } = await this.client.send(
      { method: 'POST', path: `/sessions/${this.session.id}/events`, body, name: requestName },
      classifySend
    );
    return outcome;
  }

  /**
   * One full turn. The turn is recorded under the `Conversation` request
   * type with `turnName`, apart from the individual send and poll requests.
   * A failed send ends the turn without recording it.
   */
  async sendAndWait(message: string, turnName = 'Full_Turn'): Promise<TurnResult> {
    const session = this.session;
    if (!session) {
      return { success: false, turnLatencyMs: 0, reason: 'No session' };
    }

    const startedAt = this.now();
    const sent = await this.postMessage(message);
    if (!sent.success) {
      return { success: false, turnLatencyMs: this.now() - startedAt, reason: sent.reason };
    }

    const outcome = await this.pollForReply(session, startedAt);
    const turnLatencyMs = this.now() - startedAt;

    this.stats.record({
      requestType: TURN_REQUEST_TYPE,
      name: turnName,
      responseTimeMs: turnLatencyMs,
      success: outcome.success,
      failureReason: outcome.success ? undefined : outcome.reason,
    });
    recordTurnLatency(turnName, outcome.success, turnLatencyMs);

    return outcome.success
      ? { success: true, turnLatencyMs }
      : { success: false, turnLatencyMs, reason: outcome.reason };
  }

  /** Deletes the session. Failures are logged, never thrown. */
  async close(): Promise<void> {
    const session = this.session;
    if (!session) {
      return;
    }
    this.session = undefined;

    const { outcome } = await this.client.send(
      { method: 'DELETE', path: `/sessions/${session.id}`, name: REQUEST_NAMES.deleteSession },
      classifyDelete
    );
    if (!outcome.success) {
      logger.warn('Session cleanup failed', { sessionId: session.id, reason: outcome.reason });
    }
  }

  private async pollForReply(session: Session, startedAt: number): Promise<Outcome> {
    const deadline = startedAt + secondsToMs(this.options.pollTimeoutSeconds);

    while (this.now() < deadline) {
      const { response, outcome } = await this.client.send(
        {
          method: 'GET',
          path: `/sessions/${session.id}/events`,
          query: { min_offset: session.lastOffset, wait_for_data: this.options.pollWaitForDataSeconds },
          name: REQUEST_NAMES.poll,
        },
        classifyPoll
      );
      if (!outcome.success) {
        return outcome;
      }

      const events = eventsSchema.safeParse(response?.body);
      if (!events.success || events.data.length === 0) {
        continue;
      }

      const maxOffset = Math.max(...events.data.map(event => event.offset));
      session.lastOffset = Math.max(session.lastOffset, maxOffset + 1);

      const agentReplied = events.data.some(
        event => event.source === EventSource.AI_AGENT && event.kind === EventKind.MESSAGE
      );
      if (agentReplied) {
        return { success: true };
      }
    }

    return failure('Agent response timeout');
  }
}
