import { randomUUID } from 'crypto';
import {
  NotFoundError,
  randomUniform,
  secondsToMs,
  sleep,
  type RandomSource,
  type SleepFn,
} from '@inferlab/shared-utils';
import { createServiceLogger } from '@inferlab/observability';
import {
  EventKind,
  EventSource,
  type AgentDescriptor,
  type CreateEventRequest,
  type SessionDescriptor,
  type SessionEvent,
  type SessionEventData,
  type SessionId,
} from '@inferlab/shared-types';
import type { ChaosController } from '../chaos/chaosController';

const logger = createServiceLogger('mock-llm-service', { component: 'session-store' });

interface StoredSession {
  descriptor: SessionDescriptor;
  events: SessionEvent[];
  waiters: Set<() => void>;
  closed: boolean;
}

export interface SessionStoreDependencies {
  chaos: ChaosController;
  random?: RandomSource;
  sleep?: SleepFn;
}

/**
 * In-memory conversation backend. Each session is an append-only event log
 * with offsets starting at 0; a customer message schedules an agent reply
 * after a delay drawn from the chaos latency window.
 */
export class SessionStore {
  private readonly sessions = new Map<SessionId, StoredSession>();
  private readonly pendingReplies = new Set<Promise<void>>();
  private readonly chaos: ChaosController;
  private readonly random: RandomSource;
  private readonly sleep: SleepFn;

  constructor(private readonly agents: AgentDescriptor[], deps: SessionStoreDependencies) {
    this.chaos = deps.chaos;
    this.random = deps.random ?? Math.random;
    this.sleep = deps.sleep ?? sleep;
  }

  listAgents(): AgentDescriptor[] {
    return this.agents.map(agent => ({ ...agent }));
  }

  create(agentId: string): SessionDescriptor {
    if (!this.agents.some(agent => agent.id === agentId)) {
      throw new NotFoundError('Agent', agentId);
    }

    const descriptor: SessionDescriptor = {
      id: randomUUID(),
      agent_id: agentId,
      created_at: new Date().toISOString(),
    };
    this.sessions.set(descriptor.id, { descriptor, events: [], waiters: new Set(), closed: false });
    logger.debug('Session created', { sessionId: descriptor.id, agentId });
    return descriptor;
  }

  appendEvent(sessionId: SessionId, request: CreateEventRequest): SessionEvent {
    const session = this.require(sessionId);
    const event = this.push(session, request.source, request.kind, { message: request.message });

    if (request.source === EventSource.CUSTOMER && request.kind === EventKind.MESSAGE) {
      this.track(this.reply(session, request.message));
    }
    return event;
  }

  /**
   * Long poll: returns events at or past `minOffset` immediately when there
   * are any, otherwise waits up to `waitMs` for the next append and returns
   * whatever is there by then (possibly nothing).
   */
  async listEvents(sessionId: SessionId, minOffset: number, waitMs: number): Promise<SessionEvent[]> {
    const session = this.require(sessionId);
    const ready = session.events.filter(event => event.offset >= minOffset);
    if (ready.length > 0 || waitMs <= 0) {
      return ready;
    }

    await new Promise<void>(resolve => {
      const finish = () => {
        clearTimeout(timer);
        session.waiters.delete(finish);
        resolve();
      };
      const timer = setTimeout(finish, waitMs);
      session.waiters.add(finish);
    });

    return session.closed ? [] : session.events.filter(event => event.offset >= minOffset);
  }

  delete(sessionId: SessionId): void {
    const session = this.require(sessionId);
    session.closed = true;
    this.sessions.delete(sessionId);
    this.notify(session);
    logger.debug('Session deleted', { sessionId });
  }

  size(): number {
    return this.sessions.size;
  }

  /** Resolves once every scheduled agent reply has been written or dropped. */
  async drain(): Promise<void> {
    while (this.pendingReplies.size > 0) {
      await Promise.all([...this.pendingReplies]);
    }
  }

  private require(sessionId: SessionId): StoredSession {
    const session = this.sessions.get(sessionId);
    if (!session) {
      throw new NotFoundError('Session', sessionId);
    }
    return session;
  }

  private push(session: StoredSession, source: EventSource, kind: EventKind, data: SessionEventData): SessionEvent {
    const event: SessionEvent = {
      id: randomUUID(),
      offset: session.events.length,
      source,
      kind,
      data,
      created_at: new Date().toISOString(),
    };
    session.events.push(event);
    this.notify(session);
    return event;
  }

  private notify(session: StoredSession): void {
    for (const waiter of [...session.waiters]) {
      waiter();
    }
  }

  private track(reply: Promise<void>): void {
    const tracked = reply.catch(error => {
      logger.error('Agent reply failed', error);
    });
    this.pendingReplies.add(tracked);
    void tracked.finally(() => this.pendingReplies.delete(tracked));
  }

  private async reply(session: StoredSession, message: string): Promise<void> {
    const { latency_min, latency_max } = this.chaos.snapshot();
    await this.sleep(secondsToMs(randomUniform(latency_min, latency_max, this.random)));

    if (session.closed) {
      return;
    }

    // error_rate is read after the delay, like the chat endpoint
    if (this.random() < this.chaos.snapshot().error_rate) {
      this.push(session, EventSource.SYSTEM, EventKind.STATUS, { status: 'error' });
      return;
    }

    this.chaos.leakIfActive();
    this.push(session, EventSource.AI_AGENT, EventKind.MESSAGE, {
      message: `Simulated AI response to: ${message}`,
    });
  }
}
