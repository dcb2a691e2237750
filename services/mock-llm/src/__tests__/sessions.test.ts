import { describe, it, expect } from '@jest/globals';
import request from 'supertest';
import { NotFoundError } from '@inferlab/shared-utils';
import { EventKind, EventSource } from '@inferlab/shared-types';
import { createApp } from '../app';
import { ChaosController } from '../chaos/chaosController';
import { SessionStore } from '../sessions/sessionStore';

const AGENTS = [{ id: 'agent-1', name: 'Agent One' }];

function buildStore(options: { random?: number; sleep?: (ms: number) => Promise<void> } = {}) {
  const chaos = new ChaosController();
  const store = new SessionStore(AGENTS, {
    chaos,
    random: () => options.random ?? 0.5,
    sleep: options.sleep ?? (async () => undefined),
  });
  return { chaos, store };
}

describe('SessionStore', () => {
  it('rejects sessions for unknown agents', () => {
    const { store } = buildStore();

    expect(() => store.create('missing')).toThrow(NotFoundError);
  });

  it('assigns consecutive offsets from 0', () => {
    const { store } = buildStore();
    const session = store.create('agent-1');

    const first = store.appendEvent(session.id, { kind: EventKind.MESSAGE, source: EventSource.AI_AGENT, message: 'a' });
    const second = store.appendEvent(session.id, { kind: EventKind.MESSAGE, source: EventSource.AI_AGENT, message: 'b' });

    expect([first.offset, second.offset]).toEqual([0, 1]);
  });

  it('replies to a customer message after the latency delay', async () => {
    const delays: number[] = [];
    const { store } = buildStore({
      sleep: async ms => {
        delays.push(ms);
      },
    });
    const session = store.create('agent-1');

    store.appendEvent(session.id, { kind: EventKind.MESSAGE, source: EventSource.CUSTOMER, message: 'Hello' });
    await store.drain();

    const events = await store.listEvents(session.id, 1, 0);
    expect(delays).toEqual([1250]);
    expect(events).toHaveLength(1);
    expect(events[0]).toMatchObject({
      offset: 1,
      source: EventSource.AI_AGENT,
      kind: EventKind.MESSAGE,
      data: { message: 'Simulated AI response to: Hello' },
    });
  });

  it('writes an error status instead of a reply when the error rate triggers', async () => {
    const { chaos, store } = buildStore({ random: 0 });
    chaos.setErrorRate(1);
    const session = store.create('agent-1');

    store.appendEvent(session.id, { kind: EventKind.MESSAGE, source: EventSource.CUSTOMER, message: 'Hello' });
    await store.drain();

    const events = await store.listEvents(session.id, 1, 0);
    expect(events).toHaveLength(1);
    expect(events[0]).toMatchObject({ source: EventSource.SYSTEM, kind: EventKind.STATUS, data: { status: 'error' } });
  });

  it('wakes a long poll when an event is appended', async () => {
    const { store } = buildStore();
    const session = store.create('agent-1');

    const poll = store.listEvents(session.id, 0, 10_000);
    store.appendEvent(session.id, { kind: EventKind.MESSAGE, source: EventSource.AI_AGENT, message: 'ping' });

    const events = await poll;
    expect(events.map(event => event.data.message)).toEqual(['ping']);
  });

  it('returns an empty list when the wait expires', async () => {
    const { store } = buildStore();
    const session = store.create('agent-1');

    await expect(store.listEvents(session.id, 0, 20)).resolves.toEqual([]);
  });

  it('drops a pending reply when the session is deleted', async () => {
    let release: () => void = () => undefined;
    const { store } = buildStore({
      sleep: () =>
        new Promise<void>(resolve => {
          release = resolve;
        }),
    });
    const session = store.create('agent-1');
    store.appendEvent(session.id, { kind: EventKind.MESSAGE, source: EventSource.CUSTOMER, message: 'Hello' });

    store.delete(session.id);
    release();
    await store.drain();

    expect(store.size()).toBe(0);
    await expect(store.listEvents(session.id, 0, 0)).rejects.toThrow(NotFoundError);
  });
});

describe('session routes', () => {
  function buildApp() {
    return createApp({ config: { agentId: 'agent-1' }, random: () => 0.5, sleep: async () => undefined });
  }

  it('lists the configured agent', async () => {
    const { app } = buildApp();

    const response = await request(app).get('/agents');

    expect(response.body).toEqual([{ id: 'agent-1', name: 'Mock Agent' }]);
  });

  it('runs a full conversation turn', async () => {
    const { app, sessions } = buildApp();

    const created = await request(app).post('/sessions').send({ agent_id: 'agent-1' });
    expect(created.status).toBe(200);
    const sessionId: string = created.body.id;

    const posted = await request(app)
      .post(`/sessions/${sessionId}/events`)
      .send({ kind: 'message', source: 'customer', message: 'Hello' });
    expect(posted.body.offset).toBe(0);

    await sessions.drain();

    const events = await request(app).get(`/sessions/${sessionId}/events`).query({ min_offset: 1, wait_for_data: 1 });
    expect(events.body).toHaveLength(1);
    expect(events.body[0].data.message).toBe('Simulated AI response to: Hello');

    const deleted = await request(app).delete(`/sessions/${sessionId}`);
    expect(deleted.status).toBe(204);
  });

  it('returns 404 for an unknown agent or session', async () => {
    const { app } = buildApp();

    const session = await request(app).post('/sessions').send({ agent_id: 'other' });
    const events = await request(app).get('/sessions/missing/events');

    expect(session.status).toBe(404);
    expect(events.status).toBe(404);
    expect(events.body.error).toBe('Session missing not found');
  });

  it('rejects an event with an unknown source', async () => {
    const { app } = buildApp();
    const created = await request(app).post('/sessions').send({ agent_id: 'agent-1' });

    const response = await request(app)
      .post(`/sessions/${created.body.id}/events`)
      .send({ kind: 'message', source: 'robot', message: 'Hello' });

    expect(response.status).toBe(400);
  });

  it('rejects a wait longer than 60 seconds', async () => {
    const { app } = buildApp();
    const created = await request(app).post('/sessions').send({ agent_id: 'agent-1' });

    const response = await request(app).get(`/sessions/${created.body.id}/events`).query({ wait_for_data: 61 });

    expect(response.status).toBe(400);
  });
});
