import { describe, it, expect } from '@jest/globals';
import type { HttpRequest } from '../http/transport';
import { REQUEST_NAMES, TURN_REQUEST_TYPE } from '../turns/turnLatencyPoller';
import {
  COMPLEX_MESSAGES,
  ConversationUser,
  IDLE_PING_NAME,
  IdlerUser,
  QUICK_CHAT_TURN,
  COMPLEX_QUERY_TURN,
} from '../users/sessionUsers';
import { FakeTransport, buildContext, flushAsync, respond, waitForAbort, type ContextOverrides } from './helpers';

function backend(request: HttpRequest) {
  if (request.path === '/agents') {
    return respond(200, [{ id: 'agent-1', name: 'Agent' }]);
  }
  if (request.path === '/sessions') {
    return respond(200, { id: 'session-1', agent_id: 'agent-1' });
  }
  if (request.method === 'POST') {
    return respond(200, { offset: 0 });
  }
  if (request.method === 'GET') {
    return respond(200, [{ offset: 1, source: 'ai_agent', kind: 'message', data: { message: 'Hi' } }]);
  }
  return respond(204, '');
}

function setup(overrides: ContextOverrides = {}) {
  const transport = new FakeTransport(backend);
  const context = buildContext(transport, { random: () => 0.5, ...overrides });
  return { transport, context };
}

describe('ConversationUser', () => {
  it('discovers an agent and records a quick chat turn', async () => {
    const { transport, context } = setup();
    const user = new ConversationUser(context);

    const result = await user.quickChat();

    expect(result?.success).toBe(true);
    expect(transport.requests.map(request => request.name)).toEqual([
      REQUEST_NAMES.agents,
      REQUEST_NAMES.createSession,
      REQUEST_NAMES.send,
      REQUEST_NAMES.poll,
    ]);
    expect(transport.requests[2].body).toMatchObject({ message: 'What are your office hours?' });
    expect(context.stats.aggregate(TURN_REQUEST_TYPE, QUICK_CHAT_TURN)?.count).toBe(1);
  });

  it('uses the configured agent without discovery', async () => {
    const { transport, context } = setup({ config: { targetAgentId: 'agent-9' } });
    const user = new ConversationUser(context);

    await user.complexQuery();

    expect(transport.requests[0]).toMatchObject({ path: '/sessions', body: { agent_id: 'agent-9' } });
    expect(transport.requests[1].body).toMatchObject({ message: COMPLEX_MESSAGES[1] });
    expect(context.stats.aggregate(TURN_REQUEST_TYPE, COMPLEX_QUERY_TURN)?.count).toBe(1);
  });

  it('skips the turn when no agent exists', async () => {
    const transport = new FakeTransport(() => respond(200, []));
    const user = new ConversationUser(buildContext(transport));

    await expect(user.quickChat()).resolves.toBeUndefined();
    expect(transport.requests).toHaveLength(1);
  });

  it('opens a session on start and deletes it on stop', async () => {
    const { transport, context } = setup({ sleep: waitForAbort });
    const user = new ConversationUser(context);

    const loop = user.start();
    await flushAsync();
    user.stop();
    await loop;

    expect(transport.requests.map(request => `${request.method} ${request.path}`)).toEqual([
      'GET /agents',
      'POST /sessions',
      'DELETE /sessions/session-1',
    ]);
  });
});

describe('IdlerUser', () => {
  it('does nothing before a session exists', async () => {
    const { transport, context } = setup();
    const user = new IdlerUser(context);

    await expect(user.idlePing()).resolves.toBeUndefined();
    expect(transport.requests).toHaveLength(0);
  });

  it('pings without waiting for a reply', async () => {
    const { transport, context } = setup({ config: { targetAgentId: 'agent-1' } });
    const user = new IdlerUser(context);
    await user.poller.ensureSession('agent-1');

    const outcome = await user.idlePing();

    expect(outcome).toEqual({ success: true });
    expect(transport.requests[transport.requests.length - 1]).toMatchObject({
      method: 'POST',
      name: IDLE_PING_NAME,
      body: { kind: 'message', source: 'customer', message: 'Hello' },
    });
    expect(transport.requests.some(request => request.method === 'GET')).toBe(false);
  });
});
