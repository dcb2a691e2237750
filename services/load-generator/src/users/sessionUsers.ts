import { TurnLatencyPoller, type TurnResult } from '../turns/turnLatencyPoller';
import type { Outcome } from './classification';
import { VirtualUser, pickOne, type UserClass, type UserContext, type UserTask } from './virtualUser';

export const QUICK_MESSAGES = ['Hello', 'What are your office hours?', 'Thank you'] as const;

export const COMPLEX_MESSAGES = [
  'I would like to schedule an appointment for next week',
  'Can you check my lab results and explain what they mean?',
  'I need to see a specialist for my back pain, what are my options?',
] as const;

export const QUICK_CHAT_TURN = 'Full_Turn_Quick_Chat';
export const COMPLEX_QUERY_TURN = 'Full_Turn_Complex_Query';
export const IDLE_PING_NAME = '/sessions/{id}/events (idle ping)';

/** A user holding one conversation session for its lifetime. */
abstract class SessionUser extends VirtualUser {
  readonly poller: TurnLatencyPoller;
  private agentId?: string;

  constructor(context: UserContext) {
    super(context);
    this.agentId = context.config.targetAgentId;
    this.poller = new TurnLatencyPoller(
      context.client,
      context.stats,
      {
        pollTimeoutSeconds: context.config.pollTimeoutSeconds,
        pollWaitForDataSeconds: context.config.pollWaitForDataSeconds,
      },
      context.now
    );
  }

  protected async onStart(): Promise<void> {
    await this.prepareSession();
  }

  protected async onStop(): Promise<void> {
    await this.poller.close();
  }

  /** Discovers an agent when none is configured, then opens a session. */
  protected async prepareSession(): Promise<boolean> {
    if (this.poller.sessionId) {
      return true;
    }
    if (!this.agentId) {
      this.agentId = await this.poller.discoverAgent();
    }
    if (!this.agentId) {
      this.logger.warn('No agent available, session not created');
      return false;
    }
    return this.poller.ensureSession(this.agentId);
  }
}

/** Sends messages and measures the full turn until the agent answers. */
export class ConversationUser extends SessionUser {
  protected readonly waitTime = { minSeconds: 1, maxSeconds: 3 };

  protected tasks(): UserTask[] {
    return [
      { name: 'quick_chat', weight: 3, execute: () => this.quickChat() },
      { name: 'complex_query', weight: 1, execute: () => this.complexQuery() },
    ];
  }

  quickChat(): Promise<TurnResult | undefined> {
    return this.converse(QUICK_MESSAGES, QUICK_CHAT_TURN);
  }

  complexQuery(): Promise<TurnResult | undefined> {
    return this.converse(COMPLEX_MESSAGES, COMPLEX_QUERY_TURN);
  }

  private async converse(messages: readonly string[], turnName: string): Promise<TurnResult | undefined> {
    if (!(await this.prepareSession())) {
      return undefined;
    }
    return this.poller.sendAndWait(pickOne(messages, this.context.random), turnName);
  }
}

/** Keeps a mostly idle session open and pings it now and then without waiting for a reply. */
export class IdlerUser extends SessionUser {
  protected readonly waitTime = { minSeconds: 30, maxSeconds: 60 };

  protected tasks(): UserTask[] {
    return [{ name: 'idle_ping', weight: 1, execute: () => this.idlePing() }];
  }

  async idlePing(): Promise<Outcome | undefined> {
    if (!this.poller.sessionId) {
      return undefined;
    }
    return this.poller.postMessage('Hello', IDLE_PING_NAME);
  }
}

export const CONVERSATION_USER_CLASS: UserClass = {
  name: 'ConversationUser',
  weight: 1,
  create: context => new ConversationUser(context),
};

export const IDLER_USER_CLASS: UserClass = {
  name: 'IdlerUser',
  weight: 1,
  create: context => new IdlerUser(context),
};
