import { randomInt } from '@inferlab/shared-utils';
import type { AgentRequest } from '@inferlab/shared-types';
import type { SendResult } from '../http/instrumentedClient';
import { classifyAnalyze, classifyChat, classifyHealth } from './classification';
import { VirtualUser, type UserClass, type UserContext, type UserTask } from './virtualUser';

/** Chat-heavy client of the agent endpoints: chat 3, analyze 1, health 1. */
export class AiUser extends VirtualUser {
  protected readonly waitTime = { minSeconds: 1, maxSeconds: 5 };
  private readonly headers: Record<string, string>;

  constructor(context: UserContext) {
    super(context);
    this.headers = {
      Authorization: `Bearer ${context.config.authToken}`,
      'Content-Type': 'application/json',
    };
  }

  protected tasks(): UserTask[] {
    return [
      { name: 'chat_interaction', weight: 3, execute: () => this.chat() },
      { name: 'heavy_analysis_request', weight: 1, execute: () => this.analyze() },
      { name: 'health_check', weight: 1, execute: () => this.healthCheck() },
    ];
  }

  chat(): Promise<SendResult> {
    const body: AgentRequest = {
      query: 'Summarize email',
      user_id: String(randomInt(1000, 9999, this.context.random)),
      mock_mode: this.context.config.mockLlmResponse,
    };
    return this.context.client.send(
      { method: 'POST', path: '/api/v1/agent/chat', body, headers: this.headers },
      classifyChat
    );
  }

  analyze(): Promise<SendResult> {
    const body: AgentRequest = {
      query: 'Analyze dataset',
      user_id: 'admin',
      mock_mode: this.context.config.mockLlmResponse,
    };
    return this.context.client.send(
      { method: 'POST', path: '/api/v1/agent/analyze', body, headers: this.headers },
      classifyAnalyze
    );
  }

  healthCheck(): Promise<SendResult> {
    return this.context.client.send({ method: 'GET', path: '/health', headers: this.headers }, classifyHealth);
  }
}

export const AI_USER_CLASS: UserClass = {
  name: 'AiUser',
  weight: 1,
  create: context => new AiUser(context),
};
