import {
  ValidationError,
  randomUniform,
  secondsToMs,
  toError,
  type Clock,
  type RandomSource,
  type SleepFn,
} from '@inferlab/shared-utils';
import { createServiceLogger, type ServiceLogger } from '@inferlab/observability';
import type { LoadGeneratorConfig } from '../config';
import type { InstrumentedClient } from '../http/instrumentedClient';
import type { RequestStats } from '../stats/requestStats';

export interface Weighted {
  weight: number;
}

export interface UserTask extends Weighted {
  name: string;
  execute: () => Promise<unknown>;
}

export interface WaitTime {
  minSeconds: number;
  maxSeconds: number;
}

/** Shared by every user of a run. */
export interface UserContext {
  client: InstrumentedClient;
  stats: RequestStats;
  config: LoadGeneratorConfig;
  random: RandomSource;
  sleep: SleepFn;
  now: Clock;
}

export interface UserClass {
  name: string;
  weight: number;
  create: (context: UserContext) => VirtualUser;
}

export const TASK_REQUEST_TYPE = 'TASK';

/** Picks an item with probability proportional to its weight. */
export function pickWeighted<T extends Weighted>(items: readonly T[], random: RandomSource = Math.random): T {
  const eligible = items.filter(item => item.weight > 0);
  const total = eligible.reduce((sum, item) => sum + item.weight, 0);
  if (eligible.length === 0) {
    throw new ValidationError('At least one item needs a positive weight');
  }

  let threshold = random() * total;
  for (const item of eligible) {
    if (threshold < item.weight) {
      return item;
    }
    threshold -= item.weight;
  }
  return eligible[eligible.length - 1];
}

export function pickWeightedTask(tasks: readonly UserTask[], random: RandomSource = Math.random): UserTask {
  return pickWeighted(tasks, random);
}

export function pickOne<T>(items: readonly T[], random: RandomSource = Math.random): T {
  if (items.length === 0) {
    throw new ValidationError('Cannot pick from an empty list');
  }
  return items[Math.min(items.length - 1, Math.floor(random() * items.length))];
}

let nextUserId = 1;

/**
 * One simulated client. `start()` runs the loop: wait, pick a weighted task,
 * run it, repeat. `stop()` ends the loop after the task in flight and cuts
 * a pending wait short; it never interrupts a task.
 */
export abstract class VirtualUser {
  readonly id = nextUserId++;
  protected abstract readonly waitTime: WaitTime;
  protected readonly logger: ServiceLogger;
  private readonly abortController = new AbortController();
  private loop?: Promise<void>;

  constructor(protected readonly context: UserContext) {
    this.logger = createServiceLogger('load-generator', {
      component: 'virtual-user',
      user: new.target.name,
      userId: this.id,
    });
  }

  protected abstract tasks(): UserTask[];

  protected async onStart(): Promise<void> {}

  protected async onStop(): Promise<void> {}

  get stopping(): boolean {
    return this.abortController.signal.aborted;
  }

  start(): Promise<void> {
    if (!this.loop) {
      this.loop = this.run();
    }
    return this.loop;
  }

  stop(): void {
    this.abortController.abort();
  }

  private async run(): Promise<void> {
    try {
      await this.onStart();
    } catch (error) {
      this.logger.error('User start hook failed', error);
    }

    const tasks = this.tasks();
    while (!this.stopping) {
      await this.wait();
      if (this.stopping) {
        break;
      }
      await this.execute(pickWeightedTask(tasks, this.context.random));
    }

    try {
      await this.onStop();
    } catch (error) {
      this.logger.error('User stop hook failed', error);
    }
  }

  private async wait(): Promise<void> {
    const { minSeconds, maxSeconds } = this.waitTime;
    const delayMs = secondsToMs(randomUniform(minSeconds, maxSeconds, this.context.random));
    await this.context.sleep(delayMs, this.abortController.signal);
  }

  private async execute(task: UserTask): Promise<void> {
    const startedAt = this.context.now();
    try {
      await task.execute();
    } catch (error) {
      const message = toError(error).message;
      this.context.stats.record({
        requestType: TASK_REQUEST_TYPE,
        name: task.name,
        responseTimeMs: this.context.now() - startedAt,
        success: false,
        failureReason: message,
      });
      this.logger.warn('Task failed', { task: task.name, error: message });
    }
  }
}
