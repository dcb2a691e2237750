import { describe, it, expect } from '@jest/globals';
import { ValidationError } from '@inferlab/shared-utils';
import { TASK_REQUEST_TYPE, VirtualUser, pickOne, pickWeighted, pickWeightedTask, type UserTask } from '../users/virtualUser';
import { FakeTransport, buildContext, respond, waitForAbort } from './helpers';
import type { ContextOverrides } from './helpers';

class ScriptedUser extends VirtualUser {
  protected readonly waitTime = { minSeconds: 1, maxSeconds: 5 };
  readonly trace: string[] = [];

  constructor(overrides: ContextOverrides, private readonly script: (user: ScriptedUser, run: number) => Promise<void>) {
    super(buildContext(new FakeTransport(() => respond(200)), overrides));
  }

  get stats() {
    return this.context.stats;
  }

  protected async onStart(): Promise<void> {
    this.trace.push('start');
  }

  protected async onStop(): Promise<void> {
    this.trace.push('stop');
  }

  protected tasks(): UserTask[] {
    let runs = 0;
    return [
      {
        name: 'scripted',
        weight: 1,
        execute: async () => {
          runs += 1;
          this.trace.push('task');
          await this.script(this, runs);
        },
      },
    ];
  }
}

describe('pickWeightedTask', () => {
  const noop = async () => undefined;
  const tasks: UserTask[] = [
    { name: 'chat', weight: 3, execute: noop },
    { name: 'analyze', weight: 1, execute: noop },
    { name: 'health', weight: 1, execute: noop },
  ];

  it('picks tasks in proportion to their weights', () => {
    const counts: Record<string, number> = { chat: 0, analyze: 0, health: 0 };
    for (let i = 0; i < 1000; i++) {
      const task = pickWeightedTask(tasks, () => (i + 0.5) / 1000);
      counts[task.name] += 1;
    }

    expect(counts).toEqual({ chat: 600, analyze: 200, health: 200 });
  });

  it('never picks a zero-weight item', () => {
    const items = [
      { id: 'never', weight: 0 },
      { id: 'always', weight: 2 },
    ];

    expect(pickWeighted(items, () => 0).id).toBe('always');
    expect(pickWeighted(items, () => 0.999).id).toBe('always');
  });

  it('rejects lists without positive weights', () => {
    expect(() => pickWeighted([], () => 0)).toThrow(ValidationError);
    expect(() => pickWeighted([{ weight: 0 }], () => 0)).toThrow(ValidationError);
  });

  it('picks uniformly from plain lists', () => {
    expect(pickOne(['a', 'b', 'c'], () => 0.5)).toBe('b');
    expect(pickOne(['a', 'b', 'c'], () => 0.9999)).toBe('c');
  });
});

describe('VirtualUser', () => {
  it('waits before every task and runs the hooks once', async () => {
    const sleeps: number[] = [];
    const user = new ScriptedUser(
      {
        sleep: async ms => {
          sleeps.push(ms);
        },
      },
      async (self, run) => {
        if (run === 3) {
          self.stop();
        }
      }
    );

    await user.start();

    expect(user.trace).toEqual(['start', 'task', 'task', 'task', 'stop']);
    expect(sleeps).toEqual([3000, 3000, 3000]);
  });

  it('records a throwing task as a failure and keeps going', async () => {
    const user = new ScriptedUser({}, async (self, run) => {
      if (run === 1) {
        throw new Error('boom');
      }
      self.stop();
    });

    await user.start();

    expect(user.trace).toEqual(['start', 'task', 'task', 'stop']);
    const aggregate = user.stats.aggregate(TASK_REQUEST_TYPE, 'scripted');
    expect(aggregate?.failures).toBe(1);
    expect(aggregate?.failureReasons).toEqual({ boom: 1 });
  });

  it('cuts a pending wait short on stop', async () => {
    const user = new ScriptedUser({ sleep: waitForAbort }, async () => undefined);

    const loop = user.start();
    user.stop();
    await loop;

    expect(user.trace).toEqual(['start', 'stop']);
  });

  it('returns the same loop from repeated starts', () => {
    const user = new ScriptedUser({ sleep: waitForAbort }, async () => undefined);

    const first = user.start();
    expect(user.start()).toBe(first);
    user.stop();
    return first;
  });
});
