import { ValidationError, type SleepFn } from '@inferlab/shared-utils';
import { createServiceLogger } from '@inferlab/observability';
import type { LoadShapeScheduler } from '../shape/loadShape';
import type { StatsSummary } from '../stats/requestStats';
import { pickWeighted, type UserClass, type UserContext, type VirtualUser } from '../users/virtualUser';

const logger = createServiceLogger('load-generator', { component: 'load-runner' });

export const DEFAULT_TICK_INTERVAL_MS = 1000;

export interface LoadRunnerOptions {
  scheduler: LoadShapeScheduler;
  userClasses: readonly UserClass[];
  context: UserContext;
  tickIntervalMs?: number;
  /** Wait between ticks; defaults to the users' sleep. */
  sleep?: SleepFn;
}

/**
 * Drives a population of virtual users from a load shape. Each tick reads
 * the shape and moves the population toward its target, spawning at most
 * `spawnRate` users per second and stopping the newest users first. Stopping
 * a user never cancels its task in flight.
 */
export class LoadRunner {
  private readonly users: VirtualUser[] = [];
  private readonly loops = new Set<Promise<void>>();
  private readonly abortController = new AbortController();
  private readonly tickIntervalMs: number;
  private readonly sleep: SleepFn;
  private startedAt?: number;
  private spawnCredit = 0;
  private stageIndex = -1;

  constructor(private readonly options: LoadRunnerOptions) {
    if (options.userClasses.length === 0) {
      throw new ValidationError('At least one user class is required');
    }
    this.tickIntervalMs = options.tickIntervalMs ?? DEFAULT_TICK_INTERVAL_MS;
    this.sleep = options.sleep ?? options.context.sleep;
  }

  get activeUsers(): number {
    return this.users.length;
  }

  /** Runs until the shape terminates or `requestStop()` is called; resolves with the final statistics. */
  async run(): Promise<StatsSummary> {
    const { context } = this.options;
    logger.info('Load test started', { userClasses: this.options.userClasses.map(userClass => userClass.name) });

    while (!this.abortController.signal.aborted && this.step()) {
      await this.sleep(this.tickIntervalMs, this.abortController.signal);
    }

    await this.stopAll();
    const summary = context.stats.summary();
    logger.info('Load test finished', {
      totalRequests: summary.totalRequests,
      totalFailures: summary.totalFailures,
    });
    return summary;
  }

  requestStop(): void {
    this.abortController.abort();
  }

  /** Applies one scheduler tick; returns false once the shape says to terminate. */
  step(): boolean {
    const { context, scheduler } = this.options;
    if (this.startedAt === undefined) {
      this.startedAt = context.now();
    }

    const decision = scheduler.tick((context.now() - this.startedAt) / 1000);
    if (decision.kind === 'terminate') {
      return false;
    }

    if (decision.stageIndex !== this.stageIndex) {
      this.stageIndex = decision.stageIndex;
      logger.info('Entering load stage', {
        stage: decision.stageIndex,
        users: decision.users,
        spawnRate: decision.spawnRate,
      });
    }

    this.adjustPopulation(decision.users, decision.spawnRate);
    return true;
  }

  /** Stops every user and waits for their loops to wind down. */
  async stopAll(): Promise<void> {
    for (const user of this.users.splice(0)) {
      user.stop();
    }
    await Promise.all([...this.loops]);
  }

  private adjustPopulation(target: number, spawnRate: number): void {
    const deficit = target - this.users.length;

    if (deficit > 0) {
      this.spawnCredit += (spawnRate * this.tickIntervalMs) / 1000;
      const count = Math.min(deficit, Math.floor(this.spawnCredit));
      this.spawnCredit -= count;
      for (let i = 0; i < count; i++) {
        this.spawn();
      }
      return;
    }

    this.spawnCredit = 0;
    if (deficit < 0) {
      const surplus = this.users.splice(target);
      for (const user of surplus.reverse()) {
        user.stop();
      }
      logger.debug('Stopped surplus users', { stopped: surplus.length, remaining: this.users.length });
    }
  }

  private spawn(): void {
    const userClass = pickWeighted(this.options.userClasses, this.options.context.random);
    const user = userClass.create(this.options.context);
    this.users.push(user);

    const loop: Promise<void> = user
      .start()
      .catch(error => {
        logger.error('Virtual user loop failed', error, { userClass: userClass.name, userId: user.id });
      })
      .finally(() => {
        this.loops.delete(loop);
      });
    this.loops.add(loop);
  }
}
