import { ValidationError } from '@inferlab/shared-utils';

export interface Stage {
  /** Cumulative threshold in seconds since the run started; the stage covers [previous threshold, endsAtSeconds). */
  endsAtSeconds: number;
  users: number;
  spawnRate: number;
}

export type ShapeDecision =
  | { kind: 'target'; stageIndex: number; users: number; spawnRate: number }
  | { kind: 'terminate' };

export const STAGED_RAMP_UP: readonly Stage[] = [
  { endsAtSeconds: 30, users: 10, spawnRate: 5 }, // warmup
  { endsAtSeconds: 60, users: 50, spawnRate: 10 }, // load
  { endsAtSeconds: 90, users: 100, spawnRate: 20 }, // stress
  { endsAtSeconds: 120, users: 10, spawnRate: 5 }, // cooldown
];

export function constantShape(users: number, spawnRate: number, runTimeSeconds: number): Stage[] {
  return [{ endsAtSeconds: runTimeSeconds, users, spawnRate }];
}

/**
 * Maps elapsed run time to a target population. Pure: the same elapsed
 * value always yields the same decision.
 */
export class LoadShapeScheduler {
  private readonly stages: readonly Stage[];

  constructor(stages: readonly Stage[] = STAGED_RAMP_UP) {
    if (stages.length === 0) {
      throw new ValidationError('A load shape needs at least one stage');
    }

    stages.forEach((stage, index) => {
      if (!(stage.endsAtSeconds > 0)) {
        throw new ValidationError(`Stage ${index} must end after 0s`, stage);
      }
      if (index > 0 && stage.endsAtSeconds <= stages[index - 1].endsAtSeconds) {
        throw new ValidationError('Stage thresholds must be strictly increasing', { index, stage });
      }
      if (stage.users < 0 || stage.spawnRate < 0) {
        throw new ValidationError(`Stage ${index} has a negative user count or spawn rate`, stage);
      }
    });

    this.stages = stages.map(stage => ({ ...stage }));
  }

  get totalDurationSeconds(): number {
    return this.stages[this.stages.length - 1].endsAtSeconds;
  }

  tick(elapsedSeconds: number): ShapeDecision {
    const stageIndex = this.stages.findIndex(stage => elapsedSeconds < stage.endsAtSeconds);
    if (stageIndex === -1) {
      return { kind: 'terminate' };
    }
    const { users, spawnRate } = this.stages[stageIndex];
    return { kind: 'target', stageIndex, users, spawnRate };
  }
}
