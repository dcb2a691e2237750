import { ValidationError } from '@inferlab/shared-utils';
import type { SimulationSnapshot } from '@inferlab/shared-types';

export interface LatencyWindow {
  latencyMinSeconds: number;
  latencyMaxSeconds: number;
}

export const BASELINE_LATENCY: LatencyWindow = { latencyMinSeconds: 0.5, latencyMaxSeconds: 2.0 };
export const LATENCY_SPIKE: LatencyWindow = { latencyMinSeconds: 3.0, latencyMaxSeconds: 8.0 };

/** One leaked block per chat-style call while leak mode is on. */
export const LEAK_BLOCK_BYTES = 1024 * 1024;

export type ChaosSnapshot = Readonly<SimulationSnapshot>;

interface SimulationState {
  latencyMin: number;
  latencyMax: number;
  errorRate: number;
  memoryLeakActive: boolean;
  cpuStressActive: boolean;
}

/**
 * Owns the process's simulation state. Handlers receive the controller
 * through the app factory and read it via `snapshot()` at the moment they
 * need a value, so a mutation lands on subsequent reads only. Every
 * mutation replaces the state object in a single assignment; readers never
 * observe a half-applied change.
 */
export class ChaosController {
  private state: Readonly<SimulationState>;
  private readonly leakedBlocks: Buffer[] = [];
  private leakedByteCount = 0;

  constructor(private readonly baseline: LatencyWindow = BASELINE_LATENCY) {
    if (baseline.latencyMinSeconds < 0 || baseline.latencyMinSeconds > baseline.latencyMaxSeconds) {
      throw new ValidationError('Baseline latency window must satisfy 0 <= min <= max', baseline);
    }
    this.state = this.baselineState();
  }

  snapshot(): ChaosSnapshot {
    const { latencyMin, latencyMax, errorRate, memoryLeakActive, cpuStressActive } = this.state;
    return Object.freeze({
      latency_min: latencyMin,
      latency_max: latencyMax,
      error_rate: errorRate,
      memory_leak_active: memoryLeakActive,
      cpu_stress_active: cpuStressActive,
      leaked_bytes: this.leakedByteCount,
    });
  }

  activateLatencySpike(): void {
    this.state = {
      ...this.state,
      latencyMin: LATENCY_SPIKE.latencyMinSeconds,
      latencyMax: LATENCY_SPIKE.latencyMaxSeconds,
    };
  }

  activateMemoryLeak(): void {
    this.state = { ...this.state, memoryLeakActive: true };
  }

  activateCpuStress(): void {
    this.state = { ...this.state, cpuStressActive: true };
  }

  setErrorRate(rate: number): void {
    if (!Number.isFinite(rate) || rate < 0 || rate > 1) {
      throw new ValidationError('Error rate must be between 0 and 1', { rate });
    }
    this.state = { ...this.state, errorRate: rate };
  }

  reset(): void {
    this.state = this.baselineState();
    this.leakedBlocks.length = 0;
    this.leakedByteCount = 0;
  }

  /** Appends a block when leak mode is on; returns whether anything leaked. */
  leakIfActive(bytes: number = LEAK_BLOCK_BYTES): boolean {
    if (!this.state.memoryLeakActive) {
      return false;
    }
    this.leakedBlocks.push(Buffer.alloc(bytes, 'x'));
    this.leakedByteCount += bytes;
    return true;
  }

  private baselineState(): SimulationState {
    return {
      latencyMin: this.baseline.latencyMinSeconds,
      latencyMax: this.baseline.latencyMaxSeconds,
      errorRate: 0,
      memoryLeakActive: false,
      cpuStressActive: false,
    };
  }
}
