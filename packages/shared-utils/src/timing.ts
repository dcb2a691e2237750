export type RandomSource = () => number;
/** Resolves after `ms`, or as soon as `signal` aborts. Never rejects. */
export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>;
export type Clock = () => number;

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise(resolve => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const done = () => {
      clearTimeout(timer);
      signal?.removeEventListener('abort', done);
      resolve();
    };
    const timer = setTimeout(done, ms);
    signal?.addEventListener('abort', done, { once: true });
  });
}

export function randomUniform(min: number, max: number, random: RandomSource = Math.random): number {
  return min + (max - min) * random();
}

export function randomInt(min: number, max: number, random: RandomSource = Math.random): number {
  return Math.floor(randomUniform(min, max + 1, random));
}

export function secondsToMs(seconds: number): number {
  return Math.round(seconds * 1000);
}

export function percentile(sortedValues: number[], fraction: number): number {
  if (sortedValues.length === 0) {
    return 0;
  }
  const index = Math.min(sortedValues.length - 1, Math.max(0, Math.ceil(fraction * sortedValues.length) - 1));
  return sortedValues[index];
}
