import { ServiceUnavailableError, type SleepFn } from '@inferlab/shared-utils';
import { createServiceLogger, withExponentialBackoff } from '@inferlab/observability';
import type { HttpTransport } from '../http/transport';

const logger = createServiceLogger('load-generator', { component: 'target-probe' });

export interface TargetProbeOptions {
  attempts: number;
  path?: string;
  baseDelayMs?: number;
  sleepFn?: SleepFn;
}

/** Waits for the target to answer its health route with 200, retrying with backoff. */
export async function waitForTarget(transport: HttpTransport, options: TargetProbeOptions): Promise<void> {
  if (options.attempts <= 0) {
    return;
  }
  const path = options.path ?? '/health';

  await withExponentialBackoff(
    async () => {
      const response = await transport.request({ method: 'GET', path });
      if (response.status !== 200) {
        throw new ServiceUnavailableError(`Target ${path} answered ${response.status}`);
      }
    },
    {
      maxAttempts: options.attempts,
      baseDelayMs: options.baseDelayMs ?? 500,
      maxDelayMs: 5000,
      sleepFn: options.sleepFn,
      onRetry: (attempt, error) => {
        logger.warn('Target not ready, retrying', {
          attempt,
          error: error instanceof Error ? error.message : String(error),
        });
      },
    }
  );
}
