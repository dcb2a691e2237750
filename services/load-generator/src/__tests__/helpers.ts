import type { SleepFn } from '@inferlab/shared-utils';
import { DEFAULT_CONFIG, type LoadGeneratorConfig } from '../config';
import { InstrumentedClient } from '../http/instrumentedClient';
import type { HttpRequest, HttpResponse, HttpTransport } from '../http/transport';
import { RequestStats } from '../stats/requestStats';
import type { UserContext } from '../users/virtualUser';

export type Handler = (request: HttpRequest) => HttpResponse | Promise<HttpResponse>;

export class FakeTransport implements HttpTransport {
  readonly requests: HttpRequest[] = [];

  constructor(private readonly handler: Handler) {}

  async request(request: HttpRequest): Promise<HttpResponse> {
    this.requests.push(request);
    return this.handler(request);
  }
}

export function respond(status: number, body: unknown = {}, elapsedMs = 5): HttpResponse {
  return { status, body, elapsedMs };
}

export class ManualClock {
  private current = 0;

  readonly now = (): number => this.current;

  advance(ms: number): void {
    this.current += ms;
  }
}

/** Resolves only when the signal aborts. */
export const waitForAbort: SleepFn = (_ms, signal) =>
  new Promise<void>(resolve => {
    if (!signal || signal.aborted) {
      resolve();
      return;
    }
    signal.addEventListener('abort', () => resolve(), { once: true });
  });

export function flushAsync(): Promise<void> {
  return new Promise(resolve => setImmediate(resolve));
}

export interface ContextOverrides {
  config?: Partial<LoadGeneratorConfig>;
  random?: () => number;
  sleep?: SleepFn;
  now?: () => number;
}

export function buildContext(transport: HttpTransport, overrides: ContextOverrides = {}): UserContext {
  const stats = new RequestStats();
  const now = overrides.now ?? Date.now;
  return {
    client: new InstrumentedClient(transport, stats, now),
    stats,
    config: { ...DEFAULT_CONFIG, authToken: 'test-secret', ...overrides.config },
    random: overrides.random ?? (() => 0.5),
    sleep: overrides.sleep ?? (async () => undefined),
    now,
  };
}
