import { percentile } from '@inferlab/shared-utils';
import { createServiceLogger, recordLoadTaskOutcome, type ServiceLogger } from '@inferlab/observability';

export interface RequestEvent {
  /** HTTP method, or a synthetic type such as `Conversation`. */
  requestType: string;
  name: string;
  responseTimeMs: number;
  success: boolean;
  failureReason?: string;
}

export type RequestListener = (event: RequestEvent) => void;

export interface RequestAggregate {
  requestType: string;
  name: string;
  count: number;
  failures: number;
  minMs: number;
  avgMs: number;
  maxMs: number;
  p50Ms: number;
  p95Ms: number;
  p99Ms: number;
  failureReasons: Record<string, number>;
}

export interface StatsSummary {
  totalRequests: number;
  totalFailures: number;
  entries: RequestAggregate[];
}

export interface RequestStatsOptions {
  slowRequestThresholdMs?: number;
  logger?: ServiceLogger;
}

interface Bucket {
  requestType: string;
  name: string;
  samples: number[];
  failures: number;
  failureReasons: Map<string, number>;
}

export function createSlowRequestListener(thresholdMs: number, logger: ServiceLogger): RequestListener {
  return event => {
    if (event.responseTimeMs > thresholdMs) {
      logger.warn(`[CRITICAL SLOWNESS] ${event.name} took ${Math.round(event.responseTimeMs)}ms`, {
        requestType: event.requestType,
      });
    }
  };
}

/** Per-(type, name) request aggregates plus a listener hub fired on every record. */
export class RequestStats {
  private readonly buckets = new Map<string, Bucket>();
  private readonly listeners = new Set<RequestListener>();
  private readonly logger: ServiceLogger;

  constructor(options: RequestStatsOptions = {}) {
    this.logger = options.logger ?? createServiceLogger('load-generator', { component: 'request-stats' });
    if (options.slowRequestThresholdMs !== undefined) {
      this.onRequest(createSlowRequestListener(options.slowRequestThresholdMs, this.logger));
    }
  }

  /** Returns an unsubscribe function. */
  onRequest(listener: RequestListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  record(event: RequestEvent): void {
    const key = `${event.requestType} ${event.name}`;
    let bucket = this.buckets.get(key);
    if (!bucket) {
      bucket = { requestType: event.requestType, name: event.name, samples: [], failures: 0, failureReasons: new Map() };
      this.buckets.set(key, bucket);
    }

    bucket.samples.push(event.responseTimeMs);
    if (!event.success) {
      bucket.failures += 1;
      const reason = event.failureReason ?? 'Unknown failure';
      bucket.failureReasons.set(reason, (bucket.failureReasons.get(reason) ?? 0) + 1);
    }

    recordLoadTaskOutcome(key, event.success, event.responseTimeMs);

    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (error) {
        this.logger.error('Request listener failed', error, { name: event.name });
      }
    }
  }

  aggregate(requestType: string, name: string): RequestAggregate | undefined {
    const bucket = this.buckets.get(`${requestType} ${name}`);
    return bucket ? summarize(bucket) : undefined;
  }

  summary(): StatsSummary {
    const entries = [...this.buckets.values()].map(summarize);
    return {
      totalRequests: entries.reduce((sum, entry) => sum + entry.count, 0),
      totalFailures: entries.reduce((sum, entry) => sum + entry.failures, 0),
      entries,
    };
  }

  reset(): void {
    this.buckets.clear();
  }
}

function summarize(bucket: Bucket): RequestAggregate {
  const sorted = [...bucket.samples].sort((a, b) => a - b);
  const total = sorted.reduce((sum, value) => sum + value, 0);
  return {
    requestType: bucket.requestType,
    name: bucket.name,
    count: sorted.length,
    failures: bucket.failures,
    minMs: sorted[0] ?? 0,
    avgMs: sorted.length > 0 ? total / sorted.length : 0,
    maxMs: sorted[sorted.length - 1] ?? 0,
    p50Ms: percentile(sorted, 0.5),
    p95Ms: percentile(sorted, 0.95),
    p99Ms: percentile(sorted, 0.99),
    failureReasons: Object.fromEntries(bucket.failureReasons),
  };
}

export function formatSummary(summary: StatsSummary): string {
  const header = ['Type', 'Name', '# reqs', '# fails', 'Avg', 'Min', 'Max', 'p50', 'p95', 'p99'];
  const rows = summary.entries.map(entry => [
    entry.requestType,
    entry.name,
    String(entry.count),
    String(entry.failures),
    String(Math.round(entry.avgMs)),
    String(Math.round(entry.minMs)),
    String(Math.round(entry.maxMs)),
    String(Math.round(entry.p50Ms)),
    String(Math.round(entry.p95Ms)),
    String(Math.round(entry.p99Ms)),
  ]);
  rows.push(['', 'Aggregated', String(summary.totalRequests), String(summary.totalFailures), '', '', '', '', '', '']);

  const widths = header.map((title, column) => Math.max(title.length, ...rows.map(row => row[column].length)));
  const render = (row: string[]) => row.map((cell, column) => cell.padEnd(widths[column])).join('  ').trimEnd();

  const failureLines = summary.entries.flatMap(entry =>
    Object.entries(entry.failureReasons).map(([reason, count]) => `${count}x ${entry.requestType} ${entry.name}: ${reason}`)
  );

  return [render(header), ...rows.map(render), ...(failureLines.length > 0 ? ['', 'Failures:', ...failureLines] : [])].join(
    '\n'
  );
}
