import { metrics, type Counter, type Histogram, type Meter } from '@opentelemetry/api';
import { MeterProvider, type MetricReader } from '@opentelemetry/sdk-metrics';
import { PrometheusExporter } from '@opentelemetry/exporter-prometheus';
import { Resource } from '@opentelemetry/resources';
import { SemanticResourceAttributes } from '@opentelemetry/semantic-conventions';

type Labels = Record<string, string>;

export interface MetricsOptions {
  serviceName: string;
  serviceVersion?: string;
  port: number;
  endpoint?: string;
  /** Replaces the Prometheus exporter; `port` and `endpoint` are then unused. */
  reader?: MetricReader;
}

interface Instruments {
  requestDuration: Histogram;
  requestCount: Counter;
  requestErrors: Counter;
  llmRequestCount: Counter;
  llmRequestLatency: Histogram;
  llmTokenUsage: Counter;
  chaosActivations: Counter;
  loadTaskOutcomes: Counter;
  loadTaskDuration: Histogram;
  turnLatency: Histogram;
}

let meterProvider: MeterProvider | null = null;
let instruments: Instruments | null = null;

function createInstruments(meter: Meter): Instruments {
  return {
    requestDuration: meter.createHistogram('http_request_duration_ms', {
      description: 'HTTP request duration in milliseconds',
      unit: 'ms',
    }),
    requestCount: meter.createCounter('http_request_total', {
      description: 'Total HTTP requests',
    }),
    requestErrors: meter.createCounter('http_request_errors_total', {
      description: 'Total HTTP request errors',
    }),
    llmRequestCount: meter.createCounter('llm_synthesized_requests_total', {
      description: 'Synthesized generative-API responses',
    }),
    llmRequestLatency: meter.createHistogram('llm_synthesis_latency_ms', {
      description: 'Simulated thinking plus streaming time',
      unit: 'ms',
    }),
    llmTokenUsage: meter.createCounter('llm_synthesized_tokens_total', {
      description: 'Tokens reported in synthesized usage metadata',
    }),
    chaosActivations: meter.createCounter('chaos_activations_total', {
      description: 'Chaos scenario activations and resets',
    }),
    loadTaskOutcomes: meter.createCounter('load_task_outcomes_total', {
      description: 'Virtual user task outcomes',
    }),
    loadTaskDuration: meter.createHistogram('load_task_duration_ms', {
      description: 'Client-side response time of virtual user requests',
      unit: 'ms',
    }),
    turnLatency: meter.createHistogram('conversation_turn_latency_ms', {
      description: 'Message send to agent reply wall time',
      unit: 'ms',
    }),
  };
}

/**
 * Registers a Prometheus-backed meter provider. Until this runs every
 * recorder below is a no-op, so tests and library callers never open a port.
 */
export function initializeMetrics(options: MetricsOptions): void {
  if (meterProvider) {
    return;
  }

  const reader =
    options.reader ??
    new PrometheusExporter({
      port: options.port,
      endpoint: options.endpoint ?? '/metrics',
    });

  meterProvider = new MeterProvider({
    resource: new Resource({
      [SemanticResourceAttributes.SERVICE_NAME]: options.serviceName,
      [SemanticResourceAttributes.SERVICE_VERSION]: options.serviceVersion ?? '1.0.0',
    }),
    readers: [reader],
  });

  metrics.setGlobalMeterProvider(meterProvider);
  instruments = createInstruments(meterProvider.getMeter('inferlab-metrics'));
}

export async function shutdownMetrics(): Promise<void> {
  if (!meterProvider) {
    return;
  }
  const provider = meterProvider;
  meterProvider = null;
  instruments = null;
  await provider.shutdown();
}

function buildLabels(base: Labels, serviceName?: string): Labels {
  return {
    ...(serviceName ? { service: serviceName } : {}),
    ...base,
  };
}

export function recordRequestMetrics(
  method: string,
  path: string,
  statusCode: number,
  durationMs: number,
  serviceName?: string
): void {
  if (!instruments) {
    return;
  }
  const labels = buildLabels({ method, path, status: statusCode.toString() }, serviceName);

  instruments.requestCount.add(1, labels);
  instruments.requestDuration.record(durationMs, labels);

  if (statusCode >= 400) {
    instruments.requestErrors.add(1, labels);
  }
}

export function recordLLMRequest(options: {
  service: string;
  model?: string;
  operation: string;
  durationMs: number;
  promptTokens?: number;
  completionTokens?: number;
}): void {
  if (!instruments) {
    return;
  }
  const labels = buildLabels({ model: options.model || 'unknown', operation: options.operation }, options.service);
  instruments.llmRequestCount.add(1, labels);
  instruments.llmRequestLatency.record(options.durationMs, labels);

  if (options.promptTokens) {
    instruments.llmTokenUsage.add(options.promptTokens, { ...labels, token_type: 'prompt' });
  }
  if (options.completionTokens) {
    instruments.llmTokenUsage.add(options.completionTokens, { ...labels, token_type: 'completion' });
  }
}

export function recordChaosActivation(scenario: string, serviceName?: string): void {
  instruments?.chaosActivations.add(1, buildLabels({ scenario }, serviceName));
}

export function recordLoadTaskOutcome(task: string, success: boolean, durationMs: number): void {
  instruments?.loadTaskOutcomes.add(1, { task, outcome: success ? 'success' : 'failure' });
  instruments?.loadTaskDuration.record(durationMs, { task });
}

export function recordTurnLatency(name: string, success: boolean, durationMs: number): void {
  instruments?.turnLatency.record(durationMs, { name, outcome: success ? 'success' : 'failure' });
}
