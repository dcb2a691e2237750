import { toError, type Clock } from '@inferlab/shared-utils';
import type { RequestStats } from '../stats/requestStats';
import { expectOk, failure, type Classifier, type Outcome } from '../users/classification';
import type { HttpRequest, HttpResponse, HttpTransport } from './transport';

export interface SendResult {
  /** Absent when the transport produced no response. */
  response?: HttpResponse;
  outcome: Outcome;
}

/**
 * Sends through a transport and records every attempt, classified, in the
 * shared request statistics.
 */
export class InstrumentedClient {
  constructor(
    private readonly transport: HttpTransport,
    private readonly stats: RequestStats,
    private readonly now: Clock = Date.now
  ) {}

  async send(request: HttpRequest, classify: Classifier = expectOk): Promise<SendResult> {
    const name = request.name ?? request.path;
    const startedAt = this.now();

    let response: HttpResponse;
    try {
      response = await this.transport.request(request);
    } catch (error) {
      const outcome = failure(toError(error).message);
      this.stats.record({
        requestType: request.method,
        name,
        responseTimeMs: this.now() - startedAt,
        success: false,
        failureReason: outcome.reason,
      });
      return { outcome };
    }

    const outcome = classify(response);
    this.stats.record({
      requestType: request.method,
      name,
      responseTimeMs: response.elapsedMs,
      success: outcome.success,
      failureReason: outcome.success ? undefined : outcome.reason,
    });
    return { response, outcome };
  }
}
