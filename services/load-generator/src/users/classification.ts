import type { HttpResponse } from '../http/transport';

export type Failure = { success: false; reason: string };
export type Outcome = { success: true } | Failure;

export type Classifier = (response: HttpResponse) => Outcome;

export const ANALYZE_SLA_SECONDS = 2.0;
export const HEALTH_TIMEOUT_SECONDS = 1.0;

export const CHAT_UNAVAILABLE = '503: Upstream Service Unavailable';
export const CHAT_GATEWAY_TIMEOUT = '504: Gateway Timeout';
export const ANALYZE_SLA_VIOLATION = 'SLA Violation: > 2s Response';
export const HEALTH_TIMEOUT = 'Health Check Timeout: > 1s (Pod would be restarted)';
export const HEALTH_NON_200 = 'Health Check Failed: Non-200 Status';

const SUCCESS: Outcome = { success: true };

export function failure(reason: string): Failure {
  return { success: false, reason };
}

export function expectOk(response: HttpResponse): Outcome {
  return response.status === 200 ? SUCCESS : failure(`Error ${response.status}`);
}

export function classifyChat(response: HttpResponse): Outcome {
  switch (response.status) {
    case 200:
      return SUCCESS;
    case 503:
      return failure(CHAT_UNAVAILABLE);
    case 504:
      return failure(CHAT_GATEWAY_TIMEOUT);
    default:
      return failure(`Error ${response.status}`);
  }
}

/** Slowness fails the task even when the status is OK. */
export function classifyAnalyze(response: HttpResponse): Outcome {
  if (response.elapsedMs / 1000 > ANALYZE_SLA_SECONDS) {
    return failure(ANALYZE_SLA_VIOLATION);
  }
  return expectOk(response);
}

export function classifyHealth(response: HttpResponse): Outcome {
  if (response.elapsedMs / 1000 > HEALTH_TIMEOUT_SECONDS) {
    return failure(HEALTH_TIMEOUT);
  }
  return response.status === 200 ? SUCCESS : failure(HEALTH_NON_200);
}
