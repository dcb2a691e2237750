import axios, { AxiosInstance } from 'axios';
import { TransportError, type Clock } from '@inferlab/shared-utils';

export type HttpMethod = 'GET' | 'POST' | 'DELETE';

export interface HttpRequest {
  method: HttpMethod;
  path: string;
  query?: Record<string, string | number>;
  body?: unknown;
  headers?: Record<string, string>;
  /** Statistics key; defaults to the path. */
  name?: string;
}

export interface HttpResponse {
  status: number;
  body: unknown;
  elapsedMs: number;
}

/**
 * Anything that can carry a request to the target. Every HTTP status is a
 * response; only a request that produced no response rejects, with a
 * TransportError.
 */
export interface HttpTransport {
  request(request: HttpRequest): Promise<HttpResponse>;
}

export interface AxiosTransportOptions {
  baseURL: string;
  timeoutMs: number;
  now?: Clock;
}

export class AxiosTransport implements HttpTransport {
  private readonly client: AxiosInstance;
  private readonly now: Clock;

  constructor(options: AxiosTransportOptions) {
    this.client = axios.create({
      baseURL: options.baseURL,
      timeout: options.timeoutMs,
      validateStatus: () => true,
    });
    this.now = options.now ?? Date.now;
  }

  async request(request: HttpRequest): Promise<HttpResponse> {
    const startedAt = this.now();
    try {
      const response = await this.client.request<unknown>({
        method: request.method,
        url: request.path,
        params: request.query,
        data: request.body,
        headers: request.headers,
      });
      return { status: response.status, body: response.data, elapsedMs: this.now() - startedAt };
    } catch (error) {
      if (axios.isAxiosError(error)) {
        throw new TransportError(error.message, { code: error.code, path: request.path });
      }
      throw new TransportError(error instanceof Error ? error.message : String(error), { path: request.path });
    }
  }
}
