import { TransportError } from '../../shared/errors';

export type HttpMethod = 'GET' | 'POST' | 'PATCH' | 'DELETE';

export interface HttpRequest {
  method: HttpMethod;
  url: string;
  headers: Record<string, string>;
  body?: string;
}

export interface HttpResponse {
  status: number;
  /** Header names are lower-cased. */
  headers: Record<string, string>;
  body: string;
}

/**
 * Sends one HTTP request and hands back status, headers and raw body.
 * Implementations raise TransportError when no response arrives at all;
 * any status, success or not, is returned as a response.
 */
export interface HttpTransport {
  send(request: HttpRequest): Promise<HttpResponse>;
}

const DEFAULT_TIMEOUT_MS = 30_000;

export function isSuccessStatus(status: number): boolean {
  return status >= 200 && status < 300;
}

/**
 * Transport over the global fetch, with a per-call timeout.
 */
export class FetchTransport implements HttpTransport {
  constructor(private readonly timeoutMs: number = DEFAULT_TIMEOUT_MS) {}

  async send(request: HttpRequest): Promise<HttpResponse> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const response = await fetch(request.url, {
        method: request.method,
        headers: request.headers,
        body: request.body,
        signal: controller.signal,
      });

      const headers: Record<string, string> = {};
      response.headers.forEach((value, name) => {
        headers[name.toLowerCase()] = value;
      });

      return { status: response.status, headers, body: await response.text() };
    } catch (err: unknown) {
      const message =
        err instanceof Error && err.name === 'AbortError'
          ? `${request.method} ${request.url} timed out after ${this.timeoutMs}ms`
          : err instanceof Error
            ? `${request.method} ${request.url} failed: ${err.message}`
            : `${request.method} ${request.url} failed`;

      throw new TransportError(message);
    } finally {
      clearTimeout(timer);
    }
  }
}
