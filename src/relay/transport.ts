// HTTP transport collaborator. The bridge only needs request/response;
// timeouts and connection handling belong to the transport.

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

export interface HttpRequest {
  method: HttpMethod;
  url: string;
  headers: Record<string, string>;
  body?: string;
}

export interface HttpResponse {
  status: number;
  body: string;
}

/**
 * Resolves with any HTTP response, including non-2xx; rejects only when
 * no response was received at all.
 */
export interface HttpTransport {
  request(req: HttpRequest): Promise<HttpResponse>;
}

export interface FetchTransportOptions {
  /** Abort requests after this many ms; 0 disables the timeout */
  timeoutMs?: number;
}

/** HttpTransport over the global fetch API. */
export class FetchTransport implements HttpTransport {
  private readonly timeoutMs: number;

  constructor(options: FetchTransportOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? 10_000;
  }

  async request(req: HttpRequest): Promise<HttpResponse> {
    const res = await fetch(req.url, {
      method: req.method,
      headers: req.headers,
      body: req.body,
      signal: this.timeoutMs > 0 ? AbortSignal.timeout(this.timeoutMs) : undefined,
    });
    return { status: res.status, body: await res.text() };
  }
}
