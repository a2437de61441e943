export interface HttpRequest {
  url: string;
  contentType: string;
  body: string;
}

export interface HttpResponse {
  status: number;
  body: string;
}

export interface HttpTransport {
  post(request: HttpRequest): Promise<HttpResponse>;
}

export type FetchLike = (
  url: string,
  init: { method: "POST"; headers: Record<string, string>; body: string },
) => Promise<{ status: number; text(): Promise<string> }>;

export interface FetchHttpTransportOptions {
  fetch?: FetchLike;
  headers?: Record<string, string>;
}

function resolveFetch(options: FetchHttpTransportOptions): FetchLike {
  if (options.fetch) {
    return options.fetch;
  }
  if (typeof globalThis.fetch !== "function") {
    throw new Error(
      "No fetch implementation available. Provide fetch in FetchHttpTransportOptions.",
    );
  }
  return (url, init) => globalThis.fetch(url, init);
}

// Node 20 / browser transport over the standard fetch API.
export class FetchHttpTransport implements HttpTransport {
  private readonly fetchImpl: FetchLike;

  constructor(private readonly options: FetchHttpTransportOptions = {}) {
    this.fetchImpl = resolveFetch(options);
  }

  async post(request: HttpRequest): Promise<HttpResponse> {
    const response = await this.fetchImpl(request.url, {
      method: "POST",
      headers: { ...this.options.headers, "Content-Type": request.contentType },
      body: request.body,
    });
    return { status: response.status, body: await response.text() };
  }
}

export type HttpHandler = (request: HttpRequest) => HttpResponse | Promise<HttpResponse>;

export class InMemoryHttpTransport implements HttpTransport {
  readonly requests: HttpRequest[] = [];

  constructor(private readonly handler: HttpHandler) {}

  async post(request: HttpRequest): Promise<HttpResponse> {
    this.requests.push({ ...request });
    return this.handler(request);
  }

  lastRequest(): HttpRequest | null {
    return this.requests[this.requests.length - 1] ?? null;
  }
}
