/**
 * Generic HTTP transport used by provider connectors
 */

export type HttpMethod = 'GET' | 'POST';

export interface HttpRequest {
  method: HttpMethod;
  url: string;
  headers?: Record<string, string>;
  body?: string;
  signal?: AbortSignal;
  timeoutMs?: number;
}

export interface HttpResponse {
  status: number;
  /** Parsed JSON body, or null when the body is empty or not JSON */
  body: unknown;
}

export interface HttpTransport {
  request(request: HttpRequest): Promise<HttpResponse>;
}

/**
 * Transport backed by the global fetch with a per-request timeout
 */
export class FetchTransport implements HttpTransport {
  private readonly defaultTimeoutMs: number;

  constructor(defaultTimeoutMs: number = 30000) {
    this.defaultTimeoutMs = defaultTimeoutMs;
  }

  async request(request: HttpRequest): Promise<HttpResponse> {
    const timeoutSignal = AbortSignal.timeout(request.timeoutMs ?? this.defaultTimeoutMs);
    const signal = request.signal ? anySignal([request.signal, timeoutSignal]) : timeoutSignal;

    const response = await fetch(request.url, {
      method: request.method,
      headers: request.headers,
      body: request.body,
      signal
    });

    const text = await response.text();
    return {
      status: response.status,
      body: parseJsonBody(text)
    };
  }
}

function parseJsonBody(text: string): unknown {
  if (text.trim().length === 0) {
    return null;
  }
  try {
    return JSON.parse(text);
  } catch {
    return null;
  }
}

/**
 * Aborts when any of the given signals aborts
 */
function anySignal(signals: AbortSignal[]): AbortSignal {
  const controller = new AbortController();
  for (const signal of signals) {
    if (signal.aborted) {
      controller.abort(signal.reason);
      break;
    }
    signal.addEventListener('abort', () => controller.abort(signal.reason), { once: true });
  }
  return controller.signal;
}
