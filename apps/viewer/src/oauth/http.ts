import { request as undiciRequest, type Dispatcher } from 'undici';

export interface OutboundResponse {
  statusCode: number;
  /** parsed JSON body, or the raw text when the body is not JSON */
  body: unknown;
}

export interface OutboundHttpOptions {
  timeoutMs: number;
  /** replaced by a MockAgent in tests */
  dispatcher?: Dispatcher;
}

/**
 * Thin wrapper over undici for the provider calls. Every call is bounded by
 * the configured timeout; transport failures reject, HTTP errors resolve with
 * their status so callers can attach the provider body to their own error.
 */
export class OutboundHttp {
  constructor(private readonly options: OutboundHttpOptions) {}

  async getJson(url: string, headers: Record<string, string> = {}): Promise<OutboundResponse> {
    return this.send(url, 'GET', { accept: 'application/json', ...headers });
  }

  async postForm(url: string, form: URLSearchParams): Promise<OutboundResponse> {
    return this.send(
      url,
      'POST',
      {
        accept: 'application/json',
        'content-type': 'application/x-www-form-urlencoded',
      },
      form.toString(),
    );
  }

  private async send(
    url: string,
    method: Dispatcher.HttpMethod,
    headers: Record<string, string>,
    body?: string,
  ): Promise<OutboundResponse> {
    const res = await undiciRequest(url, {
      method,
      headers,
      body,
      dispatcher: this.options.dispatcher,
      // bounds the whole call, headers and body alike
      signal: AbortSignal.timeout(this.options.timeoutMs),
    });
    const text = await res.body.text();
    return { statusCode: res.statusCode, body: parseBody(text) };
  }
}

export function isSuccess(statusCode: number): boolean {
  return statusCode >= 200 && statusCode < 300;
}

function parseBody(text: string): unknown {
  if (!text) return null;
  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch {
    return text;
  }
}
