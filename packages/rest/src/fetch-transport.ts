import { TransportError, errMessage } from '@relaycord/shared';
import { type RestRequest, type RestResponse, type RestTransport } from './transport';

export interface FetchTransportOptions {
  timeoutMs?: number;
  fetch?: typeof fetch;
}

export class FetchTransport implements RestTransport {
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(options: FetchTransportOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? 30_000;
    this.fetchImpl = options.fetch ?? fetch;
  }

  async send(request: RestRequest): Promise<RestResponse> {
    let response: Response;
    try {
      response = await this.fetchImpl(request.url, {
        method: request.method,
        headers: request.headers,
        body: request.body,
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (err) {
      throw new TransportError(errMessage(err), { method: request.method });
    }

    const text = await response.text();
    let body: unknown = null;
    if (text !== '') {
      const isJson = response.headers.get('content-type')?.includes('application/json') ?? false;
      body = isJson ? parseJson(text) : text;
    }
    return { status: response.status, headers: response.headers, body };
  }
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}
