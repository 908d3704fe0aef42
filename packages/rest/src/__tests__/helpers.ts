import { vi } from 'vitest';
import { type RestRequest, type RestResponse, type RestTransport } from '../transport';

export function response(status: number, body: unknown = null, headers: Record<string, string> = {}): RestResponse {
  const lower = new Map(Object.entries(headers).map(([key, value]): [string, string] => [key.toLowerCase(), value]));
  return { status, body, headers: { get: (name) => lower.get(name.toLowerCase()) ?? null } };
}

export interface FakeTransport extends RestTransport {
  requests: RestRequest[];
}

/** Replies with the queued responses in order, repeating the last one. */
export function createTransport(...responses: RestResponse[]): FakeTransport {
  const requests: RestRequest[] = [];
  let index = 0;
  return {
    requests,
    send: vi.fn(async (request: RestRequest) => {
      requests.push(request);
      const next = responses[Math.min(index, responses.length - 1)];
      index += 1;
      if (!next) throw new Error('No response queued');
      return next;
    }),
  };
}
