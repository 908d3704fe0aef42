import { type HttpMethod } from './routes';
import { type HeaderReader } from './headers';

export interface RestRequest {
  method: HttpMethod;
  url: string;
  headers: Record<string, string>;
  body?: string;
}

export interface RestResponse {
  status: number;
  headers: HeaderReader;
  /** Parsed JSON, raw text for other content types, or null when empty. */
  body: unknown;
}

export interface RestTransport {
  send(request: RestRequest): Promise<RestResponse>;
}
