export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

export type RouteParams = Record<string, string>;

export interface Route {
  readonly method: HttpMethod;
  readonly template: string;
  readonly path: string;
  /** Rate-limit bucket the request is accounted against. */
  readonly bucketKey: string;
}

// Path parameters the server scopes rate limits by, in order of precedence.
const MAJOR_PARAMETERS = ['channel_id', 'guild_id', 'webhook_id'] as const;

export function majorParameter(params: RouteParams): string | null {
  for (const name of MAJOR_PARAMETERS) {
    const value = params[name];
    if (value !== undefined) return value;
  }
  return null;
}

export function bucketKeyFor(method: HttpMethod, template: string, params: RouteParams): string {
  return `${method} ${template}:${majorParameter(params) ?? 'global'}`;
}

/**
 * Builds a route from a template such as `/channels/{channel_id}/messages`.
 * Every placeholder must have a value in `params`.
 */
export function route(method: HttpMethod, template: string, params: RouteParams = {}): Route {
  const path = template.replace(/\{(\w+)\}/g, (_match, name: string) => {
    const value = params[name];
    if (value === undefined) {
      throw new Error(`Missing route parameter ${name} for ${template}`);
    }
    return encodeURIComponent(value);
  });
  return { method, template, path, bucketKey: bucketKeyFor(method, template, params) };
}
