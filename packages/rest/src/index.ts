export {
  route,
  bucketKeyFor,
  majorParameter,
  type Route,
  type RouteParams,
  type HttpMethod,
} from './routes';
export { parseRateLimitHeaders, type RateLimitHeaders, type HeaderReader } from './headers';
export {
  BucketManager,
  DEFAULT_BUCKET_LIMIT,
  BUCKET_SWEEP_INTERVAL_MS,
  type BucketManagerOptions,
  type RateLimitPermit,
  type PermitRelease,
  type RateLimitedUpdate,
} from './bucket-manager';
export type { RestTransport, RestRequest, RestResponse } from './transport';
export { FetchTransport, type FetchTransportOptions } from './fetch-transport';
export { RestClient, type RestClientOptions, type RequestOptions, type QueryValue } from './client';
export { ThreadEndpoints } from './endpoints/thread-endpoints';
export { MessageEndpoints } from './endpoints/message-endpoints';
