/**
 * Transport exports.
 */

export type {
  FilePart,
  HttpMethod,
  HttpTransport,
  QueryParams,
  RequestBody,
  TransportRequest,
  TransportResponse,
} from './types';
export type { AxiosTransportOptions } from './http';
export { AxiosTransport, createTransport } from './http';
export type { ApiRequest, ApiRequester } from './mediator';
export { RequestMediator, USER_AGENT, CLIENT_VERSION, API_PATH_PREFIX } from './mediator';
