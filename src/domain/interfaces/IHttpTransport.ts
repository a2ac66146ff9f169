/**
 * HTTP Transport Interface
 * Layer: Domain
 *
 * The one network capability the client needs: GET a URL with extra query
 * parameters and headers, and hand back parsed JSON. Implementations reject
 * on transport errors, non-2xx statuses, and bodies that are not JSON.
 *
 * AxiosTransport is the production implementation; tests use an in-process
 * fake keyed by URL.
 */
import type { QueryParams } from '@shared/types';

export interface TransportResponse {
  data: unknown;
  /** The final URL including the serialized query parameters. */
  resolvedUrl: string;
}

export interface IHttpTransport {
  getJson(url: string, params: QueryParams, headers: Record<string, string>): Promise<TransportResponse>;
}
