/**
 * Axios HTTP Transport
 * Layer: Infrastructure
 * Pattern: Adapter (implements IHttpTransport)
 *
 * Sends GET requests with axios and returns parsed JSON. Axios does not throw
 * on status here (`validateStatus: () => true`); the status check happens
 * below, so a custom adapter passed in the request config behaves the same
 * as the built-in HTTP one. `silentJSONParsing: false` makes a non-JSON body
 * reject instead of coming back as a string.
 *
 * No timeout is set: a hung request blocks the walk until the socket gives up.
 */
import type { IHttpTransport, TransportResponse } from '@domain/interfaces/IHttpTransport';
import type { QueryParams } from '@shared/types';
import axios, { type AxiosInstance, type CreateAxiosDefaults } from 'axios';

export class HttpStatusError extends Error {
  constructor(
    public readonly status: number,
    url: string,
  ) {
    super(`HTTP ${status} from ${url}`);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class AxiosTransport implements IHttpTransport {
  private client: AxiosInstance;

  constructor(defaults: CreateAxiosDefaults = {}) {
    this.client = axios.create({
      responseType: 'json',
      transitional: { silentJSONParsing: false, forcedJSONParsing: true },
      validateStatus: () => true,
      ...defaults,
    });
  }

  async getJson(
    url: string,
    params: QueryParams,
    headers: Record<string, string>,
  ): Promise<TransportResponse> {
    const resolvedUrl = this.client.getUri({ url, params });
    const response = await this.client.get<unknown>(url, { params, headers });

    if (response.status < 200 || response.status >= 300) {
      throw new HttpStatusError(response.status, resolvedUrl);
    }

    return { data: response.data, resolvedUrl };
  }
}
