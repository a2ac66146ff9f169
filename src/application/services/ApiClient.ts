/**
 * API Client — Cached, Paced JSON Fetches
 * Layer: Application
 * Pattern: Facade over cache + transport
 *
 * `getJson(url, params)` is the single path every other service uses to talk
 * to Open Context:
 *
 *   1. Build the cache file name (cacheKey.ts) and try the cache. A hit is
 *      returned immediately, with no pacing delay and no network call.
 *   2. Otherwise wait `pacingMs` (the API is rate-limited), then GET the URL
 *      with the effective params and `accept: application/json`.
 *   3. Any transport error, non-2xx status, unparseable or empty body becomes
 *      a FetchFailure carrying the URL. Nothing null is ever returned.
 *   4. On success, log the resolved URL, cache the payload, return it.
 */
import type { ClientOptions } from '@core/clientOptions';
import type { Logger } from '@core/logger';
import { TOKENS } from '@core/types';
import type { IHttpTransport } from '@domain/interfaces/IHttpTransport';
import type { IResponseCache } from '@domain/interfaces/IResponseCache';
import { buildCacheFileName, effectiveParams } from '@infrastructure/cache/cacheKey';
import { FetchFailure } from '@shared/errors/AppError';
import type { QueryParams } from '@shared/types';
import { inject, injectable } from 'tsyringe';

const JSON_HEADERS = { accept: 'application/json' } as const;

export interface GetJsonOptions {
  /** Log the resolved URL at info level (debug otherwise). Defaults to true. */
  logUrl?: boolean;
}

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function isEmptyPayload(data: unknown): boolean {
  if (data === null || data === undefined || data === '') return true;
  if (Array.isArray(data)) return data.length === 0;
  return typeof data === 'object' && Object.keys(data).length === 0;
}

@injectable()
export class ApiClient {
  constructor(
    @inject(TOKENS.HttpTransport) private transport: IHttpTransport,
    @inject(TOKENS.ResponseCache) private cache: IResponseCache,
    @inject(TOKENS.ClientOptions) private options: ClientOptions,
    @inject(TOKENS.Logger) private log: Logger,
  ) {}

  async getJson(url: string, params: QueryParams = {}, opts: GetJsonOptions = {}): Promise<unknown> {
    const cacheFileName = buildCacheFileName(url, params, this.cache.prefix);
    const cached = await this.cache.read(cacheFileName);
    if (cached !== undefined) {
      return cached;
    }

    const extra = effectiveParams(url, params);

    if (this.options.pacingMs > 0) await delay(this.options.pacingMs);

    let data: unknown;
    let resolvedUrl: string;
    try {
      ({ data, resolvedUrl } = await this.transport.getJson(url, extra, { ...JSON_HEADERS }));
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      this.log.warn({ url, reason }, 'GET failed for JSON data');
      throw new FetchFailure(url, reason, err);
    }

    if (isEmptyPayload(data)) {
      throw new FetchFailure(url, 'empty response body');
    }

    if (opts.logUrl ?? true) {
      this.log.info({ url: resolvedUrl }, 'GET success for JSON data');
    } else {
      this.log.debug({ url: resolvedUrl }, 'GET success for JSON data');
    }

    await this.cache.write(cacheFileName, data);
    return data;
  }

  /** Deletes cache entries relative to the active prefix; see IResponseCache.clear. */
  async clearCache(keepPrefix = true): Promise<number> {
    return this.cache.clear(keepPrefix);
  }

  /** Replaces the cache prefix with a slug of `text` (e.g. a project name). */
  setCachePrefix(text: string): void {
    this.cache.setPrefix(text);
  }

  get cachePrefix(): string {
    return this.cache.prefix;
  }
}
