/**
 * Pagination Walker — Every Page of a Search, in Order
 * Layer: Application
 *
 * A search URL returns one page of records plus (while more remain) a `next`
 * URL. `walkPages()` is an async generator that follows those links in a
 * plain loop until a page arrives without `next`; each call starts over from
 * the given URL. Pages are fetched one after another because each `next`
 * link is only known once the previous page is in.
 *
 * Every page request carries the same parameters (rows, attributes, response
 * detail flags, flatten-attributes). The server repeats most of them inside
 * `next`, and cacheKey.ts drops those duplicates.
 *
 * A FetchFailure on any page propagates and aborts the whole walk; there is
 * no partial result.
 */
import type { ClientOptions } from '@core/clientOptions';
import type { Logger } from '@core/logger';
import { TOKENS } from '@core/types';
import { type RawRecord, type SearchPage, searchPageSchema } from '@domain/entities/SearchPage';
import { RESPONSE_KEYS } from '@shared/constants';
import { FetchFailure } from '@shared/errors/AppError';
import type { QueryParams } from '@shared/types';
import { inject, injectable } from 'tsyringe';

import { ApiClient } from './ApiClient';

/** Validates a payload as a search page, failing the fetch otherwise. */
export function parseSearchPage(payload: unknown, url: string): SearchPage {
  const result = searchPageSchema.safeParse(payload);
  if (!result.success) {
    const reason = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new FetchFailure(url, `unexpected response shape: ${reason}`);
  }
  return result.data;
}

@injectable()
export class PaginationWalker {
  constructor(
    @inject(TOKENS.ApiClient) private api: ApiClient,
    @inject(TOKENS.ClientOptions) private options: ClientOptions,
    @inject(TOKENS.Logger) private log: Logger,
  ) {}

  /** GET parameters sent with every page request. */
  buildParams(attributeSlugs: readonly string[]): QueryParams {
    const params: QueryParams = { rows: this.options.recsPerRequest };
    if (attributeSlugs.length > 0) {
      params.attributes = attributeSlugs.join(',');
    }
    if (this.options.responseTypes.length > 0) {
      params.response = this.options.responseTypes.join(',');
    }
    if (this.options.flattenAttributes) {
      params['flatten-attributes'] = 1;
    }
    return params;
  }

  async *walkPages(
    url: string,
    attributeSlugs: readonly string[] = [],
    paginate = true,
  ): AsyncGenerator<SearchPage, void, undefined> {
    const params = this.buildParams(attributeSlugs);
    let pageUrl: string | undefined = url;

    while (pageUrl) {
      const payload = await this.api.getJson(pageUrl, params, { logUrl: false });
      const page = parseSearchPage(payload, pageUrl);
      this.logProgress(page, pageUrl);

      yield page;

      pageUrl = paginate && page.next ? page.next : undefined;
    }
  }

  async fetchAllPages(
    url: string,
    attributeSlugs: readonly string[] = [],
    paginate = true,
  ): Promise<RawRecord[]> {
    const records: RawRecord[] = [];
    for await (const page of this.walkPages(url, attributeSlugs, paginate)) {
      records.push(...page[RESPONSE_KEYS.RESULTS]);
    }
    return records;
  }

  private logProgress(page: SearchPage, url: string): void {
    const lastRecord = Math.min(page.startIndex + page.itemsPerPage, page.totalResults);
    this.log.info(
      {
        first: page.startIndex + 1,
        last: lastRecord,
        total: page.totalResults,
        id: page.id ?? url,
      },
      `Got records ${page.startIndex + 1} to ${lastRecord} of ${page.totalResults}`,
    );
  }
}
