/**
 * Cache Key Builder
 * Layer: Infrastructure
 *
 * Turns a request (URL + extra GET params) into a stable cache file name:
 *
 *   {prefix}-{sha1(cleanUrl + sortedEffectiveParamsJson)}.json
 *
 * The "#..." part of a URL only matters to browsers, so it is dropped.
 * Params already written into the URL's query string are dropped too, so
 * `?rows=20` plus `{ rows: 20 }` and `?rows=20` alone share one entry.
 */
import { createHash } from 'node:crypto';

import { REPEATABLE_PARAMS } from '@shared/constants';
import type { QueryParams } from '@shared/types';

export const CACHE_FILE_EXTENSION = '.json';

export function stripFragment(url: string): string {
  const hashIndex = url.indexOf('#');
  return hashIndex === -1 ? url : url.slice(0, hashIndex);
}

function queryStringOf(url: string): string {
  const clean = stripFragment(url);
  const queryIndex = clean.indexOf('?');
  return queryIndex === -1 ? '' : clean.slice(queryIndex + 1);
}

/**
 * The params NOT already present in the URL. Repeatable params (`prop`) are
 * kept unless that exact key=value pair is already in the URL.
 */
export function effectiveParams(url: string, params: QueryParams = {}): QueryParams {
  const query = queryStringOf(url);
  const extra: QueryParams = {};

  for (const [key, value] of Object.entries(params)) {
    if (!query.includes(`${key}=`)) {
      extra[key] = value;
    }
  }

  for (const key of REPEATABLE_PARAMS) {
    const value = params[key];
    if (value === undefined || value === '' || key in extra) continue;
    if (!query.includes(`${key}=${value}`)) {
      extra[key] = value;
    }
  }

  return extra;
}

/** JSON with keys in sorted order, so insertion order never changes the hash. */
export function serializeParams(params: QueryParams): string {
  const sorted = Object.keys(params)
    .sort()
    .map((key) => [key, params[key]] as const);
  return JSON.stringify(Object.fromEntries(sorted));
}

export function buildCacheFileName(url: string, params: QueryParams, prefix: string): string {
  const cleanUrl = stripFragment(url);
  const extra = effectiveParams(cleanUrl, params);
  const suffix = Object.keys(extra).length > 0 ? serializeParams(extra) : '';

  const hash = createHash('sha1')
    .update(cleanUrl + suffix, 'utf8')
    .digest('hex');

  return `${prefix}-${hash}${CACHE_FILE_EXTENSION}`;
}
