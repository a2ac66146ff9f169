/**
 * Search Page — One JSON Response from a Search/Query URL
 * Layer: Domain
 *
 * Open Context answers a search URL with an envelope like:
 *
 *   { totalResults, startIndex, itemsPerPage, id, next,
 *     "oc-api:has-results": [...records],
 *     "oc-api:has-facets":  [...facets] }
 *
 * The payload is treated as plain JSON (never resolved as linked data). The
 * schemas below only pin down the fields this client reads; everything else
 * passes through untouched. Absent or null facet fields, options, or results
 * are simply "not present"; the services skip such options.
 */
import { z } from 'zod/v4';

import { RESPONSE_KEYS } from '@shared/constants';

export const facetOptionSchema = z.looseObject({
  slug: z.string().nullish(),
  label: z.string().nullish(),
  id: z.string().nullish(),
  count: z.number().nullish(),
  [RESPONSE_KEYS.DEFINED_BY]: z.string().nullish(),
});

const optionGroup = z.array(facetOptionSchema).nullish();

export const facetSchema = z.looseObject({
  id: z.string().nullish(),
  label: z.string().nullish(),
  [RESPONSE_KEYS.DEFINED_BY]: z.string().nullish(),
  'oc-api:has-id-options': optionGroup,
  'oc-api:has-text-options': optionGroup,
  'oc-api:has-numeric-options': optionGroup,
  'oc-api:has-boolean-options': optionGroup,
  'oc-api:has-integer-options': optionGroup,
  'oc-api:has-float-options': optionGroup,
  'oc-api:has-date-options': optionGroup,
});

export const rawRecordSchema = z.record(z.string(), z.unknown());

export const searchPageSchema = z.looseObject({
  id: z.string().nullish(),
  totalResults: z.number().default(0),
  startIndex: z.number().default(0),
  itemsPerPage: z.number().default(0),
  next: z.string().nullish(),
  [RESPONSE_KEYS.RESULTS]: z.array(rawRecordSchema).default([]),
  [RESPONSE_KEYS.FACETS]: z.array(facetSchema).default([]),
});

export type FacetOption = z.infer<typeof facetOptionSchema>;
export type Facet = z.infer<typeof facetSchema>;

/** One search result exactly as returned by the API. */
export type RawRecord = z.infer<typeof rawRecordSchema>;

export type SearchPage = z.infer<typeof searchPageSchema>;
