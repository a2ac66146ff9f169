/**
 * Query-string schemas for the HTTP endpoints.
 */
import { z } from 'zod/v4';

/** "true"/"1" and "false"/"0"; absent falls back to the given default. */
const flag = (fallback: boolean) =>
  z
    .enum(['true', 'false', '1', '0'])
    .optional()
    .transform((value) => (value === undefined ? fallback : value === 'true' || value === '1'));

/** Comma-separated attribute slugs → trimmed, non-empty list. */
const slugList = z
  .string()
  .optional()
  .transform((value) =>
    (value ?? '')
      .split(',')
      .map((slug) => slug.trim())
      .filter((slug) => slug.length > 0),
  );

const searchUrl = z.url({ message: 'url must be an absolute search/query URL' });

export const standardAttributesQuerySchema = z.object({
  url: searchUrl,
  boneMeasures: flag(false),
});

export const commonAttributesQuerySchema = z.object({
  url: searchUrl,
  minPortion: z.coerce.number().min(0).max(1).optional(),
});

export const recordsQuerySchema = z.object({
  url: searchUrl,
  attributes: slugList,
  paginate: flag(true),
});

export const tableQuerySchema = z.object({
  url: searchUrl,
  attributes: slugList,
});

export const clearCacheQuerySchema = z.object({
  keepPrefix: flag(true),
});
