/**
 * Shared Type Definitions
 * Layer: Shared (cross-cutting, used by every layer)
 *
 * Request parameter maps, the (slug, label) pairs returned by attribute
 * discovery, and the scalar cell values that make up normalized records and
 * result tables. The API's own response shapes live in domain/entities.
 */

/** Extra GET parameters sent along with a query URL. */
export type QueryParams = Record<string, string | number>;

/** A discovered attribute: stable slug plus human label. */
export interface SlugLabel {
  slug: string;
  label: string;
}

/** One cell of a normalized record. Dates only appear after type inference. */
export type CellValue = string | number | boolean | Date | null;

export interface TimingMeta {
  /** Wall-clock time from request arrival to response sent (ms). */
  totalTimeMs?: number;
}
