/**
 * Response Cache Interface
 * Layer: Domain
 *
 * Durable storage for API payloads, one entry per request identity (see
 * cacheKey.ts for how names are derived). Entries never expire on their own;
 * eviction is explicit and scoped by the active prefix.
 */
export interface IResponseCache {
  /** Prefix every entry name built from now on starts with. */
  readonly prefix: string;

  /** Replaces the prefix with a slug of the given text. */
  setPrefix(text: string): void;

  /** The cached payload, or undefined on any miss (absent, unreadable, malformed). */
  read(name: string): Promise<unknown>;

  /** Stores (or overwrites) a payload. */
  write(name: string, payload: unknown): Promise<void>;

  /**
   * keepPrefix=true deletes entries NOT starting with the prefix;
   * keepPrefix=false deletes those that do. Returns how many were deleted.
   */
  clear(keepPrefix: boolean): Promise<number>;
}
