/**
 * Facet Attribute Service — Which Attributes Are Worth Requesting
 * Layer: Application
 *
 * A search response lists facets (filterable fields) with option groups and
 * counts. Two questions can be answered from them before fetching records:
 *
 *   standardAttributes() — attributes defined outside Open Context's own
 *     vocabulary (linked-data "standards", plus the zooarchaeology vocabulary),
 *     which are shared across projects.
 *   commonAttributes()   — project-defined attributes (predicates) used by at
 *     least `minPortion` of the matching records.
 *
 * Both return null when the fetch fails, and [] when nothing matched, so a
 * caller can tell "no data" from "zero matches". Results are unique
 * (slug, label) pairs in first-seen order.
 */
import type { ClientOptions } from '@core/clientOptions';
import type { Logger } from '@core/logger';
import { TOKENS } from '@core/types';
import type { Facet, FacetOption, SearchPage } from '@domain/entities/SearchPage';
import {
  FACET_OPTION_KEYS,
  INTERNAL_DEFINITION_PREFIXES,
  LINKED_DATA_FACET_PREFIX,
  NON_ATTRIBUTE_SLUG_PREFIXES,
  PREDICATE_NAMESPACE,
  PROJECT_VARIABLE_FACET,
  RESPONSE_KEYS,
  VON_DEN_DRIESCH_PROP,
  ZOOARCH_VOCAB_NAMESPACE,
} from '@shared/constants';
import { FetchFailure } from '@shared/errors/AppError';
import type { QueryParams, SlugLabel } from '@shared/types';
import { inject, injectable } from 'tsyringe';

import { ApiClient } from './ApiClient';
import { parseSearchPage } from './PaginationWalker';

/** True when a facet's definition URI marks its attributes as "standard". */
export function isStandardFacet(definitionUri: string): boolean {
  const internal = INTERNAL_DEFINITION_PREFIXES.some((prefix) => definitionUri.startsWith(prefix));
  return (
    !internal ||
    definitionUri.startsWith(LINKED_DATA_FACET_PREFIX) ||
    definitionUri.startsWith(ZOOARCH_VOCAB_NAMESPACE)
  );
}

/** True when a facet groups project-defined attributes (predicates). */
export function isProjectAttributeFacet(definitionUri: string): boolean {
  return definitionUri === PROJECT_VARIABLE_FACET || definitionUri.startsWith(PREDICATE_NAMESPACE);
}

/** Collects unique (slug, label) pairs, keeping first-seen order. */
class SlugLabelSet {
  private seen = new Set<string>();
  readonly items: SlugLabel[] = [];

  add(slug: string, label: string): void {
    const key = JSON.stringify([slug, label]);
    if (this.seen.has(key)) return;
    this.seen.add(key);
    this.items.push({ slug, label });
  }
}

/** Every (facet, option) pair across the recognized option groups. */
function* facetOptions(page: SearchPage): Generator<[Facet, FacetOption]> {
  for (const facet of page[RESPONSE_KEYS.FACETS]) {
    for (const key of FACET_OPTION_KEYS) {
      const options = facet[key];
      if (!options) continue;
      for (const option of options) {
        yield [facet, option];
      }
    }
  }
}

@injectable()
export class FacetAttributeService {
  constructor(
    @inject(TOKENS.ApiClient) private api: ApiClient,
    @inject(TOKENS.ClientOptions) private options: ClientOptions,
    @inject(TOKENS.Logger) private log: Logger,
  ) {}

  async standardAttributes(url: string, includeBoneMeasures = false): Promise<SlugLabel[] | null> {
    const params: QueryParams = includeBoneMeasures ? { prop: VON_DEN_DRIESCH_PROP } : {};
    const page = await this.fetchPage(url, params);
    if (!page) return null;

    const found = new SlugLabelSet();
    if (page.totalResults < 1) return found.items;

    for (const [facet, option] of facetOptions(page)) {
      const definitionUri = facet[RESPONSE_KEYS.DEFINED_BY];
      if (!definitionUri || !isStandardFacet(definitionUri)) continue;
      if (!option.slug || !option.label) continue;

      const slug = option.slug;
      if (NON_ATTRIBUTE_SLUG_PREFIXES.some((prefix) => slug.startsWith(prefix))) continue;

      found.add(slug, option.label);
    }
    return found.items;
  }

  async commonAttributes(url: string, minPortion?: number): Promise<SlugLabel[] | null> {
    const page = await this.fetchPage(url, {});
    if (!page) return null;

    const found = new SlugLabelSet();
    if (page.totalResults < 1) return found.items;

    const threshold = page.totalResults * (minPortion ?? this.options.commonMinPortion);

    for (const [facet, option] of facetOptions(page)) {
      const definitionUri = facet[RESPONSE_KEYS.DEFINED_BY] ?? '';
      if (!isProjectAttributeFacet(definitionUri)) continue;
      if (!option.slug || !option.label) continue;

      const optionUri = option[RESPONSE_KEYS.DEFINED_BY] ?? '';
      if (!optionUri.startsWith(PREDICATE_NAMESPACE)) continue;
      if ((option.count ?? 0) < threshold) continue;

      found.add(option.slug, option.label);
    }
    return found.items;
  }

  /** The first page of a query, or null when it could not be fetched. */
  private async fetchPage(url: string, params: QueryParams): Promise<SearchPage | null> {
    try {
      const payload = await this.api.getJson(url, params);
      return parseSearchPage(payload, url);
    } catch (err) {
      if (!(err instanceof FetchFailure)) throw err;
      this.log.warn({ url: err.url, reason: err.message }, 'Attribute discovery fetch failed');
      return null;
    }
  }
}
