/** Keys of the response envelope returned by Open Context search/query URLs. */
export const RESPONSE_KEYS = {
  RESULTS: 'oc-api:has-results',
  FACETS: 'oc-api:has-facets',
  DEFINED_BY: 'rdfs:isDefinedBy',
} as const;

/** Facet option groups that describe identifiers and text values. */
export const TEXT_FACET_OPTION_KEYS = ['oc-api:has-id-options', 'oc-api:has-text-options'] as const;

/**
 * Facet option groups for non-text values. `has-numeric-options` is the
 * current API; the typed groups are the ones replacing it.
 */
export const NON_TEXT_FACET_OPTION_KEYS = [
  'oc-api:has-numeric-options',
  'oc-api:has-boolean-options',
  'oc-api:has-integer-options',
  'oc-api:has-float-options',
  'oc-api:has-date-options',
] as const;

export const FACET_OPTION_KEYS = [...TEXT_FACET_OPTION_KEYS, ...NON_TEXT_FACET_OPTION_KEYS] as const;

/** Definition URI prefixes for attributes defined inside Open Context itself. */
export const INTERNAL_DEFINITION_PREFIXES = [
  'oc-gen:',
  'oc-api:',
  'http://opencontext.org',
  'https://opencontext.org',
] as const;

/** Facets for linked-data ("standard") attributes. */
export const LINKED_DATA_FACET_PREFIX = 'oc-api:facet-prop-ld';

/** Facets for project-defined attributes. */
export const PROJECT_VARIABLE_FACET = 'oc-api:facet-prop-var';

export const PREDICATE_NAMESPACE = 'http://opencontext.org/predicates/';

export const ZOOARCH_VOCAB_NAMESPACE = 'http://opencontext.org/vocabularies/open-context-zooarch/';

/**
 * Slug prefixes of biological taxonomies (GBIF, EOL). Their hierarchies are
 * deep and they are values, not attributes.
 */
export const NON_ATTRIBUTE_SLUG_PREFIXES = ['gbif-', 'eol-p-'] as const;

/** Property filter that makes von den Driesch bone measurements show up as facets. */
export const VON_DEN_DRIESCH_PROP = 'oc-zoo-anatomical-meas---oc-zoo-von-den-driesch-bone-meas';

/** Parameters that may legitimately appear more than once in one URL. */
export const REPEATABLE_PARAMS = ['prop'] as const;

/** Record key holding the "/"-delimited context path. */
export const CONTEXT_PATH_KEY = 'context label';

export function contextColumnName(depth: number): string {
  return `Context (${depth})`;
}

/** Columns expected on every search result record, in display order. */
export const DEFAULT_FIRST_COLUMNS = [
  'uri',
  'citation uri',
  'label',
  'item category',
  'project label',
  'project uri',
  'published',
  'updated',
  'latitude',
  'longitude',
  'early bce/ce',
  'late bce/ce',
  'context uri',
] as const;

/**
 * Bone fusion reads best as one presence column per fusion state.
 */
export const DEFAULT_MULTI_VALUE_OVERRIDES: Readonly<Record<string, string>> = {
  'Has fusion character': 'column_val',
};
