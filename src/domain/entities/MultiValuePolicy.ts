/**
 * Multi-Value Policy — How a Multi-Valued Attribute Becomes One Cell
 * Layer: Domain
 *
 * Open Context lets an attribute carry several values per record (that is how
 * contributors describe their observations), but a table wants one value per
 * cell. A policy decides how a list collapses:
 *
 *   first      — keep the first value
 *   last       — keep the last value
 *   json       — the whole list as a JSON string
 *   concat     — values joined with a delimiter (default "; ")
 *   column_val — one column per value, named "{key} :: {value}", set to true
 *
 * Policy names come from configuration as strings and are resolved into this
 * tagged union once, so record processing never dispatches on raw strings.
 */
import { ConfigurationError } from '@shared/errors/AppError';

export const MULTI_VALUE_POLICY_NAMES = ['first', 'last', 'json', 'concat', 'column_val'] as const;

export type MultiValuePolicyName = (typeof MULTI_VALUE_POLICY_NAMES)[number];

export type MultiValuePolicy =
  | { kind: 'first' }
  | { kind: 'last' }
  | { kind: 'json' }
  | { kind: 'concat'; delimiter: string }
  | { kind: 'column_val' };

export const DEFAULT_MULTI_VALUE_DELIMITER = '; ';

function isPolicyName(name: string): name is MultiValuePolicyName {
  const names: readonly string[] = MULTI_VALUE_POLICY_NAMES;
  return names.includes(name);
}

export function parseMultiValuePolicy(
  name: string,
  delimiter: string = DEFAULT_MULTI_VALUE_DELIMITER,
): MultiValuePolicy {
  if (!isPolicyName(name)) {
    throw new ConfigurationError(
      `Unknown multi-value handling: ${name} must be one of: ${MULTI_VALUE_POLICY_NAMES.join(', ')}`,
    );
  }
  switch (name) {
    case 'concat':
      return { kind: 'concat', delimiter };
    default:
      return { kind: name };
  }
}

/** Resolves a key → policy-name table, failing on the first unknown name. */
export function parseMultiValueOverrides(
  overrides: Readonly<Record<string, string>>,
  delimiter: string = DEFAULT_MULTI_VALUE_DELIMITER,
): ReadonlyMap<string, MultiValuePolicy> {
  return new Map(
    Object.entries(overrides).map(([key, name]) => [key, parseMultiValuePolicy(name, delimiter)]),
  );
}
