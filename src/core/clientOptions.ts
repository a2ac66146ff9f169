/**
 * Client Options — Immutable Per-Process Settings for the API Client
 * Layer: Core
 *
 * config.ts reads the environment; this module turns those raw settings into
 * the frozen ClientOptions value every service receives through the
 * container. Multi-value policy names are resolved here, so an unknown name
 * fails at startup with a ConfigurationError rather than halfway through a
 * table build.
 *
 * Tests call `createClientOptions({ ...overrides })` directly and never touch
 * the environment-derived settings.
 */
import {
  DEFAULT_MULTI_VALUE_DELIMITER,
  type MultiValuePolicy,
  parseMultiValueOverrides,
  parseMultiValuePolicy,
} from '@domain/entities/MultiValuePolicy';
import { DEFAULT_MULTI_VALUE_OVERRIDES } from '@shared/constants';
import { slugify } from '@shared/slug';

import { config } from './config';

export interface ClientSettings {
  cacheDir: string;
  /** Slugified; defaults to the current local date, YYYY-MM-DD. */
  cachePrefix?: string;
  recsPerRequest: number;
  pacingMs: number;
  responseTypes: readonly string[];
  flattenAttributes: boolean;
  numberPolicy: string;
  nonNumberPolicy: string;
  delimiter: string;
  /** Merged over DEFAULT_MULTI_VALUE_OVERRIDES. */
  overrides: Readonly<Record<string, string>>;
  commonMinPortion: number;
}

export interface MultiValueOptions {
  readonly numberPolicy: MultiValuePolicy;
  readonly nonNumberPolicy: MultiValuePolicy;
  readonly overrides: ReadonlyMap<string, MultiValuePolicy>;
}

export interface ClientOptions {
  readonly cacheDir: string;
  readonly cachePrefix: string;
  readonly recsPerRequest: number;
  readonly pacingMs: number;
  readonly responseTypes: readonly string[];
  readonly flattenAttributes: boolean;
  readonly multiValue: MultiValueOptions;
  readonly commonMinPortion: number;
}

export const DEFAULT_CLIENT_SETTINGS: Readonly<ClientSettings> = {
  cacheDir: './oc-api-cache',
  recsPerRequest: 200,
  pacingMs: 250,
  responseTypes: ['metadata', 'uri-meta'],
  flattenAttributes: false,
  numberPolicy: 'first',
  nonNumberPolicy: 'concat',
  delimiter: DEFAULT_MULTI_VALUE_DELIMITER,
  overrides: {},
  commonMinPortion: 0.2,
};

export function datePrefix(date: Date): string {
  const month = String(date.getMonth() + 1).padStart(2, '0');
  const day = String(date.getDate()).padStart(2, '0');
  return `${date.getFullYear()}-${month}-${day}`;
}

export function createClientOptions(
  settings: Partial<ClientSettings> = {},
  today: Date = new Date(),
): ClientOptions {
  const merged: ClientSettings = { ...DEFAULT_CLIENT_SETTINGS, ...settings };
  const { delimiter } = merged;

  return Object.freeze({
    cacheDir: merged.cacheDir,
    cachePrefix: merged.cachePrefix ? slugify(merged.cachePrefix) : datePrefix(today),
    recsPerRequest: merged.recsPerRequest,
    pacingMs: merged.pacingMs,
    responseTypes: Object.freeze([...merged.responseTypes]),
    flattenAttributes: merged.flattenAttributes,
    multiValue: Object.freeze({
      numberPolicy: parseMultiValuePolicy(merged.numberPolicy, delimiter),
      nonNumberPolicy: parseMultiValuePolicy(merged.nonNumberPolicy, delimiter),
      overrides: parseMultiValueOverrides(
        { ...DEFAULT_MULTI_VALUE_OVERRIDES, ...merged.overrides },
        delimiter,
      ),
    }),
    commonMinPortion: merged.commonMinPortion,
  });
}

/** Settings as read from the environment by config.ts. */
export function settingsFromConfig(): ClientSettings {
  return {
    cacheDir: config.cache.dir,
    cachePrefix: config.cache.prefix,
    recsPerRequest: config.api.recsPerRequest,
    pacingMs: config.api.pacingMs,
    responseTypes: config.api.responseTypes,
    flattenAttributes: config.api.flattenAttributes,
    numberPolicy: config.multiValue.numberPolicy,
    nonNumberPolicy: config.multiValue.nonNumberPolicy,
    delimiter: config.multiValue.delimiter,
    overrides: config.multiValue.overrides,
    commonMinPortion: config.attributes.commonMinPortion,
  };
}
