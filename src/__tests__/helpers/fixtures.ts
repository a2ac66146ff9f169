/**
 * Test Fixtures — Synthetic Search Responses
 * Layer: Test Helpers
 *
 * Made-up pages shaped like Open Context search responses. Hosts are
 * example.org placeholders; nothing here is ever fetched.
 */
import { RESPONSE_KEYS } from '@shared/constants';

export const SEARCH_URL = 'https://oc.example.org/query/?type=subjects';
export const PAGE_2_URL = 'https://oc.example.org/query/?type=subjects&start=2';
export const PAGE_3_URL = 'https://oc.example.org/query/?type=subjects&start=4';

interface PageInit {
  startIndex: number;
  totalResults: number;
  itemsPerPage?: number;
  next?: string;
  results?: Record<string, unknown>[];
  facets?: Record<string, unknown>[];
}

export function makePage(init: PageInit): Record<string, unknown> {
  return {
    id: SEARCH_URL,
    totalResults: init.totalResults,
    startIndex: init.startIndex,
    itemsPerPage: init.itemsPerPage ?? 2,
    ...(init.next !== undefined && { next: init.next }),
    [RESPONSE_KEYS.RESULTS]: init.results ?? [],
    [RESPONSE_KEYS.FACETS]: init.facets ?? [],
  };
}

/** Five records over three pages: 2 + 2 + 1. */
export const threePages: Record<string, Record<string, unknown>> = {
  [SEARCH_URL]: makePage({
    startIndex: 0,
    totalResults: 5,
    next: PAGE_2_URL,
    results: [
      { uri: 'https://oc.example.org/subjects/r1', label: 'Bone 1' },
      { uri: 'https://oc.example.org/subjects/r2', label: 'Bone 2' },
    ],
  }),
  [PAGE_2_URL]: makePage({
    startIndex: 2,
    totalResults: 5,
    next: PAGE_3_URL,
    results: [
      { uri: 'https://oc.example.org/subjects/r3', label: 'Bone 3' },
      { uri: 'https://oc.example.org/subjects/r4', label: 'Bone 4' },
    ],
  }),
  [PAGE_3_URL]: makePage({
    startIndex: 4,
    totalResults: 5,
    results: [{ uri: 'https://oc.example.org/subjects/r5', label: 'Bone 5' }],
  }),
};

/**
 * A facets-only page with 100 matching records:
 *   - a linked-data facet with a standard slug, a GBIF slug and a duplicate
 *   - a zooarchaeology vocabulary facet
 *   - an internal oc-gen facet (never standard)
 *   - a project-variable facet with predicates at counts 20, 19 and 45
 *   - a facet defined by a predicate URI, with one option at count 60
 */
export const facetsPage = makePage({
  startIndex: 0,
  totalResults: 100,
  facets: [
    {
      id: '#facet-prop-ld',
      label: 'Descriptions (Common Standards)',
      [RESPONSE_KEYS.DEFINED_BY]: 'oc-api:facet-prop-ld',
      'oc-api:has-id-options': [
        { slug: 'obo-uberon-0001474', label: 'Has anatomical identification', count: 80 },
        { slug: 'gbif-1', label: 'Biota', count: 70 },
        { slug: 'obo-uberon-0001474', label: 'Has anatomical identification', count: 80 },
      ],
    },
    {
      id: '#facet-zooarch',
      label: 'Zooarchaeology',
      [RESPONSE_KEYS.DEFINED_BY]:
        'http://opencontext.org/vocabularies/open-context-zooarch/fusion-characterization',
      'oc-api:has-text-options': [
        { slug: 'oc-zoo-has-fusion-char', label: 'Has fusion character', count: 30 },
      ],
    },
    {
      id: '#facet-item-type',
      label: 'Item type',
      [RESPONSE_KEYS.DEFINED_BY]: 'oc-gen:item-type',
      'oc-api:has-id-options': [{ slug: 'subjects', label: 'Subjects', count: 100 }],
    },
    {
      id: '#facet-prop-var',
      label: 'Descriptions (Project Defined)',
      [RESPONSE_KEYS.DEFINED_BY]: 'oc-api:facet-prop-var',
      'oc-api:has-numeric-options': [
        {
          slug: 'proj-a-length',
          label: 'Length',
          count: 20,
          [RESPONSE_KEYS.DEFINED_BY]: 'http://opencontext.org/predicates/aaa-1',
        },
        {
          slug: 'proj-a-width',
          label: 'Width',
          count: 19,
          [RESPONSE_KEYS.DEFINED_BY]: 'http://opencontext.org/predicates/aaa-2',
        },
      ],
      'oc-api:has-text-options': [
        {
          slug: 'proj-a-phase',
          label: 'Phase',
          count: 45,
          [RESPONSE_KEYS.DEFINED_BY]: 'http://opencontext.org/predicates/aaa-3',
        },
        {
          slug: 'proj-a-note',
          label: 'Note',
          count: 90,
          [RESPONSE_KEYS.DEFINED_BY]: 'http://opencontext.org/types/not-a-predicate',
        },
      ],
    },
    {
      id: '#facet-pred-bone-type',
      label: 'Bone type',
      [RESPONSE_KEYS.DEFINED_BY]: 'http://opencontext.org/predicates/abc',
      'oc-api:has-id-options': [
        {
          slug: 'proj-a-bone-type',
          label: 'Bone type',
          count: 60,
          [RESPONSE_KEYS.DEFINED_BY]: 'http://opencontext.org/predicates/aaa-4',
        },
      ],
    },
  ],
});

/** Three records exercising context paths, multi-values and type inference. */
export const tablePage = makePage({
  startIndex: 0,
  totalResults: 3,
  itemsPerPage: 3,
  results: [
    {
      uri: 'https://oc.example.org/subjects/t1',
      label: 'Bone A',
      'context label': 'Site/Trench 1/Locus 4',
      updated: '2024-03-01T10:00:00Z',
      'Has taxonomic identifier': ['Ovis aries', 'Capra hircus'],
      'Length (mm)': ['12.5', '13'],
      count: 3,
      'Has fusion character': ['proximal fused', 'distal unfused'],
    },
    {
      uri: 'https://oc.example.org/subjects/t2',
      label: 'Bone B',
      'context label': 'Site/Trench 2',
      updated: '2024-03-02T10:00:00Z',
      'Has taxonomic identifier': 'Ovis aries',
      count: 4,
    },
    {
      uri: 'https://oc.example.org/subjects/t3',
      label: 'Bone C',
      'context label': 'Site',
      updated: '2024-03-03T10:00:00Z',
      'Has taxonomic identifier': 'Ovis aries',
      'Length (mm)': 9.25,
      count: 5,
    },
  ],
});
