/**
 * Constants for the Facility Reconciliation Engine
 */

import type { ExtractKind } from './types';

// ============================================
// FACILITY LABELS
// ============================================

/**
 * Trailing legal-entity tokens removed from facility labels.
 */
export const LEGAL_SUFFIXES: ReadonlySet<string> = new Set([
  'llc',
  'inc',
  'incorporated',
  'corp',
  'corporation',
  'ltd',
  'lp',
  'llp',
  'pllc',
  'pc',
]);

/**
 * Trailing care-type tokens ("Medilodge of Wyoming - SNF").
 */
export const CARE_TYPE_SUFFIXES: ReadonlySet<string> = new Set(['snf']);

/**
 * Whole-word abbreviation rewrites applied before punctuation is dropped.
 * Order matters: "sainte" must be seen before "saint".
 */
export const ABBREVIATION_REWRITES: ReadonlyArray<readonly [RegExp, string]> = [
  [/\bsainte\b/g, 'ste'],
  [/\bste\./g, 'ste'],
  [/\bsaint\b/g, 'st'],
  [/\bst\./g, 'st'],
  [/\bmount\b/g, 'mt'],
  [/\bmt\./g, 'mt'],
];

/**
 * Display forms restored by formatFacilityDisplayName.
 */
export const DISPLAY_ABBREVIATIONS: Readonly<Record<string, string>> = {
  st: 'St.',
  ste: 'Ste.',
  mt: 'Mt.',
};

/**
 * Words kept lower-case in display names unless they lead the name.
 */
export const DISPLAY_MINOR_WORDS: ReadonlySet<string> = new Set(['of', 'and', 'the', 'at', 'on']);

/**
 * Filename tokens that name the extract rather than the facility
 * ("ADT Medilodge of Wyoming_cycles.csv").
 */
export const FILENAME_KIND_TAGS: Readonly<Record<ExtractKind, readonly string[]>> = {
  ADT: ['adt', 'cycles'],
  LOS: ['los', 'length of stay'],
  CHARGE_CAPTURE: ['charge capture', 'charges', 'visits', 'cpt'],
  FUNCTIONAL_ASSESSMENT: ['gg', 'functional assessment', 'assessment'],
};

// ============================================
// MATCHING
// ============================================

/**
 * Letters of the last name compared by the partial-name rule.
 */
export const DEFAULT_PARTIAL_MATCH_PREFIX_LENGTH = 3;

/**
 * Minimum Jaro-Winkler similarity (0-1) for naming a known facility as
 * the likely intent of an unresolved label. Advisory only.
 */
export const FACILITY_SUGGESTION_THRESHOLD = 0.85;

// ============================================
// PAYERS
// ============================================

/**
 * Order in which extract kinds are consulted for a patient's payer type.
 */
export const PAYER_SOURCE_PRECEDENCE: readonly ExtractKind[] = [
  'LOS',
  'FUNCTIONAL_ASSESSMENT',
  'CHARGE_CAPTURE',
  'ADT',
];
