/**
 * Facility Identity Normalizer
 *
 * Extracts name the same building differently:
 * - "Medilodge of Wyoming (M)"           → "medilodge of wyoming"
 * - "Medilodge of Wyoming - SNF, LLC"    → "medilodge of wyoming"
 * - "Saint Joseph Care Center Q3 2025"   → "st joseph care center"
 *
 * Normalization is rule-based only. Two labels share a key when the rules
 * make them identical, never because they look alike.
 */

import {
  ABBREVIATION_REWRITES,
  CARE_TYPE_SUFFIXES,
  DISPLAY_ABBREVIATIONS,
  DISPLAY_MINOR_WORDS,
  FILENAME_KIND_TAGS,
  LEGAL_SUFFIXES,
} from './constants';
import type { ExtractKind, FacilityKey } from './types';

const QUARTER_TOKEN = /^q[1-4]$/;
const QUARTER_NUMBER = /^[1-4]$/;
const YEAR_TOKEN = /^(19|20)\d{2}$/;

const collapseWhitespace = (value: string): string => value.replace(/\s+/g, ' ').trim();

/**
 * Drops trailing legal, care-type and reporting-period tokens. At least one
 * token is always left so a label is never reduced to nothing by suffix rules.
 */
function stripTrailingTokens(tokens: string[]): string[] {
  const result = [...tokens];
  let strippedPeriod = false;

  while (result.length > 1) {
    const last = result[result.length - 1];
    const previous = result[result.length - 2];

    if (LEGAL_SUFFIXES.has(last) || CARE_TYPE_SUFFIXES.has(last)) {
      result.pop();
      continue;
    }
    if (QUARTER_TOKEN.test(last)) {
      result.pop();
      strippedPeriod = true;
      continue;
    }
    if (QUARTER_NUMBER.test(last) && previous === 'quarter' && result.length > 2) {
      result.splice(-2, 2);
      strippedPeriod = true;
      continue;
    }
    if (YEAR_TOKEN.test(last) && (strippedPeriod || QUARTER_TOKEN.test(previous) || previous === 'quarter')) {
      result.pop();
      strippedPeriod = true;
      continue;
    }
    break;
  }

  return result;
}

/**
 * Canonicalizes a raw facility label into a FacilityKey.
 *
 * Steps:
 * 1. Lower-case, drop parenthetical tags ("(M)")
 * 2. Rewrite Saint/St./Mount/Mt. variants to "st"/"ste"/"mt"
 * 3. Replace punctuation and separators with spaces
 * 4. Drop trailing LLC/Inc, SNF and quarter tokens ("Q3", "Quarter 2", "Q3 2025")
 *
 * A label the rules reduce to nothing is kept verbatim (trimmed, lower-cased)
 * as its own key. Never throws.
 *
 * @example
 * normalizeFacilityLabel("Medilodge of Wyoming - SNF, LLC") // "medilodge of wyoming"
 * normalizeFacilityLabel("(M)")                             // "(m)"
 */
export function normalizeFacilityLabel(raw: string): FacilityKey {
  const verbatim = collapseWhitespace(raw.toLowerCase());

  let working = verbatim.replace(/\([^)]*\)/g, ' ');
  for (const [pattern, replacement] of ABBREVIATION_REWRITES) {
    working = working.replace(pattern, replacement);
  }
  working = working.replace(/['’]/g, '').replace(/[^a-z0-9]+/g, ' ');

  const tokens = stripTrailingTokens(working.split(' ').filter((token) => token.length > 0));
  const key = tokens.join(' ');

  return key.length > 0 ? key : verbatim;
}

/**
 * Human-readable name for a key: title case, with St./Ste./Mt. restored.
 * Feeding the result back through normalizeFacilityLabel yields the same key.
 *
 * @example
 * formatFacilityDisplayName("st joseph care center") // "St. Joseph Care Center"
 */
export function formatFacilityDisplayName(key: FacilityKey): string {
  return key
    .split(' ')
    .filter((word) => word.length > 0)
    .map((word, index) => {
      const abbreviation = DISPLAY_ABBREVIATIONS[word];
      if (abbreviation) return abbreviation;
      if (index > 0 && DISPLAY_MINOR_WORDS.has(word)) return word;
      return word.charAt(0).toUpperCase() + word.slice(1);
    })
    .join(' ');
}

/**
 * Recovers the facility label from an upload filename by removing the
 * extension and the tokens that name the extract kind.
 *
 * @example
 * facilityLabelFromFilename("ADT Medilodge of Wyoming_cycles.csv", "ADT") // "Medilodge of Wyoming"
 */
export function facilityLabelFromFilename(filename: string, kind: ExtractKind): string {
  const base = filename.replace(/^.*[\\/]/, '').replace(/\.[^.]+$/, '');
  let label = ` ${base.replace(/[_]+/g, ' ')} `;

  for (const tag of FILENAME_KIND_TAGS[kind]) {
    const pattern = new RegExp(`[\\s-]${tag.replace(/\s+/g, '[\\s_-]+')}(?=[\\s-])`, 'gi');
    label = label.replace(pattern, ' ');
  }

  return collapseWhitespace(label.replace(/^[\s-]+|[\s-]+$/g, ''));
}
