/**
 * Patient Match Strategies
 *
 * The matching cascade is an ordered list of these strategies. Each one is a
 * yes/no rule over a pair of records from the same facility; the matcher
 * owns ordering, consumption and tie-breaks.
 */

import { DEFAULT_PARTIAL_MATCH_PREFIX_LENGTH } from './constants';
import { fullNameKey, nameKey, surnameLetters } from './personName';
import type { MatchRule, PatientRecord } from './types';

export interface MatchStrategy {
  readonly rule: MatchRule;
  matches(a: PatientRecord, b: PatientRecord): boolean;
}

/**
 * Two records carrying different patient ids are different patients,
 * whatever their names say.
 */
const idsConflict = (a: PatientRecord, b: PatientRecord): boolean =>
  a.patientId !== undefined && b.patientId !== undefined && a.patientId !== b.patientId;

/**
 * Rule 1: exact patient id equality, when both records have one.
 */
export const patientIdStrategy: MatchStrategy = {
  rule: 'PATIENT_ID',
  matches: (a, b) => a.patientId !== undefined && a.patientId === b.patientId,
};

/**
 * Rule 2: case-insensitive equality of first and last name.
 */
export const exactNameStrategy: MatchStrategy = {
  rule: 'EXACT_NAME',
  matches: (a, b) => {
    if (idsConflict(a, b)) return false;
    const keyA = fullNameKey(a.firstName, a.lastName);
    return keyA !== null && keyA === fullNameKey(b.firstName, b.lastName);
  },
};

/**
 * Rule 3: same first name and same first `prefixLength` letters of the
 * last name.
 *
 * @example
 * createPartialNameStrategy(3).matches(johnSmith, johnSmithers) // true
 */
export function createPartialNameStrategy(
  prefixLength: number = DEFAULT_PARTIAL_MATCH_PREFIX_LENGTH
): MatchStrategy {
  if (!Number.isInteger(prefixLength) || prefixLength < 1) {
    throw new RangeError(`Partial match prefix length must be a positive integer, got ${prefixLength}`);
  }

  return {
    rule: 'PARTIAL_NAME',
    matches: (a, b) => {
      if (idsConflict(a, b)) return false;

      const firstA = nameKey(a.firstName);
      if (!firstA || firstA !== nameKey(b.firstName)) return false;

      const prefixA = surnameLetters(a.lastName).slice(0, prefixLength);
      return prefixA.length > 0 && prefixA === surnameLetters(b.lastName).slice(0, prefixLength);
    },
  };
}

/**
 * The standard cascade: patient id, then exact name, then partial name.
 */
export function defaultMatchStrategies(
  partialMatchPrefixLength: number = DEFAULT_PARTIAL_MATCH_PREFIX_LENGTH
): readonly MatchStrategy[] {
  return [patientIdStrategy, exactNameStrategy, createPartialNameStrategy(partialMatchPrefixLength)];
}
