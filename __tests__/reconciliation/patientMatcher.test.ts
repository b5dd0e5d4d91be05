/**
 * Tests for the patient identity matcher
 *
 * Cascade: patient id → exact (first, last) → first name + last-name prefix
 */

import { matchRecords } from '../../src/reconciliation/patientMatcher';
import {
  createPartialNameStrategy,
  exactNameStrategy,
  patientIdStrategy,
} from '../../src/reconciliation/matchStrategies';
import { WYOMING, assessmentRecord, losRecord } from '../helpers/records';

describe('matchRecords', () => {
  // ============================================
  // Rule 1: patient id
  // ============================================

  describe('patient id rule', () => {
    it('should match on equal ids even when names differ', () => {
      const a = [losRecord({ patientId: 'P-100', firstName: 'Jon', lastName: 'Smyth' })];
      const b = [assessmentRecord({ patientId: 'P-100', firstName: 'John', lastName: 'Smith' })];

      const result = matchRecords(a, b, WYOMING);

      expect(result.decisions).toHaveLength(1);
      expect(result.decisions[0].rule).toBe('PATIENT_ID');
      expect(result.identities).toHaveLength(1);
      expect(result.identities[0].matchedBy).toBe('PATIENT_ID');
      expect(result.identities[0].records).toEqual([a[0], b[0]]);
    });

    it('should keep records with different ids apart despite equal names', () => {
      const a = [losRecord({ patientId: 'P-1' })];
      const b = [assessmentRecord({ patientId: 'P-2' })];

      const result = matchRecords(a, b, WYOMING);

      expect(result.decisions).toHaveLength(0);
      expect(result.identities.map((identity) => identity.matchedBy)).toEqual(['UNMATCHED', 'UNMATCHED']);
    });
  });

  // ============================================
  // Rule 2: exact name
  // ============================================

  describe('exact name rule', () => {
    it('should compare names case-insensitively', () => {
      const a = [losRecord({ firstName: 'JOHN', lastName: 'SMITH' })];
      const b = [assessmentRecord({ firstName: 'john', lastName: 'smith' })];

      const result = matchRecords(a, b, WYOMING);

      expect(result.decisions[0].rule).toBe('EXACT_NAME');
    });

    it('should prefer an exact match over an earlier partial candidate', () => {
      const a = [losRecord({ lastName: 'Smithers' })];
      const b = [assessmentRecord({ lastName: 'Smith' }), assessmentRecord({ lastName: 'Smithers' })];

      const result = matchRecords(a, b, WYOMING);

      expect(result.decisions).toHaveLength(1);
      expect(result.decisions[0].rule).toBe('EXACT_NAME');
      expect(result.decisions[0].recordB).toBe(b[1]);
      expect(result.identities).toHaveLength(2);
      expect(result.identities[1].records).toEqual([b[0]]);
    });
  });

  // ============================================
  // Rule 3: partial name
  // ============================================

  describe('partial name rule', () => {
    it('should match the same first name and last-name prefix', () => {
      const a = [losRecord({ lastName: 'Smith' })];
      const b = [assessmentRecord({ lastName: 'Smithers' })];

      const result = matchRecords(a, b, WYOMING);

      expect(result.decisions[0].rule).toBe('PARTIAL_NAME');
      expect(result.decisions[0].candidateCount).toBe(1);
    });

    it('should compare accented surname prefixes letter for letter', () => {
      const a = [losRecord({ firstName: 'Jürgen', lastName: 'Øberg' })];
      const b = [assessmentRecord({ firstName: 'Jürgen', lastName: 'Øbergsen' })];

      const result = matchRecords(a, b, WYOMING);

      expect(result.decisions).toHaveLength(1);
      expect(result.decisions[0].rule).toBe('PARTIAL_NAME');
    });

    it('should count a partial match once when several candidates qualify', () => {
      const a = [losRecord({ lastName: 'Smith' })];
      const b = [assessmentRecord({ lastName: 'Smithers' }), assessmentRecord({ lastName: 'Smithson' })];

      const result = matchRecords(a, b, WYOMING);

      expect(result.decisions).toHaveLength(1);
      expect(result.decisions[0].recordB).toBe(b[0]);
      expect(result.decisions[0].candidateCount).toBe(2);
      expect(result.identities).toHaveLength(2);
      expect(result.identities[0].records).toEqual([a[0], b[0]]);
      expect(result.identities[1]).toMatchObject({ matchedBy: 'UNMATCHED', records: [b[1]] });
    });

    it('should never consume a record twice', () => {
      const a = [losRecord({ lastName: 'Smith' }), losRecord({ lastName: 'Smithson' })];
      const b = [assessmentRecord({ lastName: 'Smithers' })];

      const result = matchRecords(a, b, WYOMING);

      expect(result.decisions).toHaveLength(1);
      expect(result.decisions[0].recordA).toBe(a[0]);
      expect(result.identities).toHaveLength(2);
    });

    it('should require the same first name', () => {
      const a = [losRecord({ firstName: 'John', lastName: 'Smith' })];
      const b = [assessmentRecord({ firstName: 'Joan', lastName: 'Smithers' })];

      expect(matchRecords(a, b, WYOMING).decisions).toHaveLength(0);
    });

    it('should compare last names on letters only', () => {
      const a = [losRecord({ lastName: 'Smith-Jones' })];
      const b = [assessmentRecord({ lastName: 'Smith Jones' })];

      const result = matchRecords(a, b, WYOMING, { partialMatchPrefixLength: 8 });

      expect(result.decisions[0].rule).toBe('PARTIAL_NAME');
    });

    it('should honor a longer configured prefix', () => {
      const a = [losRecord({ lastName: 'Smith' })];
      const b = [assessmentRecord({ lastName: 'Smyth' })];

      expect(matchRecords(a, b, WYOMING, { partialMatchPrefixLength: 2 }).decisions).toHaveLength(1);
      expect(matchRecords(a, b, WYOMING, { partialMatchPrefixLength: 3 }).decisions).toHaveLength(0);
    });
  });

  // ============================================
  // Facility boundary
  // ============================================

  describe('facility boundary', () => {
    it('should discard records of another facility and report them', () => {
      const foreign = assessmentRecord({ facilityKey: 'st joseph care center', facilityLabel: 'St. Joseph' });
      const a = [losRecord()];

      const result = matchRecords(a, [foreign], WYOMING);

      expect(result.decisions).toHaveLength(0);
      expect(result.identities).toHaveLength(1);
      expect(result.issues).toHaveLength(1);
      expect(result.issues[0]).toMatchObject({
        code: 'CROSS_FACILITY_MATCH_ATTEMPT',
        facilityKey: WYOMING,
        extractId: foreign.extractId,
        rowNumber: foreign.rowNumber,
      });
    });
  });

  // ============================================
  // Output shape
  // ============================================

  describe('identities', () => {
    it('should list pairs, then unmatched A, then unmatched B', () => {
      const a = [losRecord({ firstName: 'Ann', lastName: 'Lee' }), losRecord({ firstName: 'Bob', lastName: 'Ray' })];
      const b = [
        assessmentRecord({ firstName: 'Cy', lastName: 'Doe' }),
        assessmentRecord({ firstName: 'Bob', lastName: 'Ray' }),
      ];

      const result = matchRecords(a, b, WYOMING);

      expect(result.identities.map((identity) => identity.id)).toEqual([
        `${WYOMING}#1`,
        `${WYOMING}#2`,
        `${WYOMING}#3`,
      ]);
      expect(result.identities.map((identity) => identity.records)).toEqual([[a[1], b[1]], [a[0]], [b[0]]]);
    });

    it('should give identical output for identical input', () => {
      const a = [losRecord({ lastName: 'Smith' }), losRecord({ firstName: 'Mary', lastName: 'Jones' })];
      const b = [assessmentRecord({ firstName: 'Mary', lastName: 'Jones' }), assessmentRecord({ lastName: 'Smithers' })];

      expect(matchRecords(a, b, WYOMING)).toEqual(matchRecords(a, b, WYOMING));
    });

    it('should return nothing for two empty sources', () => {
      expect(matchRecords([], [], WYOMING)).toEqual({ identities: [], decisions: [], issues: [] });
    });
  });
});

describe('match strategies', () => {
  it('should not match on a missing patient id', () => {
    expect(patientIdStrategy.matches(losRecord(), assessmentRecord())).toBe(false);
  });

  it('should not match blank names exactly', () => {
    expect(exactNameStrategy.matches(losRecord({ firstName: '' }), assessmentRecord({ firstName: '' }))).toBe(false);
  });

  it('should reject a prefix length below one', () => {
    expect(() => createPartialNameStrategy(0)).toThrow(RangeError);
  });
});
