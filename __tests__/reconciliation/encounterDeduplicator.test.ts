/**
 * Tests for gross / unique encounter counting across overlapping batches
 */

import { deduplicateEncounters, periodOf } from '../../src/reconciliation/encounterDeduplicator';
import { categoryFilter } from '../../src/reconciliation/metricsAggregator';
import type { ChargeCaptureRecord } from '../../src/reconciliation';
import { testConfig } from '../helpers/config';
import { WYOMING, chargeRecord, utcDate } from '../helpers/records';

const ltcCategory = testConfig.categories[0];
const isLtc = categoryFilter(ltcCategory);

/**
 * `count` visits for resident n, on consecutive days from `firstDay`
 */
const visitsFor = (n: number, count: number, extractId: string, firstDay: string): ChargeCaptureRecord[] =>
  Array.from({ length: count }, (_, index) => {
    const date = utcDate(firstDay);
    date.setUTCDate(date.getUTCDate() + index);
    return chargeRecord({
      extractId,
      firstName: `Resident${n}`,
      lastName: `Family${n}`,
      encounterDate: date,
      placeOfServiceCode: '32',
    });
  });

const range = (from: number, to: number): number[] =>
  Array.from({ length: to - from + 1 }, (_, index) => from + index);

describe('deduplicateEncounters', () => {
  // ============================================
  // Overlapping monthly extracts
  // ============================================

  describe('Medilodge of Wyoming LTC encounters', () => {
    // August: residents 1-13 twice, 14-20 once (33 rows)
    const august = [
      ...range(1, 13).flatMap((n) => visitsFor(n, 2, 'aug', '2025-08-04')),
      ...range(14, 20).flatMap((n) => visitsFor(n, 1, 'aug', '2025-08-11')),
      // Office visits do not qualify
      ...visitsFor(27, 3, 'aug', '2025-08-05').map((record) => ({ ...record, placeOfServiceCode: '11' })),
    ];
    // September export overlaps: residents 11-26 twice (32 rows)
    const september = range(11, 26).flatMap((n) => visitsFor(n, 2, 'sep', '2025-08-25'));

    it('should count 65 gross encounters for 26 unique residents', () => {
      const result = deduplicateEncounters(WYOMING, [august, september], isLtc);

      expect(result.grossCount).toBe(65);
      expect(result.uniquePatientCount).toBe(26);
    });

    it('should emit one encounter per resident and period', () => {
      const result = deduplicateEncounters(WYOMING, [august, september], isLtc);
      const resident11 = result.identities.find((identity) => identity.records[0].firstName === 'Resident11');

      const periods = result.encounters
        .filter((encounter) => encounter.identityId === resident11?.id)
        .map((encounter) => encounter.period);

      // Aug 4-5 in August; Aug 25-26 again in the September file
      expect(periods).toEqual(['2025-08']);
      expect(result.encounters.every((encounter) => encounter.facilityKey === WYOMING)).toBe(true);
    });

    it('should bucket encounters by quarter when asked', () => {
      const result = deduplicateEncounters(WYOMING, [august, september], isLtc, { reportingPeriod: 'quarter' });

      expect(new Set(result.encounters.map((encounter) => encounter.period))).toEqual(new Set(['2025-Q3']));
      expect(result.encounters).toHaveLength(26);
    });
  });

  // ============================================
  // Counting properties
  // ============================================

  describe('counting properties', () => {
    it('should return 0 and 0 when nothing qualifies', () => {
      const officeOnly = visitsFor(1, 2, 'aug', '2025-08-04').map((record) => ({ ...record, placeOfServiceCode: '11' }));

      const result = deduplicateEncounters(WYOMING, [officeOnly], isLtc);

      expect(result.grossCount).toBe(0);
      expect(result.uniquePatientCount).toBe(0);
      expect(result.encounters).toEqual([]);
    });

    it('should return 0 and 0 for no batches', () => {
      const result = deduplicateEncounters(WYOMING, [], isLtc);

      expect([result.grossCount, result.uniquePatientCount]).toEqual([0, 0]);
    });

    it('should add up over disjoint patient sets', () => {
      const groupA = [range(1, 4).flatMap((n) => visitsFor(n, 3, 'aug', '2025-08-04'))];
      const groupB = [range(5, 7).flatMap((n) => visitsFor(n, 2, 'aug', '2025-08-04'))];
      const combined = [[...groupA[0], ...groupB[0]]];

      const a = deduplicateEncounters(WYOMING, groupA, isLtc);
      const b = deduplicateEncounters(WYOMING, groupB, isLtc);
      const both = deduplicateEncounters(WYOMING, combined, isLtc);

      expect(both.grossCount).toBe(a.grossCount + b.grossCount);
      expect(both.uniquePatientCount).toBe(a.uniquePatientCount + b.uniquePatientCount);
      expect([both.grossCount, both.uniquePatientCount]).toEqual([18, 7]);
    });

    it('should never report more unique patients than gross encounters', () => {
      const batches = [
        range(1, 5).flatMap((n) => visitsFor(n, n, 'aug', '2025-08-01')),
        range(3, 8).flatMap((n) => visitsFor(n, 1, 'sep', '2025-09-01')),
      ];

      const result = deduplicateEncounters(WYOMING, batches, isLtc);

      expect(result.uniquePatientCount).toBeLessThanOrEqual(result.grossCount);
      expect([result.grossCount, result.uniquePatientCount]).toEqual([21, 8]);
    });

    it('should count a patient matched by partial name once', () => {
      const batches = [
        [chargeRecord({ extractId: 'aug', firstName: 'John', lastName: 'Smith', encounterDate: utcDate('2025-08-04') })],
        [chargeRecord({ extractId: 'sep', firstName: 'John', lastName: 'Smithers', encounterDate: utcDate('2025-08-18') })],
      ];

      const result = deduplicateEncounters(WYOMING, batches, isLtc);

      expect([result.grossCount, result.uniquePatientCount]).toEqual([2, 1]);
      expect(result.decisions.map((decision) => decision.rule)).toEqual(['PARTIAL_NAME']);
      expect(result.encounters).toHaveLength(1);
    });

    it('should leave undated rows out of the period triples but not the counts', () => {
      const undated = chargeRecord({ firstName: 'Mary', lastName: 'Jones', encounterDate: undefined });

      const result = deduplicateEncounters(WYOMING, [[chargeRecord(), undated]], isLtc);

      expect([result.grossCount, result.uniquePatientCount]).toEqual([2, 2]);
      expect(result.encounters).toEqual([{ facilityKey: WYOMING, identityId: `${WYOMING}#1`, period: '2025-08' }]);
    });

    it('should count a CPT-listed row toward a code category', () => {
      const isInjection = categoryFilter(testConfig.categories[1]);
      const rows = [
        chargeRecord({ placeOfServiceCode: '11', cptCodes: ['20600', '20610'] }),
        chargeRecord({ firstName: 'Mary', placeOfServiceCode: '11', cptCodes: ['99309'] }),
      ];

      const result = deduplicateEncounters(WYOMING, [rows], isInjection);

      expect([result.grossCount, result.uniquePatientCount]).toEqual([1, 1]);
    });
  });
});

describe('periodOf', () => {
  it('should format months and quarters in UTC', () => {
    expect(periodOf(utcDate('2025-08-14'), 'month')).toBe('2025-08');
    expect(periodOf(utcDate('2025-08-14'), 'quarter')).toBe('2025-Q3');
    expect(periodOf(utcDate('2025-01-01'), 'quarter')).toBe('2025-Q1');
  });
});
