/**
 * Patient Identity Matcher
 *
 * Pairs records from two extracts of one facility that lack a shared key.
 * Strategies are tried in order; within a pass, source-A records are visited
 * in input order and each takes the first unconsumed source-B record the
 * rule accepts. A record is consumed at most once per source, so ambiguous
 * candidates resolve to the earliest one instead of failing.
 *
 * Output depends only on the input order, never on timing or hashing.
 */

import { logger } from '../utils';
import { createIssue, type ReconciliationIssue } from './issues';
import { defaultMatchStrategies, type MatchStrategy } from './matchStrategies';
import { stringSimilarity } from './similarity';
import { surnameLetters } from './personName';
import type { FacilityKey, MatchDecision, MatchedIdentity, PatientRecord } from './types';

// ============================================
// Types
// ============================================

export interface MatchOptions {
  /** Overrides the standard cascade */
  strategies?: readonly MatchStrategy[];
  /** Used to build the standard cascade when `strategies` is not given */
  partialMatchPrefixLength?: number;
  /** Correlates audit log lines with a run */
  runId?: string;
}

export interface MatchOutcome {
  identities: MatchedIdentity[];
  decisions: MatchDecision[];
  issues: ReconciliationIssue[];
}

// ============================================
// Helpers
// ============================================

/**
 * Splits out records from other facilities. Each one is reported as a
 * cross-facility match attempt and takes no further part.
 */
export function partitionByFacility(
  records: readonly PatientRecord[],
  facility: FacilityKey
): { local: PatientRecord[]; issues: ReconciliationIssue[] } {
  const local: PatientRecord[] = [];
  const issues: ReconciliationIssue[] = [];

  for (const record of records) {
    if (record.facilityKey === facility) {
      local.push(record);
      continue;
    }
    issues.push(
      createIssue(
        'CROSS_FACILITY_MATCH_ATTEMPT',
        `Record for facility "${record.facilityKey}" offered for matching in "${facility}"; discarded`,
        { facilityKey: facility, extractId: record.extractId, rowNumber: record.rowNumber }
      )
    );
  }

  return { local, issues };
}

function auditPartialMatch(decision: MatchDecision, runId: string | undefined): void {
  const { recordA, recordB } = decision;
  logger.info('Partial-name match accepted', {
    runId,
    facilityKey: decision.facilityKey,
    recordA: { extractId: recordA.extractId, rowNumber: recordA.rowNumber, lastName: recordA.lastName },
    recordB: { extractId: recordB.extractId, rowNumber: recordB.rowNumber, lastName: recordB.lastName },
    lastNameSimilarity: stringSimilarity(surnameLetters(recordA.lastName), surnameLetters(recordB.lastName)),
    candidateCount: decision.candidateCount,
    ambiguous: decision.candidateCount > 1,
  });
}

// ============================================
// Main Matching Function
// ============================================

/**
 * Matches two record sets within one facility.
 *
 * @param sourceA - Records of the first extract, in source order
 * @param sourceB - Records of the second extract, in source order
 * @param facility - Facility both sets are expected to belong to
 * @returns Identities (pairs first in source-A order, then unmatched A, then
 *          unmatched B), the pairing decisions and any discarded records
 *
 * @example
 * const { identities } = matchRecords(losRecords, assessmentRecords, 'medilodge of wyoming');
 */
export function matchRecords(
  sourceA: readonly PatientRecord[],
  sourceB: readonly PatientRecord[],
  facility: FacilityKey,
  options: MatchOptions = {}
): MatchOutcome {
  const strategies = options.strategies ?? defaultMatchStrategies(options.partialMatchPrefixLength);

  const partitionA = partitionByFacility(sourceA, facility);
  const partitionB = partitionByFacility(sourceB, facility);
  const a = partitionA.local;
  const b = partitionB.local;

  const partnerOfA = new Map<number, { index: number; rule: MatchDecision['rule'] }>();
  const consumedB = new Set<number>();
  const decisions: MatchDecision[] = [];

  for (const strategy of strategies) {
    for (let i = 0; i < a.length; i++) {
      if (partnerOfA.has(i)) continue;

      let chosen = -1;
      let candidateCount = 0;
      for (let j = 0; j < b.length; j++) {
        if (consumedB.has(j) || !strategy.matches(a[i], b[j])) continue;
        if (chosen === -1) chosen = j;
        candidateCount++;
      }
      if (chosen === -1) continue;

      partnerOfA.set(i, { index: chosen, rule: strategy.rule });
      consumedB.add(chosen);

      const decision: MatchDecision = {
        rule: strategy.rule,
        facilityKey: facility,
        recordA: a[i],
        recordB: b[chosen],
        candidateCount,
      };
      decisions.push(decision);

      if (strategy.rule === 'PARTIAL_NAME') {
        auditPartialMatch(decision, options.runId);
      }
    }
  }

  const identities: MatchedIdentity[] = [];
  const nextId = (): string => `${facility}#${identities.length + 1}`;

  for (let i = 0; i < a.length; i++) {
    const partner = partnerOfA.get(i);
    if (partner === undefined) continue;
    identities.push({
      id: nextId(),
      facilityKey: facility,
      records: [a[i], b[partner.index]],
      matchedBy: partner.rule,
    });
  }
  for (let i = 0; i < a.length; i++) {
    if (partnerOfA.has(i)) continue;
    identities.push({ id: nextId(), facilityKey: facility, records: [a[i]], matchedBy: 'UNMATCHED' });
  }
  for (let j = 0; j < b.length; j++) {
    if (consumedB.has(j)) continue;
    identities.push({ id: nextId(), facilityKey: facility, records: [b[j]], matchedBy: 'UNMATCHED' });
  }

  return {
    identities,
    decisions,
    issues: [...partitionA.issues, ...partitionB.issues],
  };
}
