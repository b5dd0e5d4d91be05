/**
 * Encounter Deduplicator
 *
 * Counts the records of one facility that pass a filter in two ways at once:
 * - gross: every qualifying row across all batches, never deduplicated
 * - unique: distinct patient identities among those rows, resolved across
 *   batches so a patient in two overlapping monthly extracts counts once
 *
 * It also yields the (facility, patient, period) encounter triples.
 */

import { resolveIdentities } from './identityResolver';
import type { ReconciliationIssue } from './issues';
import type { MatchOptions } from './patientMatcher';
import type {
  DeduplicatedEncounter,
  FacilityKey,
  MatchDecision,
  MatchedIdentity,
  PatientRecord,
  RecordFilter,
  ReportingPeriod,
} from './types';

export interface DeduplicationOptions extends MatchOptions {
  reportingPeriod?: ReportingPeriod;
}

export interface DeduplicatedEncounterSet {
  facilityKey: FacilityKey;
  grossCount: number;
  uniquePatientCount: number;
  identities: MatchedIdentity[];
  encounters: DeduplicatedEncounter[];
  decisions: MatchDecision[];
  issues: ReconciliationIssue[];
}

/**
 * Reporting-period bucket of a date, in UTC.
 *
 * @example
 * periodOf(new Date('2025-08-14'), 'month')   // "2025-08"
 * periodOf(new Date('2025-08-14'), 'quarter') // "2025-Q3"
 */
export function periodOf(date: Date, granularity: ReportingPeriod): string {
  const year = date.getUTCFullYear();
  const month = date.getUTCMonth();
  if (granularity === 'quarter') {
    return `${year}-Q${Math.floor(month / 3) + 1}`;
  }
  return `${year}-${String(month + 1).padStart(2, '0')}`;
}

/**
 * Deduplicates one facility's qualifying records across batches.
 *
 * @param batches - Record sets in batch order; batches may overlap in time
 * @param filter - Qualification rule, e.g. place of service 32
 * @returns Both counts (0 and 0 when nothing qualifies) plus identities and
 *          encounter triples
 */
export function deduplicateEncounters(
  facility: FacilityKey,
  batches: ReadonlyArray<readonly PatientRecord[]>,
  filter: RecordFilter,
  options: DeduplicationOptions = {}
): DeduplicatedEncounterSet {
  const qualifying = batches.map((batch) => batch.filter(filter));
  const resolution = resolveIdentities(facility, qualifying, options);
  const granularity = options.reportingPeriod ?? 'month';

  const grossCount = resolution.identities.reduce((total, identity) => total + identity.records.length, 0);

  const seen = new Set<string>();
  const encounters: DeduplicatedEncounter[] = [];
  for (const identity of resolution.identities) {
    for (const record of identity.records) {
      if (!record.encounterDate) continue;
      const period = periodOf(record.encounterDate, granularity);
      const key = `${identity.id}|${period}`;
      if (seen.has(key)) continue;
      seen.add(key);
      encounters.push({ facilityKey: facility, identityId: identity.id, period });
    }
  }

  return {
    facilityKey: facility,
    grossCount,
    uniquePatientCount: resolution.identities.length,
    identities: resolution.identities,
    encounters,
    decisions: resolution.decisions,
    issues: resolution.issues,
  };
}
