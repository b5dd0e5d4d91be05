/**
 * Metrics Aggregator
 *
 * Turns one facility's reconciled records into its summary row. Every
 * metric is computed from the reconciled set directly; overall figures are
 * computed across all patients, never summed from the per-payer figures.
 *
 * Pure: no I/O, no logging, a new frozen row per call.
 */

import type { EncounterCategoryConfig, ReconciliationConfig } from '../config';
import {
  COLUMN_KEYS,
  buildColumnSchema,
  categoryGrossKey,
  categoryPeriodsKey,
  categoryUniqueKey,
  cptKey,
  dispositionPercentKey,
  dispositionRatioKey,
  payerGainKey,
  payerLosKey,
  payerRatioKey,
} from './columnSchema';
import type { DeduplicatedEncounterSet } from './encounterDeduplicator';
import type { IdentityResolution } from './identityResolver';
import { createPayerClassifier, payerOfIdentity } from './payers';
import type {
  AdtRecord,
  ChargeCaptureRecord,
  ColumnDefinition,
  FacilityKey,
  FacilityMetricsRow,
  MatchedIdentity,
  MetricValue,
  PatientRecord,
  RecordFilter,
} from './types';

// ============================================
// Types
// ============================================

/**
 * Everything the aggregator needs for one facility.
 */
export interface ReconciledRecordSet {
  facilityKey: FacilityKey;
  displayName: string;
  /** All of the facility's records across extracts */
  records: readonly PatientRecord[];
  /** Patients resolved across every extract of the facility */
  resolution: IdentityResolution;
  /** Charge-capture visits, deduplicated */
  visits: DeduplicatedEncounterSet;
  /** Per configured category key */
  categories: ReadonlyMap<string, DeduplicatedEncounterSet>;
}

// ============================================
// Helpers
// ============================================

export const round2 = (value: number): number => Math.round(value * 100) / 100;

/**
 * Mean rounded to 2 decimals; an empty list averages to 0.
 */
export function average(values: readonly number[]): number {
  if (values.length === 0) return 0;
  return round2(values.reduce((sum, value) => sum + value, 0) / values.length);
}

/**
 * "<count>:<total>", the ratio format of the summary sheet.
 */
export const formatRatio = (count: number, total: number): string => `${count}:${total}`;

const percentOf = (count: number, total: number): number =>
  total > 0 ? round2((count / total) * 100) : 0;

/**
 * Qualification rule for an encounter category: a charge-capture row whose
 * place of service or any CPT code is listed.
 */
export function categoryFilter(category: EncounterCategoryConfig): RecordFilter {
  const places = new Set(category.placeOfServiceCodes);
  const codes = new Set(category.cptCodes);

  return (record) =>
    record.kind === 'CHARGE_CAPTURE' &&
    ((record.placeOfServiceCode !== undefined && places.has(record.placeOfServiceCode)) ||
      record.cptCodes.some((code) => codes.has(code)));
}

const hasKind = (identity: MatchedIdentity, kind: PatientRecord['kind']): boolean =>
  identity.records.some((record) => record.kind === kind);

/**
 * Functional gain of a patient: end minus start on the first assessment
 * carrying both scores. Undefined when no assessment is complete.
 */
export function functionalGain(identity: MatchedIdentity): number | undefined {
  for (const record of identity.records) {
    if (
      record.kind === 'FUNCTIONAL_ASSESSMENT' &&
      record.startScore !== undefined &&
      record.endScore !== undefined
    ) {
      return record.endScore - record.startScore;
    }
  }
  return undefined;
}

/**
 * Longest reported stay of a patient. Overlapping extracts repeat the same
 * stay with a growing day count, so the maximum is taken rather than a sum.
 */
export function lengthOfStay(identity: MatchedIdentity): number | undefined {
  let longest: number | undefined;
  for (const record of identity.records) {
    if (record.kind !== 'LOS' || record.lengthOfStayDays === undefined) continue;
    longest = longest === undefined ? record.lengthOfStayDays : Math.max(longest, record.lengthOfStayDays);
  }
  return longest;
}

/**
 * Discharge destination of a patient's latest ADT discharge, if any.
 */
export function latestDisposition(identity: MatchedIdentity): string | undefined {
  let latest: AdtRecord | undefined;
  for (const record of identity.records) {
    if (record.kind !== 'ADT' || !record.dischargeDisposition?.trim()) continue;
    const time = record.dischargeDate?.getTime() ?? Number.NEGATIVE_INFINITY;
    const latestTime = latest?.dischargeDate?.getTime() ?? Number.NEGATIVE_INFINITY;
    if (latest === undefined || time >= latestTime) latest = record;
  }
  return latest?.dischargeDisposition;
}

/**
 * Disposition code for a free-text destination: the first rule with a
 * keyword contained in it, else the "other" code.
 */
export function classifyDisposition(
  disposition: string,
  dispositions: ReconciliationConfig['dispositions']
): string {
  const text = disposition.toLowerCase();
  const rule = dispositions.rules.find((candidate) =>
    candidate.keywords.some((keyword) => text.includes(keyword.toLowerCase()))
  );
  return rule ? rule.code : dispositions.other.code;
}

/**
 * Every declared column must carry a value; zero stands in for "nothing".
 *
 * @throws Error naming the first missing column
 */
export function assertRowComplete(
  values: Readonly<Record<string, MetricValue>>,
  columns: readonly ColumnDefinition[]
): void {
  for (const column of columns) {
    const value = values[column.key];
    if (value === undefined || (typeof value === 'number' && !Number.isFinite(value))) {
      throw new Error(`Metric column "${column.header}" has no value`);
    }
  }
}

// ============================================
// Main Aggregation Function
// ============================================

/**
 * Computes the summary row of one facility.
 *
 * Patients served (the census) are the patients with an LOS or ADT record;
 * it is the shared denominator of every ratio in the row.
 *
 * @param set - Reconciled records of the facility
 * @param config - Run configuration (categories, payers, dispositions, CPT codes)
 * @param columns - Column schema; built from `config` when omitted
 */
export function aggregateFacility(
  set: ReconciledRecordSet,
  config: ReconciliationConfig,
  columns: readonly ColumnDefinition[] = buildColumnSchema(config)
): FacilityMetricsRow {
  const classify = createPayerClassifier(config.payers);
  const identities = set.resolution.identities;
  const census = identities.filter((identity) => hasKind(identity, 'LOS') || hasKind(identity, 'ADT'));
  const patientsServed = census.length;

  const payerById = new Map<string, string | undefined>(
    identities.map((identity) => [identity.id, payerOfIdentity(identity, classify)])
  );

  const values: Record<string, MetricValue> = {};

  // Census and visits
  values[COLUMN_KEYS.FACILITY] = set.displayName;
  values[COLUMN_KEYS.PATIENTS_SERVED] = patientsServed;
  values[COLUMN_KEYS.TOTAL_VISITS] = set.visits.grossCount;
  values[COLUMN_KEYS.VISITED_PATIENTS] = set.visits.uniquePatientCount;
  values[COLUMN_KEYS.AVG_VISITS_PER_PATIENT] =
    set.visits.uniquePatientCount > 0 ? round2(set.visits.grossCount / set.visits.uniquePatientCount) : 0;
  values[COLUMN_KEYS.PROVIDER_PATIENTS_RATIO] = formatRatio(
    census.filter((identity) => hasKind(identity, 'CHARGE_CAPTURE')).length,
    patientsServed
  );

  // Length of stay and functional gain, overall
  const stays = identities
    .map((identity) => ({ payer: payerById.get(identity.id), days: lengthOfStay(identity) }))
    .filter((stay): stay is { payer: string | undefined; days: number } => stay.days !== undefined);
  const gains = identities
    .map((identity) => ({ payer: payerById.get(identity.id), gain: functionalGain(identity) }))
    .filter((entry): entry is { payer: string | undefined; gain: number } => entry.gain !== undefined);

  values[COLUMN_KEYS.LOS_OVERALL_AVG] = average(stays.map((stay) => stay.days));
  values[COLUMN_KEYS.GAIN_OVERALL_AVG] = average(gains.map((entry) => entry.gain));

  // Encounter categories
  for (const category of config.categories) {
    const deduplicated = set.categories.get(category.key);
    values[categoryGrossKey(category.key)] = deduplicated?.grossCount ?? 0;
    values[categoryUniqueKey(category.key)] = deduplicated?.uniquePatientCount ?? 0;
    values[categoryPeriodsKey(category.key)] = deduplicated?.encounters.length ?? 0;
  }

  // Payers: one denominator for every ratio
  for (const payer of config.payers.types) {
    const payerCount = census.filter((identity) => payerById.get(identity.id) === payer.label).length;
    values[payerRatioKey(payer.label)] = formatRatio(payerCount, patientsServed);
    values[payerLosKey(payer.label)] = average(
      stays.filter((stay) => stay.payer === payer.label).map((stay) => stay.days)
    );
    values[payerGainKey(payer.label)] = average(
      gains.filter((entry) => entry.payer === payer.label).map((entry) => entry.gain)
    );
  }

  // Discharge dispositions
  const dispositionCounts = new Map<string, number>();
  for (const identity of census) {
    const disposition = latestDisposition(identity);
    if (disposition === undefined) continue;
    const code = classifyDisposition(disposition, config.dispositions);
    dispositionCounts.set(code, (dispositionCounts.get(code) ?? 0) + 1);
  }
  for (const disposition of [...config.dispositions.rules, config.dispositions.other]) {
    const count = dispositionCounts.get(disposition.code) ?? 0;
    values[dispositionRatioKey(disposition.code)] = formatRatio(count, patientsServed);
    values[dispositionPercentKey(disposition.code)] = percentOf(count, patientsServed);
  }

  // Per-CPT counts: a row listing several codes counts toward each
  const chargeRecords = set.records.filter(
    (record): record is ChargeCaptureRecord => record.kind === 'CHARGE_CAPTURE'
  );
  for (const code of config.cptCodes) {
    values[cptKey(code)] = chargeRecords.filter((record) => record.cptCodes.includes(code)).length;
  }

  assertRowComplete(values, columns);

  return Object.freeze({
    facilityKey: set.facilityKey,
    facility: set.displayName,
    values: Object.freeze(values),
  });
}
