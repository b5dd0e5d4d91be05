/**
 * Types for the Facility Reconciliation Engine
 *
 * Records are a closed, tagged union: one shape per extract kind,
 * validated at the loader boundary. Everything downstream switches on
 * `kind` instead of probing untyped column maps.
 */

// ============================================
// Identity
// ============================================

/**
 * Canonical facility identifier produced by normalizeFacilityLabel.
 */
export type FacilityKey = string;

export type ExtractKind = 'ADT' | 'LOS' | 'CHARGE_CAPTURE' | 'FUNCTIONAL_ASSESSMENT';

// ============================================
// Patient Records
// ============================================

interface BaseRecord {
  /** Extract (uploaded file) the row came from */
  extractId: string;
  /** 1-based data row number within the extract */
  rowNumber: number;
  firstName: string;
  lastName: string;
  patientId?: string;
  /** Facility label as written in the source */
  facilityLabel: string;
  /** Canonical key; assigned from the label when the record is created */
  facilityKey: FacilityKey;
  encounterDate?: Date;
  payerType?: string;
}

export interface AdtRecord extends BaseRecord {
  kind: 'ADT';
  admissionDate?: Date;
  dischargeDate?: Date;
  /** Free-text destination on discharge, e.g. "Home", "Hospital" */
  dischargeDisposition?: string;
}

export interface LosRecord extends BaseRecord {
  kind: 'LOS';
  lengthOfStayDays?: number;
}

export interface ChargeCaptureRecord extends BaseRecord {
  kind: 'CHARGE_CAPTURE';
  placeOfServiceCode?: string;
  cptCodes: string[];
}

export interface FunctionalAssessmentRecord extends BaseRecord {
  kind: 'FUNCTIONAL_ASSESSMENT';
  startScore?: number;
  endScore?: number;
}

export type PatientRecord =
  | AdtRecord
  | LosRecord
  | ChargeCaptureRecord
  | FunctionalAssessmentRecord;

export type RecordFilter = (record: PatientRecord) => boolean;

/**
 * One uploaded source file after parsing.
 */
export interface SourceExtract {
  id: string;
  kind: ExtractKind;
  /** Original filename or other human-readable origin */
  source: string;
  records: readonly PatientRecord[];
}

// ============================================
// Matching
// ============================================

export type MatchRule = 'PATIENT_ID' | 'EXACT_NAME' | 'PARTIAL_NAME';

export type MatchedBy = MatchRule | 'UNMATCHED';

/**
 * One pairing made by the matcher, kept for audit.
 */
export interface MatchDecision {
  rule: MatchRule;
  facilityKey: FacilityKey;
  recordA: PatientRecord;
  recordB: PatientRecord;
  /** Unconsumed source-B records the rule accepted; > 1 means the first one won a tie */
  candidateCount: number;
}

/**
 * A set of records believed to denote one patient. Never spans two facilities.
 */
export interface MatchedIdentity {
  id: string;
  facilityKey: FacilityKey;
  records: readonly PatientRecord[];
  matchedBy: MatchedBy;
}

// ============================================
// Deduplication
// ============================================

export type ReportingPeriod = 'month' | 'quarter';

/**
 * One (facility, patient, period) triple, counted once however many
 * batches mention it.
 */
export interface DeduplicatedEncounter {
  facilityKey: FacilityKey;
  identityId: string;
  /** "2025-07" for monthly buckets, "2025-Q3" for quarterly */
  period: string;
}

// ============================================
// Metrics
// ============================================

export type ColumnKind = 'text' | 'count' | 'average' | 'ratio' | 'percent';

export interface ColumnDefinition {
  key: string;
  header: string;
  kind: ColumnKind;
}

export type MetricValue = number | string;

export interface FacilityMetricsRow {
  readonly facilityKey: FacilityKey;
  readonly facility: string;
  readonly values: Readonly<Record<string, MetricValue>>;
}
