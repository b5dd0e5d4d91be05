/**
 * Facility Reconciliation Engine
 *
 * Normalizes facility identity, matches patients across extracts without a
 * shared key, deduplicates encounters across overlapping batches and
 * computes the per-facility summary rows.
 *
 * @example
 * import { runReconciliation } from './reconciliation';
 *
 * const result = await runReconciliation(extracts, { config });
 * result.rows[0].values.patientsServed; // 26
 */

// Facility identity
export {
  normalizeFacilityLabel,
  formatFacilityDisplayName,
  facilityLabelFromFilename,
} from './facilityNormalizer';
export { FacilityDirectory, type KnownFacility, type FacilityResolution } from './facilityDirectory';

// Patient matching
export {
  patientIdStrategy,
  exactNameStrategy,
  createPartialNameStrategy,
  defaultMatchStrategies,
  type MatchStrategy,
} from './matchStrategies';
export { matchRecords, partitionByFacility, type MatchOptions, type MatchOutcome } from './patientMatcher';
export { resolveIdentities, type IdentityResolution } from './identityResolver';

// Deduplication
export {
  deduplicateEncounters,
  periodOf,
  type DeduplicationOptions,
  type DeduplicatedEncounterSet,
} from './encounterDeduplicator';

// Metrics
export { buildColumnSchema, COLUMN_KEYS } from './columnSchema';
export { aggregateFacility, categoryFilter, formatRatio, type ReconciledRecordSet } from './metricsAggregator';
export { createPayerClassifier, payerOfIdentity, type PayerClassifier } from './payers';

// Pipeline
export {
  runReconciliation,
  toReconciledSet,
  matchFacility,
  deduplicateFacility,
  RECONCILIATION_STAGES,
  type StageEvent,
  type SummaryExporter,
  type ReconciliationSummary,
  type ReconciliationOptions,
  type ReconciliationResult,
  type FacilityOverview,
  type FacilityBatchSet,
} from './pipeline';

// Errors and issues
export {
  ReconciliationError,
  NoUsableExtractError,
  ReconciliationStageError,
  type ReconciliationStage,
} from './errors';
export { createIssue, summarizeIssues, type IssueCode, type ReconciliationIssue } from './issues';

// Types
export type {
  FacilityKey,
  ExtractKind,
  AdtRecord,
  LosRecord,
  ChargeCaptureRecord,
  FunctionalAssessmentRecord,
  PatientRecord,
  RecordFilter,
  SourceExtract,
  MatchRule,
  MatchedBy,
  MatchDecision,
  MatchedIdentity,
  ReportingPeriod,
  DeduplicatedEncounter,
  ColumnKind,
  ColumnDefinition,
  MetricValue,
  FacilityMetricsRow,
} from './types';
