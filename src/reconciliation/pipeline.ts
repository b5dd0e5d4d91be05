/**
 * Reconciliation Pipeline
 *
 * One run over one uploaded batch of extracts:
 *
 *   LOADED → NORMALIZED → MATCHED → DEDUPLICATED → AGGREGATED → EXPORTED
 *
 * Each stage builds new values from the previous stage's output. A stage
 * that throws stops the run with a ReconciliationStageError naming the
 * facility or extract; nothing is exported from a partial run. Recoverable
 * problems are collected as issues and returned with the result.
 *
 * A run holds no state outside its own call, so concurrent runs for
 * different uploads never interfere.
 */

import { v4 as uuidv4 } from 'uuid';
import type { ReconciliationConfig } from '../config';
import { logger } from '../utils';
import { buildColumnSchema } from './columnSchema';
import { deduplicateEncounters, type DeduplicatedEncounterSet } from './encounterDeduplicator';
import { NoUsableExtractError, ReconciliationStageError, type ReconciliationStage } from './errors';
import { FacilityDirectory, type FacilityResolution } from './facilityDirectory';
import { resolveIdentities, type IdentityResolution } from './identityResolver';
import { createIssue, type ReconciliationIssue } from './issues';
import { aggregateFacility, categoryFilter, type ReconciledRecordSet } from './metricsAggregator';
import type {
  ColumnDefinition,
  ExtractKind,
  FacilityKey,
  FacilityMetricsRow,
  PatientRecord,
  SourceExtract,
} from './types';

// ============================================
// Types
// ============================================

export const RECONCILIATION_STAGES: readonly ReconciliationStage[] = [
  'LOADED',
  'NORMALIZED',
  'MATCHED',
  'DEDUPLICATED',
  'AGGREGATED',
  'EXPORTED',
];

export interface StageEvent {
  runId: string;
  stage: ReconciliationStage;
  /** 1-based position of the stage in RECONCILIATION_STAGES */
  completed: number;
  total: number;
  detail: Record<string, number>;
}

export interface ReconciliationSummary {
  runId: string;
  columns: ColumnDefinition[];
  rows: FacilityMetricsRow[];
  issues: ReconciliationIssue[];
}

/**
 * Receives the finished summary (spreadsheet, CSV, slides...). Returns
 * where the artifact went, when that means anything.
 */
export interface SummaryExporter {
  export(summary: ReconciliationSummary): Promise<string | undefined>;
}

export interface ReconciliationOptions {
  config: ReconciliationConfig;
  runId?: string;
  /** Known facilities; built from `config.facilities` when omitted */
  directory?: FacilityDirectory;
  exporter?: SummaryExporter;
  onStageComplete?: (event: StageEvent) => void | Promise<void>;
}

export interface FacilityOverview {
  facilityKey: FacilityKey;
  displayName: string;
  known: boolean;
  recordCount: number;
  identityCount: number;
  partialMatchCount: number;
}

export interface ReconciliationResult extends ReconciliationSummary {
  stages: ReconciliationStage[];
  facilities: FacilityOverview[];
  exportLocation?: string;
}

/**
 * Records of one facility, grouped per extract in extract order.
 */
export interface FacilityBatchSet {
  facilityKey: FacilityKey;
  displayName: string;
  known: boolean;
  batches: PatientRecord[][];
}

// ============================================
// Per-facility Steps
// ============================================

/**
 * MATCHED: patients across every extract of the facility.
 */
export function matchFacility(
  facility: FacilityBatchSet,
  config: ReconciliationConfig,
  runId?: string
): IdentityResolution {
  return resolveIdentities(facility.facilityKey, facility.batches, {
    partialMatchPrefixLength: config.partialMatchPrefixLength,
    runId,
  });
}

/**
 * DEDUPLICATED: visit and per-category gross/unique counts.
 */
export function deduplicateFacility(
  facility: FacilityBatchSet,
  config: ReconciliationConfig,
  runId?: string
): { visits: DeduplicatedEncounterSet; categories: Map<string, DeduplicatedEncounterSet> } {
  const options = {
    partialMatchPrefixLength: config.partialMatchPrefixLength,
    reportingPeriod: config.reportingPeriod,
    runId,
  };

  const visits = deduplicateEncounters(
    facility.facilityKey,
    facility.batches,
    (record) => record.kind === 'CHARGE_CAPTURE',
    options
  );

  const categories = new Map<string, DeduplicatedEncounterSet>();
  for (const category of config.categories) {
    categories.set(
      category.key,
      deduplicateEncounters(facility.facilityKey, facility.batches, categoryFilter(category), options)
    );
  }

  return { visits, categories };
}

/**
 * AGGREGATED input: one facility's matched and deduplicated records.
 */
export function toReconciledSet(
  facility: FacilityBatchSet,
  resolution: IdentityResolution,
  deduplicated: { visits: DeduplicatedEncounterSet; categories: Map<string, DeduplicatedEncounterSet> }
): ReconciledRecordSet {
  return {
    facilityKey: facility.facilityKey,
    displayName: facility.displayName,
    records: facility.batches.flat(),
    resolution,
    visits: deduplicated.visits,
    categories: deduplicated.categories,
  };
}

// ============================================
// Stage Helpers
// ============================================

function runStage<T>(
  stage: ReconciliationStage,
  context: { facilityKey?: FacilityKey; extractId?: string },
  step: () => T
): T {
  try {
    return step();
  } catch (error) {
    throw new ReconciliationStageError(stage, context, error);
  }
}

/**
 * Resolves facility labels and groups records per facility and extract.
 */
function normalizeExtracts(
  extracts: readonly SourceExtract[],
  directory: FacilityDirectory
): { facilities: FacilityBatchSet[]; issues: ReconciliationIssue[] } {
  const issues: ReconciliationIssue[] = [];
  const resolutions = new Map<string, FacilityResolution>();
  const grouped = new Map<FacilityKey, { set: FacilityBatchSet; batchIndex: Map<string, number> }>();
  const kindsByFacility = new Map<FacilityKey, Set<ExtractKind>>();

  for (const extract of extracts) {
    runStage('NORMALIZED', { extractId: extract.id }, () => {
      for (const record of extract.records) {
        let resolution = resolutions.get(record.facilityLabel);
        if (!resolution) {
          resolution = directory.resolve(record.facilityLabel);
          resolutions.set(record.facilityLabel, resolution);
        }

        let group = grouped.get(resolution.key);
        if (!group) {
          group = {
            set: {
              facilityKey: resolution.key,
              displayName: resolution.displayName,
              known: resolution.known,
              batches: [],
            },
            batchIndex: new Map(),
          };
          grouped.set(resolution.key, group);
          kindsByFacility.set(resolution.key, new Set());
        }

        let batchIndex = group.batchIndex.get(extract.id);
        if (batchIndex === undefined) {
          batchIndex = group.set.batches.length;
          group.batchIndex.set(extract.id, batchIndex);
          group.set.batches.push([]);
        }

        group.set.batches[batchIndex].push({ ...record, facilityKey: resolution.key });
        kindsByFacility.get(resolution.key)?.add(record.kind);
      }
    });
  }

  // Unknown labels, reported once per key; only meaningful when a directory is configured
  if (directory.size > 0) {
    const reported = new Set<FacilityKey>();
    for (const [label, resolution] of resolutions) {
      if (resolution.known || reported.has(resolution.key)) continue;
      reported.add(resolution.key);
      const hint = resolution.suggestion
        ? ` (closest known facility: "${resolution.suggestion.displayName}", similarity ${resolution.suggestion.similarity})`
        : '';
      issues.push(
        createIssue(
          'UNRESOLVED_FACILITY',
          `Facility label "${label}" matches no known facility; kept as "${resolution.displayName}"${hint}`,
          { facilityKey: resolution.key }
        )
      );
    }
  }

  // A facility missing a kind of extract other facilities have reports zero for it
  const kindsInRun = new Set(extracts.filter((e) => e.records.length > 0).map((e) => e.kind));
  for (const [facilityKey, kinds] of kindsByFacility) {
    for (const kind of kindsInRun) {
      if (kinds.has(kind)) continue;
      issues.push(
        createIssue('EMPTY_EXTRACT', `No ${kind} records for this facility; its ${kind} metrics are zero`, {
          facilityKey,
        })
      );
    }
  }

  const facilities = [...grouped.values()]
    .map((group) => group.set)
    .sort((a, b) => (a.facilityKey < b.facilityKey ? -1 : a.facilityKey > b.facilityKey ? 1 : 0));

  return { facilities, issues };
}

// ============================================
// Main Pipeline Function
// ============================================

/**
 * Runs one reconciliation over fully parsed extracts.
 *
 * @throws NoUsableExtractError when no extract holds a record
 * @throws ReconciliationStageError when a stage fails
 *
 * @example
 * const result = await runReconciliation(extracts, {
 *   config,
 *   onStageComplete: (event) => console.log(event.stage),
 * });
 */
export async function runReconciliation(
  extracts: readonly SourceExtract[],
  options: ReconciliationOptions
): Promise<ReconciliationResult> {
  const { config } = options;
  const runId = options.runId ?? uuidv4();
  const stages: ReconciliationStage[] = [];
  const issues: ReconciliationIssue[] = [];

  const complete = async (stage: ReconciliationStage, detail: Record<string, number>): Promise<void> => {
    stages.push(stage);
    logger.info(`[${runId}] Stage ${stage} complete`, detail);
    await options.onStageComplete?.({
      runId,
      stage,
      completed: RECONCILIATION_STAGES.indexOf(stage) + 1,
      total: RECONCILIATION_STAGES.length,
      detail,
    });
  };

  // LOADED
  for (const extract of extracts) {
    if (extract.records.length === 0) {
      issues.push(
        createIssue('EMPTY_EXTRACT', `${extract.kind} extract "${extract.source}" has no records`, {
          extractId: extract.id,
        })
      );
    }
  }
  const usable = extracts.filter((extract) => extract.records.length > 0);
  if (usable.length === 0) {
    throw new NoUsableExtractError(extracts.map((extract) => extract.id));
  }
  await complete('LOADED', {
    extracts: extracts.length,
    usableExtracts: usable.length,
    records: usable.reduce((total, extract) => total + extract.records.length, 0),
  });

  // NORMALIZED
  const directory = options.directory ?? new FacilityDirectory(config.facilities);
  const normalized = normalizeExtracts(usable, directory);
  issues.push(...normalized.issues);
  const facilities = normalized.facilities;
  await complete('NORMALIZED', {
    facilities: facilities.length,
    unresolvedFacilities: facilities.filter((facility) => !facility.known).length,
  });

  // MATCHED
  const resolutions = facilities.map((facility) =>
    runStage('MATCHED', { facilityKey: facility.facilityKey }, () => matchFacility(facility, config, runId))
  );
  for (const resolution of resolutions) issues.push(...resolution.issues);
  await complete('MATCHED', {
    identities: resolutions.reduce((total, resolution) => total + resolution.identities.length, 0),
    decisions: resolutions.reduce((total, resolution) => total + resolution.decisions.length, 0),
  });

  // DEDUPLICATED
  const deduplicated = facilities.map((facility) =>
    runStage('DEDUPLICATED', { facilityKey: facility.facilityKey }, () =>
      deduplicateFacility(facility, config, runId)
    )
  );
  await complete('DEDUPLICATED', {
    visits: deduplicated.reduce((total, entry) => total + entry.visits.grossCount, 0),
    uniqueVisitedPatients: deduplicated.reduce((total, entry) => total + entry.visits.uniquePatientCount, 0),
  });

  // AGGREGATED
  const columns = buildColumnSchema(config);
  const rows = facilities.map((facility, index) =>
    runStage('AGGREGATED', { facilityKey: facility.facilityKey }, () =>
      aggregateFacility(toReconciledSet(facility, resolutions[index], deduplicated[index]), config, columns)
    )
  );
  await complete('AGGREGATED', { rows: rows.length, columns: columns.length });

  // EXPORTED
  let exportLocation: string | undefined;
  if (options.exporter) {
    try {
      exportLocation = await options.exporter.export({ runId, columns, rows, issues });
    } catch (error) {
      throw new ReconciliationStageError('EXPORTED', {}, error);
    }
  }
  await complete('EXPORTED', { rows: rows.length, issues: issues.length });

  const overviews: FacilityOverview[] = facilities.map((facility, index) => ({
    facilityKey: facility.facilityKey,
    displayName: facility.displayName,
    known: facility.known,
    recordCount: facility.batches.reduce((total, batch) => total + batch.length, 0),
    identityCount: resolutions[index].identities.length,
    partialMatchCount: resolutions[index].decisions.filter((decision) => decision.rule === 'PARTIAL_NAME').length,
  }));

  return { runId, columns, rows, issues, stages, facilities: overviews, exportLocation };
}
