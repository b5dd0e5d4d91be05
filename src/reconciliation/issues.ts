/**
 * Reconciliation issues: per-record and per-facility problems that are
 * collected and returned with the result. None of them stops a run.
 */

import type { FacilityKey } from './types';

export type IssueCode =
  | 'MALFORMED_RECORD'
  | 'UNRESOLVED_FACILITY'
  | 'EMPTY_EXTRACT'
  | 'CROSS_FACILITY_MATCH_ATTEMPT';

export type IssueSeverity = 'info' | 'warning';

export interface ReconciliationIssue {
  code: IssueCode;
  severity: IssueSeverity;
  message: string;
  facilityKey?: FacilityKey;
  extractId?: string;
  rowNumber?: number;
}

const SEVERITY: Record<IssueCode, IssueSeverity> = {
  MALFORMED_RECORD: 'warning',
  UNRESOLVED_FACILITY: 'info',
  EMPTY_EXTRACT: 'info',
  CROSS_FACILITY_MATCH_ATTEMPT: 'warning',
};

export function createIssue(
  code: IssueCode,
  message: string,
  context: Pick<ReconciliationIssue, 'facilityKey' | 'extractId' | 'rowNumber'> = {}
): ReconciliationIssue {
  return { code, severity: SEVERITY[code], message, ...context };
}

/**
 * Counts issues per code, with every code present.
 */
export function summarizeIssues(
  issues: readonly ReconciliationIssue[]
): Record<IssueCode, number> {
  const summary: Record<IssueCode, number> = {
    MALFORMED_RECORD: 0,
    UNRESOLVED_FACILITY: 0,
    EMPTY_EXTRACT: 0,
    CROSS_FACILITY_MATCH_ATTEMPT: 0,
  };
  for (const issue of issues) {
    summary[issue.code] += 1;
  }
  return summary;
}
