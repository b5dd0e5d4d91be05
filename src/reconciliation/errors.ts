/**
 * Fatal reconciliation errors. Anything recoverable is a
 * ReconciliationIssue instead (see issues.ts).
 */

import type { FacilityKey } from './types';

export type ReconciliationStage =
  | 'LOADED'
  | 'NORMALIZED'
  | 'MATCHED'
  | 'DEDUPLICATED'
  | 'AGGREGATED'
  | 'EXPORTED';

export class ReconciliationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ReconciliationError';
    Error.captureStackTrace(this, this.constructor);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Raised when none of the supplied extracts holds a usable record.
 */
export class NoUsableExtractError extends ReconciliationError {
  public readonly extractIds: readonly string[];

  constructor(extractIds: readonly string[]) {
    const scope = extractIds.length === 0 ? 'no extracts were supplied' : `${extractIds.length} extract(s) checked`;
    super(`No usable records in any extract (${scope})`);
    this.name = 'NoUsableExtractError';
    this.extractIds = extractIds;
  }
}

/**
 * Raised when a stage fails for a facility or extract. The run stops and
 * nothing is exported.
 */
export class ReconciliationStageError extends ReconciliationError {
  public readonly stage: ReconciliationStage;
  public readonly facilityKey?: FacilityKey;
  public readonly extractId?: string;

  constructor(
    stage: ReconciliationStage,
    context: { facilityKey?: FacilityKey; extractId?: string },
    cause: unknown
  ) {
    const where = [
      context.facilityKey !== undefined ? `facility "${context.facilityKey}"` : null,
      context.extractId !== undefined ? `extract "${context.extractId}"` : null,
    ]
      .filter((part): part is string => part !== null)
      .join(', ');
    const reason = cause instanceof Error ? cause.message : String(cause);

    super(`Stage ${stage} failed${where ? ` for ${where}` : ''}: ${reason}`, { cause });
    this.name = 'ReconciliationStageError';
    this.stage = stage;
    this.facilityKey = context.facilityKey;
    this.extractId = context.extractId;
  }
}
