/**
 * Extract Loader Service
 *
 * Parses an uploaded CSV extract into typed patient records:
 * 1. STREAMING - csv-parse reads the file row by row
 * 2. VALIDATION - one zod schema per extract kind
 * 3. REPORTING - a row without a name or facility is rejected; any other
 *    unparseable value is dropped from its record. Both become
 *    MALFORMED_RECORD issues and the rest of the file still loads
 *
 * The facility comes from a facility column when the extract has one, else
 * from the upload filename ("ADT Medilodge of Wyoming_cycles.csv").
 */

import { createReadStream } from 'fs';
import { parse } from 'csv-parse';
import { z } from 'zod';
import { logger } from '../utils';
import {
  createIssue,
  facilityLabelFromFilename,
  normalizeFacilityLabel,
  type ExtractKind,
  type PatientRecord,
  type ReconciliationIssue,
  type SourceExtract,
} from '../reconciliation';
import { canonicalColumnName } from './extractColumns';

// ============================================
// Types
// ============================================

export interface LoadExtractParams {
  extractId: string;
  kind: ExtractKind;
  filePath: string;
  /** Filename as uploaded; used for the facility fallback and messages */
  originalName: string;
}

export interface LoadedExtract {
  extract: SourceExtract;
  issues: ReconciliationIssue[];
}

// ============================================
// Field Parsers
// ============================================

const US_DATE = /^(\d{1,2})\/(\d{1,2})\/(\d{2}|\d{4})$/;
const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})/;

/**
 * Parses "2025-07-14", "7/14/2025" or "7/14/25" as a UTC calendar date.
 */
export function parseExtractDate(value: string): Date | null {
  let year: number;
  let month: number;
  let day: number;

  const iso = ISO_DATE.exec(value);
  const us = US_DATE.exec(value);
  if (iso) {
    [year, month, day] = [Number(iso[1]), Number(iso[2]), Number(iso[3])];
  } else if (us) {
    const rawYear = Number(us[3]);
    [year, month, day] = [us[3].length === 2 ? 2000 + rawYear : rawYear, Number(us[1]), Number(us[2])];
  } else {
    return null;
  }

  const date = new Date(Date.UTC(year, month - 1, day));
  if (date.getUTCFullYear() !== year || date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
    return null;
  }
  return date;
}

const blankToUndefined = (value: unknown): unknown =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

const optionalText = z.preprocess(blankToUndefined, z.string().trim().optional());

const requiredText = (label: string) =>
  z.preprocess(blankToUndefined, z.string({ required_error: `${label} is required` }).trim());

const toDate = (value: string, ctx: z.RefinementCtx): Date => {
  const date = parseExtractDate(value.trim());
  if (!date) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `invalid date "${value}"` });
    return z.NEVER;
  }
  return date;
};

const optionalDate = z.preprocess(blankToUndefined, z.string().transform(toDate).optional());

const optionalNumber = z.preprocess(
  (value) => {
    const blank = blankToUndefined(value);
    return typeof blank === 'string' ? Number(blank.replace(/,/g, '')) : blank;
  },
  z.number({ invalid_type_error: 'must be a number' }).finite().optional()
);

const codeList = z.preprocess(
  blankToUndefined,
  z
    .string()
    .optional()
    .transform((value) =>
      (value ?? '')
        .split(/[,;\s]+/)
        .map((code) => code.trim())
        .filter((code) => code.length > 0)
    )
);

// ============================================
// Row Schemas
// ============================================

/**
 * Fields a row cannot load without.
 */
const identitySchema = z.object({
  firstName: requiredText('first name'),
  lastName: requiredText('last name'),
  patientId: optionalText,
  facility: optionalText,
});

const sharedFields = {
  payerType: optionalText,
  encounterDate: optionalDate,
};

/**
 * Metric fields per kind. Each is parsed on its own; a bad value drops the
 * field, not the row.
 */
const metricFields = {
  ADT: {
    ...sharedFields,
    admissionDate: optionalDate,
    dischargeDate: optionalDate,
    dischargeDisposition: optionalText,
  },
  LOS: {
    ...sharedFields,
    lengthOfStayDays: optionalNumber.refine((days) => days === undefined || days >= 0, 'must not be negative'),
  },
  CHARGE_CAPTURE: {
    ...sharedFields,
    placeOfServiceCode: optionalText,
    cptCodes: codeList,
  },
  FUNCTIONAL_ASSESSMENT: {
    ...sharedFields,
    startScore: optionalNumber,
    endScore: optionalNumber,
  },
};

type FieldSchemas = Record<string, z.ZodTypeAny>;

interface LenientFields<S extends FieldSchemas> {
  data: Partial<{ [K in keyof S]: z.output<S[K]> }>;
  /** One "<field>: <message>" entry per value that failed to parse */
  invalid: string[];
}

function parseFields<S extends FieldSchemas>(schemas: S, row: Record<string, unknown>): LenientFields<S> {
  const data: Partial<{ [K in keyof S]: z.output<S[K]> }> = {};
  const invalid: string[] = [];

  for (const field in schemas) {
    const parsed = schemas[field].safeParse(row[field]);
    if (parsed.success) {
      data[field] = parsed.data;
    } else {
      invalid.push(`${field}: ${parsed.error.issues.map((issue) => issue.message).join(', ')}`);
    }
  }

  return { data, invalid };
}

// ============================================
// Row Conversion
// ============================================

/**
 * Fills first/last name from a combined name column: "Smith, John" or
 * "John Smith".
 */
function splitFullName(row: Record<string, unknown>): Record<string, unknown> {
  const fullName = row.fullName;
  if (typeof fullName !== 'string' || (row.firstName && row.lastName)) {
    return row;
  }

  const trimmed = fullName.trim();
  let firstName = '';
  let lastName = '';
  if (trimmed.includes(',')) {
    const [last, ...rest] = trimmed.split(',');
    lastName = last.trim();
    firstName = rest.join(' ').trim().split(/\s+/)[0] ?? '';
  } else {
    const parts = trimmed.split(/\s+/);
    firstName = parts[0] ?? '';
    lastName = parts.slice(1).join(' ');
  }

  return { ...row, firstName: row.firstName || firstName, lastName: row.lastName || lastName };
}

const formatZodIssues = (error: z.ZodError): string =>
  error.issues.map((issue) => `${issue.path.join('.') || 'row'}: ${issue.message}`).join('; ');

type RowContext = { extractId: string; rowNumber: number; fallbackFacility: string };

/**
 * A loaded record with the fields that were dropped from it, or the reason
 * the whole row was rejected.
 */
type Conversion = { record: PatientRecord; invalidFields: string[] } | { error: string };

type SharedFields = Partial<{ [K in keyof typeof sharedFields]: z.output<(typeof sharedFields)[K]> }>;

const NO_FACILITY = 'facility: no facility column and none in the filename';

/**
 * Validates one CSV row against its extract kind. Only the name and facility
 * can reject a row.
 */
export function toPatientRecord(kind: ExtractKind, raw: Record<string, unknown>, context: RowContext): Conversion {
  const row = splitFullName(raw);

  const identity = identitySchema.safeParse(row);
  if (!identity.success) return { error: formatZodIssues(identity.error) };

  const facilityLabel = identity.data.facility ?? context.fallbackFacility;
  if (!facilityLabel) return { error: NO_FACILITY };

  const common = (shared: SharedFields) => ({
    extractId: context.extractId,
    rowNumber: context.rowNumber,
    firstName: identity.data.firstName,
    lastName: identity.data.lastName,
    patientId: identity.data.patientId,
    facilityLabel,
    facilityKey: normalizeFacilityLabel(facilityLabel),
    payerType: shared.payerType,
    encounterDate: shared.encounterDate,
  });

  switch (kind) {
    case 'ADT': {
      const { data, invalid } = parseFields(metricFields.ADT, row);
      return {
        record: {
          ...common(data),
          kind,
          encounterDate: data.encounterDate ?? data.admissionDate,
          admissionDate: data.admissionDate,
          dischargeDate: data.dischargeDate,
          dischargeDisposition: data.dischargeDisposition,
        },
        invalidFields: invalid,
      };
    }
    case 'LOS': {
      const { data, invalid } = parseFields(metricFields.LOS, row);
      return {
        record: { ...common(data), kind, lengthOfStayDays: data.lengthOfStayDays },
        invalidFields: invalid,
      };
    }
    case 'CHARGE_CAPTURE': {
      const { data, invalid } = parseFields(metricFields.CHARGE_CAPTURE, row);
      return {
        record: {
          ...common(data),
          kind,
          placeOfServiceCode: data.placeOfServiceCode,
          cptCodes: data.cptCodes ?? [],
        },
        invalidFields: invalid,
      };
    }
    case 'FUNCTIONAL_ASSESSMENT': {
      const { data, invalid } = parseFields(metricFields.FUNCTIONAL_ASSESSMENT, row);
      return {
        record: { ...common(data), kind, startScore: data.startScore, endScore: data.endScore },
        invalidFields: invalid,
      };
    }
  }
}

// ============================================
// File Loading
// ============================================

/**
 * Columns an extract must have (after alias mapping) for any row to load.
 */
function missingNameColumns(columns: readonly string[]): string[] {
  if (columns.includes('fullName')) return [];
  return ['firstName', 'lastName'].filter((column) => !columns.includes(column));
}

/**
 * Streams one CSV extract into records.
 *
 * @returns The extract plus one issue per rejected row or dropped field. A
 *          file without name columns loads as an empty extract with a single
 *          issue. Rejects when the file cannot be read.
 */
export async function loadExtractFile(params: LoadExtractParams): Promise<LoadedExtract> {
  const { extractId, kind, filePath, originalName } = params;
  const fallbackFacility = facilityLabelFromFilename(originalName, kind);
  const records: PatientRecord[] = [];
  const issues: ReconciliationIssue[] = [];

  const source = createReadStream(filePath);
  const parser = source.pipe(
    parse({
      columns: (header: string[]) => header.map(canonicalColumnName),
      skip_empty_lines: true,
      trim: true,
      bom: true,
      relax_column_count: true,
    })
  );

  // pipe() does not forward source errors; a missing file would leave the
  // iterator waiting forever
  source.on('error', (error) => parser.destroy(error));

  let rowNumber = 0;
  let rejected = 0;
  let headerChecked = false;

  try {
    for await (const row of parser) {
      rowNumber++;
      const values: Record<string, unknown> = row;

      if (!headerChecked) {
        headerChecked = true;
        const missing = missingNameColumns(Object.keys(values));
        if (missing.length > 0) {
          issues.push(
            createIssue('MALFORMED_RECORD', `${originalName}: missing column(s) ${missing.join(', ')}; no rows loaded`, {
              extractId,
            })
          );
          break;
        }
      }

      const conversion = toPatientRecord(kind, values, { extractId, rowNumber, fallbackFacility });
      if ('record' in conversion) {
        records.push(conversion.record);
        for (const field of conversion.invalidFields) {
          issues.push(
            createIssue('MALFORMED_RECORD', `${originalName} row ${rowNumber}: ${field}`, { extractId, rowNumber })
          );
        }
      } else {
        rejected++;
        issues.push(
          createIssue('MALFORMED_RECORD', `${originalName} row ${rowNumber}: ${conversion.error}`, {
            extractId,
            rowNumber,
          })
        );
      }
    }
  } finally {
    source.destroy();
  }

  logger.info(`[${extractId}] Loaded ${kind} extract ${originalName}: ${records.length} records, ${rejected} rejected, ${issues.length} issues`);

  return {
    extract: { id: extractId, kind, source: originalName, records },
    issues,
  };
}
