/**
 * Summary Column Schema
 *
 * Column order is part of the export contract: positional consumers read
 * the CSV by index. Fixed columns come first, then one group of columns per
 * configured category, payer, disposition and CPT code.
 */

import type { ReconciliationConfig } from '../config';
import type { ColumnDefinition } from './types';

// ============================================
// Column Keys
// ============================================

export const COLUMN_KEYS = {
  FACILITY: 'facility',
  PATIENTS_SERVED: 'patientsServed',
  TOTAL_VISITS: 'totalVisits',
  VISITED_PATIENTS: 'visitedPatients',
  AVG_VISITS_PER_PATIENT: 'avgVisitsPerPatient',
  PROVIDER_PATIENTS_RATIO: 'providerPatientsRatio',
  LOS_OVERALL_AVG: 'losOverallAvg',
  GAIN_OVERALL_AVG: 'gainOverallAvg',
} as const;

export const categoryGrossKey = (category: string): string => `category.${category}.gross`;
export const categoryUniqueKey = (category: string): string => `category.${category}.unique`;
export const categoryPeriodsKey = (category: string): string => `category.${category}.periods`;
export const payerRatioKey = (payer: string): string => `payer.${payer}.ratio`;
export const payerLosKey = (payer: string): string => `payer.${payer}.losAvg`;
export const payerGainKey = (payer: string): string => `payer.${payer}.gainAvg`;
export const dispositionRatioKey = (code: string): string => `disposition.${code}.ratio`;
export const dispositionPercentKey = (code: string): string => `disposition.${code}.percent`;
export const cptKey = (code: string): string => `cpt.${code}`;

// ============================================
// Column Groups
// ============================================

/**
 * One configured entry's columns, addressed as "<kind>:<id>", e.g.
 * "payer:Medicare A" or "cpt:99309".
 */
interface ColumnGroup {
  ref: string;
  columns: ColumnDefinition[];
}

export const columnGroupRef = (kind: 'category' | 'payer' | 'disposition' | 'cpt', id: string): string =>
  `${kind}:${id}`;

/**
 * Every configured entry's columns, in the default order: categories,
 * payers, dispositions, then CPT codes, each in configuration order.
 */
function columnGroups(config: ReconciliationConfig): ColumnGroup[] {
  const groups: ColumnGroup[] = [];

  for (const category of config.categories) {
    groups.push({
      ref: columnGroupRef('category', category.key),
      columns: [
        { key: categoryGrossKey(category.key), header: `${category.label} Gross`, kind: 'count' },
        { key: categoryUniqueKey(category.key), header: `${category.label} Unique Patients`, kind: 'count' },
        { key: categoryPeriodsKey(category.key), header: `${category.label} Patient-Periods`, kind: 'count' },
      ],
    });
  }

  for (const payer of config.payers.types) {
    groups.push({
      ref: columnGroupRef('payer', payer.label),
      columns: [
        { key: payerRatioKey(payer.label), header: `${payer.label} Ratio`, kind: 'ratio' },
        { key: payerLosKey(payer.label), header: `LOS ${payer.label} Avg`, kind: 'average' },
        { key: payerGainKey(payer.label), header: `GG Gain ${payer.label}`, kind: 'average' },
      ],
    });
  }

  for (const disposition of [...config.dispositions.rules, config.dispositions.other]) {
    groups.push({
      ref: columnGroupRef('disposition', disposition.code),
      columns: [
        { key: dispositionRatioKey(disposition.code), header: `${disposition.code} Ratio`, kind: 'ratio' },
        { key: dispositionPercentKey(disposition.code), header: `${disposition.code} %`, kind: 'percent' },
      ],
    });
  }

  for (const code of config.cptCodes) {
    groups.push({ ref: columnGroupRef('cpt', code), columns: [{ key: cptKey(code), header: `CPT ${code}`, kind: 'count' }] });
  }

  return groups;
}

/**
 * Group refs of a configuration in default order; a starting value for
 * `columnOrder`.
 */
export function columnGroupRefs(config: ReconciliationConfig): string[] {
  return columnGroups(config).map((group) => group.ref);
}

// ============================================
// Schema
// ============================================

const FIXED_COLUMNS: readonly ColumnDefinition[] = [
  { key: COLUMN_KEYS.FACILITY, header: 'Facility', kind: 'text' },
  { key: COLUMN_KEYS.PATIENTS_SERVED, header: 'Patients Served', kind: 'count' },
  { key: COLUMN_KEYS.TOTAL_VISITS, header: 'Total Visits', kind: 'count' },
  { key: COLUMN_KEYS.VISITED_PATIENTS, header: 'Visited Patients', kind: 'count' },
  { key: COLUMN_KEYS.AVG_VISITS_PER_PATIENT, header: 'Avg Visits per Patient', kind: 'average' },
  { key: COLUMN_KEYS.PROVIDER_PATIENTS_RATIO, header: 'Provider Patients Ratio', kind: 'ratio' },
  { key: COLUMN_KEYS.LOS_OVERALL_AVG, header: 'LOS Overall Avg', kind: 'average' },
  { key: COLUMN_KEYS.GAIN_OVERALL_AVG, header: 'GG Gain Overall', kind: 'average' },
];

/**
 * Builds the ordered column list for one run's configuration.
 *
 * Groups named in `config.columnOrder` come first, in that order; groups it
 * does not name follow in default order. With the current groups pinned
 * there, a newly configured payer, category, disposition or CPT code only
 * ever appends columns.
 */
export function buildColumnSchema(config: ReconciliationConfig): ColumnDefinition[] {
  const groups = new Map(columnGroups(config).map((group) => [group.ref, group]));
  const pinned = config.columnOrder ?? [];
  const pinnedRefs = new Set(pinned);

  const ordered = [
    ...pinned.flatMap((ref) => {
      const group = groups.get(ref);
      return group ? [group] : [];
    }),
    ...[...groups.values()].filter((group) => !pinnedRefs.has(group.ref)),
  ];

  return [...FIXED_COLUMNS, ...ordered.flatMap((group) => group.columns)];
}
