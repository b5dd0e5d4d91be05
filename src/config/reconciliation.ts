/**
 * Reconciliation Settings
 *
 * Loads the JSON file that drives the metrics engine: procedure codes
 * reported per code, encounter categories, payer types, discharge
 * disposition rules and the directory of known facilities.
 *
 * Adding a CPT code or a payer alias is a config change only. With
 * `columnOrder` pinning the current column groups, new entries append their
 * columns to the export.
 */

import { readFileSync } from 'fs';
import { resolve } from 'path';
import { z } from 'zod';
import { columnGroupRefs } from '../reconciliation/columnSchema';
import { env } from './env';

// ============================================
// Schema
// ============================================

const codeList = z.array(z.string().trim().min(1)).default([]);

const categorySchema = z
  .object({
    key: z.string().trim().min(1),
    label: z.string().trim().min(1),
    placeOfServiceCodes: codeList,
    cptCodes: codeList,
  })
  .refine((category) => category.placeOfServiceCodes.length + category.cptCodes.length > 0, {
    message: 'A category needs at least one place-of-service or CPT code',
  });

const payerTypeSchema = z.object({
  label: z.string().trim().min(1),
  aliases: z.array(z.string()).default([]),
});

const dispositionRuleSchema = z.object({
  code: z.string().trim().min(1),
  label: z.string().trim().min(1),
  keywords: z.array(z.string().trim().min(1)).min(1),
});

const knownFacilitySchema = z.object({
  name: z.string().trim().min(1),
  aliases: z.array(z.string()).default([]),
});

export const reconciliationConfigSchema = z.object({
  partialMatchPrefixLength: z.number().int().min(1).default(3),
  reportingPeriod: z.enum(['month', 'quarter']).default('month'),
  cptCodes: codeList,
  categories: z.array(categorySchema).default([]),
  payers: z
    .object({
      types: z.array(payerTypeSchema).default([]),
      defaultLabel: z.string().trim().min(1).optional(),
    })
    .default({}),
  dispositions: z
    .object({
      rules: z.array(dispositionRuleSchema).default([]),
      other: z
        .object({ code: z.string().trim().min(1), label: z.string().trim().min(1) })
        .default({ code: 'OT', label: 'Other' }),
    })
    .default({}),
  facilities: z.array(knownFacilitySchema).default([]),
  /**
   * Pinned export order of column groups ("category:ltc", "payer:Medicare A",
   * "disposition:HD", "cpt:99309"). Groups not listed are appended.
   */
  columnOrder: z.array(z.string().trim().min(1)).optional(),
});

export type ReconciliationConfig = z.infer<typeof reconciliationConfigSchema>;
export type ReconciliationConfigInput = z.input<typeof reconciliationConfigSchema>;
export type EncounterCategoryConfig = ReconciliationConfig['categories'][number];
export type PayerTypeConfig = ReconciliationConfig['payers']['types'][number];
export type DispositionRuleConfig = ReconciliationConfig['dispositions']['rules'][number];
export type KnownFacilityConfig = ReconciliationConfig['facilities'][number];

// ============================================
// Loading
// ============================================

/**
 * Validates a raw settings object, applying defaults.
 *
 * @throws ZodError when the object does not describe valid settings
 */
export function parseReconciliationConfig(raw: unknown): ReconciliationConfig {
  const config = reconciliationConfigSchema.parse(raw);

  // Each of these becomes a column key, so repeats would collide
  const uniqueLists: Array<[string, string[]]> = [
    ['category keys', config.categories.map((category) => category.key)],
    ['CPT codes', config.cptCodes],
    ['payer labels', config.payers.types.map((payer) => payer.label)],
    [
      'disposition codes',
      [...config.dispositions.rules, config.dispositions.other].map((rule) => rule.code),
    ],
  ];
  for (const [name, values] of uniqueLists) {
    const duplicates = values.filter((value, index) => values.indexOf(value) !== index);
    if (duplicates.length > 0) {
      throw new Error(`Duplicate ${name} in reconciliation config: ${duplicates.join(', ')}`);
    }
  }

  const order = config.columnOrder;
  if (order) {
    const known = new Set(columnGroupRefs(config));
    const unknown = order.filter((ref) => !known.has(ref));
    if (unknown.length > 0) {
      throw new Error(`Unknown column groups in reconciliation config columnOrder: ${unknown.join(', ')}`);
    }
    const repeated = order.filter((ref, index) => order.indexOf(ref) !== index);
    if (repeated.length > 0) {
      throw new Error(`Duplicate column groups in reconciliation config columnOrder: ${repeated.join(', ')}`);
    }
  }

  return config;
}

/**
 * Reads and validates the settings file. Called once per run so that an
 * edited file is picked up by the next job without a restart.
 *
 * @param filePath - Defaults to RECONCILIATION_CONFIG_PATH, relative to cwd
 */
export function loadReconciliationConfig(
  filePath: string = env.RECONCILIATION_CONFIG_PATH
): ReconciliationConfig {
  const absolutePath = resolve(process.cwd(), filePath);
  const raw: unknown = JSON.parse(readFileSync(absolutePath, 'utf8'));
  return parseReconciliationConfig(raw);
}
