/**
 * Payer Classification
 *
 * Maps free-text payer labels onto the configured payer types. A blank
 * label is unclassified; a non-blank label no alias recognizes falls into
 * the configured default type (e.g. everything but "Medicare A" is
 * "Managed Care").
 */

import type { ReconciliationConfig } from '../config';
import { PAYER_SOURCE_PRECEDENCE } from './constants';
import { nameKey } from './personName';
import type { MatchedIdentity } from './types';

export type PayerClassifier = (rawLabel: string | undefined) => string | undefined;

export function createPayerClassifier(payers: ReconciliationConfig['payers']): PayerClassifier {
  const labelByAlias = new Map<string, string>();
  for (const payer of payers.types) {
    for (const alias of [payer.label, ...payer.aliases]) {
      const key = nameKey(alias);
      if (key && !labelByAlias.has(key)) labelByAlias.set(key, payer.label);
    }
  }

  return (rawLabel) => {
    const key = nameKey(rawLabel);
    if (!key) return undefined;
    return labelByAlias.get(key) ?? payers.defaultLabel;
  };
}

/**
 * Payer type of a matched patient: the first non-blank payer label found,
 * consulting LOS, then functional assessment, charge capture and ADT rows.
 */
export function payerOfIdentity(
  identity: MatchedIdentity,
  classify: PayerClassifier
): string | undefined {
  for (const kind of PAYER_SOURCE_PRECEDENCE) {
    for (const record of identity.records) {
      if (record.kind !== kind) continue;
      const payer = classify(record.payerType);
      if (payer !== undefined) return payer;
    }
  }
  return undefined;
}
