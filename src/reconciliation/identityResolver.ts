/**
 * Identity Resolution across Batches
 *
 * Extends the two-source matcher to any number of batches:
 * 1. Within a batch, rows sharing a patient id, or sharing a full name
 *    without conflicting ids, collapse into one cluster
 * 2. Every pair of batches is matched on cluster representatives
 * 3. Matches are closed transitively with a disjoint set
 *
 * Identity ids are "<facility>#<n>", numbered in order of first appearance.
 */

import { DisjointSet } from './disjointSet';
import type { ReconciliationIssue } from './issues';
import { matchRecords, partitionByFacility, type MatchOptions } from './patientMatcher';
import { fullNameKey } from './personName';
import type { FacilityKey, MatchDecision, MatchedBy, MatchedIdentity, PatientRecord } from './types';

export interface IdentityResolution {
  facilityKey: FacilityKey;
  identities: MatchedIdentity[];
  /** Identity id for every record that took part */
  identityOf: ReadonlyMap<PatientRecord, string>;
  decisions: MatchDecision[];
  issues: ReconciliationIssue[];
}

interface Cluster {
  records: PatientRecord[];
  patientId?: string;
}

/**
 * Collapses rows of one batch that denote the same patient.
 */
function clusterBatch(records: readonly PatientRecord[]): Cluster[] {
  const clusters: Cluster[] = [];
  const byId = new Map<string, Cluster>();
  const byName = new Map<string, Cluster[]>();

  for (const record of records) {
    const key = fullNameKey(record.firstName, record.lastName);
    let target = record.patientId !== undefined ? byId.get(record.patientId) : undefined;

    if (!target && key !== null) {
      target = byName
        .get(key)
        ?.find(
          (cluster) =>
            record.patientId === undefined ||
            cluster.patientId === undefined ||
            cluster.patientId === record.patientId
        );
    }
    if (!target) {
      target = { records: [] };
      clusters.push(target);
    }

    target.records.push(record);

    if (record.patientId !== undefined && target.patientId === undefined) {
      target.patientId = record.patientId;
      byId.set(record.patientId, target);
    }
    if (key !== null) {
      const named = byName.get(key) ?? [];
      if (!named.includes(target)) {
        named.push(target);
        byName.set(key, named);
      }
    }
  }

  return clusters;
}

/**
 * Record that stands for a cluster when batches are matched: the first one
 * carrying a patient id, else the first one.
 */
const representativeOf = (cluster: Cluster): PatientRecord =>
  cluster.records.find((record) => record.patientId !== undefined) ?? cluster.records[0];

/**
 * Resolves patient identities across batches of one facility.
 *
 * @param batches - Record sets in batch order (e.g. one per extract)
 */
export function resolveIdentities(
  facility: FacilityKey,
  batches: ReadonlyArray<readonly PatientRecord[]>,
  options: MatchOptions = {}
): IdentityResolution {
  const issues: ReconciliationIssue[] = [];
  const clusters: Cluster[] = [];
  const representativesByBatch: PatientRecord[][] = [];
  const clusterOfRepresentative = new Map<PatientRecord, number>();

  for (const batch of batches) {
    const { local, issues: crossFacility } = partitionByFacility(batch, facility);
    issues.push(...crossFacility);

    const representatives: PatientRecord[] = [];
    for (const cluster of clusterBatch(local)) {
      const representative = representativeOf(cluster);
      clusterOfRepresentative.set(representative, clusters.length);
      clusters.push(cluster);
      representatives.push(representative);
    }
    representativesByBatch.push(representatives);
  }

  const sets = new DisjointSet(clusters.length);
  const decisions: MatchDecision[] = [];

  for (let i = 0; i < representativesByBatch.length; i++) {
    for (let j = i + 1; j < representativesByBatch.length; j++) {
      const outcome = matchRecords(representativesByBatch[i], representativesByBatch[j], facility, options);
      for (const decision of outcome.decisions) {
        const clusterA = clusterOfRepresentative.get(decision.recordA);
        const clusterB = clusterOfRepresentative.get(decision.recordB);
        if (clusterA === undefined || clusterB === undefined) continue;
        sets.union(clusterA, clusterB);
        decisions.push(decision);
      }
    }
  }

  // First rule that joined each group, in decision order
  const ruleOfRoot = new Map<number, MatchedBy>();
  for (const decision of decisions) {
    const cluster = clusterOfRepresentative.get(decision.recordA);
    if (cluster === undefined) continue;
    const root = sets.find(cluster);
    if (!ruleOfRoot.has(root)) ruleOfRoot.set(root, decision.rule);
  }

  const identityIndexOfRoot = new Map<number, number>();
  const grouped: PatientRecord[][] = [];
  const roots: number[] = [];

  clusters.forEach((cluster, index) => {
    const root = sets.find(index);
    let identityIndex = identityIndexOfRoot.get(root);
    if (identityIndex === undefined) {
      identityIndex = grouped.length;
      identityIndexOfRoot.set(root, identityIndex);
      grouped.push([]);
      roots.push(root);
    }
    grouped[identityIndex].push(...cluster.records);
  });

  const identityOf = new Map<PatientRecord, string>();
  const identities: MatchedIdentity[] = grouped.map((records, index) => {
    const id = `${facility}#${index + 1}`;
    for (const record of records) identityOf.set(record, id);
    return {
      id,
      facilityKey: facility,
      records,
      matchedBy: ruleOfRoot.get(roots[index]) ?? 'UNMATCHED',
    };
  });

  return { facilityKey: facility, identities, identityOf, decisions, issues };
}
