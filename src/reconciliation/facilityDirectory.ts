/**
 * Facility Directory
 *
 * Per-run lookup of known facilities built from configuration. Aliases
 * resolve to their facility's key; anything else stays its own facility.
 * Rebuilt for every run and passed in as a value, never cached globally.
 */

import { FACILITY_SUGGESTION_THRESHOLD } from './constants';
import { formatFacilityDisplayName, normalizeFacilityLabel } from './facilityNormalizer';
import { closestMatch } from './similarity';
import type { FacilityKey } from './types';

export interface KnownFacility {
  name: string;
  aliases?: readonly string[];
}

export interface FacilityResolution {
  key: FacilityKey;
  displayName: string;
  /** False when the label matched no configured facility or alias */
  known: boolean;
  /** Closest known facility by name similarity, for unresolved labels only */
  suggestion?: { key: FacilityKey; displayName: string; similarity: number };
}

interface DirectoryEntry {
  key: FacilityKey;
  displayName: string;
}

export class FacilityDirectory {
  private readonly entries: ReadonlyMap<FacilityKey, DirectoryEntry>;
  private readonly canonicalKeys: readonly FacilityKey[];

  constructor(facilities: readonly KnownFacility[] = []) {
    const entries = new Map<FacilityKey, DirectoryEntry>();
    const canonicalKeys: FacilityKey[] = [];

    for (const facility of facilities) {
      const key = normalizeFacilityLabel(facility.name);
      const entry: DirectoryEntry = { key, displayName: facility.name.trim() };

      if (!entries.has(key)) {
        canonicalKeys.push(key);
        entries.set(key, entry);
      }
      for (const alias of facility.aliases ?? []) {
        const aliasKey = normalizeFacilityLabel(alias);
        if (!entries.has(aliasKey)) {
          entries.set(aliasKey, entry);
        }
      }
    }

    this.entries = entries;
    this.canonicalKeys = canonicalKeys;
  }

  /** Number of configured facilities (aliases not counted) */
  get size(): number {
    return this.canonicalKeys.length;
  }

  /**
   * Resolves a raw label. Never throws and never merges an unknown label
   * into a known facility.
   */
  resolve(rawLabel: string): FacilityResolution {
    const key = normalizeFacilityLabel(rawLabel);
    const entry = this.entries.get(key);

    if (entry) {
      return { key: entry.key, displayName: entry.displayName, known: true };
    }

    const resolution: FacilityResolution = {
      key,
      displayName: formatFacilityDisplayName(key),
      known: false,
    };

    const closest = closestMatch(key, this.canonicalKeys, FACILITY_SUGGESTION_THRESHOLD);
    if (closest) {
      const suggested = this.entries.get(closest.value);
      if (suggested) {
        resolution.suggestion = {
          key: suggested.key,
          displayName: suggested.displayName,
          similarity: closest.similarity,
        };
      }
    }

    return resolution;
  }
}
