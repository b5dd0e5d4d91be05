/**
 * Tests for identity resolution across any number of batches
 */

import { resolveIdentities } from '../../src/reconciliation/identityResolver';
import { DisjointSet } from '../../src/reconciliation/disjointSet';
import { WYOMING, chargeRecord } from '../helpers/records';

describe('resolveIdentities', () => {
  it('should join one patient across three batches', () => {
    const john1 = chargeRecord({ extractId: 'aug', patientId: 'P1' });
    const mary1 = chargeRecord({ extractId: 'aug', firstName: 'Mary', lastName: 'Jones' });
    const john2 = chargeRecord({ extractId: 'sep' });
    const mary2 = chargeRecord({ extractId: 'sep', firstName: 'Mary', lastName: 'Jones' });
    const mary3 = chargeRecord({ extractId: 'oct', firstName: 'Mary', lastName: 'Jones' });

    const result = resolveIdentities(WYOMING, [[john1, mary1], [john2, mary2], [mary3]]);

    expect(result.identities).toHaveLength(2);
    expect(result.identities[0].records).toEqual([john1, john2]);
    expect(result.identities[1].records).toEqual([mary1, mary2, mary3]);
    expect(result.identityOf.get(mary3)).toBe(`${WYOMING}#2`);
    expect(result.identities[0].matchedBy).toBe('EXACT_NAME');
  });

  it('should close matches transitively', () => {
    // Sep joins Aug by id, Oct joins Sep by name only
    const aug = chargeRecord({ extractId: 'aug', patientId: 'P7', firstName: 'Jon', lastName: 'Smyth' });
    const sep = chargeRecord({ extractId: 'sep', patientId: 'P7' });
    const oct = chargeRecord({ extractId: 'oct' });

    const result = resolveIdentities(WYOMING, [[aug], [sep], [oct]]);

    expect(result.identities).toHaveLength(1);
    expect(result.identities[0].records).toEqual([aug, sep, oct]);
    expect(result.identities[0].matchedBy).toBe('PATIENT_ID');
  });

  it('should collapse repeated rows of one patient within a batch', () => {
    const first = chargeRecord({ encounterDate: new Date('2025-08-04T00:00:00.000Z') });
    const second = chargeRecord({ firstName: 'JOHN', encounterDate: new Date('2025-08-18T00:00:00.000Z') });

    const result = resolveIdentities(WYOMING, [[first, second]]);

    expect(result.identities).toHaveLength(1);
    expect(result.identities[0].records).toEqual([first, second]);
    expect(result.decisions).toHaveLength(0);
  });

  it('should keep same-name rows with different ids apart within a batch', () => {
    const result = resolveIdentities(WYOMING, [[chargeRecord({ patientId: 'P1' }), chargeRecord({ patientId: 'P2' })]]);

    expect(result.identities).toHaveLength(2);
  });

  it('should report records of other facilities', () => {
    const foreign = chargeRecord({ facilityKey: 'st joseph care center' });

    const result = resolveIdentities(WYOMING, [[chargeRecord()], [foreign]]);

    expect(result.identities).toHaveLength(1);
    expect(result.issues.map((issue) => issue.code)).toEqual(['CROSS_FACILITY_MATCH_ATTEMPT']);
  });

  it('should return no identities for empty batches', () => {
    const result = resolveIdentities(WYOMING, [[], []]);

    expect(result.identities).toEqual([]);
    expect(result.identityOf.size).toBe(0);
  });
});

describe('DisjointSet', () => {
  it('should put transitively joined elements under one root', () => {
    const sets = new DisjointSet(4);
    sets.union(0, 1);
    sets.union(2, 1);

    expect(sets.find(2)).toBe(sets.find(0));
    expect(sets.find(3)).toBe(3);
  });
});
