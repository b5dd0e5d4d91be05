import { buildColumnSchema, columnGroupRefs } from '../../src/reconciliation/columnSchema';
import { parseReconciliationConfig } from '../../src/config/reconciliation';
import { testConfig } from '../helpers/config';

describe('buildColumnSchema', () => {
  it('should order fixed columns, categories, payers, dispositions and CPT codes', () => {
    const headers = buildColumnSchema(testConfig).map((column) => column.header);

    expect(headers).toEqual([
      'Facility',
      'Patients Served',
      'Total Visits',
      'Visited Patients',
      'Avg Visits per Patient',
      'Provider Patients Ratio',
      'LOS Overall Avg',
      'GG Gain Overall',
      'LTC Encounters Gross',
      'LTC Encounters Unique Patients',
      'LTC Encounters Patient-Periods',
      'Injections Gross',
      'Injections Unique Patients',
      'Injections Patient-Periods',
      'Medicare A Ratio',
      'LOS Medicare A Avg',
      'GG Gain Medicare A',
      'Managed Care Ratio',
      'LOS Managed Care Avg',
      'GG Gain Managed Care',
      'HD Ratio',
      'HD %',
      'HT Ratio',
      'HT %',
      'OT Ratio',
      'OT %',
      'CPT 99309',
      'CPT 20600',
      'CPT 20610',
    ]);
  });

  it('should append a column when a CPT code is added', () => {
    const before = buildColumnSchema(testConfig);
    const after = buildColumnSchema(
      parseReconciliationConfig({ ...testConfig, cptCodes: [...testConfig.cptCodes, '99310'] })
    );

    expect(after.slice(0, before.length)).toEqual(before);
    expect(after[after.length - 1]).toEqual({ key: 'cpt.99310', header: 'CPT 99310', kind: 'count' });
  });

  it('should append the columns of a new payer and category behind pinned groups', () => {
    const pinned = parseReconciliationConfig({ ...testConfig, columnOrder: columnGroupRefs(testConfig) });
    const grown = parseReconciliationConfig({
      ...pinned,
      categories: [...pinned.categories, { key: 'therapy', label: 'Therapy', cptCodes: ['97110'] }],
      payers: { ...pinned.payers, types: [...pinned.payers.types, { label: 'Medicaid', aliases: [] }] },
      dispositions: {
        ...pinned.dispositions,
        rules: [...pinned.dispositions.rules, { code: 'Ex', label: 'Expired', keywords: ['expired'] }],
      },
    });

    const before = buildColumnSchema(pinned).map((column) => column.header);
    const after = buildColumnSchema(grown).map((column) => column.header);

    expect(before).toEqual(buildColumnSchema(testConfig).map((column) => column.header));
    expect(after.slice(0, before.length)).toEqual(before);
    expect(after.slice(before.length)).toEqual([
      'Therapy Gross',
      'Therapy Unique Patients',
      'Therapy Patient-Periods',
      'Medicaid Ratio',
      'LOS Medicaid Avg',
      'GG Gain Medicaid',
      'Ex Ratio',
      'Ex %',
    ]);
  });

  it('should follow a pinned order that differs from the default', () => {
    const config = parseReconciliationConfig({
      ...testConfig,
      columnOrder: ['cpt:20600', 'payer:Managed Care'],
    });

    const headers = buildColumnSchema(config).map((column) => column.header);

    expect(headers.slice(8, 12)).toEqual(['CPT 20600', 'Managed Care Ratio', 'LOS Managed Care Avg', 'GG Gain Managed Care']);
    expect(headers[12]).toBe('LTC Encounters Gross');
  });

  it('should give every column a distinct key', () => {
    const keys = buildColumnSchema(testConfig).map((column) => column.key);

    expect(new Set(keys).size).toBe(keys.length);
  });
});
