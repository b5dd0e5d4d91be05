/**
 * Summary Export Service
 *
 * Writes the master summary as CSV with papaparse, one column per schema
 * entry in schema order.
 */

import { mkdir, writeFile } from 'fs/promises';
import { join, resolve } from 'path';
import Papa from 'papaparse';
import type { ColumnDefinition, FacilityMetricsRow, ReconciliationSummary, SummaryExporter } from '../reconciliation';

export const SUMMARY_FILENAME = 'master_summary.csv';

/**
 * Renders rows as CSV text with the schema's headers.
 */
export function summaryToCsv(columns: readonly ColumnDefinition[], rows: readonly FacilityMetricsRow[]): string {
  return Papa.unparse({
    fields: columns.map((column) => column.header),
    data: rows.map((row) => columns.map((column) => row.values[column.key])),
  });
}

/**
 * Writes `<outputDir>/<runId>/master_summary.csv`.
 */
export class CsvSummaryExporter implements SummaryExporter {
  private readonly outputDir: string;

  constructor(outputDir: string) {
    this.outputDir = resolve(process.cwd(), outputDir);
  }

  async export(summary: ReconciliationSummary): Promise<string> {
    const directory = join(this.outputDir, summary.runId);
    await mkdir(directory, { recursive: true });

    const filePath = join(directory, SUMMARY_FILENAME);
    await writeFile(filePath, summaryToCsv(summary.columns, summary.rows), 'utf8');
    return filePath;
  }
}
