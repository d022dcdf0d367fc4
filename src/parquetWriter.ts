// src/parquetWriter.ts
// DuckDB-based Parquet export with report metadata preserved as key-value metadata

import type { ProjectReport } from './aggregator';
import { reportTitle } from './categories';
import { type ColumnType, REPORT_TABLE, sqlLiteral, withReportTable } from './duckdb';

/**
 * Runtime metadata about the report, embedded in the Parquet footer
 */
export type ReportMetadata = {
  project: string;
  report: string;
  generatedAt: string;
  rowCount: number;
  skipped: number;
};

export function buildKvMetadata(report: ProjectReport, generatedAt: Date): ReportMetadata {
  return {
    project: report.projectName,
    report: reportTitle(report.kind),
    generatedAt: generatedAt.toISOString(),
    rowCount: report.rows.length,
    skipped: report.diagnostics.length,
  };
}

/**
 * Count columns are integers; everything else is text.
 */
export function columnTypes(report: ProjectReport): ColumnType[] {
  return report.header.map((_, index) => (report.kind === 'counts' && index >= 2 ? 'BIGINT' : 'VARCHAR'));
}

export async function writeParquet(report: ProjectReport, filePath: string, generatedAt: Date): Promise<void> {
  const metadata = buildKvMetadata(report, generatedAt);

  const kvMetadataEntries = Object.entries(metadata)
    .map(([key, value]) => `${key}: ${sqlLiteral(String(value))}`)
    .join(',\n        ');

  await withReportTable(report.header, columnTypes(report), report.rows, async (con) => {
    await con.run(`
      COPY ${REPORT_TABLE} TO ${sqlLiteral(filePath)} (
        FORMAT PARQUET,
        COMPRESSION ZSTD,
        KV_METADATA {
          ${kvMetadataEntries}
        }
      )
    `);
  });
}
