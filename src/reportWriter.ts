// src/reportWriter.ts
// Writes a finished ProjectReport to disk in one or more formats.
//
// File names follow {project}-{report}-{yyyyMMddHHmmss}.{ext}, e.g.
// payments-alert_count-20240115103000.csv

import * as fs from 'fs/promises';
import * as path from 'path';
import { format } from 'date-fns';
import type { ProjectReport } from './aggregator';
import { reportFileName, reportTitle } from './categories';
import { REPORT_TABLE, sqlLiteral, withReportTable } from './duckdb';
import { ReportWriteError } from './errors';
import { columnTypes, writeParquet } from './parquetWriter';

export const REPORT_FORMATS = ['csv', 'json', 'parquet', 'markdown'] as const;

export type ReportFormat = (typeof REPORT_FORMATS)[number];

const EXTENSIONS: Record<ReportFormat, string> = {
  csv: 'csv',
  json: 'json',
  parquet: 'parquet',
  markdown: 'md',
};

export interface WriteOptions {
  outputDir: string;
  formats: readonly ReportFormat[];
  // Used for the file name suffix and embedded metadata (default: now)
  timestamp?: Date;
}

export function isReportFormat(value: string): value is ReportFormat {
  return (REPORT_FORMATS as readonly string[]).includes(value);
}

export function reportFilePath(report: ProjectReport, outputDir: string, reportFormat: ReportFormat, timestamp: Date): string {
  const project = report.projectName.replace(/[^\w.-]+/g, '_');
  const stamp = format(timestamp, 'yyyyMMddHHmmss');
  return path.join(outputDir, `${project}-${reportFileName(report.kind)}-${stamp}.${EXTENSIONS[reportFormat]}`);
}

/**
 * One object per row, keyed by header.
 */
export function toJsonRecords(report: ProjectReport): Array<Record<string, string | number>> {
  return report.rows.map((row) =>
    Object.fromEntries(report.header.map((column, index) => [column, row[index]]))
  );
}

function escapeMarkdownCell(value: string | number): string {
  return String(value).replace(/\|/g, '\\|').replace(/\r?\n/g, ' ');
}

export function renderMarkdown(report: ProjectReport, generatedAt: Date): string {
  const lines: string[] = [
    `# ${reportTitle(report.kind)}: ${report.projectName}`,
    '',
    `Generated: ${generatedAt.toISOString()}`,
    '',
  ];

  if (report.rows.length === 0) {
    lines.push('*No open alerts.*');
  } else {
    lines.push(`| ${report.header.map(escapeMarkdownCell).join(' | ')} |`);
    lines.push(`|${report.header.map(() => '---').join('|')}|`);
    for (const row of report.rows) {
      lines.push(`| ${row.map(escapeMarkdownCell).join(' | ')} |`);
    }
  }

  if (report.diagnostics.length > 0) {
    lines.push('', `Skipped: ${report.diagnostics.length} (see run log)`);
  }

  return lines.join('\n') + '\n';
}

async function writeCsv(report: ProjectReport, filePath: string): Promise<void> {
  await withReportTable(report.header, columnTypes(report), report.rows, async (con) => {
    await con.run(`COPY ${REPORT_TABLE} TO ${sqlLiteral(filePath)} (HEADER, DELIMITER ',')`);
  });
}

async function writeFormat(report: ProjectReport, reportFormat: ReportFormat, filePath: string, timestamp: Date): Promise<void> {
  switch (reportFormat) {
    case 'csv':
      return writeCsv(report, filePath);
    case 'parquet':
      return writeParquet(report, filePath, timestamp);
    case 'json':
      return fs.writeFile(filePath, JSON.stringify(toJsonRecords(report), null, 2) + '\n', 'utf-8');
    case 'markdown':
      return fs.writeFile(filePath, renderMarkdown(report, timestamp), 'utf-8');
  }
}

/**
 * Writes `report` once per requested format and returns the written paths.
 *
 * @throws ReportWriteError naming the file that failed; files written before it are kept
 */
export async function writeProjectReport(report: ProjectReport, options: WriteOptions): Promise<string[]> {
  const timestamp = options.timestamp ?? new Date();
  const written: string[] = [];

  try {
    await fs.mkdir(options.outputDir, { recursive: true });
  } catch (error) {
    throw new ReportWriteError(options.outputDir, error);
  }

  for (const reportFormat of options.formats) {
    const filePath = reportFilePath(report, options.outputDir, reportFormat, timestamp);
    try {
      await writeFormat(report, reportFormat, filePath, timestamp);
    } catch (error) {
      throw new ReportWriteError(filePath, error);
    }
    written.push(filePath);
  }

  return written;
}
