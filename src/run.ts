// src/run.ts
// One reporter run: every selected project × every requested report.

import * as fs from 'fs/promises';
import * as path from 'path';
import { format } from 'date-fns';
import { type AlertFetcherOptions, createApiClient } from './api';
import { collectProjectReport, formatDiagnostic } from './aggregator';
import { REPORT_KINDS, type ReportKind, isReportKind, reportTitle } from './categories';
import type { NamedProject, ReporterConfig } from './config';
import { ConfigError, ReportWriteError } from './errors';
import type { Logger } from './logger';
import { createMockTransport } from './mockData';
import { appendRawResponse } from './rawResponseWriter';
import { type ReportFormat, isReportFormat, writeProjectReport } from './reportWriter';

export interface RunOptions {
  outputDir: string;
  reports: readonly ReportKind[];
  formats: readonly ReportFormat[];
  // Restrict the run to these project names
  projects?: readonly string[];
  concurrency?: number;
  paginate?: boolean;
  legacySecretScanningLayout?: boolean;
  // Read responses from this directory instead of the API
  mockDir?: string;
  saveRaw?: boolean;
  timestamp?: Date;
  transport?: AlertFetcherOptions['transport'];
}

export interface RunSummary {
  written: string[];
  skipped: number;
  failedWrites: number;
}

/**
 * Expands `all` and checks every name against the known report kinds.
 */
export function parseReportKinds(values: readonly string[]): ReportKind[] {
  const kinds: ReportKind[] = [];
  for (const value of values) {
    const candidates = value === 'all' ? REPORT_KINDS : [value];
    for (const candidate of candidates) {
      if (!isReportKind(candidate)) {
        throw new ConfigError(`Unknown report "${candidate}". Use one of: all, ${REPORT_KINDS.join(', ')}`);
      }
      if (!kinds.includes(candidate)) kinds.push(candidate);
    }
  }
  return kinds;
}

export function parseReportFormats(values: readonly string[]): ReportFormat[] {
  const formats: ReportFormat[] = [];
  for (const value of values) {
    if (!isReportFormat(value)) {
      throw new ConfigError(`Unknown format "${value}". Use csv, json, parquet or markdown`);
    }
    if (!formats.includes(value)) formats.push(value);
  }
  return formats;
}

function selectProjects(config: ReporterConfig, names: readonly string[] | undefined, logger: Logger): NamedProject[] {
  if (!names || names.length === 0) return config.projects;

  for (const name of names) {
    if (!config.projects.some((project) => project.name === name)) {
      logger.warn(`⚠️  Project "${name}" is not in the configuration`);
    }
  }
  return config.projects.filter((project) => names.includes(project.name));
}

/**
 * Runs every requested report for every selected project.
 *
 * A report that cannot be written is logged and counted; the run carries on.
 * @throws UnauthorizedError as soon as the API rejects the credential
 */
export async function runReporter(config: ReporterConfig, options: RunOptions, logger: Logger): Promise<RunSummary> {
  const timestamp = options.timestamp ?? new Date();
  const rawResponsesPath = path.join(options.outputDir, `raw-responses-${format(timestamp, 'yyyyMMddHHmmss')}.jsonl`);

  const fetcher = createApiClient(config.api, {
    transport: options.transport ?? (options.mockDir ? createMockTransport(options.mockDir) : undefined),
    paginate: options.paginate,
    onResponse: options.saveRaw ? (record) => appendRawResponse(rawResponsesPath, record, logger) : undefined,
    logger,
  });

  if (options.saveRaw) {
    await fs.mkdir(options.outputDir, { recursive: true });
  }

  const summary: RunSummary = { written: [], skipped: 0, failedWrites: 0 };

  for (const project of selectProjects(config, options.projects, logger)) {
    for (const kind of options.reports) {
      logger.info(`\n🔄 ${reportTitle(kind)} for project "${project.name}"`);

      const report = await collectProjectReport(kind, project, fetcher, {
        concurrency: options.concurrency,
        legacySecretScanningLayout: options.legacySecretScanningLayout,
        onDiagnostic: (diagnostic) => logger.warn(`  ⚠️  ${formatDiagnostic(diagnostic)}`),
      });
      summary.skipped += report.diagnostics.length;

      try {
        const written = await writeProjectReport(report, {
          outputDir: options.outputDir,
          formats: options.formats,
          timestamp,
        });
        for (const filePath of written) {
          logger.success(`  ✓ Wrote ${report.rows.length} rows to ${filePath}`);
        }
        summary.written.push(...written);
      } catch (error) {
        if (!(error instanceof ReportWriteError)) throw error;
        logger.error(`  ❌ ${error.message}`);
        summary.failedWrites += 1;
      }
    }
  }

  if (options.saveRaw) {
    logger.verbose(`Audit log: ${rawResponsesPath}`);
  }
  return summary;
}
