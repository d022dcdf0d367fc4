// src/aggregator.ts
// Drives targets × categories through the fetcher and normalizer for one project.
//
// Failures for one (target, category) are reported and skipped. Unauthorized is the
// exception: it aborts the project and the rest of the run.

import { ALERT_CATEGORIES, type AlertCategory, type ReportKind } from './categories';
import type { AlertSource, ErrorKind, FetchResult } from './api';
import type { NamedProject } from './config';
import { runWithConcurrency } from './concurrency';
import { DateParseError, UnauthorizedError } from './errors';
import {
  type NormalizeOptions,
  type RawAlert,
  SENTINEL,
  detailHeader,
  normalizeAlert,
} from './normalizers';
import { type Target, describeTarget, resolveTargets } from './targets';

export const COUNT_HEADER = [
  'Organization',
  'Repository',
  'Code Scanning Alerts',
  'Secret Scanning Alerts',
  'Dependabot Alerts',
];

export type CountRow = [organization: string, repository: string, codeScanning: number, secretScanning: number, dependabot: number];

export type Cell = string | number;

// Detail rows hold strings only; count rows end in three integers
export type ReportRow = Cell[];

export interface Diagnostic {
  target: Target;
  category: AlertCategory;
  kind: ErrorKind | 'DateParseError' | 'MalformedAlert';
  status?: number;
  detail: string;
  // Set when a single alert was skipped rather than the whole fetch
  alert?: string;
}

export interface ProjectReport {
  projectName: string;
  kind: ReportKind;
  header: string[];
  rows: ReportRow[];
  diagnostics: Diagnostic[];
}

export interface AggregateOptions extends NormalizeOptions {
  // Maximum number of fetches in flight (default 1: strictly sequential)
  concurrency?: number;
  onDiagnostic?: (diagnostic: Diagnostic) => void;
}

interface FetchTask {
  target: Target;
  category: AlertCategory;
}

export function formatDiagnostic(diagnostic: Diagnostic): string {
  const subject = diagnostic.alert
    ? `${describeTarget(diagnostic.target)} alert ${diagnostic.alert}`
    : describeTarget(diagnostic.target);
  const kind = diagnostic.status !== undefined ? `${diagnostic.kind} (${diagnostic.status})` : diagnostic.kind;
  return `[${diagnostic.category}] ${subject}: ${kind} - ${diagnostic.detail}`;
}

export function headerFor(kind: ReportKind, options: NormalizeOptions = {}): string[] {
  return kind === 'counts' ? [...COUNT_HEADER] : detailHeader(kind, options);
}

async function fetchSafely(source: AlertSource, task: FetchTask, signal: AbortSignal): Promise<FetchResult> {
  try {
    return await source.fetch(task.category, task.target, signal);
  } catch (error) {
    return {
      ok: false,
      kind: 'Transport',
      detail: error instanceof Error ? error.message : String(error),
    };
  }
}

function alertLabel(alert: RawAlert, index: number): string {
  const { number } = alert;
  return typeof number === 'number' ? `#${number}` : `at position ${index + 1}`;
}

/**
 * Fetches every task, up to `concurrency` at a time. The first Unauthorized result
 * stops queued tasks from starting and cancels the ones in flight.
 */
async function fetchAll(
  tasks: FetchTask[],
  source: AlertSource,
  concurrency: number
): Promise<Array<FetchResult | undefined>> {
  const controller = new AbortController();
  return runWithConcurrency(
    tasks,
    concurrency,
    async (task) => {
      const result = await fetchSafely(source, task, controller.signal);
      if (!result.ok && result.kind === 'Unauthorized') {
        controller.abort();
      }
      return result;
    },
    controller.signal
  );
}

/**
 * Builds the report of `kind` for one project.
 *
 * Rows follow target resolution order, then the order the API returned alerts in.
 * In count mode a target with any failed category contributes no row.
 *
 * @throws UnauthorizedError when any fetch is rejected for authentication
 */
export async function collectProjectReport(
  kind: ReportKind,
  project: NamedProject,
  source: AlertSource,
  options: AggregateOptions = {}
): Promise<ProjectReport> {
  const targets = resolveTargets(project.config);
  const categories: readonly AlertCategory[] = kind === 'counts' ? ALERT_CATEGORIES : [kind];
  const tasks: FetchTask[] = targets.flatMap((target) => categories.map((category) => ({ target, category })));

  const results = await fetchAll(tasks, source, options.concurrency ?? 1);

  const report: ProjectReport = {
    projectName: project.name,
    kind,
    header: headerFor(kind, options),
    rows: [],
    diagnostics: [],
  };
  const diagnose = (diagnostic: Diagnostic): void => {
    report.diagnostics.push(diagnostic);
    options.onDiagnostic?.(diagnostic);
  };

  // Checked before anything is reported: a rejected credential produces no diagnostics
  for (const [index, result] of results.entries()) {
    if (result !== undefined && !result.ok && result.kind === 'Unauthorized') {
      const { target, category } = tasks[index];
      throw new UnauthorizedError(describeTarget(target), category, result.detail);
    }
  }

  const counts = new Map<Target, Partial<Record<AlertCategory, number>>>();
  for (let index = 0; index < tasks.length; index++) {
    const { target, category } = tasks[index];
    const result = results[index];
    if (result === undefined) break;

    if (!result.ok) {
      diagnose({ target, category, kind: result.kind, status: result.status, detail: result.detail });
      continue;
    }

    if (kind === 'counts') {
      const perTarget = counts.get(target) ?? {};
      perTarget[category] = result.count;
      counts.set(target, perTarget);
      continue;
    }

    if (result.malformed > 0) {
      diagnose({
        target,
        category,
        kind: 'MalformedAlert',
        detail: `${result.malformed} of ${result.count} items in the response were not alert objects`,
      });
    }

    result.alerts.forEach((alert, alertIndex) => {
      try {
        report.rows.push(normalizeAlert(category, target, alert, options));
      } catch (error) {
        if (!(error instanceof DateParseError)) throw error;
        diagnose({ target, category, kind: 'DateParseError', detail: error.message, alert: alertLabel(alert, alertIndex) });
      }
    });
  }

  if (kind === 'counts') {
    for (const target of targets) {
      const perCategory = counts.get(target);
      const code = perCategory?.['code-scanning'];
      const secret = perCategory?.['secret-scanning'];
      const dependabot = perCategory?.dependabot;
      if (code === undefined || secret === undefined || dependabot === undefined) continue;

      const row: CountRow = [
        target.kind === 'organization' ? target.name : SENTINEL,
        target.kind === 'repository' ? target.name : SENTINEL,
        code,
        secret,
        dependabot,
      ];
      report.rows.push(row);
    }
  }

  return report;
}
