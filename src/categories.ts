// src/categories.ts
// The three alert categories and the report names used for their output files.

export const ALERT_CATEGORIES = ['code-scanning', 'secret-scanning', 'dependabot'] as const;

export type AlertCategory = (typeof ALERT_CATEGORIES)[number];

// A report is either the per-target count summary or one category's detail listing
export type ReportKind = 'counts' | AlertCategory;

export const REPORT_KINDS: readonly ReportKind[] = ['counts', ...ALERT_CATEGORIES];

const CATEGORY_LABELS: Record<AlertCategory, string> = {
  'code-scanning': 'Code Scanning',
  'secret-scanning': 'Secret Scanning',
  dependabot: 'Dependabot',
};

// Base names of the written files, e.g. payments-codeql_alerts-20240115103000.csv
const REPORT_FILE_NAMES: Record<ReportKind, string> = {
  counts: 'alert_count',
  'code-scanning': 'codeql_alerts',
  'secret-scanning': 'secretscan_alerts',
  dependabot: 'dependabot_alerts',
};

export function isAlertCategory(value: string): value is AlertCategory {
  return (ALERT_CATEGORIES as readonly string[]).includes(value);
}

export function isReportKind(value: string): value is ReportKind {
  return value === 'counts' || isAlertCategory(value);
}

export function categoryLabel(category: AlertCategory): string {
  return CATEGORY_LABELS[category];
}

export function reportFileName(kind: ReportKind): string {
  return REPORT_FILE_NAMES[kind];
}

export function reportTitle(kind: ReportKind): string {
  return kind === 'counts' ? 'Open Alert Counts' : `Open ${categoryLabel(kind)} Alerts`;
}
