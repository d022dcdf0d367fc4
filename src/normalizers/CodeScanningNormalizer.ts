import type { ColumnSpec } from './columns';

/**
 * Code scanning alert → row.
 * Severity is the rule's security severity (critical/high/medium/low), not the
 * tool's note/warning/error level.
 */
export const CODE_SCANNING_COLUMNS: readonly ColumnSpec[] = [
  { header: 'Organization', from: 'organization' },
  { header: 'Repository', from: 'repository' },
  { header: 'Date Created', from: 'date', path: ['created_at'] },
  { header: 'Date Updated', from: 'date', path: ['updated_at'] },
  { header: 'Severity', from: 'field', path: ['rule', 'security_severity_level'] },
  { header: 'Rule ID', from: 'field', path: ['rule', 'id'] },
  { header: 'Description', from: 'field', path: ['most_recent_instance', 'message', 'text'] },
  { header: 'File', from: 'field', path: ['most_recent_instance', 'location', 'path'] },
  { header: 'Category', from: 'field', path: ['most_recent_instance', 'category'] },
  { header: 'URL', from: 'field', path: ['html_url'] },
];
