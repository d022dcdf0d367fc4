import type { ColumnSpec } from './columns';

export const SECRET_SCANNING_COLUMNS: readonly ColumnSpec[] = [
  { header: 'Organization', from: 'organization' },
  { header: 'Repository', from: 'repository' },
  { header: 'Date Created', from: 'date', path: ['created_at'] },
  { header: 'Date Updated', from: 'date', path: ['updated_at'] },
  { header: 'Secret Type Name', from: 'field', path: ['secret_type_display_name'] },
  { header: 'Secret Type', from: 'field', path: ['secret_type'] },
  { header: 'URL', from: 'field', path: ['html_url'] },
];

/**
 * Older exports carried the payload's repository name as a third column, next to
 * the resolved one. Kept for consumers that still read that layout.
 */
export const SECRET_SCANNING_LEGACY_COLUMNS: readonly ColumnSpec[] = [
  ...SECRET_SCANNING_COLUMNS.slice(0, 2),
  { header: 'Repository Name', from: 'field', path: ['repository', 'name'] },
  ...SECRET_SCANNING_COLUMNS.slice(2),
];
