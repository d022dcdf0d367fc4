import type { ColumnSpec } from './columns';

export const DEPENDABOT_COLUMNS: readonly ColumnSpec[] = [
  { header: 'Organization', from: 'organization' },
  { header: 'Repository', from: 'repository' },
  { header: 'Date Created', from: 'date', path: ['created_at'] },
  { header: 'Date Updated', from: 'date', path: ['updated_at'] },
  { header: 'Severity', from: 'field', path: ['security_advisory', 'severity'] },
  { header: 'Package Name', from: 'field', path: ['dependency', 'package', 'name'] },
  { header: 'CVE ID', from: 'field', path: ['security_advisory', 'cve_id'] },
  { header: 'Summary', from: 'field', path: ['security_advisory', 'summary'] },
  { header: 'Scope', from: 'field', path: ['dependency', 'scope'] },
  { header: 'Manifest Path', from: 'field', path: ['dependency', 'manifest_path'] },
  { header: 'URL', from: 'field', path: ['html_url'] },
];
