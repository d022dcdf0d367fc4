// Generic alert normalizer driven by the per-category column tables.
//
// To change what a report contains, edit the category's table; the header row is
// derived from the same table.

import type { AlertCategory } from '../categories';
import type { Target } from '../targets';
import { CODE_SCANNING_COLUMNS } from './CodeScanningNormalizer';
import { DEPENDABOT_COLUMNS } from './DependabotNormalizer';
import { SECRET_SCANNING_COLUMNS, SECRET_SCANNING_LEGACY_COLUMNS } from './SecretScanningNormalizer';
import { type ColumnSpec, headerOf } from './columns';
import { type RawAlert, dateAt, firstScalarAt, scalarAt } from './fields';

export { SENTINEL, isRecord, type RawAlert } from './fields';
export type { ColumnSpec } from './columns';

export type DetailRow = string[];

export interface NormalizeOptions {
  // Adds the payload's repository name as a third secret-scanning column
  legacySecretScanningLayout?: boolean;
}

const PAYLOAD_REPOSITORY_PATHS = [['repository', 'name']] as const;
const PAYLOAD_ORGANIZATION_PATHS = [
  ['organization', 'name'],
  ['repository', 'owner', 'login'],
] as const;

export function columnsFor(category: AlertCategory, options: NormalizeOptions = {}): readonly ColumnSpec[] {
  switch (category) {
    case 'code-scanning':
      return CODE_SCANNING_COLUMNS;
    case 'secret-scanning':
      return options.legacySecretScanningLayout ? SECRET_SCANNING_LEGACY_COLUMNS : SECRET_SCANNING_COLUMNS;
    case 'dependabot':
      return DEPENDABOT_COLUMNS;
  }
}

export function detailHeader(category: AlertCategory, options: NormalizeOptions = {}): string[] {
  return headerOf(columnsFor(category, options));
}

/**
 * The target supplies its own column; the other one comes from the payload.
 */
function ownerColumns(target: Target, alert: RawAlert): { organization: string; repository: string } {
  if (target.kind === 'organization') {
    return { organization: target.name, repository: firstScalarAt(alert, PAYLOAD_REPOSITORY_PATHS) };
  }
  return { organization: firstScalarAt(alert, PAYLOAD_ORGANIZATION_PATHS), repository: target.name };
}

/**
 * Maps one raw alert to a row of the category's schema.
 *
 * Missing nested values become "N/A". Dates are required.
 * @throws DateParseError when created_at or updated_at is missing or malformed
 */
export function normalizeAlert(
  category: AlertCategory,
  target: Target,
  alert: RawAlert,
  options: NormalizeOptions = {}
): DetailRow {
  const owners = ownerColumns(target, alert);

  return columnsFor(category, options).map((column) => {
    switch (column.from) {
      case 'organization':
        return owners.organization;
      case 'repository':
        return owners.repository;
      case 'date':
        return dateAt(alert, column.path);
      case 'field':
        return scalarAt(alert, column.path);
    }
  });
}
