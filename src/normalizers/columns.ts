// Column tables describe one report row: its header and where each cell comes from.

export type ColumnSpec =
  | { header: string; from: 'organization' }
  | { header: string; from: 'repository' }
  | { header: string; from: 'date'; path: readonly string[] }
  | { header: string; from: 'field'; path: readonly string[] };

export function headerOf(columns: readonly ColumnSpec[]): string[] {
  return columns.map((column) => column.header);
}
