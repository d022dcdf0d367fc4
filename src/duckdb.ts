// src/duckdb.ts
// Loads report rows into an in-memory DuckDB table so its native CSV and Parquet
// writers can export them.

import { DuckDBInstance } from '@duckdb/node-api';
import type { ReportRow } from './aggregator';

export type DuckDBConnection = Awaited<ReturnType<DuckDBInstance['connect']>>;

export type ColumnType = 'VARCHAR' | 'BIGINT';

export const REPORT_TABLE = 'alert_report';

export function quoteIdentifier(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

export function sqlLiteral(value: string | number): string {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? String(value) : 'NULL';
  }
  // Escape single quotes in values for SQL
  return `'${value.replace(/'/g, "''")}'`;
}

/**
 * Loads the report table into a fresh in-memory database and hands the connection
 * to `use`. The connection is closed when `use` settles, whether or not it threw.
 */
export async function withReportTable<T>(
  header: readonly string[],
  types: readonly ColumnType[],
  rows: readonly ReportRow[],
  use: (con: DuckDBConnection) => Promise<T>
): Promise<T> {
  const db = await DuckDBInstance.create(':memory:');
  const con = await db.connect();

  try {
    const columns = header.map((name, index) => `${quoteIdentifier(name)} ${types[index] ?? 'VARCHAR'}`).join(', ');
    await con.run(`CREATE TABLE ${REPORT_TABLE} (${columns})`);

    if (rows.length > 0) {
      const values = rows.map((row) => `(${row.map((cell) => sqlLiteral(cell)).join(', ')})`).join(',\n');
      await con.run(`INSERT INTO ${REPORT_TABLE} VALUES\n${values}`);
    }

    return await use(con);
  } finally {
    con.closeSync();
  }
}
