/**
 * Typed Table Model
 *
 * Immutable column tables with one declared type per column. Every operation in
 * this package returns a new table; inputs are never mutated.
 *
 * No async I/O, no logging.
 */

/**
 * Declared column type. `null` marks a column whose type is unknown because it
 * holds no values at all; such a column cannot be unioned with a typed one.
 */
export type ColumnType = 'int' | 'float' | 'string' | 'bool' | 'null';

export type CellValue = number | string | boolean | null;

export interface ColumnSpec {
  readonly name: string;
  readonly type: ColumnType;
}

export type TableRow = Readonly<Record<string, CellValue>>;

export interface DataTable {
  readonly columns: readonly ColumnSpec[];
  readonly rows: readonly TableRow[];
}

export const EMPTY_TABLE: DataTable = { columns: [], rows: [] };

export function columnNames(table: DataTable): string[] {
  return table.columns.map((c) => c.name);
}

export function hasColumn(table: DataTable, name: string): boolean {
  return table.columns.some((c) => c.name === name);
}

export function getColumn(table: DataTable, name: string): ColumnSpec | undefined {
  return table.columns.find((c) => c.name === name);
}

export function isEmpty(table: DataTable): boolean {
  return table.rows.length === 0;
}

/** Typed default used in place of an absent value */
export function defaultValueFor(type: ColumnType): CellValue {
  switch (type) {
    case 'int':
    case 'float':
      return 0;
    case 'string':
      return '';
    case 'bool':
      return false;
    case 'null':
      return null;
  }
}

/** Read a cell as a number, treating absent and non-numeric cells as 0 */
export function numberAt(row: TableRow, column: string): number {
  const value = row[column];
  return typeof value === 'number' && Number.isFinite(value) ? value : 0;
}

/** Read a cell as a string, or null when absent or not a string */
export function stringAt(row: TableRow, column: string): string | null {
  const value = row[column];
  return typeof value === 'string' ? value : null;
}
