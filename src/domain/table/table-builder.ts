/**
 * Table construction and column type inference.
 */

import { SchemaError } from '../../utils/exceptions';
import { CellValue, ColumnSpec, ColumnType, DataTable, TableRow } from './table.model';

type ValueKind = Exclude<ColumnType, 'null'>;

function kindOf(value: Exclude<CellValue, null>): ValueKind {
  if (typeof value === 'number') return Number.isInteger(value) ? 'int' : 'float';
  if (typeof value === 'string') return 'string';
  return 'bool';
}

/**
 * Widen two column types into one that holds both.
 *
 * `null` widens to anything, `int` widens to `float`; every other pairing
 * is a mismatch.
 */
export function widenTypes(a: ColumnType, b: ColumnType, column: string): ColumnType {
  if (a === b) return a;
  if (a === 'null') return b;
  if (b === 'null') return a;
  if ((a === 'int' && b === 'float') || (a === 'float' && b === 'int')) return 'float';
  throw SchemaError.typeMismatch(column, a, b);
}

/**
 * Infer the narrowest type holding every non-null value.
 * Returns `null` when no value is present.
 */
export function inferColumnType(column: string, values: Iterable<CellValue>): ColumnType {
  let type: ColumnType = 'null';
  for (const value of values) {
    if (value === null) continue;
    type = widenTypes(type, kindOf(value), column);
  }
  return type;
}

/**
 * Check that a value fits a declared column type.
 * @throws SchemaError when it does not
 */
export function assertValueFits(column: ColumnSpec, value: CellValue): void {
  if (value === null) return;
  const kind = kindOf(value);
  const fits =
    column.type === kind ||
    (column.type === 'float' && kind === 'int');
  if (!fits) {
    throw SchemaError.typeMismatch(column.name, column.type, kind);
  }
}

/**
 * Build a table from plain records.
 *
 * Column order is the declared order first, then the order in which other
 * columns are first seen. Declared columns keep their declared type (values are
 * checked against it); the rest are inferred. A record missing a column holds
 * null in it.
 *
 * @throws SchemaError if a value does not fit its column
 */
export function tableFromRecords(
  records: ReadonlyArray<Readonly<Record<string, CellValue | undefined>>>,
  declared: readonly ColumnSpec[] = []
): DataTable {
  const order: string[] = declared.map((c) => c.name);
  const seen = new Set(order);
  for (const record of records) {
    for (const key of Object.keys(record)) {
      if (!seen.has(key)) {
        seen.add(key);
        order.push(key);
      }
    }
  }

  const rows: TableRow[] = records.map((record) => {
    const row: Record<string, CellValue> = {};
    for (const name of order) {
      row[name] = record[name] ?? null;
    }
    return row;
  });

  const declaredByName = new Map(declared.map((c) => [c.name, c]));
  const columns: ColumnSpec[] = order.map((name) => {
    const spec = declaredByName.get(name);
    if (spec) {
      for (const row of rows) assertValueFits(spec, row[name]);
      return spec;
    }
    return { name, type: inferColumnType(name, rows.map((row) => row[name])) };
  });

  return { columns, rows };
}

/** An empty table with the given columns */
export function emptyTable(columns: readonly ColumnSpec[]): DataTable {
  return { columns: [...columns], rows: [] };
}
