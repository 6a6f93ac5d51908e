/**
 * Table operations: projection, filtering, derived columns, joins,
 * strict concatenation and stable sorting.
 */

import { SchemaError } from '../../utils/exceptions';
import { assertValueFits, inferColumnType, widenTypes } from './table-builder';
import {
  CellValue,
  ColumnSpec,
  ColumnType,
  DataTable,
  EMPTY_TABLE,
  TableRow,
  getColumn,
} from './table.model';

function rowKey(row: TableRow, on: readonly string[]): string {
  return JSON.stringify(on.map((column) => row[column] ?? null));
}

function requireColumns(table: DataTable, names: readonly string[], operation: string): void {
  for (const name of names) {
    if (!getColumn(table, name)) {
      throw new SchemaError(`${operation}: column "${name}" not found`, name);
    }
  }
}

/** Keep the named columns, in the given order. Names the table lacks are ignored. */
export function selectColumns(table: DataTable, names: readonly string[]): DataTable {
  const columns = names
    .map((name) => getColumn(table, name))
    .filter((c): c is ColumnSpec => c !== undefined);
  const rows = table.rows.map((row) => {
    const out: Record<string, CellValue> = {};
    for (const c of columns) out[c.name] = row[c.name];
    return out;
  });
  return { columns, rows };
}

export function dropColumns(table: DataTable, names: readonly string[]): DataTable {
  const dropped = new Set(names);
  return selectColumns(
    table,
    table.columns.filter((c) => !dropped.has(c.name)).map((c) => c.name)
  );
}

export function renameColumns(table: DataTable, mapping: Readonly<Record<string, string>>): DataTable {
  const rename = (name: string) => mapping[name] ?? name;
  const columns = table.columns.map((c) => ({ name: rename(c.name), type: c.type }));
  const names = new Set(columns.map((c) => c.name));
  if (names.size !== columns.length) {
    throw new SchemaError('renameColumns: rename produces duplicate column names');
  }
  const rows = table.rows.map((row) => {
    const out: Record<string, CellValue> = {};
    for (const c of table.columns) out[rename(c.name)] = row[c.name];
    return out;
  });
  return { columns, rows };
}

export function filterRows(table: DataTable, predicate: (row: TableRow) => boolean): DataTable {
  return { columns: table.columns, rows: table.rows.filter(predicate) };
}

/**
 * Add or replace a column computed from each row.
 * With no declared type the type is inferred from the computed values.
 */
export function withColumn(
  table: DataTable,
  name: string,
  compute: (row: TableRow) => CellValue,
  type?: ColumnType
): DataTable {
  const values = table.rows.map(compute);
  const spec: ColumnSpec = { name, type: type ?? inferColumnType(name, values) };
  values.forEach((value) => assertValueFits(spec, value));

  const exists = getColumn(table, name) !== undefined;
  const columns = exists
    ? table.columns.map((c) => (c.name === name ? spec : c))
    : [...table.columns, spec];
  const rows = table.rows.map((row, i) => ({ ...row, [name]: values[i] }));
  return { columns, rows };
}

/**
 * Replace nulls in the listed columns. An untyped (`null`) column takes the
 * type of its fill value; columns the table lacks are ignored.
 */
export function fillNull(
  table: DataTable,
  defaults: Readonly<Record<string, Exclude<CellValue, null>>>
): DataTable {
  const columns = table.columns.map((c) => {
    const fill = defaults[c.name];
    if (fill === undefined) return c;
    const type = c.type === 'null' ? inferColumnType(c.name, [fill]) : c.type;
    const spec = { name: c.name, type };
    assertValueFits(spec, fill);
    return spec;
  });
  const rows = table.rows.map((row) => {
    const out: Record<string, CellValue> = { ...row };
    for (const [name, fill] of Object.entries(defaults)) {
      if (name in out && out[name] === null) out[name] = fill;
    }
    return out;
  });
  return { columns, rows };
}

/**
 * Concatenate tables vertically. Strict: every table must declare the same
 * column names, order and types.
 *
 * @throws SchemaError on any layout or type difference
 */
export function concatTables(tables: readonly DataTable[]): DataTable {
  if (tables.length === 0) return EMPTY_TABLE;

  const [first, ...rest] = tables;
  for (const table of rest) {
    if (table.columns.length !== first.columns.length) {
      throw new SchemaError(
        `concat: column count differs (${first.columns.length} vs ${table.columns.length})`
      );
    }
    table.columns.forEach((c, i) => {
      const expected = first.columns[i];
      if (c.name !== expected.name) {
        throw new SchemaError(
          `concat: column ${i} is "${c.name}", expected "${expected.name}"`,
          c.name
        );
      }
      if (c.type !== expected.type) {
        throw SchemaError.typeMismatch(c.name, expected.type, c.type);
      }
    });
  }

  return { columns: first.columns, rows: tables.flatMap((t) => t.rows) };
}

interface JoinLayout {
  keyColumns: ColumnSpec[];
  leftColumns: ColumnSpec[];
  rightColumns: ColumnSpec[];
}

function joinLayout(left: DataTable, right: DataTable, on: readonly string[]): JoinLayout {
  requireColumns(left, on, 'join');
  requireColumns(right, on, 'join');

  const keys = new Set(on);
  const keyColumns = on.map((name) => {
    const l = getColumn(left, name);
    const r = getColumn(right, name);
    return { name, type: widenTypes(l?.type ?? 'null', r?.type ?? 'null', name) };
  });
  const leftColumns = left.columns.filter((c) => !keys.has(c.name));
  const taken = new Set(left.columns.map((c) => c.name));
  const rightColumns = right.columns.filter((c) => !taken.has(c.name));
  return { keyColumns, leftColumns, rightColumns };
}

function indexRows(table: DataTable, on: readonly string[]): Map<string, TableRow[]> {
  const index = new Map<string, TableRow[]>();
  for (const row of table.rows) {
    const key = rowKey(row, on);
    const bucket = index.get(key);
    if (bucket) bucket.push(row);
    else index.set(key, [row]);
  }
  return index;
}

function joinRows(
  layout: JoinLayout,
  left: TableRow | null,
  right: TableRow | null
): TableRow {
  const out: Record<string, CellValue> = {};
  for (const c of layout.keyColumns) out[c.name] = left?.[c.name] ?? right?.[c.name] ?? null;
  for (const c of layout.leftColumns) out[c.name] = left?.[c.name] ?? null;
  for (const c of layout.rightColumns) out[c.name] = right?.[c.name] ?? null;
  return out;
}

function orderedColumns(left: DataTable, layout: JoinLayout): ColumnSpec[] {
  const keyByName = new Map(layout.keyColumns.map((c) => [c.name, c]));
  return [
    ...left.columns.map((c) => keyByName.get(c.name) ?? c),
    ...layout.rightColumns,
  ];
}

/**
 * Left join on the given key columns. Right-side columns whose names already
 * exist on the left are not brought over. Unmatched rows hold null in the
 * right-side columns, which keep their declared types.
 */
export function leftJoin(left: DataTable, right: DataTable, on: readonly string[]): DataTable {
  const layout = joinLayout(left, right, on);
  const index = indexRows(right, on);

  const rows: TableRow[] = [];
  for (const row of left.rows) {
    const matches = index.get(rowKey(row, on));
    if (!matches) {
      rows.push(joinRows(layout, row, null));
      continue;
    }
    for (const match of matches) rows.push(joinRows(layout, row, match));
  }

  return { columns: orderedColumns(left, layout), rows };
}

/**
 * Full outer join: every row of both tables appears at least once. Key columns
 * are coalesced from whichever side has the row.
 */
export function fullJoin(left: DataTable, right: DataTable, on: readonly string[]): DataTable {
  const layout = joinLayout(left, right, on);
  const index = indexRows(right, on);
  const matchedKeys = new Set<string>();

  const rows: TableRow[] = [];
  for (const row of left.rows) {
    const key = rowKey(row, on);
    const matches = index.get(key);
    if (!matches) {
      rows.push(joinRows(layout, row, null));
      continue;
    }
    matchedKeys.add(key);
    for (const match of matches) rows.push(joinRows(layout, row, match));
  }
  for (const row of right.rows) {
    if (!matchedKeys.has(rowKey(row, on))) {
      rows.push(joinRows(layout, null, row));
    }
  }

  return { columns: orderedColumns(left, layout), rows };
}

function compareCells(a: CellValue, b: CellValue): number {
  if (a === b) return 0;
  // Nulls last
  if (a === null) return 1;
  if (b === null) return -1;
  if (typeof a === 'number' && typeof b === 'number') return a - b;
  const sa = String(a);
  const sb = String(b);
  return sa < sb ? -1 : sa > sb ? 1 : 0;
}

/**
 * Stable ascending sort on several keys, nulls last.
 */
export function sortBy(table: DataTable, keys: readonly string[]): DataTable {
  const present = keys.filter((key) => getColumn(table, key) !== undefined);
  const rows = [...table.rows].sort((a, b) => {
    for (const key of present) {
      const cmp = compareCells(a[key], b[key]);
      if (cmp !== 0) return cmp;
    }
    return 0;
  });
  return { columns: table.columns, rows };
}

/** Non-null values of a column in first-seen order */
export function distinctValues(table: DataTable, column: string): CellValue[] {
  const seen = new Set<CellValue>();
  for (const row of table.rows) {
    const value = row[column];
    if (value !== null && value !== undefined) seen.add(value);
  }
  return [...seen];
}
