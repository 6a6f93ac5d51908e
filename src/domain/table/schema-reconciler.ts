/**
 * Schema Reconciliation
 *
 * Brings a set of tables onto one schema so they can be concatenated by the
 * strict `concatTables`. A column can be missing from a table, or present but
 * untyped because it never held a value; either way it would break the union.
 * Alignment gives every column one declared type and fills the gaps with that
 * type's default instead of an untyped absence. A column holding text in one
 * table and numbers or booleans in another becomes text.
 *
 * Run this before every concatenation: joins upstream can reintroduce the
 * same mismatch.
 */

import { assertValueFits, inferColumnType } from './table-builder';
import { concatTables } from './table-ops';
import {
  CellValue,
  ColumnSpec,
  ColumnType,
  DataTable,
  TableRow,
  defaultValueFor,
  getColumn,
} from './table.model';

export interface AlignOptions {
  /** Canonical leading column order; remaining columns follow in first-seen order */
  order?: readonly string[];
  /** Declared types that override inference (e.g. fantasy_points: 'float') */
  types?: Readonly<Record<string, ColumnType>>;
  /** Type for a column that holds no value in any table. Defaults to 'float'. */
  fallbackType?: Exclude<ColumnType, 'null'>;
}

function canonicalOrder(tables: readonly DataTable[], order: readonly string[]): string[] {
  const all = new Set<string>();
  for (const table of tables) {
    for (const c of table.columns) all.add(c.name);
  }
  const leading = [...new Set(order)].filter((name) => all.has(name));
  const leadingSet = new Set(leading);
  return [...leading, ...[...all].filter((name) => !leadingSet.has(name))];
}

const isNumeric = (type: ColumnType): boolean => type === 'int' || type === 'float';

/** Widen two types for a union; kinds that cannot share a column fall back to text */
function unionType(a: ColumnType, b: ColumnType): ColumnType {
  if (a === b || a === 'null') return b;
  if (b === 'null') return a;
  if (isNumeric(a) && isNumeric(b)) return 'float';
  return 'string';
}

/**
 * The type a column takes across all tables: widened over every table where the
 * column is typed, then checked against the values actually present.
 */
function resolveColumnType(
  name: string,
  tables: readonly DataTable[],
  options: AlignOptions
): Exclude<ColumnType, 'null'> {
  let type: ColumnType = options.types?.[name] ?? 'null';
  for (const table of tables) {
    const spec = getColumn(table, name);
    if (!spec) continue;
    if (spec.type !== 'null') {
      type = unionType(type, spec.type);
      continue;
    }
    for (const row of table.rows) {
      type = unionType(type, inferColumnType(name, [row[name] ?? null]));
    }
  }
  return type === 'null' ? options.fallbackType ?? 'float' : type;
}

/**
 * Compute the unified schema for a set of tables without touching their rows.
 */
export function unifiedSchema(
  tables: readonly DataTable[],
  options: AlignOptions = {}
): ColumnSpec[] {
  return canonicalOrder(tables, options.order ?? []).map((name) => ({
    name,
    type: resolveColumnType(name, tables, options),
  }));
}

function alignTable(table: DataTable, schema: readonly ColumnSpec[]): DataTable {
  const fills = schema.map((spec) => {
    const existing = getColumn(table, spec.name);
    // Absent and untyped columns take the typed default; typed columns keep their nulls
    const fillAll = !existing || existing.type === 'null';
    return { spec, fillAll, fill: defaultValueFor(spec.type) };
  });

  const rows: TableRow[] = table.rows.map((row) => {
    const out: Record<string, CellValue> = {};
    for (const { spec, fillAll, fill } of fills) {
      const value = row[spec.name] ?? null;
      if (value === null) {
        out[spec.name] = fillAll ? fill : null;
      } else {
        out[spec.name] = spec.type === 'string' && typeof value !== 'string' ? String(value) : value;
      }
    }
    return out;
  });

  return { columns: [...schema], rows };
}

/**
 * Align tables onto one schema: the union of their column names, one declared
 * type per column, a canonical column order, and typed defaults where a table
 * lacks a column or holds it untyped. Never raises on type differences.
 */
export function alignSchemas(
  tables: readonly DataTable[],
  options: AlignOptions = {}
): DataTable[] {
  const schema = unifiedSchema(tables, options);
  return tables.map((table) => alignTable(table, schema));
}

/**
 * Project a table onto a declared schema: exactly its columns, in its order,
 * with its types. Absent and untyped columns take the typed default.
 *
 * @throws SchemaError when a present value does not fit its declared type
 */
export function conformToSchema(table: DataTable, schema: readonly ColumnSpec[]): DataTable {
  for (const spec of schema) {
    if (!getColumn(table, spec.name)) continue;
    for (const row of table.rows) assertValueFits(spec, row[spec.name] ?? null);
  }
  return alignTable(table, schema);
}

/**
 * Align, then concatenate.
 */
export function unionTables(tables: readonly DataTable[], options: AlignOptions = {}): DataTable {
  if (tables.length === 0) {
    return { columns: unifiedSchema([], options), rows: [] };
  }
  return concatTables(alignSchemas(tables, options));
}
