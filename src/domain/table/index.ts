export {
  CellValue,
  ColumnSpec,
  ColumnType,
  DataTable,
  TableRow,
  EMPTY_TABLE,
  columnNames,
  hasColumn,
  getColumn,
  isEmpty,
  defaultValueFor,
  numberAt,
  stringAt,
} from './table.model';

export {
  tableFromRecords,
  emptyTable,
  inferColumnType,
  widenTypes,
  assertValueFits,
} from './table-builder';

export {
  selectColumns,
  dropColumns,
  renameColumns,
  filterRows,
  withColumn,
  fillNull,
  concatTables,
  leftJoin,
  fullJoin,
  sortBy,
  distinctValues,
} from './table-ops';

export {
  AlignOptions,
  alignSchemas,
  conformToSchema,
  unifiedSchema,
  unionTables,
} from './schema-reconciler';
