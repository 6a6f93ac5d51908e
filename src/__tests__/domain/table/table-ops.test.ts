import {
  concatTables,
  distinctValues,
  dropColumns,
  fillNull,
  filterRows,
  fullJoin,
  leftJoin,
  renameColumns,
  selectColumns,
  sortBy,
  tableFromRecords,
  withColumn,
} from '../../../domain/table';
import { SchemaError } from '../../../utils/exceptions';

describe('table engine', () => {
  describe('tableFromRecords', () => {
    it('infers column types from values', () => {
      const table = tableFromRecords([
        { season: 2024, name: 'A', yards: 10, active: true, note: null },
        { season: 2024, name: 'B', yards: 12.5, active: false, note: null },
      ]);

      expect(table.columns).toEqual([
        { name: 'season', type: 'int' },
        { name: 'name', type: 'string' },
        { name: 'yards', type: 'float' },
        { name: 'active', type: 'bool' },
        { name: 'note', type: 'null' },
      ]);
    });

    it('puts declared columns first and fills missing cells with null', () => {
      const table = tableFromRecords([{ b: 1 }, { a: 'x' }], [{ name: 'a', type: 'string' }]);

      expect(table.columns.map((c) => c.name)).toEqual(['a', 'b']);
      expect(table.rows).toEqual([
        { a: null, b: 1 },
        { a: 'x', b: null },
      ]);
    });

    it('rejects a value that does not fit its declared type', () => {
      expect(() => tableFromRecords([{ week: 'nine' }], [{ name: 'week', type: 'int' }])).toThrow(
        SchemaError
      );
    });

    it('rejects mixed kinds in one column', () => {
      expect(() => tableFromRecords([{ team: 'KC' }, { team: 7 }])).toThrow(SchemaError);
    });
  });

  describe('concatTables', () => {
    it('stacks tables with identical layouts', () => {
      const a = tableFromRecords([{ week: 1 }]);
      const b = tableFromRecords([{ week: 2 }]);

      expect(concatTables([a, b]).rows).toEqual([{ week: 1 }, { week: 2 }]);
    });

    it('returns the empty table for no input', () => {
      expect(concatTables([])).toEqual({ columns: [], rows: [] });
    });

    it('fails on differing column names', () => {
      const a = tableFromRecords([{ week: 1 }]);
      const b = tableFromRecords([{ season: 2 }]);
      expect(() => concatTables([a, b])).toThrow(SchemaError);
    });

    it('fails on an untyped column next to a typed one', () => {
      const a = tableFromRecords([{ week: 1 }]);
      const b = tableFromRecords([{ week: null }]);
      expect(() => concatTables([a, b])).toThrow('Column "week" has type null, expected int');
    });
  });

  describe('joins', () => {
    const stats = tableFromRecords([
      { season: 2024, week: 1, player_id: 'p1', yards: 50 },
      { season: 2024, week: 1, player_id: 'p2', yards: 20 },
    ]);
    const bonuses = tableFromRecords([
      { season: 2024, week: 1, player_id: 'p1', bonus: 3, yards: 999 },
      { season: 2024, week: 2, player_id: 'p3', bonus: 2, yards: 999 },
    ]);

    it('left join keeps every left row and leaves unmatched cells null', () => {
      const joined = leftJoin(stats, bonuses, ['season', 'week', 'player_id']);

      expect(joined.columns.map((c) => c.name)).toEqual(['season', 'week', 'player_id', 'yards', 'bonus']);
      expect(joined.rows).toEqual([
        { season: 2024, week: 1, player_id: 'p1', yards: 50, bonus: 3 },
        { season: 2024, week: 1, player_id: 'p2', yards: 20, bonus: null },
      ]);
    });

    it('left join against an empty right table keeps the right column types', () => {
      const empty = { columns: bonuses.columns, rows: [] };
      const joined = leftJoin(stats, empty, ['season', 'week', 'player_id']);

      expect(joined.columns.find((c) => c.name === 'bonus')).toEqual({ name: 'bonus', type: 'int' });
      expect(joined.rows.map((r) => r.bonus)).toEqual([null, null]);
    });

    it('full join keeps unmatched rows from both sides', () => {
      const joined = fullJoin(stats, bonuses, ['season', 'week', 'player_id']);

      expect(joined.rows).toEqual([
        { season: 2024, week: 1, player_id: 'p1', yards: 50, bonus: 3 },
        { season: 2024, week: 1, player_id: 'p2', yards: 20, bonus: null },
        { season: 2024, week: 2, player_id: 'p3', yards: null, bonus: 2 },
      ]);
    });

    it('fails when a key column is missing', () => {
      expect(() => leftJoin(stats, bonuses, ['team'])).toThrow(SchemaError);
    });
  });

  describe('column operations', () => {
    const table = tableFromRecords([
      { team: 'KC', week: 2, sacks: null },
      { team: 'BUF', week: 1, sacks: 3 },
      { team: 'KC', week: 1, sacks: 1 },
    ]);

    it('selects present columns in the given order', () => {
      expect(selectColumns(table, ['sacks', 'missing', 'team']).columns.map((c) => c.name)).toEqual([
        'sacks',
        'team',
      ]);
    });

    it('drops and renames columns', () => {
      expect(dropColumns(table, ['sacks']).columns.map((c) => c.name)).toEqual(['team', 'week']);
      expect(renameColumns(table, { team: 'club' }).rows[0]).toEqual({ club: 'KC', week: 2, sacks: null });
      expect(() => renameColumns(table, { team: 'week' })).toThrow(SchemaError);
    });

    it('fills nulls with a default', () => {
      expect(fillNull(table, { sacks: 0 }).rows.map((r) => r.sacks)).toEqual([0, 3, 1]);
    });

    it('types an untyped column from its fill value', () => {
      const untyped = tableFromRecords([{ note: null }]);
      expect(fillNull(untyped, { note: '' }).columns).toEqual([{ name: 'note', type: 'string' }]);
    });

    it('adds a computed column', () => {
      const doubled = withColumn(table, 'double_sacks', (row) =>
        typeof row.sacks === 'number' ? row.sacks * 2 : null
      );
      expect(doubled.rows.map((r) => r.double_sacks)).toEqual([null, 6, 2]);
      expect(doubled.columns[3]).toEqual({ name: 'double_sacks', type: 'int' });
    });

    it('filters rows', () => {
      expect(filterRows(table, (row) => row.team === 'KC').rows).toHaveLength(2);
    });

    it('sorts stably on several keys with nulls last', () => {
      const sorted = sortBy(table, ['week', 'team']);
      expect(sorted.rows.map((r) => `${r.team}-${r.week}`)).toEqual(['BUF-1', 'KC-1', 'KC-2']);

      const bySacks = sortBy(table, ['sacks']);
      expect(bySacks.rows.map((r) => r.sacks)).toEqual([1, 3, null]);
    });

    it('lists distinct values in first-seen order', () => {
      expect(distinctValues(table, 'team')).toEqual(['KC', 'BUF']);
    });
  });
});
