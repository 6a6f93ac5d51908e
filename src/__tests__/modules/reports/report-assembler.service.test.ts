import { ReportAssembler } from '../../../modules/reports/report-assembler.service';
import {
  COMBINED_COLUMN_ORDER,
  DST_REPORT_SCHEMA,
  KICKER_REPORT_SCHEMA,
  OFFENSE_REPORT_SCHEMA,
} from '../../../modules/reports/report-columns';
import { DataTable, columnNames, tableFromRecords } from '../../../domain/table';

const players: DataTable = tableFromRecords([
  { season: 2024, week: 2, player_id: 'p2', player_display_name: 'Beta Wide', team: 'BUF', position: 'WR', receptions: 2, receiving_yards: 30 },
  { season: 2024, week: 1, player_id: 'p1', player_display_name: 'Alpha Back', team: 'KC', position: 'RB', rushing_yards: 100, rushing_tds: 1 },
  { season: 2024, week: 1, player_id: 'p9', player_display_name: 'Punter Guy', team: 'KC', position: 'P' },
  { season: 2023, week: 1, player_id: 'p1', player_display_name: 'Alpha Back', team: 'KC', position: 'RB', rushing_yards: 50 },
  { season: 2024, week: 1, player_id: 'p3', player_display_name: 'Kicker Kay', team: 'KC', position: 'K', fg_made_40_49: 1 },
]);

const dst: DataTable = tableFromRecords([
  { season: 2024, week: 1, team: 'KC', games_played: 1, sacks: 2, points_allowed: 10, yards_allowed: 250 },
  { season: 2024, week: 1, team: 'BUF', games_played: 1, sacks: 0, points_allowed: 30, yards_allowed: 400 },
]);

describe('ReportAssembler', () => {
  const assembler = new ReportAssembler({ outputDir: 'out', defaultSeasons: [2025] });

  describe('seasonsToLoad', () => {
    it('falls back to the configured seasons', () => {
      expect(assembler.seasonsToLoad()).toEqual([2025]);
      expect(assembler.seasonsToLoad([])).toEqual([2025]);
      expect(assembler.seasonsToLoad([2023])).toEqual([2023]);
    });
  });

  describe('assemble', () => {
    it('scores and sorts player rows, dropping unscoreable positions', () => {
      const result = assembler.assemble(players, 'player');

      expect(result.status).toBe('ok');
      expect(result.stage).toBe('Sorted');
      expect(
        result.table.rows.map((r) => [r.season, r.week, r.player_display_name, r.fantasy_points])
      ).toEqual([
        [2023, 1, 'Alpha Back', 5],
        [2024, 1, 'Alpha Back', 16],
        [2024, 1, 'Kicker Kay', 4],
        [2024, 2, 'Beta Wide', 5],
      ]);
    });

    it('scores D/ST rows with the D/ST formula', () => {
      const result = assembler.assemble(dst, 'dst');

      expect(result.table.rows.map((r) => [r.team, r.fantasy_points])).toEqual([
        ['BUF', -1],
        ['KC', 10],
      ]);
    });

    it('applies season, week and identity filters in turn', () => {
      const result = assembler.assemble(players, 'player', {
        seasons: [2024],
        weeks: [1],
        identities: ['Alpha Back'],
      });

      expect(result.table.rows.map((r) => r.player_id)).toEqual(['p1']);
      expect(result.table.rows[0].season).toBe(2024);
    });

    it.each([
      ['Unfiltered', { columns: [], rows: [] }, {}],
      ['SeasonFiltered', players, { seasons: [2030] }],
      ['WeekFiltered', players, { weeks: [5] }],
      ['IdentityFiltered', players, { identities: ['Nobody Here'] }],
      ['Scored', players, { identities: ['Punter Guy'] }],
    ] as const)('reports an empty result at stage %s', (stage, table, filters) => {
      const result = assembler.assemble(table, 'player', filters);

      expect(result).toMatchObject({ status: 'empty', stage });
      expect(result.table.rows).toEqual([]);
    });
  });

  describe('buildPositionReports', () => {
    it('splits players by position class with a fixed layout', () => {
      const { reports } = assembler.buildPositionReports(players, dst);

      expect(Object.keys(reports).sort()).toEqual(['dst', 'k', 'rb', 'wr_te']);
      expect(reports.rb?.columns).toEqual(OFFENSE_REPORT_SCHEMA);
      expect(reports.k?.columns).toEqual(KICKER_REPORT_SCHEMA);
      expect(reports.dst?.columns).toEqual(DST_REPORT_SCHEMA);
      expect(reports.rb?.rows.map((r) => [r.season, r.long_td_bonus])).toEqual([
        [2023, 0],
        [2024, 0],
      ]);
    });

    it('passes filters to both tables', () => {
      const { reports, players: playerResult } = assembler.buildPositionReports(players, dst, {
        weeks: [2],
      });

      expect(Object.keys(reports)).toEqual(['wr_te']);
      expect(playerResult.status).toBe('ok');
    });
  });

  describe('buildCombinedReport', () => {
    it('puts every player row before every D/ST row on one schema', () => {
      const result = assembler.buildCombinedReport(players, dst, {
        players: ['Alpha Back'],
        teams: ['KC'],
      });

      expect(result.status).toBe('ok');
      expect(columnNames(result.table)).toEqual(COMBINED_COLUMN_ORDER);
      expect(
        result.table.rows.map((r) => [r.season, r.week, r.player_display_name, r.team, r.fantasy_points])
      ).toEqual([
        [2023, 1, 'Alpha Back', 'KC', 5],
        [2024, 1, 'Alpha Back', 'KC', 16],
        [2024, 1, '', 'KC', 10],
      ]);
    });

    it('keeps the side that matched when the other is empty', () => {
      const result = assembler.buildCombinedReport(players, dst, {
        players: ['Nobody Here'],
        teams: ['BUF'],
      });

      expect(result.status).toBe('ok');
      expect(result.table.rows.map((r) => r.team)).toEqual(['BUF']);
    });

    it('returns the first empty result when nothing matched', () => {
      const result = assembler.buildCombinedReport(players, dst, { players: ['Nobody Here'] });

      expect(result).toMatchObject({ status: 'empty', stage: 'IdentityFiltered' });
    });
  });
});
