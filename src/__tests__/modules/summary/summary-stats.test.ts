import {
  aggregateByIdentity,
  buildSummaryReport,
  pointsDistribution,
  summarySchema,
} from '../../../modules/summary/summary-stats';
import { DataTable, tableFromRecords } from '../../../domain/table';

function playerWeek(name: string, week: number, points: number, extra: Record<string, number> = {}) {
  return { season: 2024, week, player_display_name: name, fantasy_points: points, ...extra };
}

const scoredPlayers: DataTable = tableFromRecords([
  playerWeek('Alpha Back', 8, 10, { targets: 4, target_share: 0.2, receptions: 3 }),
  playerWeek('Alpha Back', 9, 0, { targets: 6, target_share: 0.3, receptions: 5 }),
  playerWeek('Alpha Back', 10, 15, { targets: 0, target_share: 0, receptions: 0 }),
]);

const scoredDst: DataTable = tableFromRecords([
  { season: 2024, week: 8, team: 'KC', fantasy_points: 21 },
  { season: 2024, week: 9, team: 'KC', fantasy_points: 4 },
]);

describe('summary statistics', () => {
  describe('aggregateByIdentity', () => {
    it('sums points and counts games per identity', () => {
      const totals = aggregateByIdentity(scoredPlayers, 'player_display_name');

      expect(totals.rows).toHaveLength(1);
      expect(totals.rows[0]).toMatchObject({
        player_display_name: 'Alpha Back',
        games: 3,
        fantasy_points: 25,
        receptions: 8,
        targets: 10,
      });
    });

    it('weights target share by targets and averages WOPR plainly', () => {
      const table = tableFromRecords([
        { player_display_name: 'Beta Wide', targets: 4, target_share: 0.2, wopr: 0.5 },
        { player_display_name: 'Beta Wide', targets: 6, target_share: 0.3, wopr: null },
      ]);

      const [row] = aggregateByIdentity(table, 'player_display_name').rows;

      expect(row.target_share).toBe(0.26);
      expect(row.wopr).toBe(0.5);
    });

    it('leaves season and week out of the sums', () => {
      const totals = aggregateByIdentity(scoredDst, 'team');

      expect(totals.columns.map((c) => c.name)).toEqual(['team', 'games', 'fantasy_points']);
      expect(totals.rows).toEqual([{ team: 'KC', games: 2, fantasy_points: 25 }]);
    });

    it('omits rows without an identity', () => {
      const table = tableFromRecords([{ team: null, fantasy_points: 3 }]);
      expect(aggregateByIdentity(table, 'team').rows).toEqual([]);
    });
  });

  describe('pointsDistribution', () => {
    it('describes a set of games', () => {
      expect(pointsDistribution([10, 0, 15])).toEqual({
        num_games: 3,
        mean_points: 8.33,
        median_points: 10,
        max_points: 15,
        min_points: 0,
        stddev_points: 7.64,
        mad_points: 5,
        nuclear_games: 0,
        boom_games: 1,
        bust_games: 1,
      });
    });

    it('reports zero deviation for a single game', () => {
      expect(pointsDistribution([22])).toMatchObject({ num_games: 1, stddev_points: 0, nuclear_games: 1 });
    });
  });

  describe('buildSummaryReport', () => {
    it('summarizes players and D/ST units by name', () => {
      const report = buildSummaryReport(scoredPlayers, scoredDst, ['Alpha Back', 'KC']);

      expect(report.columns).toEqual(summarySchema(false));
      expect(report.rows.map((r) => [r.name, r.type, r.season_num_games, r.season_mean_points])).toEqual([
        ['Alpha Back', 'Player', 3, 8.33],
        ['KC', 'D/ST', 2, 12.5],
      ]);
    });

    it('adds selected-week statistics when weeks are given', () => {
      const report = buildSummaryReport(scoredPlayers, scoredDst, ['Alpha Back'], [9, 10]);

      expect(report.columns).toHaveLength(32);
      expect(report.rows[0]).toMatchObject({
        weeks_num_games: 2,
        weeks_mean_points: 7.5,
        weeks_stddev_points: 10.61,
        weeks_mad_points: 7.5,
        weeks_bust_games: 1,
      });
    });

    it('uses the four most recent games for recent form', () => {
      const table = tableFromRecords(
        [1, 2, 3, 4, 5, 6].map((week) => playerWeek('Gamma End', week, week))
      );

      const [row] = buildSummaryReport(table, scoredDst, ['Gamma End']).rows;

      expect(row.recent_num_games).toBe(4);
      expect(row.recent_mean_points).toBe(4.5);
      expect(row.recent_min_points).toBe(3);
    });

    it('skips names that are not found', () => {
      expect(buildSummaryReport(scoredPlayers, scoredDst, ['Nobody Here']).rows).toEqual([]);
    });
  });
});
