import { StatsService } from '../../../modules/stats/stats.service';
import { IStatsProvider } from '../../../integrations/shared/stats-provider.interface';
import { PlayEvent } from '../../../domain/plays/play-event';
import { DataTable, columnNames, tableFromRecords } from '../../../domain/table';
import { DST_STATS_SCHEMA } from '../../../domain/stats/dst-stats';
import { makeEvent, passTd, rushTd } from '../../fixtures/play-events';

class FakeStatsProvider implements IStatsProvider {
  readonly providerId = 'fake';
  readonly statsRequests: number[] = [];

  constructor(
    private readonly stats: Record<number, DataTable>,
    private readonly plays: Record<number, PlayEvent[]>
  ) {}

  async fetchPlayerWeeklyStats(season: number): Promise<DataTable> {
    this.statsRequests.push(season);
    return this.stats[season] ?? tableFromRecords([]);
  }

  async fetchPlayByPlay(season: number): Promise<PlayEvent[]> {
    return this.plays[season] ?? [];
  }
}

const identity = (season: number, week: number, id: string, name: string, team: string, position: string) => ({
  season,
  week,
  player_id: id,
  player_name: name,
  player_display_name: name,
  team,
  position,
});

function createProvider(): FakeStatsProvider {
  return new FakeStatsProvider(
    {
      2023: tableFromRecords([
        { ...identity(2023, 1, 'qb-1', 'Alpha Passer', 'AAA', 'QB'), passing_yards: 210 },
        { ...identity(2023, 1, 'wr-1', 'Wide Out', 'AAA', 'WR'), receiving_yards: 60 },
      ]),
      2024: tableFromRecords([
        { ...identity(2024, 2, 'rb-1', 'Run Back', 'BBB', 'RB'), rushing_yards: 80, target_share: 0.1 },
      ]),
    },
    {
      2023: [passTd(45, { season: 2023, gameId: '2023_01_AAA_BBB', posteam: 'AAA', defteam: 'BBB', totalAwayScore: 7 })],
      // A stray row from another season is dropped
      2024: [rushTd(55, { season: 2024, week: 2, gameId: '2024_02_AAA_BBB' }), makeEvent({ season: 2023 })],
    }
  );
}

describe('StatsService', () => {
  it('unions seasons whose columns differ', async () => {
    const provider = createProvider();
    const service = new StatsService(provider);

    const table = await service.loadPlayerStats([2023, 2024]);

    expect(provider.statsRequests).toEqual([2023, 2024]);
    expect(columnNames(table)).toEqual([
      'season',
      'week',
      'player_id',
      'player_name',
      'player_display_name',
      'team',
      'position',
      'passing_yards',
      'receiving_yards',
      'rushing_yards',
      'target_share',
    ]);
    expect(table.rows.map((r) => [r.player_id, r.passing_yards, r.rushing_yards])).toEqual([
      ['qb-1', 210, 0],
      ['wr-1', null, 0],
      ['rb-1', 0, 80],
    ]);
  });

  it('keeps only plays from the requested season', async () => {
    const service = new StatsService(createProvider());

    const events = await service.loadPlayByPlay([2024]);

    expect(events).toHaveLength(1);
    expect(events[0].rusherId).toBe('rb-1');
  });

  it('joins long TD bonuses and builds D/ST rows', async () => {
    const service = new StatsService(createProvider());

    const result = await service.loadSeasons([2023, 2024]);

    expect(result.seasons).toEqual([2023, 2024]);
    expect(result.plays).toBe(2);
    expect(result.bonusRows).toBe(3);
    expect(result.players.rows.map((r) => [r.player_id, r.long_td_bonus, r.rec_td_40_49, r.rush_td_50p])).toEqual([
      ['qb-1', 2, 0, 0],
      ['wr-1', 2, 1, 0],
      ['rb-1', 3, 0, 1],
    ]);

    expect(columnNames(result.dst)).toEqual(DST_STATS_SCHEMA.map((c) => c.name));
    const bbb = result.dst.rows.find((r) => r.season === 2023 && r.team === 'BBB');
    expect(bbb).toMatchObject({ points_allowed: 7, yards_allowed: 45, games_played: 1 });
  });
});
