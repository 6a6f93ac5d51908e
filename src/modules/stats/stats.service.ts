import { IStatsProvider } from '../../integrations/shared/stats-provider.interface';
import { PlayEvent } from '../../domain/plays/play-event';
import { deriveLongTdBonuses } from '../../domain/bonus/long-td-bonus';
import { reconcileAndJoin } from '../../domain/stats/bonus-join';
import { buildDstTable } from '../../domain/stats/dst-stats';
import { DataTable, unionTables } from '../../domain/table';
import { PLAYER_IDENTITY_COLUMNS } from '../../integrations/shared/stats-provider.types';
import { logger } from '../../config/logger.config';

export interface SeasonStats {
  /** Weekly player stats with long-TD bonus columns joined on */
  players: DataTable;
  /** D/ST stats derived from play-by-play */
  dst: DataTable;
}

export interface StatsLoadResult extends SeasonStats {
  seasons: number[];
  plays: number;
  bonusRows: number;
}

export class StatsService {
  constructor(private readonly statsProvider: IStatsProvider) {}

  /**
   * Fetch weekly player stats for every season and union them.
   * Seasons can disagree on columns; the union aligns them first.
   */
  async loadPlayerStats(seasons: readonly number[]): Promise<DataTable> {
    const tables: DataTable[] = [];
    for (const season of seasons) {
      tables.push(await this.statsProvider.fetchPlayerWeeklyStats(season));
    }
    return unionTables(tables, { order: PLAYER_IDENTITY_COLUMNS });
  }

  async loadPlayByPlay(seasons: readonly number[]): Promise<PlayEvent[]> {
    const events: PlayEvent[] = [];
    for (const season of seasons) {
      const seasonEvents = await this.statsProvider.fetchPlayByPlay(season);
      events.push(...seasonEvents.filter((event) => event.season === season));
    }
    return events;
  }

  /**
   * Load everything a report run needs for the given seasons
   * @param seasons - NFL season years
   */
  async loadSeasons(seasons: readonly number[]): Promise<StatsLoadResult> {
    logger.info(`Processing seasons: ${seasons.join(', ')} from ${this.statsProvider.providerId}`);

    logger.info('Loading play-by-play data...');
    const events = await this.loadPlayByPlay(seasons);

    logger.info('Loading player statistics...');
    const baseStats = await this.loadPlayerStats(seasons);

    logger.info('Calculating long TD bonuses...');
    const bonuses = deriveLongTdBonuses(events);

    logger.info('Joining stats with long TD bonuses...');
    const players = reconcileAndJoin(baseStats, bonuses);

    logger.info('Processing D/ST statistics...');
    const dst = buildDstTable(events);

    logger.info(
      `Loaded ${players.rows.length} player rows, ${dst.rows.length} D/ST rows, ${bonuses.rows.length} bonus rows`
    );

    return {
      seasons: [...seasons],
      plays: events.length,
      bonusRows: bonuses.rows.length,
      players,
      dst,
    };
  }
}
