import { PlayEvent } from '../../domain/plays/play-event';
import { DataTable } from '../../domain/table';

/**
 * Stats provider interface
 * All stats providers must implement this contract to be compatible with the system.
 *
 * This interface abstracts away provider-specific details, allowing the pipeline
 * to work with any data source without changing the scoring or report logic.
 */
export interface IStatsProvider {
  /** Provider identifier (e.g., 'nflverse') */
  readonly providerId: string;

  /**
   * Fetch weekly player stats for a season, one row per player and week
   * @param season - NFL season year
   * @returns Typed table carrying at least the player identity columns
   */
  fetchPlayerWeeklyStats(season: number): Promise<DataTable>;

  /**
   * Fetch play-by-play for a season
   * @param season - NFL season year
   */
  fetchPlayByPlay(season: number): Promise<PlayEvent[]>;
}
