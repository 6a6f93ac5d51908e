/**
 * Provider-agnostic types for stats ingestion
 * Providers parse their own formats and map into these shapes.
 */

import { PlayEvent } from '../../domain/plays/play-event';
import { CellValue } from '../../domain/table';

/** One parsed provider row: column name -> typed cell */
export type ProviderRecord = Record<string, CellValue>;

/** Stats providers that can be selected in configuration */
export const PROVIDER_TYPES = ['nflverse'] as const;

export type ProviderType = (typeof PROVIDER_TYPES)[number];

/** Connection settings shared by HTTP-backed providers */
export interface ProviderConfig {
  baseUrl: string;
  timeoutMs: number;
}

/** Identity columns every weekly player stats table carries */
export const PLAYER_IDENTITY_COLUMNS = [
  'season',
  'week',
  'player_id',
  'player_name',
  'player_display_name',
  'team',
  'position',
] as const;

/** Source column for each play-event field (nflverse play-by-play naming) */
export const PLAY_EVENT_COLUMNS: Record<keyof PlayEvent, string> = {
  season: 'season',
  week: 'week',
  gameId: 'game_id',
  homeTeam: 'home_team',
  awayTeam: 'away_team',
  posteam: 'posteam',
  defteam: 'defteam',
  playType: 'play_type',
  pass: 'pass',
  rush: 'rush',
  rushAttempt: 'rush_attempt',
  sack: 'sack',
  interception: 'interception',
  safety: 'safety',
  fumble: 'fumble',
  fumbleLost: 'fumble_lost',
  puntBlocked: 'punt_blocked',
  kickoffAttempt: 'kickoff_attempt',
  puntAttempt: 'punt_attempt',
  touchdown: 'touchdown',
  passTouchdown: 'pass_touchdown',
  rushTouchdown: 'rush_touchdown',
  returnTouchdown: 'return_touchdown',
  defensiveTwoPointConv: 'defensive_two_point_conv',
  defensiveExtraPointConv: 'defensive_extra_point_conv',
  fieldGoalResult: 'field_goal_result',
  extraPointResult: 'extra_point_result',
  fumbleRecovery1Team: 'fumble_recovery_1_team',
  fumbleRecovery2Team: 'fumble_recovery_2_team',
  tdTeam: 'td_team',
  returnTeam: 'return_team',
  yardsGained: 'yards_gained',
  passerId: 'passer_player_id',
  rusherId: 'rusher_player_id',
  receiverId: 'receiver_player_id',
  totalHomeScore: 'total_home_score',
  totalAwayScore: 'total_away_score',
};
