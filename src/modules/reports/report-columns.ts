/**
 * Column layouts of the CSV reports. Every report is conformed to one of these
 * before it is written, so types are fixed per position class.
 */

import { BONUS_SCHEMA, BONUS_KEY_COLUMNS } from '../../domain/bonus/long-td-bonus';
import { DST_STATS_SCHEMA } from '../../domain/stats/dst-stats';
import { ColumnSpec, ColumnType } from '../../domain/table';
import { FANTASY_POINTS_COLUMN } from '../scoring/scoring-calculator';
import { PositionClass } from '../scoring/scoring.model';
import { ReportKey } from './report.model';

const specs = (type: ColumnType, names: readonly string[]): ColumnSpec[] =>
  names.map((name) => ({ name, type }));

const FANTASY_POINTS_SPEC: ColumnSpec = { name: FANTASY_POINTS_COLUMN, type: 'float' };

export const PLAYER_IDENTITY_SCHEMA: readonly ColumnSpec[] = [
  ...specs('int', ['season', 'week']),
  ...specs('string', ['player_id', 'player_name', 'player_display_name', 'team', 'position']),
];

export const OFFENSE_STATS_SCHEMA: readonly ColumnSpec[] = [
  ...specs('int', ['completions', 'attempts']),
  ...specs('float', ['passing_yards']),
  ...specs('int', ['passing_tds', 'passing_interceptions', 'passing_2pt_conversions', 'sack_fumbles_lost', 'carries']),
  ...specs('float', ['rushing_yards']),
  ...specs('int', ['rushing_tds', 'rushing_fumbles_lost', 'rushing_2pt_conversions', 'targets', 'receptions']),
  ...specs('float', ['receiving_yards']),
  ...specs('int', ['receiving_tds', 'receiving_fumbles_lost', 'receiving_2pt_conversions']),
  ...specs('float', ['target_share', 'air_yards_share', 'wopr']),
  ...specs('int', ['special_teams_tds', 'def_tds', 'fumble_recovery_tds', 'def_safeties']),
];

export const KICKER_STATS_SCHEMA: readonly ColumnSpec[] = specs('int', [
  'fg_made',
  'fg_att',
  'fg_missed',
  'fg_blocked',
  'fg_made_0_19',
  'fg_made_20_29',
  'fg_made_30_39',
  'fg_made_40_49',
  'fg_made_50_59',
  'fg_made_60_',
  'fg_missed_0_19',
  'fg_missed_20_29',
  'fg_missed_30_39',
  'fg_missed_40_49',
  'fg_missed_50_59',
  'fg_missed_60_',
  'pat_made',
  'pat_att',
  'pat_missed',
]);

const keyColumns = new Set<string>(BONUS_KEY_COLUMNS);
const BONUS_VALUE_SCHEMA = BONUS_SCHEMA.filter((c) => !keyColumns.has(c.name));

export const OFFENSE_REPORT_SCHEMA: readonly ColumnSpec[] = [
  ...PLAYER_IDENTITY_SCHEMA,
  ...OFFENSE_STATS_SCHEMA,
  ...BONUS_VALUE_SCHEMA,
  FANTASY_POINTS_SPEC,
];

export const KICKER_REPORT_SCHEMA: readonly ColumnSpec[] = [
  ...PLAYER_IDENTITY_SCHEMA,
  ...KICKER_STATS_SCHEMA,
  FANTASY_POINTS_SPEC,
];

/** Player rows of every position, used when players are reported together */
export const PLAYER_REPORT_SCHEMA: readonly ColumnSpec[] = [
  ...PLAYER_IDENTITY_SCHEMA,
  ...OFFENSE_STATS_SCHEMA,
  ...BONUS_VALUE_SCHEMA,
  ...KICKER_STATS_SCHEMA,
  FANTASY_POINTS_SPEC,
];

export const DST_REPORT_SCHEMA: readonly ColumnSpec[] = [...DST_STATS_SCHEMA, FANTASY_POINTS_SPEC];

/** Players first, D/ST-only columns after them, fantasy points last */
export const COMBINED_COLUMN_ORDER: readonly string[] = [
  ...new Set([
    ...PLAYER_REPORT_SCHEMA.filter((c) => c.name !== FANTASY_POINTS_COLUMN).map((c) => c.name),
    ...DST_STATS_SCHEMA.map((c) => c.name),
    FANTASY_POINTS_COLUMN,
  ]),
];

export const REPORT_KEY_BY_CLASS: Record<PositionClass, ReportKey> = {
  QB: 'qb',
  RB: 'rb',
  'WR/TE': 'wr_te',
  K: 'k',
  DST: 'dst',
};

export const REPORT_SCHEMA_BY_KEY: Record<ReportKey, readonly ColumnSpec[]> = {
  qb: OFFENSE_REPORT_SCHEMA,
  rb: OFFENSE_REPORT_SCHEMA,
  wr_te: OFFENSE_REPORT_SCHEMA,
  k: KICKER_REPORT_SCHEMA,
  dst: DST_REPORT_SCHEMA,
};

/** Position reports in output order */
export const REPORT_KEYS: readonly ReportKey[] = ['qb', 'rb', 'wr_te', 'k', 'dst'];
