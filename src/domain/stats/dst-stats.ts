/**
 * D/ST Statistics from Play-by-Play
 *
 * Builds one row per (season, week, team) for every defensive unit that shows
 * up in the play-by-play: takeaways, return touchdowns, conversions against,
 * and the points and yards the unit allowed.
 *
 * No async I/O, no logging.
 */

import { PlayEvent, flag } from '../plays/play-event';
import {
  ColumnSpec,
  DataTable,
  conformToSchema,
  fillNull,
  fullJoin,
  sortBy,
  tableFromRecords,
} from '../table';

export const DST_KEY_COLUMNS = ['season', 'week', 'team'] as const;

export const DST_COUNT_COLUMNS = [
  'games_played',
  'sacks',
  'interceptions',
  'fumbles_recovered',
  'blocked_kicks',
  'safeties',
  'int_td',
  'fum_ret_td',
  'kr_td',
  'pr_td',
  'blk_kick_td',
  'two_pt_returns',
  'one_pt_safeties',
  'points_allowed',
  'yards_allowed',
] as const;

export type DstCountColumn = (typeof DST_COUNT_COLUMNS)[number];

export const DST_STATS_SCHEMA: readonly ColumnSpec[] = [
  { name: 'season', type: 'int' },
  { name: 'week', type: 'int' },
  { name: 'team', type: 'string' },
  ...DST_COUNT_COLUMNS.map((name): ColumnSpec => ({ name, type: 'int' })),
];

const OFFENSIVE_PLAY_TYPES = new Set(['run', 'pass', 'qb_kneel', 'scramble']);

function isBlockedKick(event: PlayEvent): boolean {
  return (
    flag(event.puntBlocked) ||
    event.fieldGoalResult === 'blocked' ||
    event.extraPointResult === 'blocked'
  );
}

interface CountRule {
  column: DstCountColumn;
  matches: (event: PlayEvent) => boolean;
  /** Team credited with the play; defaults to the defensive team */
  teamOf?: (event: PlayEvent) => string | null;
}

const COUNT_RULES: readonly CountRule[] = [
  { column: 'sacks', matches: (e) => flag(e.sack) },
  {
    column: 'interceptions',
    matches: (e) => flag(e.interception) && e.defteam !== e.posteam,
  },
  { column: 'safeties', matches: (e) => flag(e.safety) },
  {
    column: 'fumbles_recovered',
    matches: (e) =>
      flag(e.fumble) &&
      e.defteam !== null &&
      (e.fumbleRecovery1Team === e.defteam || e.fumbleRecovery2Team === e.defteam),
  },
  { column: 'blocked_kicks', matches: isBlockedKick },
  {
    column: 'int_td',
    matches: (e) => flag(e.interception) && flag(e.returnTouchdown) && e.tdTeam === e.defteam,
  },
  {
    column: 'fum_ret_td',
    matches: (e) =>
      flag(e.fumble) && flag(e.fumbleLost) && flag(e.returnTouchdown) && e.tdTeam === e.defteam,
  },
  {
    column: 'kr_td',
    matches: (e) => flag(e.kickoffAttempt) && flag(e.returnTouchdown),
    teamOf: (e) => e.returnTeam,
  },
  {
    column: 'pr_td',
    matches: (e) => flag(e.puntAttempt) && flag(e.returnTouchdown),
    teamOf: (e) => e.returnTeam,
  },
  { column: 'blk_kick_td', matches: (e) => flag(e.returnTouchdown) && isBlockedKick(e) },
  { column: 'two_pt_returns', matches: (e) => flag(e.defensiveTwoPointConv) },
  {
    column: 'one_pt_safeties',
    matches: (e) => flag(e.defensiveExtraPointConv) || e.extraPointResult === 'safety',
  },
];

function keySchema(columns: readonly string[]): ColumnSpec[] {
  return [
    { name: 'season', type: 'int' },
    { name: 'week', type: 'int' },
    { name: 'team', type: 'string' },
    ...columns.map((name): ColumnSpec => ({ name, type: 'int' })),
  ];
}

interface TeamWeekTotals {
  season: number;
  week: number;
  team: string;
  values: Record<string, number>;
}

/**
 * Sum values per (season, week, team) into a table with the given value columns.
 */
function sumByTeamWeek(
  entries: Iterable<{ season: number; week: number; team: string; values: Record<string, number> }>,
  columns: readonly string[]
): DataTable {
  const totals = new Map<string, TeamWeekTotals>();
  for (const entry of entries) {
    const key = `${entry.season}|${entry.week}|${entry.team}`;
    let acc = totals.get(key);
    if (!acc) {
      acc = {
        season: entry.season,
        week: entry.week,
        team: entry.team,
        values: Object.fromEntries(columns.map((c) => [c, 0])),
      };
      totals.set(key, acc);
    }
    for (const column of columns) acc.values[column] += entry.values[column] ?? 0;
  }

  const records = [...totals.values()].map((acc) => ({
    season: acc.season,
    week: acc.week,
    team: acc.team,
    ...acc.values,
  }));
  return tableFromRecords(records, keySchema(columns));
}

/** One count table per rule, keyed by the credited team */
function countTable(events: readonly PlayEvent[], rule: CountRule): DataTable {
  const teamOf = rule.teamOf ?? ((e: PlayEvent) => e.defteam);
  const entries = events.flatMap((event) => {
    if (!rule.matches(event)) return [];
    const team = teamOf(event);
    if (!team) return [];
    return [{ season: event.season, week: event.week, team, values: { [rule.column]: 1 } }];
  });
  return sumByTeamWeek(entries, [rule.column]);
}

/**
 * Points allowed per team and week, from each game's final score, plus the
 * number of games the team played that week.
 */
export function pointsAllowedTable(events: readonly PlayEvent[]): DataTable {
  interface GameScore {
    season: number;
    week: number;
    homeTeam: string | null;
    awayTeam: string | null;
    home: number;
    away: number;
  }

  const games = new Map<string, GameScore>();
  for (const event of events) {
    let game = games.get(event.gameId);
    if (!game) {
      game = {
        season: event.season,
        week: event.week,
        homeTeam: event.homeTeam,
        awayTeam: event.awayTeam,
        home: 0,
        away: 0,
      };
      games.set(event.gameId, game);
    }
    game.homeTeam = game.homeTeam ?? event.homeTeam;
    game.awayTeam = game.awayTeam ?? event.awayTeam;
    game.home = Math.max(game.home, event.totalHomeScore ?? 0);
    game.away = Math.max(game.away, event.totalAwayScore ?? 0);
  }

  const entries = [...games.values()].flatMap((game) => {
    const sides: Array<{ team: string | null; allowed: number }> = [
      { team: game.homeTeam, allowed: game.away },
      { team: game.awayTeam, allowed: game.home },
    ];
    return sides.flatMap(({ team, allowed }) =>
      team
        ? [{ season: game.season, week: game.week, team, values: { points_allowed: allowed, games_played: 1 } }]
        : []
    );
  });
  return sumByTeamWeek(entries, ['points_allowed', 'games_played']);
}

/**
 * Yards gained against each defense on scrimmage plays.
 */
export function yardsAllowedTable(events: readonly PlayEvent[]): DataTable {
  const entries = events.flatMap((event) => {
    const scrimmage =
      (event.playType !== null && OFFENSIVE_PLAY_TYPES.has(event.playType)) ||
      flag(event.rush) ||
      flag(event.pass);
    if (!scrimmage || !event.defteam) return [];
    return [
      {
        season: event.season,
        week: event.week,
        team: event.defteam,
        values: { yards_allowed: event.yardsGained ?? 0 },
      },
    ];
  });
  return sumByTeamWeek(entries, ['yards_allowed']);
}

/**
 * Build the D/ST statistics table from play-by-play.
 *
 * Component tables are combined with full outer joins so a unit with any
 * activity gets a row; components it has no entry for read as 0. Rows are
 * ordered by (season, week, team).
 */
export function buildDstTable(events: readonly PlayEvent[]): DataTable {
  const components = [
    yardsAllowedTable(events),
    ...COUNT_RULES.map((rule) => countTable(events, rule)),
  ];

  const joined = components.reduce(
    (acc, component) => fullJoin(acc, component, DST_KEY_COLUMNS),
    pointsAllowedTable(events)
  );

  const filled = fillNull(joined, Object.fromEntries(DST_COUNT_COLUMNS.map((c) => [c, 0])));
  return sortBy(conformToSchema(filled, DST_STATS_SCHEMA), DST_KEY_COLUMNS);
}
