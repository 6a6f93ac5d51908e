/**
 * Long Touchdown Bonus Derivation
 *
 * Scans play-by-play for long scoring plays and credits each participant:
 * a passing TD credits the passer and the receiver, a rushing TD the rusher.
 * A play of 50+ yards is worth 3, one of 40-49 yards is worth 2; only the
 * higher bucket applies.
 *
 * No async I/O, no logging.
 */

import { PlayEvent, flag } from '../plays/play-event';
import { ColumnSpec, DataTable, tableFromRecords } from '../table';

export const LONG_TD_40_POINTS = 2;
export const LONG_TD_50_POINTS = 3;

type TdRole = 'pass' | 'rush' | 'rec';

export const BONUS_KEY_COLUMNS = ['season', 'week', 'player_id'] as const;

export const BONUS_COUNT_COLUMNS = [
  'pass_td_40_49',
  'pass_td_50p',
  'rush_td_40_49',
  'rush_td_50p',
  'rec_td_40_49',
  'rec_td_50p',
] as const;

export const LONG_TD_BONUS_COLUMN = 'long_td_bonus';

export const BONUS_SCHEMA: readonly ColumnSpec[] = [
  { name: 'season', type: 'int' },
  { name: 'week', type: 'int' },
  { name: 'player_id', type: 'string' },
  ...BONUS_COUNT_COLUMNS.map((name): ColumnSpec => ({ name, type: 'int' })),
  { name: LONG_TD_BONUS_COLUMN, type: 'int' },
];

/**
 * Bonus points for a single touchdown of the given length.
 * Returns 0 below 40 yards.
 */
export function longTdBonusPoints(yards: number): number {
  if (yards >= 50) return LONG_TD_50_POINTS;
  if (yards >= 40) return LONG_TD_40_POINTS;
  return 0;
}

interface Credit {
  role: TdRole;
  playerId: string | null;
}

function creditsFor(event: PlayEvent): Credit[] {
  if (flag(event.passTouchdown)) {
    return [
      { role: 'pass', playerId: event.passerId },
      { role: 'rec', playerId: event.receiverId },
    ];
  }
  if (flag(event.rushTouchdown)) {
    return [{ role: 'rush', playerId: event.rusherId }];
  }
  return [];
}

interface BonusAccumulator {
  season: number;
  week: number;
  playerId: string;
  counts: Record<(typeof BONUS_COUNT_COLUMNS)[number], number>;
  points: number;
}

/**
 * Derive the sparse bonus table keyed by (season, week, player_id).
 *
 * Plays without a yardage value, and roles without a player id, are skipped.
 * The result always carries the full bonus schema, even when no play qualifies.
 */
export function deriveLongTdBonuses(events: readonly PlayEvent[]): DataTable {
  const byKey = new Map<string, BonusAccumulator>();

  for (const event of events) {
    if (event.yardsGained === null) continue;
    const points = longTdBonusPoints(event.yardsGained);
    if (points === 0) continue;

    const bucket = points === LONG_TD_50_POINTS ? '50p' : '40_49';
    for (const credit of creditsFor(event)) {
      if (!credit.playerId) continue;

      const key = `${event.season}|${event.week}|${credit.playerId}`;
      let acc = byKey.get(key);
      if (!acc) {
        acc = {
          season: event.season,
          week: event.week,
          playerId: credit.playerId,
          counts: {
            pass_td_40_49: 0,
            pass_td_50p: 0,
            rush_td_40_49: 0,
            rush_td_50p: 0,
            rec_td_40_49: 0,
            rec_td_50p: 0,
          },
          points: 0,
        };
        byKey.set(key, acc);
      }
      const column = `${credit.role}_td_${bucket}` as const;
      acc.counts[column] += 1;
      acc.points += points;
    }
  }

  const records = [...byKey.values()].map((acc) => ({
    season: acc.season,
    week: acc.week,
    player_id: acc.playerId,
    ...acc.counts,
    [LONG_TD_BONUS_COLUMN]: acc.points,
  }));

  return tableFromRecords(records, BONUS_SCHEMA);
}
