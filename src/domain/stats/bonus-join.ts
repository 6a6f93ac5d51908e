/**
 * Bonus join: attaches the sparse long-TD bonus table to weekly player stats.
 */

import {
  BONUS_COUNT_COLUMNS,
  BONUS_KEY_COLUMNS,
  BONUS_SCHEMA,
  LONG_TD_BONUS_COLUMN,
} from '../bonus/long-td-bonus';
import { DataTable, conformToSchema, dropColumns, fillNull, leftJoin } from '../table';

export const BONUS_VALUE_COLUMNS: readonly string[] = [...BONUS_COUNT_COLUMNS, LONG_TD_BONUS_COLUMN];

/**
 * Left-join bonuses onto base stats by (season, week, player_id).
 *
 * Bonus columns already on the base are replaced. Players without a bonus row
 * get 0 in every bonus column, and every bonus column is present as `int` even
 * when the bonus table is empty or has no columns at all.
 */
export function reconcileAndJoin(base: DataTable, bonuses: DataTable): DataTable {
  const right = conformToSchema(bonuses, BONUS_SCHEMA);
  const joined = leftJoin(dropColumns(base, BONUS_VALUE_COLUMNS), right, BONUS_KEY_COLUMNS);
  return fillNull(joined, Object.fromEntries(BONUS_VALUE_COLUMNS.map((name) => [name, 0])));
}
