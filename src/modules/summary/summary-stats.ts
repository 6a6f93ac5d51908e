/**
 * Summary Aggregation
 *
 * Per-identity totals, and the fantasy-point distribution summary over the
 * season, the most recent games and an optional week selection.
 */

import {
  CellValue,
  ColumnSpec,
  DataTable,
  TableRow,
  filterRows,
  getColumn,
  numberAt,
  tableFromRecords,
} from '../../domain/table';
import { FANTASY_POINTS_COLUMN } from '../scoring/scoring-calculator';

export const RECENT_GAMES = 4;
export const NUCLEAR_THRESHOLD = 20;
export const BOOM_THRESHOLD = 15;
export const BUST_THRESHOLD = 10;

/** Rate columns averaged by the weight column instead of summed */
const WEIGHTED_RATES: Readonly<Record<string, string>> = {
  target_share: 'targets',
  air_yards_share: 'targets',
};

/** Rate columns averaged plainly over rows that have a value */
const PLAIN_RATES = new Set(['wopr']);

/** Numeric columns that describe a row rather than count something */
const NON_SUMMED = new Set(['season', 'week']);

const round2 = (value: number): number => Math.round(value * 100) / 100;

function isRate(column: string): boolean {
  return column in WEIGHTED_RATES || PLAIN_RATES.has(column);
}

function presentNumbers(rows: readonly TableRow[], column: string): number[] {
  return rows.flatMap((row) => {
    const value = row[column];
    return typeof value === 'number' && Number.isFinite(value) ? [value] : [];
  });
}

function weightedRate(rows: readonly TableRow[], column: string, weight: string): number | null {
  let weighted = 0;
  let totalWeight = 0;
  for (const row of rows) {
    const value = row[column];
    if (typeof value !== 'number') continue;
    const w = numberAt(row, weight);
    weighted += value * w;
    totalWeight += w;
  }
  if (totalWeight > 0) return weighted / totalWeight;
  return plainMean(rows, column);
}

function plainMean(rows: readonly TableRow[], column: string): number | null {
  const values = presentNumbers(rows, column);
  if (values.length === 0) return null;
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

/**
 * One row per identity: `games` (row count), sums of count-like numeric
 * columns and fantasy points, and averages of rate columns (target and air
 * yards share weighted by targets, WOPR a plain mean).
 * Rows without an identity are ignored.
 */
export function aggregateByIdentity(table: DataTable, key: string): DataTable {
  const groups = new Map<string | number | boolean, TableRow[]>();
  for (const row of table.rows) {
    const id = row[key];
    if (id === null || id === undefined) continue;
    const group = groups.get(id);
    if (group) group.push(row);
    else groups.set(id, [row]);
  }

  const numeric = table.columns.filter(
    (c) => (c.type === 'int' || c.type === 'float') && c.name !== key && !NON_SUMMED.has(c.name)
  );
  const summed = numeric.filter((c) => !isRate(c.name));
  const rates = numeric.filter((c) => isRate(c.name));

  const schema: ColumnSpec[] = [
    { name: key, type: getColumn(table, key)?.type ?? 'string' },
    { name: 'games', type: 'int' },
    ...summed.map((c) => ({ name: c.name, type: c.type })),
    ...rates.map((c): ColumnSpec => ({ name: c.name, type: 'float' })),
  ];

  const records = [...groups.entries()].map(([id, rows]) => {
    const record: Record<string, CellValue> = { [key]: id, games: rows.length };
    for (const c of summed) {
      const total = rows.reduce((sum, row) => sum + numberAt(row, c.name), 0);
      record[c.name] = c.type === 'float' ? round2(total) : total;
    }
    for (const c of rates) {
      const weight = WEIGHTED_RATES[c.name];
      const mean = weight ? weightedRate(rows, c.name, weight) : plainMean(rows, c.name);
      record[c.name] = mean === null ? null : Math.round(mean * 10000) / 10000;
    }
    return record;
  });

  return tableFromRecords(records, schema);
}

export interface PointsDistribution {
  num_games: number;
  mean_points: number;
  median_points: number;
  max_points: number;
  min_points: number;
  stddev_points: number;
  mad_points: number;
  nuclear_games: number;
  boom_games: number;
  bust_games: number;
}

const DISTRIBUTION_SCHEMA: ReadonlyArray<{ stat: keyof PointsDistribution; type: 'int' | 'float' }> = [
  { stat: 'num_games', type: 'int' },
  { stat: 'mean_points', type: 'float' },
  { stat: 'median_points', type: 'float' },
  { stat: 'max_points', type: 'float' },
  { stat: 'min_points', type: 'float' },
  { stat: 'stddev_points', type: 'float' },
  { stat: 'mad_points', type: 'float' },
  { stat: 'nuclear_games', type: 'int' },
  { stat: 'boom_games', type: 'int' },
  { stat: 'bust_games', type: 'int' },
];

function median(values: readonly number[]): number {
  const sorted = [...values].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  return sorted.length % 2 === 1 ? sorted[mid] : (sorted[mid - 1] + sorted[mid]) / 2;
}

/**
 * Distribution of fantasy points over a set of games.
 * Standard deviation is the sample deviation (0 for a single game); MAD is the
 * median absolute deviation from the median.
 */
export function pointsDistribution(points: readonly number[]): PointsDistribution {
  const n = points.length;
  if (n === 0) {
    return {
      num_games: 0,
      mean_points: 0,
      median_points: 0,
      max_points: 0,
      min_points: 0,
      stddev_points: 0,
      mad_points: 0,
      nuclear_games: 0,
      boom_games: 0,
      bust_games: 0,
    };
  }

  const mean = points.reduce((sum, p) => sum + p, 0) / n;
  const mid = median(points);
  const variance = n > 1 ? points.reduce((sum, p) => sum + (p - mean) ** 2, 0) / (n - 1) : 0;

  return {
    num_games: n,
    mean_points: round2(mean),
    median_points: round2(mid),
    max_points: Math.max(...points),
    min_points: Math.min(...points),
    stddev_points: round2(Math.sqrt(variance)),
    mad_points: round2(median(points.map((p) => Math.abs(p - mid)))),
    nuclear_games: points.filter((p) => p >= NUCLEAR_THRESHOLD).length,
    boom_games: points.filter((p) => p >= BOOM_THRESHOLD).length,
    bust_games: points.filter((p) => p < BUST_THRESHOLD).length,
  };
}

export function summarySchema(withWeeks: boolean): ColumnSpec[] {
  const prefixes = withWeeks ? ['season_', 'recent_', 'weeks_'] : ['season_', 'recent_'];
  return [
    { name: 'name', type: 'string' },
    { name: 'type', type: 'string' },
    ...prefixes.flatMap((prefix) =>
      DISTRIBUTION_SCHEMA.map(({ stat, type }): ColumnSpec => ({ name: `${prefix}${stat}`, type }))
    ),
  ];
}

function pointsOf(rows: readonly TableRow[]): number[] {
  return rows.map((row) => numberAt(row, FANTASY_POINTS_COLUMN));
}

/** The most recent games, latest first */
function recentRows(rows: readonly TableRow[], count: number): TableRow[] {
  return [...rows]
    .sort(
      (a, b) => numberAt(b, 'season') - numberAt(a, 'season') || numberAt(b, 'week') - numberAt(a, 'week')
    )
    .slice(0, count);
}

function prefixed(prefix: string, stats: PointsDistribution): Record<string, number> {
  const record: Record<string, number> = {};
  for (const { stat } of DISTRIBUTION_SCHEMA) record[`${prefix}${stat}`] = stats[stat];
  return record;
}

/**
 * Summary report: one row per resolved player display name or team code, with
 * season-to-date, recent-form and (when weeks are given) selected-week
 * distributions of fantasy points. A name is looked up among players first,
 * then D/ST units; names found in neither are skipped.
 *
 * @param players - Scored player rows
 * @param dst - Scored D/ST rows
 */
export function buildSummaryReport(
  players: DataTable,
  dst: DataTable,
  names: readonly string[],
  weeks?: readonly number[]
): DataTable {
  const weekSet = weeks ? new Set(weeks) : undefined;

  const records = names.flatMap((name) => {
    let rows = filterRows(players, (row) => row.player_display_name === name).rows;
    let type = 'Player';
    if (rows.length === 0) {
      rows = filterRows(dst, (row) => row.team === name).rows;
      type = 'D/ST';
    }
    if (rows.length === 0) return [];

    const record: Record<string, CellValue> = {
      name,
      type,
      ...prefixed('season_', pointsDistribution(pointsOf(rows))),
      ...prefixed('recent_', pointsDistribution(pointsOf(recentRows(rows, RECENT_GAMES)))),
    };
    if (weekSet) {
      const selected = rows.filter((row) => weekSet.has(numberAt(row, 'week')));
      Object.assign(record, prefixed('weeks_', pointsDistribution(pointsOf(selected))));
    }
    return [record];
  });

  return tableFromRecords(records, summarySchema(weekSet !== undefined));
}
