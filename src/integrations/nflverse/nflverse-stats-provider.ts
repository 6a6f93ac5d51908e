import { parse } from 'csv-parse/sync';
import { PlayEvent } from '../../domain/plays/play-event';
import {
  CellValue,
  DataTable,
  hasColumn,
  renameColumns,
  tableFromRecords,
} from '../../domain/table';
import { logger } from '../../config/logger.config';
import { ExternalApiException } from '../../utils/exceptions';
import { IStatsProvider } from '../shared/stats-provider.interface';
import { PLAY_EVENT_COLUMNS, ProviderRecord } from '../shared/stats-provider.types';
import { CsvSource } from './nflverse-api-client';

const NUMERIC_PATTERN = /^-?(\d+\.?\d*|\.\d+)([eE][-+]?\d+)?$/;
/** Blank and NA markers, plus the non-finite values R writes for undefined ratios */
const MISSING_VALUES = new Set(['', 'NA', 'NaN', 'null', 'Inf', '-Inf']);

/** Columns kept as text even when every value looks numeric */
const TEXT_COLUMNS = new Set([
  'player_id',
  'player_name',
  'player_display_name',
  'position',
  'position_group',
  'headshot_url',
  'team',
  'recent_team',
  'opponent_team',
  'season_type',
  'game_id',
]);

export function statsPath(season: number): string {
  return `stats_player/stats_player_week_${season}.csv`;
}

export function playByPlayPath(season: number): string {
  return `pbp/play_by_play_${season}.csv.gz`;
}

function isMissing(raw: string): boolean {
  return MISSING_VALUES.has(raw.trim());
}

/**
 * Coerce a raw CSV cell: blanks, NA markers and infinities are null; in a numeric column
 * the text is a number, otherwise it stays text.
 */
export function coerceCell(raw: string, numeric: boolean): CellValue {
  const value = raw.trim();
  if (MISSING_VALUES.has(value)) return null;
  return numeric ? Number(value) : value;
}

/**
 * Parse CSV text with a header row into typed records.
 *
 * A column is numeric when every present value in it is numeric text, so a
 * column never mixes numbers and text across rows.
 */
export function parseCsvRecords(text: string, source: string): ProviderRecord[] {
  const parsed: unknown = parse(text, {
    columns: true,
    skip_empty_lines: true,
    relax_column_count: true,
  });
  if (!Array.isArray(parsed)) {
    throw new ExternalApiException('nflverse', source, 'CSV did not parse into rows');
  }

  const rows: Array<Record<string, string>> = parsed.map((row: unknown) => {
    const raw: Record<string, string> = {};
    if (typeof row !== 'object' || row === null) return raw;
    for (const [column, value] of Object.entries(row)) {
      if (typeof value === 'string') raw[column] = value;
    }
    return raw;
  });

  const textColumns = new Set(TEXT_COLUMNS);
  for (const row of rows) {
    for (const [column, value] of Object.entries(row)) {
      if (!isMissing(value) && !NUMERIC_PATTERN.test(value.trim())) textColumns.add(column);
    }
  }

  return rows.map((row) => {
    const record: ProviderRecord = {};
    for (const [column, value] of Object.entries(row)) {
      record[column] = coerceCell(value, !textColumns.has(column));
    }
    return record;
  });
}

function numberField(record: ProviderRecord, column: string): number | null {
  const value = record[column];
  return typeof value === 'number' ? value : null;
}

function textField(record: ProviderRecord, column: string): string | null {
  const value = record[column];
  if (value === null || value === undefined) return null;
  return String(value);
}

/**
 * Map a play-by-play record to a play event.
 * Returns null for rows without a season, week or game id.
 */
export function toPlayEvent(record: ProviderRecord): PlayEvent | null {
  const c = PLAY_EVENT_COLUMNS;
  const season = numberField(record, c.season);
  const week = numberField(record, c.week);
  const gameId = textField(record, c.gameId);
  if (season === null || week === null || gameId === null) return null;

  const num = (column: string) => numberField(record, column);
  const text = (column: string) => textField(record, column);

  return {
    season,
    week,
    gameId,
    homeTeam: text(c.homeTeam),
    awayTeam: text(c.awayTeam),
    posteam: text(c.posteam),
    defteam: text(c.defteam),
    playType: text(c.playType),
    pass: num(c.pass),
    rush: num(c.rush),
    rushAttempt: num(c.rushAttempt),
    sack: num(c.sack),
    interception: num(c.interception),
    safety: num(c.safety),
    fumble: num(c.fumble),
    fumbleLost: num(c.fumbleLost),
    puntBlocked: num(c.puntBlocked),
    kickoffAttempt: num(c.kickoffAttempt),
    puntAttempt: num(c.puntAttempt),
    touchdown: num(c.touchdown),
    passTouchdown: num(c.passTouchdown),
    rushTouchdown: num(c.rushTouchdown),
    returnTouchdown: num(c.returnTouchdown),
    defensiveTwoPointConv: num(c.defensiveTwoPointConv),
    defensiveExtraPointConv: num(c.defensiveExtraPointConv),
    fieldGoalResult: text(c.fieldGoalResult),
    extraPointResult: text(c.extraPointResult),
    fumbleRecovery1Team: text(c.fumbleRecovery1Team),
    fumbleRecovery2Team: text(c.fumbleRecovery2Team),
    tdTeam: text(c.tdTeam),
    returnTeam: text(c.returnTeam),
    yardsGained: num(c.yardsGained),
    // Older releases only carry the short id columns
    passerId: text(c.passerId) ?? text('passer_id'),
    rusherId: text(c.rusherId) ?? text('rusher_id'),
    receiverId: text(c.receiverId) ?? text('receiver_id'),
    totalHomeScore: num(c.totalHomeScore),
    totalAwayScore: num(c.totalAwayScore),
  };
}

/**
 * nflverse implementation of IStatsProvider
 *
 * Reads the weekly player stats and play-by-play release files and maps them
 * into typed tables and play events. All nflverse-specific naming is isolated
 * to this file and the types module.
 */
export class NflverseStatsProvider implements IStatsProvider {
  readonly providerId = 'nflverse';

  constructor(private readonly client: CsvSource) {}

  async fetchPlayerWeeklyStats(season: number): Promise<DataTable> {
    const path = statsPath(season);
    const records = parseCsvRecords(await this.client.fetchCsv(path), path);
    logger.info(`Fetched ${records.length} weekly player stat rows for ${season}`);

    const table = tableFromRecords(records);
    // Releases before 2025 name the team column recent_team
    if (hasColumn(table, 'recent_team') && !hasColumn(table, 'team')) {
      return renameColumns(table, { recent_team: 'team' });
    }
    return table;
  }

  async fetchPlayByPlay(season: number): Promise<PlayEvent[]> {
    const path = playByPlayPath(season);
    const records = parseCsvRecords(await this.client.fetchCsv(path), path);

    const events: PlayEvent[] = [];
    let skipped = 0;
    for (const record of records) {
      const event = toPlayEvent(record);
      if (event) events.push(event);
      else skipped++;
    }
    if (skipped > 0) {
      logger.debug(`Skipped ${skipped} play-by-play rows without season, week or game id`);
    }
    logger.info(`Fetched ${events.length} plays for ${season}`);
    return events;
  }
}
