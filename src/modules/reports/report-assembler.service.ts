import {
  DataTable,
  TableRow,
  conformToSchema,
  filterRows,
  isEmpty,
  sortBy,
  stringAt,
  unionTables,
} from '../../domain/table';
import { logger } from '../../config/logger.config';
import { isScoreablePosition, positionClassOf, scoreTable } from '../scoring/scoring-calculator';
import {
  COMBINED_COLUMN_ORDER,
  DST_REPORT_SCHEMA,
  PLAYER_REPORT_SCHEMA,
  REPORT_KEY_BY_CLASS,
  REPORT_SCHEMA_BY_KEY,
} from './report-columns';
import {
  CombinedReportFilters,
  PositionReports,
  ReportConfig,
  ReportFilters,
  ReportKey,
  ReportKind,
  ReportResult,
  ReportStage,
} from './report.model';

const SORT_KEYS: Record<ReportKind, readonly string[]> = {
  player: ['season', 'week', 'player_display_name', 'player_id'],
  dst: ['season', 'week', 'team'],
};

const IDENTITY_COLUMN: Record<ReportKind, string> = {
  player: 'player_display_name',
  dst: 'team',
};

function empty(stage: ReportStage, table: DataTable): ReportResult {
  return { status: 'empty', stage, table: { columns: table.columns, rows: [] } };
}

function inSet(column: string, values: readonly (number | string)[]): (row: TableRow) => boolean {
  const allowed = new Set<number | string>(values);
  return (row) => {
    const value = row[column];
    return (typeof value === 'number' || typeof value === 'string') && allowed.has(value);
  };
}

/**
 * Builds scored, sorted report tables from player and D/ST stats.
 *
 * Each report runs the stages Unfiltered -> SeasonFiltered -> WeekFiltered ->
 * IdentityFiltered -> Scored -> Sorted. A stage that leaves no rows ends the
 * run with an empty result naming that stage.
 */
export class ReportAssembler {
  constructor(private readonly config: ReportConfig) {}

  /** Seasons to load: the requested ones, or the configured default */
  seasonsToLoad(requested?: readonly number[]): number[] {
    return [...(requested && requested.length > 0 ? requested : this.config.defaultSeasons)];
  }

  assemble(table: DataTable, kind: ReportKind, filters: ReportFilters = {}): ReportResult {
    let current = table;
    if (isEmpty(current)) return empty('Unfiltered', current);

    if (filters.seasons) {
      current = filterRows(current, inSet('season', filters.seasons));
      if (isEmpty(current)) return empty('SeasonFiltered', current);
    }

    if (filters.weeks) {
      current = filterRows(current, inSet('week', filters.weeks));
      if (isEmpty(current)) return empty('WeekFiltered', current);
    }

    if (filters.identities) {
      current = filterRows(current, inSet(IDENTITY_COLUMN[kind], filters.identities));
      if (isEmpty(current)) return empty('IdentityFiltered', current);
    }

    if (kind === 'player') {
      const before = current.rows.length;
      current = filterRows(current, (row) => isScoreablePosition(stringAt(row, 'position')));
      const dropped = before - current.rows.length;
      if (dropped > 0) {
        logger.debug(`Dropped ${dropped} player rows without a scoreable position`);
      }
      if (isEmpty(current)) return empty('Scored', current);
    }
    current = scoreTable(current, kind === 'dst' ? 'DST' : undefined);

    current = sortBy(current, SORT_KEYS[kind]);
    logger.debug(`Assembled ${kind} report with ${current.rows.length} rows`);
    return { status: 'ok', stage: 'Sorted', table: current };
  }

  /**
   * Split the scored tables into one report per position class
   * (qb, rb, wr_te, k from players; dst from D/ST). Empty positions are left out.
   */
  buildPositionReports(
    players: DataTable,
    dst: DataTable,
    filters: Omit<ReportFilters, 'identities'> = {}
  ): PositionReports {
    const playerResult = this.assemble(players, 'player', filters);
    const dstResult = this.assemble(dst, 'dst', filters);
    const reports: Partial<Record<ReportKey, DataTable>> = {};

    if (playerResult.status === 'ok') {
      const byKey = new Map<ReportKey, TableRow[]>();
      for (const row of playerResult.table.rows) {
        const key = REPORT_KEY_BY_CLASS[positionClassOf(stringAt(row, 'position') ?? '')];
        const bucket = byKey.get(key);
        if (bucket) bucket.push(row);
        else byKey.set(key, [row]);
      }
      for (const [key, rows] of byKey) {
        reports[key] = conformToSchema(
          { columns: playerResult.table.columns, rows },
          REPORT_SCHEMA_BY_KEY[key]
        );
      }
    }

    if (dstResult.status === 'ok') {
      reports.dst = conformToSchema(dstResult.table, DST_REPORT_SCHEMA);
    }

    return { reports, players: playerResult, dst: dstResult };
  }

  /**
   * Report for named players and teams in one table.
   *
   * Each side is assembled and sorted on its own, then both are aligned onto
   * one schema and concatenated with the player block first.
   */
  buildCombinedReport(
    players: DataTable,
    dst: DataTable,
    filters: CombinedReportFilters
  ): ReportResult {
    const blocks: DataTable[] = [];
    const results: ReportResult[] = [];

    if (filters.players && filters.players.length > 0) {
      const result = this.assemble(players, 'player', {
        seasons: filters.seasons,
        weeks: filters.weeks,
        identities: filters.players,
      });
      results.push(result);
      if (result.status === 'ok') blocks.push(conformToSchema(result.table, PLAYER_REPORT_SCHEMA));
    }

    if (filters.teams && filters.teams.length > 0) {
      const result = this.assemble(dst, 'dst', {
        seasons: filters.seasons,
        weeks: filters.weeks,
        identities: filters.teams,
      });
      results.push(result);
      if (result.status === 'ok') blocks.push(conformToSchema(result.table, DST_REPORT_SCHEMA));
    }

    if (blocks.length === 0) {
      return results[0] ?? empty('IdentityFiltered', { columns: [], rows: [] });
    }

    return {
      status: 'ok',
      stage: 'Sorted',
      table: unionTables(blocks, { order: COMBINED_COLUMN_ORDER }),
    };
  }
}

