import { DataTable } from '../../domain/table';

/**
 * Report pipeline stages, in the order they run.
 * Filters are optional; Scored and Sorted always run.
 */
export const REPORT_STAGES = [
  'Unfiltered',
  'SeasonFiltered',
  'WeekFiltered',
  'IdentityFiltered',
  'Scored',
  'Sorted',
] as const;

export type ReportStage = (typeof REPORT_STAGES)[number];

/** Which kind of table a report is built from */
export type ReportKind = 'player' | 'dst';

/** Output file keys, one per position report */
export type ReportKey = 'qb' | 'rb' | 'wr_te' | 'k' | 'dst';

export interface ReportFilters {
  seasons?: readonly number[];
  weeks?: readonly number[];
  /** Player display names or team codes, depending on the report kind */
  identities?: readonly string[];
}

export interface CombinedReportFilters {
  seasons?: readonly number[];
  weeks?: readonly number[];
  players?: readonly string[];
  teams?: readonly string[];
}

export type ReportResult =
  | { status: 'ok'; stage: 'Sorted'; table: DataTable }
  | { status: 'empty'; stage: ReportStage; table: DataTable };

export interface ReportConfig {
  outputDir: string;
  defaultSeasons: readonly number[];
}

export interface PositionReports {
  /** Non-empty position tables, keyed by output file */
  reports: Partial<Record<ReportKey, DataTable>>;
  players: ReportResult;
  dst: ReportResult;
}
