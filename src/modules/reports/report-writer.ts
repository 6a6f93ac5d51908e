import { mkdir, writeFile } from 'fs/promises';
import * as path from 'path';
import { stringify } from 'csv-stringify/sync';
import { DataTable, columnNames } from '../../domain/table';
import { logger } from '../../config/logger.config';
import { formatWeekSuffix } from '../../utils/parsing.utils';
import { REPORT_KEYS } from './report-columns';
import { ReportKey } from './report.model';

/**
 * Render a table as CSV with a header row. Nulls are written as empty cells.
 */
export function toCsv(table: DataTable): string {
  return stringify([...table.rows], { header: true, columns: columnNames(table) });
}

/**
 * Keep letters, digits, spaces, '-' and '_'; anything else becomes '_',
 * then spaces become '_'.
 *
 * @example
 * safeFileName("Ja'Marr Chase"); // 'Ja_Marr_Chase'
 */
export function safeFileName(name: string): string {
  return name.replace(/[^A-Za-z0-9 _-]/g, '_').replace(/ /g, '_');
}

export function positionReportFileName(key: ReportKey, weeks?: readonly number[]): string {
  return `${key}_stats${formatWeekSuffix(weeks)}.csv`;
}

export function summaryFileName(weeks?: readonly number[]): string {
  return `summary_stats${formatWeekSuffix(weeks)}.csv`;
}

/**
 * File name for a report filtered to named players and teams: the name of a
 * single player or team, or `combined_stats` for several.
 */
export function identityReportFileName(
  players: readonly string[],
  teams: readonly string[],
  weeks?: readonly number[]
): string {
  const suffix = formatWeekSuffix(weeks);
  if (players.length + teams.length !== 1) {
    return `combined_stats${suffix}.csv`;
  }
  if (players.length === 1) {
    return `${safeFileName(players[0])}_stats${suffix}.csv`;
  }
  return `${safeFileName(teams[0])}_dst_stats${suffix}.csv`;
}

export class ReportWriter {
  constructor(private readonly outputDir: string) {}

  /**
   * Write one table as CSV under the output directory
   * @returns Path of the written file
   */
  async write(fileName: string, table: DataTable): Promise<string> {
    await mkdir(this.outputDir, { recursive: true });
    const filePath = path.join(this.outputDir, fileName);
    await writeFile(filePath, toCsv(table), 'utf-8');
    logger.info(`Saved ${filePath}`);
    return filePath;
  }

  async writePositionReports(
    reports: Partial<Record<ReportKey, DataTable>>,
    weeks?: readonly number[]
  ): Promise<string[]> {
    const written: string[] = [];
    for (const key of REPORT_KEYS) {
      const table = reports[key];
      if (!table || table.rows.length === 0) continue;
      written.push(await this.write(positionReportFileName(key, weeks), table));
    }
    return written;
  }
}
