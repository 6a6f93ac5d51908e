#!/usr/bin/env node
// Ensure env is loaded before accessing process.env
import './config/env.config';

import { parseArgs } from 'util';
import { parseEnv } from './config/env.config';
import { logger } from './config/logger.config';
import { bootstrap } from './bootstrap';
import { container, KEYS } from './container';
import { DataTable } from './domain/table';
import { IdentityService } from './modules/players/identity.service';
import { ReportAssembler } from './modules/reports/report-assembler.service';
import { ReportWriter, identityReportFileName, summaryFileName } from './modules/reports/report-writer';
import { StatsService, StatsLoadResult } from './modules/stats/stats.service';
import { aggregateByIdentity, buildSummaryReport } from './modules/summary/summary-stats';
import { AppException, ValidationException } from './utils/exceptions';
import { parseNameList, parseSeasonList, parseWeekSpec } from './utils/parsing.utils';

const USAGE = `Usage: fantasy-stats [options]

Load player and D/ST statistics, score them and write per-position CSV reports.

Options:
  -s, --seasons <list>     Comma-separated seasons (default: DEFAULT_SEASONS)
  -w, --week <spec>        Weeks to include: "11", "8-10" or "8,9,11-13"
  -o, --output-dir <dir>   Directory for CSV files (default: OUTPUT_DIR)
  -p, --player <names>     Comma-separated player names (fuzzy-matched)
  -t, --team <names>       Comma-separated D/ST team names or codes (fuzzy-matched)
  -d, --display            Print the player/team report to the console
      --summary            Write summary statistics for --player/--team instead of reports
  -h, --help               Show this help
`;

export interface CliOptions {
  seasons?: number[];
  weeks?: number[];
  outputDir?: string;
  players: string[];
  teams: string[];
  display: boolean;
  summary: boolean;
  help: boolean;
}

function readArgs(argv: readonly string[]) {
  return parseArgs({
    args: [...argv],
    options: {
      seasons: { type: 'string', short: 's' },
      week: { type: 'string', short: 'w' },
      'output-dir': { type: 'string', short: 'o' },
      player: { type: 'string', short: 'p' },
      team: { type: 'string', short: 't' },
      display: { type: 'boolean', short: 'd', default: false },
      summary: { type: 'boolean', default: false },
      help: { type: 'boolean', short: 'h', default: false },
    },
    strict: true,
    allowPositionals: false,
  });
}

/**
 * Parse command-line arguments. Selectors are validated here, before any data
 * is loaded.
 * @throws ValidationException on unknown options or malformed selectors
 */
export function parseCliArgs(argv: readonly string[]): CliOptions {
  let values: ReturnType<typeof readArgs>['values'];
  try {
    values = readArgs(argv).values;
  } catch (error) {
    throw new ValidationException(error instanceof Error ? error.message : String(error));
  }

  return {
    seasons: parseSeasonList(values.seasons),
    weeks: parseWeekSpec(values.week),
    outputDir: values['output-dir'],
    players: parseNameList(values.player),
    teams: parseNameList(values.team),
    display: values.display ?? false,
    summary: values.summary ?? false,
    help: values.help ?? false,
  };
}

function printTable(title: string, table: DataTable): void {
  console.log('='.repeat(80));
  console.log(title);
  console.log('='.repeat(80));
  console.table(table.rows);
}

async function writePositionReports(
  options: CliOptions,
  seasons: number[],
  data: StatsLoadResult
): Promise<void> {
  const assembler = container.resolve<ReportAssembler>(KEYS.REPORT_ASSEMBLER);
  const writer = container.resolve<ReportWriter>(KEYS.REPORT_WRITER);

  logger.info('Generating output tables...');
  const { reports, players, dst } = assembler.buildPositionReports(data.players, data.dst, {
    seasons,
    weeks: options.weeks,
  });
  if (players.status === 'empty') {
    logger.warn(`No player rows left after stage ${players.stage}`);
  }
  if (dst.status === 'empty') {
    logger.warn(`No D/ST rows left after stage ${dst.stage}`);
  }
  await writer.writePositionReports(reports, options.weeks);
}

async function writeSummary(
  options: CliOptions,
  seasons: number[],
  data: StatsLoadResult
): Promise<number> {
  const identities = container.resolve<IdentityService>(KEYS.IDENTITY_SERVICE);
  const assembler = container.resolve<ReportAssembler>(KEYS.REPORT_ASSEMBLER);
  const writer = container.resolve<ReportWriter>(KEYS.REPORT_WRITER);

  logger.info('Generating summary statistics...');
  const names = [
    ...identities.resolvePlayers(options.players, data.players).matches,
    ...identities.resolveTeams(options.teams, data.dst).matches,
  ];
  if (names.length === 0) {
    logger.error('No valid players or teams found');
    return 1;
  }

  // Season-to-date and recent form need every week, so only seasons filter here
  const players = assembler.assemble(data.players, 'player', { seasons });
  const dst = assembler.assemble(data.dst, 'dst', { seasons });
  const summary = buildSummaryReport(players.table, dst.table, names, options.weeks);

  printTable('Summary Statistics', summary);
  await writer.write(summaryFileName(options.weeks), summary);
  return 0;
}

async function writeIdentityReport(
  options: CliOptions,
  seasons: number[],
  data: StatsLoadResult
): Promise<number> {
  const identities = container.resolve<IdentityService>(KEYS.IDENTITY_SERVICE);
  const assembler = container.resolve<ReportAssembler>(KEYS.REPORT_ASSEMBLER);
  const writer = container.resolve<ReportWriter>(KEYS.REPORT_WRITER);

  const players = identities.resolvePlayers(options.players, data.players).matches;
  const teams = identities.resolveTeams(options.teams, data.dst).matches;

  const result = assembler.buildCombinedReport(data.players, data.dst, {
    seasons,
    weeks: options.weeks,
    players,
    teams,
  });
  if (result.status === 'empty') {
    logger.error(
      `No valid data found for any of the specified players or teams (stopped at ${result.stage})`
    );
    return 1;
  }

  if (options.display) {
    printTable(`Statistics for ${players.length} player(s) and ${teams.length} team(s)`, result.table);
    const filters = { seasons, weeks: options.weeks };
    const playerRows = assembler.assemble(data.players, 'player', { ...filters, identities: players });
    if (playerRows.status === 'ok') {
      printTable('Player totals', aggregateByIdentity(playerRows.table, 'player_display_name'));
    }
    const dstRows = assembler.assemble(data.dst, 'dst', { ...filters, identities: teams });
    if (dstRows.status === 'ok') {
      printTable('D/ST totals', aggregateByIdentity(dstRows.table, 'team'));
    }
  }

  await writer.write(identityReportFileName(players, teams, options.weeks), result.table);
  return 0;
}

/**
 * Exit code for a failed run. Application errors carry their own code.
 */
export function exitCodeFor(error: unknown): number {
  if (error instanceof AppException) {
    logger.error(error.message, { errorCode: error.errorCode });
    return error.exitCode;
  }
  logger.error('Unexpected failure', {
    error: error instanceof Error ? error.stack : String(error),
  });
  return 1;
}

/**
 * Run the command line
 * @returns Process exit code
 */
export async function main(argv: readonly string[]): Promise<number> {
  try {
    const options = parseCliArgs(argv);
    if (options.help) {
      console.log(USAGE);
      return 0;
    }

    const hasQueries = options.players.length > 0 || options.teams.length > 0;
    if (options.summary && !hasQueries) {
      logger.error('--summary requires --player or --team to name the players/teams to summarize');
      return 1;
    }

    bootstrap(parseEnv(), { outputDir: options.outputDir });

    const assembler = container.resolve<ReportAssembler>(KEYS.REPORT_ASSEMBLER);
    const stats = container.resolve<StatsService>(KEYS.STATS_SERVICE);

    const seasons = assembler.seasonsToLoad(options.seasons);
    if (options.weeks) {
      logger.info(`Filtering to weeks: ${options.weeks.join(', ')}`);
    }
    const data = await stats.loadSeasons(seasons);

    if (options.summary) {
      return await writeSummary(options, seasons, data);
    }

    await writePositionReports(options, seasons, data);

    if (hasQueries) {
      return await writeIdentityReport(options, seasons, data);
    }
    return 0;
  } catch (error) {
    return exitCodeFor(error);
  }
}

if (require.main === module) {
  main(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      process.exitCode = exitCodeFor(error);
    });
}
