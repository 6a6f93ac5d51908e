import { DataTable, TableRow, numberAt, stringAt, withColumn } from '../../domain/table';
import { UnsupportedPositionError } from '../../utils/exceptions';
import {
  DST_STAT_COLUMNS,
  DstStatRow,
  KICKER_STAT_COLUMNS,
  KickerStatRow,
  LEAGUE_SCORING_RULES,
  OFFENSE_STAT_COLUMNS,
  OffenseStatRow,
  POINTS_ALLOWED_BUCKETS,
  POSITION_CODES,
  POSITION_CLASSES,
  PointsBucket,
  PositionClass,
  ScoringRules,
  StatRow,
  YARDS_ALLOWED_BUCKETS,
} from './scoring.model';

/**
 * Pure scoring calculation utilities.
 * These functions have no dependencies and can be used anywhere scoring is needed.
 */

export const FANTASY_POINTS_COLUMN = 'fantasy_points';

function roundPoints(points: number): number {
  return Math.round(points * 100) / 100; // Round to 2 decimal places
}

function assertNever(value: never): never {
  throw new Error(`Unhandled stat row: ${JSON.stringify(value)}`);
}

function bucketScore(value: number, buckets: readonly PointsBucket[]): number {
  const bucket = buckets.find((b) => value <= b.max);
  return bucket ? bucket.points : 0;
}

/**
 * Map a provider position code to its position class
 * @throws UnsupportedPositionError for positions without a formula
 */
export function positionClassOf(position: string): PositionClass {
  const code = position.trim().toUpperCase();
  const match = POSITION_CLASSES.find((pc) => POSITION_CODES[pc].includes(code));
  if (!match) {
    throw new UnsupportedPositionError(position);
  }
  return match;
}

export function isScoreablePosition(position: string | null): boolean {
  if (position === null) return false;
  const code = position.trim().toUpperCase();
  return POSITION_CLASSES.some((pc) => POSITION_CODES[pc].includes(code));
}

export function dstPointsAllowedScore(pointsAllowed: number): number {
  return bucketScore(pointsAllowed, POINTS_ALLOWED_BUCKETS);
}

export function dstYardsAllowedScore(yardsAllowed: number): number {
  return bucketScore(yardsAllowed, YARDS_ALLOWED_BUCKETS);
}

export function scoreOffense(stats: OffenseStatRow, rules: ScoringRules = LEAGUE_SCORING_RULES): number {
  let points = 0;

  // Passing
  points += stats.passingYards * rules.passYards;
  points += stats.passingTds * rules.passTd;
  points += stats.passingInterceptions * rules.passInt;
  points += stats.passing2pt * rules.pass2pt;

  // Rushing
  points += stats.rushingYards * rules.rushYards;
  points += stats.rushingTds * rules.rushTd;
  points += stats.rushing2pt * rules.rush2pt;

  // Receiving
  points += stats.receivingYards * rules.recYards;
  points += stats.receptions * rules.receptions;
  points += stats.receivingTds * rules.recTd;
  points += stats.receiving2pt * rules.rec2pt;

  // Misc
  points += (stats.specialTeamsTds + stats.defTds + stats.fumbleRecoveryTds) * rules.returnOrDefTd;
  points += stats.defSafeties * rules.playerSafety;
  points +=
    (stats.rushingFumblesLost + stats.receivingFumblesLost + stats.sackFumblesLost) *
    rules.fumbleLost;

  points += stats.longTdBonus;

  return roundPoints(points);
}

export function scoreKicker(stats: KickerStatRow, rules: ScoringRules = LEAGUE_SCORING_RULES): number {
  const shortMisses = stats.fgMissed0to19 + stats.fgMissed20to29 + stats.fgMissed30to39;
  const totalMisses =
    stats.fgMissed ??
    shortMisses + stats.fgMissed40to49 + stats.fgMissed50to59 + stats.fgMissed60plus;

  let points = 0;
  points += stats.patMade * rules.patMade;
  points += (stats.fgMade0to19 + stats.fgMade20to29 + stats.fgMade30to39) * rules.fgMade0to39;
  points += stats.fgMade40to49 * rules.fgMade40to49;
  points += stats.fgMade50to59 * rules.fgMade50to59;
  points += stats.fgMade60plus * rules.fgMade60plus;

  // Every miss costs fgMissed; short misses cost extra
  points += totalMisses * rules.fgMissed;
  points += shortMisses * rules.fgMissedExtra0to39;
  points += stats.fgMissed40to49 * rules.fgMissedExtra40to49;

  return roundPoints(points);
}

export function scoreDst(stats: DstStatRow, rules: ScoringRules = LEAGUE_SCORING_RULES): number {
  let points = 0;
  points += stats.sacks * rules.defSack;
  points += stats.interceptions * rules.defInt;
  points += stats.fumblesRecovered * rules.defFumbleRec;
  points += stats.blockedKicks * rules.defBlockedKick;
  points += stats.safeties * rules.defSafety;
  points += (stats.intTd + stats.fumRetTd + stats.krTd + stats.prTd + stats.blkKickTd) * rules.defTd;
  points += stats.twoPtReturns * rules.defTwoPtReturn;
  points += stats.onePtSafeties * rules.defOnePtSafety;

  // Buckets only for units that played
  if (stats.gamesPlayed > 0) {
    points += dstPointsAllowedScore(stats.pointsAllowed);
    points += dstYardsAllowedScore(stats.yardsAllowed);
  }

  return roundPoints(points);
}

/**
 * Fantasy points for one stat row under the league rubric
 */
export function score(row: StatRow, rules: ScoringRules = LEAGUE_SCORING_RULES): number {
  switch (row.positionClass) {
    case 'QB':
    case 'RB':
    case 'WR/TE':
      return scoreOffense(row, rules);
    case 'K':
      return scoreKicker(row, rules);
    case 'DST':
      return scoreDst(row, rules);
    default:
      return assertNever(row);
  }
}

/**
 * Build the stat row of a position class from a table row.
 * Absent or non-numeric cells read as 0.
 */
export function toStatRow(row: TableRow, positionClass: PositionClass): StatRow {
  const read = (column: string) => numberAt(row, column);

  switch (positionClass) {
    case 'QB':
    case 'RB':
    case 'WR/TE': {
      const c = OFFENSE_STAT_COLUMNS;
      return {
        positionClass,
        passingYards: read(c.passingYards),
        passingTds: read(c.passingTds),
        passingInterceptions: read(c.passingInterceptions),
        passing2pt: read(c.passing2pt),
        rushingYards: read(c.rushingYards),
        rushingTds: read(c.rushingTds),
        rushing2pt: read(c.rushing2pt),
        receptions: read(c.receptions),
        receivingYards: read(c.receivingYards),
        receivingTds: read(c.receivingTds),
        receiving2pt: read(c.receiving2pt),
        specialTeamsTds: read(c.specialTeamsTds),
        defTds: read(c.defTds),
        fumbleRecoveryTds: read(c.fumbleRecoveryTds),
        defSafeties: read(c.defSafeties),
        rushingFumblesLost: read(c.rushingFumblesLost),
        receivingFumblesLost: read(c.receivingFumblesLost),
        sackFumblesLost: read(c.sackFumblesLost),
        longTdBonus: read(c.longTdBonus),
      };
    }
    case 'K': {
      const c = KICKER_STAT_COLUMNS;
      const reportedMisses = row[c.fgMissed];
      return {
        positionClass,
        patMade: read(c.patMade),
        fgMade0to19: read(c.fgMade0to19),
        fgMade20to29: read(c.fgMade20to29),
        fgMade30to39: read(c.fgMade30to39),
        fgMade40to49: read(c.fgMade40to49),
        fgMade50to59: read(c.fgMade50to59),
        fgMade60plus: read(c.fgMade60plus),
        fgMissed0to19: read(c.fgMissed0to19),
        fgMissed20to29: read(c.fgMissed20to29),
        fgMissed30to39: read(c.fgMissed30to39),
        fgMissed40to49: read(c.fgMissed40to49),
        fgMissed50to59: read(c.fgMissed50to59),
        fgMissed60plus: read(c.fgMissed60plus),
        fgMissed: typeof reportedMisses === 'number' && Number.isFinite(reportedMisses) ? reportedMisses : null,
      };
    }
    case 'DST': {
      const c = DST_STAT_COLUMNS;
      return {
        positionClass,
        gamesPlayed: read(c.gamesPlayed),
        sacks: read(c.sacks),
        interceptions: read(c.interceptions),
        fumblesRecovered: read(c.fumblesRecovered),
        blockedKicks: read(c.blockedKicks),
        safeties: read(c.safeties),
        intTd: read(c.intTd),
        fumRetTd: read(c.fumRetTd),
        krTd: read(c.krTd),
        prTd: read(c.prTd),
        blkKickTd: read(c.blkKickTd),
        twoPtReturns: read(c.twoPtReturns),
        onePtSafeties: read(c.onePtSafeties),
        pointsAllowed: read(c.pointsAllowed),
        yardsAllowed: read(c.yardsAllowed),
      };
    }
    default:
      return assertNever(positionClass);
  }
}

/**
 * Add a float `fantasy_points` column to a table.
 *
 * With a position class every row is scored under it; otherwise each row's
 * `position` cell picks the formula.
 *
 * @throws UnsupportedPositionError when a row's position has no formula
 */
export function scoreTable(
  table: DataTable,
  positionClass?: PositionClass,
  rules: ScoringRules = LEAGUE_SCORING_RULES
): DataTable {
  return withColumn(
    table,
    FANTASY_POINTS_COLUMN,
    (row) => {
      const pc = positionClass ?? positionClassOf(stringAt(row, 'position') ?? '');
      return score(toStatRow(row, pc), rules);
    },
    'float'
  );
}
