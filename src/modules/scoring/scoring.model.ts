/**
 * Scoring models: position classes, per-class stat rows and the league rubric
 */

export type PositionClass = 'QB' | 'RB' | 'WR/TE' | 'K' | 'DST';

export const POSITION_CLASSES: readonly PositionClass[] = ['QB', 'RB', 'WR/TE', 'K', 'DST'];

/** Provider position codes accepted for each position class */
export const POSITION_CODES: Record<PositionClass, readonly string[]> = {
  QB: ['QB'],
  RB: ['RB', 'FB'],
  'WR/TE': ['WR', 'TE'],
  K: ['K'],
  DST: ['DST', 'DEF'],
};

export interface OffenseStatRow {
  positionClass: 'QB' | 'RB' | 'WR/TE';
  // Passing
  passingYards: number;
  passingTds: number;
  passingInterceptions: number;
  passing2pt: number;
  // Rushing
  rushingYards: number;
  rushingTds: number;
  rushing2pt: number;
  // Receiving
  receptions: number;
  receivingYards: number;
  receivingTds: number;
  receiving2pt: number;
  // Returns / defense credited to the player
  specialTeamsTds: number;
  defTds: number;
  fumbleRecoveryTds: number;
  defSafeties: number;
  // Fumbles lost
  rushingFumblesLost: number;
  receivingFumblesLost: number;
  sackFumblesLost: number;
  // Precomputed long-TD bonus points
  longTdBonus: number;
}

export interface KickerStatRow {
  positionClass: 'K';
  patMade: number;
  fgMade0to19: number;
  fgMade20to29: number;
  fgMade30to39: number;
  fgMade40to49: number;
  fgMade50to59: number;
  fgMade60plus: number;
  fgMissed0to19: number;
  fgMissed20to29: number;
  fgMissed30to39: number;
  fgMissed40to49: number;
  fgMissed50to59: number;
  fgMissed60plus: number;
  /** Total misses as reported; null when the provider only reports buckets */
  fgMissed: number | null;
}

export interface DstStatRow {
  positionClass: 'DST';
  gamesPlayed: number;
  sacks: number;
  interceptions: number;
  fumblesRecovered: number;
  blockedKicks: number;
  safeties: number;
  intTd: number;
  fumRetTd: number;
  krTd: number;
  prTd: number;
  blkKickTd: number;
  twoPtReturns: number;
  onePtSafeties: number;
  pointsAllowed: number;
  yardsAllowed: number;
}

export type StatRow = OffenseStatRow | KickerStatRow | DstStatRow;

type StatFields<T extends StatRow> = Exclude<keyof T, 'positionClass'>;

/** Provider column backing each offensive stat field */
export const OFFENSE_STAT_COLUMNS: Record<StatFields<OffenseStatRow>, string> = {
  passingYards: 'passing_yards',
  passingTds: 'passing_tds',
  passingInterceptions: 'passing_interceptions',
  passing2pt: 'passing_2pt_conversions',
  rushingYards: 'rushing_yards',
  rushingTds: 'rushing_tds',
  rushing2pt: 'rushing_2pt_conversions',
  receptions: 'receptions',
  receivingYards: 'receiving_yards',
  receivingTds: 'receiving_tds',
  receiving2pt: 'receiving_2pt_conversions',
  specialTeamsTds: 'special_teams_tds',
  defTds: 'def_tds',
  fumbleRecoveryTds: 'fumble_recovery_tds',
  defSafeties: 'def_safeties',
  rushingFumblesLost: 'rushing_fumbles_lost',
  receivingFumblesLost: 'receiving_fumbles_lost',
  sackFumblesLost: 'sack_fumbles_lost',
  longTdBonus: 'long_td_bonus',
};

export const KICKER_STAT_COLUMNS: Record<StatFields<KickerStatRow>, string> = {
  patMade: 'pat_made',
  fgMade0to19: 'fg_made_0_19',
  fgMade20to29: 'fg_made_20_29',
  fgMade30to39: 'fg_made_30_39',
  fgMade40to49: 'fg_made_40_49',
  fgMade50to59: 'fg_made_50_59',
  fgMade60plus: 'fg_made_60_',
  fgMissed0to19: 'fg_missed_0_19',
  fgMissed20to29: 'fg_missed_20_29',
  fgMissed30to39: 'fg_missed_30_39',
  fgMissed40to49: 'fg_missed_40_49',
  fgMissed50to59: 'fg_missed_50_59',
  fgMissed60plus: 'fg_missed_60_',
  fgMissed: 'fg_missed',
};

export const DST_STAT_COLUMNS: Record<StatFields<DstStatRow>, string> = {
  gamesPlayed: 'games_played',
  sacks: 'sacks',
  interceptions: 'interceptions',
  fumblesRecovered: 'fumbles_recovered',
  blockedKicks: 'blocked_kicks',
  safeties: 'safeties',
  intTd: 'int_td',
  fumRetTd: 'fum_ret_td',
  krTd: 'kr_td',
  prTd: 'pr_td',
  blkKickTd: 'blk_kick_td',
  twoPtReturns: 'two_pt_returns',
  onePtSafeties: 'one_pt_safeties',
  pointsAllowed: 'points_allowed',
  yardsAllowed: 'yards_allowed',
};

export interface ScoringRules {
  // Passing
  passYards: number; // points per yard
  passTd: number;
  passInt: number;
  pass2pt: number;
  // Rushing
  rushYards: number;
  rushTd: number;
  rush2pt: number;
  // Receiving
  recYards: number;
  receptions: number;
  recTd: number;
  rec2pt: number;
  // Misc
  returnOrDefTd: number; // special teams, defensive and fumble recovery TDs
  playerSafety: number;
  fumbleLost: number;
  // Kicking
  patMade: number;
  fgMade0to39: number;
  fgMade40to49: number;
  fgMade50to59: number;
  fgMade60plus: number;
  fgMissed: number; // every miss
  fgMissedExtra0to39: number; // on top of fgMissed
  fgMissedExtra40to49: number;
  // Defense / special teams
  defSack: number;
  defInt: number;
  defFumbleRec: number;
  defBlockedKick: number;
  defSafety: number;
  defTd: number;
  defTwoPtReturn: number;
  defOnePtSafety: number;
}

export const LEAGUE_SCORING_RULES: ScoringRules = {
  passYards: 0.04,
  passTd: 6,
  passInt: -3,
  pass2pt: 2,
  rushYards: 0.1,
  rushTd: 6,
  rush2pt: 2,
  recYards: 0.1,
  receptions: 1,
  recTd: 6,
  rec2pt: 2,
  returnOrDefTd: 6,
  playerSafety: 1,
  fumbleLost: -2,
  patMade: 1,
  fgMade0to39: 3,
  fgMade40to49: 4,
  fgMade50to59: 5,
  fgMade60plus: 6,
  fgMissed: -1,
  fgMissedExtra0to39: -3,
  fgMissedExtra40to49: -2,
  defSack: 2,
  defInt: 2,
  defFumbleRec: 2,
  defBlockedKick: 2,
  defSafety: 5,
  defTd: 6,
  defTwoPtReturn: 2,
  defOnePtSafety: 1,
};

export interface PointsBucket {
  /** Inclusive upper bound of the bucket */
  max: number;
  points: number;
}

/** Points-allowed buckets, highest award first */
export const POINTS_ALLOWED_BUCKETS: readonly PointsBucket[] = [
  { max: 0, points: 8 },
  { max: 6, points: 4 },
  { max: 13, points: 3 },
  { max: 17, points: 1 },
  { max: 27, points: 0 },
  { max: 34, points: -1 },
  { max: 45, points: -3 },
  { max: Infinity, points: -5 },
];

/** Yards-allowed buckets, highest award first */
export const YARDS_ALLOWED_BUCKETS: readonly PointsBucket[] = [
  { max: 99, points: 8 },
  { max: 199, points: 5 },
  { max: 299, points: 3 },
  { max: 349, points: 1 },
  { max: 449, points: 0 },
  { max: 499, points: -1 },
  { max: 549, points: -2 },
  { max: Infinity, points: -3 },
];
