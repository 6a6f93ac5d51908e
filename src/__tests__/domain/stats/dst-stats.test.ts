import {
  DST_STATS_SCHEMA,
  buildDstTable,
  pointsAllowedTable,
  yardsAllowedTable,
} from '../../../domain/stats/dst-stats';
import { makeEvent } from '../../fixtures/play-events';

// Game 2024_01_AAA_BBB: AAA visits BBB, final score 7-7
const plays = [
  makeEvent({ playType: 'pass', pass: 1, posteam: 'AAA', defteam: 'BBB', yardsGained: 25 }),
  makeEvent({ playType: 'pass', pass: 1, sack: 1, posteam: 'AAA', defteam: 'BBB', yardsGained: -7 }),
  makeEvent({ playType: 'run', rush: 1, posteam: 'BBB', defteam: 'AAA', yardsGained: 10 }),
  makeEvent({
    playType: 'run',
    rush: 1,
    fumble: 1,
    fumbleLost: 1,
    fumbleRecovery1Team: 'AAA',
    posteam: 'BBB',
    defteam: 'AAA',
    yardsGained: 3,
  }),
  makeEvent({
    playType: 'pass',
    pass: 1,
    interception: 1,
    returnTouchdown: 1,
    touchdown: 1,
    tdTeam: 'BBB',
    posteam: 'AAA',
    defteam: 'BBB',
    yardsGained: 0,
    totalHomeScore: 7,
    totalAwayScore: 0,
  }),
  makeEvent({
    playType: 'kickoff',
    kickoffAttempt: 1,
    returnTouchdown: 1,
    touchdown: 1,
    returnTeam: 'AAA',
    tdTeam: 'AAA',
    posteam: 'AAA',
    defteam: 'BBB',
    totalHomeScore: 7,
    totalAwayScore: 7,
  }),
  makeEvent({ playType: 'punt', puntAttempt: 1, puntBlocked: 1, posteam: 'AAA', defteam: 'BBB' }),
];

const zeroCounts = {
  games_played: 0,
  sacks: 0,
  interceptions: 0,
  fumbles_recovered: 0,
  blocked_kicks: 0,
  safeties: 0,
  int_td: 0,
  fum_ret_td: 0,
  kr_td: 0,
  pr_td: 0,
  blk_kick_td: 0,
  two_pt_returns: 0,
  one_pt_safeties: 0,
  points_allowed: 0,
  yards_allowed: 0,
};

describe('D/ST statistics', () => {
  it('credits each unit with its takeaways, return TDs and allowed totals', () => {
    const table = buildDstTable(plays);

    expect(table.columns).toEqual(DST_STATS_SCHEMA);
    expect(table.rows).toEqual([
      {
        season: 2024,
        week: 1,
        team: 'AAA',
        ...zeroCounts,
        games_played: 1,
        fumbles_recovered: 1,
        kr_td: 1,
        points_allowed: 7,
        yards_allowed: 13,
      },
      {
        season: 2024,
        week: 1,
        team: 'BBB',
        ...zeroCounts,
        games_played: 1,
        sacks: 1,
        interceptions: 1,
        int_td: 1,
        blocked_kicks: 1,
        points_allowed: 7,
        yards_allowed: 18,
      },
    ]);
  });

  it('takes points allowed from the opponent final score', () => {
    const table = pointsAllowedTable([
      makeEvent({ totalHomeScore: 3, totalAwayScore: 0 }),
      makeEvent({ totalHomeScore: 10, totalAwayScore: 14 }),
      makeEvent({ gameId: '2024_02_CCC_AAA', week: 2, homeTeam: 'AAA', awayTeam: 'CCC' }),
    ]);

    expect(table.rows).toEqual([
      { season: 2024, week: 1, team: 'BBB', points_allowed: 14, games_played: 1 },
      { season: 2024, week: 1, team: 'AAA', points_allowed: 10, games_played: 1 },
      { season: 2024, week: 2, team: 'AAA', points_allowed: 0, games_played: 1 },
      { season: 2024, week: 2, team: 'CCC', points_allowed: 0, games_played: 1 },
    ]);
  });

  it('counts only scrimmage plays toward yards allowed', () => {
    const table = yardsAllowedTable([
      makeEvent({ playType: 'qb_kneel', defteam: 'AAA', yardsGained: -1 }),
      makeEvent({ playType: 'punt', defteam: 'AAA', yardsGained: 40 }),
      makeEvent({ playType: 'no_play', rush: 1, defteam: 'AAA', yardsGained: 6 }),
    ]);

    expect(table.rows).toEqual([{ season: 2024, week: 1, team: 'AAA', yards_allowed: 5 }]);
  });

  it('gives units seen only in counting plays zero games', () => {
    const table = buildDstTable([
      makeEvent({ gameId: 'g1', homeTeam: null, awayTeam: null, sack: 1, defteam: 'DDD' }),
    ]);

    expect(table.rows).toEqual([{ season: 2024, week: 1, team: 'DDD', ...zeroCounts, sacks: 1 }]);
  });

  it('returns a typed empty table without plays', () => {
    const table = buildDstTable([]);

    expect(table.columns).toEqual(DST_STATS_SCHEMA);
    expect(table.rows).toEqual([]);
  });
});
