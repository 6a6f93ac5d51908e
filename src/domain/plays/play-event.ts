/**
 * Play-by-play event.
 *
 * One record per play, keyed by game. Flags are 0/1 counts as the provider
 * publishes them; anything the provider leaves blank is null.
 * Domain does not import from integrations; providers map into this shape.
 */
export interface PlayEvent {
  season: number;
  week: number;
  gameId: string;
  homeTeam: string | null;
  awayTeam: string | null;
  posteam: string | null;
  defteam: string | null;
  playType: string | null;

  // Play flags
  pass: number | null;
  rush: number | null;
  rushAttempt: number | null;
  sack: number | null;
  interception: number | null;
  safety: number | null;
  fumble: number | null;
  fumbleLost: number | null;
  puntBlocked: number | null;
  kickoffAttempt: number | null;
  puntAttempt: number | null;
  touchdown: number | null;
  passTouchdown: number | null;
  rushTouchdown: number | null;
  returnTouchdown: number | null;
  defensiveTwoPointConv: number | null;
  defensiveExtraPointConv: number | null;

  // Results
  fieldGoalResult: string | null;
  extraPointResult: string | null;
  fumbleRecovery1Team: string | null;
  fumbleRecovery2Team: string | null;
  tdTeam: string | null;
  returnTeam: string | null;

  yardsGained: number | null;

  // Participants
  passerId: string | null;
  rusherId: string | null;
  receiverId: string | null;

  // Running score after the play
  totalHomeScore: number | null;
  totalAwayScore: number | null;
}

/** True when a 0/1 flag is set */
export function flag(value: number | null): boolean {
  return value === 1;
}
