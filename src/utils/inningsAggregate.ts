/**
 * █ [UTILS] :: INNINGS_AGGREGATE
 * =====================================================================
 * DESC:   Proyección cacheada del log de una innings (runs, wickets,
 *         puntero over/ball, extras). Update/rollback incremental para
 *         el motor y replay completo para reconciliar.
 * STATUS: STABLE
 * =====================================================================
 */
import type {
  BallEvent,
  ExtraType,
  ExtrasTally,
  InningsNumber,
  InningsState,
} from "../types/cricket.ts";
import { activeBalls } from "./ballLog.ts";

export const BALLS_PER_OVER = 6;
export const MAX_WICKETS = 10;

const EXTRAS_BUCKET: Record<ExtraType, keyof ExtrasTally | null> = {
  none: null,
  wide: "wides",
  no_ball: "noBalls",
  bye: "byes",
  leg_bye: "legByes",
  penalty: "penalties",
};

export function emptyExtras(): ExtrasTally {
  return { wides: 0, noBalls: 0, byes: 0, legByes: 0, penalties: 0 };
}

export function extrasTotal(extras: ExtrasTally): number {
  return (
    extras.wides + extras.noBalls + extras.byes + extras.legByes + extras.penalties
  );
}

export function isLegalExtra(extraType: ExtraType): boolean {
  return extraType !== "wide" && extraType !== "no_ball";
}

/** "12.3", or just "20" on an over boundary. */
export function formatOvers(over: number, ball: number): string {
  return ball ? `${over}.${ball}` : String(over);
}

export function formatBallCount(balls: number): string {
  return formatOvers(Math.floor(balls / BALLS_PER_OVER), balls % BALLS_PER_OVER);
}

export function createInnings(params: {
  id: string;
  matchId: string;
  inningsNumber: InningsNumber;
  battingTeam: string;
  bowlingTeam: string;
  strikerName: string;
  nonStrikerName: string;
  bowlerName: string;
  target: number | null;
  createdAt: string;
}): InningsState {
  return {
    id: params.id,
    matchId: params.matchId,
    inningsNumber: params.inningsNumber,
    battingTeam: params.battingTeam,
    bowlingTeam: params.bowlingTeam,
    totalRuns: 0,
    totalWickets: 0,
    currentOver: 0,
    currentBall: 0,
    extras: emptyExtras(),
    target: params.target,
    status: "in_progress",
    strikerName: params.strikerName,
    nonStrikerName: params.nonStrikerName,
    currentBowlerName: params.bowlerName,
    balls: [],
    createdAt: params.createdAt,
  };
}

// =============================================================================
// █ INCREMENTAL UPDATE / ROLLBACK
// =============================================================================

/**
 * Adds (direction 1) or removes (direction -1) one ball's runs, extras and
 * wicket from the aggregate. Pointer and names are handled separately.
 */
export function creditBall(
  innings: InningsState,
  ball: Pick<BallEvent, "runsScored" | "extraRuns" | "extraType" | "isWicket">,
  direction: 1 | -1,
): void {
  innings.totalRuns += direction * (ball.runsScored + ball.extraRuns);

  const bucket = EXTRAS_BUCKET[ball.extraType];
  if (bucket) innings.extras[bucket] += direction * ball.extraRuns;

  if (ball.isWicket) innings.totalWickets += direction;
}

/** Moves the pointer one legal ball forward. Returns true when an over closed. */
export function advancePointer(innings: InningsState): boolean {
  innings.currentBall += 1;
  if (innings.currentBall < BALLS_PER_OVER) return false;
  innings.currentBall = 0;
  innings.currentOver += 1;
  return true;
}

export function rewindPointer(innings: InningsState): void {
  if (innings.currentBall === 0 && innings.currentOver > 0) {
    innings.currentOver -= 1;
    innings.currentBall = BALLS_PER_OVER - 1;
    return;
  }
  innings.currentBall = Math.max(0, innings.currentBall - 1);
}

// =============================================================================
// █ REPLAY (SOURCE OF TRUTH)
// =============================================================================
export interface AggregateCounters {
  totalRuns: number;
  totalWickets: number;
  currentOver: number;
  currentBall: number;
  extras: ExtrasTally;
}

export function countersOf(innings: InningsState): AggregateCounters {
  return {
    totalRuns: innings.totalRuns,
    totalWickets: innings.totalWickets,
    currentOver: innings.currentOver,
    currentBall: innings.currentBall,
    extras: { ...innings.extras },
  };
}

/**
 * ◼️ REPLAY
 * ---------------------------------------------------------
 * Recalcula los contadores desde las bolas activas. Los nombres
 * (striker, bowler) son punteros del anotador y no se derivan.
 */
export function replayInnings(innings: InningsState): AggregateCounters {
  const counters: AggregateCounters = {
    totalRuns: 0,
    totalWickets: 0,
    currentOver: 0,
    currentBall: 0,
    extras: emptyExtras(),
  };

  let legalBalls = 0;
  for (const ball of activeBalls(innings.balls)) {
    counters.totalRuns += ball.runsScored + ball.extraRuns;
    const bucket = EXTRAS_BUCKET[ball.extraType];
    if (bucket) counters.extras[bucket] += ball.extraRuns;
    if (ball.isWicket) counters.totalWickets += 1;
    if (ball.isLegalDelivery) legalBalls += 1;
  }

  counters.currentOver = Math.floor(legalBalls / BALLS_PER_OVER);
  counters.currentBall = legalBalls % BALLS_PER_OVER;
  return counters;
}

export function sameCounters(a: AggregateCounters, b: AggregateCounters): boolean {
  return (
    a.totalRuns === b.totalRuns &&
    a.totalWickets === b.totalWickets &&
    a.currentOver === b.currentOver &&
    a.currentBall === b.currentBall &&
    a.extras.wides === b.extras.wides &&
    a.extras.noBalls === b.extras.noBalls &&
    a.extras.byes === b.extras.byes &&
    a.extras.legByes === b.extras.legByes &&
    a.extras.penalties === b.extras.penalties
  );
}

export interface ReconcileResult {
  consistent: boolean;
  innings: InningsState;
}

/** Returns the innings untouched when the cache matches the log, else a rebuilt copy. */
export function reconcileInnings(innings: InningsState): ReconcileResult {
  const replayed = replayInnings(innings);
  if (sameCounters(countersOf(innings), replayed)) {
    return { consistent: true, innings };
  }
  return { consistent: false, innings: { ...innings, ...replayed } };
}
