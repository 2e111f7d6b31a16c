/**
 * █ [UTILS] :: MATCH_LIFECYCLE
 * =====================================================================
 * DESC:   Máquina de estados gruesa del partido:
 *         toss -> in_progress -> innings_break -> completed | abandoned.
 *         Decide cuándo se crean/cierran innings. Funciones puras:
 *         reciben el estado actual y devuelven uno nuevo.
 * STATUS: STABLE
 * =====================================================================
 */
import type {
  CreateMatchInput,
  InningsState,
  MatchState,
  MatchStatus,
  OperationMeta,
  StartInningsInput,
  TossInput,
} from "../types/cricket.ts";
import {
  IllegalStateTransitionError,
  InvalidInputError,
} from "../lib/errors.ts";
import { createInnings } from "./inningsAggregate.ts";
import { calculateResult } from "./match-result.ts";

const TERMINAL_STATUSES: ReadonlySet<MatchStatus> = new Set([
  "completed",
  "abandoned",
]);

export const ABANDONED_RESULT = "Match Abandoned";

export function isTerminal(status: MatchStatus): boolean {
  return TERMINAL_STATUSES.has(status);
}

function isMatchTeam(match: MatchState, team: string): boolean {
  return team === match.teamAName || team === match.teamBName;
}

// =============================================================================
// █ CREATION & TOSS
// =============================================================================
export function createMatch(
  input: CreateMatchInput,
  meta: OperationMeta,
): MatchState {
  const teamAName = input.teamAName.trim();
  const teamBName = input.teamBName.trim();

  if (teamAName === teamBName) {
    throw new InvalidInputError("Team names must be different.");
  }

  const venue = input.venue?.trim();

  return {
    id: meta.id,
    teamAName,
    teamBName,
    totalOvers: input.totalOvers,
    venue: venue ? venue : null,
    tossWinner: null,
    tossDecision: null,
    status: "toss",
    resultSummary: null,
    innings: [],
    createdAt: meta.now,
    updatedAt: meta.now,
  };
}

export function setToss(
  current: MatchState,
  input: TossInput,
  now: string,
): MatchState {
  if (current.status !== "toss") {
    throw new IllegalStateTransitionError(
      "Toss can only be set when match is in TOSS state.",
    );
  }

  const tossWinner = input.tossWinner.trim();
  if (!isMatchTeam(current, tossWinner)) {
    throw new InvalidInputError("Toss winner must be one of the two teams.");
  }

  return {
    ...current,
    tossWinner,
    tossDecision: input.tossDecision,
    status: "in_progress",
    updatedAt: now,
  };
}

// =============================================================================
// █ INNINGS GATES
// =============================================================================
export function findActiveInnings(match: MatchState): InningsState | null {
  return match.innings.find((inn) => inn.status === "in_progress") ?? null;
}

export function requireActiveInnings(match: MatchState): InningsState {
  const innings = findActiveInnings(match);
  if (!innings) {
    throw new IllegalStateTransitionError("No active innings found.");
  }
  return innings;
}

/**
 * ◼️ START_INNINGS
 * ---------------------------------------------------------
 * Innings 1 tras el toss; innings 2 solo con la primera cerrada.
 * El target de la segunda = runs de la primera + 1.
 */
export function startInnings(
  current: MatchState,
  input: StartInningsInput,
  meta: OperationMeta,
): MatchState {
  if (current.status !== "in_progress" && current.status !== "innings_break") {
    throw new IllegalStateTransitionError(
      "Cannot start innings in current match state.",
    );
  }
  if (current.innings.length >= 2) {
    throw new IllegalStateTransitionError("Both innings already exist.");
  }
  if (findActiveInnings(current)) {
    throw new IllegalStateTransitionError("An innings is already in progress.");
  }

  const battingTeam = input.battingTeam.trim();
  const bowlingTeam = input.bowlingTeam.trim();
  const strikerName = input.strikerName.trim();
  const nonStrikerName = input.nonStrikerName.trim();

  if (!isMatchTeam(current, battingTeam)) {
    throw new InvalidInputError("Batting team must be one of the match teams.");
  }
  if (!isMatchTeam(current, bowlingTeam)) {
    throw new InvalidInputError("Bowling team must be one of the match teams.");
  }
  if (battingTeam === bowlingTeam) {
    throw new InvalidInputError(
      "Batting and bowling teams cannot be the same.",
    );
  }
  if (strikerName === nonStrikerName) {
    throw new InvalidInputError("Striker and non-striker must be different.");
  }

  const first = current.innings[0];
  if (first && first.battingTeam === battingTeam) {
    throw new InvalidInputError(
      `${battingTeam} has already batted in this match.`,
    );
  }

  const inningsNumber = first ? 2 : 1;
  const innings = createInnings({
    id: meta.id,
    matchId: current.id,
    inningsNumber,
    battingTeam,
    bowlingTeam,
    strikerName,
    nonStrikerName,
    bowlerName: input.bowlerName.trim(),
    target: first ? first.totalRuns + 1 : null,
    createdAt: meta.now,
  });

  return {
    ...current,
    status: "in_progress",
    innings: [...current.innings, innings],
    updatedAt: meta.now,
  };
}

/**
 * Marks `innings` completed and moves the match on. Mutates both.
 * Returns the result text when the match just finished.
 */
export function closeInnings(
  match: MatchState,
  innings: InningsState,
): string | null {
  innings.status = "completed";

  if (innings.inningsNumber === 1) {
    match.status = "innings_break";
    return null;
  }

  const result = calculateResult(match, innings);
  match.status = "completed";
  match.resultSummary = result;
  return result;
}

// =============================================================================
// █ SCORER ACTIONS
// =============================================================================
export function changeBowler(
  current: MatchState,
  bowlerName: string,
  now: string,
): MatchState {
  const next = structuredClone(current);
  const innings = requireActiveInnings(next);

  if (innings.currentBall !== 0) {
    throw new IllegalStateTransitionError(
      "Bowler can only be changed at the start of an over.",
    );
  }

  innings.currentBowlerName = bowlerName.trim();
  next.updatedAt = now;
  return next;
}

export function swapStrike(current: MatchState, now: string): MatchState {
  const next = structuredClone(current);
  const innings = requireActiveInnings(next);

  const striker = innings.strikerName;
  innings.strikerName = innings.nonStrikerName;
  innings.nonStrikerName = striker;
  next.updatedAt = now;
  return next;
}

export function endInnings(
  current: MatchState,
  now: string,
): { next: MatchState; resultSummary: string | null } {
  const next = structuredClone(current);
  const innings = requireActiveInnings(next);
  const resultSummary = closeInnings(next, innings);
  next.updatedAt = now;
  return { next, resultSummary };
}

export function abandonMatch(current: MatchState, now: string): MatchState {
  if (current.status === "completed") {
    throw new IllegalStateTransitionError("Cannot abandon a completed match.");
  }
  if (current.status === "abandoned") {
    throw new IllegalStateTransitionError("Match is already abandoned.");
  }

  const next = structuredClone(current);
  next.status = "abandoned";
  next.resultSummary = ABANDONED_RESULT;
  for (const inn of next.innings) {
    if (inn.status === "in_progress") inn.status = "completed";
  }
  next.updatedAt = now;
  return next;
}

export function assertDeletable(match: MatchState): void {
  if (!isTerminal(match.status)) {
    throw new IllegalStateTransitionError(
      "Only completed or abandoned matches can be deleted.",
    );
  }
}
