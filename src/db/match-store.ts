/**
 * █ [CORE] :: MATCH_STORE
 * =====================================================================
 * DESC:   Contrato de persistencia del servicio. Dos implementaciones:
 *         Drizzle/Postgres (producción) y memoria (dev + tests).
 *         `withMatch` es el lock exclusivo por partido.
 * STATUS: STABLE
 * =====================================================================
 */
import type {
  BallEvent,
  InningsState,
  MatchState,
  MatchSummary,
} from "../types/cricket.ts";

export interface MatchMutation<T> {
  next: MatchState;
  result: T;
}

export interface MatchStore {
  /** Newest first. */
  list(limit: number): Promise<MatchSummary[]>;
  /** Snapshot read, no lock. `null` when the id is unknown. */
  load(matchId: string): Promise<MatchState | null>;
  create(match: MatchState): Promise<void>;
  /**
   * Deletes the match and its innings and balls. With `guard`, the check
   * runs on the locked state and a throw cancels the delete.
   * Fails with NOT_FOUND when the id is unknown.
   */
  remove(matchId: string, guard?: (current: MatchState) => void): Promise<void>;
  /**
   * Runs `work` holding the match exclusively: load, mutate, persist.
   * A throw from `work` leaves the stored match untouched.
   * Fails with NOT_FOUND when the id is unknown.
   */
  withMatch<T>(
    matchId: string,
    work: (current: MatchState) => MatchMutation<T>,
  ): Promise<T>;
  close(): Promise<void>;
}

// =============================================================================
// █ CHANGESET
// =============================================================================
export interface MatchChangeset {
  /** Innings rows to insert or overwrite (counters and pointers). */
  innings: InningsState[];
  /** Balls not yet stored. */
  appended: BallEvent[];
  /** Stored balls whose `isUndone` flipped. */
  undone: BallEvent[];
}

/**
 * ◼️ DIFF_MATCH
 * ---------------------------------------------------------
 * Qué filas tocar para pasar de `current` a `next`. Las bolas solo
 * crecen por el final del log o cambian `isUndone`.
 */
export function diffMatch(current: MatchState, next: MatchState): MatchChangeset {
  const changeset: MatchChangeset = { innings: [], appended: [], undone: [] };

  for (const inn of next.innings) {
    const before = current.innings.find((candidate) => candidate.id === inn.id);
    const storedBalls = new Map(
      (before?.balls ?? []).map((b): [string, BallEvent] => [b.id, b]),
    );

    let dirty = !before;
    for (const ball of inn.balls) {
      const stored = storedBalls.get(ball.id);
      if (!stored) {
        changeset.appended.push(ball);
        dirty = true;
      } else if (stored.isUndone !== ball.isUndone) {
        changeset.undone.push(ball);
        dirty = true;
      }
    }

    if (dirty || (before && !sameInningsHeader(before, inn))) {
      changeset.innings.push(inn);
    }
  }

  return changeset;
}

function sameInningsHeader(a: InningsState, b: InningsState): boolean {
  return (
    a.status === b.status &&
    a.totalRuns === b.totalRuns &&
    a.totalWickets === b.totalWickets &&
    a.currentOver === b.currentOver &&
    a.currentBall === b.currentBall &&
    a.target === b.target &&
    a.strikerName === b.strikerName &&
    a.nonStrikerName === b.nonStrikerName &&
    a.currentBowlerName === b.currentBowlerName &&
    a.extras.wides === b.extras.wides &&
    a.extras.noBalls === b.extras.noBalls &&
    a.extras.byes === b.extras.byes &&
    a.extras.legByes === b.extras.legByes &&
    a.extras.penalties === b.extras.penalties
  );
}
