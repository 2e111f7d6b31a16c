/**
 * █ [UTILS] :: BALL_LOG
 * =====================================================================
 * DESC:   Event log append-only de una innings. Solo ordena y hace
 *         soft delete; no sabe nada de runs ni de strike.
 * STATUS: STABLE
 * =====================================================================
 */
import type { BallDraft, BallEvent } from "../types/cricket.ts";
import { NothingToUndoError } from "../lib/errors.ts";

export function countActive(log: readonly BallEvent[]): number {
  let count = 0;
  for (const ball of log) {
    if (!ball.isUndone) count++;
  }
  return count;
}

/**
 * ◼️ APPEND
 * ---------------------------------------------------------
 * sequenceNumber = bolas activas + 1. logIndex = posición en el log
 * completo (incluidas las deshechas), por eso nunca se repite.
 */
export function appendBall(log: BallEvent[], draft: BallDraft): BallEvent {
  const ball: BallEvent = {
    ...draft,
    sequenceNumber: countActive(log) + 1,
    logIndex: log.length,
    isUndone: false,
  };
  log.push(ball);
  return ball;
}

/**
 * Active balls in recording order. Each call to `[Symbol.iterator]`
 * starts a fresh pass over the log.
 */
export function activeBalls(log: readonly BallEvent[]): Iterable<BallEvent> {
  return {
    *[Symbol.iterator]() {
      for (const ball of log) {
        if (!ball.isUndone) yield ball;
      }
    },
  };
}

export function lastActiveBall(log: readonly BallEvent[]): BallEvent | null {
  for (let i = log.length - 1; i >= 0; i--) {
    const ball = log[i];
    if (ball && !ball.isUndone) return ball;
  }
  return null;
}

/**
 * ◼️ SOFT_DELETE
 * ---------------------------------------------------------
 * Marca como deshecha la última bola activa. Nunca la borra.
 */
export function softDeleteLast(log: BallEvent[]): BallEvent {
  const last = lastActiveBall(log);
  if (!last) throw new NothingToUndoError();
  last.isUndone = true;
  return last;
}
