/**
 * █ [UTILS] :: CRICKET_SCORING_ENGINE
 * =====================================================================
 * DESC:   Pure Logic for Cricket Scoring.
 *         Inputs: Current Match + Delivery -> Output: Next Match + Ball.
 *         Nunca muta el estado recibido: trabaja sobre un structuredClone,
 *         así una validación fallida no deja nada a medias.
 * STATUS: GOLD MASTER
 * =====================================================================
 */
import type {
  DeliveryInput,
  DeliveryOutcome,
  InningsState,
  MatchState,
  OperationMeta,
  UndoOutcome,
} from "../types/cricket.ts";
import { InvalidDeliveryError } from "../lib/errors.ts";
import { appendBall, softDeleteLast } from "./ballLog.ts";
import {
  MAX_WICKETS,
  advancePointer,
  creditBall,
  isLegalExtra,
  rewindPointer,
} from "./inningsAggregate.ts";
import { closeInnings, requireActiveInnings } from "./match-status.ts";

const MAX_RUNS_PER_BALL = 7;

type OutEnd = "striker" | "non_striker";
type Rotation = "held" | "rotated";
type Seat = "striker" | "nonStriker";

export class CricketEngine {
  /**
   * Dónde se sienta el bateador nuevo según quién cayó y si la strike
   * rotó en esta bola (incluida la inversión de fin de over).
   */
  private static readonly REPLACEMENT_SEAT: Record<
    OutEnd,
    Record<Rotation, Seat>
  > = {
    striker: { held: "striker", rotated: "nonStriker" },
    non_striker: { held: "nonStriker", rotated: "striker" },
  };

  // ==== █ VALIDATION

  public static validateDelivery(input: DeliveryInput): void {
    for (const [field, value] of [
      ["runsScored", input.runsScored],
      ["extraRuns", input.extraRuns],
    ] as const) {
      if (!Number.isInteger(value) || value < 0 || value > MAX_RUNS_PER_BALL) {
        throw new InvalidDeliveryError(
          `${field} must be an integer between 0 and ${MAX_RUNS_PER_BALL}.`,
        );
      }
    }

    if (input.isWicket) {
      if (!input.dismissalType) {
        throw new InvalidDeliveryError(
          "Dismissal type required when isWicket is true.",
        );
      }
      if (!input.dismissedBatsman?.trim()) {
        throw new InvalidDeliveryError(
          "Dismissed batsman required when isWicket is true.",
        );
      }
    }

    if (input.isBoundaryFour && input.isBoundarySix) {
      throw new InvalidDeliveryError("Cannot be both four and six.");
    }

    if (input.extraType === "none" && input.extraRuns !== 0) {
      throw new InvalidDeliveryError(
        "Extra runs must be 0 when there is no extra.",
      );
    }
  }

  /**
   * ◼️ RECORD_DELIVERY
   * ---------------------------------------------------------
   * 1. Validar  2. Log  3. Agregado  4. Strike/pointer
   * 5. Bateador nuevo  6. Fin de innings / partido
   */
  public static recordDelivery(
    current: MatchState,
    input: DeliveryInput,
    meta: OperationMeta,
  ): DeliveryOutcome {
    this.validateDelivery(input);

    // 1. Deep Copy (Immutable)
    const next = structuredClone(current);
    const innings = requireActiveInnings(next);

    const isLegal = isLegalExtra(input.extraType);

    // 2. Append con los nombres ANTES de la bola
    const ball = appendBall(innings.balls, {
      id: meta.id,
      inningsId: innings.id,
      overNumber: innings.currentOver,
      ballNumber: innings.currentBall,
      bowlerName: innings.currentBowlerName,
      batsmanName: innings.strikerName,
      nonStrikerName: innings.nonStrikerName,
      runsScored: input.runsScored,
      isBoundaryFour: input.isBoundaryFour,
      isBoundarySix: input.isBoundarySix,
      extraType: input.extraType,
      extraRuns: input.extraRuns,
      isWicket: input.isWicket,
      dismissalType: input.isWicket ? input.dismissalType ?? null : null,
      dismissedBatsman: input.isWicket
        ? input.dismissedBatsman?.trim() ?? null
        : null,
      fielderName: input.isWicket ? input.fielderName?.trim() || null : null,
      isLegalDelivery: isLegal,
      createdAt: meta.now,
    });

    // 3. Runs / extras / wickets
    creditBall(innings, ball, 1);

    // 4. Strike rotation. [INFO] -> Un wide nunca rota por sí solo.
    let rotate =
      input.extraType !== "wide" && input.runsScored % 2 === 1;

    let overComplete = false;
    if (isLegal) {
      overComplete = advancePointer(innings);
      if (overComplete) rotate = !rotate;
    }

    if (rotate) this.swapEnds(innings);

    // 5. Bateador nuevo
    const newBatsman = input.newBatsmanName?.trim();
    if (ball.isWicket && newBatsman) {
      const outEnd: OutEnd =
        ball.dismissedBatsman === ball.batsmanName ? "striker" : "non_striker";
      const seat = this.REPLACEMENT_SEAT[outEnd][rotate ? "rotated" : "held"];
      if (seat === "striker") innings.strikerName = newBatsman;
      else innings.nonStrikerName = newBatsman;
    }

    // 6. Completion
    let inningsEnded = false;
    let resultSummary: string | null = null;
    if (this.isInningsComplete(next, innings)) {
      inningsEnded = true;
      resultSummary = closeInnings(next, innings);
    }

    next.updatedAt = meta.now;

    return { next, ball, overComplete, inningsEnded, resultSummary };
  }

  /**
   * ◼️ UNDO_LAST_DELIVERY
   * ---------------------------------------------------------
   * Inversa exacta de RECORD sobre la última bola activa.
   * Solo con innings en curso: nunca reabre una innings cerrada.
   */
  public static undoLastDelivery(current: MatchState, now: string): UndoOutcome {
    const next = structuredClone(current);
    const innings = requireActiveInnings(next);

    const undone = softDeleteLast(innings.balls);

    creditBall(innings, undone, -1);
    if (undone.isLegalDelivery) rewindPointer(innings);

    innings.strikerName = undone.batsmanName;
    innings.nonStrikerName = undone.nonStrikerName;
    innings.currentBowlerName = undone.bowlerName;

    next.updatedAt = now;
    return { next, undone };
  }

  // ==== █ HELPERS

  private static swapEnds(innings: InningsState): void {
    const striker = innings.strikerName;
    innings.strikerName = innings.nonStrikerName;
    innings.nonStrikerName = striker;
  }

  private static isInningsComplete(
    match: MatchState,
    innings: InningsState,
  ): boolean {
    if (innings.totalWickets >= MAX_WICKETS) return true;

    if (innings.currentOver >= match.totalOvers && innings.currentBall === 0) {
      return true;
    }

    return (
      innings.inningsNumber === 2 &&
      innings.target !== null &&
      innings.totalRuns >= innings.target
    );
  }
}
