/**
 * █ [CONTROLLER] :: MATCH_SERVICE
 * =====================================================================
 * DESC:   Orquesta store + motor + notifier. Cada mutación va dentro de
 *         `store.withMatch` (lock por partido); el broadcast sale solo
 *         después de persistir.
 * STATUS: STABLE
 * =====================================================================
 */
import { randomUUID } from "node:crypto";
import type {
  BallEvent,
  CreateMatchInput,
  DeliveryInput,
  FullScorecard,
  InningsState,
  MatchState,
  MatchSummary,
  StartInningsInput,
  TossInput,
} from "../types/cricket.ts";
import type { InningsView, MatchView } from "../types/matches.ts";
import {
  silentNotifier,
  type MatchNotifier,
  type MatchReader,
  type MatchUpdateReason,
} from "../types/live.ts";
import type { MatchStore } from "../db/match-store.ts";
import { NotFoundError } from "../lib/errors.ts";
import { CricketEngine } from "../utils/cricketScoring.ts";
import { reconcileInnings } from "../utils/inningsAggregate.ts";
import {
  abandonMatch,
  assertDeletable,
  changeBowler,
  createMatch,
  endInnings,
  requireActiveInnings,
  setToss,
  startInnings,
  swapStrike,
} from "../utils/match-status.ts";
import { buildFullScorecard } from "../utils/scorecard.ts";

export interface MatchServiceDeps {
  store: MatchStore;
  notifier?: MatchNotifier;
  newId?: () => string;
  clock?: () => string;
}

export interface RecordBallResult {
  ball: BallEvent;
  overComplete: boolean;
  inningsEnded: boolean;
  resultSummary: string | null;
  match: MatchView;
}

export interface UndoBallResult {
  undone: BallEvent;
  match: MatchView;
}

// =============================================================================
// █ VIEWS
// =============================================================================
// [INFO] -> Las bolas deshechas se quedan en el store (auditoría), no en la API
export function toInningsView(innings: InningsState): InningsView {
  return { ...innings, balls: innings.balls.filter((b) => !b.isUndone) };
}

export function toMatchView(match: MatchState): MatchView {
  return { ...match, innings: match.innings.map(toInningsView) };
}

/**
 * ◼️ RECONCILE_MATCH
 * ---------------------------------------------------------
 * Reconstruye desde el log los contadores de las innings en curso
 * si la caché no cuadra. Devuelve el mismo objeto si todo cuadra.
 */
export function reconcileMatch(match: MatchState): MatchState {
  let drifted = false;
  const innings = match.innings.map((inn) => {
    if (inn.status !== "in_progress") return inn;
    const result = reconcileInnings(inn);
    if (!result.consistent) {
      drifted = true;
      console.warn(
        `[WARN]  :: AGG_DRIFT     :: match: ${match.id} | innings: ${inn.inningsNumber} | rebuilt ${inn.totalRuns}/${inn.totalWickets} -> ${result.innings.totalRuns}/${result.innings.totalWickets}`,
      );
    }
    return result.innings;
  });
  return drifted ? { ...match, innings } : match;
}

// =============================================================================
// █ SERVICE
// =============================================================================
export class MatchService implements MatchReader {
  private readonly store: MatchStore;
  private readonly notifier: MatchNotifier;
  private readonly newId: () => string;
  private readonly clock: () => string;

  constructor(deps: MatchServiceDeps) {
    this.store = deps.store;
    this.notifier = deps.notifier ?? silentNotifier;
    this.newId = deps.newId ?? randomUUID;
    this.clock = deps.clock ?? (() => new Date().toISOString());
  }

  // ==== █ READS (snapshot, sin lock)

  async listMatches(limit: number): Promise<MatchSummary[]> {
    return this.store.list(limit);
  }

  async getMatch(matchId: string): Promise<MatchView> {
    return toMatchView(await this.loadOrThrow(matchId));
  }

  async getScorecard(matchId: string): Promise<FullScorecard> {
    return buildFullScorecard(await this.loadOrThrow(matchId));
  }

  // ==== █ LIFECYCLE

  async createMatch(input: CreateMatchInput): Promise<MatchView> {
    const match = createMatch(input, { id: this.newId(), now: this.clock() });
    await this.store.create(match);

    console.log(
      `[GAME]  ++ MATCH_CREATED :: ${match.id} | ${match.teamAName} vs ${match.teamBName} | ${match.totalOvers} overs`,
    );

    const view = toMatchView(match);
    this.notify(() => this.notifier.matchCreated(view));
    return view;
  }

  async setToss(matchId: string, input: TossInput): Promise<MatchView> {
    const next = await this.mutate(matchId, "toss", (current) =>
      setToss(current, input, this.clock()),
    );
    console.log(
      `[GAME]  :: TOSS          :: ${matchId} | ${next.tossWinner} elected to ${next.tossDecision}`,
    );
    return toMatchView(next);
  }

  async startInnings(
    matchId: string,
    input: StartInningsInput,
  ): Promise<InningsView> {
    const next = await this.mutate(matchId, "innings_started", (current) =>
      startInnings(current, input, { id: this.newId(), now: this.clock() }),
    );
    const innings = requireActiveInnings(next);
    console.log(
      `[GAME]  ++ INNINGS_START :: ${matchId} | #${innings.inningsNumber} ${innings.battingTeam} batting${innings.target ? ` | target ${innings.target}` : ""}`,
    );
    return toInningsView(innings);
  }

  async abandonMatch(matchId: string): Promise<MatchView> {
    const next = await this.mutate(matchId, "abandoned", (current) =>
      abandonMatch(current, this.clock()),
    );
    console.log(`[GAME]  :: ABANDONED     :: ${matchId}`);
    return toMatchView(next);
  }

  async deleteMatch(matchId: string): Promise<void> {
    await this.store.remove(matchId, assertDeletable);
    console.log(`[DB]    -- DELETED       :: id: ${matchId}`);
  }

  // ==== █ SCORING

  async recordBall(matchId: string, input: DeliveryInput): Promise<RecordBallResult> {
    const outcome = await this.store.withMatch(matchId, (current) => {
      const result = CricketEngine.recordDelivery(reconcileMatch(current), input, {
        id: this.newId(),
        now: this.clock(),
      });
      return { next: result.next, result };
    });

    const { ball, next } = outcome;
    const innings = next.innings.find((inn) => inn.id === ball.inningsId);
    console.log(
      `[GAME]  :: BALL          :: ${matchId} | ${ball.overNumber}.${ball.ballNumber} ${ball.batsmanName} ${ball.runsScored}+${ball.extraRuns}${ball.extraType === "none" ? "" : ` ${ball.extraType}`}${ball.isWicket ? " WICKET" : ""} | ${innings?.totalRuns ?? 0}/${innings?.totalWickets ?? 0}`,
    );
    if (outcome.resultSummary) {
      console.log(`[GAME]  ++ RESULT        :: ${matchId} | ${outcome.resultSummary}`);
    }

    const match = toMatchView(next);
    this.notifyUpdate(match, "ball", ball);

    return {
      ball,
      overComplete: outcome.overComplete,
      inningsEnded: outcome.inningsEnded,
      resultSummary: outcome.resultSummary,
      match,
    };
  }

  async undoLastBall(matchId: string): Promise<UndoBallResult> {
    const { next, undone } = await this.store.withMatch(matchId, (current) => {
      const result = CricketEngine.undoLastDelivery(reconcileMatch(current), this.clock());
      return { next: result.next, result };
    });

    console.log(
      `[GAME]  :: UNDO          :: ${matchId} | ball #${undone.sequenceNumber} (${undone.overNumber}.${undone.ballNumber})`,
    );

    const match = toMatchView(next);
    this.notifyUpdate(match, "undo", undone);
    return { undone, match };
  }

  async changeBowler(matchId: string, bowlerName: string): Promise<InningsView> {
    const next = await this.mutate(matchId, "bowler_changed", (current) =>
      changeBowler(current, bowlerName, this.clock()),
    );
    const innings = requireActiveInnings(next);
    console.log(`[GAME]  :: BOWLER        :: ${matchId} | ${innings.currentBowlerName}`);
    return toInningsView(innings);
  }

  async swapStrike(matchId: string): Promise<InningsView> {
    const next = await this.mutate(matchId, "strike_swapped", (current) =>
      swapStrike(current, this.clock()),
    );
    const innings = requireActiveInnings(next);
    console.log(`[GAME]  :: STRIKE        :: ${matchId} | on strike: ${innings.strikerName}`);
    return toInningsView(innings);
  }

  async endInnings(matchId: string): Promise<MatchView> {
    const next = await this.mutate(
      matchId,
      "innings_ended",
      (current) => endInnings(current, this.clock()).next,
    );
    console.log(
      `[GAME]  :: INNINGS_END   :: ${matchId} | status: ${next.status}${next.resultSummary ? ` | ${next.resultSummary}` : ""}`,
    );
    return toMatchView(next);
  }

  // ==== █ INTERNALS

  private async loadOrThrow(matchId: string): Promise<MatchState> {
    const match = await this.store.load(matchId);
    if (!match) throw new NotFoundError("Match not found");
    return reconcileMatch(match);
  }

  /** Paso de estado simple: sin bola asociada. */
  private async mutate(
    matchId: string,
    reason: MatchUpdateReason,
    step: (current: MatchState) => MatchState,
  ): Promise<MatchState> {
    const next = await this.store.withMatch(matchId, (current) => {
      const stepped = step(reconcileMatch(current));
      return { next: stepped, result: stepped };
    });
    this.notifyUpdate(toMatchView(next), reason, null);
    return next;
  }

  private notifyUpdate(
    match: MatchView,
    reason: MatchUpdateReason,
    lastBall: BallEvent | null,
  ): void {
    this.notify(() =>
      this.notifier.matchUpdated({ matchId: match.id, reason, match, lastBall }),
    );
  }

  // [RESILIENCE] -> Un fallo del broadcast no deshace una mutación ya persistida
  private notify(send: () => void): void {
    try {
      send();
    } catch (error) {
      console.error(`[ERR]   :: BCAST_FAIL    ::`, error);
    }
  }
}
