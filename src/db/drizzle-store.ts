/**
 * █ [CORE] :: DRIZZLE_STORE
 * =====================================================================
 * DESC:   MatchStore sobre Postgres. `withMatch` = una transacción con
 *         SELECT ... FOR UPDATE sobre la fila del partido; solo se
 *         escriben las filas que cambian (diffMatch).
 * STATUS: STABLE
 * =====================================================================
 */
import { asc, desc, eq, inArray } from "drizzle-orm";
import type {
  BallEvent,
  InningsNumber,
  InningsState,
  MatchState,
  MatchSummary,
} from "../types/cricket.ts";
import type {
  BallEventRow,
  InningsRow,
  MatchRow,
  NewBallEventRow,
  NewInningsRow,
} from "../types/matches.ts";
import { NotFoundError } from "../lib/errors.ts";
import type { Database, DbHandle } from "./db.ts";
import { ballEvents, innings, matches } from "./schema.ts";
import { diffMatch, type MatchMutation, type MatchStore } from "./match-store.ts";

type Tx = Parameters<Parameters<Database["transaction"]>[0]>[0];

// =============================================================================
// █ ROW MAPPERS
// =============================================================================
function toInningsNumber(value: number): InningsNumber {
  if (value === 1 || value === 2) return value;
  throw new Error(`Corrupt innings_number: ${value}`);
}

function ballFromRow(row: BallEventRow): BallEvent {
  return { ...row, createdAt: row.createdAt.toISOString() };
}

function ballToRow(ball: BallEvent): NewBallEventRow {
  return { ...ball, createdAt: new Date(ball.createdAt) };
}

function inningsFromRow(row: InningsRow, balls: BallEvent[]): InningsState {
  return {
    id: row.id,
    matchId: row.matchId,
    inningsNumber: toInningsNumber(row.inningsNumber),
    battingTeam: row.battingTeam,
    bowlingTeam: row.bowlingTeam,
    totalRuns: row.totalRuns,
    totalWickets: row.totalWickets,
    currentOver: row.currentOver,
    currentBall: row.currentBall,
    extras: {
      wides: row.extrasWides,
      noBalls: row.extrasNoBalls,
      byes: row.extrasByes,
      legByes: row.extrasLegByes,
      penalties: row.extrasPenalties,
    },
    target: row.target,
    status: row.status,
    strikerName: row.strikerName,
    nonStrikerName: row.nonStrikerName,
    currentBowlerName: row.currentBowlerName,
    balls,
    createdAt: row.createdAt.toISOString(),
  };
}

type InningsCounters = Omit<NewInningsRow, "id" | "matchId" | "createdAt">;

function inningsCounters(inn: InningsState): InningsCounters {
  return {
    inningsNumber: inn.inningsNumber,
    battingTeam: inn.battingTeam,
    bowlingTeam: inn.bowlingTeam,
    totalRuns: inn.totalRuns,
    totalWickets: inn.totalWickets,
    currentOver: inn.currentOver,
    currentBall: inn.currentBall,
    extrasWides: inn.extras.wides,
    extrasNoBalls: inn.extras.noBalls,
    extrasByes: inn.extras.byes,
    extrasLegByes: inn.extras.legByes,
    extrasPenalties: inn.extras.penalties,
    target: inn.target,
    status: inn.status,
    strikerName: inn.strikerName,
    nonStrikerName: inn.nonStrikerName,
    currentBowlerName: inn.currentBowlerName,
  };
}

function inningsToRow(inn: InningsState): NewInningsRow {
  return {
    id: inn.id,
    matchId: inn.matchId,
    createdAt: new Date(inn.createdAt),
    ...inningsCounters(inn),
  };
}

function summaryFromRow(row: MatchRow): MatchSummary {
  return {
    id: row.id,
    teamAName: row.teamAName,
    teamBName: row.teamBName,
    totalOvers: row.totalOvers,
    venue: row.venue,
    status: row.status,
    resultSummary: row.resultSummary,
    createdAt: row.createdAt.toISOString(),
  };
}

// =============================================================================
// █ STORE
// =============================================================================
export class DrizzleMatchStore implements MatchStore {
  constructor(private readonly handle: DbHandle) {}

  private get db(): Database {
    return this.handle.db;
  }

  async list(limit: number): Promise<MatchSummary[]> {
    const rows = await this.db
      .select()
      .from(matches)
      .orderBy(desc(matches.createdAt))
      .limit(limit);
    return rows.map(summaryFromRow);
  }

  async load(matchId: string): Promise<MatchState | null> {
    return this.db.transaction(async (tx) => {
      const [row] = await tx.select().from(matches).where(eq(matches.id, matchId));
      return row ? this.hydrate(tx, row) : null;
    });
  }

  async create(match: MatchState): Promise<void> {
    await this.db.transaction(async (tx) => {
      await tx.insert(matches).values({
        id: match.id,
        teamAName: match.teamAName,
        teamBName: match.teamBName,
        totalOvers: match.totalOvers,
        venue: match.venue,
        tossWinner: match.tossWinner,
        tossDecision: match.tossDecision,
        status: match.status,
        resultSummary: match.resultSummary,
        createdAt: new Date(match.createdAt),
        updatedAt: new Date(match.updatedAt),
      });
      const empty: MatchState = { ...match, innings: [] };
      await this.persist(tx, empty, match);
    });
  }

  async remove(matchId: string, guard?: (current: MatchState) => void): Promise<void> {
    await this.db.transaction(async (tx) => {
      const [row] = await tx
        .select()
        .from(matches)
        .where(eq(matches.id, matchId))
        .for("update");
      if (!row) throw new NotFoundError("Match not found");

      if (guard) guard(await this.hydrate(tx, row));
      // [INFO] -> innings y ball_events caen por ON DELETE CASCADE
      await tx.delete(matches).where(eq(matches.id, matchId));
    });
  }

  async withMatch<T>(
    matchId: string,
    work: (current: MatchState) => MatchMutation<T>,
  ): Promise<T> {
    return this.db.transaction(async (tx) => {
      const [row] = await tx
        .select()
        .from(matches)
        .where(eq(matches.id, matchId))
        .for("update");
      if (!row) throw new NotFoundError("Match not found");

      const current = await this.hydrate(tx, row);
      const { next, result } = work(structuredClone(current));
      await this.persist(tx, current, next);
      return result;
    });
  }

  async close(): Promise<void> {
    await this.handle.pool.end();
  }

  // ==== █ INTERNALS

  private async hydrate(tx: Tx, row: MatchRow): Promise<MatchState> {
    const inningsRows = await tx
      .select()
      .from(innings)
      .where(eq(innings.matchId, row.id))
      .orderBy(asc(innings.inningsNumber));

    const ballRows = inningsRows.length
      ? await tx
          .select()
          .from(ballEvents)
          .where(
            inArray(
              ballEvents.inningsId,
              inningsRows.map((inn) => inn.id),
            ),
          )
          .orderBy(asc(ballEvents.logIndex))
      : [];

    return {
      id: row.id,
      teamAName: row.teamAName,
      teamBName: row.teamBName,
      totalOvers: row.totalOvers,
      venue: row.venue,
      tossWinner: row.tossWinner,
      tossDecision: row.tossDecision,
      status: row.status,
      resultSummary: row.resultSummary,
      innings: inningsRows.map((inn) =>
        inningsFromRow(
          inn,
          ballRows.filter((b) => b.inningsId === inn.id).map(ballFromRow),
        ),
      ),
      createdAt: row.createdAt.toISOString(),
      updatedAt: row.updatedAt.toISOString(),
    };
  }

  private async persist(
    tx: Tx,
    current: MatchState,
    next: MatchState,
  ): Promise<void> {
    await tx
      .update(matches)
      .set({
        tossWinner: next.tossWinner,
        tossDecision: next.tossDecision,
        status: next.status,
        resultSummary: next.resultSummary,
        updatedAt: new Date(next.updatedAt),
      })
      .where(eq(matches.id, next.id));

    const changes = diffMatch(current, next);

    for (const inn of changes.innings) {
      await tx
        .insert(innings)
        .values(inningsToRow(inn))
        .onConflictDoUpdate({ target: innings.id, set: inningsCounters(inn) });
    }

    if (changes.appended.length) {
      await tx.insert(ballEvents).values(changes.appended.map(ballToRow));
    }

    for (const ball of changes.undone) {
      await tx
        .update(ballEvents)
        .set({ isUndone: ball.isUndone })
        .where(eq(ballEvents.id, ball.id));
    }

    if (changes.appended.length || changes.undone.length) {
      console.log(
        `[DB]    :: BALLS_SYNCED  :: ${next.id} | +${changes.appended.length} / undone ${changes.undone.length}`,
      );
    }
  }
}
