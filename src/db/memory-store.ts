/**
 * █ [CORE] :: MEMORY_STORE
 * =====================================================================
 * DESC:   MatchStore en proceso. Snapshots con structuredClone y una
 *         cadena de promesas por partido como lock exclusivo.
 *         Se usa sin DATABASE_URL y en todos los tests.
 * STATUS: STABLE
 * =====================================================================
 */
import type { MatchState, MatchSummary } from "../types/cricket.ts";
import { NotFoundError } from "../lib/errors.ts";
import { toMatchSummary } from "../utils/scorecard.ts";
import type { MatchMutation, MatchStore } from "./match-store.ts";

export class MemoryMatchStore implements MatchStore {
  private readonly matches = new Map<string, MatchState>();
  private readonly locks = new Map<string, Promise<void>>();

  async list(limit: number): Promise<MatchSummary[]> {
    return [...this.matches.values()]
      .sort((a, b) => b.createdAt.localeCompare(a.createdAt))
      .slice(0, limit)
      .map(toMatchSummary);
  }

  async load(matchId: string): Promise<MatchState | null> {
    const match = this.matches.get(matchId);
    return match ? structuredClone(match) : null;
  }

  async create(match: MatchState): Promise<void> {
    this.matches.set(match.id, structuredClone(match));
  }

  async remove(matchId: string, guard?: (current: MatchState) => void): Promise<void> {
    await this.locked(matchId, () => {
      const stored = this.matches.get(matchId);
      if (!stored) throw new NotFoundError("Match not found");
      guard?.(structuredClone(stored));
      this.matches.delete(matchId);
    });
  }

  async withMatch<T>(
    matchId: string,
    work: (current: MatchState) => MatchMutation<T>,
  ): Promise<T> {
    return this.locked(matchId, () => {
      const stored = this.matches.get(matchId);
      if (!stored) throw new NotFoundError("Match not found");

      const { next, result } = work(structuredClone(stored));
      this.matches.set(matchId, structuredClone(next));
      return result;
    });
  }

  /**
   * ◼️ LOCKED
   * ---------------------------------------------------------
   * Encola `task` detrás del anterior del mismo partido.
   * El eslabón se libera en éxito y en error.
   */
  private async locked<T>(matchId: string, task: () => T): Promise<T> {
    const previous = this.locks.get(matchId) ?? Promise.resolve();

    let release: () => void = () => {};
    const link = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => link);
    this.locks.set(matchId, tail);

    await previous;
    try {
      return task();
    } finally {
      release();
      if (this.locks.get(matchId) === tail) this.locks.delete(matchId);
    }
  }

  async close(): Promise<void> {
    this.matches.clear();
    this.locks.clear();
  }
}
