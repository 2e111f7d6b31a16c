/**
 * █ [TEST] :: MATCH_STORE_VERIFICATION
 * =====================================================================
 * DESC:   Memory store (lock por partido, snapshots aislados) y el
 *         changeset que usa el store de Postgres.
 * =====================================================================
 */
import { describe, it, expect } from "vitest";
import { MemoryMatchStore } from "../src/db/memory-store.ts";
import { diffMatch } from "../src/db/match-store.ts";
import { IllegalStateTransitionError, NotFoundError } from "../src/lib/errors.ts";
import { CricketEngine } from "../src/utils/cricketScoring.ts";
import {
  abandonMatch,
  assertDeletable,
  createMatch,
  endInnings,
  swapStrike,
} from "../src/utils/match-status.ts";
import {
  NOW,
  bowl,
  chasingMatch,
  current,
  dot,
  four,
  liveMatch,
  meta,
  repeat,
  runs,
  tossedMatch,
} from "./helpers/data-factory.ts";

describe("Match Store Verification", () => {
  // ==== █ CHANGESET
  describe("diffMatch", () => {
    it("should report a new innings as a row to write", () => {
      const live = liveMatch();
      const changes = diffMatch(tossedMatch(), live);

      expect(changes.innings.map((inn) => inn.id)).toEqual(["innings-1"]);
      expect(changes.appended).toEqual([]);
      expect(changes.undone).toEqual([]);
    });

    it("should list only appended balls and the touched innings", () => {
      const before = bowl(liveMatch(), [runs(1)]);
      const after = bowl(before, [four(), dot()]);
      const changes = diffMatch(before, after);

      expect(changes.appended.map((b) => b.sequenceNumber)).toEqual([2, 3]);
      expect(changes.undone).toEqual([]);
      expect(changes.innings).toHaveLength(1);
      expect(changes.innings[0].totalRuns).toBe(5);
    });

    it("should list balls whose undo flag flipped", () => {
      const before = bowl(liveMatch(), [runs(1), four()]);
      const after = CricketEngine.undoLastDelivery(before, NOW).next;
      const changes = diffMatch(before, after);

      expect(changes.appended).toEqual([]);
      expect(changes.undone.map((b) => b.sequenceNumber)).toEqual([2]);
      expect(changes.undone[0].isUndone).toBe(true);
    });

    it("should rewrite an innings whose pointers changed without new balls", () => {
      const before = liveMatch();
      const changes = diffMatch(before, swapStrike(before, NOW));

      expect(changes.innings).toHaveLength(1);
      expect(changes.appended).toEqual([]);
    });

    it("should report nothing for an identical state", () => {
      const state = bowl(liveMatch(), [runs(2)]);
      expect(diffMatch(state, structuredClone(state))).toEqual({
        innings: [],
        appended: [],
        undone: [],
      });
    });

    it("should touch only the second innings once the chase starts", () => {
      const first = endInnings(bowl(liveMatch(), [runs(2)]), NOW).next;
      const chase = bowl(chasingMatch(first), [dot()]);
      const changes = diffMatch(chasingMatch(first), chase);

      expect(changes.innings.map((inn) => inn.inningsNumber)).toEqual([2]);
    });
  });

  // ==== █ MEMORY STORE
  describe("MemoryMatchStore", () => {
    it("should hand out isolated snapshots", async () => {
      const store = new MemoryMatchStore();
      const match = liveMatch();
      await store.create(match);

      const loaded = await store.load(match.id);
      expect(loaded).toEqual(match);

      match.teamAName = "Changed";
      if (loaded) loaded.teamBName = "Changed";
      const again = await store.load(match.id);
      expect(again?.teamAName).toBe("Lions");
      expect(again?.teamBName).toBe("Tigers");
    });

    it("should return null for unknown ids and NOT_FOUND inside withMatch", async () => {
      const store = new MemoryMatchStore();

      expect(await store.load("missing")).toBeNull();
      await expect(
        store.withMatch("missing", (current) => ({ next: current, result: 1 })),
      ).rejects.toThrow(NotFoundError);
    });

    it("should list newest first up to the limit", async () => {
      const store = new MemoryMatchStore();
      const teams = { teamAName: "A", teamBName: "B", totalOvers: 5 };
      await store.create(createMatch(teams, { id: "old", now: "2025-01-01T00:00:00.000Z" }));
      await store.create(createMatch(teams, { id: "new", now: "2025-02-01T00:00:00.000Z" }));

      expect((await store.list(10)).map((m) => m.id)).toEqual(["new", "old"]);
      expect((await store.list(1)).map((m) => m.id)).toEqual(["new"]);
    });

    it("should leave the stored match untouched when work throws", async () => {
      const store = new MemoryMatchStore();
      const match = liveMatch();
      await store.create(match);

      await expect(
        store.withMatch(match.id, () => {
          throw new Error("boom");
        }),
      ).rejects.toThrow("boom");

      expect(await store.load(match.id)).toEqual(match);

      // El lock queda libre tras el error
      const total = await store.withMatch(match.id, (state) => {
        const next = bowl(state, [runs(3)]);
        return { next, result: current(next).totalRuns };
      });
      expect(total).toBe(3);
    });

    it("should serialise concurrent mutations on the same match", async () => {
      const store = new MemoryMatchStore();
      const match = liveMatch();
      await store.create(match);

      let counter = 0;
      const results = await Promise.all(
        repeat(dot(), 6).map((input) =>
          store.withMatch(match.id, (state) => {
            counter += 1;
            const outcome = CricketEngine.recordDelivery(state, input, meta(`c-${counter}`));
            return { next: outcome.next, result: outcome.ball.sequenceNumber };
          }),
        ),
      );

      expect(results).toEqual([1, 2, 3, 4, 5, 6]);
      const stored = await store.load(match.id);
      expect(stored ? current(stored).currentOver : -1).toBe(1);
    });

    it("should forget removed matches", async () => {
      const store = new MemoryMatchStore();
      const match = liveMatch();
      await store.create(match);
      await store.remove(match.id);

      expect(await store.load(match.id)).toBeNull();
      await expect(store.remove(match.id)).rejects.toThrow(NotFoundError);
    });

    it("should keep the match when the delete guard rejects it", async () => {
      const store = new MemoryMatchStore();
      const match = liveMatch();
      await store.create(match);

      await expect(store.remove(match.id, assertDeletable)).rejects.toThrow(
        IllegalStateTransitionError,
      );
      expect(await store.load(match.id)).toEqual(match);
    });

    it("should run the delete guard after mutations queued before it", async () => {
      const store = new MemoryMatchStore();
      const match = liveMatch();
      await store.create(match);

      await Promise.all([
        store.withMatch(match.id, (state) => ({ next: abandonMatch(state, NOW), result: null })),
        store.remove(match.id, assertDeletable),
      ]);

      expect(await store.load(match.id)).toBeNull();
    });

    it("should reject mutations queued behind a delete", async () => {
      const store = new MemoryMatchStore();
      const match = abandonMatch(liveMatch(), NOW);
      await store.create(match);

      const [removed, late] = await Promise.allSettled([
        store.remove(match.id, assertDeletable),
        store.withMatch(match.id, (state) => ({ next: swapStrike(state, NOW), result: null })),
      ]);

      expect(removed.status).toBe("fulfilled");
      expect(late.status === "rejected" ? late.reason : null).toBeInstanceOf(NotFoundError);
      expect(await store.load(match.id)).toBeNull();
    });
  });
});
