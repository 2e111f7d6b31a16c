/**
 * █ [TEST] :: MATCH_LIFECYCLE_VERIFICATION
 * =====================================================================
 * DESC:   toss -> in_progress -> innings_break -> completed | abandoned.
 *         Gates de innings y acciones del anotador.
 * =====================================================================
 */
import { describe, it, expect } from "vitest";
import {
  ABANDONED_RESULT,
  abandonMatch,
  assertDeletable,
  changeBowler,
  createMatch,
  endInnings,
  findActiveInnings,
  setToss,
  startInnings,
  swapStrike,
} from "../src/utils/match-status.ts";
import { calculateResult } from "../src/utils/match-result.ts";
import {
  IllegalStateTransitionError,
  InvalidInputError,
} from "../src/lib/errors.ts";
import {
  AWAY,
  HOME,
  NOW,
  bowl,
  chaseAfter,
  chasingMatch,
  current,
  dot,
  inningsAt,
  liveMatch,
  meta,
  runs,
  tossedMatch,
} from "./helpers/data-factory.ts";

const LATER = "2025-03-01T11:30:00.000Z";

const tigersBat = {
  battingTeam: AWAY,
  bowlingTeam: HOME,
  strikerName: "Carol",
  nonStrikerName: "Dan",
  bowlerName: "Yara",
};

describe("Match Lifecycle Verification", () => {
  // ==== █ CREATION & TOSS
  describe("Creation and toss", () => {
    it("should create a match awaiting the toss with trimmed names", () => {
      const match = createMatch(
        { teamAName: "  Lions ", teamBName: "Tigers", totalOvers: 10, venue: "  " },
        meta("m-1"),
      );

      expect(match).toEqual({
        id: "m-1",
        teamAName: "Lions",
        teamBName: "Tigers",
        totalOvers: 10,
        venue: null,
        tossWinner: null,
        tossDecision: null,
        status: "toss",
        resultSummary: null,
        innings: [],
        createdAt: NOW,
        updatedAt: NOW,
      });
    });

    it("should reject two teams with the same name", () => {
      expect(() =>
        createMatch({ teamAName: "Lions", teamBName: " Lions", totalOvers: 20 }, meta("m")),
      ).toThrow(InvalidInputError);
    });

    it("should move to in_progress once the toss is set", () => {
      const base = createMatch({ teamAName: HOME, teamBName: AWAY, totalOvers: 20 }, meta("m"));
      const tossed = setToss(base, { tossWinner: AWAY, tossDecision: "bowl" }, LATER);

      expect(tossed.status).toBe("in_progress");
      expect(tossed.tossWinner).toBe(AWAY);
      expect(tossed.tossDecision).toBe("bowl");
      expect(tossed.updatedAt).toBe(LATER);
      expect(base.status).toBe("toss");
    });

    it("should reject a toss winner outside the match and a second toss", () => {
      const base = createMatch({ teamAName: HOME, teamBName: AWAY, totalOvers: 20 }, meta("m"));

      expect(() => setToss(base, { tossWinner: "Bears", tossDecision: "bat" }, NOW)).toThrow(
        InvalidInputError,
      );
      expect(() => setToss(tossedMatch(), { tossWinner: HOME, tossDecision: "bat" }, NOW)).toThrow(
        "Toss can only be set when match is in TOSS state.",
      );
    });
  });

  // ==== █ INNINGS GATES
  describe("Innings gates", () => {
    it("should refuse to start an innings before the toss", () => {
      const base = createMatch({ teamAName: HOME, teamBName: AWAY, totalOvers: 20 }, meta("m"));
      expect(() => startInnings(base, tigersBat, meta("i"))).toThrow(IllegalStateTransitionError);
    });

    it("should open the first innings without a target", () => {
      const inn = current(liveMatch());

      expect(inn.inningsNumber).toBe(1);
      expect(inn.target).toBeNull();
      expect(inn.status).toBe("in_progress");
      expect(inn.currentBowlerName).toBe("Xavier");
    });

    it("should reject a second innings while the first is in progress", () => {
      expect(() => startInnings(liveMatch(), tigersBat, meta("i"))).toThrow(
        "An innings is already in progress.",
      );
    });

    it("should reject invalid teams and duplicate openers", () => {
      const tossed = tossedMatch();

      expect(() =>
        startInnings(tossed, { ...tigersBat, battingTeam: "Bears" }, meta("i")),
      ).toThrow("Batting team must be one of the match teams.");
      expect(() =>
        startInnings(tossed, { ...tigersBat, bowlingTeam: AWAY }, meta("i")),
      ).toThrow("Batting and bowling teams cannot be the same.");
      expect(() =>
        startInnings(tossed, { ...tigersBat, nonStrikerName: "Carol " }, meta("i")),
      ).toThrow("Striker and non-striker must be different.");
    });

    it("should not let the same side bat twice", () => {
      const brk = endInnings(liveMatch(), NOW).next;
      expect(() =>
        startInnings(
          brk,
          { ...tigersBat, battingTeam: HOME, bowlingTeam: AWAY },
          meta("i"),
        ),
      ).toThrow("Lions has already batted in this match.");
    });

    it("should set the target and refuse a third innings", () => {
      const chase = chaseAfter(37);
      expect(current(chase).inningsNumber).toBe(2);
      expect(current(chase).target).toBe(38);

      const done = endInnings(chase, NOW).next;
      expect(done.status).toBe("completed");
      expect(() => startInnings(done, tigersBat, meta("i"))).toThrow(IllegalStateTransitionError);
    });
  });

  // ==== █ SCORER ACTIONS
  describe("Scorer actions", () => {
    it("should change the bowler only at the start of an over", () => {
      expect(current(changeBowler(liveMatch(), " Yusuf ", NOW)).currentBowlerName).toBe("Yusuf");
      expect(() => changeBowler(bowl(liveMatch(), [dot()]), "Yusuf", NOW)).toThrow(
        "Bowler can only be changed at the start of an over.",
      );
    });

    it("should swap strike without touching the counters", () => {
      const before = bowl(liveMatch(), [runs(2)]);
      const inn = current(swapStrike(before, LATER));

      expect(inn.strikerName).toBe("Bob");
      expect(inn.nonStrikerName).toBe("Alice");
      expect(inn.totalRuns).toBe(2);
      expect(inn.balls).toHaveLength(1);
    });

    it("should end the first innings into the break", () => {
      const { next, resultSummary } = endInnings(bowl(liveMatch(), [runs(4)]), LATER);

      expect(resultSummary).toBeNull();
      expect(next.status).toBe("innings_break");
      expect(inningsAt(next, 1).status).toBe("completed");
      expect(findActiveInnings(next)).toBeNull();
    });

    it("should end the second innings with a result", () => {
      const chase = bowl(chaseAfter(12), [runs(4)]);
      const { next, resultSummary } = endInnings(chase, LATER);

      expect(resultSummary).toBe("Lions won by 8 run(s)");
      expect(next.resultSummary).toBe("Lions won by 8 run(s)");
      expect(next.status).toBe("completed");
    });
  });

  // ==== █ ABANDON & DELETE
  describe("Abandon and delete", () => {
    it("should abandon a live match and close its innings", () => {
      const abandoned = abandonMatch(liveMatch(), LATER);

      expect(abandoned.status).toBe("abandoned");
      expect(abandoned.resultSummary).toBe(ABANDONED_RESULT);
      expect(inningsAt(abandoned, 1).status).toBe("completed");
      expect(() => assertDeletable(abandoned)).not.toThrow();
    });

    it("should refuse to abandon twice or after completion", () => {
      const abandoned = abandonMatch(tossedMatch(), NOW);
      expect(() => abandonMatch(abandoned, NOW)).toThrow("Match is already abandoned.");

      const completed = endInnings(chaseAfter(6), NOW).next;
      expect(() => abandonMatch(completed, NOW)).toThrow("Cannot abandon a completed match.");
    });

    it("should only allow deleting finished matches", () => {
      expect(() => assertDeletable(liveMatch())).toThrow(
        "Only completed or abandoned matches can be deleted.",
      );
      expect(() => assertDeletable(endInnings(chaseAfter(6), NOW).next)).not.toThrow();
    });
  });

  // ==== █ RESULT
  describe("Result text", () => {
    it("should describe a win by wickets, by runs and by a zero-run margin", () => {
      const chase = chasingMatch(endInnings(bowl(liveMatch(), [runs(4)]), NOW).next);
      const second = current(chase);

      expect(calculateResult(chase, { ...second, totalRuns: 5, totalWickets: 3 })).toBe(
        "Tigers won by 7 wicket(s)",
      );
      expect(calculateResult(chase, { ...second, totalRuns: 1 })).toBe("Lions won by 3 run(s)");
      expect(calculateResult(chase, { ...second, totalRuns: 4 })).toBe("Lions won by 0 run(s)");
    });

    it("should fail without a first innings", () => {
      const lone = { ...current(liveMatch()), inningsNumber: 2 as const };
      expect(() => calculateResult(tossedMatch(), lone)).toThrow(IllegalStateTransitionError);
    });
  });
});
