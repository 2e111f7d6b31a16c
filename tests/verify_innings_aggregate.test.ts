/**
 * █ [TEST] :: INNINGS_AGGREGATE_VERIFICATION
 * =====================================================================
 * DESC:   La caché de la innings == replay del log. Drift -> rebuild.
 * =====================================================================
 */
import { describe, it, expect, vi, afterEach } from "vitest";
import {
  countersOf,
  formatBallCount,
  formatOvers,
  reconcileInnings,
  replayInnings,
} from "../src/utils/inningsAggregate.ts";
import { reconcileMatch } from "../src/controllers/match.ts";
import { CricketEngine } from "../src/utils/cricketScoring.ts";
import {
  NOW,
  bowl,
  current,
  delivery,
  dot,
  four,
  liveMatch,
  repeat,
  runs,
  six,
} from "./helpers/data-factory.ts";

describe("Innings Aggregate Verification", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("should format overs with and without the ball part", () => {
    expect(formatOvers(12, 3)).toBe("12.3");
    expect(formatOvers(20, 0)).toBe("20");
    expect(formatBallCount(0)).toBe("0");
    expect(formatBallCount(14)).toBe("2.2");
  });

  it("should keep the cached counters equal to a replay of the log", () => {
    const recorded = bowl(liveMatch(), [
      four(),
      delivery({ extraType: "wide", extraRuns: 1 }),
      ...repeat(dot(), 5),
      delivery({ extraType: "no_ball", extraRuns: 1, runsScored: 1 }),
      six(),
      delivery({
        isWicket: true,
        dismissalType: "lbw",
        dismissedBatsman: "Alice",
        newBatsmanName: "Charlie",
      }),
    ]);
    const state = CricketEngine.undoLastDelivery(recorded, NOW).next;
    const inn = current(state);

    expect(replayInnings(inn)).toEqual(countersOf(inn));
    expect(countersOf(inn)).toEqual({
      totalRuns: 13,
      totalWickets: 0,
      currentOver: 1,
      currentBall: 1,
      extras: { wides: 1, noBalls: 1, byes: 0, legByes: 0, penalties: 0 },
    });
  });

  it("should return the same innings when the cache is consistent", () => {
    const inn = current(bowl(liveMatch(), [runs(3)]));
    const result = reconcileInnings(inn);

    expect(result.consistent).toBe(true);
    expect(result.innings).toBe(inn);
  });

  it("should rebuild counters from the log when the cache drifted", () => {
    const inn = current(bowl(liveMatch(), [runs(3), four()]));
    const drifted = { ...inn, totalRuns: 99, currentBall: 5 };

    const result = reconcileInnings(drifted);

    expect(result.consistent).toBe(false);
    expect(result.innings.totalRuns).toBe(7);
    expect(result.innings.currentBall).toBe(2);
    expect(result.innings.strikerName).toBe(inn.strikerName);
  });

  it("should warn and rebuild active innings when reconciling a match", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const match = bowl(liveMatch(), [runs(2)]);
    match.innings[0].totalRuns = 50;

    const fixed = reconcileMatch(match);

    expect(fixed.innings[0].totalRuns).toBe(2);
    expect(warn).toHaveBeenCalledTimes(1);
    expect(String(warn.mock.calls[0][0])).toContain("AGG_DRIFT");
  });

  it("should hand back the same match when nothing drifted", () => {
    const match = bowl(liveMatch(), [runs(2)]);
    expect(reconcileMatch(match)).toBe(match);
  });
});
