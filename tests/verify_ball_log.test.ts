/**
 * █ [TEST] :: BALL_LOG_VERIFICATION
 * =====================================================================
 * DESC:   Append, numeración, iteración de activas y soft delete.
 * =====================================================================
 */
import { describe, it, expect } from "vitest";
import type { BallDraft, BallEvent } from "../src/types/cricket.ts";
import {
  activeBalls,
  appendBall,
  countActive,
  lastActiveBall,
  softDeleteLast,
} from "../src/utils/ballLog.ts";
import { NothingToUndoError } from "../src/lib/errors.ts";
import { NOW } from "./helpers/data-factory.ts";

function draft(id: string, runsScored = 0): BallDraft {
  return {
    id,
    inningsId: "innings-1",
    overNumber: 0,
    ballNumber: 0,
    bowlerName: "Xavier",
    batsmanName: "Alice",
    nonStrikerName: "Bob",
    runsScored,
    isBoundaryFour: false,
    isBoundarySix: false,
    extraType: "none",
    extraRuns: 0,
    isWicket: false,
    dismissalType: null,
    dismissedBatsman: null,
    fielderName: null,
    isLegalDelivery: true,
    createdAt: NOW,
  };
}

describe("Ball Log Verification", () => {
  it("should number appended balls by active count and log position", () => {
    const log: BallEvent[] = [];
    const first = appendBall(log, draft("a"));
    const second = appendBall(log, draft("b"));

    expect(first.sequenceNumber).toBe(1);
    expect(first.logIndex).toBe(0);
    expect(second.sequenceNumber).toBe(2);
    expect(second.logIndex).toBe(1);
    expect(second.isUndone).toBe(false);
    expect(log).toHaveLength(2);
  });

  it("should reuse a sequence number after undo but never a log index", () => {
    const log: BallEvent[] = [];
    appendBall(log, draft("a"));
    appendBall(log, draft("b"));
    softDeleteLast(log);

    const redo = appendBall(log, draft("c"));

    expect(redo.sequenceNumber).toBe(2);
    expect(redo.logIndex).toBe(2);
    expect(countActive(log)).toBe(2);
  });

  it("should iterate only active balls, in order, and restart on each pass", () => {
    const log: BallEvent[] = [];
    appendBall(log, draft("a", 1));
    appendBall(log, draft("b", 2));
    appendBall(log, draft("c", 3));
    log[1].isUndone = true;

    const balls = activeBalls(log);
    expect([...balls].map((b) => b.id)).toEqual(["a", "c"]);
    expect([...balls].map((b) => b.id)).toEqual(["a", "c"]);
  });

  it("should soft delete exactly the last active ball", () => {
    const log: BallEvent[] = [];
    appendBall(log, draft("a"));
    appendBall(log, draft("b"));

    const undone = softDeleteLast(log);
    expect(undone.id).toBe("b");
    expect(log.map((b) => b.isUndone)).toEqual([false, true]);

    expect(softDeleteLast(log).id).toBe("a");
    expect(lastActiveBall(log)).toBeNull();
  });

  it("should fail with NOTHING_TO_UNDO when no active ball remains", () => {
    const log: BallEvent[] = [];
    expect(() => softDeleteLast(log)).toThrow(NothingToUndoError);

    appendBall(log, draft("a"));
    softDeleteLast(log);
    expect(() => softDeleteLast(log)).toThrow("No balls to undo.");
  });
});
