import type { InningsState, MatchState } from "../types/cricket.ts";
import { IllegalStateTransitionError } from "../lib/errors.ts";
import { MAX_WICKETS } from "./inningsAggregate.ts";

/**
 * ◼️ CALCULATE_RESULT
 * ---------------------------------------------------------
 * Texto del resultado al cerrarse la segunda innings.
 * Chase conseguido -> wickets restantes. Si no -> diferencia de runs.
 */
export function calculateResult(
  match: MatchState,
  second: InningsState,
): string {
  const first = match.innings.find((inn) => inn.inningsNumber === 1);
  if (!first) {
    throw new IllegalStateTransitionError("First innings is missing.");
  }

  const target = second.target ?? first.totalRuns + 1;

  if (second.totalRuns >= target) {
    const wicketsRemaining = MAX_WICKETS - second.totalWickets;
    return `${second.battingTeam} won by ${wicketsRemaining} wicket(s)`;
  }

  const runDiff = first.totalRuns - second.totalRuns;
  return `${first.battingTeam} won by ${runDiff} run(s)`;
}
