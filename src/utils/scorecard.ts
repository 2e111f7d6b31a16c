/**
 * █ [UTILS] :: SCORECARD_DERIVER
 * =====================================================================
 * DESC:   Fold puro sobre las bolas activas de una innings.
 *         Bateadores y bowlers en orden de primera aparición (Map).
 *         Nada se persiste: el scorecard siempre sale del log.
 * STATUS: STABLE
 * =====================================================================
 */
import type {
  BallEvent,
  BatsmanStats,
  BowlerStats,
  DismissalType,
  FallOfWicket,
  FullScorecard,
  InningsScorecard,
  InningsState,
  MatchState,
  MatchSummary,
} from "../types/cricket.ts";
import { activeBalls } from "./ballLog.ts";
import {
  BALLS_PER_OVER,
  extrasTotal,
  formatBallCount,
  formatOvers,
} from "./inningsAggregate.ts";

// [INFO] -> Wickets que no se apuntan al bowler
const NON_BOWLER_WICKETS: ReadonlySet<DismissalType> = new Set([
  "run_out",
  "retired_hurt",
  "obstructing_the_field",
]);

const NOT_OUT = "not out";

interface BattingLine {
  runs: number;
  ballsFaced: number;
  fours: number;
  sixes: number;
  howOut: string;
  bowler: string | null;
}

interface BowlingLine {
  balls: number;
  maidens: number;
  runsConceded: number;
  wickets: number;
  wides: number;
  noBalls: number;
  // -- OVER ACCUMULATOR --
  overNumber: number;
  overRuns: number;
  overBalls: number;
}

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

function battingLine(map: Map<string, BattingLine>, name: string): BattingLine {
  let line = map.get(name);
  if (!line) {
    line = { runs: 0, ballsFaced: 0, fours: 0, sixes: 0, howOut: NOT_OUT, bowler: null };
    map.set(name, line);
  }
  return line;
}

function bowlingLine(
  map: Map<string, BowlingLine>,
  name: string,
  overNumber: number,
): BowlingLine {
  let line = map.get(name);
  if (!line) {
    line = {
      balls: 0,
      maidens: 0,
      runsConceded: 0,
      wickets: 0,
      wides: 0,
      noBalls: 0,
      overNumber,
      overRuns: 0,
      overBalls: 0,
    };
    map.set(name, line);
  }
  return line;
}

function closeOver(line: BowlingLine): void {
  if (line.overBalls === BALLS_PER_OVER && line.overRuns === 0) {
    line.maidens += 1;
  }
  line.overRuns = 0;
  line.overBalls = 0;
}

/**
 * ◼️ DISMISSAL_TEXT
 * ---------------------------------------------------------
 * "b X", "lbw b X", "c F b X" / "c & b X", "st F b X",
 * "run out (F)" / "run out", "hit wicket b X". Resto -> tipo en crudo.
 */
export function describeDismissal(
  ball: Pick<BallEvent, "dismissalType" | "fielderName" | "bowlerName">,
): string {
  const bowler = ball.bowlerName;
  const fielder = ball.fielderName;

  switch (ball.dismissalType) {
    case "bowled":
      return `b ${bowler}`;
    case "lbw":
      return `lbw b ${bowler}`;
    case "caught":
      return fielder ? `c ${fielder} b ${bowler}` : `c & b ${bowler}`;
    case "stumped":
      return fielder ? `st ${fielder} b ${bowler}` : "stumped";
    case "run_out":
      return fielder ? `run out (${fielder})` : "run out";
    case "hit_wicket":
      return `hit wicket b ${bowler}`;
    case null:
      return "out";
    default:
      return ball.dismissalType;
  }
}

/** Runs a bowler is charged with for one ball. Byes, leg-byes and penalties are not. */
function runsConcededBy(ball: BallEvent): number {
  switch (ball.extraType) {
    case "none":
      return ball.runsScored;
    case "no_ball":
      return ball.runsScored + ball.extraRuns;
    case "wide":
      return ball.extraRuns;
    default:
      return 0;
  }
}

// =============================================================================
// █ INNINGS SCORECARD
// =============================================================================
export function buildInningsScorecard(innings: InningsState): InningsScorecard {
  const batsmen = new Map<string, BattingLine>();
  const bowlers = new Map<string, BowlingLine>();
  const fallOfWickets: FallOfWicket[] = [];
  let runningScore = 0;

  for (const ball of activeBalls(innings.balls)) {
    runningScore += ball.runsScored + ball.extraRuns;

    // -- BATTING --
    const striker = battingLine(batsmen, ball.batsmanName);
    if (ball.isLegalDelivery || ball.extraType === "no_ball") {
      striker.ballsFaced += 1;
    }
    if (ball.extraType !== "wide" && ball.extraType !== "bye" && ball.extraType !== "leg_bye") {
      striker.runs += ball.runsScored;
    }
    if (ball.isBoundaryFour) striker.fours += 1;
    if (ball.isBoundarySix) striker.sixes += 1;

    if (ball.isWicket && ball.dismissedBatsman) {
      const out = battingLine(batsmen, ball.dismissedBatsman);
      out.howOut = describeDismissal(ball);
      out.bowler = ball.bowlerName;
      fallOfWickets.push({
        wicketNumber: fallOfWickets.length + 1,
        batsman: ball.dismissedBatsman,
        score: runningScore,
        over: `${ball.overNumber}.${ball.ballNumber}`,
      });
    }

    // -- BOWLING --
    const bowler = bowlingLine(bowlers, ball.bowlerName, ball.overNumber);
    if (ball.overNumber !== bowler.overNumber) {
      closeOver(bowler);
      bowler.overNumber = ball.overNumber;
    }

    if (ball.isLegalDelivery) {
      bowler.balls += 1;
      bowler.overBalls += 1;
    }
    if (ball.extraType === "wide") bowler.wides += 1;
    if (ball.extraType === "no_ball") bowler.noBalls += 1;
    bowler.runsConceded += runsConcededBy(ball);
    bowler.overRuns += ball.runsScored + ball.extraRuns;

    if (
      ball.isWicket &&
      ball.dismissalType &&
      !NON_BOWLER_WICKETS.has(ball.dismissalType)
    ) {
      bowler.wickets += 1;
    }
  }

  for (const line of bowlers.values()) closeOver(line);

  // [INFO] -> El non-striker en reposo puede no haber recibido bola aún
  battingLine(batsmen, innings.nonStrikerName);

  const batsmenStats: BatsmanStats[] = [...batsmen].map(([name, line]) => ({
    name,
    runs: line.runs,
    ballsFaced: line.ballsFaced,
    fours: line.fours,
    sixes: line.sixes,
    strikeRate: line.ballsFaced ? round2((line.runs / line.ballsFaced) * 100) : 0,
    howOut: line.howOut,
    bowler: line.bowler,
  }));

  const bowlerStats: BowlerStats[] = [...bowlers].map(([name, line]) => ({
    name,
    overs: formatBallCount(line.balls),
    balls: line.balls,
    maidens: line.maidens,
    runsConceded: line.runsConceded,
    wickets: line.wickets,
    economy: line.balls
      ? round2(line.runsConceded / (line.balls / BALLS_PER_OVER))
      : 0,
    wides: line.wides,
    noBalls: line.noBalls,
  }));

  return {
    inningsNumber: innings.inningsNumber,
    battingTeam: innings.battingTeam,
    bowlingTeam: innings.bowlingTeam,
    totalRuns: innings.totalRuns,
    totalWickets: innings.totalWickets,
    totalOvers: formatOvers(innings.currentOver, innings.currentBall),
    target: innings.target,
    extras: { ...innings.extras, total: extrasTotal(innings.extras) },
    batsmen: batsmenStats,
    bowlers: bowlerStats,
    fallOfWickets,
  };
}

// =============================================================================
// █ MATCH VIEWS
// =============================================================================
export function toMatchSummary(match: MatchState): MatchSummary {
  return {
    id: match.id,
    teamAName: match.teamAName,
    teamBName: match.teamBName,
    totalOvers: match.totalOvers,
    venue: match.venue,
    status: match.status,
    resultSummary: match.resultSummary,
    createdAt: match.createdAt,
  };
}

export function buildFullScorecard(match: MatchState): FullScorecard {
  return {
    match: toMatchSummary(match),
    innings: match.innings.map(buildInningsScorecard),
  };
}
