/**
 * █ [DOMAIN] :: CRICKET_TYPES
 * =====================================================================
 * DESC:   Tipos de dominio del motor de scoring (Match, Innings, Ball).
 *         Plain data: se clonan con structuredClone y viajan tal cual
 *         por la API y el WebSocket.
 * STATUS: STABLE
 * =====================================================================
 */

// =============================================================================
// █ ENUM CATALOGUES
// =============================================================================
// [INFO] -> Tuplas `as const` reutilizadas por Zod y por los pgEnum de Drizzle.
export const MATCH_STATUSES = [
  "toss",
  "in_progress",
  "innings_break",
  "completed",
  "abandoned",
] as const;

export const INNINGS_STATUSES = [
  "not_started",
  "in_progress",
  "completed",
] as const;

export const EXTRA_TYPES = [
  "none",
  "wide",
  "no_ball",
  "bye",
  "leg_bye",
  "penalty",
] as const;

export const DISMISSAL_TYPES = [
  "bowled",
  "caught",
  "lbw",
  "run_out",
  "stumped",
  "hit_wicket",
  "retired_hurt",
  "obstructing_the_field",
  "timed_out",
  "handled_the_ball",
] as const;

export const TOSS_DECISIONS = ["bat", "bowl"] as const;

export type MatchStatus = (typeof MATCH_STATUSES)[number];
export type InningsStatus = (typeof INNINGS_STATUSES)[number];
export type ExtraType = (typeof EXTRA_TYPES)[number];
export type DismissalType = (typeof DISMISSAL_TYPES)[number];
export type TossDecision = (typeof TOSS_DECISIONS)[number];
export type InningsNumber = 1 | 2;

// =============================================================================
// █ EVENT LOG
// =============================================================================
/**
 * One recorded delivery. Only `isUndone` ever changes after creation.
 * `sequenceNumber` is the active-ball count at recording time (+1);
 * `logIndex` is the position in the full log and is never reused.
 */
export interface BallEvent {
  id: string;
  inningsId: string;
  sequenceNumber: number;
  logIndex: number;
  overNumber: number;
  ballNumber: number;
  bowlerName: string;
  batsmanName: string;
  nonStrikerName: string;
  runsScored: number;
  isBoundaryFour: boolean;
  isBoundarySix: boolean;
  extraType: ExtraType;
  extraRuns: number;
  isWicket: boolean;
  dismissalType: DismissalType | null;
  dismissedBatsman: string | null;
  fielderName: string | null;
  isLegalDelivery: boolean;
  isUndone: boolean;
  createdAt: string;
}

/** Ball fields supplied by the engine before the log numbers them. */
export type BallDraft = Omit<BallEvent, "sequenceNumber" | "logIndex" | "isUndone">;

// =============================================================================
// █ AGGREGATES
// =============================================================================
export interface ExtrasTally {
  wides: number;
  noBalls: number;
  byes: number;
  legByes: number;
  penalties: number;
}

export interface InningsState {
  id: string;
  matchId: string;
  inningsNumber: InningsNumber;
  battingTeam: string;
  bowlingTeam: string;

  // -- SCORE --
  totalRuns: number;
  totalWickets: number;
  currentOver: number;
  currentBall: number; // [0, 6) en reposo
  extras: ExtrasTally;
  target: number | null;
  status: InningsStatus;

  // -- POINTERS --
  strikerName: string;
  nonStrikerName: string;
  currentBowlerName: string;

  // [LOG] -> Incluye bolas deshechas (soft delete, auditoría)
  balls: BallEvent[];
  createdAt: string;
}

export interface MatchState {
  id: string;
  teamAName: string;
  teamBName: string;
  totalOvers: number;
  venue: string | null;
  tossWinner: string | null;
  tossDecision: TossDecision | null;
  status: MatchStatus;
  resultSummary: string | null;
  innings: InningsState[];
  createdAt: string;
  updatedAt: string;
}

// =============================================================================
// █ ENGINE INPUT / OUTPUT
// =============================================================================
export interface CreateMatchInput {
  teamAName: string;
  teamBName: string;
  totalOvers: number;
  venue?: string | null;
}

export interface TossInput {
  tossWinner: string;
  tossDecision: TossDecision;
}

export interface StartInningsInput {
  battingTeam: string;
  bowlingTeam: string;
  strikerName: string;
  nonStrikerName: string;
  bowlerName: string;
}

/** Id and clock for whatever the operation creates; injected so replays stay deterministic. */
export interface OperationMeta {
  id: string;
  now: string;
}

export interface DeliveryInput {
  runsScored: number;
  isBoundaryFour: boolean;
  isBoundarySix: boolean;
  extraType: ExtraType;
  extraRuns: number;
  isWicket: boolean;
  dismissalType?: DismissalType | null;
  dismissedBatsman?: string | null;
  fielderName?: string | null;
  newBatsmanName?: string | null;
}

export interface DeliveryOutcome {
  next: MatchState;
  ball: BallEvent;
  overComplete: boolean;
  inningsEnded: boolean;
  resultSummary: string | null;
}

export interface UndoOutcome {
  next: MatchState;
  undone: BallEvent;
}

// =============================================================================
// █ SCORECARD
// =============================================================================
export interface BatsmanStats {
  name: string;
  runs: number;
  ballsFaced: number;
  fours: number;
  sixes: number;
  strikeRate: number;
  howOut: string;
  bowler: string | null;
}

export interface BowlerStats {
  name: string;
  overs: string;
  balls: number;
  maidens: number;
  runsConceded: number;
  wickets: number;
  economy: number;
  wides: number;
  noBalls: number;
}

export interface FallOfWicket {
  wicketNumber: number;
  batsman: string;
  score: number;
  over: string;
}

export interface ExtrasSummary extends ExtrasTally {
  total: number;
}

export interface InningsScorecard {
  inningsNumber: InningsNumber;
  battingTeam: string;
  bowlingTeam: string;
  totalRuns: number;
  totalWickets: number;
  totalOvers: string;
  target: number | null;
  extras: ExtrasSummary;
  batsmen: BatsmanStats[];
  bowlers: BowlerStats[];
  fallOfWickets: FallOfWicket[];
}

export interface MatchSummary {
  id: string;
  teamAName: string;
  teamBName: string;
  totalOvers: number;
  venue: string | null;
  status: MatchStatus;
  resultSummary: string | null;
  createdAt: string;
}

export interface FullScorecard {
  match: MatchSummary;
  innings: InningsScorecard[];
}
