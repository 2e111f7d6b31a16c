/**
 * █ [TYPES] :: LIVE_FEED_PROTOCOL
 * =====================================================================
 * DESC:   Contrato de mensajes del WebSocket y el puerto de
 *         notificación que usa el servicio (MatchNotifier).
 * STATUS: STABLE
 * =====================================================================
 */
import type { BallEvent, FullScorecard } from "./cricket.ts";
import type { MatchView } from "./matches.ts";

export type MatchUpdateReason =
  | "snapshot"
  | "toss"
  | "innings_started"
  | "ball"
  | "undo"
  | "bowler_changed"
  | "strike_swapped"
  | "innings_ended"
  | "abandoned";

export interface MatchUpdate {
  matchId: string;
  reason: MatchUpdateReason;
  match: MatchView;
  lastBall: BallEvent | null;
}

/**
 * Push side of the service. The live hub is one implementation;
 * `silentNotifier` is the default.
 */
export interface MatchNotifier {
  matchCreated(match: MatchView): void;
  matchUpdated(update: MatchUpdate): void;
}

export const silentNotifier: MatchNotifier = {
  matchCreated: () => {},
  matchUpdated: () => {},
};

/** Read side the hub needs for SUBSCRIBE and REQUEST_SCORECARD. */
export interface MatchReader {
  getMatch(matchId: string): Promise<MatchView>;
  getScorecard(matchId: string): Promise<FullScorecard>;
}

// =============================================================================
// █ MESSAGING PROTOCOL
// =============================================================================

// [SERVER -> CLIENT]
export type ServerMessage =
  | { type: "WELCOME"; payload: string }
  | { type: "ERROR"; payload: string }
  | { type: "SUBSCRIBED"; payload: string; matchId: string }
  | { type: "UNSUBSCRIBED"; payload: string; matchId: string }
  | ({ type: "MATCH_UPDATE"; timestamp: number } & MatchUpdate)
  | { type: "MATCH_CREATED"; data: MatchView }
  | { type: "SCORECARD"; matchId: string; data: FullScorecard };
