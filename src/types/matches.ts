/**
 * █ [TYPES] :: PERSISTENCE_MODELS
 * =====================================================================
 * DESC:   Tipos de fila inferidos de la BD y DTOs inferidos de Zod.
 *         Evita duplicar definiciones manuales (Single Source of Truth).
 * STATUS: STABLE
 * =====================================================================
 */
import { type InferSelectModel, type InferInsertModel } from "drizzle-orm";
import { z } from "zod";
import { matches, innings, ballEvents } from "../db/schema.ts";
import {
  changeBowlerSchema,
  createMatchSchema,
  listMatchesQuerySchema,
  startInningsSchema,
  tossSchema,
} from "../validation/matches.ts";
import { recordBallSchema } from "../validation/ball_action.ts";
import type { InningsState, MatchState } from "./cricket.ts";

// =============================================================================
// █ DATABASE_MODELS (DRIZZLE ORM)
// =============================================================================
export type MatchRow = InferSelectModel<typeof matches>;
export type NewMatchRow = InferInsertModel<typeof matches>;

export type InningsRow = InferSelectModel<typeof innings>;
export type NewInningsRow = InferInsertModel<typeof innings>;

export type BallEventRow = InferSelectModel<typeof ballEvents>;
export type NewBallEventRow = InferInsertModel<typeof ballEvents>;

// =============================================================================
// █ API_DTOs (ZOD INFERRED)
// =============================================================================
export type CreateMatchBody = z.infer<typeof createMatchSchema>;
export type TossBody = z.infer<typeof tossSchema>;
export type StartInningsBody = z.infer<typeof startInningsSchema>;
export type ChangeBowlerBody = z.infer<typeof changeBowlerSchema>;
export type RecordBallBody = z.infer<typeof recordBallSchema>;
export type ListMatchesQuery = z.infer<typeof listMatchesQuerySchema>;

// =============================================================================
// █ API VIEWS
// =============================================================================

/**
 * [VIEW] -> Innings tal y como sale por la API: sin bolas deshechas.
 */
export type InningsView = InningsState;

export interface MatchView extends Omit<MatchState, "innings"> {
  innings: InningsView[];
}
