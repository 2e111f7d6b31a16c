/**
 * █ [VALIDATION] :: SCHEMAS_ZOD
 * =====================================================================
 * DESC:   Define las reglas de validación para entradas de datos.
 *         Actúa como barrera de defensa antes de tocar el motor.
 *         Las reglas de negocio (equipo válido, estado) van en el motor.
 * STATUS: ESTABLE
 * =====================================================================
 */
import { z } from "zod";
import { TOSS_DECISIONS } from "../types/cricket.ts";

export const DEFAULT_LIST_LIMIT = 50;

// [HELPER] -> Nombre de equipo/jugador: trim + 1..100 chars
const nameField = z.string().trim().min(1).max(100);

/**
 * ◼️ SCHEMA: QUERY_PARAMS
 * ---------------------------------------------------------
 * Valida los parámetros de búsqueda en la URL.
 * `coerce` convierte strings numéricos ("50") a números reales (50).
 */
export const listMatchesQuerySchema = z.object({
  limit: z.coerce.number().int().positive().max(100).optional(),
});

/**
 * ◼️ SCHEMA: ID_PARAM
 * ---------------------------------------------------------
 * Los partidos se identifican por UUID.
 */
export const matchIdParamSchema = z.object({
  id: z.string().uuid(),
});

/**
 * ◼️ SCHEMA: CREATE_MATCH
 * ---------------------------------------------------------
 * INCLUYE: Validación cruzada (superRefine) -> equipos distintos.
 */
export const createMatchSchema = z
  .object({
    teamAName: nameField,
    teamBName: nameField,
    totalOvers: z.coerce.number().int().positive().max(50),
    venue: z.string().trim().max(200).nullish(),
  })
  .superRefine((data, ctx) => {
    // REGLA: Un equipo no puede jugar contra sí mismo
    if (data.teamAName === data.teamBName) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "teamBName debe ser distinto de teamAName",
        path: ["teamBName"],
      });
    }
  });

export const tossSchema = z.object({
  tossWinner: nameField,
  tossDecision: z.enum(TOSS_DECISIONS),
});

export const startInningsSchema = z.object({
  battingTeam: nameField,
  bowlingTeam: nameField,
  strikerName: nameField,
  nonStrikerName: nameField,
  bowlerName: nameField,
});

export const changeBowlerSchema = z.object({
  bowlerName: nameField,
});
