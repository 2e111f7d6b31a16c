/**
 * █ [VALIDATION] :: BALL_ACTION
 * =====================================================================
 * DESC:   Payload para registrar una bola en tiempo real.
 *         Forma y rangos aquí; combinaciones (wicket sin tipo, 4 y 6 a
 *         la vez...) las rechaza el motor con INVALID_DELIVERY.
 * STATUS: STABLE
 * =====================================================================
 */
import { z } from "zod";
import { DISMISSAL_TYPES, EXTRA_TYPES } from "../types/cricket.ts";

const runsField = z.number().int().min(0).max(7).default(0);
const optionalName = z.string().trim().max(100).nullish();

/**
 * ◼️ SCHEMA: RECORD_BALL
 * ---------------------------------------------------------
 */
export const recordBallSchema = z.object({
  // [RUNS] -> Runs del bate / runs extra de la bola
  runsScored: runsField,
  extraRuns: runsField,

  isBoundaryFour: z.boolean().default(false),
  isBoundarySix: z.boolean().default(false),
  extraType: z.enum(EXTRA_TYPES).default("none"),

  // [WICKET] -> Obligatorios solo si isWicket
  isWicket: z.boolean().default(false),
  dismissalType: z.enum(DISMISSAL_TYPES).nullish(),
  dismissedBatsman: optionalName,
  fielderName: optionalName,
  newBatsmanName: optionalName,
});
