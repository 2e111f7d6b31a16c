/**
 * █ [VALIDATION] :: LIVE_MESSAGE
 * =====================================================================
 * DESC:   Mensajes CLIENT -> SERVER del WebSocket.
 * STATUS: STABLE
 * =====================================================================
 */
import { z } from "zod";

const matchId = z.string().uuid();

export const clientMessageSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("SUBSCRIBE"), matchId }),
  z.object({ type: z.literal("UNSUBSCRIBE"), matchId }),
  z.object({ type: z.literal("REQUEST_SCORECARD"), matchId }),
]);

// [CLIENT -> SERVER]
export type ClientMessage = z.infer<typeof clientMessageSchema>;
