/**
 * █ [API_ROUTE] :: MATCHES_HANDLER (HONO EDITION)
 * =====================================================================
 * DESC:   API REST del partido: lifecycle, bolas, undo y scorecard.
 *         Lecturas abiertas; toda mutación pasa por el PIN del anotador.
 * STATUS: STABLE
 * =====================================================================
 */
import { Hono, type Context, type MiddlewareHandler } from "hono";
import type { ContentfulStatusCode } from "hono/utils/http-status";
import type { z } from "zod";
import {
  DEFAULT_LIST_LIMIT,
  changeBowlerSchema,
  createMatchSchema,
  listMatchesQuerySchema,
  matchIdParamSchema,
  startInningsSchema,
  tossSchema,
} from "../validation/matches.ts";
import { recordBallSchema } from "../validation/ball_action.ts";
import type { MatchService } from "../controllers/match.ts";
import { isScoringError, type ScoringErrorCode } from "../lib/errors.ts";

const MAX_LIMIT = 100;

export const STATUS_BY_CODE: Record<ScoringErrorCode, ContentfulStatusCode> = {
  INVALID_DELIVERY: 400,
  INVALID_INPUT: 400,
  ILLEGAL_STATE_TRANSITION: 409,
  NOTHING_TO_UNDO: 409,
  NOT_FOUND: 404,
};

type Parsed<T> = { ok: true; data: T } | { ok: false; response: Response };

// =============================================================================
// █ HELPERS: PARSING
// =============================================================================
async function parseBody<T>(
  c: Context,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
): Promise<Parsed<T>> {
  let body: unknown;
  try {
    body = await c.req.json();
  } catch {
    return { ok: false, response: c.json({ error: "Invalid JSON body" }, 400) };
  }

  const result = schema.safeParse(body);
  if (!result.success) {
    console.log(
      `[API]   :: INVALID_BODY  :: ${JSON.stringify(result.error.issues).slice(0, 100)}...`,
    );
    return {
      ok: false,
      response: c.json({ error: "Validation failed", details: result.error.issues }, 400),
    };
  }
  return { ok: true, data: result.data };
}

function parseMatchId(c: Context): Parsed<string> {
  const result = matchIdParamSchema.safeParse(c.req.param());
  if (!result.success) {
    return { ok: false, response: c.json({ error: "Invalid Match ID" }, 400) };
  }
  return { ok: true, data: result.data.id };
}

/**
 * ◼️ ERROR MAPPER
 * ---------------------------------------------------------
 * Rechazo de negocio -> status por `code`. Resto -> 500 opaco.
 */
export function errorResponse(c: Context, error: unknown): Response {
  if (isScoringError(error)) {
    console.log(`[API]   :: REJECTED      :: ${error.code} | ${error.message}`);
    return c.json({ error: error.message, code: error.code }, STATUS_BY_CODE[error.code]);
  }
  console.error(`[ERR]   :: UNHANDLED     ::`, error);
  return c.json({ error: "Internal Server Error" }, 500);
}

// =============================================================================
// █ APP FACTORY
// =============================================================================
export function createMatchesApp(
  service: MatchService,
  requirePin: MiddlewareHandler,
): Hono {
  const matchesApp = new Hono();

  // [SEC] -> Lecturas libres, escrituras con PIN
  matchesApp.post("*", requirePin);
  matchesApp.delete("*", requirePin);

  // ==== █ ENDPOINT: GET /
  matchesApp.get("/", async (c) => {
    const parsed = listMatchesQuerySchema.safeParse(c.req.query());
    if (!parsed.success) {
      return c.json({ error: "Invalid query params", details: parsed.error.issues }, 400);
    }

    const limit = Math.min(parsed.data.limit ?? DEFAULT_LIST_LIMIT, MAX_LIMIT);
    try {
      return c.json({ data: await service.listMatches(limit) });
    } catch (error) {
      return errorResponse(c, error);
    }
  });

  // ==== █ ENDPOINT: POST /
  matchesApp.post("/", async (c) => {
    const body = await parseBody(c, createMatchSchema);
    if (!body.ok) return body.response;

    try {
      const match = await service.createMatch(body.data);
      console.log(`[DB]    ++ SAVED         :: id: ${match.id}`);
      return c.json({ data: match }, 201);
    } catch (error) {
      return errorResponse(c, error);
    }
  });

  // ==== █ ENDPOINT: GET /:id
  matchesApp.get("/:id", async (c) => {
    const id = parseMatchId(c);
    if (!id.ok) return id.response;

    try {
      return c.json({ data: await service.getMatch(id.data) });
    } catch (error) {
      return errorResponse(c, error);
    }
  });

  // ==== █ ENDPOINT: GET /:id/scorecard
  matchesApp.get("/:id/scorecard", async (c) => {
    const id = parseMatchId(c);
    if (!id.ok) return id.response;

    try {
      return c.json({ data: await service.getScorecard(id.data) });
    } catch (error) {
      return errorResponse(c, error);
    }
  });

  // ==== █ ENDPOINT: POST /:id/toss
  matchesApp.post("/:id/toss", async (c) => {
    const id = parseMatchId(c);
    if (!id.ok) return id.response;
    const body = await parseBody(c, tossSchema);
    if (!body.ok) return body.response;

    try {
      return c.json({ data: await service.setToss(id.data, body.data) });
    } catch (error) {
      return errorResponse(c, error);
    }
  });

  // ==== █ ENDPOINT: POST /:id/innings
  matchesApp.post("/:id/innings", async (c) => {
    const id = parseMatchId(c);
    if (!id.ok) return id.response;
    const body = await parseBody(c, startInningsSchema);
    if (!body.ok) return body.response;

    try {
      return c.json({ data: await service.startInnings(id.data, body.data) }, 201);
    } catch (error) {
      return errorResponse(c, error);
    }
  });

  /**
   * ◼️ ENDPOINT: POST /:id/ball
   * ---------------------------------------------------------
   * DESC: Registra una bola. Devuelve flags de over/innings + partido.
   */
  matchesApp.post("/:id/ball", async (c) => {
    const id = parseMatchId(c);
    if (!id.ok) return id.response;
    const body = await parseBody(c, recordBallSchema);
    if (!body.ok) return body.response;

    try {
      const result = await service.recordBall(id.data, body.data);
      return c.json({
        overComplete: result.overComplete,
        inningsEnded: result.inningsEnded,
        resultSummary: result.resultSummary,
        data: result.match,
      });
    } catch (error) {
      return errorResponse(c, error);
    }
  });

  // ==== █ ENDPOINT: POST /:id/undo
  matchesApp.post("/:id/undo", async (c) => {
    const id = parseMatchId(c);
    if (!id.ok) return id.response;

    try {
      const { undone, match } = await service.undoLastBall(id.data);
      return c.json({
        message: `Ball #${undone.sequenceNumber} undone.`,
        data: match,
      });
    } catch (error) {
      return errorResponse(c, error);
    }
  });

  // ==== █ ENDPOINT: POST /:id/change-bowler
  matchesApp.post("/:id/change-bowler", async (c) => {
    const id = parseMatchId(c);
    if (!id.ok) return id.response;
    const body = await parseBody(c, changeBowlerSchema);
    if (!body.ok) return body.response;

    try {
      return c.json({ data: await service.changeBowler(id.data, body.data.bowlerName) });
    } catch (error) {
      return errorResponse(c, error);
    }
  });

  // ==== █ ENDPOINT: POST /:id/swap-strike
  matchesApp.post("/:id/swap-strike", async (c) => {
    const id = parseMatchId(c);
    if (!id.ok) return id.response;

    try {
      return c.json({ data: await service.swapStrike(id.data) });
    } catch (error) {
      return errorResponse(c, error);
    }
  });

  // ==== █ ENDPOINT: POST /:id/end-innings
  matchesApp.post("/:id/end-innings", async (c) => {
    const id = parseMatchId(c);
    if (!id.ok) return id.response;

    try {
      return c.json({ data: await service.endInnings(id.data) });
    } catch (error) {
      return errorResponse(c, error);
    }
  });

  // ==== █ ENDPOINT: POST /:id/abandon
  matchesApp.post("/:id/abandon", async (c) => {
    const id = parseMatchId(c);
    if (!id.ok) return id.response;

    try {
      return c.json({ data: await service.abandonMatch(id.data) });
    } catch (error) {
      return errorResponse(c, error);
    }
  });

  // ==== █ ENDPOINT: DELETE /:id
  matchesApp.delete("/:id", async (c) => {
    const id = parseMatchId(c);
    if (!id.ok) return id.response;

    try {
      await service.deleteMatch(id.data);
      return c.body(null, 204);
    } catch (error) {
      return errorResponse(c, error);
    }
  });

  return matchesApp;
}
