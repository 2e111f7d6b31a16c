/**
 * █ [CORE] :: APP_FACTORY
 * =====================================================================
 * DESC:   Monta el router Hono con sus dependencias inyectadas.
 *         Sin efectos al importar: index.ts arranca el servidor y los
 *         tests llaman a `app.request()` directamente.
 * STATUS: STABLE
 * =====================================================================
 */
import { Hono, type MiddlewareHandler } from "hono";
import type { MatchService } from "./controllers/match.ts";
import { createMatchesApp, errorResponse } from "./routes/matches.ts";

export interface AppDeps {
  service: MatchService;
  requirePin: MiddlewareHandler;
  /** Opcional: solo con Upstash configurado. */
  rateLimiter?: MiddlewareHandler;
}

export function createApp(deps: AppDeps): Hono {
  const app = new Hono();

  // [MIDDLEWARE] -> Global Request Logger
  app.use("*", async (c, next) => {
    const url = new URL(c.req.url);
    console.log(
      `[HTTP]  :: INCOMING_REQ  :: method: ${c.req.method} | path: ${url.pathname}`,
    );
    await next();
  });

  /**
   * ◼️ MIDDLEWARE: RATE LIMITER PROTECTOR
   * ---------------------------------------------------------
   * API y handshake /ws. Se monta antes que el PIN.
   */
  if (deps.rateLimiter) {
    app.use("/api/*", deps.rateLimiter);
    app.use("/ws", deps.rateLimiter);
  }

  // [RUTAS] -> Montar Sub-Aplicaciones
  app.route("/api/matches", createMatchesApp(deps.service, deps.requirePin));

  // [VITALIDAD] (HEALTH CHECK)
  app.get("/", (c) => {
    return c.json({
      status: "online",
      system: "Hono + Node + TypeScript",
      message: "Cricket Live Scoring API is operational",
    });
  });

  app.notFound((c) => c.json({ error: "Not Found" }, 404));
  app.onError((error, c) => errorResponse(c, error));

  return app;
}
