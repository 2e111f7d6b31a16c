/**
 * █ [CORE] :: HTTP_ENTRY_POINT
 * =====================================================================
 * DESC:   Punto de entrada del backend de Cricket Live Scoring.
 *         Orquesta Hono (Router), Node (Server), node-ws (WebSocket),
 *         Drizzle/Postgres o memoria (Store) y Upstash (Redis).
 * STATUS: STABLE
 * =====================================================================
 */
import "dotenv/config";
import { serve } from "@hono/node-server";
import { getConnInfo } from "@hono/node-server/conninfo";
import { createNodeWebSocket } from "@hono/node-ws";
import { createApp } from "./app.ts";
import { loadConfig, rateLimitConfig } from "./config.ts";
import { MatchService } from "./controllers/match.ts";
import { createDb } from "./db/db.ts";
import { DrizzleMatchStore } from "./db/drizzle-store.ts";
import type { MatchStore } from "./db/match-store.ts";
import { MemoryMatchStore } from "./db/memory-store.ts";
import { createUpstashLimiter, rateLimit } from "./lib/rate-limit.ts";
import { requireScorerPin } from "./lib/scorer-pin.ts";
import { LiveHub, type LiveSocket } from "./ws/server.ts";

// =============================================================================
// █ CONFIG: ENTORNO
// =============================================================================
const config = loadConfig();

// =============================================================================
// █ INFRA: STORE
// =============================================================================
function createStore(): MatchStore {
  if (!config.DATABASE_URL) {
    console.warn(
      `[WARN]  :: NO_DATABASE   :: DATABASE_URL vacía. Usando memory store (no persiste).`,
    );
    return new MemoryMatchStore();
  }
  console.log(`[DB]    :: POSTGRES      :: ssl: ${config.DATABASE_SSL}`);
  return new DrizzleMatchStore(
    createDb(config.DATABASE_URL, { ssl: config.DATABASE_SSL }),
  );
}

const store = createStore();
const hub = new LiveHub();
const service = new MatchService({ store, notifier: hub });
hub.setReader(service);

// =============================================================================
// █ INFRA: UPSTASH REDIS (RATE LIMITING)
// =============================================================================
const limits = config.NODE_ENV === "test" ? null : rateLimitConfig(config);
const rateLimiter = limits
  ? rateLimit(createUpstashLimiter(limits), (c) => getConnInfo(c).remote.address)
  : undefined;

if (limits) {
  console.log(
    `[SEC]   :: RATE_LIMIT    :: ${limits.requests} req / ${limits.window} per IP`,
  );
}

// =============================================================================
// █ APP: HONO ROUTER + WEBSOCKET
// =============================================================================
const app = createApp({
  service,
  requirePin: requireScorerPin(config.SCORER_PIN_HASH),
  rateLimiter,
});

const { injectWebSocket, upgradeWebSocket } = createNodeWebSocket({ app });

/**
 * ◼️ ENDPOINT: WEBSOCKET HANDSHAKE
 * ---------------------------------------------------------
 * Un LiveSocket por conexión; el hub no conoce node-ws.
 */
app.get(
  "/ws",
  upgradeWebSocket(() => {
    let client: LiveSocket | null = null;

    return {
      onOpen(_event, ws) {
        const socket: LiveSocket = {
          send: (data) => ws.send(data),
          get readyState() {
            return ws.readyState;
          },
        };
        client = socket;
        hub.handleOpen(socket);
      },
      onMessage(event) {
        if (!client) return;
        const raw = typeof event.data === "string" ? event.data : "";
        hub.handleMessage(client, raw).catch((error: unknown) => {
          console.error(`[WS]    :: MSG_ERR       ::`, error);
        });
      },
      onClose() {
        if (client) hub.handleClose(client);
        client = null;
      },
    };
  }),
);

// =============================================================================
// █ SERVER
// =============================================================================
const server = serve(
  { fetch: app.fetch, port: config.PORT, hostname: config.HOST },
  (info) => {
    const host = config.HOST === "0.0.0.0" ? "localhost" : config.HOST;
    const baseUrl = `http://${host}:${info.port}`;
    console.log(`[SYS]   ++ HTTP_READY    :: ${baseUrl}`);
    console.log(`[SYS]   ++ WS_READY      :: ${baseUrl.replace("http", "ws")}/ws`);
  },
);

injectWebSocket(server);

// [SHUTDOWN] -> Cierra el servidor y después el pool
function shutdown(signal: string): void {
  console.log(`[SYS]   -- SHUTDOWN      :: ${signal}`);
  server.close(() => {
    store
      .close()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        console.error(`[ERR]   :: STORE_CLOSE   ::`, error);
        process.exit(1);
      });
  });
}

process.on("SIGINT", () => shutdown("SIGINT"));
process.on("SIGTERM", () => shutdown("SIGTERM"));
