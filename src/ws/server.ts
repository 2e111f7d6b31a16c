/**
 * █ [CORE] :: WEBSOCKET_HUB
 * =====================================================================
 * DESC:   Gestiona conexiones en tiempo real, suscripciones por partido
 *         y broadcasting. Independiente del transporte: recibe sockets
 *         mínimos (send + readyState), así se prueba con fakes.
 * STATUS: STABLE
 * =====================================================================
 */
import type {
  MatchNotifier,
  MatchReader,
  MatchUpdate,
  ServerMessage,
} from "../types/live.ts";
import type { MatchView } from "../types/matches.ts";
import { clientMessageSchema, type ClientMessage } from "../validation/live_message.ts";
import { isScoringError } from "../lib/errors.ts";

/** Lo mínimo de un socket: el WSContext de Hono ya lo cumple. */
export interface LiveSocket {
  send(data: string): void;
  readonly readyState: number;
}

const WS_OPEN = 1;
const PREVIEW_LENGTH = 50;

export class LiveHub implements MatchNotifier {
  // [GLOBAL CHANNEL] -> Todos escuchan eventos globales (ej: nuevo partido)
  private readonly clients = new Set<LiveSocket>();
  private readonly matchSubscribers = new Map<string, Set<LiveSocket>>();

  constructor(
    private reader: MatchReader | null = null,
    private readonly clock: () => number = Date.now,
  ) {}

  /** El servicio se construye después del hub (lo necesita como notifier). */
  setReader(reader: MatchReader): void {
    this.reader = reader;
  }

  get connectionCount(): number {
    return this.clients.size;
  }

  subscriberCount(matchId: string): number {
    return this.matchSubscribers.get(matchId)?.size ?? 0;
  }

  // =============================================================================
  // █ HANDLERS: SOCKET EVENTS
  // =============================================================================
  handleOpen(socket: LiveSocket): void {
    this.clients.add(socket);
    console.log(`[WS]    :: CONNECTED     :: clients: ${this.clients.size}`);

    // [ACK] -> Saludo inicial para confirmar conexión
    this.sendJson(socket, {
      type: "WELCOME",
      payload: "Connected to Cricket Live Scoring feed",
    });
  }

  handleClose(socket: LiveSocket): void {
    this.clients.delete(socket);
    for (const matchId of [...this.matchSubscribers.keys()]) {
      this.unsubscribe(matchId, socket);
    }
    console.log(`[WS]    :: DISCONNECTED  :: clients: ${this.clients.size}`);
  }

  /**
   * ◼️ ROUTER: HANDLE_MESSAGE
   * ---------------------------------------------------------
   * JSON -> Zod -> según 'type'. Los errores vuelven solo al emisor.
   */
  async handleMessage(socket: LiveSocket, raw: string): Promise<void> {
    const preview = `${raw.slice(0, PREVIEW_LENGTH)}${raw.length > PREVIEW_LENGTH ? "..." : ""}`;
    console.log(`[WS]    :: MSG_REC       :: preview: ${preview}`);

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch {
      this.sendJson(socket, { type: "ERROR", payload: "Invalid JSON" });
      return;
    }

    const parsed = clientMessageSchema.safeParse(json);
    if (!parsed.success) {
      this.sendJson(socket, { type: "ERROR", payload: "Invalid message" });
      return;
    }

    await this.route(socket, parsed.data);
  }

  private async route(socket: LiveSocket, message: ClientMessage): Promise<void> {
    const { matchId } = message;

    switch (message.type) {
      case "SUBSCRIBE": {
        // [INIT] -> Solo se registra si el snapshot existe
        await this.reply(socket, "Failed to fetch match state", async (reader) => {
          const match = await reader.getMatch(matchId);
          this.subscribe(matchId, socket);
          this.sendJson(socket, {
            type: "SUBSCRIBED",
            matchId,
            payload: `Subscribed to match ${matchId}`,
          });
          this.sendJson(socket, this.updateMessage({
            matchId,
            reason: "snapshot",
            match,
            lastBall: null,
          }));
        });
        return;
      }

      case "UNSUBSCRIBE":
        this.unsubscribe(matchId, socket);
        this.sendJson(socket, {
          type: "UNSUBSCRIBED",
          matchId,
          payload: `Unsubscribed from match ${matchId}`,
        });
        return;

      case "REQUEST_SCORECARD":
        await this.reply(socket, "Scorecard request failed", async (reader) => {
          const data = await reader.getScorecard(matchId);
          this.sendJson(socket, { type: "SCORECARD", matchId, data });
        });
        return;
    }
  }

  private async reply(
    socket: LiveSocket,
    failure: string,
    task: (reader: MatchReader) => Promise<void>,
  ): Promise<void> {
    if (!this.reader) {
      this.sendJson(socket, { type: "ERROR", payload: failure });
      return;
    }
    try {
      await task(this.reader);
    } catch (error) {
      const detail = isScoringError(error) ? error.message : "Internal error";
      if (!isScoringError(error)) {
        console.error(`[WS]    :: READ_ERR      ::`, error);
      }
      this.sendJson(socket, { type: "ERROR", payload: `${failure}: ${detail}` });
    }
  }

  // =============================================================================
  // █ SUBSCRIPTIONS
  // =============================================================================
  private subscribe(matchId: string, socket: LiveSocket): void {
    let subscribers = this.matchSubscribers.get(matchId);
    if (!subscribers) {
      subscribers = new Set();
      this.matchSubscribers.set(matchId, subscribers);
    }
    subscribers.add(socket);
  }

  private unsubscribe(matchId: string, socket: LiveSocket): void {
    const subscribers = this.matchSubscribers.get(matchId);
    if (!subscribers) return;
    subscribers.delete(socket);
    if (subscribers.size === 0) this.matchSubscribers.delete(matchId);
  }

  // =============================================================================
  // █ NOTIFIER (SERVICE -> CLIENTS)
  // =============================================================================
  matchCreated(match: MatchView): void {
    console.log(`[WS]    -> BROADCAST     :: event: MATCH_CREATED | id: ${match.id}`);
    this.fanOut(this.clients, { type: "MATCH_CREATED", data: match });
  }

  matchUpdated(update: MatchUpdate): void {
    const subscribers = this.matchSubscribers.get(update.matchId);
    if (!subscribers || subscribers.size === 0) return;
    console.log(
      `[WS]    -> BROADCAST     :: event: MATCH_UPDATE | id: ${update.matchId} | reason: ${update.reason}`,
    );
    this.fanOut(subscribers, this.updateMessage(update));
  }

  private updateMessage(update: MatchUpdate): ServerMessage {
    return { type: "MATCH_UPDATE", timestamp: this.clock(), ...update };
  }

  // =============================================================================
  // █ UTILITIES: LOW LEVEL
  // =============================================================================
  private fanOut(sockets: Iterable<LiveSocket>, payload: ServerMessage): void {
    const message = JSON.stringify(payload);
    for (const client of sockets) {
      if (client.readyState !== WS_OPEN) continue;
      try {
        client.send(message);
      } catch (error) {
        console.error(`[WS]    :: BROADCAST_ERR :: send failed`, error);
      }
    }
  }

  private sendJson(socket: LiveSocket, payload: ServerMessage): void {
    if (socket.readyState !== WS_OPEN) return;
    try {
      socket.send(JSON.stringify(payload));
    } catch (error) {
      console.error(`[ERR]   :: JSON_SEND_ERR :: type: ${payload.type}`, error);
    }
  }
}
