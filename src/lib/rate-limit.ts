/**
 * █ [SEC] :: RATE_LIMITER
 * =====================================================================
 * DESC:   Sliding window por IP sobre Upstash Redis.
 *         Fail-open: si Redis cae, la petición pasa.
 * STATUS: STABLE
 * =====================================================================
 */
import { Ratelimit } from "@upstash/ratelimit";
import { Redis } from "@upstash/redis";
import type { Context, MiddlewareHandler } from "hono";
import type { RateLimitConfig } from "../config.ts";

export interface LimitDecision {
  success: boolean;
  remaining: number;
}

/** Lo mínimo que el middleware necesita de `Ratelimit`. */
export interface Limiter {
  limit(identifier: string): Promise<LimitDecision>;
}

export type ClientIpResolver = (c: Context) => string | undefined;

// [SECURITY] -> Limit length (IPv6 max 45 chars)
const MAX_IP_LENGTH = 45;

export function createUpstashLimiter(config: RateLimitConfig): Limiter {
  // 1. CLIENT CONNECTION
  const redis = new Redis({ url: config.url, token: config.token });

  // 2. LIMITER STRATEGY (SLIDING WINDOW)
  return new Ratelimit({
    redis,
    limiter: Ratelimit.slidingWindow(config.requests, config.window),
    prefix: "cricket-scorer",
  });
}

/**
 * ◼️ MIDDLEWARE: RATE LIMITER PROTECTOR
 * ---------------------------------------------------------
 * A. Identificar IP (proxy headers -> socket)  B. Preguntar a Redis
 */
export function rateLimit(
  limiter: Limiter,
  socketIp: ClientIpResolver = () => undefined,
): MiddlewareHandler {
  return async (c, next) => {
    // A. IDENTIFICAR
    let ip =
      c.req.header("CF-Connecting-IP") ||
      c.req.header("x-forwarded-for")?.split(",")[0]?.trim();

    if (!ip) {
      ip = socketIp(c);
      if (!ip) {
        console.error(
          `[ERR]   :: IP_UNKNOWN    :: Cannot identify client IP. Rejecting request.`,
        );
        return c.text("Unable to identify client", 400);
      }
      console.warn(
        `[WARN]  :: IP_FALLBACK   :: Missing proxy headers. Using socket IP: ${ip}`,
      );
    }

    ip = ip.slice(0, MAX_IP_LENGTH);

    // B. VERIFICAR
    let decision: LimitDecision;
    try {
      decision = await limiter.limit(ip);
    } catch (error) {
      console.error(
        `[ERR]   :: RATELIMIT_ERR :: ip: ${ip} | Fail-open applied`,
        error,
      );
      decision = { success: true, remaining: Infinity };
    }

    if (!decision.success) {
      console.log(`[SEC]   :: RATE_LIMITED  :: ip: ${ip} | ACTION: BLOCKED`);
      return c.json({ error: "Rate limit exceeded." }, 429);
    }

    c.header("X-RateLimit-Remaining", String(decision.remaining));
    await next();
  };
}
