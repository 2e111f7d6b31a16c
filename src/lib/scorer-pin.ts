/**
 * █ [SEC] :: SCORER_PIN
 * =====================================================================
 * DESC:   Solo el anotador muta partidos. Header `X-Scorer-Pin`
 *         comparado con el hash bcrypt de SCORER_PIN_HASH.
 *         Hash vacío -> toda mutación se rechaza.
 * STATUS: STABLE
 * =====================================================================
 */
import bcrypt from "bcryptjs";
import type { MiddlewareHandler } from "hono";

export const SCORER_PIN_HEADER = "X-Scorer-Pin";

const SALT_ROUNDS = 10;

export async function hashPin(pin: string, rounds = SALT_ROUNDS): Promise<string> {
  return bcrypt.hash(pin, rounds);
}

export async function verifyPin(pin: string, hash: string): Promise<boolean> {
  if (!pin || !hash) return false;
  return bcrypt.compare(pin, hash);
}

/**
 * ◼️ MIDDLEWARE: REQUIRE_SCORER_PIN
 * ---------------------------------------------------------
 * 403 sin header o con PIN incorrecto.
 */
export function requireScorerPin(pinHash: string): MiddlewareHandler {
  if (!pinHash) {
    console.warn(
      `[WARN]  :: PIN_MISSING   :: SCORER_PIN_HASH vacío. Mutaciones bloqueadas.`,
    );
  }

  return async (c, next) => {
    const pin = c.req.header(SCORER_PIN_HEADER) ?? "";

    let valid = false;
    try {
      valid = await verifyPin(pin, pinHash);
    } catch (error) {
      // [INFO] -> Hash malformado en el entorno: se trata como PIN inválido
      console.error(`[ERR]   :: PIN_VERIFY    :: ${String(error)}`);
    }

    if (!valid) {
      console.log(
        `[SEC]   :: PIN_REJECTED  :: ${c.req.method} ${new URL(c.req.url).pathname}`,
      );
      return c.json({ error: "Invalid or missing Scorer PIN." }, 403);
    }

    await next();
  };
}
