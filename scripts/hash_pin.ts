/**
 * █ SCRIPT: HASH SCORER PIN
 * =====================================================================
 * DESC:   Genera el hash bcrypt para SCORER_PIN_HASH.
 * USAGE:  npm run pin:hash -- 1234
 * =====================================================================
 */
import { hashPin } from "../src/lib/scorer-pin.ts";

const MIN_PIN_LENGTH = 4;

async function main(): Promise<void> {
  const pin = process.argv[2];

  if (!pin || pin.length < MIN_PIN_LENGTH) {
    console.error(`❌ ABORTED: PIN de al menos ${MIN_PIN_LENGTH} caracteres requerido.`);
    process.exit(1);
  }

  const hash = await hashPin(pin);
  console.log("✅ Añade esto a tu .env:");
  console.log(`SCORER_PIN_HASH=${hash}`);
}

main().catch((error: unknown) => {
  console.error("❌ HASH FAILED:", error);
  process.exit(1);
});
