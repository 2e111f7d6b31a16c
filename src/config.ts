/**
 * █ [CORE] :: ENV_CONFIG
 * =====================================================================
 * DESC:   Lee y valida el entorno con Zod una sola vez al arrancar.
 *         `dotenv/config` se carga en index.ts, no aquí: los tests
 *         pasan su propio objeto env.
 * STATUS: STABLE
 * =====================================================================
 */
import { z } from "zod";

const booleanFlag = z
  .enum(["true", "false", "1", "0"])
  .default("false")
  .transform((value) => value === "true" || value === "1");

// [INFO] -> "" en .env cuenta como no definido
const optionalString = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value ? value : undefined));

const envSchema = z
  .object({
    NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
    PORT: z.coerce.number().int().positive().max(65535).default(8000),
    HOST: z.string().min(1).default("0.0.0.0"),

    DATABASE_URL: optionalString,
    DATABASE_SSL: booleanFlag,

    SCORER_PIN_HASH: z.string().trim().default(""),

    UPSTASH_REDIS_REST_URL: optionalString.pipe(z.string().url().optional()),
    UPSTASH_REDIS_REST_TOKEN: optionalString,
    RATE_LIMIT_REQUESTS: z.coerce.number().int().positive().default(30),
    RATE_LIMIT_WINDOW: z
      .string()
      .regex(/^\d+\s?(ms|s|m|h|d)$/, "Formato esperado: '60 s', '10 m'...")
      .default("60 s"),
  })
  .superRefine((env, ctx) => {
    // REGLA: credenciales de Upstash -> las dos o ninguna
    if (Boolean(env.UPSTASH_REDIS_REST_URL) !== Boolean(env.UPSTASH_REDIS_REST_TOKEN)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "UPSTASH_REDIS_REST_URL y UPSTASH_REDIS_REST_TOKEN van juntas",
        path: ["UPSTASH_REDIS_REST_TOKEN"],
      });
    }
  });

export type AppConfig = z.infer<typeof envSchema>;

export interface RateLimitConfig {
  url: string;
  token: string;
  requests: number;
  window: RateLimitWindow;
}

export type RateLimitWindow = `${number} ${"ms" | "s" | "m" | "h" | "d"}`;

/**
 * ◼️ LOAD_CONFIG
 * ---------------------------------------------------------
 * Falla al arrancar con la lista de variables inválidas.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid environment: ${issues}`);
  }
  return parsed.data;
}

/** `null` when Upstash is not configured: the limiter is skipped. */
export function rateLimitConfig(config: AppConfig): RateLimitConfig | null {
  if (!config.UPSTASH_REDIS_REST_URL || !config.UPSTASH_REDIS_REST_TOKEN) {
    return null;
  }
  return {
    url: config.UPSTASH_REDIS_REST_URL,
    token: config.UPSTASH_REDIS_REST_TOKEN,
    requests: config.RATE_LIMIT_REQUESTS,
    window: toWindow(config.RATE_LIMIT_WINDOW),
  };
}

function toWindow(raw: string): RateLimitWindow {
  const match = /^(\d+)\s?(ms|s|m|h|d)$/.exec(raw);
  const unit = match?.[2];
  if (!match || !isWindowUnit(unit)) {
    throw new Error(`Invalid RATE_LIMIT_WINDOW: ${raw}`);
  }
  return `${Number(match[1])} ${unit}`;
}

function isWindowUnit(value: string | undefined): value is "ms" | "s" | "m" | "h" | "d" {
  return value === "ms" || value === "s" || value === "m" || value === "h" || value === "d";
}
