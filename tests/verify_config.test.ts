/**
 * █ [TEST] :: ENV_CONFIG_VERIFICATION
 * =====================================================================
 * DESC:   Defaults, coerciones y reglas cruzadas del entorno.
 * =====================================================================
 */
import { describe, it, expect } from "vitest";
import { loadConfig, rateLimitConfig } from "../src/config.ts";
import { withSslParams } from "../src/db/db.ts";

const UPSTASH = {
  UPSTASH_REDIS_REST_URL: "https://example-redis.upstash.io",
  UPSTASH_REDIS_REST_TOKEN: "test-secret",
};

describe("Env Config Verification", () => {
  it("should fill defaults from an empty environment", () => {
    expect(loadConfig({})).toEqual({
      NODE_ENV: "development",
      PORT: 8000,
      HOST: "0.0.0.0",
      DATABASE_URL: undefined,
      DATABASE_SSL: false,
      SCORER_PIN_HASH: "",
      UPSTASH_REDIS_REST_URL: undefined,
      UPSTASH_REDIS_REST_TOKEN: undefined,
      RATE_LIMIT_REQUESTS: 30,
      RATE_LIMIT_WINDOW: "60 s",
    });
  });

  it("should coerce numbers and flags and treat blanks as unset", () => {
    const config = loadConfig({
      NODE_ENV: "production",
      PORT: "3001",
      DATABASE_URL: "   ",
      DATABASE_SSL: "1",
    });

    expect(config.NODE_ENV).toBe("production");
    expect(config.PORT).toBe(3001);
    expect(config.DATABASE_URL).toBeUndefined();
    expect(config.DATABASE_SSL).toBe(true);
  });

  it("should reject invalid values with the offending variable", () => {
    expect(() => loadConfig({ PORT: "not-a-port" })).toThrow(/^Invalid environment: PORT/);
    expect(() => loadConfig({ RATE_LIMIT_WINDOW: "a minute" })).toThrow(
      /RATE_LIMIT_WINDOW/,
    );
  });

  it("should require both Upstash credentials or neither", () => {
    expect(() =>
      loadConfig({ UPSTASH_REDIS_REST_URL: UPSTASH.UPSTASH_REDIS_REST_URL }),
    ).toThrow(/UPSTASH_REDIS_REST_TOKEN/);
  });

  it("should skip rate limiting without Upstash", () => {
    expect(rateLimitConfig(loadConfig({}))).toBeNull();
  });

  it("should build the limiter settings with a normalised window", () => {
    const config = loadConfig({
      ...UPSTASH,
      RATE_LIMIT_REQUESTS: "10",
      RATE_LIMIT_WINDOW: "10s",
    });

    expect(rateLimitConfig(config)).toEqual({
      url: UPSTASH.UPSTASH_REDIS_REST_URL,
      token: "test-secret",
      requests: 10,
      window: "10 s",
    });
  });

  it("should append the SSL params to the connection string", () => {
    expect(withSslParams("postgres://scorer@localhost/cricket")).toBe(
      "postgres://scorer@localhost/cricket?sslmode=require&uselibpqcompat=true",
    );
    expect(withSslParams("postgres://scorer@localhost/cricket?application_name=api")).toBe(
      "postgres://scorer@localhost/cricket?application_name=api&sslmode=require&uselibpqcompat=true",
    );
  });
});
