import { describe, it, expect } from "vitest";
import { loadEnv, loadServerEnv, requireEnv } from "../env";

describe("loadEnv", () => {
  it("fills in defaults", () => {
    expect(loadEnv({ OPENAI_API_KEY: "test-key" })).toEqual({
      NODE_ENV: "development",
      PORT: 8080,
      OPENAI_API_KEY: "test-key",
      OPENAI_MODEL: "gpt-4o-mini",
      CORS_ORIGIN: "*",
      REPORTS_DIR: "reports"
    });
  });

  it("reads overrides", () => {
    const env = loadEnv({
      OPENAI_API_KEY: "test-key",
      PORT: "4002",
      OPENAI_MODEL: "gpt-4o",
      REPORTS_DIR: "/var/reports"
    });

    expect(env.PORT).toBe(4002);
    expect(env.OPENAI_MODEL).toBe("gpt-4o");
    expect(env.REPORTS_DIR).toBe("/var/reports");
  });

  it("requires an OpenAI key", () => {
    expect(() => loadEnv({})).toThrow("Missing required environment variable: OPENAI_API_KEY");
  });
});

describe("requireEnv", () => {
  it("treats empty values as missing", () => {
    expect(() => requireEnv("JWT_SECRET", { JWT_SECRET: "" })).toThrow(
      "Missing required environment variable: JWT_SECRET"
    );
    expect(requireEnv("JWT_SECRET", { JWT_SECRET: "test-secret" })).toBe("test-secret");
  });
});

describe("loadServerEnv", () => {
  it("adds the JWT secret to the shared settings", () => {
    const env = loadServerEnv({ OPENAI_API_KEY: "test-key", JWT_SECRET: "test-secret" });

    expect(env.JWT_SECRET).toBe("test-secret");
    expect(env.OPENAI_API_KEY).toBe("test-key");
    expect(env.PORT).toBe(8080);
  });

  it("refuses to start without a JWT secret", () => {
    expect(() => loadServerEnv({ OPENAI_API_KEY: "test-key" })).toThrow(
      "Missing required environment variable: JWT_SECRET"
    );
  });
});
