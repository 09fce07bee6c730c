import dotenv from "dotenv";

dotenv.config();

type EnvSource = Record<string, string | undefined>;

export function requireEnv(name: string, source: EnvSource = process.env): string {
  const value = source[name];
  if (!value) {
    throw new Error(`Missing required environment variable: ${name}`);
  }
  return value;
}

export function loadEnv(source: EnvSource = process.env) {
  return {
    NODE_ENV: source.NODE_ENV || "development",
    PORT: Number(source.PORT || 8080),
    OPENAI_API_KEY: requireEnv("OPENAI_API_KEY", source),
    OPENAI_MODEL: source.OPENAI_MODEL || "gpt-4o-mini",
    CORS_ORIGIN: source.CORS_ORIGIN || "*",
    REPORTS_DIR: source.REPORTS_DIR || "reports"
  };
}

export function loadServerEnv(source: EnvSource = process.env) {
  return {
    ...loadEnv(source),
    JWT_SECRET: requireEnv("JWT_SECRET", source)
  };
}
