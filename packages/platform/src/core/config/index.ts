/**
 * Application Configuration
 *
 * Loads configuration from environment variables with sensible defaults.
 * All config is validated at startup — fail fast if misconfigured.
 */

export interface AppConfig {
  env: string;
  database: {
    url: string;
  };
  api: {
    port: number;
    host: string;
  };
  cors: {
    /** Allowed origins, or true to reflect any origin (development) */
    origin: string[] | true;
  };
  rateLimit: {
    max: number;
    windowMs: number;
  };
}

function parseInteger(name: string, raw: string | undefined, fallback: number): number {
  if (raw === undefined || raw.trim() === "") return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 0) {
    throw new Error(`${name} must be a non-negative integer, got "${raw}".`);
  }
  return value;
}

/**
 * Loads configuration from the given environment (process.env by default).
 * Throws immediately if required variables are missing or malformed.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const databaseUrl = env.DATABASE_URL;
  if (!databaseUrl) {
    throw new Error(
      "DATABASE_URL environment variable is required. See .env.example."
    );
  }

  const nodeEnv = env.NODE_ENV ?? "development";
  const isProd = nodeEnv === "production";
  const corsOrigin = env.CORS_ORIGIN;

  return {
    env: nodeEnv,
    database: {
      url: databaseUrl,
    },
    api: {
      port: parseInteger("API_PORT", env.API_PORT, 4000),
      host: env.API_HOST ?? "0.0.0.0",
    },
    cors: {
      origin: corsOrigin
        ? corsOrigin.split(",").map((o) => o.trim()).filter(Boolean)
        : true,
    },
    rateLimit: {
      max: parseInteger("RATE_LIMIT_MAX", env.RATE_LIMIT_MAX, isProd ? 100 : 1_000),
      windowMs: parseInteger("RATE_LIMIT_WINDOW_MS", env.RATE_LIMIT_WINDOW_MS, 60_000),
    },
  };
}

/** Masks credentials in a connection string for log output */
export function redactDatabaseUrl(url: string): string {
  return url.replace(/\/\/.*@/, "//***@");
}
