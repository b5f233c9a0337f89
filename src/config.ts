import { ConfigurationError } from "./engine/index.js";
import { isLogLevel, type LogLevel } from "./logger.js";

export interface Config {
  server: {
    port: number;
    transport: "stdio" | "http";
    corsOrigins: string[];
  };
  forecast: {
    /** Default forecast window length in days. */
    days: number;
    /** Default look-ahead for upcoming transactions. */
    upcomingDays: number;
  };
  dbPath: string;
  logLevel: LogLevel;
}

type Env = Record<string, string | undefined>;

export function loadConfig(
  env: Env = process.env,
  args: string[] = process.argv.slice(2),
): Config {
  const transport = resolveTransport(env, args);
  const logLevel = env.LOG_LEVEL || "info";
  if (!isLogLevel(logLevel)) {
    throw new ConfigurationError(
      `Invalid LOG_LEVEL "${logLevel}" (expected debug|info|warn|error)`,
    );
  }

  return {
    server: {
      port: positiveInt(env, "PORT", 3200),
      transport,
      corsOrigins: (env.CORS_ORIGINS || "*").split(",").map((o) => o.trim()),
    },
    forecast: {
      days: positiveInt(env, "FORECAST_DAYS", 90),
      upcomingDays: positiveInt(env, "UPCOMING_DAYS", 30),
    },
    dbPath: env.DB_PATH || "cashflow-forecast.db",
    logLevel,
  };
}

function resolveTransport(env: Env, args: string[]): "stdio" | "http" {
  // CLI flag takes precedence
  const transportIdx = args.indexOf("--transport");
  if (transportIdx !== -1) {
    const val = args[transportIdx + 1];
    if (val === "stdio" || val === "http") return val;
    throw new ConfigurationError(`Invalid --transport "${val ?? ""}" (expected stdio|http)`);
  }

  // Then env var
  const envTransport = env.TRANSPORT;
  if (envTransport === "stdio" || envTransport === "http") return envTransport;

  // Default
  return "stdio";
}

function positiveInt(env: Env, key: string, fallback: number): number {
  const raw = env[key];
  if (!raw) return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigurationError(`${key} must be a positive integer, got "${raw}"`);
  }
  return value;
}
