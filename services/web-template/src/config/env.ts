import path from "node:path";
import { fileURLToPath } from "node:url";

const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export interface EnvConfig {
  port: number;
  host: string;
  templatesDir: string;
  staticDir: string;
  liveReload: boolean;
  logLevel: LogLevel;
  exposeInternalErrors: boolean;
  otel: {
    endpoint?: string;
    serviceName: string;
    diagLevel?: string;
  };
}

export type EnvSource = Record<string, string | undefined>;

// Defaults resolve against the package root so the server starts from any working directory.
const packageRoot = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "..", "..");

export const DEFAULT_PORT = 4000;
export const DEFAULT_TEMPLATES_DIR = path.join(packageRoot, "templates");
export const DEFAULT_STATIC_DIR = path.join(packageRoot, "static");

function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

export function loadEnv(env: EnvSource = process.env): EnvConfig {
  const parseBool = (raw: string | undefined, fallback: boolean) => {
    const v = (raw ?? "").trim().toLowerCase();
    if (!v) return fallback;
    return v === "true" || v === "1";
  };

  const portRaw = (env.PORT || String(DEFAULT_PORT)).trim();
  // Decimal digits only; Number() would also take "0x1F90" or "1e3".
  const port = /^\d+$/.test(portRaw) ? Number(portRaw) : NaN;
  if (!Number.isInteger(port) || port <= 0 || port > 65535) {
    throw new Error("PORT must be an integer between 1 and 65535");
  }

  const host = env.HOST?.trim() || "0.0.0.0";

  const templatesDir = path.resolve(env.TEMPLATES_DIR || DEFAULT_TEMPLATES_DIR);
  const staticDir = path.resolve(env.STATIC_DIR || DEFAULT_STATIC_DIR);

  // Live reload is a development convenience; production opts out unless asked explicitly.
  const isProduction = (env.NODE_ENV ?? "").toLowerCase() === "production";
  const liveReload = parseBool(env.LIVE_RELOAD, !isProduction);

  const logLevelRaw = (env.LOG_LEVEL ?? "info").trim().toLowerCase();
  if (!isLogLevel(logLevelRaw)) {
    throw new Error(`LOG_LEVEL must be one of: ${LOG_LEVELS.join(", ")}`);
  }

  const endpoint = env.OTEL_EXPORTER_OTLP_ENDPOINT?.trim() || undefined;

  return {
    port,
    host,
    templatesDir,
    staticDir,
    liveReload,
    logLevel: logLevelRaw,
    exposeInternalErrors: parseBool(env.EXPOSE_INTERNAL_ERRORS, false),
    otel: {
      endpoint,
      serviceName: env.OTEL_SERVICE_NAME?.trim() || "web-template",
      diagLevel: env.OTEL_DIAGNOSTIC_LOG_LEVEL?.trim() || undefined
    }
  };
}
