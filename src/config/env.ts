// src/config/env.ts
export type NodeEnv = "development" | "test" | "production";
export type LogLevel =
  | "fatal"
  | "error"
  | "warn"
  | "info"
  | "debug"
  | "trace"
  | "silent";

export type CacheConfig = Readonly<{
  enabled: boolean;
  ttlDays: number;
  refreshIntervalMinutes: number;
  refreshDelayMs: number;
}>;

export type AppEnv = Readonly<{
  nodeEnv: NodeEnv;
  host: string;
  port: number;

  appName: string;
  appVersion: string;

  apiKeys: readonly string[];
  corsOrigins: readonly string[];

  cache: CacheConfig;
  logLevel: LogLevel;
}>;

type EnvSource = Readonly<Record<string, string | undefined>>;

function optStr(src: EnvSource, name: string): string | undefined {
  const t = src[name]?.trim();
  return t ? t : undefined;
}

function parsePort(src: EnvSource, name: string, fallback: number): number {
  const raw = optStr(src, name);
  const v = raw ? Number(raw) : fallback;
  if (!Number.isInteger(v) || v < 1 || v > 65535) {
    throw new Error(`Invalid ${name} (must be 1..65535)`);
  }
  return v;
}

function parseCount(
  src: EnvSource,
  name: string,
  fallback: number,
  min: number,
): number {
  const raw = optStr(src, name);
  if (raw === undefined) return fallback;
  const v = Number(raw);
  if (!Number.isInteger(v) || v < min) {
    throw new Error(`Invalid ${name} (must be an integer >= ${min})`);
  }
  return v;
}

function parseBool(src: EnvSource, name: string, fallback: boolean): boolean {
  const raw = optStr(src, name)?.toLowerCase();
  if (raw === undefined) return fallback;
  if (raw === "true" || raw === "1" || raw === "yes") return true;
  if (raw === "false" || raw === "0" || raw === "no") return false;
  throw new Error(`Invalid ${name} (must be true or false)`);
}

function parseList(raw: string): string[] {
  return raw
    .split(",")
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}

function asOneOf<T extends string>(
  name: string,
  v: string,
  allowed: readonly T[],
): T {
  const match = allowed.find((a) => a === v);
  if (match !== undefined) return match;
  throw new Error(`Invalid ${name}. Allowed: ${allowed.join(", ")}`);
}

export class Env {
  static load(src: EnvSource = process.env): AppEnv {
    const nodeEnv = asOneOf(
      "NODE_ENV",
      optStr(src, "NODE_ENV") ?? "development",
      ["development", "test", "production"] as const,
    );

    const logLevel = asOneOf(
      "LOG_LEVEL",
      optStr(src, "LOG_LEVEL") ?? (nodeEnv === "development" ? "debug" : "info"),
      ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const,
    );

    const apiKeys = parseList(optStr(src, "API_KEYS") ?? "");
    if (apiKeys.length === 0) {
      throw new Error("Missing env: API_KEYS (comma-separated list)");
    }

    const corsRaw = optStr(src, "CORS_ORIGINS") ?? "*";
    const corsOrigins = corsRaw === "*" ? ["*"] : parseList(corsRaw);

    const envObj: AppEnv = Object.freeze({
      nodeEnv,
      host: optStr(src, "HOST") ?? "0.0.0.0",
      port: parsePort(src, "PORT", 8080),

      appName: optStr(src, "APP_NAME") ?? "Price Cache API",
      appVersion: optStr(src, "APP_VERSION") ?? "1.0.0",

      apiKeys: Object.freeze(apiKeys),
      corsOrigins: Object.freeze(corsOrigins),

      cache: Object.freeze({
        enabled: parseBool(src, "CACHE_ENABLED", true),
        ttlDays: parseCount(src, "CACHE_TTL_DAYS", 7, 0),
        refreshIntervalMinutes: parseCount(
          src,
          "CACHE_REFRESH_INTERVAL_MINUTES",
          30,
          1,
        ),
        refreshDelayMs: parseCount(src, "CACHE_REFRESH_DELAY_MS", 500, 0),
      }),

      logLevel,
    });

    return envObj;
  }
}
