import { LOG_LEVELS } from "../observability/logger.js";
import type { Config } from "./types.js";

export type { Config, HttpConfig, LoggingConfig, TypingConfig } from "./types.js";

export const DEFAULT_CONFIG: Config = {
  http: {
    host: "0.0.0.0",
    port: 3001,
    corsOrigin: "*",
    maxBodyBytes: 1_048_576,
  },
  typing: {
    maxBatchSize: 1_000,
  },
  logging: {
    level: "info",
  },
};

function toNumber(value: string | undefined, fallback: number): number {
  if (!value || !value.trim()) return fallback;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function toIntInRange(
  value: string | undefined,
  fallback: number,
  minValue: number,
  maxValue: number,
): number {
  const parsed = Math.floor(toNumber(value, fallback));
  return Math.max(minValue, Math.min(maxValue, parsed));
}

function toNonEmptyString(value: string | undefined, fallback: string): string {
  const normalized = String(value ?? "").trim();
  return normalized || fallback;
}

function pickEnum<T extends string>(value: string | undefined, allowed: readonly T[], fallback: T): T {
  if (!value) return fallback;
  const normalized = value.trim().toLowerCase();
  return allowed.find((item) => item === normalized) ?? fallback;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const base = DEFAULT_CONFIG;
  return {
    http: {
      host: toNonEmptyString(env.TYPING_HOST, base.http.host),
      port: toIntInRange(env.TYPING_PORT ?? env.PORT, base.http.port, 1, 65_535),
      corsOrigin: toNonEmptyString(env.TYPING_CORS_ORIGIN, base.http.corsOrigin),
      maxBodyBytes: toIntInRange(env.TYPING_MAX_BODY_BYTES, base.http.maxBodyBytes, 1_024, 67_108_864),
    },
    typing: {
      maxBatchSize: toIntInRange(env.TYPING_MAX_BATCH_SIZE, base.typing.maxBatchSize, 1, 100_000),
    },
    logging: {
      level: pickEnum(env.TYPING_LOG_LEVEL, LOG_LEVELS, base.logging.level),
    },
  };
}
