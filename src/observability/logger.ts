export const LOG_LEVELS = ["debug", "info", "warn", "error", "silent"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export type LogPayload = Record<string, unknown>;

export interface Logger {
  readonly scope: string;
  readonly level: LogLevel;
  debug(event: string, payload?: LogPayload): void;
  info(event: string, payload?: LogPayload): void;
  warn(event: string, payload?: LogPayload): void;
  error(event: string, payload?: LogPayload): void;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

type EmitLevel = Exclude<LogLevel, "silent">;

const SINKS: Record<EmitLevel, (...args: unknown[]) => void> = {
  debug: (...args) => console.debug(...args),
  info: (...args) => console.info(...args),
  warn: (...args) => console.warn(...args),
  error: (...args) => console.error(...args),
};

/**
 * Scoped structured logger. Each event is a single console call of the form
 * `[Scope] { event, ts, ...payload }`.
 */
export function createLogger(scope: string, level: LogLevel = "info"): Logger {
  const tag = `[${String(scope || "").trim() || "app"}]`;
  const threshold = LEVEL_RANK[level];

  const emit = (emitLevel: EmitLevel, event: string, payload?: LogPayload): void => {
    if (LEVEL_RANK[emitLevel] < threshold) return;
    SINKS[emitLevel](tag, {
      event,
      ts: new Date().toISOString(),
      ...payload,
    });
  };

  return {
    scope: tag.slice(1, -1),
    level,
    debug: (event, payload) => emit("debug", event, payload),
    info: (event, payload) => emit("info", event, payload),
    warn: (event, payload) => emit("warn", event, payload),
    error: (event, payload) => emit("error", event, payload),
  };
}
