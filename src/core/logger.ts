/**
 * Leveled logger for the council runtime.
 *
 * Environment:
 *   COUNCIL_LOG_LEVEL = debug|info|warn|error|silent (default: info)
 *   COUNCIL_LOG_JSON  = 1 for JSONL output (default: text)
 */

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

const isLogLevel = (value: string): value is LogLevel =>
  Object.hasOwn(LEVEL_ORDER, value);

export interface LogSink {
  write(level: LogLevel, line: string): void;
}

export const stdioSink: LogSink = {
  write(level, line) {
    if (level === "warn" || level === "error") {
      process.stderr.write(`${line}\n`);
      return;
    }
    process.stdout.write(`${line}\n`);
  },
};

export interface LoggerOptions {
  level?: LogLevel;
  json?: boolean;
  sink?: LogSink;
  context?: Record<string, string>;
}

export interface Logger {
  debug(msg: string, data?: Record<string, unknown>): void;
  info(msg: string, data?: Record<string, unknown>): void;
  warn(msg: string, data?: Record<string, unknown>): void;
  error(msg: string, data?: Record<string, unknown>): void;
  child(component: string, context?: Record<string, string>): Logger;
}

const envLevel = (): LogLevel => {
  const raw = (process.env.COUNCIL_LOG_LEVEL ?? "info").toLowerCase();
  return isLogLevel(raw) ? raw : "info";
};

export const createLogger = (
  component: string,
  options: LoggerOptions = {},
): Logger => {
  const level = options.level ?? envLevel();
  const json = options.json ?? process.env.COUNCIL_LOG_JSON === "1";
  const sink = options.sink ?? stdioSink;
  const context = options.context ?? {};

  const emit = (
    entryLevel: Exclude<LogLevel, "silent">,
    msg: string,
    data?: Record<string, unknown>,
  ): void => {
    if (LEVEL_ORDER[entryLevel] < LEVEL_ORDER[level]) {
      return;
    }

    const ts = new Date().toISOString();
    if (json) {
      sink.write(
        entryLevel,
        JSON.stringify({
          ts,
          level: entryLevel,
          component,
          ...context,
          msg,
          ...(data ? { data } : {}),
        }),
      );
      return;
    }

    const ctx = Object.entries(context)
      .map(([key, value]) => `${key}=${value}`)
      .join(" ");
    const prefix = `[${ts}] [${entryLevel.toUpperCase().padEnd(5)}] [${component}]${ctx ? ` [${ctx}]` : ""}`;
    sink.write(
      entryLevel,
      data ? `${prefix} ${msg} ${JSON.stringify(data)}` : `${prefix} ${msg}`,
    );
  };

  return {
    debug: (msg, data) => emit("debug", msg, data),
    info: (msg, data) => emit("info", msg, data),
    warn: (msg, data) => emit("warn", msg, data),
    error: (msg, data) => emit("error", msg, data),
    child: (sub, extra) =>
      createLogger(`${component}:${sub}`, {
        level,
        json,
        sink,
        context: { ...context, ...extra },
      }),
  };
};

export const silentLogger = (): Logger =>
  createLogger("silent", { level: "silent" });
