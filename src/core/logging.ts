// src/core/logging.ts
// Structured logging on pino. JSON lines by default; pino-pretty when asked.

import pino from "pino";

export type LogLevel = pino.LevelWithSilent;

export const LOG_LEVELS: readonly LogLevel[] = ["fatal", "error", "warn", "info", "debug", "trace", "silent"];

export interface Logger {
  debug(obj: object, msg?: string): void;
  info(obj: object, msg?: string): void;
  warn(obj: object, msg?: string): void;
  error(obj: object, msg?: string): void;
}

export type LoggerOptions = {
  /** Human-readable output through the pino-pretty transport */
  pretty?: boolean;
  /** Write to stderr, keeping stdout free for command output */
  stderr?: boolean;
};

export const makeLogger = (level: LogLevel = "info", opts: LoggerOptions = {}): Logger => {
  const fd = opts.stderr ? 2 : 1;
  if (opts.pretty) {
    return pino({
      name: "procfsm",
      level,
      transport: {
        target: "pino-pretty",
        options: { colorize: true, translateTime: "HH:MM:ss.l", destination: fd },
      },
    });
  }
  return pino({ name: "procfsm", level }, pino.destination(fd));
};

export const silentLogger = (): Logger => pino({ level: "silent" });

export function isLogLevel(s: string): s is LogLevel {
  return LOG_LEVELS.some((l) => l === s);
}

/**
 * Logger for a logging config section. Writes to stderr unless told
 * otherwise; level "silent" opens no destination.
 */
export const loggerFor = (
  cfg: { level: LogLevel; pretty: boolean },
  opts: { stderr?: boolean } = { stderr: true }
): Logger => (cfg.level === "silent" ? silentLogger() : makeLogger(cfg.level, { pretty: cfg.pretty, stderr: opts.stderr }));
