// ─── Logging ─────────────────────────────────────────────────────────────────
//
// pino, always on stderr: stdout belongs to the MCP stdio transport.
// Set PINO_PRETTY=1 for human-readable output while developing.
// ─────────────────────────────────────────────────────────────────────────────

import pino, { type Logger, type LoggerOptions } from "pino";

export type { Logger };

export interface LoggerSettings {
  level?: string;
  pretty?: boolean;
}

export function createLogger(settings: LoggerSettings = {}): Logger {
  const options: LoggerOptions = {
    name: "fl-midi-bridge",
    level: settings.level ?? process.env.LOG_LEVEL ?? "info",
  };

  if (settings.pretty ?? process.env.PINO_PRETTY === "1") {
    options.transport = { target: "pino-pretty", options: { destination: 2 } };
    return pino(options);
  }
  return pino(options, pino.destination(2));
}

/** A logger that discards everything (tests, library use without logging). */
export function silentLogger(): Logger {
  return pino({ level: "silent" });
}
