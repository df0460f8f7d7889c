/**
 * Process logger: pretty console output in development, JSON lines in
 * production, plus an optional JSON-lines execution log file per run.
 */

import { pino, type Logger } from "pino";

export type LogLevel = pino.LevelWithSilent;

export interface LoggerOptions {
  level: LogLevel;
  /** Colourised console output (default: NODE_ENV !== "production") */
  pretty?: boolean;
  /** Also write to the console (default: true) */
  console?: boolean;
  /** JSON-lines log file; parent directories are created */
  file?: string;
}

/** `collector_<YYYYMMDD_HHMMSS>.log` */
export function executionLogName(date: Date): string {
  const stamp = date.toISOString().slice(0, 19).replace(/[-:]/g, "").replace("T", "_");
  return `collector_${stamp}.log`;
}

export function createLogger(options: LoggerOptions): Logger {
  const { level } = options;
  if (level === "silent") return pino({ level });

  const isDev = process.env.NODE_ENV !== "production";
  const streams: pino.StreamEntry[] = [];

  if (options.console ?? true) {
    streams.push({
      level,
      stream: (options.pretty ?? isDev)
        ? pino.transport({ target: "pino-pretty", options: { colorize: true } })
        : pino.destination(1),
    });
  }
  if (options.file) {
    streams.push({
      level,
      stream: pino.destination({ dest: options.file, mkdir: true, sync: true }),
    });
  }

  return pino(
    { level, timestamp: pino.stdTimeFunctions.isoTime },
    pino.multistream(streams),
  );
}
