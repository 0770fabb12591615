import pino from "pino";
import pretty from "pino-pretty";

/**
 * The subset of the pino API the installer components log through.
 */
export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export function createLogger(options: { logLevel?: string; name?: string } = {}) {
  // stderr, flushed synchronously: the CLI exits right after logging a failure
  const stream = pretty({
    colorize: true,
    translateTime: "HH:MM:ss",
    ignore: "pid,hostname,time,name",
    destination: 2,
    sync: true,
  });

  return pino(
    {
      name: options.name ?? "cli",
      level: options.logLevel ?? "info",
    },
    stream
  );
}
