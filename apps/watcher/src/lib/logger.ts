import pino from "pino";

export type Logger = pino.Logger;

/**
 * Creates the service logger. Output is newline-delimited JSON on stdout;
 * components take a child with a `component` binding.
 */
export const createLogger = (level: string): Logger =>
  pino({
    level,
    base: { service: "msig-push-watcher" },
    timestamp: pino.stdTimeFunctions.isoTime
  });

export const silentLogger = (): Logger => pino({ level: "silent" });
