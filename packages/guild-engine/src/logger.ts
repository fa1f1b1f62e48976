import pino from "pino";
import type { Logger, LevelWithSilent } from "pino";

export type { Logger };

export interface LoggerOptions {
  level?: LevelWithSilent;
  name?: string;
}

/**
 * JSON logger on stderr; stdout is reserved for CLI output.
 */
export const createLogger = (options: LoggerOptions = {}): Logger =>
  pino(
    {
      name: options.name ?? "guild-engine",
      level: options.level ?? "info"
    },
    pino.destination(2)
  );

export const silentLogger: Logger = pino({ level: "silent" });
