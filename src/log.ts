import pino from "pino";
import type { Logger } from "pino";

export type { Logger };

/**
 * Debug log sink (~/.cache/omnote/debug.log). Rotation and formatting
 * belong to whoever reads the file; we only append.
 */
export function createLogger(debugLogPath: string, debug: boolean): Logger {
  const destination = pino.destination({ dest: debugLogPath, mkdir: true, append: true, sync: false });
  return pino({ level: debug ? "debug" : "info", base: { pid: process.pid } }, destination);
}

export function silentLogger(): Logger {
  return pino({ level: "silent" });
}
