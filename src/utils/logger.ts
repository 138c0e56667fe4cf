/**
 * Logger utility
 */

import { Logger } from "tslog";
import { appendFileSync, mkdirSync } from "node:fs";
import { dirname } from "node:path";
import type { ILogObj } from "tslog";

/** Optional file transport: if LOG_FILE is set, also append formatted lines. */
function buildAttachedTransports(): ((logObj: ILogObj) => void)[] {
  const logFile = process.env.LOG_FILE;
  if (!logFile) return [];

  mkdirSync(dirname(logFile), { recursive: true });

  return [
    (logObj: ILogObj) => {
      const meta = logObj["_meta"];
      const ts =
        typeof meta === "object" && meta !== null && "date" in meta
          ? String(meta.date)
          : new Date().toISOString();
      const parts = Object.values(logObj).filter(
        (v) => typeof v === "string" || typeof v === "number"
      );
      try {
        appendFileSync(logFile, `${ts} ${parts.join(" ")}\n`);
      } catch (err) {
        // Not through the logger: that would recurse into this transport.
        process.stderr.write(`log file write failed: ${String(err)}\n`);
      }
    },
  ];
}

function resolveMinLevel(): number {
  switch (process.env.LOG_LEVEL) {
    case "debug":
      return 2;
    case "warn":
      return 4;
    case "error":
      return 5;
    case "silent":
      return 7;
    default:
      return 3; // info
  }
}

export const logger = new Logger<ILogObj>({
  name: "opsdesk",
  minLevel: resolveMinLevel(),
  prettyLogTemplate:
    "{{yyyy}}-{{mm}}-{{dd}} {{hh}}:{{MM}}:{{ss}} {{logLevelName}} [{{name}}] ",
  attachedTransports: buildAttachedTransports(),
});

export function createLogger(name: string) {
  return logger.getSubLogger({ name });
}
