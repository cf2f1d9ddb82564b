/**
 * Logger utility
 */

import { Logger } from "tslog";
import { appendFileSync, mkdirSync } from "node:fs";
import { dirname } from "node:path";
import type { ILogObj } from "tslog";

/** Optional file transport: if LOG_FILE is set, also append one line per record. */
function buildAttachedTransports(): ((logObj: ILogObj) => void)[] {
  const logFile = process.env.LOG_FILE;
  if (!logFile) return [];

  try {
    mkdirSync(dirname(logFile), { recursive: true });
  } catch (err) {
    process.stderr.write(`log file disabled: ${logFile}: ${String(err)}\n`);
    return [];
  }

  return [
    (logObj: ILogObj) => {
      const parts = Object.values(logObj).filter(
        (v): v is string | number => typeof v === "string" || typeof v === "number",
      );
      try {
        appendFileSync(logFile, `${new Date().toISOString()} ${parts.join(" ")}\n`);
      } catch (err) {
        // Logging from inside a transport would recurse; use stderr.
        process.stderr.write(`log file write failed: ${String(err)}\n`);
      }
    },
  ];
}

export const logger = new Logger<ILogObj>({
  name: "modelhub",
  minLevel: process.env.LOG_LEVEL === "debug" ? 2 : 3, // debug=2, info=3
  prettyLogTemplate:
    "{{yyyy}}-{{mm}}-{{dd}} {{hh}}:{{MM}}:{{ss}} {{logLevelName}} [{{name}}] ",
  attachedTransports: buildAttachedTransports(),
});

export function createLogger(name: string) {
  return logger.getSubLogger({ name });
}
