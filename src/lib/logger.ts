/**
 * logger.ts — Shared pino logger for every winebridge module
 *
 * A single pino instance is created on first import and exported here.
 * Every module should import `logger` and call `.child({ module: "<name>" })`
 * so that each entry carries the module it came from.
 *
 * Log level:
 *   • WINEBRIDGE_LOG_LEVEL env var — overrides everything (e.g. "trace", "silent")
 *   • NODE_ENV === "production" → "info"   (NDJSON, no pretty-print)
 *   • otherwise               → "debug"   (pino-pretty, colorised)
 */

import pino from "pino";

const isProd = process.env.NODE_ENV === "production";
const level  = process.env.WINEBRIDGE_LOG_LEVEL ?? (isProd ? "info" : "debug");

export const logger = pino(
  isProd || level === "silent"
    ? { level, name: "winebridge" }
    : {
        level,
        name: "winebridge",
        transport: {
          target:  "pino-pretty",
          options: { colorize: true, destination: 2 },
        },
      }
);
