/**
 * Pino logger factory - JSON lines on stdout.
 *
 * Reads LOG_LEVEL directly instead of going through loadEnv() so that
 * importing a logger never triggers env validation. Silenced under Vitest
 * and NODE_ENV=test; pipe through pino-pretty for human-readable output.
 */

import pino from "pino";
import type { Logger } from "pino";

export type { Logger } from "pino";

export function makeLogger(bindings?: Record<string, unknown>): Logger {
  const isVitest = process.env.VITEST === "true";
  const nodeEnv = process.env.NODE_ENV ?? "development";
  const level = process.env.LOG_LEVEL ?? "info";

  return pino({
    level,
    enabled: !(isVitest || nodeEnv === "test"),
    base: { ...bindings, app: "playwright-pom-starter" },
    messageKey: "msg",
    timestamp: pino.stdTimeFunctions.isoTime,
  });
}

