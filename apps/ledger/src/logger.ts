/**
 * Root logger. Components log through `logger.child({ component })`;
 * the HTTP server hands the same instance to Fastify.
 */

import { pino, type Logger } from "pino";

export type { Logger };

export function createLogger(level: string = "info"): Logger {
  return pino({ level, base: { service: "stampnet-ledger" } });
}

/** Logger that drops everything, for tests. */
export function silentLogger(): Logger {
  return pino({ level: "silent" });
}
