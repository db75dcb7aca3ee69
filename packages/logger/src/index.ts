import { Logger } from "tslog";

/** tslog level ids, keyed by the names accepted in STATBEACON_LOG_LEVEL. */
export const LOG_LEVELS = {
  silly: 0,
  trace: 1,
  debug: 2,
  info: 3,
  warn: 4,
  error: 5,
  fatal: 6,
} as const;

export type LogLevelName = keyof typeof LOG_LEVELS;

function isLogLevelName(value: string): value is LogLevelName {
  return Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

/**
 * Resolve the minimum log level.
 * An explicit STATBEACON_LOG_LEVEL wins; otherwise production hides
 * everything below info.
 */
export function resolveMinLevel(env: NodeJS.ProcessEnv = process.env): number {
  const requested = env.STATBEACON_LOG_LEVEL?.trim().toLowerCase();
  if (requested && isLogLevelName(requested)) {
    return LOG_LEVELS[requested];
  }
  return env.NODE_ENV === "production" ? LOG_LEVELS.info : LOG_LEVELS.silly;
}

export function createLogger(name: string): Logger<unknown> {
  return new Logger({
    name,
    type: "pretty",
    minLevel: resolveMinLevel(),
  });
}
