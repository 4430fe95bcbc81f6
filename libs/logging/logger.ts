import { pino, type Logger } from "pino";

import { REDACT_KEYS, REDACT_CENSOR } from "./redactionConfig.js";

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;
type LogLevel = typeof LOG_LEVELS[number];

function resolveLevel(raw: string | undefined): LogLevel {
  const level = LOG_LEVELS.find(candidate => candidate === raw);
  return level ?? "info";
}

export const logger = pino({
  level: resolveLevel(process.env.LOG_LEVEL),
  base: {
    system: "payment-connectors"
  },
  redact: {
    paths: REDACT_KEYS,
    censor: REDACT_CENSOR
  }
});

export type { Logger };

/**
 * Returns a child logger carrying the correlation fields of one flow invocation.
 */
export function getFlowLogger(connector: string, flow: string, referenceId?: string): Logger {
  return logger.child({
    connector,
    flow,
    referenceId
  });
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}
