// src/lib/logger.ts

import pino from 'pino';
import type { Logger } from 'pino';

export type { Logger } from 'pino';

/**
 * JSON logger on stdout. Silent under Vitest or NODE_ENV=test so test
 * output stays readable; pipe through pino-pretty for local reading.
 */
export function makeLogger(bindings?: Record<string, unknown>, level?: string): Logger {
  const isTest = process.env.VITEST === 'true' || process.env.NODE_ENV === 'test';

  return pino({
    level: level ?? process.env.LOG_LEVEL ?? 'info',
    enabled: !isTest,
    base: { ...bindings, service: 'signed-claim-escrow' },
    messageKey: 'msg',
    timestamp: pino.stdTimeFunctions.isoTime,
  });
}

export function makeNoopLogger(): Logger {
  return pino({ enabled: false });
}
