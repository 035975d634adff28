/**
 * Standardized Logger Utility
 *
 * Thin wrapper around Pino with a relay phase timer. Logs go to stderr so that
 * the CLI's own output on stdout stays readable.
 */

import pino from 'pino';
import { ErrorCodes, InterruptedError, errorMessage, isRelayError } from './errors';

export type { Logger } from 'pino';

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

/**
 * Create a Pino logger with kube-relay defaults
 */
export function createLogger(options: pino.LoggerOptions = {}): pino.Logger {
  return pino(
    {
      name: 'kube-relay',
      level: process.env.LOG_LEVEL ?? (process.env.NODE_ENV === 'development' ? 'debug' : 'info'),
      ...options,
    },
    pino.destination({ dest: 2, sync: true }),
  );
}

/**
 * Pod a relay phase acts on
 */
export interface PhaseTarget {
  pod: string;
  namespace?: string;
}

/**
 * Times one phase of a relay run; every method returns the elapsed milliseconds.
 */
export interface PhaseTimer {
  end: (outcome?: Record<string, unknown>) => number;
  fail: (error: unknown, outcome?: Record<string, unknown>) => number;
  mark: (label: string) => number;
}

/**
 * Start timing a relay phase. Interrupts are logged as warnings, other
 * failures as errors carrying their code.
 */
export function createPhaseTimer(
  logger: pino.Logger,
  phase: string,
  target: PhaseTarget,
  context: Record<string, unknown> = {},
): PhaseTimer {
  const startedAt = Date.now();
  const base = { phase, ...target, ...context };
  const elapsed = (): number => Date.now() - startedAt;

  logger.debug(base, `Relay ${phase} started for pod ${target.pod}`);

  return {
    end(outcome = {}) {
      const ms = elapsed();
      logger.info({ ...base, ...outcome, duration_ms: ms }, `Relay ${phase} finished in ${ms}ms`);
      return ms;
    },

    fail(error, outcome = {}) {
      const ms = elapsed();
      const fields = {
        ...base,
        ...outcome,
        duration_ms: ms,
        code: isRelayError(error) ? error.code : ErrorCodes.INTERNAL_ERROR,
        error: errorMessage(error),
      };
      if (error instanceof InterruptedError) {
        logger.warn({ ...fields, signal: error.signal }, `Relay ${phase} interrupted after ${ms}ms`);
      } else {
        logger.error(fields, `Relay ${phase} failed after ${ms}ms`);
      }
      return ms;
    },

    mark(label) {
      const ms = elapsed();
      logger.debug({ ...base, mark: label, elapsed_ms: ms }, `Relay ${phase}: ${label} at ${ms}ms`);
      return ms;
    },
  };
}
