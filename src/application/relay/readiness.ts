/**
 * Readiness wait - block until the relay pod reports phase Running
 */

import type { Logger } from 'pino';
import type { ResourceLocator } from '../../domain/types';
import {
  ErrorCodes,
  ReadinessError,
  errorMessage,
  interruptionOf,
  isRelayError,
  toError,
} from '../../lib/errors';
import type { RelayClusterClient } from '../../infrastructure/kubernetes/client';

export const RUNNING_PHASE = 'Running';

// A pod in one of these phases never becomes Running again.
const TERMINAL_PHASES: ReadonlySet<string> = new Set(['Succeeded', 'Failed']);

export interface ReadinessOptions {
  signal: AbortSignal;
  /**
   * 0 waits without limit.
   */
  timeoutMs: number;
  logger: Logger;
}

export async function waitForRunning(
  cluster: RelayClusterClient,
  locator: ResourceLocator,
  options: ReadinessOptions,
): Promise<void> {
  const { signal, timeoutMs, logger } = options;
  const details = { namespace: locator.namespace, pod: locator.name };

  if (signal.aborted) {
    throw interruptionOf(signal);
  }

  const watched = await cluster.watch(locator.namespace, locator.name);
  if (!watched.ok) {
    throw new ReadinessError(watched.error, ErrorCodes.READINESS_FAILED, {
      ...details,
      statusCode: watched.statusCode,
    });
  }

  const stream = watched.value;
  const onAbort = (): void => stream.close(interruptionOf(signal));
  signal.addEventListener('abort', onAbort, { once: true });
  if (signal.aborted) {
    onAbort();
  }

  const timer =
    timeoutMs > 0
      ? setTimeout(() => {
          stream.close(
            new ReadinessError(
              `Pod "${locator.name}" did not reach ${RUNNING_PHASE} within ${timeoutMs}ms`,
              ErrorCodes.READINESS_TIMEOUT,
              { ...details, timeoutMs },
            ),
          );
        }, timeoutMs)
      : undefined;

  try {
    for await (const event of stream) {
      switch (event.type) {
        case 'BOOKMARK':
          continue;
        case 'ERROR':
          throw new ReadinessError(
            `Watch for pod "${locator.name}" reported an error: ${event.message ?? 'unknown error'}`,
            ErrorCodes.READINESS_FAILED,
            details,
          );
        case 'DELETED':
          throw new ReadinessError(
            `Pod "${locator.name}" was deleted before it was running`,
            ErrorCodes.READINESS_FAILED,
            details,
          );
        default:
          break;
      }

      if (event.phase === RUNNING_PHASE) {
        logger.info(details, `Pod "${event.name}" is running`);
        return;
      }
      if (event.phase !== undefined && TERMINAL_PHASES.has(event.phase)) {
        throw new ReadinessError(
          `Pod "${event.name}" reached phase ${event.phase} before it was running`,
          ErrorCodes.READINESS_FAILED,
          { ...details, phase: event.phase },
        );
      }
      logger.debug({ ...details, phase: event.phase }, 'Waiting for pod to run');
    }

    throw new ReadinessError(
      `Watch for pod "${locator.name}" ended before it was running`,
      ErrorCodes.READINESS_FAILED,
      details,
    );
  } catch (error) {
    if (isRelayError(error)) {
      throw error;
    }
    throw new ReadinessError(
      `Watch for pod "${locator.name}" failed: ${errorMessage(error)}`,
      ErrorCodes.READINESS_FAILED,
      details,
      toError(error),
    );
  } finally {
    if (timer) clearTimeout(timer);
    signal.removeEventListener('abort', onAbort);
    stream.close();
  }
}
