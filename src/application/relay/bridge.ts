/**
 * Tunnel bridge
 *
 * Runs the blocking tunnel transport and waits on its event sources at once:
 * diagnostic text, transport return, transport failure and interrupt. The
 * first to arrive decides the outcome, except that diagnostic text always
 * wins; it means the tunnel never established correctly.
 */

import { Writable } from 'node:stream';
import type { Logger } from 'pino';
import { DEFAULT_TIMEOUTS } from '../../config/defaults';
import type { RelayEndpoint, ResourceLocator } from '../../domain/types';
import type { TunnelTransport } from '../../infrastructure/kubernetes/port-forward';
import { ErrorCodes, TunnelError, errorMessage, interruptionOf, toError } from '../../lib/errors';
import { createPhaseTimer } from '../../lib/logger';

export interface BridgeOptions {
  locator: ResourceLocator;
  localPort: number;
  remotePort: number;
  listenAddress: string;
  destination: string;
  signal: AbortSignal;
  logger: Logger;
  onReady?: (endpoint: RelayEndpoint) => void;
  /**
   * Upper bound on waiting for the transport to settle once the tunnel is closed.
   */
  closeGraceMs?: number;
}

type TunnelEvent =
  | { kind: 'diagnostic' }
  | { kind: 'closed' }
  | { kind: 'failed'; error: unknown }
  | { kind: 'interrupted' };

async function settlesWithin(event: Promise<TunnelEvent>, ms: number): Promise<boolean> {
  let timeout: NodeJS.Timeout | undefined;
  const expired = new Promise<boolean>((resolve) => {
    timeout = setTimeout(() => resolve(false), ms);
  });
  try {
    return await Promise.race([event.then(() => true), expired]);
  } finally {
    clearTimeout(timeout);
  }
}

/**
 * Resolves when the tunnel closes normally; rejects with TunnelError or InterruptedError.
 */
export async function bridgeTunnel(transport: TunnelTransport, options: BridgeOptions): Promise<void> {
  const { locator, localPort, remotePort, signal, logger } = options;
  const closeGraceMs = options.closeGraceMs ?? DEFAULT_TIMEOUTS.tunnelClose;
  const timer = createPhaseTimer(logger, 'bridge', { pod: locator.name, namespace: locator.namespace }, { localPort });
  const tunnelAbort = new AbortController();
  let diagnosticText = '';
  let ready = false;

  let signalDiagnostic: () => void = () => undefined;
  const diagnosticEvent = new Promise<TunnelEvent>((resolve) => {
    signalDiagnostic = () => resolve({ kind: 'diagnostic' });
  });
  const diagnostics = new Writable({
    write(chunk: Buffer | string, _encoding, callback) {
      const text = chunk.toString();
      if (text.length > 0) {
        diagnosticText += text;
        signalDiagnostic();
      }
      callback();
    },
  });

  let onAbort: () => void = () => undefined;
  const interruptEvent = new Promise<TunnelEvent>((resolve) => {
    onAbort = () => resolve({ kind: 'interrupted' });
    if (signal.aborted) {
      onAbort();
    } else {
      signal.addEventListener('abort', onAbort, { once: true });
    }
  });

  const transportEvent = transport
    .open({
      locator,
      localPort,
      remotePort,
      signal: tunnelAbort.signal,
      diagnostics,
      onReady: () => {
        if (ready) return;
        ready = true;
        timer.mark('listener-ready');
        options.onReady?.({
          listenAddress: options.listenAddress,
          localPort,
          podName: locator.name,
          destination: options.destination,
        });
      },
    })
    .then(
      (): TunnelEvent => ({ kind: 'closed' }),
      (error: unknown): TunnelEvent => ({ kind: 'failed', error }),
    );

  try {
    const event = await Promise.race([diagnosticEvent, transportEvent, interruptEvent]);

    if (diagnosticText.length > 0) {
      throw new TunnelError(
        `Tunnel to pod "${locator.name}" reported: ${diagnosticText.trim()}`,
        ErrorCodes.TUNNEL_DIAGNOSTIC,
        { pod: locator.name, diagnostic: diagnosticText, ready },
      );
    }

    switch (event.kind) {
      case 'interrupted':
        throw interruptionOf(signal);
      case 'failed':
        throw new TunnelError(
          `Tunnel to pod "${locator.name}" failed: ${errorMessage(event.error)}`,
          ErrorCodes.TUNNEL_FAILED,
          { pod: locator.name, ready },
          toError(event.error),
        );
      default:
        timer.end({ ready });
        return;
    }
  } catch (error) {
    timer.fail(error);
    throw error;
  } finally {
    signal.removeEventListener('abort', onAbort);
    tunnelAbort.abort();
    // Teardown goes ahead even when the transport ignores the abort.
    if (!(await settlesWithin(transportEvent, closeGraceMs))) {
      logger.warn(
        { pod: locator.name, closeGraceMs },
        'Tunnel did not close in time; continuing teardown',
      );
    }
    diagnostics.destroy();
  }
}
