/**
 * Interrupt context
 *
 * Turns OS signals into an AbortSignal that is handed to the relay controller,
 * so the controller never registers process-wide handlers itself.
 */

import { InterruptedError } from '../lib/errors';

export const INTERRUPT_SIGNALS: readonly NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];

/**
 * Anything signals can be subscribed on; `process` in production
 */
export interface SignalSource {
  on(event: NodeJS.Signals, listener: NodeJS.SignalsListener): unknown;
  removeListener(event: NodeJS.Signals, listener: NodeJS.SignalsListener): unknown;
}

export interface InterruptContextOptions {
  source?: SignalSource;
  signals?: readonly NodeJS.Signals[];
  /**
   * First signal: the context aborts right after this returns.
   */
  onInterrupt?: (signal: NodeJS.Signals) => void;
  /**
   * Any later signal, while teardown is still running.
   */
  onRepeat?: (signal: NodeJS.Signals) => void;
}

export interface InterruptContext {
  readonly signal: AbortSignal;
  readonly received: NodeJS.Signals | undefined;
  dispose: () => void;
}

export function createInterruptContext(options: InterruptContextOptions = {}): InterruptContext {
  const source = options.source ?? process;
  const signals = options.signals ?? INTERRUPT_SIGNALS;
  const controller = new AbortController();
  let received: NodeJS.Signals | undefined;

  const listener: NodeJS.SignalsListener = (signal) => {
    if (received) {
      options.onRepeat?.(signal);
      return;
    }
    received = signal;
    options.onInterrupt?.(signal);
    controller.abort(new InterruptedError(signal));
  };

  for (const signal of signals) {
    source.on(signal, listener);
  }

  return {
    signal: controller.signal,
    get received() {
      return received;
    },
    dispose() {
      for (const signal of signals) {
        source.removeListener(signal, listener);
      }
    },
  };
}
