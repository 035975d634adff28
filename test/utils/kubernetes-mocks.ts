/**
 * Kubernetes Testing Mock Utilities
 * In-process stand-ins for the cluster client and the tunnel transport
 */

import { jest } from '@jest/globals';
import type { V1Pod } from '@kubernetes/client-node';
import { Success, type PodStatusEvent, type Result } from '../../src/domain/types';
import type { PodEventStream, RelayClusterClient } from '../../src/infrastructure/kubernetes/client';
import { WatchEventStream } from '../../src/infrastructure/kubernetes/event-stream';
import type {
  TunnelOpenOptions,
  TunnelTransport,
} from '../../src/infrastructure/kubernetes/port-forward';

export const RELAY_POD = 'kube-relay';

export function podEvent(
  phase: string | undefined,
  type: PodStatusEvent['type'] = 'MODIFIED',
): PodStatusEvent {
  return phase === undefined ? { type, name: RELAY_POD } : { type, name: RELAY_POD, phase };
}

/**
 * Feeds a freshly opened watch stream
 */
export type WatchScript = (stream: WatchEventStream<PodStatusEvent>) => void;

export interface FakeClusterOptions {
  /**
   * An Error makes create throw instead of returning a Result.
   */
  create?: Result<string> | Error;
  remove?: Result<void>;
  watch?: Result<PodEventStream>;
  script?: WatchScript;
  onCreate?: () => void;
  onDelete?: () => void;
}

export function createFakeCluster(options: FakeClusterOptions = {}) {
  const calls: string[] = [];
  const streams: WatchEventStream<PodStatusEvent>[] = [];
  const script: WatchScript = options.script ?? ((stream) => stream.push(podEvent('Running')));

  const create = jest.fn(async (namespace: string, pod: V1Pod): Promise<Result<string>> => {
    const name = pod.metadata?.name ?? RELAY_POD;
    calls.push(`create ${namespace}/${name}`);
    options.onCreate?.();
    const outcome = options.create;
    if (outcome instanceof Error) {
      throw outcome;
    }
    return outcome ?? Success(name);
  });

  const remove = jest.fn(async (namespace: string, name: string): Promise<Result<void>> => {
    calls.push(`delete ${namespace}/${name}`);
    options.onDelete?.();
    return options.remove ?? Success(undefined);
  });

  const watch = jest.fn(async (namespace: string, name: string): Promise<Result<PodEventStream>> => {
    calls.push(`watch ${namespace}/${name}`);
    if (options.watch) {
      return options.watch;
    }
    const stream = new WatchEventStream<PodStatusEvent>();
    streams.push(stream);
    script(stream);
    return Success(stream);
  });

  const client: RelayClusterClient = { create, delete: remove, watch };
  return { client, create, remove, watch, calls, streams };
}

export type TunnelBehaviour = (options: TunnelOpenOptions) => Promise<void>;

export function untilAborted(signal: AbortSignal): Promise<void> {
  return new Promise<void>((resolve) => {
    if (signal.aborted) {
      resolve();
      return;
    }
    signal.addEventListener('abort', () => resolve(), { once: true });
  });
}

/**
 * Never settles, whatever happens to the tunnel signal
 */
export function forever(): Promise<void> {
  return new Promise<void>(() => undefined);
}

/**
 * Listener comes up and stays open until the tunnel is closed
 */
export const holdOpen: TunnelBehaviour = (options) => {
  options.onReady();
  return untilAborted(options.signal);
};

/**
 * Listener comes up and the transport ignores the tunnel signal
 */
export const blockForever: TunnelBehaviour = (options) => {
  options.onReady();
  return forever();
};

export const closeAfterReady: TunnelBehaviour = async (options) => {
  options.onReady();
};

export function createFakeTransport(behaviour: TunnelBehaviour = holdOpen) {
  const opened: TunnelOpenOptions[] = [];
  const open = jest.fn((options: TunnelOpenOptions): Promise<void> => {
    opened.push(options);
    return behaviour(options);
  });
  const transport: TunnelTransport = { open };
  return { transport, open, opened };
}
