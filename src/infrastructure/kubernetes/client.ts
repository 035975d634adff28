/**
 * Kubernetes Client - relay pod operations
 *
 * Create, delete and watch the single relay pod through @kubernetes/client-node.
 * Every operation reports failures as a Result so callers decide what is fatal.
 */

import * as k8s from '@kubernetes/client-node';
import type { Logger } from 'pino';
import { z } from 'zod';
import { Success, Failure, type PodStatusEvent, type Result } from '../../domain/types';
import { errorMessage, toError } from '../../lib/errors';
import { WatchEventStream, type EventStream } from './event-stream';

export type PodEventStream = EventStream<PodStatusEvent>;

export interface RelayClusterClient {
  /**
   * Create the pod; resolves with the name the API server stored.
   */
  create: (namespace: string, pod: k8s.V1Pod) => Promise<Result<string>>;
  /**
   * Delete the pod. A pod that does not exist counts as deleted.
   */
  delete: (namespace: string, name: string) => Promise<Result<void>>;
  /**
   * Subscribe to change notifications for the named pod.
   */
  watch: (namespace: string, name: string) => Promise<Result<PodEventStream>>;
}

/**
 * The slices of the client library the relay uses
 */
export interface ClusterApis {
  core: Pick<k8s.CoreV1Api, 'createNamespacedPod' | 'deleteNamespacedPod'>;
  watcher: Pick<k8s.Watch, 'watch'>;
}

const WATCH_EVENT_TYPES = ['ADDED', 'MODIFIED', 'DELETED', 'BOOKMARK', 'ERROR'] as const;

const WatchedPodSchema = z.object({
  metadata: z.object({ name: z.string() }),
  status: z.object({ phase: z.string().optional() }).optional(),
});

const WatchStatusSchema = z.object({
  message: z.string().optional(),
  reason: z.string().optional(),
});

/**
 * Load a kubeconfig from an explicit path or the default locations (KUBECONFIG, ~/.kube/config, in-cluster)
 */
export function loadKubeConfig(kubeconfigPath?: string): k8s.KubeConfig {
  const kc = new k8s.KubeConfig();
  if (kubeconfigPath) {
    kc.loadFromFile(kubeconfigPath);
  } else {
    kc.loadFromDefault();
  }
  return kc;
}

/**
 * Namespace of the current kubeconfig context, if it names one
 */
export function currentNamespace(kc: k8s.KubeConfig): string | undefined {
  return kc.getContextObject(kc.getCurrentContext())?.namespace;
}

export function createClusterApis(kc: k8s.KubeConfig): ClusterApis {
  return {
    core: kc.makeApiClient(k8s.CoreV1Api),
    watcher: new k8s.Watch(kc),
  };
}

/**
 * HTTP status carried by a client-library error, if any
 */
export function statusCodeOf(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null) return undefined;
  if ('statusCode' in error && typeof error.statusCode === 'number') {
    return error.statusCode;
  }
  if (
    'response' in error &&
    typeof error.response === 'object' &&
    error.response !== null &&
    'statusCode' in error.response &&
    typeof error.response.statusCode === 'number'
  ) {
    return error.response.statusCode;
  }
  return undefined;
}

/**
 * Prefer the API server's Status message over the generic transport message
 */
export function describeApiError(error: unknown): string {
  if (typeof error === 'object' && error !== null && 'body' in error) {
    const status = WatchStatusSchema.safeParse(error.body);
    if (status.success && status.data.message) {
      return status.data.message;
    }
  }
  return errorMessage(error);
}

function abortWatchRequest(request: unknown): void {
  if (typeof request === 'object' && request !== null) {
    if ('abort' in request && typeof request.abort === 'function') {
      request.abort();
    }
  }
}

/**
 * Translate one raw watch notification. Returns an Error for unexpected shapes.
 */
export function toPodStatusEvent(type: string, object: unknown, name: string): PodStatusEvent | Error {
  const eventType = WATCH_EVENT_TYPES.find((candidate) => candidate === type);
  if (!eventType) {
    return new Error(`Unexpected watch event type: ${type}`);
  }

  if (eventType === 'ERROR') {
    const status = WatchStatusSchema.safeParse(object);
    const message = status.success ? (status.data.message ?? status.data.reason) : undefined;
    return message === undefined ? { type: eventType, name } : { type: eventType, name, message };
  }
  if (eventType === 'BOOKMARK') {
    return { type: eventType, name };
  }

  const pod = WatchedPodSchema.safeParse(object);
  if (!pod.success) {
    return new Error(`Unexpected object in ${eventType} watch event`);
  }
  const phase = pod.data.status?.phase;
  return phase === undefined
    ? { type: eventType, name: pod.data.metadata.name }
    : { type: eventType, name: pod.data.metadata.name, phase };
}

/**
 * Create a cluster client for the relay pod
 */
export const createRelayClusterClient = (logger: Logger, apis: ClusterApis): RelayClusterClient => {
  const log = logger.child({ component: 'cluster-client' });

  return {
    async create(namespace: string, pod: k8s.V1Pod): Promise<Result<string>> {
      try {
        log.debug({ namespace, name: pod.metadata?.name }, 'Creating pod');
        const { body } = await apis.core.createNamespacedPod(namespace, pod);
        const name = body.metadata?.name ?? pod.metadata?.name;
        if (!name) {
          return Failure('Created pod has no name');
        }
        log.info({ namespace, name }, `Created pod "${name}"`);
        return Success(name);
      } catch (error) {
        const statusCode = statusCodeOf(error);
        return Failure(`Failed to create pod: ${describeApiError(error)}`, statusCode);
      }
    },

    async delete(namespace: string, name: string): Promise<Result<void>> {
      try {
        log.info({ namespace, name }, `Delete pod "${name}"`);
        await apis.core.deleteNamespacedPod(name, namespace);
        return Success(undefined);
      } catch (error) {
        const statusCode = statusCodeOf(error);
        if (statusCode === 404) {
          log.debug({ namespace, name }, 'Pod already absent');
          return Success(undefined);
        }
        return Failure(`Failed to delete pod: ${describeApiError(error)}`, statusCode);
      }
    },

    async watch(namespace: string, name: string): Promise<Result<PodEventStream>> {
      let request: unknown;
      const stream = new WatchEventStream<PodStatusEvent>(() => abortWatchRequest(request));

      try {
        request = await apis.watcher.watch(
          `/api/v1/namespaces/${namespace}/pods`,
          { fieldSelector: `metadata.name=${name}` },
          (type: string, object: unknown) => {
            const event = toPodStatusEvent(type, object, name);
            if (event instanceof Error) {
              stream.end(event);
              return;
            }
            log.debug({ namespace, name, type: event.type, phase: event.phase }, 'Pod watch event');
            stream.push(event);
          },
          (error: unknown) => {
            if (error) {
              stream.end(toError(error));
            } else {
              stream.end();
            }
          },
        );
      } catch (error) {
        stream.end(toError(error));
        return Failure(`Failed to watch pod: ${describeApiError(error)}`, statusCodeOf(error));
      }

      return Success(stream);
    },
  };
};
