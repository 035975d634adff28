/**
 * Dependency Container
 *
 * Wires the relay controller to its real collaborators, with overrides for testing.
 */

import type { KubeConfig } from '@kubernetes/client-node';
import type { Logger } from 'pino';
import { RelayController, type RelayControllerOptions } from '../application/relay/controller';
import type { RelayConfig } from '../config/config';
import { DEFAULT_NAMESPACE } from '../config/defaults';
import {
  createClusterApis,
  createRelayClusterClient,
  currentNamespace,
  loadKubeConfig,
  type RelayClusterClient,
} from '../infrastructure/kubernetes/client';
import {
  createPortForwardTransport,
  createPortForwarder,
  type TunnelTransport,
} from '../infrastructure/kubernetes/port-forward';
import { ConfigurationError, errorMessage, toError } from '../lib/errors';
import { createLogger } from '../lib/logger';

/**
 * All application dependencies with their types
 */
export interface Deps {
  config: RelayConfig;
  logger: Logger;
  cluster: RelayClusterClient;
  transport: TunnelTransport;
  /**
   * Namespace the relay pod lives in
   */
  namespace: string;
}

/**
 * Partial dependency overrides for testing
 */
export type DepsOverrides = Partial<Omit<Deps, 'config'>>;

/**
 * Create the application container. The kubeconfig is only loaded when a
 * dependency that needs it is not overridden.
 */
export function createContainer(config: RelayConfig, overrides: DepsOverrides = {}): Deps {
  const logger = overrides.logger ?? createLogger({ level: config.logLevel });

  let kubeConfig: KubeConfig | undefined;
  const getKubeConfig = (): KubeConfig => {
    if (!kubeConfig) {
      try {
        kubeConfig = loadKubeConfig(config.kubeconfig);
      } catch (error) {
        throw new ConfigurationError(
          `Unable to load kubeconfig: ${errorMessage(error)}`,
          { kubeconfig: config.kubeconfig ?? 'default' },
          toError(error),
        );
      }
    }
    return kubeConfig;
  };

  const cluster =
    overrides.cluster ?? createRelayClusterClient(logger, createClusterApis(getKubeConfig()));
  const transport =
    overrides.transport ?? createPortForwardTransport(logger, createPortForwarder(getKubeConfig()));
  const namespace =
    overrides.namespace ??
    config.namespace ??
    currentNamespace(getKubeConfig()) ??
    DEFAULT_NAMESPACE;

  logger.debug(
    {
      config: {
        namespace,
        localPort: config.localPort,
        destination: `${config.destinationHost}:${config.destinationPort}`,
        image: config.image,
        readyTimeoutMs: config.readyTimeoutMs,
        kubeconfig: config.kubeconfig ?? 'default',
      },
    },
    'Dependency container created',
  );

  return { config, logger, cluster, transport, namespace };
}

/**
 * Create a relay controller bound to the container and a cancellation signal
 */
export function createRelayController(
  deps: Deps,
  signal: AbortSignal,
  options: Omit<RelayControllerOptions, 'readyTimeoutMs'> = {},
): RelayController {
  return new RelayController(
    { cluster: deps.cluster, transport: deps.transport, logger: deps.logger, signal },
    { ...options, readyTimeoutMs: deps.config.readyTimeoutMs },
  );
}
