/**
 * Centralized Configuration Defaults
 *
 * Single source of truth for the relay's well-known names, ports and timeouts.
 */

/**
 * Relay workload defaults
 */
export const DEFAULT_RELAY = {
  // Fixed on purpose: a later run finds and removes a pod left behind by a crashed one.
  podName: 'kube-relay',
  containerName: 'socat',
  image: 'alpine/socat:1.8.0.0',
  relayPort: 9000,
  managedBy: 'kube-relay',
} as const;

/**
 * Default network configuration
 */
export const DEFAULT_NETWORK = {
  listenAddress: '127.0.0.1',
  localPort: 1999,
  destinationPort: 80,
} as const;

/**
 * Default timeout values in milliseconds
 */
export const DEFAULT_TIMEOUTS = {
  ready: 120000, // 2 minutes
  // How long teardown waits for the tunnel to release its listener after closing it.
  tunnelClose: 250,
} as const;

export const DEFAULT_NAMESPACE = 'default';

/**
 * Environment variables read by the configuration layer
 */
export const ENV_VARS = {
  namespace: 'KUBE_RELAY_NAMESPACE',
  readyTimeout: 'KUBE_RELAY_READY_TIMEOUT',
  logLevel: 'LOG_LEVEL',
} as const;
