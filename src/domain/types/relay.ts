/**
 * Relay domain types
 */

/**
 * Immutable input of one relay run.
 */
export interface RelayRequest {
  readonly localPort: number;
  readonly destinationHost: string;
  readonly destinationPort: number;
  readonly image: string;
  readonly namespace: string;
}

export const LIFECYCLE_STATES = [
  'Idle',
  'Provisioning',
  'AwaitingReady',
  'Bridging',
  'Terminating',
  'Terminated',
  'Failed',
] as const;

export type LifecycleState = (typeof LIFECYCLE_STATES)[number];

/**
 * States in which the relay pod may exist in the cluster.
 */
export const POD_BEARING_STATES: ReadonlySet<LifecycleState> = new Set<LifecycleState>([
  'Provisioning',
  'AwaitingReady',
  'Bridging',
  'Terminating',
]);

/**
 * Mutable record owned by the controller for the lifetime of one run.
 */
export interface RelaySession {
  readonly podName: string;
  state: LifecycleState;
  history: LifecycleState[];
  error?: Error;
}

export type RelaySessionSnapshot = Readonly<{
  podName: string;
  state: LifecycleState;
  history: readonly LifecycleState[];
}>;

/**
 * Locates the relay pod in the cluster.
 */
export interface ResourceLocator {
  namespace: string;
  name: string;
}

export type WatchEventType = 'ADDED' | 'MODIFIED' | 'DELETED' | 'BOOKMARK' | 'ERROR';

/**
 * One notification from the pod watch, reduced to what readiness needs.
 */
export interface PodStatusEvent {
  type: WatchEventType;
  name: string;
  phase?: string;
  message?: string;
}

/**
 * Where the local end of an established relay listens and where it leads.
 */
export interface RelayEndpoint {
  listenAddress: string;
  localPort: number;
  podName: string;
  destination: string;
}
