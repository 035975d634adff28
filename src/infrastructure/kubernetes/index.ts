/**
 * Kubernetes infrastructure - relay pod client, manifest and port-forward transport
 */

export {
  createClusterApis,
  createRelayClusterClient,
  currentNamespace,
  loadKubeConfig,
  type ClusterApis,
  type PodEventStream,
  type RelayClusterClient,
} from './client';
export { WatchEventStream, type EventStream } from './event-stream';
export { buildRelayPodManifest, buildSocatArgs } from './manifest';
export {
  createPortForwardTransport,
  createPortForwarder,
  type PortForwarder,
  type TunnelOpenOptions,
  type TunnelTransport,
} from './port-forward';
