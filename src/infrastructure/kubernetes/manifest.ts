/**
 * Relay pod manifest
 *
 * The pod runs socat: it listens on the relay port and, for every accepted
 * connection, dials the destination and splices bytes both ways.
 */

import type { V1Pod } from '@kubernetes/client-node';
import { DEFAULT_RELAY } from '../../config/defaults';
import type { RelayRequest } from '../../domain/types';

export interface RelayPodOptions {
  name?: string;
  relayPort?: number;
}

/**
 * socat address pair for the listen-and-forward process
 */
export function buildSocatArgs(host: string, port: number, relayPort: number): string[] {
  return [`TCP-LISTEN:${relayPort},fork,reuseaddr`, `TCP:${host}:${port}`];
}

export function buildRelayPodManifest(request: RelayRequest, options: RelayPodOptions = {}): V1Pod {
  const name = options.name ?? DEFAULT_RELAY.podName;
  const relayPort = options.relayPort ?? DEFAULT_RELAY.relayPort;

  return {
    apiVersion: 'v1',
    kind: 'Pod',
    metadata: {
      name,
      namespace: request.namespace,
      labels: {
        'app.kubernetes.io/name': name,
        'app.kubernetes.io/managed-by': DEFAULT_RELAY.managedBy,
      },
      annotations: {
        'kube-relay/destination': `${request.destinationHost}:${request.destinationPort}`,
      },
    },
    spec: {
      restartPolicy: 'Never',
      containers: [
        {
          name: DEFAULT_RELAY.containerName,
          image: request.image,
          args: buildSocatArgs(request.destinationHost, request.destinationPort, relayPort),
          ports: [{ name: 'relay', containerPort: relayPort, protocol: 'TCP' }],
        },
      ],
    },
  };
}
