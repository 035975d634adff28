import { describe, it, expect } from '@jest/globals';
import {
  buildRelayPodManifest,
  buildSocatArgs,
} from '../../../../src/infrastructure/kubernetes/manifest';
import type { RelayRequest } from '../../../../src/domain/types';

const request: RelayRequest = {
  localPort: 1999,
  destinationHost: '10.0.12.7',
  destinationPort: 8080,
  image: 'alpine/socat:1.8.0.0',
  namespace: 'staging',
};

describe('Relay pod manifest', () => {
  describe('buildSocatArgs', () => {
    it('should listen on the relay port and dial the destination', () => {
      expect(buildSocatArgs('redis.cache.svc', 6379, 9000)).toEqual([
        'TCP-LISTEN:9000,fork,reuseaddr',
        'TCP:redis.cache.svc:6379',
      ]);
    });
  });

  describe('buildRelayPodManifest', () => {
    it('should describe the relay pod', () => {
      expect(buildRelayPodManifest(request)).toEqual({
        apiVersion: 'v1',
        kind: 'Pod',
        metadata: {
          name: 'kube-relay',
          namespace: 'staging',
          labels: {
            'app.kubernetes.io/name': 'kube-relay',
            'app.kubernetes.io/managed-by': 'kube-relay',
          },
          annotations: {
            'kube-relay/destination': '10.0.12.7:8080',
          },
        },
        spec: {
          restartPolicy: 'Never',
          containers: [
            {
              name: 'socat',
              image: 'alpine/socat:1.8.0.0',
              args: ['TCP-LISTEN:9000,fork,reuseaddr', 'TCP:10.0.12.7:8080'],
              ports: [{ name: 'relay', containerPort: 9000, protocol: 'TCP' }],
            },
          ],
        },
      });
    });

    it('should honour a custom name and relay port', () => {
      const pod = buildRelayPodManifest(request, { name: 'relay-test', relayPort: 9100 });

      expect(pod.metadata?.name).toBe('relay-test');
      expect(pod.spec?.containers[0].args).toEqual([
        'TCP-LISTEN:9100,fork,reuseaddr',
        'TCP:10.0.12.7:8080',
      ]);
      expect(pod.spec?.containers[0].ports).toEqual([
        { name: 'relay', containerPort: 9100, protocol: 'TCP' },
      ]);
    });
  });
});
