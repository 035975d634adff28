import { describe, it, expect, jest, beforeEach } from '@jest/globals';
import { EventEmitter } from 'node:events';
import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import { runCli, type CliDependencies } from '../../../src/cli/cli';
import { Failure } from '../../../src/domain/types';
import type { ExitCode } from '../../../src/lib/errors';
import {
  closeAfterReady,
  createFakeCluster,
  createFakeTransport,
  untilAborted,
  type FakeClusterOptions,
  type TunnelBehaviour,
} from '../../utils/kubernetes-mocks';
import { createTestLogger } from '../../utils/logger';

function createOutput() {
  let text = '';
  return {
    write: (chunk: string) => {
      text += chunk;
      return true;
    },
    text: () => text,
  };
}

describe('CLI Interface', () => {
  let stdout: ReturnType<typeof createOutput>;
  let stderr: ReturnType<typeof createOutput>;
  let signals: EventEmitter;
  let forceExit: jest.Mock<(code: ExitCode) => void>;

  beforeEach(() => {
    stdout = createOutput();
    stderr = createOutput();
    signals = new EventEmitter();
    forceExit = jest.fn<(code: ExitCode) => void>();
  });

  function setup(behaviour: TunnelBehaviour = closeAfterReady, clusterOptions: FakeClusterOptions = {}) {
    const cluster = createFakeCluster(clusterOptions);
    const transport = createFakeTransport(behaviour);
    const deps: CliDependencies = {
      io: { stdout, stderr },
      env: {},
      signals,
      forceExit,
      overrides: {
        logger: createTestLogger(),
        cluster: cluster.client,
        transport: transport.transport,
      },
    };
    return { cluster, transport, deps };
  }

  describe('Argument parsing', () => {
    it('should print help and exit 0', async () => {
      const { deps } = setup();

      await expect(runCli(['--help'], deps)).resolves.toBe(0);
      expect(stdout.text()).toContain('Usage: kube-relay [options]');
      expect(stdout.text()).toContain('-H, --cluster-host <host>');
      expect(stdout.text()).toContain('KUBE_RELAY_NAMESPACE');
    });

    it('should print the package version', async () => {
      const { deps } = setup();
      const packageJson: unknown = JSON.parse(
        readFileSync(join(__dirname, '../../../package.json'), 'utf-8'),
      );

      await expect(runCli(['--version'], deps)).resolves.toBe(0);
      expect(packageJson).toHaveProperty('version', stdout.text().trim());
    });

    it('should exit 2 without a cluster host', async () => {
      const { cluster, deps } = setup();

      await expect(runCli([], deps)).resolves.toBe(2);
      expect(stderr.text()).toBe(
        '❌ Invalid configuration: --cluster-host is required (CONFIGURATION_INVALID)\n' +
          '\nUse --help for usage information\n',
      );
      expect(cluster.calls).toEqual([]);
    });

    it('should exit 2 for an invalid port', async () => {
      const { deps } = setup();

      await expect(runCli(['-H', 'db.internal', '-l', '99999'], deps)).resolves.toBe(2);
      expect(stderr.text()).toContain('--local-port must be between 1 and 65535');
    });

    it('should reject unknown options through commander', async () => {
      const { deps } = setup();

      await expect(runCli(['--cluster-hots', 'db.internal'], deps)).resolves.toBe(1);
      expect(stderr.text()).toContain("unknown option '--cluster-hots'");
    });
  });

  describe('Relay runs', () => {
    it('should announce the endpoint and exit 0 when the tunnel closes', async () => {
      const { cluster, deps } = setup();

      await expect(
        runCli(['-H', 'db.internal', '-P', '5432', '-l', '15432', '-n', 'staging'], deps),
      ).resolves.toBe(0);
      expect(stdout.text()).toBe(
        'Forwarding 127.0.0.1:15432 -> db.internal:5432 via pod "kube-relay"\n',
      );
      expect(cluster.calls).toEqual([
        'create staging/kube-relay',
        'watch staging/kube-relay',
        'delete staging/kube-relay',
      ]);
    });

    it('should use the namespace from the environment', async () => {
      const { cluster, deps } = setup();

      await runCli(['--cluster-host', 'db.internal'], { ...deps, env: { KUBE_RELAY_NAMESPACE: 'tools' } });

      expect(cluster.calls[0]).toBe('create tools/kube-relay');
    });

    it('should use the requested image and destination', async () => {
      const { cluster, deps } = setup();

      await runCli(['-H', '10.0.12.7', '-P', '8080', '-p', 'registry.local/socat:1.8', '-n', 'staging'], deps);

      const [, pod] = cluster.create.mock.calls[0];
      expect(pod.spec?.containers[0].image).toBe('registry.local/socat:1.8');
      expect(pod.spec?.containers[0].args).toEqual([
        'TCP-LISTEN:9000,fork,reuseaddr',
        'TCP:10.0.12.7:8080',
      ]);
    });

    it('should exit 1 and report a relay failure', async () => {
      const { cluster, deps } = setup(closeAfterReady, {
        create: Failure('Failed to create pod: pods "kube-relay" already exists', 409),
      });

      await expect(runCli(['-H', 'db.internal', '-n', 'staging'], deps)).resolves.toBe(1);
      expect(stderr.text()).toBe(
        '❌ Failed to create pod: pods "kube-relay" already exists. A relay from an earlier run may still exist; it is being removed, run again (RESOURCE_EXISTS)\n',
      );
      expect(cluster.remove).toHaveBeenCalledTimes(1);
    });

    it('should tear down and exit 130 on SIGINT', async () => {
      const { cluster, deps } = setup((options) => {
        options.onReady();
        signals.emit('SIGINT', 'SIGINT');
        return untilAborted(options.signal);
      });

      await expect(runCli(['-H', 'db.internal', '-n', 'staging'], deps)).resolves.toBe(130);
      expect(stderr.text()).toBe(
        '\n🛑 Received SIGINT, tearing down relay...\n❌ Interrupted by SIGINT (INTERRUPTED)\n',
      );
      expect(cluster.remove).toHaveBeenCalledTimes(1);
      expect(cluster.remove).toHaveBeenCalledWith('staging', 'kube-relay');
      expect(forceExit).not.toHaveBeenCalled();
    });

    it('should force exit on a second signal', async () => {
      const { cluster, deps } = setup((options) => {
        options.onReady();
        signals.emit('SIGTERM', 'SIGTERM');
        signals.emit('SIGINT', 'SIGINT');
        return untilAborted(options.signal);
      });

      await expect(runCli(['-H', 'db.internal', '-n', 'staging'], deps)).resolves.toBe(130);
      expect(forceExit).toHaveBeenCalledWith(130);
      expect(cluster.remove).toHaveBeenCalledTimes(1);
    });

    it('should release its signal handlers when done', async () => {
      const { deps } = setup();

      await runCli(['-H', 'db.internal', '-n', 'staging'], deps);

      expect(signals.listenerCount('SIGINT')).toBe(0);
      expect(signals.listenerCount('SIGTERM')).toBe(0);
    });
  });

  describe('--cleanup', () => {
    it('should delete a left-over relay pod without a cluster host', async () => {
      const { cluster, transport, deps } = setup();

      await expect(runCli(['--cleanup', '-n', 'staging'], deps)).resolves.toBe(0);
      expect(cluster.calls).toEqual(['delete staging/kube-relay']);
      expect(transport.open).not.toHaveBeenCalled();
      expect(stdout.text()).toBe('Removed relay pod "kube-relay" from namespace "staging"\n');
    });

    it('should exit 1 when the pod cannot be deleted', async () => {
      const { deps } = setup(closeAfterReady, {
        remove: Failure('Failed to delete pod: pods "kube-relay" is forbidden', 403),
      });

      await expect(runCli(['--cleanup', '-n', 'staging'], deps)).resolves.toBe(1);
      expect(stderr.text()).toBe(
        '❌ Failed to delete pod: pods "kube-relay" is forbidden (TEARDOWN_FAILED)\n',
      );
    });
  });
});
