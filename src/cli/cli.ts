/**
 * kube-relay CLI
 * Access a TCP port inside a Kubernetes cluster through a short-lived relay pod
 */

import { Command, CommanderError } from 'commander';
import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import { z } from 'zod';
import { createContainer, createRelayController, type DepsOverrides } from '../app/container';
import { createInterruptContext, type SignalSource } from '../app/interrupts';
import { createRelayConfig, toRelayRequest, type RelayConfig } from '../config/config';
import { DEFAULT_NETWORK, DEFAULT_RELAY, ENV_VARS } from '../config/defaults';
import type { RelayEndpoint } from '../domain/types';
import { ExitCodes, exitCodeFor, isRelayError, errorMessage, type ExitCode } from '../lib/errors';

const PackageJsonSchema = z.object({ version: z.string() });

function readVersion(): string {
  const packageJsonPath = __dirname.includes('dist')
    ? join(__dirname, '../../../package.json') // dist/src/cli/ -> root
    : join(__dirname, '../../package.json'); // src/cli/ -> root
  try {
    return PackageJsonSchema.parse(JSON.parse(readFileSync(packageJsonPath, 'utf-8'))).version;
  } catch {
    return '0.0.0';
  }
}

interface Output {
  write(text: string): unknown;
}

export interface CliIo {
  stdout: Output;
  stderr: Output;
}

export interface CliDependencies {
  io?: CliIo;
  env?: NodeJS.ProcessEnv;
  signals?: SignalSource;
  overrides?: DepsOverrides;
  /**
   * Called when a second interrupt arrives while teardown is still running.
   */
  forceExit?: (code: ExitCode) => void;
}

type CliOptions = {
  localPort?: string;
  clusterHost?: string;
  clusterPort?: string;
  podImage?: string;
  namespace?: string;
  kubeconfig?: string;
  readyTimeout?: string;
  logLevel?: string;
  cleanup?: boolean;
};

export function createProgram(): Command {
  return new Command()
    .name('kube-relay')
    .description('access tcp ports in a kubernetes cluster via a pod relay (locally)')
    .version(readVersion())
    .option('-l, --local-port <port>', 'local tcp port', String(DEFAULT_NETWORK.localPort))
    .option('-H, --cluster-host <host>', 'cluster host to reach (required)')
    .option('-P, --cluster-port <port>', 'cluster tcp port', String(DEFAULT_NETWORK.destinationPort))
    .option('-p, --pod-image <image>', 'socat oci image', DEFAULT_RELAY.image)
    .option(
      '-n, --namespace <namespace>',
      'namespace for the relay pod (default: namespace of the kubeconfig context)',
    )
    .option('--kubeconfig <path>', 'path to a kubeconfig file (default: KUBECONFIG or ~/.kube/config)')
    .option('--ready-timeout <seconds>', 'seconds to wait for the relay pod to run, 0 waits forever (default: 120)')
    .option('--log-level <level>', 'logging level: fatal, error, warn, info, debug, trace, silent (default: info)')
    .option('--cleanup', 'delete a relay pod left behind by an earlier run and exit')
    .addHelpText(
      'after',
      `

Examples:
  $ kube-relay --cluster-host postgres.db.svc.cluster.local --cluster-port 5432 --local-port 5432
  $ kube-relay -H 10.0.12.7 -P 8080 -n staging
  $ kube-relay --cleanup -n staging

Environment Variables:
  ${ENV_VARS.namespace.padEnd(26)}Namespace for the relay pod
  ${ENV_VARS.readyTimeout.padEnd(26)}Seconds to wait for the relay pod to run
  ${ENV_VARS.logLevel.padEnd(26)}Logging level
  ${'KUBECONFIG'.padEnd(26)}Kubeconfig file(s) to load

Exit Codes:
  0 relay closed cleanly, 1 relay failed, 2 invalid configuration, 130 interrupted
`,
    );
}

function describeEndpoint(endpoint: RelayEndpoint): string {
  return `Forwarding ${endpoint.listenAddress}:${endpoint.localPort} -> ${endpoint.destination} via pod "${endpoint.podName}"`;
}

function reportError(io: CliIo, error: unknown): void {
  const message = isRelayError(error) ? error.getUserMessage() : errorMessage(error);
  io.stderr.write(`❌ ${message}\n`);
}

/**
 * Run the CLI and resolve with the process exit status
 */
export async function runCli(argv: readonly string[], deps: CliDependencies = {}): Promise<number> {
  const io = deps.io ?? { stdout: process.stdout, stderr: process.stderr };
  const forceExit = deps.forceExit ?? ((code: ExitCode) => process.exit(code));

  const program = createProgram()
    .exitOverride()
    .configureOutput({
      writeOut: (text) => io.stdout.write(text),
      writeErr: (text) => io.stderr.write(text),
    });

  try {
    program.parse([...argv], { from: 'user' });
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    throw error;
  }

  const options = program.opts<CliOptions>();
  let config: RelayConfig;
  try {
    config = createRelayConfig(options, deps.env ?? process.env, {
      requireDestination: !options.cleanup,
    });
  } catch (error) {
    reportError(io, error);
    io.stderr.write('\nUse --help for usage information\n');
    return exitCodeFor(error);
  }

  const interrupts = createInterruptContext({
    source: deps.signals,
    onInterrupt: (signal) => {
      io.stderr.write(`\n🛑 Received ${signal}, tearing down relay...\n`);
    },
    onRepeat: (signal) => {
      io.stderr.write(`⚠️  Received ${signal} again, exiting without waiting for teardown\n`);
      forceExit(ExitCodes.INTERRUPTED);
    },
  });

  try {
    const container = createContainer(config, deps.overrides);
    const controller = createRelayController(container, interrupts.signal, {
      onReady: (endpoint) => {
        io.stdout.write(`${describeEndpoint(endpoint)}\n`);
      },
    });

    if (options.cleanup) {
      await controller.cleanup(container.namespace);
      io.stdout.write(
        `Removed relay pod "${DEFAULT_RELAY.podName}" from namespace "${container.namespace}"\n`,
      );
      return ExitCodes.OK;
    }

    const request = toRelayRequest(config, container.namespace);
    await controller.run(request);
    return ExitCodes.OK;
  } catch (error) {
    reportError(io, error);
    return exitCodeFor(error);
  } finally {
    interrupts.dispose();
  }
}
