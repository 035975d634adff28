/**
 * Relay configuration with environment overrides
 *
 * Precedence: command-line option, then environment variable, then default.
 */

import { z } from 'zod';
import type { RelayRequest } from '../domain/types';
import { ConfigurationError } from '../lib/errors';
import { LOG_LEVELS, type LogLevel } from '../lib/logger';
import { DEFAULT_NETWORK, DEFAULT_RELAY, DEFAULT_TIMEOUTS, ENV_VARS } from './defaults';
import {
  HostSchema,
  ImageSchema,
  NamespaceSchema,
  PortSchema,
  formatIssues,
  validateRelayRequest,
} from './validation';

/**
 * Raw option values as they arrive from the command line
 */
export interface RelayConfigOptions {
  localPort?: string | number;
  clusterHost?: string;
  clusterPort?: string | number;
  podImage?: string;
  namespace?: string;
  kubeconfig?: string;
  readyTimeout?: string | number;
  logLevel?: string;
}

export interface RelayConfig {
  localPort: number;
  /**
   * Absent only when the configuration is created for --cleanup.
   */
  destinationHost: string | undefined;
  destinationPort: number;
  image: string;
  namespace: string | undefined;
  kubeconfig: string | undefined;
  readyTimeoutMs: number;
  logLevel: LogLevel;
}

const RelayConfigSchema = z.object({
  localPort: PortSchema.default(DEFAULT_NETWORK.localPort),
  destinationHost: HostSchema.optional(),
  destinationPort: PortSchema.default(DEFAULT_NETWORK.destinationPort),
  image: ImageSchema.default(DEFAULT_RELAY.image),
  namespace: NamespaceSchema.optional(),
  kubeconfig: z.string().trim().min(1, 'must not be empty').optional(),
  readyTimeoutSeconds: z.coerce
    .number({ invalid_type_error: 'must be a number' })
    .min(0, 'must not be negative')
    .default(DEFAULT_TIMEOUTS.ready / 1000),
  logLevel: z.enum(LOG_LEVELS).default('info'),
});

const FLAG_LABELS: Record<string, string> = {
  localPort: '--local-port',
  destinationHost: '--cluster-host',
  destinationPort: '--cluster-port',
  image: '--pod-image',
  namespace: '--namespace',
  kubeconfig: '--kubeconfig',
  readyTimeoutSeconds: '--ready-timeout',
  logLevel: '--log-level',
};

/**
 * Empty environment variables count as unset
 */
function getEnvValue(env: NodeJS.ProcessEnv, key: string): string | undefined {
  const value = env[key];
  return value === '' ? undefined : value;
}

/**
 * Create the relay configuration from CLI options and the environment
 * @throws ConfigurationError listing every invalid field
 */
export function createRelayConfig(
  options: RelayConfigOptions,
  env: NodeJS.ProcessEnv = process.env,
  { requireDestination = true }: { requireDestination?: boolean } = {},
): RelayConfig {
  const parsed = RelayConfigSchema.safeParse({
    localPort: options.localPort,
    destinationHost: options.clusterHost,
    destinationPort: options.clusterPort,
    image: options.podImage,
    namespace: options.namespace ?? getEnvValue(env, ENV_VARS.namespace),
    kubeconfig: options.kubeconfig,
    readyTimeoutSeconds: options.readyTimeout ?? getEnvValue(env, ENV_VARS.readyTimeout),
    logLevel: options.logLevel ?? getEnvValue(env, ENV_VARS.logLevel),
  });

  const issues = parsed.success ? [] : formatIssues(parsed.error, FLAG_LABELS);
  if (requireDestination && options.clusterHost === undefined) {
    issues.unshift('--cluster-host is required');
  }
  if (!parsed.success || issues.length > 0) {
    throw new ConfigurationError(`Invalid configuration: ${issues.join('; ')}`, { issues });
  }

  const { readyTimeoutSeconds, ...rest } = parsed.data;
  return {
    ...rest,
    destinationHost: rest.destinationHost,
    namespace: rest.namespace,
    kubeconfig: rest.kubeconfig,
    readyTimeoutMs: Math.round(readyTimeoutSeconds * 1000),
  };
}

/**
 * Build the immutable relay request once the namespace is known
 */
export function toRelayRequest(config: RelayConfig, namespace: string): RelayRequest {
  return validateRelayRequest({
    localPort: config.localPort,
    destinationHost: config.destinationHost,
    destinationPort: config.destinationPort,
    image: config.image,
    namespace,
  });
}
