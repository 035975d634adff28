/**
 * Relay input validation
 *
 * Zod schemas shared by the CLI configuration and the controller's request check.
 */

import { z } from 'zod';
import type { RelayRequest } from '../domain/types';
import { ConfigurationError } from '../lib/errors';

export const PortSchema = z.coerce
  .number({ invalid_type_error: 'must be a number' })
  .int('must be an integer')
  .min(1, 'must be between 1 and 65535')
  .max(65535, 'must be between 1 and 65535');

export const NamespaceSchema = z
  .string()
  .trim()
  .min(1, 'must not be empty')
  .max(63, 'must be at most 63 characters')
  .regex(/^[a-z0-9]([-a-z0-9]*[a-z0-9])?$/, 'must be a lowercase DNS label');

// Commas and colons would be read as socat address separators.
export const HostSchema = z
  .string({ required_error: 'is required' })
  .trim()
  .min(1, 'is required')
  .regex(/^[^\s,:]+$/, 'must be a host name or IPv4 address');

export const ImageSchema = z
  .string()
  .trim()
  .min(1, 'must not be empty')
  .regex(/^\S+$/, 'must not contain whitespace');

export const RelayRequestSchema = z.object({
  localPort: PortSchema,
  destinationHost: HostSchema,
  destinationPort: PortSchema,
  image: ImageSchema,
  namespace: NamespaceSchema,
});

/**
 * Render zod issues as "<field> <message>" lines, using display labels when given
 */
export function formatIssues(error: z.ZodError, labels: Record<string, string> = {}): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join('.');
    const label = labels[path] ?? (path || 'value');
    return `${label} ${issue.message}`;
  });
}

/**
 * Validate and freeze a relay request
 * @throws ConfigurationError when any field is invalid
 */
export function validateRelayRequest(input: unknown): RelayRequest {
  const parsed = RelayRequestSchema.safeParse(input);
  if (!parsed.success) {
    const issues = formatIssues(parsed.error);
    throw new ConfigurationError(`Invalid relay request: ${issues.join('; ')}`, { issues });
  }
  return Object.freeze(parsed.data);
}
