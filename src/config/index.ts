/**
 * Configuration - Main exports
 */

export { createRelayConfig, toRelayRequest, type RelayConfig, type RelayConfigOptions } from './config';
export { DEFAULT_NAMESPACE, DEFAULT_NETWORK, DEFAULT_RELAY, DEFAULT_TIMEOUTS, ENV_VARS } from './defaults';
export { RelayRequestSchema, formatIssues, validateRelayRequest } from './validation';
