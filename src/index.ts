/**
 * kube-relay library entry point
 */

export {
  RelayController,
  bridgeTunnel,
  waitForRunning,
  type RelayControllerDeps,
  type RelayControllerOptions,
} from './application/relay';
export * from './app';
export * from './config';
export * from './domain/types';
export * from './infrastructure/kubernetes';
export * from './lib/errors';
export {
  createLogger,
  createPhaseTimer,
  type Logger,
  type LogLevel,
  type PhaseTarget,
  type PhaseTimer,
} from './lib/logger';
export { runCli, createProgram, type CliDependencies, type CliIo } from './cli/cli';
