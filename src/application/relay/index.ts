export { RelayController, type RelayControllerDeps, type RelayControllerOptions } from './controller';
export { bridgeTunnel, type BridgeOptions } from './bridge';
export { waitForRunning, RUNNING_PHASE, type ReadinessOptions } from './readiness';
