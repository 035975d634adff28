/**
 * Domain Types - Unified exports
 */

export { Success, Failure, isOk, isFail, type Result } from './result';
export {
  LIFECYCLE_STATES,
  POD_BEARING_STATES,
  type LifecycleState,
  type PodStatusEvent,
  type RelayEndpoint,
  type RelayRequest,
  type RelaySession,
  type RelaySessionSnapshot,
  type ResourceLocator,
  type WatchEventType,
} from './relay';
