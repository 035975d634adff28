/**
 * Relay Lifecycle Controller
 *
 * Idle -> Provisioning -> AwaitingReady -> Bridging -> Terminating -> Terminated,
 * with any error leading through Terminating to Failed. The relay pod is deleted
 * exactly once per run, on every exit path. Nothing is retried.
 */

import type { Logger } from 'pino';
import { DEFAULT_NETWORK, DEFAULT_RELAY, DEFAULT_TIMEOUTS } from '../../config/defaults';
import { validateRelayRequest } from '../../config/validation';
import {
  isFail,
  POD_BEARING_STATES,
  type LifecycleState,
  type RelayEndpoint,
  type RelayRequest,
  type RelaySession,
  type RelaySessionSnapshot,
  type ResourceLocator,
  type Result,
} from '../../domain/types';
import type { RelayClusterClient } from '../../infrastructure/kubernetes/client';
import { buildRelayPodManifest } from '../../infrastructure/kubernetes/manifest';
import type { TunnelTransport } from '../../infrastructure/kubernetes/port-forward';
import {
  ConfigurationError,
  ErrorCodes,
  InterruptedError,
  ProvisioningError,
  RelayError,
  TeardownError,
  errorMessage,
  interruptionOf,
  isRelayError,
  toError,
} from '../../lib/errors';
import { createPhaseTimer } from '../../lib/logger';
import { bridgeTunnel } from './bridge';
import { waitForRunning } from './readiness';

export interface RelayControllerDeps {
  cluster: RelayClusterClient;
  transport: TunnelTransport;
  logger: Logger;
  /**
   * Cancellation context; aborting it interrupts the active run.
   */
  signal?: AbortSignal;
}

export interface RelayControllerOptions {
  podName?: string;
  relayPort?: number;
  listenAddress?: string;
  /**
   * Upper bound for the readiness wait; 0 waits without limit.
   */
  readyTimeoutMs?: number;
  /**
   * How long teardown waits for a closed tunnel to settle before deleting the pod.
   */
  tunnelCloseGraceMs?: number;
  onReady?: (endpoint: RelayEndpoint) => void;
  onStateChange?: (state: LifecycleState, previous: LifecycleState) => void;
}

function snapshot(session: RelaySession): RelaySessionSnapshot {
  return Object.freeze({
    podName: session.podName,
    state: session.state,
    history: Object.freeze([...session.history]),
  });
}

export class RelayController {
  private readonly logger: Logger;
  private readonly signal: AbortSignal;
  private readonly podName: string;
  private readonly relayPort: number;
  private readonly listenAddress: string;
  private readonly readyTimeoutMs: number;
  private session: RelaySession | undefined;

  constructor(
    private readonly deps: RelayControllerDeps,
    private readonly options: RelayControllerOptions = {},
  ) {
    this.logger = deps.logger.child({ component: 'relay-controller' });
    this.signal = deps.signal ?? new AbortController().signal;
    this.podName = options.podName ?? DEFAULT_RELAY.podName;
    this.relayPort = options.relayPort ?? DEFAULT_RELAY.relayPort;
    this.listenAddress = options.listenAddress ?? DEFAULT_NETWORK.listenAddress;
    this.readyTimeoutMs = options.readyTimeoutMs ?? DEFAULT_TIMEOUTS.ready;
  }

  get state(): LifecycleState {
    return this.session?.state ?? 'Idle';
  }

  /**
   * Provision the relay pod, wait for it to run and bridge the local port to it
   * until the tunnel closes. Always deletes the pod before settling.
   */
  async run(input: RelayRequest): Promise<RelaySessionSnapshot> {
    if (this.session) {
      throw new ConfigurationError(
        'A relay session is already active',
        { state: this.session.state },
        undefined,
        ErrorCodes.SESSION_ACTIVE,
      );
    }
    const request = validateRelayRequest(input);
    // Nothing exists yet, so an interrupt that arrived before the run needs no teardown.
    this.throwIfInterrupted();

    const session: RelaySession = { podName: this.podName, state: 'Idle', history: ['Idle'] };
    this.session = session;
    const locator: ResourceLocator = { namespace: request.namespace, name: this.podName };

    // First trigger starts the delete; later triggers share its outcome.
    let teardownAttempt: Promise<Result<void>> | undefined;
    const teardownOnce = (): Promise<Result<void>> =>
      (teardownAttempt ??= this.teardown(locator));

    try {
      this.transition(session, 'Provisioning');
      await this.provision(request, locator);
      this.throwIfInterrupted();

      this.transition(session, 'AwaitingReady');
      await this.awaitReady(locator);

      this.transition(session, 'Bridging');
      await bridgeTunnel(this.deps.transport, {
        locator,
        localPort: request.localPort,
        remotePort: this.relayPort,
        listenAddress: this.listenAddress,
        destination: `${request.destinationHost}:${request.destinationPort}`,
        signal: this.signal,
        logger: this.logger,
        onReady: this.options.onReady,
        closeGraceMs: this.options.tunnelCloseGraceMs,
      });

      this.transition(session, 'Terminating');
      const result = await teardownOnce();
      if (isFail(result)) {
        throw new TeardownError(result.error, { ...locator, statusCode: result.statusCode });
      }
      this.transition(session, 'Terminated');
      return snapshot(session);
    } catch (error) {
      const failure = isRelayError(error)
        ? error
        : new RelayError(errorMessage(error), ErrorCodes.INTERNAL_ERROR, {}, toError(error));
      session.error = failure;

      if (session.state !== 'Terminating') {
        this.transition(session, 'Terminating');
      }
      const result = await teardownOnce();
      if (isFail(result) && !(failure instanceof TeardownError)) {
        this.logger.warn(
          { ...locator, error: result.error },
          'Relay pod could not be deleted; remove it manually or run with --cleanup',
        );
      }
      this.transition(session, 'Failed');
      failure.details.session = snapshot(session);
      const context = { code: failure.code, details: failure.details, history: session.history };
      if (failure instanceof InterruptedError) {
        this.logger.warn(context, failure.message);
      } else {
        this.logger.error(context, failure.message);
      }
      throw failure;
    } finally {
      this.session = undefined;
    }
  }

  /**
   * Delete a relay pod left behind by an earlier run. Absent pods are not an error.
   */
  async cleanup(namespace: string): Promise<void> {
    const result = await this.teardown({ namespace, name: this.podName });
    if (isFail(result)) {
      throw new TeardownError(result.error, {
        namespace,
        name: this.podName,
        statusCode: result.statusCode,
      });
    }
  }

  private async provision(request: RelayRequest, locator: ResourceLocator): Promise<void> {
    const timer = createPhaseTimer(this.logger, 'provision', { pod: locator.name, namespace: locator.namespace }, { image: request.image });
    const manifest = buildRelayPodManifest(request, { name: locator.name, relayPort: this.relayPort });

    const created = await this.deps.cluster.create(locator.namespace, manifest);
    if (isFail(created)) {
      const exists = created.statusCode === 409;
      const error = new ProvisioningError(
        exists
          ? `${created.error}. A relay from an earlier run may still exist; it is being removed, run again`
          : created.error,
        exists ? ErrorCodes.RESOURCE_EXISTS : ErrorCodes.PROVISIONING_FAILED,
        { ...locator, statusCode: created.statusCode },
      );
      timer.fail(error);
      throw error;
    }
    timer.end({ created: created.value });
  }

  private async awaitReady(locator: ResourceLocator): Promise<void> {
    const timer = createPhaseTimer(this.logger, 'await-ready', { pod: locator.name, namespace: locator.namespace });
    try {
      await waitForRunning(this.deps.cluster, locator, {
        signal: this.signal,
        timeoutMs: this.readyTimeoutMs,
        logger: this.logger,
      });
      timer.end();
    } catch (error) {
      timer.fail(error);
      throw error;
    }
  }

  private async teardown(locator: ResourceLocator): Promise<Result<void>> {
    const result = await this.deps.cluster.delete(locator.namespace, locator.name);
    if (isFail(result)) {
      this.logger.error({ ...locator, error: result.error }, 'Teardown failed');
    } else {
      this.logger.info({ ...locator }, 'Relay pod removed');
    }
    return result;
  }

  private throwIfInterrupted(): void {
    if (this.signal.aborted) {
      throw interruptionOf(this.signal);
    }
  }

  private transition(session: RelaySession, next: LifecycleState): void {
    const previous = session.state;
    session.state = next;
    session.history.push(next);
    this.logger.debug(
      { from: previous, to: next, podMayExist: POD_BEARING_STATES.has(next) },
      'Relay state change',
    );
    this.options.onStateChange?.(next, previous);
  }
}
