/**
 * Tunnel transport over the Kubernetes port-forward subresource
 *
 * A local TCP listener whose connections are each carried by a port-forward
 * websocket to a port inside the relay pod. Bytes arriving on the
 * port-forward error channel are written to the caller's diagnostics stream.
 */

import * as k8s from '@kubernetes/client-node';
import { createServer, type Socket } from 'node:net';
import type { Readable, Writable } from 'node:stream';
import type { Logger } from 'pino';
import { DEFAULT_NETWORK } from '../../config/defaults';
import type { ResourceLocator } from '../../domain/types';
import { errorMessage } from '../../lib/errors';

export interface TunnelOpenOptions {
  locator: ResourceLocator;
  localPort: number;
  remotePort: number;
  /**
   * Aborting closes the listener and every bridged connection.
   */
  signal: AbortSignal;
  /**
   * Called once the local listener accepts connections.
   */
  onReady: () => void;
  /**
   * Receives diagnostic text from the remote side of the tunnel.
   */
  diagnostics: Writable;
}

export interface TunnelTransport {
  /**
   * Resolves when the tunnel has been closed through `signal`; rejects if the
   * listener fails.
   */
  open: (options: TunnelOpenOptions) => Promise<void>;
}

/**
 * The part of the port-forward websocket the transport needs
 */
export interface ForwardedConnection {
  close(): void;
  once(event: 'close', listener: () => void): unknown;
  once(event: 'error', listener: (error: Error) => void): unknown;
}

/**
 * The part of k8s.PortForward the transport needs
 */
export interface PortForwarder {
  portForward(
    namespace: string,
    podName: string,
    targetPorts: number[],
    output: Writable,
    err: Writable | null,
    input: Readable,
  ): Promise<ForwardedConnection | (() => ForwardedConnection | null)>;
}

export interface PortForwardTransportOptions {
  listenAddress?: string;
}

export function createPortForwarder(kc: k8s.KubeConfig): PortForwarder {
  return new k8s.PortForward(kc);
}

export const createPortForwardTransport = (
  logger: Logger,
  forwarder: PortForwarder,
  options: PortForwardTransportOptions = {},
): TunnelTransport => {
  const log = logger.child({ component: 'port-forward' });
  const listenAddress = options.listenAddress ?? DEFAULT_NETWORK.listenAddress;

  async function bridge(
    socket: Socket,
    open: TunnelOpenOptions,
    active: Set<() => void>,
  ): Promise<void> {
    const { locator, remotePort, diagnostics } = open;
    const peer = `${socket.remoteAddress ?? 'unknown'}:${socket.remotePort ?? 0}`;
    log.debug({ peer, pod: locator.name }, 'Handling connection');

    try {
      const result = await forwarder.portForward(
        locator.namespace,
        locator.name,
        [remotePort],
        socket,
        diagnostics,
        socket,
      );
      const connection = typeof result === 'function' ? result() : result;
      if (connection === null) {
        return;
      }
      if (socket.destroyed || open.signal.aborted) {
        connection.close();
        socket.destroy();
        return;
      }

      let released = false;
      const release = (): void => {
        if (released) return;
        released = true;
        active.delete(release);
        connection.close();
      };
      active.add(release);
      socket.once('close', release);

      // The websocket handler never ends the output stream on its own.
      connection.once('close', () => {
        released = true;
        active.delete(release);
        log.debug({ peer }, 'Remote side closed');
        socket.end();
      });
      connection.once('error', (error) => {
        log.debug({ peer, error: error.message }, 'Port-forward connection error');
        socket.destroy();
      });
    } catch (error) {
      log.warn({ peer, error: errorMessage(error) }, 'Port-forward connection failed');
      diagnostics.write(`error forwarding port ${remotePort} to pod ${locator.name}: ${errorMessage(error)}\n`);
      socket.destroy();
    }
  }

  return {
    open(open: TunnelOpenOptions): Promise<void> {
      const { localPort, remotePort, signal, onReady, locator } = open;

      return new Promise<void>((resolve, reject) => {
        if (signal.aborted) {
          resolve();
          return;
        }

        const sockets = new Set<Socket>();
        const connections = new Set<() => void>();
        const server = createServer((socket) => {
          sockets.add(socket);
          socket.once('close', () => sockets.delete(socket));
          socket.on('error', (error) => {
            log.debug({ error: error.message }, 'Local connection error');
          });
          void bridge(socket, open, connections);
        });

        const onAbort = (): void => {
          log.debug({ localPort }, 'Closing local listener');
          for (const release of connections) {
            release();
          }
          for (const socket of sockets) {
            socket.destroy();
          }
          server.close();
        };

        server.once('error', (error) => {
          signal.removeEventListener('abort', onAbort);
          reject(error);
        });
        server.once('close', () => {
          signal.removeEventListener('abort', onAbort);
          resolve();
        });
        server.listen(localPort, listenAddress, () => {
          log.info(
            { localPort, remotePort, pod: locator.name },
            `Forwarding from ${listenAddress}:${localPort} -> ${remotePort}`,
          );
          onReady();
        });
        signal.addEventListener('abort', onAbort, { once: true });
      });
    },
  };
};
