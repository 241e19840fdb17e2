/**
 * Socket layer - the only place that touches node:net
 *
 * Group chat components depend on ISocketLayer rather than on sockets
 * directly, so tests can inject an in-memory implementation.
 *
 * Architecture:
 *   GroupChatNode (lifecycle, broadcaster, injector)
 *       |
 *   PeerListener / PeerDiscovery / PeerReader
 *       |
 *   ISocketLayer <- This layer
 */

import { createConnection, createServer } from 'node:net';
import type { Server, Socket } from 'node:net';
import type { Duplex } from 'node:stream';
import { createLogger, describeError } from '@murmur/types';
import type { Logger } from '@murmur/types';

// ═══════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════

export interface AcceptedConnection {
  stream: Duplex;
  /** Remote socket port; for TCP this is the peer's ephemeral port */
  remotePort: number | null;
  remoteAddress: string | null;
}

export interface ListenHandle {
  readonly port: number;
  close(): Promise<void>;
}

export interface ISocketLayer {
  /**
   * Bind a listener. Rejects with the bind error (e.g. code EADDRINUSE).
   */
  listen(
    host: string,
    port: number,
    onConnection: (connection: AcceptedConnection) => void,
  ): Promise<ListenHandle>;

  /**
   * Open an outbound stream. Rejects with ConnectTimeoutError after `timeoutMs`.
   */
  connect(host: string, port: number, timeoutMs: number): Promise<Duplex>;
}

// ═══════════════════════════════════════════════════════════════════════════
// ERRORS
// ═══════════════════════════════════════════════════════════════════════════

export class ConnectTimeoutError extends Error {
  readonly code = 'ETIMEDOUT';

  constructor(host: string, port: number, timeoutMs: number) {
    super(`Connection to ${host}:${port} timed out after ${timeoutMs}ms`);
    this.name = 'ConnectTimeoutError';
  }
}

/** Errors a discovery scan hits routinely when nobody listens on a port */
const EXPECTED_CONNECT_ERROR_CODES = new Set([
  'ETIMEDOUT',
  'ECONNREFUSED',
  'ECONNRESET',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'EADDRNOTAVAIL',
]);

export function getErrorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

export function isExpectedConnectError(error: unknown): boolean {
  if (error instanceof ConnectTimeoutError) return true;
  const code = getErrorCode(error);
  return code !== undefined && EXPECTED_CONNECT_ERROR_CODES.has(code);
}

export function isAddressInUse(error: unknown): boolean {
  return getErrorCode(error) === 'EADDRINUSE';
}

// ═══════════════════════════════════════════════════════════════════════════
// TCP IMPLEMENTATION
// ═══════════════════════════════════════════════════════════════════════════

export class TcpSocketLayer implements ISocketLayer {
  private readonly log: Logger;

  constructor(logger?: Logger) {
    this.log = logger ?? createLogger('TcpSocketLayer');
  }

  listen(
    host: string,
    port: number,
    onConnection: (connection: AcceptedConnection) => void,
  ): Promise<ListenHandle> {
    const server = createServer((socket: Socket) => {
      onConnection({
        stream: socket,
        remotePort: socket.remotePort ?? null,
        remoteAddress: socket.remoteAddress ?? null,
      });
    });

    return new Promise((resolve, reject) => {
      const onError = (error: Error) => {
        server.off('listening', onListening);
        reject(error);
      };

      const onListening = () => {
        server.off('error', onError);
        server.on('error', (error) => {
          this.log.error(`Listener error: ${describeError(error)}`);
        });
        resolve(createListenHandle(server, port));
      };

      server.once('error', onError);
      server.once('listening', onListening);
      server.listen(port, host);
    });
  }

  connect(host: string, port: number, timeoutMs: number): Promise<Duplex> {
    return new Promise((resolve, reject) => {
      const socket = createConnection({ host, port });

      const timeout = setTimeout(() => {
        cleanup();
        socket.destroy();
        reject(new ConnectTimeoutError(host, port, timeoutMs));
      }, timeoutMs);

      const onConnect = () => {
        cleanup();
        resolve(socket);
      };

      const onError = (error: Error) => {
        cleanup();
        socket.destroy();
        reject(error);
      };

      const cleanup = () => {
        clearTimeout(timeout);
        socket.off('connect', onConnect);
        socket.off('error', onError);
      };

      socket.once('connect', onConnect);
      socket.once('error', onError);
    });
  }
}

function createListenHandle(server: Server, requestedPort: number): ListenHandle {
  const address = server.address();
  const boundPort = typeof address === 'object' && address !== null ? address.port : requestedPort;

  return {
    port: boundPort,
    close: () =>
      new Promise<void>((resolve) => {
        // Callback fires once every accepted socket has closed.
        server.close(() => resolve());
      }),
  };
}
