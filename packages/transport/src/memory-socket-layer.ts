/**
 * MemorySocketLayer - In-process stand-in for TCP
 *
 * Every node that shares one MemorySocketLayer instance sees the same
 * "host": listeners are keyed by port, connects are answered by whichever
 * listener owns the port, and each accepted stream is tagged with a fresh
 * ephemeral port the way a kernel would tag it.
 *
 * Used by the test suites and by the in-process example.
 */

import { Duplex } from 'node:stream';
import type { AcceptedConnection, ISocketLayer, ListenHandle } from './socket-layer.js';

// ═══════════════════════════════════════════════════════════════════════════
// ERRORS
// ═══════════════════════════════════════════════════════════════════════════

export class MemorySocketError extends Error {
  readonly code: string;

  constructor(code: string, message: string) {
    super(message);
    this.name = 'MemorySocketError';
    this.code = code;
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// SOCKET PAIR
// ═══════════════════════════════════════════════════════════════════════════

/**
 * One end of an in-memory duplex pipe. Bytes written here are readable on
 * the peer; ending or destroying this end ends the peer's readable side.
 */
export class MemorySocket extends Duplex {
  private peer: MemorySocket | null = null;
  private eof = false;

  static pair(): [MemorySocket, MemorySocket] {
    const a = new MemorySocket();
    const b = new MemorySocket();
    a.peer = b;
    b.peer = a;
    return [a, b];
  }

  override _read(): void {}

  override _write(chunk: Buffer, _encoding: BufferEncoding, callback: (error?: Error | null) => void): void {
    const peer = this.peer;
    if (!peer || peer.destroyed || peer.eof) {
      callback(new MemorySocketError('EPIPE', 'write EPIPE'));
      return;
    }
    peer.push(chunk);
    callback();
  }

  override _final(callback: (error?: Error | null) => void): void {
    this.peer?.endFromPeer();
    callback();
  }

  override _destroy(error: Error | null, callback: (error?: Error | null) => void): void {
    this.peer?.endFromPeer();
    callback(error);
  }

  private endFromPeer(): void {
    if (this.eof || this.destroyed) return;
    this.eof = true;
    this.push(null);
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// SOCKET LAYER
// ═══════════════════════════════════════════════════════════════════════════

const FIRST_EPHEMERAL_PORT = 40000;

export class MemorySocketLayer implements ISocketLayer {
  private listeners = new Map<number, (connection: AcceptedConnection) => void>();
  private nextEphemeralPort = FIRST_EPHEMERAL_PORT;

  async listen(
    host: string,
    port: number,
    onConnection: (connection: AcceptedConnection) => void,
  ): Promise<ListenHandle> {
    if (this.listeners.has(port)) {
      throw new MemorySocketError('EADDRINUSE', `listen EADDRINUSE: address already in use ${host}:${port}`);
    }
    this.listeners.set(port, onConnection);

    return {
      port,
      close: async () => {
        if (this.listeners.get(port) === onConnection) {
          this.listeners.delete(port);
        }
      },
    };
  }

  async connect(host: string, port: number, _timeoutMs: number): Promise<Duplex> {
    const accept = this.listeners.get(port);
    if (!accept) {
      throw new MemorySocketError('ECONNREFUSED', `connect ECONNREFUSED ${host}:${port}`);
    }

    const [client, server] = MemorySocket.pair();
    const remotePort = this.nextEphemeralPort++;
    // Accept on a later turn, as a real listener would.
    setImmediate(() => {
      accept({ stream: server, remotePort, remoteAddress: host });
    });
    return client;
  }

  isListening(port: number): boolean {
    return this.listeners.has(port);
  }
}
