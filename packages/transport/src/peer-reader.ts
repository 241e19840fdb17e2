/**
 * PeerReader - Drains one link
 *
 * Splits the incoming byte stream into lines, decodes each one and hands
 * it on unfiltered. Filtering our own messages happens in the context
 * injector, not here.
 *
 * A reader is the only thing that moves its link to `closed`: on end of
 * stream, stream close, read error or cancellation it destroys the stream
 * and removes the link (and its port) from the registry, exactly once.
 */

import type { DecodeAllResult, LineCodec } from '@murmur/protocol';
import { createLogger, describeError } from '@murmur/types';
import type { Logger, WireMessage } from '@murmur/types';
import type { Link, LinkRegistry } from './link-registry.js';

// ═══════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════

export type ReaderCloseReason =
  | 'remote_closed'
  | 'stream_closed'
  | 'read_error'
  | 'overflow'
  | 'evicted'
  | 'cancelled';

export interface PeerReaderOptions {
  registry: LinkRegistry;
  codec: LineCodec;
  signal: AbortSignal;
  onMessage: (message: WireMessage, link: Link) => void;
  onClose?: (link: Link, reason: ReaderCloseReason) => void;
  logger?: Logger;
}

// ═══════════════════════════════════════════════════════════════════════════
// IMPLEMENTATION
// ═══════════════════════════════════════════════════════════════════════════

export class PeerReader {
  readonly link: Link;
  /** Resolves once the stream has emitted 'close' */
  readonly closed: Promise<void>;

  private readonly options: PeerReaderOptions;
  private readonly log: Logger;
  private buffer: Buffer = Buffer.alloc(0);
  private started = false;
  private finished = false;
  private resolveClosed: () => void = () => {};

  private readonly onData = (chunk: Buffer | string) => this.handleData(chunk);
  private readonly onEnd = () => this.close('remote_closed');
  private readonly onStreamClose = () => this.close('stream_closed');
  private readonly onError = (error: Error) => {
    this.log.warn(`Peer reader error on link ${this.link.id}: ${describeError(error)}`);
    this.close('read_error');
  };
  private readonly onAbort = () => this.close('cancelled');

  constructor(link: Link, options: PeerReaderOptions) {
    this.link = link;
    this.options = options;
    this.log = options.logger ?? createLogger('PeerReader');
    this.closed = new Promise((resolve) => {
      this.resolveClosed = resolve;
    });
  }

  // ─────────────────────────────────────────────────────────────────────────
  // LIFECYCLE
  // ─────────────────────────────────────────────────────────────────────────

  start(): void {
    if (this.started) {
      throw new Error(`Reader for link ${this.link.id} already started`);
    }
    this.started = true;

    const { stream } = this.link;
    stream.once('close', () => this.resolveClosed());
    stream.on('data', this.onData);
    stream.once('end', this.onEnd);
    stream.once('close', this.onStreamClose);
    // Stays attached after close: a late socket error must not go unhandled.
    stream.on('error', this.onError);

    if (this.options.signal.aborted) {
      this.close('cancelled');
      return;
    }
    this.options.signal.addEventListener('abort', this.onAbort, { once: true });
  }

  close(reason: ReaderCloseReason): void {
    if (this.finished) return;
    this.finished = true;

    const { stream } = this.link;
    this.options.signal.removeEventListener('abort', this.onAbort);
    stream.off('data', this.onData);
    stream.off('end', this.onEnd);
    stream.off('close', this.onStreamClose);

    this.link.state = 'closed';
    this.options.registry.remove(this.link.id);
    this.buffer = Buffer.alloc(0);

    if (stream.closed) {
      this.resolveClosed();
    } else {
      stream.destroy();
    }

    this.options.onClose?.(this.link, reason);
  }

  isClosed(): boolean {
    return this.finished;
  }

  // ─────────────────────────────────────────────────────────────────────────
  // PRIVATE
  // ─────────────────────────────────────────────────────────────────────────

  private handleData(chunk: Buffer | string): void {
    if (this.finished) return;

    const bytes = typeof chunk === 'string' ? Buffer.from(chunk, 'utf-8') : chunk;
    this.buffer = this.buffer.length === 0 ? bytes : Buffer.concat([this.buffer, bytes]);

    let decoded: DecodeAllResult;
    try {
      decoded = this.options.codec.decodeAll(this.buffer);
    } catch (error) {
      this.log.warn(`Dropping link ${this.link.id}: ${describeError(error)}`);
      this.close('overflow');
      return;
    }

    this.buffer = decoded.remaining;

    for (const error of decoded.errors) {
      this.log.warn(`Invalid message received on link ${this.link.id}: ${error.message}`);
    }

    for (const message of decoded.messages) {
      if (this.finished || this.options.signal.aborted) return;
      this.options.onMessage(message, this.link);
    }
  }
}
