/**
 * LinkSupervisor - Registers new streams and owns their readers
 *
 * Both the listener (inbound) and discovery (outbound) open links through
 * `attach`, which inserts the link into the registry before its reader
 * starts. A connection that has just been accepted is therefore already
 * visible to a discovery scan running at the same moment.
 *
 * A link removed from the registry by someone else (the broadcaster, after
 * a failed write) is handed back to its reader, which closes it.
 */

import type { Duplex } from 'node:stream';
import type { LineCodec } from '@murmur/protocol';
import { createLogger } from '@murmur/types';
import type { LinkDirection, LinkInfo, Logger, WireMessage } from '@murmur/types';
import type { Link, LinkRegistry } from './link-registry.js';
import { PeerReader } from './peer-reader.js';
import type { ReaderCloseReason } from './peer-reader.js';

// ═══════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════

export interface LinkSupervisorOptions {
  registry: LinkRegistry;
  codec: LineCodec;
  signal: AbortSignal;
  onMessage: (message: WireMessage, link: Link) => void;
  onLinkClosed?: (link: Link, reason: ReaderCloseReason) => void;
  logger?: Logger;
}

// ═══════════════════════════════════════════════════════════════════════════
// IMPLEMENTATION
// ═══════════════════════════════════════════════════════════════════════════

export class LinkSupervisor {
  private readonly options: LinkSupervisorOptions;
  private readonly log: Logger;
  private readers = new Map<number, PeerReader>();
  /** Stream closures not yet observed, kept until each stream emits 'close' */
  private closures = new Set<Promise<void>>();

  private readonly onRemoved = (link: LinkInfo) => {
    this.readers.get(link.id)?.close('evicted');
  };

  constructor(options: LinkSupervisorOptions) {
    this.options = options;
    this.log = options.logger ?? createLogger('LinkSupervisor');
    options.registry.on('removed', this.onRemoved);
  }

  /**
   * Register `stream` and start reading it.
   * Returns null (and destroys the stream) if `remotePort` is already linked
   * or the supervisor has been cancelled.
   */
  attach(stream: Duplex, direction: LinkDirection, remotePort: number | null): Link | null {
    if (this.options.signal.aborted) {
      stream.destroy();
      return null;
    }

    const link = this.options.registry.add(stream, direction, remotePort);
    if (!link) {
      this.log.debug(`Port ${remotePort} already linked, dropping duplicate ${direction} stream`);
      stream.destroy();
      return null;
    }

    const reader = new PeerReader(link, {
      registry: this.options.registry,
      codec: this.options.codec,
      signal: this.options.signal,
      onMessage: this.options.onMessage,
      onClose: (closedLink, reason) => {
        this.readers.delete(closedLink.id);
        this.log.debug(`Link ${closedLink.id} closed (${reason})`);
        this.options.onLinkClosed?.(closedLink, reason);
      },
      logger: this.log,
    });

    this.readers.set(link.id, reader);
    const closed = reader.closed.then(() => {
      this.closures.delete(closed);
    });
    this.closures.add(closed);

    reader.start();
    return link;
  }

  /**
   * Close every reader and wait until each stream has closed, including
   * readers that cancellation already closed. Detaches from the registry.
   */
  async closeAll(): Promise<void> {
    this.options.registry.off('removed', this.onRemoved);
    for (const reader of Array.from(this.readers.values())) {
      reader.close('cancelled');
    }
    await Promise.all(Array.from(this.closures));
  }

  /** Readers still draining a link */
  get readerCount(): number {
    return this.readers.size;
  }
}
