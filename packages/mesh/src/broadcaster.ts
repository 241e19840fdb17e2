/**
 * Broadcaster - Fan-out of one chat line to every live link
 *
 * The record is encoded once and written to each link independently.
 * A failing link never blocks the others; it is collected during the
 * sweep and removed from the registry afterwards. Closing the stream is
 * left to the link's reader.
 */

import type { Duplex } from 'node:stream';
import type { LineCodec } from '@murmur/protocol';
import type { Link, LinkRegistry } from '@murmur/transport';
import { createLogger, createWireMessage, describeError } from '@murmur/types';
import type { Logger } from '@murmur/types';

// ═══════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════

export type BroadcastRejection = 'empty' | 'too_long' | 'no_links';

export interface BroadcastReport {
  /** Links that accepted the bytes */
  delivered: number;
  /** Links whose write failed; already removed from the registry */
  failed: number;
  /** Set when nothing was attempted */
  rejected?: BroadcastRejection;
}

export interface BroadcasterOptions {
  agentName: string;
  registry: LinkRegistry;
  codec: LineCodec;
  maxMessageLength?: number;
  logBroadcasts?: boolean;
  logger?: Logger;
  /** Clock in milliseconds; injectable for tests */
  now?: () => number;
}

const DEFAULT_MAX_MESSAGE_LENGTH = 5000;

// ═══════════════════════════════════════════════════════════════════════════
// IMPLEMENTATION
// ═══════════════════════════════════════════════════════════════════════════

export class Broadcaster {
  private readonly agentName: string;
  private readonly registry: LinkRegistry;
  private readonly codec: LineCodec;
  private readonly maxMessageLength: number;
  private readonly logBroadcasts: boolean;
  private readonly log: Logger;
  private readonly now: () => number;
  private lastBroadcastAt: number | null = null;

  constructor(options: BroadcasterOptions) {
    this.agentName = options.agentName;
    this.registry = options.registry;
    this.codec = options.codec;
    this.maxMessageLength = options.maxMessageLength ?? DEFAULT_MAX_MESSAGE_LENGTH;
    this.logBroadcasts = options.logBroadcasts ?? true;
    this.log = options.logger ?? createLogger('Broadcaster');
    this.now = options.now ?? Date.now;
  }

  /**
   * Send `text` to every link. True iff at least one link received it.
   */
  async broadcastMessage(text: string): Promise<boolean> {
    const report = await this.send(text);
    return report.delivered > 0;
  }

  /**
   * Send `text` to every link and report per-link outcomes.
   */
  async send(text: string): Promise<BroadcastReport> {
    if (text.trim().length === 0) {
      return { delivered: 0, failed: 0, rejected: 'empty' };
    }
    if (text.length > this.maxMessageLength) {
      this.log.warn(`Message too long (${text.length} > ${this.maxMessageLength}), not sent`);
      return { delivered: 0, failed: 0, rejected: 'too_long' };
    }

    const links = this.registry.list();
    if (links.length === 0) {
      return { delivered: 0, failed: 0, rejected: 'no_links' };
    }

    const timestamp = this.now();
    const bytes = this.codec.encode(createWireMessage(this.agentName, text, timestamp));

    const dead: Link[] = [];
    let delivered = 0;

    await Promise.all(
      links.map(async (link) => {
        try {
          await writeToStream(link.stream, bytes);
          delivered++;
        } catch (error) {
          this.log.warn(`Failed to send to peer on link ${link.id}: ${describeError(error)}`);
          dead.push(link);
        }
      }),
    );

    for (const link of dead) {
      this.registry.remove(link.id);
    }

    this.lastBroadcastAt = timestamp;
    if (this.logBroadcasts && delivered > 0) {
      this.log.info(`Broadcast sent to ${delivered} peer(s): ${preview(text)}`);
    }

    return { delivered, failed: dead.length };
  }

  /** Time of the last attempted fan-out in ms, or null */
  getLastBroadcastAt(): number | null {
    return this.lastBroadcastAt;
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// HELPERS
// ═══════════════════════════════════════════════════════════════════════════

function writeToStream(stream: Duplex, bytes: Buffer): Promise<void> {
  return new Promise((resolve, reject) => {
    if (stream.destroyed || !stream.writable) {
      reject(new Error('Stream is not writable'));
      return;
    }
    stream.write(bytes, (error) => {
      if (error) {
        reject(error);
      } else {
        resolve();
      }
    });
  });
}

const PREVIEW_LENGTH = 60;

export function preview(text: string): string {
  return text.length > PREVIEW_LENGTH ? `${text.slice(0, PREVIEW_LENGTH)}...` : text;
}
