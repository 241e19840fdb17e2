/**
 * LinkRegistry - The node's record of its live peer links
 *
 * Links are keyed by a monotonically assigned id and removed by key.
 * Alongside the links it tracks which remote ports are linked, so
 * discovery never opens a second link to a port that already has one.
 *
 * All mutation happens on the event loop thread.
 */

import type { Duplex } from 'node:stream';
import { TypedEventEmitter } from '@murmur/types';
import type { LinkDirection, LinkInfo, LinkState } from '@murmur/types';

// ═══════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════

export interface Link {
  readonly id: number;
  readonly stream: Duplex;
  readonly direction: LinkDirection;
  readonly remotePort: number | null;
  readonly connectedAt: Date;
  state: LinkState;
}

export interface LinkRegistryEvents {
  added: (link: LinkInfo) => void;
  removed: (link: LinkInfo) => void;
}

// ═══════════════════════════════════════════════════════════════════════════
// IMPLEMENTATION
// ═══════════════════════════════════════════════════════════════════════════

export class LinkRegistry extends TypedEventEmitter<LinkRegistryEvents> {
  private nextId = 1;
  private links = new Map<number, Link>();
  private portOwners = new Map<number, number>();

  /**
   * Insert a freshly opened stream. Returns null when `remotePort` is
   * already linked; the caller owns the stream in that case.
   */
  add(stream: Duplex, direction: LinkDirection, remotePort: number | null): Link | null {
    if (remotePort !== null && this.portOwners.has(remotePort)) {
      return null;
    }

    const link: Link = {
      id: this.nextId++,
      stream,
      direction,
      remotePort,
      connectedAt: new Date(),
      state: 'established',
    };

    this.links.set(link.id, link);
    if (remotePort !== null) {
      this.portOwners.set(remotePort, link.id);
    }

    this.emit('added', toLinkInfo(link));
    return link;
  }

  /**
   * Remove a link and release its port. Safe to call more than once.
   */
  remove(id: number): Link | undefined {
    const link = this.links.get(id);
    if (!link) return undefined;

    this.links.delete(id);
    if (link.remotePort !== null && this.portOwners.get(link.remotePort) === id) {
      this.portOwners.delete(link.remotePort);
    }

    this.emit('removed', toLinkInfo(link));
    return link;
  }

  get(id: number): Link | undefined {
    return this.links.get(id);
  }

  has(id: number): boolean {
    return this.links.has(id);
  }

  hasPort(port: number): boolean {
    return this.portOwners.has(port);
  }

  /** Snapshot, safe to iterate while the registry changes */
  list(): Link[] {
    return Array.from(this.links.values());
  }

  describe(): LinkInfo[] {
    return this.list().map(toLinkInfo);
  }

  getConnectedPorts(): number[] {
    return Array.from(this.portOwners.keys()).sort((a, b) => a - b);
  }

  get size(): number {
    return this.links.size;
  }

  /**
   * Drop every entry without touching the streams. Returns what was removed.
   */
  clear(): Link[] {
    const removed = this.list();
    for (const link of removed) {
      this.remove(link.id);
    }
    return removed;
  }
}

export function toLinkInfo(link: Link): LinkInfo {
  return {
    id: link.id,
    direction: link.direction,
    remotePort: link.remotePort,
    state: link.state,
    connectedAt: link.connectedAt,
  };
}
