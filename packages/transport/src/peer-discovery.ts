/**
 * PeerDiscovery - Dials the ports around our own
 *
 * A listening node dials port+1 .. port+range and leaves the ports below
 * to dial it, so each pair of listening nodes ends up with one link, opened
 * by the lower port. A client-only node cannot be dialled, so it scans
 * port-range .. port+range including its own port, whose owner is a peer.
 *
 * Ports that are already linked are skipped. One refused or timed-out port
 * never stops the scan.
 *
 * Scans run through a concurrency-1 queue, so two overlapping requests
 * cannot race each other to the same port.
 */

import PQueue from 'p-queue';
import { createLogger, describeError } from '@murmur/types';
import type { Logger } from '@murmur/types';
import type { LinkRegistry } from './link-registry.js';
import type { LinkSupervisor } from './link-supervisor.js';
import { isExpectedConnectError } from './socket-layer.js';
import type { ISocketLayer } from './socket-layer.js';

// ═══════════════════════════════════════════════════════════════════════════
// CONSTANTS
// ═══════════════════════════════════════════════════════════════════════════

const DEFAULT_DISCOVERY_RANGE = 5;
const DEFAULT_CONNECT_TIMEOUT_MS = 500;
const MIN_PORT = 1;
const MAX_PORT = 65535;

// ═══════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════

/**
 * `upward` while our listener is bound, `client` when another process owns
 * our port.
 */
export type DiscoveryScope = 'upward' | 'client';

export interface PeerDiscoveryConfig {
  host: string;
  port: number;
  range?: number;
  /** Defaults to 'upward' */
  scope?: DiscoveryScope;
  connectTimeoutMs?: number;
  signal: AbortSignal;
  logger?: Logger;
}

export interface ScanResult {
  newLinks: number;
  totalLinks: number;
  connectedPorts: number[];
}

// ═══════════════════════════════════════════════════════════════════════════
// IMPLEMENTATION
// ═══════════════════════════════════════════════════════════════════════════

export class PeerDiscovery {
  private readonly socketLayer: ISocketLayer;
  private readonly supervisor: LinkSupervisor;
  private readonly registry: LinkRegistry;
  private readonly host: string;
  private readonly port: number;
  private readonly range: number;
  private readonly connectTimeoutMs: number;
  private readonly signal: AbortSignal;
  private readonly log: Logger;
  private scope: DiscoveryScope;
  private readonly queue = new PQueue({ concurrency: 1 });

  constructor(
    socketLayer: ISocketLayer,
    supervisor: LinkSupervisor,
    registry: LinkRegistry,
    config: PeerDiscoveryConfig,
  ) {
    this.socketLayer = socketLayer;
    this.supervisor = supervisor;
    this.registry = registry;
    this.host = config.host;
    this.port = config.port;
    this.range = config.range ?? DEFAULT_DISCOVERY_RANGE;
    this.connectTimeoutMs = config.connectTimeoutMs ?? DEFAULT_CONNECT_TIMEOUT_MS;
    this.signal = config.signal;
    this.scope = config.scope ?? 'upward';
    this.log = config.logger ?? createLogger('PeerDiscovery');
  }

  /** Ports this node dials, lowest first */
  getWindowPorts(): number[] {
    return discoveryTargets(this.port, this.range, this.scope);
  }

  getScope(): DiscoveryScope {
    return this.scope;
  }

  /** Takes effect from the next scan */
  setScope(scope: DiscoveryScope): void {
    this.scope = scope;
  }

  /**
   * Queue a scan behind any scan already running and resolve with its result.
   */
  async scan(): Promise<ScanResult> {
    // No queue timeout is set; the flag only selects the non-void typing.
    return this.queue.add(() => this.runScan(), { throwOnTimeout: true });
  }

  isScanning(): boolean {
    return this.queue.pending > 0;
  }

  /** Resolves once no scan is running or queued */
  async whenIdle(): Promise<void> {
    await this.queue.onIdle();
  }

  // ─────────────────────────────────────────────────────────────────────────
  // PRIVATE
  // ─────────────────────────────────────────────────────────────────────────

  private async runScan(): Promise<ScanResult> {
    let newLinks = 0;

    for (const port of this.getWindowPorts()) {
      if (this.signal.aborted) break;
      if (this.registry.hasPort(port)) continue;

      try {
        const stream = await this.socketLayer.connect(this.host, port, this.connectTimeoutMs);
        const link = this.supervisor.attach(stream, 'outbound', port);
        if (link) {
          newLinks++;
          this.log.info(`Connected to peer on port ${port}`);
        }
      } catch (error) {
        if (!isExpectedConnectError(error)) {
          this.log.warn(`Peer discovery error on ${port}: ${describeError(error)}`);
        }
      }
    }

    const result = this.snapshot(newLinks);
    if (newLinks > 0) {
      this.log.info(
        `Discovery: ${newLinks} new, ${result.totalLinks} total, ports: [${result.connectedPorts.join(', ')}]`,
      );
    } else {
      this.log.debug(`Discovery: no new peers, ${result.totalLinks} total active`);
    }
    return result;
  }

  private snapshot(newLinks: number): ScanResult {
    return {
      newLinks,
      totalLinks: this.registry.size,
      connectedPorts: this.registry.getConnectedPorts(),
    };
  }
}

/**
 * Ports a scan dials for `scope`, lowest first.
 */
export function discoveryTargets(port: number, range: number, scope: DiscoveryScope): number[] {
  if (scope === 'upward') {
    return discoveryWindow(port, range).filter((candidate) => candidate > port);
  }
  const ports = discoveryWindow(port, range);
  ports.push(port);
  return ports.sort((a, b) => a - b);
}

/**
 * Ports within `range` of `port`, excluding `port` itself and anything
 * outside 1..65535.
 */
export function discoveryWindow(port: number, range: number): number[] {
  const ports: number[] = [];
  for (let offset = -range; offset <= range; offset++) {
    if (offset === 0) continue;
    const candidate = port + offset;
    if (candidate < MIN_PORT || candidate > MAX_PORT) continue;
    ports.push(candidate);
  }
  return ports;
}
