/**
 * GroupChatNode - One agent's seat in the local group chat
 *
 * Owns the link registry, inbound queue, listener, discovery, broadcaster,
 * context injector and broadcast bridge. No module-level state: every
 * node is independent, so several can run in one process.
 *
 * Lifecycle:
 *   initialize()  listen → discover (after a short delay) → discover again
 *                 (listening nodes dial upward only; see PeerDiscovery)
 *   runContextLoop(sink)  periodic discovery + inject queued messages
 *   cleanup()  cancel, close listener, close links, clear state
 */

import { LineCodec, errorResult, isGroupChatCommand, successResult } from '@murmur/protocol';
import type { ToolResult } from '@murmur/protocol';
import {
  LinkRegistry,
  LinkSupervisor,
  PeerDiscovery,
  PeerListener,
  TcpSocketLayer,
  toLinkInfo,
} from '@murmur/transport';
import type { ISocketLayer, Link, ReaderCloseReason, ScanResult } from '@murmur/transport';
import { GroupChatConfigSchema, TypedEventEmitter, createLogger, describeError } from '@murmur/types';
import type {
  GroupChatConfig,
  GroupChatConfigInput,
  InboundMessage,
  LinkInfo,
  Logger,
  ThoughtSink,
} from '@murmur/types';
import { linkSignals, pause, withTimeout } from './abort.js';
import { BroadcastBridge } from './broadcast-bridge.js';
import type { BroadcastBridgeHandle } from './broadcast-bridge.js';
import { Broadcaster } from './broadcaster.js';
import { ContextInjector } from './context-injector.js';
import { DiscoverySchedule } from './discovery-schedule.js';
import { InboundQueue } from './inbound-queue.js';

// ═══════════════════════════════════════════════════════════════════════════
// CONSTANTS
// ═══════════════════════════════════════════════════════════════════════════

const DEFAULT_INITIAL_DISCOVERY_DELAY_MS = 200;
const DEFAULT_SECOND_DISCOVERY_DELAY_MS = 500;
const DEFAULT_INJECT_INTERVAL_MS = 500;
const DEFAULT_ERROR_BACKOFF_MS = 1000;
const DEFAULT_BRIDGE_TIMEOUT_MS = 1000;

// ═══════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════

export interface GroupChatTimingConfig {
  /** Wait after the listener starts before the first scan */
  initialDiscoveryDelayMs?: number;
  /** Wait before the second startup scan, for agents launched alongside */
  secondDiscoveryDelayMs?: number;
  /** Context loop sleep between ticks */
  injectIntervalMs?: number;
  /** Context loop sleep after a failed tick */
  errorBackoffMs?: number;
  /** Longest a bridged broadcast waits for its outcome */
  bridgeTimeoutMs?: number;
  warmupIntervalMs?: number;
  warmupWindowMs?: number;
  steadyIntervalMs?: number;
}

export interface GroupChatNodeConfig extends GroupChatConfigInput {
  logger?: Logger;
  timing?: GroupChatTimingConfig;
  /** Defaults to plain TCP */
  socketLayer?: ISocketLayer;
}

export interface GroupChatNodeEvents {
  linkOpened: (link: LinkInfo) => void;
  linkClosed: (link: LinkInfo) => void;
  message: (message: InboundMessage, link: LinkInfo) => void;
  discovery: (result: ScanResult) => void;
  error: (error: Error) => void;
}

interface RunState {
  controller: AbortController;
  supervisor: LinkSupervisor;
  listener: PeerListener;
  discovery: PeerDiscovery;
}

// ═══════════════════════════════════════════════════════════════════════════
// IMPLEMENTATION
// ═══════════════════════════════════════════════════════════════════════════

export class GroupChatNode extends TypedEventEmitter<GroupChatNodeEvents> {
  private readonly config: GroupChatConfig;
  private readonly timing: GroupChatTimingConfig;
  private readonly socketLayer: ISocketLayer;
  private readonly log: Logger;
  private readonly codec = new LineCodec();
  private readonly registry = new LinkRegistry();
  private readonly queue: InboundQueue;
  private readonly broadcaster: Broadcaster;
  private readonly injector: ContextInjector;
  private bridge: BroadcastBridge;
  private run: RunState | null = null;

  constructor(config: GroupChatNodeConfig) {
    super();
    this.config = GroupChatConfigSchema.parse(config);
    this.timing = config.timing ?? {};
    this.log = config.logger ?? createLogger('GroupChat');
    this.socketLayer = config.socketLayer ?? new TcpSocketLayer(this.log);

    this.queue = new InboundQueue(this.config.queueSize, this.log);
    this.broadcaster = new Broadcaster({
      agentName: this.config.agentName,
      registry: this.registry,
      codec: this.codec,
      maxMessageLength: this.config.maxMessageLength,
      logBroadcasts: this.config.logBroadcasts,
      logger: this.log,
    });
    this.injector = new ContextInjector({
      agentName: this.config.agentName,
      queue: this.queue,
      logReceives: this.config.logReceives,
      logger: this.log,
    });
    this.bridge = this.createBridge();

    this.registry.on('added', (link) => {
      this.bridge.setLinkCount(this.registry.size);
      this.emit('linkOpened', link);
    });
    this.registry.on('removed', (link) => {
      this.bridge.setLinkCount(this.registry.size);
      this.emit('linkClosed', link);
    });
  }

  // ─────────────────────────────────────────────────────────────────────────
  // LIFECYCLE
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Start listening and run the startup discovery passes.
   * Resolves false when the subsystem is unavailable; never rejects.
   */
  async initialize(): Promise<boolean> {
    if (this.run) {
      this.log.warn('Already initialized');
      return true;
    }
    if (!this.config.enabled) {
      this.log.info('Group chat disabled in config');
      return false;
    }

    const { host, port, agentName } = this.config;
    this.log.info(`Initializing on port ${port} as agent '${agentName}'`);

    if (this.bridge.isClosed()) {
      this.bridge = this.createBridge();
    }

    const run = this.createRunState();
    this.run = run;
    const { signal } = run.controller;

    try {
      const outcome = await run.listener.start(host, port);
      if (outcome === 'failed') {
        await this.cleanup();
        return false;
      }
      this.bridge.setRunning(true);

      if (outcome === 'address_in_use') {
        run.discovery.setScope('client');
        await this.discoverPeers(run);
        return this.run === run;
      }

      if (!(await pause(this.timing.initialDiscoveryDelayMs ?? DEFAULT_INITIAL_DISCOVERY_DELAY_MS, signal))) {
        return false;
      }
      await this.discoverPeers(run);

      if (!(await pause(this.timing.secondDiscoveryDelayMs ?? DEFAULT_SECOND_DISCOVERY_DELAY_MS, signal))) {
        return false;
      }
      await this.discoverPeers(run);
      return this.run === run;
    } catch (error) {
      this.emitError(error, 'Initialization error');
      await this.cleanup();
      return false;
    }
  }

  /**
   * Cancel every task, close the listener and every link, clear all state.
   */
  async cleanup(): Promise<void> {
    const run = this.run;
    if (!run) {
      this.queue.clear();
      return;
    }
    this.run = null;

    this.bridge.setRunning(false);
    const linksClosed = run.supervisor.closeAll();
    run.controller.abort();

    await run.listener.close();
    await run.discovery.whenIdle();
    await linksClosed;

    // Only links that never got a reader can remain here.
    for (const link of this.registry.clear()) {
      link.stream.destroy();
    }
    this.queue.clear();
    this.bridge.close();
    this.log.info('Group chat stopped');
  }

  isRunning(): boolean {
    return this.run !== null;
  }

  /**
   * Ready when the listener is bound or at least one link is up.
   */
  isAvailable(): boolean {
    const listening = this.isListening();
    const links = this.registry.size;
    if (!listening && links === 0) {
      this.log.warn(`Not available: server=${listening}, clients=${links}`);
      return false;
    }
    return true;
  }

  // ─────────────────────────────────────────────────────────────────────────
  // BROADCAST
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Fan `text` out to every link and wait for all writes to settle.
   */
  async broadcastMessage(text: string): Promise<boolean> {
    if (!this.run) return false;
    return this.broadcaster.broadcastMessage(text);
  }

  /**
   * Bounded broadcast for callers on this event loop. Never rejects.
   * Callers on other threads use a SyncBroadcastClient over getBridgeHandle().
   */
  async broadcast(text: string): Promise<boolean> {
    if (!this.run) {
      this.log.warn('Cannot broadcast - group chat not running');
      return false;
    }
    if (text.trim().length === 0) {
      return false;
    }
    if (this.registry.size === 0) {
      this.log.warn('No peer connections - broadcast skipped');
      return false;
    }

    const timeoutMs = this.timing.bridgeTimeoutMs ?? DEFAULT_BRIDGE_TIMEOUT_MS;
    try {
      const sent = await withTimeout(this.broadcaster.broadcastMessage(text), timeoutMs, null);
      if (sent === null) {
        this.log.warn(`Broadcast not confirmed within ${timeoutMs}ms`);
        return false;
      }
      return sent;
    } catch (error) {
      this.emitError(error, 'Broadcast error');
      return false;
    }
  }

  /**
   * Caller side of the cross-thread bridge. Issued once per bridge.
   */
  getBridgeHandle(): BroadcastBridgeHandle {
    return this.bridge.createHandle();
  }

  // ─────────────────────────────────────────────────────────────────────────
  // CONTEXT LOOP
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Inject queued messages into `sink` and rediscover peers on schedule,
   * until cleanup() or `signal` aborts.
   */
  async runContextLoop(sink: ThoughtSink, signal?: AbortSignal): Promise<void> {
    const run = this.run;
    if (!run) {
      this.log.warn('Context loop requested while not running');
      return;
    }

    const linked = linkSignals(run.controller.signal, signal);
    const schedule = new DiscoverySchedule(
      {
        warmupIntervalMs: this.timing.warmupIntervalMs,
        warmupWindowMs: this.timing.warmupWindowMs,
        steadyIntervalMs: this.timing.steadyIntervalMs,
      },
      Date.now(),
    );
    const injectIntervalMs = this.timing.injectIntervalMs ?? DEFAULT_INJECT_INTERVAL_MS;
    const errorBackoffMs = this.timing.errorBackoffMs ?? DEFAULT_ERROR_BACKOFF_MS;

    try {
      while (!linked.signal.aborted) {
        let wait = injectIntervalMs;
        try {
          const now = Date.now();
          if (schedule.isDue(now)) {
            schedule.markRun(now);
            await this.discoverPeers(run);
          }
          this.injector.injectPending(sink, linked.signal);
        } catch (error) {
          this.emitError(error, 'Context loop error');
          wait = errorBackoffMs;
        }

        if (!(await pause(wait, linked.signal))) break;
      }
    } finally {
      linked.dispose();
    }
  }

  // ─────────────────────────────────────────────────────────────────────────
  // TOOL COMMANDS
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Command surface for the host's tool framework. Never rejects.
   */
  async execute(command: string, args: readonly unknown[] = []): Promise<ToolResult> {
    try {
      if (!isGroupChatCommand(command)) {
        return errorResult(`Unknown command: ${command}`, {
          guidance: 'Available: broadcast, get_messages',
        });
      }

      switch (command) {
        case 'broadcast': {
          if (args.length === 0) {
            return errorResult('No message provided');
          }
          const report = await this.broadcaster.send(String(args[0]));
          if (report.delivered === 0) {
            return errorResult('Broadcast failed');
          }
          return successResult(`Broadcast to ${report.delivered} agent(s)`, {
            recipients: report.delivered,
          });
        }

        case 'get_messages': {
          const messages = this.queue.drain();
          return successResult(`Retrieved ${messages.length} message(s)`, {
            messages,
            count: messages.length,
          });
        }
      }
    } catch (error) {
      const message = describeError(error);
      return errorResult(`Execution error: ${message}`, { metadata: { error: message } });
    }
  }

  // ─────────────────────────────────────────────────────────────────────────
  // STATE ACCESSORS
  // ─────────────────────────────────────────────────────────────────────────

  getAgentName(): string {
    return this.config.agentName;
  }

  getPort(): number {
    return this.config.port;
  }

  isListening(): boolean {
    return this.run?.listener.isListening() ?? false;
  }

  getConnectedPorts(): number[] {
    return this.registry.getConnectedPorts();
  }

  getLinkCount(): number {
    return this.registry.size;
  }

  getLinks(): LinkInfo[] {
    return this.registry.describe();
  }

  getPendingCount(): number {
    return this.queue.size;
  }

  getDroppedCount(): number {
    return this.queue.droppedCount;
  }

  // ─────────────────────────────────────────────────────────────────────────
  // PRIVATE
  // ─────────────────────────────────────────────────────────────────────────

  private createRunState(): RunState {
    const controller = new AbortController();
    const supervisor = new LinkSupervisor({
      registry: this.registry,
      codec: this.codec,
      signal: controller.signal,
      onMessage: (message, link) => this.handleInbound(message, link),
      onLinkClosed: (link, reason) => this.handleLinkClosed(link, reason),
      logger: this.log,
    });
    const listener = new PeerListener(this.socketLayer, supervisor, this.log);
    const discovery = new PeerDiscovery(this.socketLayer, supervisor, this.registry, {
      host: this.config.host,
      port: this.config.port,
      range: this.config.discoveryRange,
      scope: 'upward',
      connectTimeoutMs: this.config.connectTimeoutMs,
      signal: controller.signal,
      logger: this.log,
    });
    return { controller, supervisor, listener, discovery };
  }

  private createBridge(): BroadcastBridge {
    return new BroadcastBridge((text) => this.broadcaster.broadcastMessage(text), this.log);
  }

  private async discoverPeers(run: RunState): Promise<void> {
    if (run.controller.signal.aborted) return;
    const result = await run.discovery.scan();
    this.emit('discovery', result);
  }

  private handleInbound(message: InboundMessage, link: Link): void {
    this.queue.push(message);
    this.emit('message', message, toLinkInfo(link));
  }

  private handleLinkClosed(link: Link, reason: ReaderCloseReason): void {
    if (reason === 'read_error' || reason === 'overflow') {
      this.log.warn(`Link ${link.id} dropped (${reason})`);
    }
  }

  private emitError(error: unknown, context: string): void {
    if (this.listenerCount('error') > 0) {
      this.emit('error', error instanceof Error ? error : new Error(String(error)));
      return;
    }
    this.log.error(`${context}: ${describeError(error)}`);
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// FACTORY
// ═══════════════════════════════════════════════════════════════════════════

export function createGroupChatNode(config: GroupChatNodeConfig): GroupChatNode {
  return new GroupChatNode(config);
}
