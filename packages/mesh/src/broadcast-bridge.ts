/**
 * Broadcast bridge - Synchronous broadcast from another thread
 *
 * The event loop that owns the sockets hosts a BroadcastBridge. Its handle
 * (shared state + a MessagePort) is transferred to a caller thread, where
 * SyncBroadcastClient.broadcast() blocks for a bounded time waiting for
 * the loop to report the outcome.
 *
 * Shared state layout (Int32Array):
 * ┌─────────┬───────┬──────┬──────────────────────────────┐
 * │ RUNNING │ LINKS │ SEQ  │ DONE (+seq ok / -seq failed) │
 * └─────────┴───────┴──────┴──────────────────────────────┘
 *
 * The bridge only forwards to the async broadcaster; it never touches
 * the link registry itself.
 */

import { MessageChannel } from 'node:worker_threads';
import type { MessagePort } from 'node:worker_threads';
import { z } from 'zod';
import { createLogger, describeError, silentLogger } from '@murmur/types';
import type { Logger } from '@murmur/types';

// ═══════════════════════════════════════════════════════════════════════════
// CONSTANTS
// ═══════════════════════════════════════════════════════════════════════════

export const BRIDGE_SLOTS = {
  RUNNING: 0,
  LINKS: 1,
  SEQ: 2,
  DONE: 3,
} as const;

const SLOT_COUNT = 4;
const MAX_SEQ = 0x3fffffff;
const DEFAULT_BRIDGE_TIMEOUT_MS = 1000;

// ═══════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Everything a caller thread needs. Transfer `port` in the transferList
 * when posting the handle to a worker.
 */
export interface BroadcastBridgeHandle {
  state: SharedArrayBuffer;
  port: MessagePort;
}

export const BridgeRequestSchema = z.object({
  seq: z.number().int().min(1).max(MAX_SEQ),
  text: z.string(),
});
export type BridgeRequest = z.infer<typeof BridgeRequestSchema>;

export interface SyncBroadcastClientOptions {
  timeoutMs?: number;
  logger?: Logger;
}

// ═══════════════════════════════════════════════════════════════════════════
// HOST (event loop side)
// ═══════════════════════════════════════════════════════════════════════════

export class BroadcastBridge {
  private readonly buffer = new SharedArrayBuffer(SLOT_COUNT * Int32Array.BYTES_PER_ELEMENT);
  private readonly state = new Int32Array(this.buffer);
  private readonly channel = new MessageChannel();
  private readonly send: (text: string) => Promise<boolean>;
  private readonly log: Logger;
  private handleIssued = false;
  private closed = false;

  constructor(send: (text: string) => Promise<boolean>, logger?: Logger) {
    this.send = send;
    this.log = logger ?? createLogger('BroadcastBridge');

    this.channel.port1.on('message', (raw: unknown) => {
      this.handleRequest(raw).catch((error: unknown) => {
        this.log.error(`Bridge request failed: ${describeError(error)}`);
      });
    });
    // Never keeps the process alive on its own.
    this.channel.port1.unref();
  }

  /**
   * Hand out the caller side. There is exactly one per bridge.
   */
  createHandle(): BroadcastBridgeHandle {
    if (this.handleIssued) {
      throw new Error('Bridge handle already issued');
    }
    this.handleIssued = true;
    return { state: this.buffer, port: this.channel.port2 };
  }

  setRunning(running: boolean): void {
    if (this.closed) return;
    Atomics.store(this.state, BRIDGE_SLOTS.RUNNING, running ? 1 : 0);
  }

  setLinkCount(count: number): void {
    if (this.closed) return;
    Atomics.store(this.state, BRIDGE_SLOTS.LINKS, count);
  }

  isClosed(): boolean {
    return this.closed;
  }

  /**
   * Mark the loop as stopped and close the host port.
   * Callers see RUNNING=0 and return false without posting.
   */
  close(): void {
    if (this.closed) return;
    Atomics.store(this.state, BRIDGE_SLOTS.RUNNING, 0);
    Atomics.store(this.state, BRIDGE_SLOTS.LINKS, 0);
    this.closed = true;
    this.channel.port1.close();
    if (!this.handleIssued) {
      this.channel.port2.close();
    }
  }

  private async handleRequest(raw: unknown): Promise<void> {
    const parsed = BridgeRequestSchema.safeParse(raw);
    if (!parsed.success) {
      this.log.warn('Ignoring malformed bridge request');
      return;
    }

    const { seq, text } = parsed.data;
    let ok = false;
    try {
      ok = await this.send(text);
    } catch (error) {
      this.log.error(`Broadcast error: ${describeError(error)}`);
    }
    this.complete(seq, ok);
  }

  private complete(seq: number, ok: boolean): void {
    Atomics.store(this.state, BRIDGE_SLOTS.DONE, ok ? seq : -seq);
    Atomics.notify(this.state, BRIDGE_SLOTS.DONE);
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// CLIENT (caller thread side)
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Blocking broadcast for a thread that is not the event loop owning the
 * sockets. Calling it on that loop's own thread always times out, since
 * the loop cannot run while this thread waits.
 */
export class SyncBroadcastClient {
  private readonly state: Int32Array;
  private readonly port: MessagePort;
  private readonly timeoutMs: number;
  private readonly log: Logger;

  constructor(handle: BroadcastBridgeHandle, options: SyncBroadcastClientOptions = {}) {
    this.state = new Int32Array(handle.state);
    this.port = handle.port;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_BRIDGE_TIMEOUT_MS;
    this.log = options.logger ?? silentLogger;
  }

  isRunning(): boolean {
    return Atomics.load(this.state, BRIDGE_SLOTS.RUNNING) === 1;
  }

  getLinkCount(): number {
    return Atomics.load(this.state, BRIDGE_SLOTS.LINKS);
  }

  /**
   * Broadcast `text` and wait for the outcome.
   * False when not running, no links, blank text, or no answer in time.
   */
  broadcast(text: string): boolean {
    if (text.trim().length === 0) return false;
    if (!this.isRunning()) {
      this.log.warn('Cannot broadcast - group chat not running');
      return false;
    }
    if (this.getLinkCount() <= 0) {
      this.log.warn('No peer connections - broadcast skipped');
      return false;
    }

    const seq = (Atomics.add(this.state, BRIDGE_SLOTS.SEQ, 1) % MAX_SEQ) + 1;
    const request: BridgeRequest = { seq, text };

    try {
      this.port.postMessage(request);
    } catch (error) {
      this.log.error(`Could not schedule broadcast: ${describeError(error)}`);
      return false;
    }

    const deadline = Date.now() + this.timeoutMs;
    for (;;) {
      const done = Atomics.load(this.state, BRIDGE_SLOTS.DONE);
      if (Math.abs(done) === seq) {
        return done > 0;
      }
      const remaining = deadline - Date.now();
      if (remaining <= 0) {
        this.log.warn(`Broadcast not confirmed within ${this.timeoutMs}ms`);
        return false;
      }
      Atomics.wait(this.state, BRIDGE_SLOTS.DONE, done, remaining);
    }
  }

  close(): void {
    this.port.close();
  }
}
