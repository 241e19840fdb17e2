import { z } from 'zod';
import { EventEmitter } from 'events';

// ═══════════════════════════════════════════════════════════════════════════
// WIRE MESSAGE
// ═══════════════════════════════════════════════════════════════════════════

/**
 * A single chat line exchanged between agents.
 *
 * Serialized as one JSON object per line:
 *   {"agent": "Anna", "message": "hello", "timestamp": 1718000000.123}
 */
export const WireMessageSchema = z.object({
  /** Name of the agent that spoke */
  agent: z.string(),
  /** Spoken text */
  message: z.string(),
  /** Unix time in seconds (fractional) */
  timestamp: z.number(),
});
export type WireMessage = z.infer<typeof WireMessageSchema>;

/**
 * Decoded message waiting in the inbound queue.
 * Same shape as the wire record; kept as its own name for readability at the seams.
 */
export type InboundMessage = WireMessage;

/**
 * Create a wire record stamped with the current time.
 */
export function createWireMessage(agent: string, message: string, now: number = Date.now()): WireMessage {
  return {
    agent,
    message,
    timestamp: now / 1000,
  };
}

// ═══════════════════════════════════════════════════════════════════════════
// LINKS
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Who opened the link.
 * - inbound: accepted by our listener
 * - outbound: dialed by peer discovery
 */
export type LinkDirection = 'inbound' | 'outbound';

/**
 * Link lifecycle: connecting → established → closed.
 * `connecting` only exists inside a discovery connect attempt and is never stored.
 */
export type LinkState = 'connecting' | 'established' | 'closed';

/**
 * Read-only view of a link, safe to hand out of the registry.
 */
export interface LinkInfo {
  id: number;
  direction: LinkDirection;
  remotePort: number | null;
  state: LinkState;
  connectedAt: Date;
}

// ═══════════════════════════════════════════════════════════════════════════
// GROUP CHAT CONFIG
// ═══════════════════════════════════════════════════════════════════════════

export const DEFAULT_GROUP_CHAT_HOST = '127.0.0.1';
export const DEFAULT_GROUP_CHAT_PORT = 54321;

export const GroupChatConfigSchema = z.object({
  /** Enable the group chat subsystem */
  enabled: z.boolean().default(true),
  /** Name this agent speaks as; also used to drop our own messages */
  agentName: z.string().min(1),
  /** Bind host for the listener and target host for discovery */
  host: z.string().default(DEFAULT_GROUP_CHAT_HOST),
  /** Listener port; unique per agent on a host */
  port: z.number().int().min(1).max(65535).default(DEFAULT_GROUP_CHAT_PORT),
  /** Discovery scans port-range .. port+range */
  discoveryRange: z.number().int().min(1).max(100).default(5),
  /** Per-attempt connect timeout */
  connectTimeoutMs: z.number().int().positive().default(500),
  /** Longest message accepted for broadcast */
  maxMessageLength: z.number().int().positive().default(5000),
  /** Inbound queue capacity; newest messages are dropped when full */
  queueSize: z.number().int().positive().default(100),
  /** Log every outgoing broadcast */
  logBroadcasts: z.boolean().default(true),
  /** Log every injected inbound message */
  logReceives: z.boolean().default(true),
});
export type GroupChatConfig = z.infer<typeof GroupChatConfigSchema>;
export type GroupChatConfigInput = z.input<typeof GroupChatConfigSchema>;

// ═══════════════════════════════════════════════════════════════════════════
// THOUGHT SINK (consumed interface)
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Receives inbound chat lines, already formatted as "{agent} said: {message}".
 * Implemented by the host agent's thought buffer.
 */
export interface ThoughtSink {
  addProcessedThought(content: string, source: string): void;
}

// ═══════════════════════════════════════════════════════════════════════════
// LOGGER INTERFACE
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Simple logger interface. Consumers can provide their own logger.
 */
export interface Logger {
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
  debug(message: string, ...args: unknown[]): void;
}

/**
 * Create a logger with a prefix tag.
 */
export function createLogger(prefix: string): Logger {
  return {
    info: (msg, ...args) => console.log(`[${prefix}] ${msg}`, ...args),
    warn: (msg, ...args) => console.warn(`[${prefix}] ${msg}`, ...args),
    error: (msg, ...args) => console.error(`[${prefix}] ${msg}`, ...args),
    debug: (msg, ...args) => console.debug(`[${prefix}] ${msg}`, ...args),
  };
}

/**
 * Logger that discards everything.
 */
export const silentLogger: Logger = {
  info: () => {},
  warn: () => {},
  error: () => {},
  debug: () => {},
};

/**
 * Render an unknown thrown value for a log line.
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// ═══════════════════════════════════════════════════════════════════════════
// TYPED EVENT EMITTER
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Type-safe EventEmitter. Extend with an event map to get typed on/off/emit.
 *
 * Usage: `class Foo extends TypedEventEmitter<{ myEvent: (x: number) => void }>`
 */
export class TypedEventEmitter<
  Events extends {} = {},
> extends EventEmitter {
  override on<K extends string & keyof Events>(
    event: K,
    listener: Events[K] & ((...args: any[]) => void),
  ): this {
    return super.on(event, listener);
  }

  override once<K extends string & keyof Events>(
    event: K,
    listener: Events[K] & ((...args: any[]) => void),
  ): this {
    return super.once(event, listener);
  }

  override off<K extends string & keyof Events>(
    event: K,
    listener: Events[K] & ((...args: any[]) => void),
  ): this {
    return super.off(event, listener);
  }

  override emit<K extends string & keyof Events>(
    event: K,
    ...args: Events[K] extends (...args: infer A) => any ? A : never
  ): boolean {
    return super.emit(event, ...args);
  }
}
