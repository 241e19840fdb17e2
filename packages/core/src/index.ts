// ═══════════════════════════════════════════════════════════════════════════
// murmur: unified entry point for the local agent group chat
// ═══════════════════════════════════════════════════════════════════════════

// Group chat node (primary API)
export { GroupChatNode, createGroupChatNode } from '@murmur/mesh';
export type { GroupChatNodeConfig, GroupChatNodeEvents, GroupChatTimingConfig } from '@murmur/mesh';

// Cross-thread broadcast
export { BroadcastBridge, SyncBroadcastClient, BRIDGE_SLOTS } from '@murmur/mesh';
export type { BroadcastBridgeHandle, SyncBroadcastClientOptions } from '@murmur/mesh';

// Building blocks
export { Broadcaster, ContextInjector, InboundQueue, DiscoverySchedule, formatThought } from '@murmur/mesh';
export type { BroadcastReport, InjectionResult } from '@murmur/mesh';

// Transport
export {
  TcpSocketLayer,
  MemorySocketLayer,
  LinkRegistry,
  PeerDiscovery,
  PeerListener,
  discoveryWindow,
} from '@murmur/transport';
export type { ISocketLayer, AcceptedConnection, ListenHandle, ScanResult } from '@murmur/transport';

// Types & utilities
export {
  createLogger,
  createWireMessage,
  silentLogger,
  TypedEventEmitter,
  GroupChatConfigSchema,
  WireMessageSchema,
  DEFAULT_GROUP_CHAT_HOST,
  DEFAULT_GROUP_CHAT_PORT,
} from '@murmur/types';
export type {
  GroupChatConfig,
  GroupChatConfigInput,
  InboundMessage,
  LinkInfo,
  Logger,
  ThoughtSink,
  WireMessage,
} from '@murmur/types';

// Protocol
export { LineCodec, WireDecodeError, MAX_LINE_BYTES } from '@murmur/protocol';
export type { ToolResult, GroupChatCommand } from '@murmur/protocol';
