export { GroupChatNode, createGroupChatNode } from './group-chat-node.js';
export type { GroupChatNodeConfig, GroupChatNodeEvents, GroupChatTimingConfig } from './group-chat-node.js';

export { BroadcastBridge, SyncBroadcastClient, BRIDGE_SLOTS, BridgeRequestSchema } from './broadcast-bridge.js';
export type { BroadcastBridgeHandle, BridgeRequest, SyncBroadcastClientOptions } from './broadcast-bridge.js';

export { Broadcaster } from './broadcaster.js';
export type { BroadcasterOptions, BroadcastReport, BroadcastRejection } from './broadcaster.js';

export { ContextInjector, GROUP_CHAT_SOURCE, formatThought } from './context-injector.js';
export type { ContextInjectorOptions, InjectionResult } from './context-injector.js';

export { InboundQueue } from './inbound-queue.js';

export { DiscoverySchedule } from './discovery-schedule.js';
export type { DiscoveryScheduleConfig } from './discovery-schedule.js';
