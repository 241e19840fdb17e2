export {
  TcpSocketLayer,
  ConnectTimeoutError,
  getErrorCode,
  isAddressInUse,
  isExpectedConnectError,
} from './socket-layer.js';
export type { AcceptedConnection, ISocketLayer, ListenHandle } from './socket-layer.js';

export { LinkRegistry, toLinkInfo } from './link-registry.js';
export type { Link, LinkRegistryEvents } from './link-registry.js';

export { PeerReader } from './peer-reader.js';
export type { PeerReaderOptions, ReaderCloseReason } from './peer-reader.js';

export { LinkSupervisor } from './link-supervisor.js';
export type { LinkSupervisorOptions } from './link-supervisor.js';

export { PeerListener } from './peer-listener.js';
export type { ListenOutcome } from './peer-listener.js';

export { PeerDiscovery, discoveryTargets, discoveryWindow } from './peer-discovery.js';
export type { DiscoveryScope, PeerDiscoveryConfig, ScanResult } from './peer-discovery.js';

export { MemorySocket, MemorySocketError, MemorySocketLayer } from './memory-socket-layer.js';
