/**
 * PeerListener - Accepts inbound links on the node's own port
 *
 * "Address in use" is not fatal: another agent already owns the port, so
 * the node carries on as a client and relies on discovery alone.
 */

import { createLogger, describeError } from '@murmur/types';
import type { Logger } from '@murmur/types';
import type { LinkSupervisor } from './link-supervisor.js';
import { isAddressInUse } from './socket-layer.js';
import type { AcceptedConnection, ISocketLayer, ListenHandle } from './socket-layer.js';

export type ListenOutcome = 'listening' | 'address_in_use' | 'failed';

export class PeerListener {
  private readonly socketLayer: ISocketLayer;
  private readonly supervisor: LinkSupervisor;
  private readonly log: Logger;
  private handle: ListenHandle | null = null;

  constructor(socketLayer: ISocketLayer, supervisor: LinkSupervisor, logger?: Logger) {
    this.socketLayer = socketLayer;
    this.supervisor = supervisor;
    this.log = logger ?? createLogger('PeerListener');
  }

  async start(host: string, port: number): Promise<ListenOutcome> {
    if (this.handle) {
      throw new Error('Listener already running');
    }

    try {
      this.handle = await this.socketLayer.listen(host, port, (connection) => {
        this.handleConnection(connection);
      });
      this.log.info(`Server started on ${host}:${this.handle.port}`);
      return 'listening';
    } catch (error) {
      if (isAddressInUse(error)) {
        this.log.warn(`Port ${port} in use, connecting as client only`);
        return 'address_in_use';
      }
      this.log.error(`Failed to start server: ${describeError(error)}`);
      return 'failed';
    }
  }

  async close(): Promise<void> {
    const handle = this.handle;
    if (!handle) return;
    this.handle = null;
    await handle.close();
    this.log.info('Server closed');
  }

  isListening(): boolean {
    return this.handle !== null;
  }

  getPort(): number | null {
    return this.handle?.port ?? null;
  }

  private handleConnection(connection: AcceptedConnection): void {
    const link = this.supervisor.attach(connection.stream, 'inbound', connection.remotePort);
    if (!link) return;

    const from = connection.remoteAddress
      ? `${connection.remoteAddress}:${connection.remotePort ?? '?'}`
      : `port ${connection.remotePort ?? '?'}`;
    this.log.info(`New connection from ${from} (link ${link.id})`);
  }
}
