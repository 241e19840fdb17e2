import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import type { Mock } from 'vitest';
import { LineCodec } from '@murmur/protocol';
import { silentLogger } from '@murmur/types';
import { LinkRegistry } from '../link-registry.js';
import { LinkSupervisor } from '../link-supervisor.js';
import type { LinkSupervisorOptions } from '../link-supervisor.js';
import { MemorySocket } from '../memory-socket-layer.js';

describe('LinkSupervisor', () => {
  let registry: LinkRegistry;
  let controller: AbortController;
  let supervisor: LinkSupervisor;
  let onLinkClosed: Mock<NonNullable<LinkSupervisorOptions['onLinkClosed']>>;

  beforeEach(() => {
    registry = new LinkRegistry();
    controller = new AbortController();
    onLinkClosed = vi.fn<NonNullable<LinkSupervisorOptions['onLinkClosed']>>();
    supervisor = new LinkSupervisor({
      registry,
      codec: new LineCodec(),
      signal: controller.signal,
      onMessage: vi.fn(),
      onLinkClosed,
      logger: silentLogger,
    });
  });

  afterEach(async () => {
    controller.abort();
    await supervisor.closeAll();
  });

  it('registers the link and starts one reader for it', () => {
    const [local] = MemorySocket.pair();

    const link = supervisor.attach(local, 'outbound', 54322);

    expect(link?.state).toBe('established');
    expect(registry.hasPort(54322)).toBe(true);
    expect(supervisor.readerCount).toBe(1);
  });

  it('destroys a second stream to a port that is already linked', () => {
    const [first] = MemorySocket.pair();
    const [second] = MemorySocket.pair();
    supervisor.attach(first, 'outbound', 54322);

    expect(supervisor.attach(second, 'outbound', 54322)).toBeNull();
    expect(second.destroyed).toBe(true);
    expect(registry.size).toBe(1);
    expect(supervisor.readerCount).toBe(1);
  });

  it('refuses new streams once cancelled', () => {
    const [local] = MemorySocket.pair();
    controller.abort();

    expect(supervisor.attach(local, 'inbound', null)).toBeNull();
    expect(local.destroyed).toBe(true);
    expect(registry.size).toBe(0);
  });

  it('lets the reader close a link removed from the registry elsewhere', () => {
    const [local] = MemorySocket.pair();
    const link = supervisor.attach(local, 'outbound', 54322);
    if (!link) throw new Error('link was not attached');

    registry.remove(link.id);

    expect(link.state).toBe('closed');
    expect(local.destroyed).toBe(true);
    expect(supervisor.readerCount).toBe(0);
    expect(onLinkClosed).toHaveBeenCalledOnce();
    expect(onLinkClosed).toHaveBeenCalledWith(link, 'evicted');
  });

  it('waits for streams that cancellation already closed', async () => {
    const [a] = MemorySocket.pair();
    const [b] = MemorySocket.pair();
    supervisor.attach(a, 'outbound', 54322);
    supervisor.attach(b, 'outbound', 54323);

    controller.abort();
    expect(supervisor.readerCount).toBe(0);

    await supervisor.closeAll();

    expect(a.closed).toBe(true);
    expect(b.closed).toBe(true);
  });

  it('stops following the registry after closeAll', async () => {
    expect(registry.listenerCount('removed')).toBe(1);

    await supervisor.closeAll();

    expect(registry.listenerCount('removed')).toBe(0);
  });
});
