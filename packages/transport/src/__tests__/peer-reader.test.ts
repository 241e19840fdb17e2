import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { Mock } from 'vitest';
import type { Duplex } from 'node:stream';
import { LineCodec } from '@murmur/protocol';
import { silentLogger } from '@murmur/types';
import type { Logger } from '@murmur/types';
import { LinkRegistry } from '../link-registry.js';
import type { Link } from '../link-registry.js';
import { MemorySocket } from '../memory-socket-layer.js';
import { PeerReader } from '../peer-reader.js';
import type { PeerReaderOptions } from '../peer-reader.js';

function createMockLogger(): Logger {
  return {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  };
}

function addLink(registry: LinkRegistry, stream: Duplex, port: number): Link {
  const link = registry.add(stream, 'outbound', port);
  if (!link) throw new Error(`port ${port} already linked`);
  return link;
}

describe('PeerReader', () => {
  let registry: LinkRegistry;
  let controller: AbortController;
  let local: MemorySocket;
  let remote: MemorySocket;
  let link: Link;
  let onMessage: Mock<PeerReaderOptions['onMessage']>;
  let onClose: Mock<NonNullable<PeerReaderOptions['onClose']>>;

  function createReader(overrides: Partial<PeerReaderOptions> = {}): PeerReader {
    return new PeerReader(link, {
      registry,
      codec: new LineCodec(),
      signal: controller.signal,
      onMessage,
      onClose,
      logger: silentLogger,
      ...overrides,
    });
  }

  beforeEach(() => {
    registry = new LinkRegistry();
    controller = new AbortController();
    [local, remote] = MemorySocket.pair();
    link = addLink(registry, local, 54322);
    onMessage = vi.fn<PeerReaderOptions['onMessage']>();
    onClose = vi.fn<NonNullable<PeerReaderOptions['onClose']>>();
  });

  describe('reading', () => {
    it('reassembles a line split across chunks', async () => {
      createReader().start();

      remote.write('{"agent":"Miku","mess');
      remote.write('age":"hi","timestamp":1}\n');

      await vi.waitFor(() => expect(onMessage).toHaveBeenCalledOnce());
      expect(onMessage).toHaveBeenCalledWith({ agent: 'Miku', message: 'hi', timestamp: 1 }, link);
    });

    it('delivers several lines from one chunk in order', async () => {
      createReader().start();

      remote.write(
        '{"agent":"A","message":"one","timestamp":1}\n{"agent":"B","message":"two","timestamp":2}\n',
      );

      await vi.waitFor(() => expect(onMessage).toHaveBeenCalledTimes(2));
      expect(onMessage.mock.calls.map(([message]) => message.message)).toEqual(['one', 'two']);
    });

    it('does not filter messages by author', async () => {
      createReader().start();

      remote.write('{"agent":"Anna","message":"echo","timestamp":1}\n');

      await vi.waitFor(() => expect(onMessage).toHaveBeenCalledOnce());
      expect(onMessage.mock.calls[0][0].agent).toBe('Anna');
    });

    it('logs and discards an invalid line but keeps the link', async () => {
      const logger = createMockLogger();
      createReader({ logger }).start();

      remote.write('not json\n{"agent":"Miku","message":"still here","timestamp":3}\n');

      await vi.waitFor(() => expect(onMessage).toHaveBeenCalledOnce());
      expect(logger.warn).toHaveBeenCalledWith('Invalid message received on link 1: Invalid JSON');
      expect(registry.has(link.id)).toBe(true);
      expect(link.state).toBe('established');
    });

    it('drops the link when an unterminated line grows past the limit', async () => {
      createReader({ codec: new LineCodec({ maxLineBytes: 16 }) }).start();

      remote.write('x'.repeat(32));

      await vi.waitFor(() => expect(onClose).toHaveBeenCalledWith(link, 'overflow'));
      expect(registry.size).toBe(0);
    });
  });

  describe('teardown', () => {
    it('removes the link when the remote ends the stream', async () => {
      const reader = createReader();
      reader.start();

      remote.end();

      await reader.closed;
      expect(onClose).toHaveBeenCalledWith(link, 'remote_closed');
      expect(registry.hasPort(54322)).toBe(false);
      expect(link.state).toBe('closed');
    });

    it('removes the link when the remote goes away without ending', async () => {
      const reader = createReader();
      reader.start();

      remote.destroy();

      await reader.closed;
      expect(onClose).toHaveBeenCalledOnce();
      expect(registry.size).toBe(0);
    });

    it('closes with read_error when the stream fails', async () => {
      const logger = createMockLogger();
      const reader = createReader({ logger });
      reader.start();

      local.destroy(new Error('boom'));

      await reader.closed;
      expect(onClose).toHaveBeenCalledWith(link, 'read_error');
      expect(logger.warn).toHaveBeenCalledWith('Peer reader error on link 1: boom');
    });

    it('closes on cancellation and destroys the stream', async () => {
      const reader = createReader();
      reader.start();

      controller.abort();

      await reader.closed;
      expect(onClose).toHaveBeenCalledWith(link, 'cancelled');
      expect(local.destroyed).toBe(true);
      expect(registry.size).toBe(0);
    });

    it('closes immediately when started after cancellation', async () => {
      controller.abort();
      const reader = createReader();
      reader.start();

      expect(reader.isClosed()).toBe(true);
      await reader.closed;
      expect(onClose).toHaveBeenCalledWith(link, 'cancelled');
    });

    it('tears down exactly once', async () => {
      const reader = createReader();
      reader.start();

      reader.close('cancelled');
      reader.close('remote_closed');
      remote.end();

      await reader.closed;
      expect(onClose).toHaveBeenCalledOnce();
      expect(onClose).toHaveBeenCalledWith(link, 'cancelled');
    });

    it('does not deliver data that arrives after close', async () => {
      const reader = createReader();
      reader.start();
      reader.close('cancelled');
      const remoteError = vi.fn();
      remote.on('error', remoteError);

      remote.write('{"agent":"Miku","message":"late","timestamp":1}\n');

      await vi.waitFor(() => expect(remoteError).toHaveBeenCalledOnce());
      expect(onMessage).not.toHaveBeenCalled();
    });

    it('refuses to start twice', () => {
      const reader = createReader();
      reader.start();

      expect(() => reader.start()).toThrow('Reader for link 1 already started');
      reader.close('cancelled');
    });
  });
});
