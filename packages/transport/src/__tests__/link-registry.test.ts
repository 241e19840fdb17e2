import { describe, it, expect, vi, beforeEach } from 'vitest';
import { PassThrough } from 'node:stream';
import { LinkRegistry, toLinkInfo } from '../link-registry.js';

describe('LinkRegistry', () => {
  let registry: LinkRegistry;

  beforeEach(() => {
    registry = new LinkRegistry();
  });

  describe('add', () => {
    it('assigns increasing ids and records the port', () => {
      const a = registry.add(new PassThrough(), 'outbound', 54322);
      const b = registry.add(new PassThrough(), 'inbound', 40001);

      expect(a?.id).toBe(1);
      expect(b?.id).toBe(2);
      expect(a?.state).toBe('established');
      expect(registry.size).toBe(2);
      expect(registry.hasPort(54322)).toBe(true);
      expect(registry.hasPort(40001)).toBe(true);
    });

    it('refuses a second link to the same port', () => {
      registry.add(new PassThrough(), 'outbound', 54322);
      const duplicate = registry.add(new PassThrough(), 'inbound', 54322);

      expect(duplicate).toBeNull();
      expect(registry.size).toBe(1);
    });

    it('accepts any number of links without a known port', () => {
      registry.add(new PassThrough(), 'inbound', null);
      registry.add(new PassThrough(), 'inbound', null);

      expect(registry.size).toBe(2);
      expect(registry.getConnectedPorts()).toEqual([]);
    });

    it('emits added with a link snapshot', () => {
      const handler = vi.fn();
      registry.on('added', handler);

      const link = registry.add(new PassThrough(), 'outbound', 54320);

      expect(handler).toHaveBeenCalledOnce();
      expect(handler.mock.calls[0][0]).toEqual({
        id: 1,
        direction: 'outbound',
        remotePort: 54320,
        state: 'established',
        connectedAt: link?.connectedAt,
      });
    });
  });

  describe('remove', () => {
    it('removes the link and releases its port', () => {
      const link = registry.add(new PassThrough(), 'outbound', 54322);
      expect(link).not.toBeNull();
      if (!link) return;

      expect(registry.remove(link.id)).toBe(link);
      expect(registry.has(link.id)).toBe(false);
      expect(registry.hasPort(54322)).toBe(false);
    });

    it('is idempotent', () => {
      const handler = vi.fn();
      registry.on('removed', handler);
      const link = registry.add(new PassThrough(), 'outbound', 54322);
      if (!link) throw new Error('link not added');

      registry.remove(link.id);
      expect(registry.remove(link.id)).toBeUndefined();
      expect(handler).toHaveBeenCalledOnce();
    });

    it('lets the port be linked again afterwards', () => {
      const first = registry.add(new PassThrough(), 'outbound', 54322);
      if (!first) throw new Error('link not added');
      registry.remove(first.id);

      const second = registry.add(new PassThrough(), 'outbound', 54322);
      expect(second?.id).toBe(2);
      expect(registry.getConnectedPorts()).toEqual([54322]);
    });
  });

  describe('views', () => {
    it('lists connected ports in ascending order', () => {
      registry.add(new PassThrough(), 'outbound', 54325);
      registry.add(new PassThrough(), 'outbound', 54317);
      registry.add(new PassThrough(), 'inbound', 54320);

      expect(registry.getConnectedPorts()).toEqual([54317, 54320, 54325]);
    });

    it('returns a snapshot from list()', () => {
      registry.add(new PassThrough(), 'outbound', 1);
      registry.add(new PassThrough(), 'outbound', 2);

      const snapshot = registry.list();
      for (const link of snapshot) {
        registry.remove(link.id);
      }

      expect(snapshot).toHaveLength(2);
      expect(registry.size).toBe(0);
    });

    it('describes links without exposing streams', () => {
      registry.add(new PassThrough(), 'inbound', 40000);

      const [info] = registry.describe();
      expect(info).not.toHaveProperty('stream');
      expect(info.direction).toBe('inbound');
    });

    it('clear() empties the registry and returns the removed links', () => {
      registry.add(new PassThrough(), 'outbound', 1);
      registry.add(new PassThrough(), 'outbound', 2);

      const removed = registry.clear();

      expect(removed.map((link) => link.remotePort)).toEqual([1, 2]);
      expect(registry.size).toBe(0);
      expect(registry.getConnectedPorts()).toEqual([]);
    });
  });

  it('toLinkInfo copies the current state', () => {
    const link = registry.add(new PassThrough(), 'outbound', 7);
    if (!link) throw new Error('link not added');
    link.state = 'closed';

    expect(toLinkInfo(link).state).toBe('closed');
  });
});
