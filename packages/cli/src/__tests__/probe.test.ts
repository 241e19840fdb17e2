import { describe, it, expect, vi } from 'vitest';
import { MemorySocketLayer, discoveryWindow } from '@murmur/transport';
import type { ISocketLayer } from '@murmur/transport';
import { silentLogger } from '@murmur/types';
import type { Logger } from '@murmur/types';
import { probePorts } from '../probe.js';

describe('probePorts', () => {
  it('reports the ports that accept a connection', async () => {
    const network = new MemorySocketLayer();
    await network.listen('127.0.0.1', 54322, () => {});
    await network.listen('127.0.0.1', 54324, () => {});

    const result = await probePorts(
      network,
      '127.0.0.1',
      discoveryWindow(54321, 3),
      100,
      silentLogger,
    );

    expect(result.open).toEqual([54322, 54324]);
    expect(result.closed).toEqual([54318, 54319, 54320, 54323]);
  });

  it('warns about unexpected connect errors', async () => {
    const logger: Logger = { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() };
    const layer: ISocketLayer = {
      listen: vi.fn(),
      connect: vi.fn(async () => {
        throw new Error('disk on fire');
      }),
    };

    const result = await probePorts(layer, '127.0.0.1', [54322], 100, logger);

    expect(result).toEqual({ open: [], closed: [54322] });
    expect(logger.warn).toHaveBeenCalledWith('Probe of 127.0.0.1:54322 failed: disk on fire');
  });
});
