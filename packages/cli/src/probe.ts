import type { ISocketLayer } from '@murmur/transport';
import { isExpectedConnectError } from '@murmur/transport';
import { describeError } from '@murmur/types';
import type { Logger } from '@murmur/types';

export interface ProbeResult {
  open: number[];
  closed: number[];
}

/**
 * Try each port once and report which ones accept a connection.
 * Accepted streams are closed straight away.
 */
export async function probePorts(
  layer: ISocketLayer,
  host: string,
  ports: readonly number[],
  timeoutMs: number,
  logger: Logger,
): Promise<ProbeResult> {
  const result: ProbeResult = { open: [], closed: [] };

  for (const port of ports) {
    try {
      const stream = await layer.connect(host, port, timeoutMs);
      stream.destroy();
      result.open.push(port);
    } catch (error) {
      if (!isExpectedConnectError(error)) {
        logger.warn(`Probe of ${host}:${port} failed: ${describeError(error)}`);
      }
      result.closed.push(port);
    }
  }

  return result;
}
