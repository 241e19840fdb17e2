import { defineCommand } from 'citty';
import { consola } from 'consola';
import { TcpSocketLayer, discoveryWindow } from '@murmur/transport';
import { loadConfig } from '../config.js';
import { createCliLogger } from '../logger.js';
import { probePorts } from '../probe.js';

export const scanCommand = defineCommand({
  meta: {
    name: 'scan',
    description: 'List the ports around ours that have a listener',
  },
  args: {
    dir: {
      type: 'string',
      description: 'Directory holding murmur.config.json',
      default: '.',
    },
    host: {
      type: 'string',
      description: 'Host to probe',
    },
    port: {
      type: 'string',
      description: 'Centre of the scan window',
    },
    range: {
      type: 'string',
      description: 'Ports to scan on each side',
    },
  },
  async run({ args }) {
    // The scan has no agent of its own; a placeholder keeps validation happy.
    const config = await loadConfig(args.dir, {
      name: 'scan',
      host: args.host,
      port: args.port,
      range: args.range,
    });
    const logger = createCliLogger('scan');
    const ports = discoveryWindow(config.port, config.discoveryRange);

    consola.start(`Scanning ${config.host}:${ports[0]}-${ports[ports.length - 1]}`);

    const result = await probePorts(
      new TcpSocketLayer(logger),
      config.host,
      ports,
      config.connectTimeoutMs,
      logger,
    );

    if (result.open.length === 0) {
      consola.info('No peers listening');
      return;
    }

    consola.success(`${result.open.length} peer(s) listening:`);
    for (const port of result.open) {
      consola.log(`  ${config.host}:${port}`);
    }
  },
});
