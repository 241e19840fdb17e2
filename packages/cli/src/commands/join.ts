import { defineCommand } from 'citty';
import { consola } from 'consola';
import { createInterface } from 'node:readline';
import { createGroupChatNode } from '@murmur/mesh';
import type { InboundMessage, LinkInfo, ThoughtSink } from '@murmur/types';
import { ConfigError, loadConfig } from '../config.js';
import { createCliLogger } from '../logger.js';

function formatLink(link: LinkInfo): string {
  const port = link.remotePort ?? 'unknown port';
  return `#${link.id} ${link.direction} (${port})`;
}

export const joinCommand = defineCommand({
  meta: {
    name: 'join',
    description: 'Join the local group chat and relay stdin lines to peers',
  },
  args: {
    name: {
      type: 'string',
      description: 'Agent name',
    },
    port: {
      type: 'string',
      description: 'Listener port',
    },
    host: {
      type: 'string',
      description: 'Bind and discovery host',
    },
    range: {
      type: 'string',
      description: 'Ports to scan on each side',
    },
    dir: {
      type: 'string',
      description: 'Directory holding murmur.config.json',
      default: '.',
    },
  },
  async run({ args }) {
    const config = await loadConfig(args.dir, {
      name: args.name,
      port: args.port,
      host: args.host,
      range: args.range,
    }).catch((error: unknown) => {
      if (error instanceof ConfigError) {
        consola.error(error.message);
        process.exit(1);
      }
      throw error;
    });

    const node = createGroupChatNode({ ...config, logger: createCliLogger(config.agentName) });

    node.on('linkOpened', (link: LinkInfo) => {
      consola.success(`Linked: ${formatLink(link)}`);
    });

    node.on('linkClosed', (link: LinkInfo) => {
      consola.warn(`Unlinked: ${formatLink(link)}`);
    });

    node.on('message', (message: InboundMessage) => {
      consola.debug(`Received from ${message.agent} at ${message.timestamp}`);
    });

    node.on('error', (error: Error) => {
      consola.error('Group chat error:', error.message);
    });

    consola.start(`Joining group chat as ${config.agentName} on ${config.host}:${config.port}`);

    const available = await node.initialize();
    if (!available) {
      consola.error('Group chat unavailable');
      process.exit(1);
    }

    const sink: ThoughtSink = {
      addProcessedThought: (content) => consola.log(content),
    };
    const loop = node.runContextLoop(sink);

    const input = createInterface({ input: process.stdin });
    input.on('line', (line) => {
      node
        .broadcast(line)
        .then((sent) => {
          if (!sent && line.trim().length > 0) {
            consola.warn('Not delivered: no peers connected');
          }
        })
        .catch((error: unknown) => {
          consola.error('Broadcast failed:', error);
        });
    });

    // Graceful shutdown
    let stopping = false;
    const shutdown = async () => {
      if (stopping) return;
      stopping = true;
      consola.info('Leaving group chat...');
      input.close();
      await node.cleanup();
      await loop;
      consola.success('Stopped');
      process.exit(0);
    };

    const onSignal = () => {
      shutdown().catch((error: unknown) => {
        consola.error('Shutdown failed:', error);
        process.exit(1);
      });
    };

    process.on('SIGINT', onSignal);
    process.on('SIGTERM', onSignal);
    input.on('close', onSignal);

    consola.info('Type a line and press enter to broadcast it');
  },
});
