/**
 * Chat Example - Talk to other agents on this machine
 *
 * Starts a group chat node and relays typed lines to every peer.
 *
 * Usage:
 *   NAME=Anna PORT=54321 npx tsx examples/chat/index.ts
 *   NAME=Miku PORT=54322 npx tsx examples/chat/index.ts
 *
 * Each terminal needs its own port inside the discovery range.
 */

import { createGroupChatNode } from '@murmur/core';
import { createInterface } from 'node:readline';

const agentName = process.env.NAME ?? `Agent-${process.pid}`;
const port = Number(process.env.PORT ?? 54321);

const node = createGroupChatNode({ agentName, port, logBroadcasts: false, logReceives: false });

node.on('linkOpened', (link) => {
  console.log(`\n* linked (${link.direction}, port ${link.remotePort ?? '?'})`);
  rl.prompt();
});

node.on('linkClosed', (link) => {
  console.log(`\n* link ${link.id} closed`);
  rl.prompt();
});

const rl = createInterface({ input: process.stdin, output: process.stdout });
rl.setPrompt(`${agentName}> `);

if (!(await node.initialize())) {
  console.error('Group chat unavailable');
  process.exit(1);
}

console.log(`Chat started as "${agentName}" on port ${port}`);
console.log('Waiting for peers...\n');

const loop = node.runContextLoop({
  addProcessedThought: (content) => {
    console.log(`\n${content}`);
    rl.prompt();
  },
});

rl.prompt();

rl.on('line', (line) => {
  node
    .broadcast(line)
    .catch((error: unknown) => console.error('Broadcast failed:', error))
    .finally(() => rl.prompt());
});

rl.on('close', () => {
  console.log('\nBye!');
  node
    .cleanup()
    .then(() => loop)
    .then(() => process.exit(0))
    .catch((error: unknown) => {
      console.error(error);
      process.exit(1);
    });
});
