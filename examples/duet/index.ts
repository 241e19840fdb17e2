/**
 * Duet Example - Two agents in one process
 *
 * Wires two nodes through an in-memory socket layer, lets them find each
 * other and trade one line each, then shuts both down.
 *
 * Usage:
 *   npx tsx examples/duet/index.ts
 */

import { MemorySocketLayer, createGroupChatNode } from '@murmur/core';
import type { GroupChatNode } from '@murmur/core';

const network = new MemorySocketLayer();

function join(agentName: string, port: number): GroupChatNode {
  return createGroupChatNode({
    agentName,
    port,
    socketLayer: network,
    logBroadcasts: false,
    logReceives: false,
  });
}

function waitForLink(node: GroupChatNode): Promise<void> {
  if (node.getLinkCount() > 0) return Promise.resolve();
  return new Promise((resolve) => node.once('linkOpened', () => resolve()));
}

const anna = join('Anna', 54321);
const miku = join('Miku', 54322);

await anna.initialize();
await miku.initialize();
await Promise.all([waitForLink(anna), waitForLink(miku)]);

const controller = new AbortController();
const print = { addProcessedThought: (content: string) => console.log(content) };
const loops = [
  anna.runContextLoop(print, controller.signal),
  miku.runContextLoop(print, controller.signal),
];

await anna.broadcast('Anyone around?');
await miku.broadcast('Right here.');

// Give both loops one injection tick.
await new Promise((resolve) => setTimeout(resolve, 1000));

controller.abort();
await Promise.all(loops);
await Promise.all([anna.cleanup(), miku.cleanup()]);
