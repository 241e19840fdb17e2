/**
 * InboundQueue - Bounded FIFO between the readers and the context loop
 *
 * When full, the newest message is dropped and counted.
 */

import { createLogger } from '@murmur/types';
import type { InboundMessage, Logger } from '@murmur/types';

const DEFAULT_QUEUE_SIZE = 100;

export class InboundQueue {
  private items: InboundMessage[] = [];
  private dropped = 0;
  private readonly capacity: number;
  private readonly log: Logger;

  constructor(capacity: number = DEFAULT_QUEUE_SIZE, logger?: Logger) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new Error(`Queue capacity must be a positive integer, got ${capacity}`);
    }
    this.capacity = capacity;
    this.log = logger ?? createLogger('InboundQueue');
  }

  /**
   * Append a message. Returns false (and drops it) when the queue is full.
   */
  push(message: InboundMessage): boolean {
    if (this.items.length >= this.capacity) {
      this.dropped++;
      this.log.warn(`Queue full (${this.capacity}), dropping message from ${message.agent}`);
      return false;
    }
    this.items.push(message);
    return true;
  }

  shift(): InboundMessage | undefined {
    return this.items.shift();
  }

  /** Remove and return everything queued, oldest first */
  drain(): InboundMessage[] {
    const drained = this.items;
    this.items = [];
    return drained;
  }

  clear(): void {
    this.items = [];
  }

  get size(): number {
    return this.items.length;
  }

  get maxSize(): number {
    return this.capacity;
  }

  get droppedCount(): number {
    return this.dropped;
  }
}
