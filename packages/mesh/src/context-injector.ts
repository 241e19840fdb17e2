/**
 * ContextInjector - Moves queued messages into the host's thought sink
 *
 * This is the one place where our own messages are dropped; readers and
 * the queue pass everything through.
 */

import { createLogger } from '@murmur/types';
import type { InboundMessage, Logger, ThoughtSink } from '@murmur/types';
import { preview } from './broadcaster.js';
import type { InboundQueue } from './inbound-queue.js';

export const GROUP_CHAT_SOURCE = 'group_chat';

export interface ContextInjectorOptions {
  agentName: string;
  queue: InboundQueue;
  logReceives?: boolean;
  logger?: Logger;
}

export interface InjectionResult {
  injected: number;
  skipped: number;
}

export class ContextInjector {
  private readonly agentName: string;
  private readonly queue: InboundQueue;
  private readonly logReceives: boolean;
  private readonly log: Logger;

  constructor(options: ContextInjectorOptions) {
    this.agentName = options.agentName;
    this.queue = options.queue;
    this.logReceives = options.logReceives ?? true;
    this.log = options.logger ?? createLogger('ContextInjector');
  }

  /**
   * Drain the queue into `sink` without waiting.
   * Stops between entries once `signal` is aborted; the rest stay queued.
   */
  injectPending(sink: ThoughtSink, signal?: AbortSignal): InjectionResult {
    const result: InjectionResult = { injected: 0, skipped: 0 };

    while (this.queue.size > 0) {
      if (signal?.aborted) break;

      const message = this.queue.shift();
      if (!message) break;

      if (this.inject(sink, message)) {
        result.injected++;
      } else {
        result.skipped++;
      }
    }

    return result;
  }

  /**
   * Forward one message. Returns false for our own or empty messages.
   */
  inject(sink: ThoughtSink, message: InboundMessage): boolean {
    if (!this.accepts(message)) {
      return false;
    }

    sink.addProcessedThought(formatThought(message), GROUP_CHAT_SOURCE);
    if (this.logReceives) {
      this.log.info(`Injected from ${message.agent}: ${preview(message.message)}`);
    }
    return true;
  }

  accepts(message: InboundMessage): boolean {
    return message.agent !== this.agentName && message.message.length > 0;
  }
}

export function formatThought(message: InboundMessage): string {
  return `${message.agent} said: ${message.message}`;
}
