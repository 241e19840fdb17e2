import { consola } from 'consola';
import type { Logger } from '@murmur/types';

export function createCliLogger(tag?: string): Logger {
  const instance = tag ? consola.withTag(tag) : consola;
  return {
    info: (msg, ...args) => instance.info(msg, ...args),
    warn: (msg, ...args) => instance.warn(msg, ...args),
    error: (msg, ...args) => instance.error(msg, ...args),
    debug: (msg, ...args) => instance.debug(msg, ...args),
  };
}
