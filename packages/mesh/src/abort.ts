import { setTimeout as delay } from 'node:timers/promises';

/**
 * Sleep for `ms`. Resolves false instead of sleeping (or mid-sleep) once
 * `signal` aborts.
 */
export async function pause(ms: number, signal: AbortSignal): Promise<boolean> {
  if (signal.aborted) return false;
  try {
    await delay(ms, undefined, { signal });
    return true;
  } catch (error) {
    if (signal.aborted) return false;
    throw error;
  }
}

/**
 * Resolve with `work`, or with `fallback` if `work` takes longer than `ms`.
 */
export async function withTimeout<T, F>(work: Promise<T>, ms: number, fallback: F): Promise<T | F> {
  const timer = new AbortController();
  try {
    return await Promise.race([work, delay(ms, fallback, { signal: timer.signal })]);
  } finally {
    timer.abort();
  }
}

/**
 * A signal that aborts when any of `signals` does. Call `dispose` to
 * detach from the sources.
 */
export function linkSignals(...signals: Array<AbortSignal | undefined>): {
  signal: AbortSignal;
  dispose: () => void;
} {
  const controller = new AbortController();
  const sources = signals.filter((signal): signal is AbortSignal => signal !== undefined);
  const onAbort = () => controller.abort();

  for (const source of sources) {
    if (source.aborted) {
      controller.abort();
      break;
    }
    source.addEventListener('abort', onAbort, { once: true });
  }

  return {
    signal: controller.signal,
    dispose: () => {
      for (const source of sources) {
        source.removeEventListener('abort', onAbort);
      }
    },
  };
}
