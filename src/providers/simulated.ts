import type { ProviderCall } from './base.js';

export const DEFAULT_PACING_MS = 50;

/**
 * Stream emulation for providers called without incremental delivery: fetch
 * the full completion, then replay it word by word with a fixed delay.
 * Every word keeps a trailing space, including the last one. The replay stops
 * with the abort reason once the call's signal is aborted.
 */
export async function* simulateStream(
  call: ProviderCall,
  pacingMs: number = DEFAULT_PACING_MS
): AsyncGenerator<string, void, undefined> {
  const { content } = await call.complete();
  const words = content.split(' ');

  for (let i = 0; i < words.length; i++) {
    if (i > 0 && pacingMs > 0) {
      await sleep(pacingMs);
    }
    call.signal?.throwIfAborted();
    yield `${words[i]} `;
  }
}

function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}
