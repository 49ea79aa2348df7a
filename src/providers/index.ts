import type { ProviderAdapters } from './base.js';
import { AnthropicProvider } from './anthropic.js';
import { GeminiProvider } from './gemini.js';
import { OpenAIProvider } from './openai.js';

export interface AdapterOptions {
  /** Delay between simulated stream chunks. */
  pacingMs?: number;
}

/**
 * One adapter per known provider. The mapped type makes a missing provider a
 * compile error.
 */
export function createAdapters(options: AdapterOptions = {}): ProviderAdapters {
  return {
    openai: new OpenAIProvider('openai'),
    anthropic: new AnthropicProvider({ pacingMs: options.pacingMs }),
    deepseek: new OpenAIProvider('deepseek'),
    gemini: new GeminiProvider({ pacingMs: options.pacingMs }),
    mistral: new OpenAIProvider('mistral'),
  };
}

export * from './base.js';
export { ProviderRegistry, createRegistry, type ProviderDescriptor } from './registry.js';
