import type { ProviderName } from './base.js';

export type AliasListing = 'aliases' | 'model-ids';

export interface ProviderCatalogEntry {
  name: ProviderName;
  baseUrl: string;
  /** Which side of the alias table `listModelAliases` exposes. */
  listing: AliasListing;
  models: ReadonlyArray<readonly [alias: string, modelId: string]>;
}

export const API_KEY_ENV: Readonly<Record<ProviderName, string>> = {
  openai: 'OPENAI_API_KEY',
  anthropic: 'ANTHROPIC_API_KEY',
  deepseek: 'DEEPSEEK_API_KEY',
  gemini: 'GEMINI_API_KEY',
  mistral: 'MISTRAL_API_KEY',
};

// Registration order is the order providers are listed in.
export const DEFAULT_CATALOG: readonly ProviderCatalogEntry[] = [
  {
    name: 'openai',
    baseUrl: 'https://api.openai.com/v1',
    listing: 'aliases',
    models: [
      ['gpt-4o', 'gpt-4o'],
      ['gpt-4o-mini', 'gpt-4o-mini'],
      ['gpt-4-turbo', 'gpt-4-turbo'],
      ['gpt-4', 'gpt-4'],
      ['gpt-3.5-turbo', 'gpt-3.5-turbo'],
    ],
  },
  {
    name: 'anthropic',
    baseUrl: 'https://api.anthropic.com/v1',
    listing: 'aliases',
    models: [
      ['claude-opus-4', 'claude-opus-4-20250514'],
      ['claude-sonnet-4', 'claude-sonnet-4-20250514'],
      ['claude-3-7-sonnet', 'claude-3-7-sonnet-20250219'],
      ['claude-3-5-sonnet', 'claude-3-5-sonnet-20241022'],
      ['claude-3-5-haiku', 'claude-3-5-haiku-20241022'],
      ['claude-3-opus', 'claude-3-opus-20240229'],
      ['claude-3-sonnet', 'claude-3-sonnet-20240229'],
      ['claude-3-haiku', 'claude-3-haiku-20240307'],
    ],
  },
  {
    name: 'deepseek',
    baseUrl: 'https://api.deepseek.com/v1',
    listing: 'model-ids',
    models: [['deepseek-chat', 'deepseek-chat']],
  },
  {
    name: 'gemini',
    baseUrl: 'https://generativelanguage.googleapis.com/v1beta/models',
    listing: 'model-ids',
    models: [
      ['gemini-1.5-flash', 'gemini-1.5-flash'],
      ['gemini-2.0-flash-exp', 'gemini-2.0-flash-exp'],
      ['gemini-2.0-flash-lite-exp', 'gemini-2.0-flash-lite-exp'],
      ['gemini-2.0-flash-lite-preview-02-05', 'gemini-2.0-flash-lite-preview-02-05'],
      ['gemini-2.0-flash', 'gemini-2.0-flash'],
    ],
  },
  {
    name: 'mistral',
    baseUrl: 'https://api.mistral.ai/v1',
    listing: 'model-ids',
    models: [['mistral-large-latest', 'mistral-large-latest']],
  },
];
