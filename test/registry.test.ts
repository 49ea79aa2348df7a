import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { PROVIDER_NAMES } from '../src/providers/base.js';
import { createRegistry } from '../src/providers/registry.js';

describe('ProviderRegistry', () => {
  const registry = createRegistry();

  it('lists providers in registration order', () => {
    assert.deepEqual(registry.listProviders(), ['openai', 'anthropic', 'deepseek', 'gemini', 'mistral']);
  });

  it('resolves aliases to literal model ids', () => {
    assert.equal(registry.resolveModel('anthropic', 'claude-sonnet-4'), 'claude-sonnet-4-20250514');
    assert.equal(registry.resolveModel('openai', 'gpt-4o-mini'), 'gpt-4o-mini');
  });

  it('passes literal ids and unknown names through', () => {
    assert.equal(registry.resolveModel('anthropic', 'claude-3-haiku-20240307'), 'claude-3-haiku-20240307');
    assert.equal(registry.resolveModel('openai', 'gpt-5-preview'), 'gpt-5-preview');
    assert.equal(registry.resolveModel('nobody', 'some-model'), 'some-model');
  });

  it('resolves idempotently for every provider and alias', () => {
    for (const provider of PROVIDER_NAMES) {
      for (const alias of Object.keys(registry.getModelInfo(provider))) {
        const once = registry.resolveModel(provider, alias);
        assert.equal(registry.resolveModel(provider, once), once, `${provider}/${alias}`);
      }
    }
  });

  it('lists aliases for openai and anthropic and model ids for the rest', () => {
    assert.deepEqual(registry.listModelAliases('anthropic').slice(0, 2), ['claude-opus-4', 'claude-sonnet-4']);
    assert.deepEqual(registry.listModelAliases('deepseek'), ['deepseek-chat']);
    assert.deepEqual(registry.listModelAliases('mistral'), ['mistral-large-latest']);
    assert.equal(registry.listModelAliases('gemini').length, 5);
  });

  it('returns an empty list for an unknown provider', () => {
    assert.deepEqual(registry.listModelAliases('unknown-provider'), []);
    assert.deepEqual(registry.getModelInfo('unknown-provider'), {});
    assert.equal(registry.descriptor('unknown-provider'), undefined);
  });

  it('applies base URL overrides without trailing slashes', () => {
    const custom = createRegistry({ baseUrls: { openai: 'http://localhost:9999/v1/' } });
    assert.equal(custom.descriptor('openai')?.baseUrl, 'http://localhost:9999/v1');
    assert.equal(custom.descriptor('mistral')?.baseUrl, 'https://api.mistral.ai/v1');
  });

  it('is frozen', () => {
    assert.ok(Object.isFrozen(registry));
    assert.ok(Object.isFrozen(registry.descriptor('openai')));
  });
});
