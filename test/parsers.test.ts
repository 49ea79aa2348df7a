import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { MalformedResponseError } from '../src/errors.js';
import { AnthropicProvider } from '../src/providers/anthropic.js';
import { GeminiProvider } from '../src/providers/gemini.js';
import { OpenAIProvider } from '../src/providers/openai.js';

describe('full response parsers', () => {
  it('reads OpenAI-shaped completions with usage', () => {
    const result = new OpenAIProvider('mistral').parseFull({
      model: 'mistral-large-latest',
      choices: [{ message: { role: 'assistant', content: 'Bonjour' } }],
      usage: { prompt_tokens: 3, completion_tokens: 1 },
    });

    assert.deepEqual(result, {
      content: 'Bonjour',
      model: 'mistral-large-latest',
      usage: { prompt_tokens: 3, completion_tokens: 1 },
    });
  });

  it('omits usage when the provider sends none', () => {
    const result = new OpenAIProvider('openai').parseFull({
      model: 'gpt-4o',
      choices: [{ message: { content: 'Hi' } }],
    });
    assert.deepEqual(result, { content: 'Hi', model: 'gpt-4o' });
  });

  it('rejects a completion without message content', () => {
    assert.throws(
      () => new OpenAIProvider('openai').parseFull({ model: 'gpt-4o', choices: [] }),
      (error: unknown) =>
        error instanceof MalformedResponseError &&
        error.kind === 'malformed_response' &&
        error.message.startsWith('Malformed openai response: choices')
    );
  });

  it('reads the first Anthropic content block and the echoed model', () => {
    const result = new AnthropicProvider().parseFull({
      model: 'claude-3-haiku-20240307',
      content: [{ type: 'text', text: 'Hello' }],
      usage: { input_tokens: 5, output_tokens: 2 },
    });

    assert.deepEqual(result, {
      content: 'Hello',
      model: 'claude-3-haiku-20240307',
      usage: { input_tokens: 5, output_tokens: 2 },
    });
  });

  it('reports the requested model for Gemini', () => {
    const result = new GeminiProvider().parseFull(
      {
        candidates: [{ content: { parts: [{ text: 'Hola' }], role: 'model' } }],
        usageMetadata: { promptTokenCount: 4 },
      },
      'gemini-1.5-flash'
    );

    assert.deepEqual(result, {
      content: 'Hola',
      model: 'gemini-1.5-flash',
      usage: { promptTokenCount: 4 },
    });
  });

  it('rejects a Gemini response without candidates', () => {
    assert.throws(() => new GeminiProvider().parseFull({ candidates: [] }, 'gemini-1.5-flash'), MalformedResponseError);
  });
});
