import { after, describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { MockAgent, fetch } from 'undici';
import { ProviderHttpError } from '../src/errors.js';
import { Gateway, type HttpTransport } from '../src/gateway.js';
import { createRegistry } from '../src/providers/registry.js';
import { collect } from './helpers.js';

// Real undici fetch against an in-process mock dispatcher.
const agent = new MockAgent();
agent.disableNetConnect();

const viaMock: HttpTransport = (input, init) => fetch(input, { ...init, dispatcher: agent });

const gateway = new Gateway({
  fetch: viaMock,
  credentials: () => 'test-key',
  pacingMs: 0,
  registry: createRegistry({ baseUrls: { mistral: 'https://mistral.internal.test/v1' } }),
});

const hello = [{ role: 'user' as const, content: 'Hello' }];

after(async () => {
  await agent.close();
});

describe('Gateway over undici', () => {
  it('completes an OpenAI request', async () => {
    agent
      .get('https://api.openai.com')
      .intercept({
        path: '/v1/chat/completions',
        method: 'POST',
        headers: { authorization: 'Bearer test-key' },
      })
      .reply(
        200,
        { model: 'gpt-4o-mini-2024-07-18', choices: [{ message: { content: 'Hi!' } }] },
        { headers: { 'content-type': 'application/json' } }
      );

    const result = await gateway.generate('openai', 'gpt-4o-mini', hello);
    assert.deepEqual(result, { content: 'Hi!', model: 'gpt-4o-mini-2024-07-18' });
  });

  it('streams from an overridden base URL', async () => {
    agent
      .get('https://mistral.internal.test')
      .intercept({ path: '/v1/chat/completions', method: 'POST' })
      .reply(
        200,
        'data: {"choices":[{"delta":{"content":"Sa"}}]}\n\ndata: {"choices":[{"delta":{"content":"lut"}}]}\n\ndata: [DONE]\n\n',
        { headers: { 'content-type': 'text/event-stream' } }
      );

    const events = await collect(gateway.generateStreaming('mistral', 'mistral-large-latest', hello));
    assert.deepEqual(events.at(-1), { type: 'completed', finalText: 'Salut', model: 'mistral-large-latest' });
  });

  it('sends the Gemini key in the query string', async () => {
    agent
      .get('https://generativelanguage.googleapis.com')
      .intercept({
        path: '/v1beta/models/gemini-2.0-flash:generateContent?key=test-key',
        method: 'POST',
      })
      .reply(
        200,
        { candidates: [{ content: { parts: [{ text: 'Listo' }] } }] },
        { headers: { 'content-type': 'application/json' } }
      );

    const result = await gateway.generate('gemini', 'gemini-2.0-flash', hello);
    assert.deepEqual(result, { content: 'Listo', model: 'gemini-2.0-flash' });
  });

  it('keeps the raw body of an error status', async () => {
    agent
      .get('https://api.anthropic.com')
      .intercept({ path: '/v1/messages', method: 'POST' })
      .reply(529, '{"type":"error","error":{"type":"overloaded_error"}}');

    await assert.rejects(
      gateway.generate('anthropic', 'claude-3-5-haiku', hello),
      (error: unknown) =>
        error instanceof ProviderHttpError &&
        error.statusCode === 529 &&
        error.body === '{"type":"error","error":{"type":"overloaded_error"}}'
    );
  });

  it('has used every interceptor', () => {
    agent.assertNoPendingInterceptors();
  });
});
