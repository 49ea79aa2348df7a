import { after, afterEach, before, describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { buildFromSettings, createCredentialSource, loadConfig, parseConfig } from '../src/config.js';
import { fakeTransport, jsonResponse } from './helpers.js';

describe('config', () => {
  let dir = '';
  const savedKey = process.env.OPENAI_API_KEY;

  before(() => {
    dir = mkdtempSync(join(tmpdir(), 'chatgate-config-'));
  });

  after(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  afterEach(() => {
    if (savedKey === undefined) {
      delete process.env.OPENAI_API_KEY;
    } else {
      process.env.OPENAI_API_KEY = savedKey;
    }
  });

  it('applies defaults to an empty document', () => {
    const settings = parseConfig(null);
    assert.equal(settings.defaultProvider, 'openai');
    assert.equal(settings.defaultModel, 'gpt-4o-mini');
    assert.equal(settings.streaming.pacingMs, 50);
    assert.deepEqual(settings.server, { host: '127.0.0.1', port: 8787 });
  });

  it('lists every invalid field', () => {
    assert.throws(
      () => parseConfig({ defaultProvider: 'cohere', streaming: { pacingMs: -1 } }),
      (error: unknown) =>
        error instanceof Error &&
        error.message.startsWith('Invalid config file format:\n') &&
        error.message.includes('  defaultProvider: ') &&
        error.message.includes('  streaming.pacingMs: ')
    );
  });

  it('prefers the configured key over the environment', () => {
    process.env.OPENAI_API_KEY = 'env-key';
    const credentials = createCredentialSource(
      parseConfig({ providers: { anthropic: { apiKey: 'config-key' } } })
    );
    assert.equal(credentials('anthropic'), 'config-key');
    assert.equal(credentials('openai'), 'env-key');
  });

  it('reads the environment at call time', () => {
    delete process.env.OPENAI_API_KEY;
    const credentials = createCredentialSource(parseConfig({}));
    assert.equal(credentials('openai'), undefined);
    process.env.OPENAI_API_KEY = 'rotated-key';
    assert.equal(credentials('openai'), 'rotated-key');
  });

  it('loads YAML and wires base URL overrides into the gateway', async () => {
    const configPath = join(dir, 'config.yaml');
    writeFileSync(
      configPath,
      [
        'defaultProvider: deepseek',
        'defaultModel: deepseek-chat',
        'providers:',
        '  deepseek:',
        '    apiKey: test-secret',
        '    baseUrl: http://127.0.0.1:4010/v1/',
        'streaming:',
        '  pacingMs: 0',
        '',
      ].join('\n')
    );

    const transport = fakeTransport(() =>
      jsonResponse({ model: 'deepseek-chat', choices: [{ message: { content: 'pong' } }] })
    );
    const config = loadConfig({ configPath, fetch: transport.fetch });

    assert.equal(config.configPath, configPath);
    assert.equal(config.settings.defaultProvider, 'deepseek');
    assert.equal(config.registry.descriptor('deepseek')?.baseUrl, 'http://127.0.0.1:4010/v1');

    const result = await config.gateway.generate('deepseek', 'deepseek-chat', [{ role: 'user', content: 'ping' }]);
    assert.equal(result.content, 'pong');
    assert.equal(transport.requests[0].url, 'http://127.0.0.1:4010/v1/chat/completions');
    assert.equal(transport.requests[0].headers.authorization, 'Bearer test-secret');
  });

  it('falls back to defaults when the file does not exist', () => {
    const config = loadConfig({ configPath: join(dir, 'missing.yaml') });
    assert.equal(config.settings.defaultModel, 'gpt-4o-mini');
  });

  it('reports YAML syntax errors with the file path', () => {
    const configPath = join(dir, 'broken.yaml');
    writeFileSync(configPath, 'providers: [unclosed\n');
    assert.throws(
      () => loadConfig({ configPath }),
      (error: unknown) => error instanceof Error && error.message.startsWith(`Error parsing config file ${configPath}: `)
    );
  });

  it('builds a registry with catalogue defaults', () => {
    const { registry } = buildFromSettings(parseConfig({}));
    assert.equal(registry.descriptor('openai')?.baseUrl, 'https://api.openai.com/v1');
  });
});
