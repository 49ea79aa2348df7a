import { fetch } from 'undici';
import {
  MalformedResponseError,
  MissingCredentialsError,
  ProviderHttpError,
  StreamDecodeError,
  UnsupportedProviderError,
  toGatewayError,
} from './errors.js';
import {
  createAdapters,
  isProviderName,
  resolveGenerationOptions,
  type CallOptions,
  type GenerationOptions,
  type GenerationResult,
  type ProviderAdapter,
  type ProviderAdapters,
  type ProviderCall,
  type ProviderName,
  type ResolvedGenerationOptions,
  type StreamEvent,
  type StreamingMode,
  type Turn,
} from './providers/index.js';
import { API_KEY_ENV } from './providers/catalog.js';
import { messagesHaveImages } from './providers/content.js';
import { createRegistry, type ProviderRegistry } from './providers/registry.js';
import { MetricsTracker, recordUsage, streamChunksTotal, withProviderTelemetry } from './telemetry/index.js';
import { createComponentLogger } from './utils/logger.js';

const logger = createComponentLogger('gateway');

export type HttpTransport = typeof fetch;

/**
 * Looked up on every call so rotated keys apply without a restart.
 */
export type CredentialSource = (provider: ProviderName) => string | undefined;

export const environmentCredentials: CredentialSource = (provider) =>
  process.env[API_KEY_ENV[provider]] || undefined;

export interface GatewayOptions {
  registry?: ProviderRegistry;
  credentials?: CredentialSource;
  /** Outbound HTTP client; carries its own timeout policy. */
  fetch?: HttpTransport;
  /** Delay between chunks of simulated streams. */
  pacingMs?: number;
}

interface PreparedCall {
  adapter: ProviderAdapter;
  model: string;
  turns: readonly Turn[];
  options: ResolvedGenerationOptions;
  signal?: AbortSignal;
}

/**
 * Single entry point for talking to any supported provider.
 *
 * Calls are independent: the only shared state is the read-only registry.
 * No call is retried.
 */
export class Gateway {
  readonly registry: ProviderRegistry;
  private readonly adapters: ProviderAdapters;
  private readonly credentials: CredentialSource;
  private readonly transport: HttpTransport;

  constructor(options: GatewayOptions = {}) {
    this.registry = options.registry ?? createRegistry();
    this.adapters = createAdapters({ pacingMs: options.pacingMs });
    this.credentials = options.credentials ?? environmentCredentials;
    this.transport = options.fetch ?? fetch;
  }

  /**
   * Generate a complete response in one provider call.
   */
  async generate(
    provider: string,
    modelAlias: string,
    turns: readonly Turn[],
    options: GenerationOptions = {},
    callOptions: CallOptions = {}
  ): Promise<GenerationResult> {
    const call = this.prepare(provider, modelAlias, turns, options, callOptions);
    const name = call.adapter.name;

    logger.info('Generating response', this.describe(call, modelAlias));

    const result = await withProviderTelemetry(name, call.model, () => this.complete(call));
    recordUsage(name, call.model, result.usage);
    return result;
  }

  /**
   * Stream a response as events: one `started`, any number of `chunk`s, then
   * exactly one `completed` or `failed`.
   *
   * Throws UnsupportedProviderError synchronously for unknown providers.
   * Nothing is sent until the first event is pulled, and the provider body is
   * only read as fast as events are consumed. Leaving the loop early closes
   * the provider connection, and so does aborting `callOptions.signal`, which
   * also works while the provider is silent. An aborted stream still ends
   * with one `failed` event.
   */
  generateStreaming(
    provider: string,
    modelAlias: string,
    turns: readonly Turn[],
    options: GenerationOptions = {},
    callOptions: CallOptions = {}
  ): AsyncGenerator<StreamEvent, void, undefined> {
    const call = this.prepare(provider, modelAlias, turns, options, callOptions);
    return this.stream(call, modelAlias);
  }

  /**
   * Native providers relay their own event stream; simulated ones are replayed
   * word by word from a full completion.
   */
  streamingMode(provider: string): StreamingMode | undefined {
    return isProviderName(provider) ? this.adapters[provider].streaming : undefined;
  }

  private async *stream(
    call: PreparedCall,
    modelAlias: string
  ): AsyncGenerator<StreamEvent, void, undefined> {
    const name = call.adapter.name;
    const tracker = new MetricsTracker(name, call.model, 'stream');

    logger.info('Generating streaming response', {
      ...this.describe(call, modelAlias),
      streaming: call.adapter.streaming,
    });
    yield { type: 'started', provider: name, model: call.model };

    let finalText = '';
    try {
      for await (const text of call.adapter.decodeStream(this.providerCall(call))) {
        finalText += text;
        streamChunksTotal.inc({ provider: name });
        yield { type: 'chunk', text };
      }
    } catch (error) {
      const failure = toGatewayError(error, name);
      tracker.failure(failure.kind);
      logger.error('Streaming error', {
        provider: name,
        model: call.model,
        kind: failure.kind,
        error: failure.message,
      });
      yield { type: 'failed', errorKind: failure.kind, message: failure.message };
      return;
    }

    tracker.success();
    yield { type: 'completed', finalText, model: call.model };
  }

  private prepare(
    provider: string,
    modelAlias: string,
    turns: readonly Turn[],
    options: GenerationOptions,
    callOptions: CallOptions
  ): PreparedCall {
    if (!isProviderName(provider)) {
      throw new UnsupportedProviderError(provider);
    }
    return {
      adapter: this.adapters[provider],
      model: this.registry.resolveModel(provider, modelAlias),
      turns,
      options: resolveGenerationOptions(options),
      signal: callOptions.signal,
    };
  }

  private providerCall(call: PreparedCall): ProviderCall {
    return {
      openStream: async () => {
        const response = await this.send(call, true);
        if (!response.body) {
          throw new StreamDecodeError(call.adapter.name, 'response has no body');
        }
        return response.body;
      },
      complete: () => this.complete(call),
      signal: call.signal,
    };
  }

  private async complete(call: PreparedCall): Promise<GenerationResult> {
    const response = await this.send(call, false);

    let payload: unknown;
    try {
      payload = await response.json();
    } catch (error) {
      throw new MalformedResponseError(call.adapter.name, 'body is not valid JSON', { cause: error });
    }

    return call.adapter.parseFull(payload, call.model);
  }

  /**
   * Issue the provider request. Non-2xx answers fail before the body is parsed.
   */
  private async send(call: PreparedCall, stream: boolean) {
    const name = call.adapter.name;
    const apiKey = this.credentials(name);
    if (!apiKey) {
      throw new MissingCredentialsError(name, API_KEY_ENV[name]);
    }

    const descriptor = this.registry.descriptor(name);
    if (!descriptor) {
      throw new UnsupportedProviderError(name);
    }

    const request = call.adapter.buildRequest({
      baseUrl: descriptor.baseUrl,
      apiKey,
      model: call.model,
      turns: call.turns,
      options: call.options,
      stream,
    });

    const startedAt = Date.now();
    let response: Awaited<ReturnType<HttpTransport>>;
    try {
      response = await this.transport(request.url, {
        method: 'POST',
        headers: request.headers,
        body: JSON.stringify(request.body),
        signal: call.signal,
      });
    } catch (error) {
      throw toGatewayError(error, name);
    }

    logger.debug('Provider responded', {
      provider: name,
      model: call.model,
      status: response.status,
      duration: Date.now() - startedAt,
    });

    if (!response.ok) {
      const body = await response.text();
      logger.warn('Provider returned an error status', {
        provider: name,
        model: call.model,
        status: response.status,
      });
      throw new ProviderHttpError(name, response.status, body);
    }

    return response;
  }

  private describe(call: PreparedCall, modelAlias: string): Record<string, unknown> {
    return {
      provider: call.adapter.name,
      model: modelAlias,
      api_model: call.model,
      message_count: call.turns.length,
      has_images: messagesHaveImages(call.turns),
    };
  }
}
