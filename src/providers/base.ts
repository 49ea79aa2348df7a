import type { ReadableStream } from 'node:stream/web';
import type { GatewayErrorKind } from '../errors.js';

export const PROVIDER_NAMES = ['openai', 'anthropic', 'deepseek', 'gemini', 'mistral'] as const;

export type ProviderName = (typeof PROVIDER_NAMES)[number];

export function isProviderName(value: string): value is ProviderName {
  return PROVIDER_NAMES.some((name) => name === value);
}

export type Role = 'system' | 'user' | 'assistant';

export interface TextPart {
  type: 'text';
  text: string;
}

/**
 * An attached image, always carried as a `data:<mime>;base64,<payload>` URI.
 */
export interface ImagePart {
  type: 'image';
  url: string;
}

export type ContentPart = TextPart | ImagePart;

export interface Turn {
  role: Role;
  content: string | ContentPart[];
}

export interface GenerationOptions {
  temperature?: number;
  maxTokens?: number;
  [key: string]: unknown;
}

export interface ResolvedGenerationOptions {
  temperature: number;
  maxTokens: number;
}

export const DEFAULT_TEMPERATURE = 0.7;
export const DEFAULT_MAX_TOKENS = 1000;

export function resolveGenerationOptions(options: GenerationOptions = {}): ResolvedGenerationOptions {
  return {
    temperature: typeof options.temperature === 'number' ? options.temperature : DEFAULT_TEMPERATURE,
    maxTokens: typeof options.maxTokens === 'number' ? options.maxTokens : DEFAULT_MAX_TOKENS,
  };
}

/** Token counts exactly as the provider reported them. */
export type TokenUsage = Record<string, unknown>;

export interface GenerationResult {
  content: string;
  /** Literal model id actually used. */
  model: string;
  usage?: TokenUsage;
}

export type StreamEvent =
  | { type: 'started'; provider: ProviderName; model: string }
  | { type: 'chunk'; text: string }
  | { type: 'completed'; finalText: string; model: string }
  | { type: 'failed'; errorKind: GatewayErrorKind; message: string };

export type StreamingMode = 'native' | 'simulated';

export interface ProviderRequestInput {
  baseUrl: string;
  apiKey: string;
  model: string;
  turns: readonly Turn[];
  options: ResolvedGenerationOptions;
  stream: boolean;
}

export interface ProviderRequest {
  url: string;
  headers: Record<string, string>;
  body: Record<string, unknown>;
}

/**
 * One prepared provider call. The adapter decides which half it needs:
 * native streaming opens the event stream, simulated streaming asks for the
 * full completion.
 */
export interface ProviderCall {
  openStream(): Promise<ReadableStream<Uint8Array>>;
  complete(): Promise<GenerationResult>;
  /** Aborted when the caller abandons the call. */
  readonly signal?: AbortSignal;
}

export interface CallOptions {
  /** Aborting releases the provider connection, even mid-read. */
  signal?: AbortSignal;
}

export interface ProviderAdapter<TMessage = unknown> {
  readonly name: ProviderName;
  readonly streaming: StreamingMode;

  /**
   * Shape conversation turns into the provider's message list
   */
  normalize(turns: readonly Turn[]): TMessage[];

  /**
   * Build the outbound HTTP request for one call
   */
  buildRequest(input: ProviderRequestInput): ProviderRequest;

  /**
   * Extract the completion from a full (non-streaming) response body
   */
  parseFull(payload: unknown, requestedModel: string): GenerationResult;

  /**
   * Produce text deltas for a streaming call
   */
  decodeStream(call: ProviderCall): AsyncIterable<string>;
}

export type ProviderAdapters = { readonly [P in ProviderName]: ProviderAdapter };
