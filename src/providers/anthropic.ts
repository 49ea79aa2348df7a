import { z } from 'zod';
import type {
  ContentPart,
  GenerationResult,
  ProviderAdapter,
  ProviderCall,
  ProviderRequest,
  ProviderRequestInput,
  Turn,
} from './base.js';
import { parseDataUri } from './content.js';
import { parseResponse } from './schema.js';
import { DEFAULT_PACING_MS, simulateStream } from './simulated.js';

export const ANTHROPIC_VERSION = '2023-06-01';

export type AnthropicContentBlock =
  | { type: 'text'; text: string }
  | { type: 'image'; source: { type: 'base64'; media_type: string; data: string } };

export interface AnthropicMessage {
  role: 'user' | 'assistant';
  content: string | AnthropicContentBlock[];
}

const MessagesResponseSchema = z.object({
  model: z.string(),
  content: z.array(z.object({ text: z.string() })).min(1),
  usage: z.record(z.unknown()).nullish(),
});

export interface AnthropicProviderOptions {
  pacingMs?: number;
}

export class AnthropicProvider implements ProviderAdapter<AnthropicMessage> {
  readonly name = 'anthropic' as const;
  readonly streaming = 'simulated' as const;
  private readonly pacingMs: number;

  constructor(options: AnthropicProviderOptions = {}) {
    this.pacingMs = options.pacingMs ?? DEFAULT_PACING_MS;
  }

  normalize(turns: readonly Turn[]): AnthropicMessage[] {
    return turns
      .filter((turn): turn is Turn & { role: 'user' | 'assistant' } =>
        turn.role === 'user' || turn.role === 'assistant'
      )
      .map((turn) => ({
        role: turn.role,
        content: typeof turn.content === 'string' ? turn.content : this.convertParts(turn.content),
      }));
  }

  buildRequest(input: ProviderRequestInput): ProviderRequest {
    return {
      url: `${input.baseUrl}/messages`,
      headers: {
        'Content-Type': 'application/json',
        'x-api-key': input.apiKey,
        'anthropic-version': ANTHROPIC_VERSION,
      },
      body: {
        model: input.model,
        messages: this.normalize(input.turns),
        max_tokens: input.options.maxTokens,
        temperature: input.options.temperature,
      },
    };
  }

  parseFull(payload: unknown): GenerationResult {
    const data = parseResponse(MessagesResponseSchema, payload, this.name);
    const result: GenerationResult = {
      content: data.content[0].text,
      model: data.model,
    };
    if (data.usage) {
      result.usage = data.usage;
    }
    return result;
  }

  decodeStream(call: ProviderCall): AsyncIterable<string> {
    return simulateStream(call, this.pacingMs);
  }

  private convertParts(parts: ContentPart[]): AnthropicContentBlock[] {
    const blocks: AnthropicContentBlock[] = [];

    for (const part of parts) {
      if (part.type === 'text') {
        blocks.push({ type: 'text', text: part.text });
        continue;
      }
      // images that are not base64 data URIs are left out
      const image = parseDataUri(part.url);
      if (image) {
        blocks.push({
          type: 'image',
          source: { type: 'base64', media_type: image.mimeType, data: image.base64Data },
        });
      }
    }

    return blocks;
  }
}
