import { z } from 'zod';
import type {
  GenerationResult,
  ProviderAdapter,
  ProviderCall,
  ProviderRequest,
  ProviderRequestInput,
  Turn,
} from './base.js';
import { contentParts, parseDataUri } from './content.js';
import { parseResponse } from './schema.js';
import { DEFAULT_PACING_MS, simulateStream } from './simulated.js';

export type GeminiPart = { text: string } | { inlineData: { mimeType: string; data: string } };

export interface GeminiContent {
  role: 'user' | 'model';
  parts: GeminiPart[];
}

const GenerateContentSchema = z.object({
  candidates: z
    .array(
      z.object({
        content: z.object({
          parts: z.array(z.object({ text: z.string() })).min(1),
        }),
      })
    )
    .min(1),
  usageMetadata: z.record(z.unknown()).nullish(),
});

export interface GeminiProviderOptions {
  pacingMs?: number;
}

export class GeminiProvider implements ProviderAdapter<GeminiContent> {
  readonly name = 'gemini' as const;
  readonly streaming = 'simulated' as const;
  private readonly pacingMs: number;

  constructor(options: GeminiProviderOptions = {}) {
    this.pacingMs = options.pacingMs ?? DEFAULT_PACING_MS;
  }

  normalize(turns: readonly Turn[]): GeminiContent[] {
    return turns
      .filter((turn) => turn.role !== 'system')
      .map((turn): GeminiContent => ({
        // Gemini uses 'user' and 'model' roles
        role: turn.role === 'assistant' ? 'model' : 'user',
        parts: this.convertParts(turn),
      }));
  }

  buildRequest(input: ProviderRequestInput): ProviderRequest {
    // The API key travels in the query string; this URL must never be logged
    const url =
      `${input.baseUrl}/${encodeURIComponent(input.model)}:generateContent` +
      `?key=${encodeURIComponent(input.apiKey)}`;

    return {
      url,
      headers: { 'Content-Type': 'application/json' },
      body: {
        contents: this.normalize(input.turns),
        generationConfig: {
          maxOutputTokens: input.options.maxTokens,
          temperature: input.options.temperature,
        },
      },
    };
  }

  /**
   * The API does not echo the model, so the requested id is reported back.
   */
  parseFull(payload: unknown, requestedModel: string): GenerationResult {
    const data = parseResponse(GenerateContentSchema, payload, this.name);
    const result: GenerationResult = {
      content: data.candidates[0].content.parts[0].text,
      model: requestedModel,
    };
    if (data.usageMetadata) {
      result.usage = data.usageMetadata;
    }
    return result;
  }

  decodeStream(call: ProviderCall): AsyncIterable<string> {
    return simulateStream(call, this.pacingMs);
  }

  private convertParts(turn: Turn): GeminiPart[] {
    const parts: GeminiPart[] = [];

    for (const part of contentParts(turn.content)) {
      if (part.type === 'text') {
        parts.push({ text: part.text });
        continue;
      }
      const image = parseDataUri(part.url);
      if (image) {
        parts.push({ inlineData: { mimeType: image.mimeType, data: image.base64Data } });
      }
    }

    return parts;
  }
}
