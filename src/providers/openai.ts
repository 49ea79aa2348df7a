import { z } from 'zod';
import type {
  GenerationResult,
  ProviderAdapter,
  ProviderCall,
  ProviderRequest,
  ProviderRequestInput,
  Role,
  Turn,
} from './base.js';
import { parseResponse } from './schema.js';
import { DONE_SENTINEL, extractChatDelta, readSseData } from './sse.js';

export type OpenAIContentPart =
  | { type: 'text'; text: string }
  | { type: 'image_url'; image_url: { url: string } };

export interface OpenAIMessage {
  role: Role;
  content: string | OpenAIContentPart[];
}

/** Providers that speak the OpenAI chat-completions schema. */
export type OpenAICompatibleName = 'openai' | 'deepseek' | 'mistral';

const ChatCompletionSchema = z.object({
  model: z.string(),
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string() }),
      })
    )
    .min(1),
  usage: z.record(z.unknown()).nullish(),
});

export class OpenAIProvider implements ProviderAdapter<OpenAIMessage> {
  readonly streaming = 'native' as const;

  constructor(readonly name: OpenAICompatibleName) {}

  // System turns are forwarded; the chat-completions schema accepts them.
  normalize(turns: readonly Turn[]): OpenAIMessage[] {
    return turns.map((turn) => ({
      role: turn.role,
      content:
        typeof turn.content === 'string'
          ? turn.content
          : turn.content.map((part): OpenAIContentPart =>
              part.type === 'text'
                ? { type: 'text', text: part.text }
                : { type: 'image_url', image_url: { url: part.url } }
            ),
    }));
  }

  buildRequest(input: ProviderRequestInput): ProviderRequest {
    return {
      url: `${input.baseUrl}/chat/completions`,
      headers: {
        'Content-Type': 'application/json',
        Authorization: `Bearer ${input.apiKey}`,
      },
      body: {
        model: input.model,
        messages: this.normalize(input.turns),
        max_tokens: input.options.maxTokens,
        temperature: input.options.temperature,
        stream: input.stream,
      },
    };
  }

  parseFull(payload: unknown): GenerationResult {
    const data = parseResponse(ChatCompletionSchema, payload, this.name);
    const result: GenerationResult = {
      content: data.choices[0].message.content,
      model: data.model,
    };
    if (data.usage) {
      result.usage = data.usage;
    }
    return result;
  }

  async *decodeStream(call: ProviderCall): AsyncGenerator<string, void, undefined> {
    const body = await call.openStream();

    for await (const payload of readSseData(body, this.name, call.signal)) {
      if (payload === DONE_SENTINEL) {
        return;
      }
      const content = extractChatDelta(payload);
      if (content) {
        yield content;
      }
    }
  }
}
