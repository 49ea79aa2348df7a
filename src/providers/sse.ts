import type { ReadableStream } from 'node:stream/web';
import { z } from 'zod';
import { StreamDecodeError } from '../errors.js';
import { createComponentLogger } from '../utils/logger.js';

const logger = createComponentLogger('sse');

const DATA_PREFIX = 'data: ';
const SSE_FIELD = /^(data|event|id|retry):/;

export const DONE_SENTINEL = '[DONE]';

/**
 * Yield the payload of every `data: ` line in an event stream.
 *
 * The body is consumed destructively. If the consumer stops early the body is
 * cancelled, which releases the underlying connection instead of draining it.
 * An aborted `signal` cancels the body at once, even while a read is pending,
 * and the generator then throws the abort reason.
 */
export async function* readSseData(
  body: ReadableStream<Uint8Array>,
  provider: string,
  signal?: AbortSignal
): AsyncGenerator<string, void, undefined> {
  signal?.throwIfAborted();
  const reader = body.getReader();
  const decoder = new TextDecoder('utf-8', { fatal: true });
  let buffer = '';
  let settled = false;
  const seen = { data: false, foreign: false };

  const classify = (rawLine: string): string | undefined => {
    const line = rawLine.endsWith('\r') ? rawLine.slice(0, -1) : rawLine;
    if (line.startsWith(DATA_PREFIX)) {
      seen.data = true;
      return line.slice(DATA_PREFIX.length);
    }
    if (line.trim() !== '' && !line.startsWith(':') && !SSE_FIELD.test(line)) {
      seen.foreign = true;
    }
    return undefined;
  };

  const decode = (value?: Uint8Array): string => {
    try {
      return value ? decoder.decode(value, { stream: true }) : decoder.decode();
    } catch (error) {
      throw new StreamDecodeError(provider, 'body is not valid UTF-8', { cause: error });
    }
  };

  const onAbort = () => {
    reader.cancel(signal?.reason).catch((error: unknown) => {
      logger.debug('Cancelling aborted stream failed', {
        provider,
        reason: error instanceof Error ? error.message : String(error),
      });
    });
  };
  signal?.addEventListener('abort', onAbort, { once: true });

  try {
    while (true) {
      let chunk: Awaited<ReturnType<typeof reader.read>>;
      try {
        chunk = await reader.read();
      } catch (error) {
        // errored streams cannot be cancelled
        settled = true;
        throw error;
      }

      if (chunk.done) {
        settled = true;
        buffer += decode();
        break;
      }

      buffer += decode(chunk.value);
      const lines = buffer.split('\n');
      buffer = lines.pop() ?? '';

      for (const line of lines) {
        const payload = classify(line);
        if (payload !== undefined) {
          yield payload;
        }
      }
    }

    signal?.throwIfAborted();

    const trailing = classify(buffer);
    if (trailing !== undefined) {
      yield trailing;
    }

    if (!seen.data && seen.foreign) {
      throw new StreamDecodeError(provider, 'response is not an event stream');
    }
  } finally {
    signal?.removeEventListener('abort', onAbort);
    if (!settled && !signal?.aborted) {
      await reader.cancel();
    }
    reader.releaseLock();
  }
}

const ChatCompletionChunkSchema = z.object({
  choices: z.array(z.unknown()).optional(),
});

// Only the first choice carries the delta that is relayed.
const ChunkChoiceSchema = z.object({
  delta: z.object({ content: z.string().nullish() }).optional(),
});

/**
 * Text delta of one chat-completions stream payload. Lines that are not
 * valid JSON are skipped.
 */
export function extractChatDelta(payload: string): string | undefined {
  let json: unknown;
  try {
    json = JSON.parse(payload);
  } catch (error) {
    logger.debug('Skipping malformed stream line', {
      reason: error instanceof Error ? error.message : String(error),
    });
    return undefined;
  }

  const parsed = ChatCompletionChunkSchema.safeParse(json);
  if (!parsed.success || !parsed.data.choices?.length) {
    return undefined;
  }
  const choice = ChunkChoiceSchema.safeParse(parsed.data.choices[0]);
  if (!choice.success) {
    return undefined;
  }
  return choice.data.delta?.content || undefined;
}
