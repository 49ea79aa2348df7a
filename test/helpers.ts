import { ReadableStream } from 'node:stream/web';
import { Headers, Response } from 'undici';
import type { HttpTransport } from '../src/gateway.js';

export interface RecordedRequest {
  url: string;
  method: string | undefined;
  headers: Record<string, string>;
  body: unknown;
  signal: AbortSignal | undefined;
}

export interface FakeTransport {
  fetch: HttpTransport;
  requests: RecordedRequest[];
}

/**
 * In-process stand-in for the provider HTTP client. Every call is recorded and
 * answered by `respond`. Header names are lower-cased.
 */
export function fakeTransport(respond: (request: RecordedRequest) => Response | Promise<Response>): FakeTransport {
  const requests: RecordedRequest[] = [];

  const fetch: HttpTransport = async (input, init) => {
    const headers: Record<string, string> = {};
    new Headers(init?.headers).forEach((value, key) => {
      headers[key] = value;
    });
    const request: RecordedRequest = {
      url: typeof input === 'string' ? input : String(input),
      method: init?.method,
      headers,
      body: typeof init?.body === 'string' ? JSON.parse(init.body) : undefined,
      signal: init?.signal ?? undefined,
    };
    requests.push(request);
    return respond(request);
  };

  return { fetch, requests };
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

export function textResponse(body: string, status: number): Response {
  return new Response(body, { status, headers: { 'Content-Type': 'text/plain' } });
}

export interface ScriptedStream {
  stream: ReadableStream<Uint8Array>;
  /** True once the reader cancelled the body. */
  readonly cancelled: boolean;
  /** Number of reads the body has been asked to serve. */
  readonly pulls: number;
}

export interface ScriptedStreamOptions {
  /** Once the pieces run out, hang instead of closing, like a silent provider. */
  stall?: boolean;
}

/**
 * Body that hands out one scripted piece per read. A piece that is an Error
 * makes the stream fail at that point.
 */
export function scriptedStream(
  pieces: ReadonlyArray<string | Uint8Array | Error>,
  options: ScriptedStreamOptions = {}
): ScriptedStream {
  const encoder = new TextEncoder();
  const state = { cancelled: false, index: 0, pulls: 0 };

  const stream = new ReadableStream<Uint8Array>(
    {
      pull(controller) {
        state.pulls++;
        const piece = pieces[state.index++];
        if (piece === undefined && options.stall) {
          return new Promise<void>(() => {});
        }
        if (piece === undefined) {
          controller.close();
        } else if (piece instanceof Error) {
          controller.error(piece);
        } else {
          controller.enqueue(typeof piece === 'string' ? encoder.encode(piece) : piece);
        }
      },
      cancel() {
        state.cancelled = true;
      },
    },
    { highWaterMark: 0 }
  );

  return {
    stream,
    get cancelled() {
      return state.cancelled;
    },
    get pulls() {
      return state.pulls;
    },
  };
}

export function eventStreamResponse(stream: ReadableStream<Uint8Array>): Response {
  return new Response(stream, {
    status: 200,
    headers: { 'Content-Type': 'text/event-stream' },
  });
}

export async function collect<T>(iterable: AsyncIterable<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of iterable) {
    items.push(item);
  }
  return items;
}

/**
 * Resolve once `condition` holds, polling every few milliseconds.
 */
export async function waitFor(condition: () => boolean, timeoutMs = 2000): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!condition()) {
    if (Date.now() > deadline) {
      throw new Error(`Condition not met within ${timeoutMs}ms`);
    }
    await new Promise((resolve) => setTimeout(resolve, 10));
  }
}

export function sseData(payload: unknown): string {
  return `data: ${JSON.stringify(payload)}\n\n`;
}

export function chatDelta(content: string): string {
  return sseData({ choices: [{ delta: { content } }] });
}

export const PNG_DATA_URI = 'data:image/png;base64,iVBORw0KGgo=';
