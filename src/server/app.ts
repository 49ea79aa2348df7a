import http, { type IncomingMessage, type ServerResponse } from 'http';
import { z } from 'zod';
import { buildHealthReport, buildModelCatalog } from '../catalog.js';
import { ChatSession, type UserInput } from '../chat/session.js';
import type { ConversationStore, Conversation, StoredMessage } from '../chat/store.js';
import { GatewayError } from '../errors.js';
import type { CredentialSource, Gateway } from '../gateway.js';
import { PROVIDER_NAMES } from '../providers/base.js';
import { getMetrics, metricsContentType } from '../telemetry/metrics.js';
import { log } from '../utils/logger.js';
import { SseWriter } from './sse.js';

const MAX_BODY_BYTES = 64 * 1024 * 1024;

// Same types the attachment loader accepts.
const IMAGE_DATA_URI = /^data:image\/(jpeg|jpg|png|gif|webp);base64,[A-Za-z0-9+/]+={0,2}$/;

const CreateConversationSchema = z.object({
  title: z.string().max(255).optional(),
  model_provider: z.enum(PROVIDER_NAMES),
  model_name: z.string().min(1).max(100),
});

const StoreMessageSchema = z.object({
  content: z.string().min(1),
  model_name: z.string().max(100).optional(),
  model_provider: z.enum(PROVIDER_NAMES).optional(),
  options: z
    .object({
      temperature: z.number().min(0).max(2).optional(),
      max_tokens: z.number().int().min(1).max(4000).optional(),
    })
    .optional(),
  stream: z.boolean().optional(),
  images: z
    .array(
      z
        .string()
        .regex(IMAGE_DATA_URI, 'Each image must be a base64 data URI of type jpeg, jpg, png, gif or webp.')
    )
    .max(5)
    .optional(),
});

export interface ServerDeps {
  gateway: Gateway;
  store: ConversationStore;
  credentials: CredentialSource;
}

class HttpError extends Error {
  constructor(
    readonly status: number,
    message: string,
    readonly errors?: Record<string, string[]>
  ) {
    super(message);
    this.name = 'HttpError';
  }
}

export function conversationResource(conversation: Conversation) {
  return {
    id: conversation.id,
    title: conversation.title,
    model_name: conversation.modelName,
    model_provider: conversation.modelProvider,
    created_at: conversation.createdAt.toISOString(),
  };
}

export function messageResource(message: StoredMessage) {
  return {
    id: message.id,
    conversation_id: message.conversationId,
    content: message.content,
    role: message.role,
    model_name: message.modelName,
    has_images: message.images.length > 0,
    image_count: message.images.length,
    created_at: message.createdAt.toISOString(),
  };
}

function clientDisconnected(): Error {
  return new Error('Client disconnected');
}

function sendJson(res: ServerResponse, status: number, body: unknown): void {
  res.writeHead(status, { 'Content-Type': 'application/json' });
  res.end(JSON.stringify(body));
}

async function readJsonBody(req: IncomingMessage): Promise<unknown> {
  const chunks: Buffer[] = [];
  let size = 0;

  for await (const chunk of req) {
    const buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
    size += buffer.length;
    if (size > MAX_BODY_BYTES) {
      throw new HttpError(413, 'Request body too large');
    }
    chunks.push(buffer);
  }

  const text = Buffer.concat(chunks).toString('utf-8');
  if (!text.trim()) {
    return {};
  }
  try {
    return JSON.parse(text);
  } catch (error) {
    throw new HttpError(400, `Request body must be valid JSON: ${error instanceof Error ? error.message : String(error)}`);
  }
}

function validate<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, body: unknown): T {
  const result = schema.safeParse(body);
  if (!result.success) {
    const errors: Record<string, string[]> = {};
    for (const issue of result.error.issues) {
      const field = issue.path.join('.') || 'body';
      (errors[field] ??= []).push(issue.message);
    }
    throw new HttpError(422, 'The given data was invalid.', errors);
  }
  return result.data;
}

export function createRequestHandler(deps: ServerDeps) {
  const session = new ChatSession(deps.gateway, deps.store);

  async function storeMessage(req: IncomingMessage, res: ServerResponse, conversationId: string) {
    const body = validate(StoreMessageSchema, await readJsonBody(req));

    if (!(await session.getConversation(conversationId))) {
      throw new HttpError(404, 'Conversation not found');
    }

    const input: UserInput = {
      content: body.content,
      images: body.images,
      modelProvider: body.model_provider,
      modelName: body.model_name,
      options: {
        temperature: body.options?.temperature,
        maxTokens: body.options?.max_tokens,
      },
    };

    if (body.stream === false) {
      const abort = new AbortController();
      res.on('close', () => {
        if (!res.writableFinished) {
          abort.abort(clientDisconnected());
        }
      });

      try {
        const reply = await session.reply(conversationId, input, { signal: abort.signal });
        sendJson(res, 200, {
          message: 'Message sent successfully',
          data: {
            user_message: messageResource(reply.userMessage),
            assistant_message: messageResource(reply.assistantMessage),
            usage: reply.usage ?? null,
            model_used: {
              provider: reply.modelUsed.provider,
              model: reply.modelUsed.model,
              api_model: reply.modelUsed.apiModel,
            },
          },
        });
      } catch (error) {
        if (!(error instanceof GatewayError)) {
          throw error;
        }
        log.error('Failed to process message', error, {
          conversation_id: conversationId,
          kind: error.kind,
        });
        sendJson(res, 500, {
          message: 'Failed to generate AI response',
          error: error.message,
          kind: error.kind,
        });
      }
      return;
    }

    await streamMessage(res, conversationId, input);
  }

  async function streamMessage(res: ServerResponse, conversationId: string, input: UserInput) {
    const abort = new AbortController();
    const writer = new SseWriter(res, () => {
      log.info('Client disconnected; abandoning provider stream', {
        conversation_id: conversationId,
      });
      abort.abort(clientDisconnected());
    });
    writer.open();

    try {
      for await (const event of session.streamReply(conversationId, input, { signal: abort.signal })) {
        if (writer.closed) {
          break;
        }

        switch (event.type) {
          case 'start':
            await writer.send('start', {
              status: 'generating',
              model: event.model,
              provider: event.provider,
              has_images: event.hasImages,
            });
            break;
          case 'chunk':
            await writer.send('chunk', { content: event.content });
            break;
          case 'complete':
            await writer.send('complete', {
              message: messageResource(event.assistantMessage),
              user_message: messageResource(event.userMessage),
              status: 'completed',
              model_used: {
                provider: event.modelUsed.provider,
                model: event.modelUsed.model,
                api_model: event.modelUsed.apiModel,
              },
            });
            break;
          case 'error':
            await writer.send('error', { error: event.message, kind: event.errorKind });
            break;
        }
      }
    } catch (error) {
      const failure = error instanceof Error ? error : new Error(String(error));
      log.error('Streaming error', failure, { conversation_id: conversationId });
      await writer.send('error', { error: failure.message });
    } finally {
      writer.end();
    }
  }

  async function route(req: IncomingMessage, res: ServerResponse, path: string): Promise<void> {
    const method = req.method ?? 'GET';

    if (method === 'GET' && path === '/chat/models') {
      sendJson(res, 200, { data: buildModelCatalog(deps.gateway.registry) });
      return;
    }

    if (method === 'GET' && path === '/chat/health') {
      sendJson(res, 200, {
        data: buildHealthReport(deps.gateway.registry, deps.credentials),
        timestamp: new Date().toISOString(),
      });
      return;
    }

    if (method === 'GET' && path === '/metrics') {
      res.writeHead(200, { 'Content-Type': metricsContentType() });
      res.end(await getMetrics());
      return;
    }

    if (method === 'POST' && path === '/conversations') {
      const body = validate(CreateConversationSchema, await readJsonBody(req));
      const conversation = await deps.store.createConversation({
        title: body.title,
        modelProvider: body.model_provider,
        modelName: body.model_name.toLowerCase(),
      });
      sendJson(res, 201, {
        message: 'Conversation created successfully',
        data: conversationResource(conversation),
      });
      return;
    }

    const messagesRoute = /^\/conversations\/([^/]+)\/messages$/.exec(path);
    if (messagesRoute) {
      const conversationId = decodeURIComponent(messagesRoute[1]);

      if (method === 'GET') {
        if (!(await deps.store.getConversation(conversationId))) {
          throw new HttpError(404, 'Conversation not found');
        }
        const messages = await deps.store.listMessages(conversationId);
        sendJson(res, 200, { data: messages.map(messageResource) });
        return;
      }

      if (method === 'POST') {
        await storeMessage(req, res, conversationId);
        return;
      }
    }

    throw new HttpError(404, 'Not Found');
  }

  return async function handle(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const startedAt = Date.now();
    const path = new URL(req.url ?? '/', 'http://localhost').pathname;

    try {
      await route(req, res, path);
    } catch (error) {
      if (res.headersSent) {
        log.error('Request failed after response started', error instanceof Error ? error : undefined, { path });
        res.end();
      } else if (error instanceof HttpError) {
        sendJson(res, error.status, error.errors ? { message: error.message, errors: error.errors } : { message: error.message });
      } else {
        log.error('Unhandled request error', error instanceof Error ? error : undefined, { path });
        sendJson(res, 500, { message: 'Internal Server Error' });
      }
    } finally {
      log.http(req.method ?? 'GET', path, res.statusCode, Date.now() - startedAt);
    }
  };
}

export function createServer(deps: ServerDeps): http.Server {
  const handle = createRequestHandler(deps);
  return http.createServer((req, res) => {
    handle(req, res).catch((error: unknown) => {
      log.error('Request handler crashed', error instanceof Error ? error : new Error(String(error)));
    });
  });
}
