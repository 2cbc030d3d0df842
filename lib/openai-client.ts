import OpenAI, { AzureOpenAI } from 'openai';
import type {
  ChatCompletion,
  ChatCompletionCreateParamsNonStreaming,
  ChatCompletionMessageParam
} from 'openai/resources/chat/completions';
import type { ChatConnection } from '@/config/pipeline';
import { recordUsage } from '@/lib/cost-tracker';
import { errorMessage, errorStatus } from '@/lib/errors';

export type ChatMessage = { role: 'system' | 'user' | 'assistant'; content: string };

export type JsonSchemaFormat = {
  name: string;
  schema: Record<string, unknown>;
  strict?: boolean;
};

export type ChatOptions = {
  temperature?: number;
  maxTokens?: number;
  responseFormat?: JsonSchemaFormat | null;
  signal?: AbortSignal;
};

export interface ChatProvider {
  complete(deploymentId: string, messages: ChatMessage[], options?: ChatOptions): Promise<string>;
}

const clients = new Map<string, OpenAI>();

export function getOpenAIClient(connection: ChatConnection): OpenAI {
  const key =
    connection.provider === 'azure'
      ? `azure|${connection.endpoint}|${connection.apiVersion}|${connection.apiKey}`
      : `openai|${connection.baseUrl ?? ''}|${connection.apiKey}`;
  const existing = clients.get(key);
  if (existing) return existing;
  const client =
    connection.provider === 'azure'
      ? new AzureOpenAI({ endpoint: connection.endpoint, apiKey: connection.apiKey, apiVersion: connection.apiVersion })
      : new OpenAI({ apiKey: connection.apiKey, baseURL: connection.baseUrl ?? undefined });
  clients.set(key, client);
  return client;
}

function toMessageParam(message: ChatMessage): ChatCompletionMessageParam {
  switch (message.role) {
    case 'system':
      return { role: 'system', content: message.content };
    case 'assistant':
      return { role: 'assistant', content: message.content };
    default:
      return { role: 'user', content: message.content };
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Pulls the assistant text out of a chat completion body. `content` may be a
 * plain string or an array of `{ text }` fragments, which are joined with newlines.
 */
export function extractAssistantText(body: unknown): string | null {
  if (!isRecord(body) || !Array.isArray(body.choices) || body.choices.length === 0) return null;
  const choice: unknown = body.choices[0];
  if (!isRecord(choice) || !isRecord(choice.message)) return null;
  const content = choice.message.content;
  if (typeof content === 'string') {
    return content.trim() ? content : null;
  }
  if (Array.isArray(content)) {
    const parts = content
      .map((part: unknown) => (isRecord(part) && typeof part.text === 'string' ? part.text : null))
      .filter((text): text is string => text !== null && text.trim().length > 0);
    return parts.length ? parts.join('\n') : null;
  }
  return null;
}

function rejectsParameter(err: unknown, pattern: RegExp): boolean {
  const status = errorStatus(err);
  if (status !== null && status !== 400 && status !== 422) return false;
  const msg = errorMessage(err);
  return pattern.test(msg) && /unsupported|not supported|invalid|unrecognized|unknown|not allowed/i.test(msg);
}

/** The part of the SDK client the chat provider calls. */
export type ChatCompletionsClient = {
  chat: {
    completions: {
      create(body: ChatCompletionCreateParamsNonStreaming, options?: { signal?: AbortSignal }): Promise<ChatCompletion>;
    };
  };
};

export class OpenAIChatProvider implements ChatProvider {
  constructor(private readonly client: ChatCompletionsClient) {}

  async complete(deploymentId: string, messages: ChatMessage[], options: ChatOptions = {}): Promise<string> {
    let includeTemperature = typeof options.temperature === 'number';
    let includeFormat = Boolean(options.responseFormat);

    const buildPayload = (): ChatCompletionCreateParamsNonStreaming => {
      const payload: ChatCompletionCreateParamsNonStreaming = {
        model: deploymentId,
        messages: messages.map(toMessageParam)
      };
      if (includeTemperature && typeof options.temperature === 'number') {
        payload.temperature = options.temperature;
      }
      if (typeof options.maxTokens === 'number') {
        payload.max_tokens = options.maxTokens;
      }
      if (includeFormat && options.responseFormat) {
        payload.response_format = {
          type: 'json_schema',
          json_schema: {
            name: options.responseFormat.name,
            schema: options.responseFormat.schema,
            strict: options.responseFormat.strict ?? false
          }
        };
      }
      return payload;
    };

    console.info(
      `[LLM] chat model=${deploymentId} messages=${messages.length} schema=${options.responseFormat?.name ?? 'none'}`
    );

    // each rejected optional parameter is dropped once and the call retried
    for (let attempt = 0; ; attempt += 1) {
      try {
        const completion = await this.client.chat.completions.create(buildPayload(), { signal: options.signal });
        if (completion.usage) {
          recordUsage(deploymentId, completion.usage);
          console.info(
            `[LLM] done tokens in=${completion.usage.prompt_tokens} out=${completion.usage.completion_tokens} model=${deploymentId}`
          );
        }
        const text = extractAssistantText(completion);
        if (!text) {
          throw new Error('Chat completion returned empty content');
        }
        return text;
      } catch (err) {
        if (attempt < 2 && includeTemperature && rejectsParameter(err, /temperature/i)) {
          console.warn(`[LLM] model=${deploymentId} rejected temperature; retrying without it`);
          includeTemperature = false;
          continue;
        }
        if (attempt < 2 && includeFormat && rejectsParameter(err, /response_format|json_schema/i)) {
          console.warn(`[LLM] model=${deploymentId} rejected response_format; retrying with prompt-only JSON`);
          includeFormat = false;
          continue;
        }
        throw err;
      }
    }
  }
}

export function createChatProvider(connection: ChatConnection | null): ChatProvider | null {
  return connection ? new OpenAIChatProvider(getOpenAIClient(connection)) : null;
}
