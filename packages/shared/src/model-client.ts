/**
 * ModelClient: completion client for Ollama and other OpenAI-compatible
 * chat servers, built on the openai SDK.
 *
 * Converts the provider-agnostic transcript to chat-completions messages and
 * normalises the response into an AssistantTurn. There is no retry: a failed
 * request is surfaced to the caller once.
 */

import { randomUUID } from 'node:crypto';
import OpenAI from 'openai';
import { logger } from './logger.js';
import { withSpan } from './tracing.js';
import { resolveApiBaseURL } from './model-config.js';
import type {
  AssistantTurn,
  ChatMessage,
  CompletionClient,
  CompletionRequest,
  ModelClientConfig,
  ModelProvider,
  ToolDefinition,
  ToolInvocationRequest,
} from './model-types.js';

const log = logger.child({ module: 'model-client' });

type OpenAIMessage = OpenAI.Chat.Completions.ChatCompletionMessageParam;
type OpenAITool = OpenAI.Chat.Completions.ChatCompletionTool;
type OpenAIToolCall = OpenAI.Chat.Completions.ChatCompletionMessageToolCall;

// ---------------------------------------------------------------------------
// Conversion helpers
// ---------------------------------------------------------------------------

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Convert the transcript to chat-completions messages */
export function toOpenAIMessages(messages: readonly ChatMessage[]): OpenAIMessage[] {
  return messages.map((msg): OpenAIMessage => {
    switch (msg.role) {
      case 'user':
        return { role: 'user', content: msg.content };
      case 'assistant':
        if (msg.toolCalls && msg.toolCalls.length > 0) {
          return {
            role: 'assistant',
            content: msg.content || null,
            tool_calls: msg.toolCalls.map((call) => ({
              id: call.id,
              type: 'function' as const,
              function: { name: call.name, arguments: JSON.stringify(call.arguments) },
            })),
          };
        }
        return { role: 'assistant', content: msg.content };
      case 'tool':
        return { role: 'tool', tool_call_id: msg.toolCallId, content: msg.content };
    }
  });
}

/** Convert advertised tool definitions to function tools */
export function toOpenAITools(tools: readonly ToolDefinition[]): OpenAITool[] {
  return tools.map((t) => ({
    type: 'function' as const,
    function: {
      name: t.name,
      description: t.description,
      parameters: t.input_schema,
    },
  }));
}

/**
 * Decode a tool call's JSON argument string. Anything that is not a JSON
 * object becomes an empty bag; argument validation happens at dispatch.
 */
export function decodeArguments(raw: string, tool: string): Record<string, unknown> {
  if (!raw.trim()) return {};

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    log.warn({ err, tool, raw }, 'tool call arguments are not valid JSON');
    return {};
  }

  if (!isRecord(parsed)) {
    log.warn({ tool, raw }, 'tool call arguments are not a JSON object');
    return {};
  }
  return parsed;
}

function toInvocationRequest(call: OpenAIToolCall): ToolInvocationRequest {
  return {
    id: call.id || `call_${randomUUID()}`,
    name: call.function.name,
    arguments: decodeArguments(call.function.arguments, call.function.name),
  };
}

// ---------------------------------------------------------------------------
// ModelClient
// ---------------------------------------------------------------------------

export class ModelClient implements CompletionClient {
  private readonly client: OpenAI;
  readonly provider: ModelProvider;
  readonly baseURL: string;

  constructor(config: ModelClientConfig) {
    this.provider = config.provider.provider;
    this.baseURL = resolveApiBaseURL(config.provider);

    const apiKey =
      config.provider.provider === 'openai-compatible'
        ? config.provider.apiKey ?? 'not-needed'
        : 'not-needed';

    this.client = new OpenAI({
      baseURL: this.baseURL,
      apiKey,
      timeout: config.timeoutMs,
      maxRetries: 0,
    });

    log.info({ baseURL: this.baseURL, provider: this.provider }, 'model client initialized');
  }

  async complete(request: CompletionRequest): Promise<AssistantTurn> {
    const attributes = {
      model: request.model,
      messages: request.messages.length,
      tools: request.tools?.length ?? 0,
    };

    return withSpan('model.complete', attributes, async () => {
      const params: OpenAI.Chat.Completions.ChatCompletionCreateParamsNonStreaming = {
        model: request.model,
        messages: toOpenAIMessages(request.messages),
        max_tokens: request.maxTokens,
        temperature: request.temperature,
      };
      if (request.tools && request.tools.length > 0) {
        params.tools = toOpenAITools(request.tools);
      }

      const start = Date.now();
      const response = await this.client.chat.completions.create(params);

      const choice = response.choices[0];
      if (!choice) {
        throw new Error('model-client: no choices in response');
      }

      const toolCalls = (choice.message.tool_calls ?? []).map(toInvocationRequest);

      const turn: AssistantTurn = {
        text: choice.message.content ?? '',
        toolCalls,
        model: response.model,
        finishReason: choice.finish_reason ?? 'stop',
        usage: response.usage
          ? {
              inputTokens: response.usage.prompt_tokens,
              outputTokens: response.usage.completion_tokens,
            }
          : undefined,
      };

      log.info(
        {
          model: turn.model,
          durationMs: Date.now() - start,
          toolCalls: toolCalls.length,
          finishReason: turn.finishReason,
          inputTokens: turn.usage?.inputTokens,
          outputTokens: turn.usage?.outputTokens,
        },
        'completion received',
      );

      return turn;
    });
  }
}

export function createModelClient(config: ModelClientConfig): ModelClient {
  return new ModelClient(config);
}
