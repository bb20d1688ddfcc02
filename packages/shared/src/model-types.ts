/**
 * Model client types: provider configuration and the provider-agnostic
 * chat transcript exchanged with a completion server.
 */

// ---------------------------------------------------------------------------
// Provider configuration
// ---------------------------------------------------------------------------

export type ModelProvider = 'ollama' | 'openai-compatible';

export interface OllamaProviderConfig {
  provider: 'ollama';
  /** Base URL of the Ollama server (default: http://localhost:11434) */
  baseURL: string;
}

export interface OpenAICompatibleProviderConfig {
  provider: 'openai-compatible';
  /** Base URL of the chat-completions API, including any /v1 suffix */
  baseURL: string;
  apiKey?: string;
}

export type ProviderConfig = OllamaProviderConfig | OpenAICompatibleProviderConfig;

export interface ModelClientConfig {
  provider: ProviderConfig;
  /** Model string sent to the server (e.g. "gemma3:12b") */
  modelName: string;
  /** Upper bound for a single completion request */
  timeoutMs: number;
}

// ---------------------------------------------------------------------------
// Transcript
// ---------------------------------------------------------------------------

/** A function call requested by the model within one assistant turn */
export interface ToolInvocationRequest {
  /** Opaque id, unique within the turn; tool results echo it back */
  id: string;
  name: string;
  arguments: Record<string, unknown>;
}

export interface UserMessage {
  role: 'user';
  content: string;
}

export interface AssistantMessage {
  role: 'assistant';
  /** Empty when the turn only carries tool calls */
  content: string;
  toolCalls?: ToolInvocationRequest[];
}

export interface ToolMessage {
  role: 'tool';
  content: string;
  toolCallId: string;
  /** Function that produced this result */
  name: string;
}

export type ChatMessage = UserMessage | AssistantMessage | ToolMessage;

// ---------------------------------------------------------------------------
// Tool schema
// ---------------------------------------------------------------------------

/** Tool definition advertised to the model */
export interface ToolDefinition {
  name: string;
  description: string;
  input_schema: {
    type: 'object';
    properties: Record<string, unknown>;
    required?: string[];
  };
}

// ---------------------------------------------------------------------------
// Completion API
// ---------------------------------------------------------------------------

export interface CompletionRequest {
  model: string;
  messages: readonly ChatMessage[];
  /** Omit to disable tool use for this request */
  tools?: readonly ToolDefinition[];
  maxTokens: number;
  temperature: number;
}

/** One assistant turn: text and/or zero or more tool invocation requests */
export interface AssistantTurn {
  text: string;
  toolCalls: ToolInvocationRequest[];
  /** Model that actually answered */
  model: string;
  finishReason: string;
  usage?: {
    inputTokens: number;
    outputTokens: number;
  };
}

export interface CompletionClient {
  complete(request: CompletionRequest): Promise<AssistantTurn>;
}
