/**
 * Chat abstraction: the agent talks to the vendor SDK only through ChatTransport,
 * so tests can substitute a fake without any network access.
 */
import type OpenAI from 'openai';

export type ChatCompletion = OpenAI.Chat.ChatCompletion;
export type ChatCompletionChunk = OpenAI.Chat.ChatCompletionChunk;
export type ChatMessage = OpenAI.Chat.ChatCompletionMessageParam;

export type ChatCompletionRequest = Pick<
  OpenAI.Chat.ChatCompletionCreateParamsNonStreaming,
  'model' | 'messages' | 'temperature' | 'max_tokens' | 'response_format'
>;

export interface ChatTransport {
  createCompletion(request: ChatCompletionRequest, signal: AbortSignal): Promise<ChatCompletion>;
  createCompletionStream(request: ChatCompletionRequest, signal: AbortSignal): Promise<AsyncIterable<ChatCompletionChunk>>;
}

export interface AgentConfig {
  key: string;
  endpoint: string;
  /** Logical model name; mapped to `deployment` by the Azure transport. */
  model: string;
  deployment: string;
  apiVersion: string;
  timeoutMs: number;
}

export type AgentConfigInput = Partial<AgentConfig>;

export interface ChatOptions {
  system?: string;
  /** Sampling temperature (0-2). Defaults to 0.7. */
  temperature?: number;
  /** Output token limit; omitted from the request when 0 or unset. */
  maxTokens?: number;
  /**
   * JSON Schema (as a string) the reply must follow. Injected as a system
   * instruction ahead of `system` and switches the request to JSON output.
   */
  outputSchema?: string;
  /** Caller cancellation, e.g. an HTTP client disconnect. */
  signal?: AbortSignal;
}

export interface ChatResult {
  text: string;
  model: string;
  finishReason: string;
  tokens: number;
}

/** Receives incremental text. Return false to stop the stream early. */
export type StreamHandler = (delta: string) => boolean | Promise<boolean>;
