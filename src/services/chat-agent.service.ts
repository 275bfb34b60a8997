/**
 * Chat agent: a thin wrapper around a chat-completion transport for single-turn
 * prompts. Builds the message list, bounds every call by the configured timeout,
 * optionally asks for (and parses) JSON that follows an output schema.
 *
 * No retries: transport failures surface to the caller as TransportError.
 */
import { z } from 'zod';
import { logger } from '../config/logger';
import { AzureOpenAIChatTransport } from '../ai/llm/AzureOpenAIChatTransport';
import {
  ConfigurationError,
  EmptyResponseError,
  OutputParseError,
  SchemaError,
  TransportError,
} from '../ai/llm/errors';
import type {
  AgentConfig,
  AgentConfigInput,
  ChatCompletion,
  ChatCompletionRequest,
  ChatMessage,
  ChatOptions,
  ChatResult,
  ChatTransport,
  StreamHandler,
} from '../ai/llm/types';
import { buildFieldSchemaPrompt, generateSystemPromptFromJSONSchema } from '../ai/prompts/templates';
import { validateAgainstFields, type FieldSchema } from '../ai/prompts/fieldSchema';
import type { JsonObject } from '../ai/prompts/outputSchema';

const DEFAULT_TEMPERATURE = 0.7;
const DEFAULT_TIMEOUT_MS = 60_000;
const DEFAULT_API_VERSION = '2024-06-01';

const agentConfigSchema = z.object({
  key: z.string().min(1),
  endpoint: z.string().min(1),
  model: z.string().min(1),
  deployment: z.string().optional(),
  apiVersion: z.string().min(1).optional(),
  timeoutMs: z.number().int().positive().optional(),
});

/** Strips a surrounding ```json fence some models add despite instructions. */
export function extractJsonText(text: string): string {
  const trimmed = text.trim();
  const fenced = /^```(?:json)?\s*([\s\S]*?)\s*```$/i.exec(trimmed);
  return fenced ? fenced[1] : trimmed;
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class ChatAgent {
  private readonly config: AgentConfig;
  private readonly transport: ChatTransport;

  constructor(input: AgentConfigInput, transport?: ChatTransport) {
    const checked = agentConfigSchema.safeParse({
      ...input,
      // empty strings mean "not configured"
      deployment: input.deployment || undefined,
      apiVersion: input.apiVersion || undefined,
      timeoutMs: input.timeoutMs || undefined,
    });
    if (!checked.success) {
      const fields = checked.error.issues.map((i) => i.path.join('.')).join(', ');
      throw new ConfigurationError(
        `missing required azure openai configuration (need key, endpoint, model; invalid: ${fields})`
      );
    }
    const { key, endpoint, model, deployment, apiVersion, timeoutMs } = checked.data;
    this.config = {
      key,
      endpoint,
      model,
      deployment: deployment ?? model,
      apiVersion: apiVersion ?? DEFAULT_API_VERSION,
      timeoutMs: timeoutMs ?? DEFAULT_TIMEOUT_MS,
    };
    this.transport = transport ?? new AzureOpenAIChatTransport(this.config);
  }

  /** Copy of the resolved configuration. */
  getConfig(): AgentConfig {
    return { ...this.config };
  }

  private buildRequest(prompt: string, options: ChatOptions): ChatCompletionRequest {
    const systemParts: string[] = [];
    if (options.outputSchema) {
      try {
        JSON.parse(options.outputSchema);
      } catch (error) {
        throw new SchemaError(`invalid output_schema JSON: ${describeError(error)}`, { cause: error });
      }
      systemParts.push(generateSystemPromptFromJSONSchema(options.outputSchema));
    }
    if (options.system) systemParts.push(options.system);

    const messages: ChatMessage[] = [];
    if (systemParts.length > 0) {
      messages.push({ role: 'system', content: systemParts.join('\n\n') });
    }
    messages.push({ role: 'user', content: prompt });

    const request: ChatCompletionRequest = {
      model: this.config.model,
      messages,
      temperature: options.temperature ?? DEFAULT_TEMPERATURE,
    };
    if (options.maxTokens && options.maxTokens > 0) {
      request.max_tokens = options.maxTokens;
    }
    if (options.outputSchema) {
      request.response_format = { type: 'json_object' };
    }
    return request;
  }

  /**
   * Runs `fn` under a fresh AbortController that fires after the configured
   * timeout or when the caller's signal aborts. The timer and listener are
   * released on every exit path.
   */
  private async withDeadline<T>(
    callerSignal: AbortSignal | undefined,
    fn: (controller: AbortController, timedOut: () => boolean) => Promise<T>
  ): Promise<T> {
    const controller = new AbortController();
    let expired = false;
    const timer = setTimeout(() => {
      expired = true;
      controller.abort();
    }, this.config.timeoutMs);
    const onCallerAbort = () => controller.abort();
    if (callerSignal?.aborted) controller.abort();
    callerSignal?.addEventListener('abort', onCallerAbort);
    try {
      return await fn(controller, () => expired);
    } finally {
      clearTimeout(timer);
      callerSignal?.removeEventListener('abort', onCallerAbort);
    }
  }

  private transportError(error: unknown, timedOut: boolean): TransportError {
    if (timedOut) {
      return new TransportError(`chat request timed out after ${this.config.timeoutMs}ms`, { cause: error });
    }
    return new TransportError(`chat completion error: ${describeError(error)}`, { cause: error });
  }

  /** Single-turn completion returning text plus minimal metadata. */
  async sendChat(prompt: string, options: ChatOptions = {}): Promise<ChatResult> {
    const request = this.buildRequest(prompt, options);
    logger.debug('Sending chat completion', { model: request.model, schema: Boolean(options.outputSchema) });

    return this.withDeadline(options.signal, async (controller, timedOut) => {
      let response: ChatCompletion;
      try {
        response = await this.transport.createCompletion(request, controller.signal);
      } catch (error) {
        throw this.transportError(error, timedOut());
      }
      const choice = response.choices[0];
      if (!choice) {
        throw new EmptyResponseError();
      }
      return {
        text: choice.message.content ?? '',
        model: response.model,
        finishReason: choice.finish_reason ?? '',
        tokens: response.usage?.total_tokens ?? 0,
      };
    });
  }

  /**
   * Like sendChat, then parses the reply as JSON. A reply that does not parse
   * throws OutputParseError carrying the result, so callers can still show it.
   */
  async sendChatJSON(prompt: string, options: ChatOptions = {}): Promise<{ result: ChatResult; parsed: unknown }> {
    const result = await this.sendChat(prompt, options);
    try {
      return { result, parsed: JSON.parse(extractJsonText(result.text)) };
    } catch (error) {
      logger.warn('Chat output is not valid JSON', { raw: result.text.slice(0, 500) });
      throw new OutputParseError(`json unmarshal error: ${describeError(error)}`, result, { cause: error });
    }
  }

  /**
   * Streams incremental text to `handler`. Returning false from the handler
   * cancels the in-flight request and yields the text received so far; a
   * caller abort does the same. Only the timeout turns into an error.
   */
  async streamChat(prompt: string, handler: StreamHandler, options: ChatOptions = {}): Promise<ChatResult> {
    const request = this.buildRequest(prompt, options);

    return this.withDeadline(options.signal, async (controller, timedOut) => {
      let text = '';
      let finishReason = '';
      let stopped = false;
      try {
        const stream = await this.transport.createCompletionStream(request, controller.signal);
        for await (const chunk of stream) {
          const choice = chunk.choices[0];
          if (!choice) continue;
          if (choice.finish_reason) finishReason = choice.finish_reason;
          const delta = choice.delta?.content ?? '';
          if (!delta) continue;
          text += delta;
          if ((await handler(delta)) === false) {
            stopped = true;
            controller.abort();
            break;
          }
        }
      } catch (error) {
        const cancelled = stopped || (controller.signal.aborted && !timedOut());
        if (!cancelled) throw this.transportError(error, timedOut());
        logger.debug('Chat stream cancelled', { received: text.length });
      }
      if (timedOut() && !stopped) {
        throw this.transportError(new Error('aborted'), true);
      }
      return { text, model: this.config.model, finishReason, tokens: 0 };
    });
  }

  async chat(prompt: string, options: ChatOptions = {}): Promise<string> {
    const result = await this.sendChat(prompt, options);
    return result.text;
  }

  async chatStream(prompt: string, handler: StreamHandler, options: ChatOptions = {}): Promise<string> {
    const result = await this.streamChat(prompt, handler, options);
    return result.text;
  }

  /**
   * Asks the model to explain `topic` as JSON shaped like `fields`, then parses
   * and validates the reply.
   */
  async fetchStructured(
    topic: string,
    fields: FieldSchema[],
    instructions: string[] = [],
    options: ChatOptions = {}
  ): Promise<JsonObject> {
    const prompt = buildFieldSchemaPrompt(topic, fields, instructions);
    const { parsed } = await this.sendChatJSON(prompt, options);
    return validateAgainstFields(parsed, fields);
  }
}
