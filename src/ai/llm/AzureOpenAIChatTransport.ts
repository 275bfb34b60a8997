import { AzureOpenAI } from 'openai';
import type { AgentConfig, ChatCompletion, ChatCompletionChunk, ChatCompletionRequest, ChatTransport } from './types';

/**
 * Azure OpenAI transport. The logical model name from the config is mapped to
 * its deployment; any other model name is sent through unchanged so callers can
 * address a deployment directly. Timeouts are owned by the caller's AbortSignal.
 */
export class AzureOpenAIChatTransport implements ChatTransport {
  private client: AzureOpenAI;

  constructor(private readonly config: AgentConfig) {
    this.client = new AzureOpenAI({
      apiKey: config.key,
      endpoint: config.endpoint,
      apiVersion: config.apiVersion,
      maxRetries: 0,
    });
  }

  resolveDeployment(model: string): string {
    return model === this.config.model ? this.config.deployment : model;
  }

  async createCompletion(request: ChatCompletionRequest, signal: AbortSignal): Promise<ChatCompletion> {
    return this.client.chat.completions.create(
      { ...request, model: this.resolveDeployment(request.model), stream: false },
      { signal }
    );
  }

  async createCompletionStream(request: ChatCompletionRequest, signal: AbortSignal): Promise<AsyncIterable<ChatCompletionChunk>> {
    return this.client.chat.completions.create(
      { ...request, model: this.resolveDeployment(request.model), stream: true },
      { signal }
    );
  }
}
