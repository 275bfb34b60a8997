/**
 * Single chat agent export, built lazily from the central config so that an
 * unconfigured process still serves the routes that don't need the model.
 */
import { config } from '../../config';
import { ChatAgent } from '../../services/chat-agent.service';

let instance: ChatAgent | null = null;

/** Throws ConfigurationError when AZURE_OPENAI_KEY / _ENDPOINT / _MODEL are missing. */
export function getChatAgent(): ChatAgent {
  if (!instance) {
    instance = new ChatAgent({ ...config.azureOpenAI });
  }
  return instance;
}

export { AzureOpenAIChatTransport } from './AzureOpenAIChatTransport';
export * from './errors';
export type {
  AgentConfig,
  AgentConfigInput,
  ChatCompletion,
  ChatCompletionChunk,
  ChatCompletionRequest,
  ChatMessage,
  ChatOptions,
  ChatResult,
  ChatTransport,
  StreamHandler,
} from './types';
