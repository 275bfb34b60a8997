import type {
  ChatCompletion,
  ChatCompletionChunk,
  ChatCompletionRequest,
  ChatTransport,
} from '../../src/ai/llm/types';

type FinishReason = ChatCompletion['choices'][number]['finish_reason'];

export function completionOf(
  text: string,
  { model = 'gpt-test', tokens = 5, finishReason = 'stop' }: { model?: string; tokens?: number; finishReason?: FinishReason } = {}
): ChatCompletion {
  return {
    id: 'cmpl-test',
    object: 'chat.completion',
    created: 0,
    model,
    choices: [
      {
        index: 0,
        message: { role: 'assistant', content: text, refusal: null },
        finish_reason: finishReason,
        logprobs: null,
      },
    ],
    usage: { prompt_tokens: 2, completion_tokens: tokens - 2, total_tokens: tokens },
  };
}

export function chunkOf(content: string, finishReason: ChatCompletionChunk['choices'][number]['finish_reason'] = null): ChatCompletionChunk {
  return {
    id: 'chunk-test',
    object: 'chat.completion.chunk',
    created: 0,
    model: 'gpt-test',
    choices: [{ index: 0, delta: { content }, finish_reason: finishReason }],
  };
}

/** Rejects once the signal aborts, like the SDK does for an in-flight request. */
export function waitForAbort(signal: AbortSignal): Promise<never> {
  return new Promise<never>((_, reject) => {
    const fail = () => reject(new Error('Request was aborted.'));
    if (signal.aborted) {
      fail();
      return;
    }
    signal.addEventListener('abort', fail, { once: true });
  });
}

export interface FakeTransportOptions {
  completion?: ChatCompletion;
  error?: Error;
  chunks?: ChatCompletionChunk[];
  /** Never answer; only an abort ends the call. */
  hang?: boolean;
}

/** In-process ChatTransport that records requests and replays canned replies. */
export class FakeChatTransport implements ChatTransport {
  readonly requests: ChatCompletionRequest[] = [];
  readonly signals: AbortSignal[] = [];

  constructor(private readonly options: FakeTransportOptions = {}) {}

  async createCompletion(request: ChatCompletionRequest, signal: AbortSignal): Promise<ChatCompletion> {
    this.requests.push(request);
    this.signals.push(signal);
    if (this.options.hang) return waitForAbort(signal);
    if (this.options.error) throw this.options.error;
    return this.options.completion ?? completionOf('ok');
  }

  async createCompletionStream(request: ChatCompletionRequest, signal: AbortSignal): Promise<AsyncIterable<ChatCompletionChunk>> {
    this.requests.push(request);
    this.signals.push(signal);
    if (this.options.error) throw this.options.error;
    const chunks = this.options.chunks ?? [];
    const hang = this.options.hang ?? false;
    async function* replay(): AsyncGenerator<ChatCompletionChunk> {
      for (const chunk of chunks) {
        if (signal.aborted) throw new Error('Request was aborted.');
        yield chunk;
      }
      if (hang) await waitForAbort(signal);
    }
    return replay();
  }
}

export const TEST_AGENT_CONFIG = {
  key: 'test-key',
  endpoint: 'https://example.invalid',
  model: 'gpt-test',
};
