/**
 * Request/response helpers shared by the prompt and chat routes.
 * Form fields win over the raw body, matching clients that post either
 * `message=...` (form / JSON) or the bare template text.
 */
import type { Request, Response } from 'express';
import { isRecord } from '../ai/prompts/outputSchema';
import type { ChatOptions, ChatResult } from '../ai/llm/types';

type BodySource = Pick<Request, 'body'>;

export function readBodyField(req: BodySource, field: string): string {
  const body: unknown = req.body;
  if (!isRecord(body)) return '';
  const value = body[field];
  if (typeof value === 'string') return value;
  if (typeof value === 'number') return String(value);
  return '';
}

/** `message` field, else the raw text body, else ''. */
export function resolveMessage(req: BodySource): string {
  const field = readBodyField(req, 'message');
  if (field !== '') return field;
  const body: unknown = req.body;
  return typeof body === 'string' ? body : '';
}

/** Unparseable values are ignored rather than rejected. */
export function parseOptionalFloat(value: unknown): number | undefined {
  if (typeof value === 'number') return Number.isFinite(value) ? value : undefined;
  if (typeof value !== 'string' || value.trim() === '') return undefined;
  const n = Number(value);
  return Number.isFinite(n) ? n : undefined;
}

export function parseOptionalInt(value: unknown): number | undefined {
  if (typeof value === 'number') return Number.isInteger(value) ? value : undefined;
  if (typeof value !== 'string' || !/^[+-]?\d+$/.test(value)) return undefined;
  return parseInt(value, 10);
}

/** system / temperature / max_tokens from the body; the output schema is set server-side only. */
export function readChatOptions(req: BodySource): ChatOptions {
  const options: ChatOptions = {};
  const system = readBodyField(req, 'system');
  if (system) options.system = system;
  const body: unknown = req.body;
  if (isRecord(body)) {
    const temperature = parseOptionalFloat(body.temperature);
    if (temperature !== undefined) options.temperature = temperature;
    const maxTokens = parseOptionalInt(body.max_tokens);
    if (maxTokens !== undefined) options.maxTokens = maxTokens;
  }
  return options;
}

export interface ChatResultBody {
  text: string;
  model?: string;
  finish_reason?: string;
  tokens?: number;
}

/** Wire shape of a ChatResult; empty metadata is omitted. */
export function serializeChatResult(result: ChatResult): ChatResultBody {
  const body: ChatResultBody = { text: result.text };
  if (result.model) body.model = result.model;
  if (result.finishReason) body.finish_reason = result.finishReason;
  if (result.tokens) body.tokens = result.tokens;
  return body;
}

/** Signal that aborts when the client goes away before the response is complete. */
export function abortOnClientClose(res: Response): AbortSignal {
  const controller = new AbortController();
  res.on('close', () => {
    if (!res.writableFinished) controller.abort();
  });
  return controller.signal;
}
