import { Router, Request, Response } from 'express';
import { body } from 'express-validator';
import { logger } from '../../config/logger';
import { OutputParseError, SchemaError } from '../../ai/llm/errors';
import type { ChatAgent } from '../../services/chat-agent.service';
import { validate } from '../middleware/validate';
import {
  abortOnClientClose,
  readChatOptions,
  resolveMessage,
  serializeChatResult,
} from '../requestHelpers';

export interface ChatRouteDeps {
  getAgent: () => ChatAgent;
  /** Server-side JSON Schema; when non-empty, replies are parsed as JSON. */
  chatSchema: string;
}

const chatValidators = [
  body('message').optional().isString().withMessage('message must be a string'),
  body('system').optional().isString().withMessage('system must be a string'),
];

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** Resolves the agent or answers 500 (e.g. missing Azure configuration). */
function agentOrFail(getAgent: () => ChatAgent, res: Response): ChatAgent | null {
  try {
    return getAgent();
  } catch (error) {
    logger.error('Chat agent unavailable', { error: errorMessage(error) });
    res.status(500).json({ error: errorMessage(error) });
    return null;
  }
}

function writeEvent(res: Response, event: string | null, data: unknown): void {
  if (event) res.write(`event: ${event}\n`);
  res.write(`data: ${JSON.stringify(data)}\n\n`);
}

export function createChatRoutes({ getAgent, chatSchema }: ChatRouteDeps): Router {
  const router = Router();

  /**
   * POST /api/chat
   * body/form: message (required; falls back to raw body), system, temperature, max_tokens
   */
  router.post('/', validate(chatValidators), async (req: Request, res: Response) => {
    const message = resolveMessage(req);
    if (!message) {
      return res.status(400).json({ error: 'missing message' });
    }
    const agent = agentOrFail(getAgent, res);
    if (!agent) return;

    const options = { ...readChatOptions(req), signal: abortOnClientClose(res) };

    if (chatSchema) {
      try {
        const { result, parsed } = await agent.sendChatJSON(message, { ...options, outputSchema: chatSchema });
        return res.json({ data: serializeChatResult(result), parsed });
      } catch (error) {
        if (error instanceof OutputParseError) {
          return res
            .status(422)
            .json({ data: serializeChatResult(error.result), parsed: null, parse_error: error.message });
        }
        if (error instanceof SchemaError) {
          return res.status(422).json({ data: null, parsed: null, parse_error: error.message });
        }
        logger.error('Chat request failed', { error: errorMessage(error) });
        return res.status(500).json({ error: errorMessage(error) });
      }
    }

    try {
      const result = await agent.sendChat(message, options);
      return res.json({ data: serializeChatResult(result) });
    } catch (error) {
      logger.error('Chat request failed', { error: errorMessage(error) });
      return res.status(500).json({ error: errorMessage(error) });
    }
  });

  /**
   * POST /api/chat/stream
   * Same inputs as /api/chat; answers with Server-Sent Events:
   *   data: {"delta": "..."}     per chunk
   *   event: done  / event: error
   * Closing the connection cancels the upstream request.
   */
  router.post('/stream', validate(chatValidators), async (req: Request, res: Response) => {
    const message = resolveMessage(req);
    if (!message) {
      return res.status(400).json({ error: 'missing message' });
    }
    const agent = agentOrFail(getAgent, res);
    if (!agent) return;

    const signal = abortOnClientClose(res);
    res.status(200).set({
      'Content-Type': 'text/event-stream',
      'Cache-Control': 'no-cache',
      Connection: 'keep-alive',
    });
    res.flushHeaders();

    try {
      const result = await agent.streamChat(
        message,
        (delta) => {
          if (signal.aborted) return false;
          writeEvent(res, null, { delta });
          return true;
        },
        { ...readChatOptions(req), signal }
      );
      if (!signal.aborted) writeEvent(res, 'done', serializeChatResult(result));
    } catch (error) {
      logger.error('Chat stream failed', { error: errorMessage(error) });
      writeEvent(res, 'error', { error: errorMessage(error) });
    } finally {
      res.end();
    }
  });

  return router;
}
