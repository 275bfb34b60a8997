/**
 * Express app: CORS, body parsing (JSON, urlencoded, multipart fields, raw text),
 * request logging, rubric + chat routes and JSON error handling.
 * Dependencies are injected so tests can supply a ChatAgent over a fake transport.
 */

import type { IncomingMessage } from 'http';
import express, { Express } from 'express';
import cors from 'cors';
import multer from 'multer';
import { config } from '../config';
import { getChatAgent } from '../ai/llm';
import type { ChatAgent } from '../services/chat-agent.service';
import { promptRoutes } from './routes/prompt.routes';
import { criteriaRoutes } from './routes/criteria.routes';
import { createChatRoutes } from './routes/chat.routes';
import { requestLogger } from './middleware/requestLogger';
import { errorHandler, notFoundHandler } from './middleware/errorHandler';

export interface AppDeps {
  getAgent?: () => ChatAgent;
  /** Server-side JSON Schema for POST /api/chat; empty disables JSON parsing. */
  chatSchema?: string;
  appName?: string;
}

const BODY_LIMIT = '2mb';

function isRawTextBody(req: IncomingMessage): boolean {
  const type = req.headers['content-type'] ?? '';
  return !type.startsWith('multipart/');
}

export function createApp(deps: AppDeps = {}): Express {
  const appName = deps.appName ?? config.appName;
  const app = express();
  const upload = multer();

  app.use(cors({ origin: true, credentials: true }));
  app.use(requestLogger);
  app.use(express.json({ limit: BODY_LIMIT }));
  app.use(express.urlencoded({ extended: false, limit: BODY_LIMIT }));
  // whatever the parsers above skipped (text/plain, no content type...) is kept as a string
  app.use(express.text({ type: isRawTextBody, limit: BODY_LIMIT }));
  // multipart form fields only; file parts are rejected
  app.use(upload.none());

  app.get('/health', (_req, res) => {
    res.json({ app: appName, status: 'ok', ts: new Date().toISOString() });
  });

  app.use('/api/prompt', promptRoutes);
  app.use('/api/criteria', criteriaRoutes);
  app.use(
    '/api/chat',
    createChatRoutes({
      getAgent: deps.getAgent ?? getChatAgent,
      chatSchema: deps.chatSchema ?? '',
    })
  );

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
