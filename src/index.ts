/**
 * Backend entry point: validate the chat agent configuration, build the
 * server-side output schema and start the HTTP server.
 */
import { createServer } from 'http';
import { createApp } from './api/app';
import { config } from './config';
import { logger } from './config/logger';
import { getChatAgent } from './ai/llm';
import { parseSchemaFieldSpec, schemaFromFields } from './ai/prompts';

function serverChatSchema(): string {
  const fields = parseSchemaFieldSpec(config.chat.schemaFields);
  if (Object.keys(fields).length === 0) return '';
  return schemaFromFields(fields, [...config.chat.schemaRequired]);
}

async function start() {
  // Fail fast on missing Azure OpenAI settings instead of on the first chat request.
  const agent = getChatAgent();
  const { model, deployment, endpoint, timeoutMs } = agent.getConfig();
  logger.info('Chat agent ready', { model, deployment, endpoint, timeoutMs });

  const chatSchema = serverChatSchema();
  if (chatSchema) {
    logger.info('Server-side chat output schema enabled', { schema: chatSchema });
  }

  const app = createApp({ getAgent: getChatAgent, chatSchema });
  const httpServer = createServer(app);

  const server = httpServer.listen(config.port, config.host, () => {
    logger.info(`Server listening on ${config.host}:${config.port} (env: ${config.env})`);
  });

  return server;
}

const serverPromise = start().catch((e) => {
  logger.error('Startup failed:', { error: (e as Error).message });
  process.exit(1);
});

export default serverPromise;
