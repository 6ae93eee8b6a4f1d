import { randomUUID } from 'node:crypto';
import express, { type NextFunction, type Request, type Response } from 'express';
import { z } from 'zod';
import type { ConversationOrchestrator } from '../chat/orchestrator';
import { InvalidInputError } from '../errors';
import { createLogger, describeError } from '../logger';

const logger = createLogger('http');

const ChatRequestSchema = z.object({
  message: z.string({ required_error: 'message is required' }).trim().min(1, 'message must not be empty'),
  session_id: z.string().trim().min(1, 'session_id must not be empty').optional(),
});

export interface ServerDeps {
  orchestrator: Pick<ConversationOrchestrator, 'handle'>;
  /** Reports whether the sports API answers; used by /health. */
  isSportsApiConnected: () => Promise<boolean>;
  sessionCount: () => number;
}

function isBodyParserError(error: unknown): error is { type: string; status: number } {
  return typeof error === 'object' && error !== null && 'type' in error && 'status' in error;
}

export function createServer(deps: ServerDeps): express.Express {
  const app = express();
  app.use(express.json({ limit: '64kb' }));

  app.get('/', (_req: Request, res: Response) => {
    res.json({ status: 'Chat assistant running', timestamp: new Date().toISOString() });
  });

  app.get('/health', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const apiConnected = await deps.isSportsApiConnected();
      res.json({
        status: 'healthy',
        service: 'chatbot',
        api_connected: apiConnected,
        sessions: deps.sessionCount(),
      });
    } catch (error) {
      next(error);
    }
  });

  app.post('/chat', async (req: Request, res: Response, next: NextFunction) => {
    const parsed = ChatRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ error: parsed.error.issues.map((issue) => issue.message).join('; ') });
      return;
    }

    const sessionId = parsed.data.session_id ?? randomUUID();
    try {
      const reply = await deps.orchestrator.handle({ message: parsed.data.message, sessionId });
      res.json({ response: reply.response, session_id: reply.sessionId });
    } catch (error) {
      next(error);
    }
  });

  app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (error instanceof InvalidInputError) {
      res.status(400).json({ error: error.message });
      return;
    }
    if (isBodyParserError(error) && error.type === 'entity.parse.failed') {
      res.status(400).json({ error: 'request body must be valid JSON' });
      return;
    }
    if (isBodyParserError(error) && error.status === 413) {
      res.status(413).json({ error: 'request body too large' });
      return;
    }
    logger.error(`unhandled request error: ${describeError(error)}`, error);
    res.status(500).json({ error: 'internal error' });
  });

  return app;
}
