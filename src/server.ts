import express, { Request, Response, NextFunction } from 'express';
import cors from 'cors';
import { z } from 'zod';
import { config } from './core/config';
import { logger } from './core/logger';
import { GoalChainError } from './core/errors';
import { ConversationService } from './services/conversation.service';
import { LLMService } from './services/llm.service';
import { createProductOrderGraph } from './examples/product-order';
import { MAX_INPUT_LENGTH, maskSensitiveData, previewForLog, sanitizeInput } from './utils/security';
import type { ChainResponse } from './types/graph';

const MessageBody = z.object({
  message: z.string().min(1).max(MAX_INPUT_LENGTH),
});

const SimulateBody = z.object({
  content: z.string().min(1),
  rephrase: z.boolean().optional().default(false),
});

const SnapshotBody = z.object({
  activeGoal: z.string(),
  phase: z.enum(['awaiting_input', 'collecting', 'confirming', 'done']),
  collectedData: z.record(z.string(), z.unknown()),
  memory: z.record(z.string(), z.record(z.string(), z.unknown())).optional(),
  histories: z.record(
    z.string(),
    z.array(
      z.object({
        role: z.enum(['user', 'assistant']),
        content: z.string(),
        origin: z.literal('simulated').optional(),
      })
    )
  ),
});

function parseBody<S extends z.ZodTypeAny>(schema: S, body: unknown): z.infer<S> {
  const result = schema.safeParse(body);
  if (!result.success) {
    throw new GoalChainError('Invalid request body', 'BAD_REQUEST', 400, {
      issues: result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
    });
  }
  return result.data;
}

export const serializeResponse = (response: ChainResponse) => ({
  ...response,
  goal: response.goal.label,
});

export function createApp(conversations: ConversationService): express.Express {
  const app = express();
  app.use(cors());
  app.use(express.json({ limit: '1mb' }));

  app.get('/health', (req: Request, res: Response) => {
    res.json({
      status: 'healthy',
      timestamp: new Date().toISOString(),
      conversations: conversations.size,
    });
  });

  app.post('/conversations', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { conversationId, response } = await conversations.start();
      res.status(201).json({ success: true, data: { conversationId, response: serializeResponse(response) } });
    } catch (error) {
      next(error);
    }
  });

  app.post('/conversations/restore', (req: Request, res: Response, next: NextFunction) => {
    try {
      const snapshot = parseBody(SnapshotBody, req.body);
      const conversationId = conversations.resume(snapshot);
      res.status(201).json({ success: true, data: { conversationId } });
    } catch (error) {
      next(error);
    }
  });

  app.post('/conversations/:id/messages', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { message } = parseBody(MessageBody, req.body);
      const input = sanitizeInput(message);

      logger.info('Processing message', {
        conversationId: req.params.id,
        inputPreview: previewForLog(input),
      });

      const response = await conversations.send(req.params.id, input);
      res.json({ success: true, data: { response: serializeResponse(response) } });
    } catch (error) {
      next(error);
    }
  });

  app.post('/conversations/:id/simulate', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { content, rephrase } = parseBody(SimulateBody, req.body);
      const response = await conversations.simulate(req.params.id, content, rephrase);
      res.json({ success: true, data: { response: serializeResponse(response) } });
    } catch (error) {
      next(error);
    }
  });

  app.get('/conversations/:id', (req: Request, res: Response, next: NextFunction) => {
    try {
      res.json({ success: true, data: conversations.snapshot(req.params.id) });
    } catch (error) {
      next(error);
    }
  });

  app.delete('/conversations/:id', (req: Request, res: Response, next: NextFunction) => {
    try {
      conversations.end(req.params.id);
      res.json({ success: true, message: 'Conversation ended' });
    } catch (error) {
      next(error);
    }
  });

  app.use((error: Error, req: Request, res: Response, next: NextFunction) => {
    logger.error(maskSensitiveData(error.message || 'An error occurred'), {
      path: req.path,
      stack: error.stack,
    });

    if (error instanceof GoalChainError) {
      res.status(error.statusCode).json({
        success: false,
        message: error.message,
        error: {
          message: error.message,
          code: error.code,
          details: error.statusCode < 500 ? error.details : undefined,
        },
      });
    } else {
      res.status(500).json({
        success: false,
        message: 'Internal server error',
        error: {
          message: 'Internal server error',
          code: 'INTERNAL_ERROR',
        },
      });
    }
  });

  return app;
}

async function startServer() {
  const { productOrder } = createProductOrderGraph();
  const conversations = new ConversationService(productOrder, { completion: new LLMService() });
  const app = createApp(conversations);

  app.listen(config.server.port, () => {
    logger.info('goal-chain server started', {
      port: config.server.port,
      env: config.server.env,
      nodeVersion: process.version,
    });
  });
}

if (require.main === module) {
  startServer().catch((error: unknown) => {
    logger.error('Failed to start server', {
      error: error instanceof Error ? error.message : String(error),
    });
    process.exit(1);
  });
}
