import { randomUUID } from 'node:crypto';
import { Router, json, type Request, type Response, type NextFunction } from 'express';
import type { MessageHandler, NormalizedMessage } from './types.ts';

export interface RestRouterOptions {
  handler: MessageHandler;
  adminApiKey?: string;
  /** Source for GET /logs; the route is only mounted when given. */
  getRecentLogs?: (count: number, filter?: 'error') => string[];
}

const MAX_LOG_LINES = 200;

function requireApiKey(apiKey: string) {
  return (req: Request, res: Response, next: NextFunction) => {
    const auth = req.headers.authorization;
    if (!auth || auth !== `Bearer ${apiKey}`) {
      res.status(401).json({ error: 'Unauthorized: invalid or missing API key' });
      return;
    }
    next();
  };
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

export function createRestRouter(options: RestRouterOptions): Router {
  const router = Router();
  router.use(json());

  router.post('/chat', async (req, res) => {
    const body: Record<string, unknown> =
      typeof req.body === 'object' && req.body !== null ? req.body : {};
    const message = body['message'];

    if (typeof message !== 'string' || message.trim() === '') {
      res.status(400).json({ error: 'Missing required field: message' });
      return;
    }

    const normalized: NormalizedMessage = {
      channelId: 'rest',
      userId: optionalString(body['userId']) ?? 'anonymous',
      conversationId: optionalString(body['conversationId']) ?? randomUUID(),
      text: message,
    };

    const controller = new AbortController();
    res.on('close', () => {
      if (!res.writableFinished) controller.abort();
    });

    try {
      const { route, response } = await options.handler.handle(normalized, controller.signal);
      res.json({
        ...response,
        route,
        conversationId: normalized.conversationId,
      });
    } catch (error) {
      if (controller.signal.aborted) return;
      res.status(500).json({
        error: error instanceof Error ? error.message : 'Internal server error',
      });
    }
  });

  const getRecentLogs = options.getRecentLogs;
  if (getRecentLogs) {
    const logsHandler = (req: Request, res: Response) => {
      const filter = req.query['filter'] === 'error' ? 'error' : undefined;
      const requested = Number.parseInt(String(req.query['count'] ?? ''), 10);
      const count = Math.min(Math.max(Number.isNaN(requested) ? 50 : requested, 1), MAX_LOG_LINES);
      res.json({ lines: getRecentLogs(count, filter) });
    };

    if (options.adminApiKey) {
      router.get('/logs', requireApiKey(options.adminApiKey), logsHandler);
    } else {
      router.get('/logs', logsHandler);
    }
  }

  return router;
}
