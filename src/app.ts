import express, { type NextFunction, type Request, type Response } from 'express';
import cors from 'cors';
import { v4 as uuidv4 } from 'uuid';
import type { LookupStore } from './domain/lookup-store.js';
import { childLogger, logger } from './observability/logger.js';
import type { TriageRunner } from './services/triage.js';
import { buildTriageResponse, listOrdersQuerySchema, triageRequestSchema } from './web/triage-requests.js';

interface AppDeps {
  store: LookupStore;
  runTriage: TriageRunner;
  sampleOrderLimit: number;
  jsonBodyLimit?: string;
}

export function createApp(deps: AppDeps): express.Express {
  const app = express();
  app.use(cors());
  app.use(express.json({ limit: deps.jsonBodyLimit ?? '100kb' }));

  app.get('/health', (_req, res) => {
    res.json({ ok: true, timestamp: new Date().toISOString() });
  });

  app.get('/', (_req, res) => {
    res.type('text/plain').send(
      [
        'Ticket Triage Service',
        '',
        'Endpoints:',
        'GET /health',
        'GET /api/orders',
        'POST /api/triage',
        '',
        'Chat:',
        'WS /ws/triage',
      ].join('\n'),
    );
  });

  app.get('/api/orders', (req, res) => {
    const parsed = listOrdersQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      return res.status(400).json({
        error: 'Invalid query',
        details: parsed.error.flatten(),
      });
    }

    const orders = deps.store.listOrders(parsed.data.limit ?? deps.sampleOrderLimit);
    return res.json({ orders });
  });

  app.post('/api/triage', (req, res) => {
    const parsed = triageRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).json({
        error: 'Invalid payload',
        details: parsed.error.flatten(),
      });
    }

    const log = childLogger(uuidv4(), { channel: 'http' });
    const result = deps.runTriage(parsed.data.ticketText, parsed.data.orderId);
    log.info(
      { orderId: result.orderId, issueType: result.issueType, failed: result.error !== null },
      'Ticket triaged',
    );

    return res.json(buildTriageResponse(result));
  });

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (isBodyParseError(err)) {
      res.status(400).json({ error: 'Invalid JSON body' });
      return;
    }

    logger.error({ err }, 'Unhandled request error');
    res.status(500).json({ error: 'Internal error' });
  });

  return app;
}

function isBodyParseError(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'type' in err && err.type === 'entity.parse.failed';
}
