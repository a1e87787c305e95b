import http from 'node:http';
import { v4 as uuidv4 } from 'uuid';
import { WebSocketServer, type RawData, type WebSocket } from 'ws';
import { createApp } from './app.js';
import { env } from './config/env.js';
import type { LookupStore } from './domain/lookup-store.js';
import { MockDataError, getDefaultLookupStore } from './domain/mock-data.js';
import { childLogger, logger } from './observability/logger.js';
import { createTriageRunner } from './services/triage.js';
import { greetingReply, handleSocketMessage, type TriageSocketReply } from './web/triage-requests.js';

function loadStoreOrExit(): LookupStore {
  try {
    return getDefaultLookupStore();
  } catch (error: unknown) {
    if (error instanceof MockDataError) {
      logger.fatal({ err: error, file: error.file }, 'Lookup data is malformed; refusing to start');
    } else {
      logger.fatal({ err: error }, 'Failed to load lookup data');
    }
    process.exit(1);
  }
}

const store = loadStoreOrExit();
const runTriage = createTriageRunner(store, {
  onRun: (run) => {
    logger.debug({ stages: run.stages, issueType: run.result.issueType }, 'Triage pipeline finished');
  },
});

const app = createApp({
  store,
  runTriage,
  sampleOrderLimit: env.triage.sampleOrderLimit,
  jsonBodyLimit: env.jsonBodyLimit,
});

// ─── HTTP server + WebSocket ────────────────────────────────────────────────

const server = http.createServer(app);
const wss = new WebSocketServer({ server, path: '/ws/triage' });

wss.on('connection', (ws: WebSocket) => {
  const log = childLogger(uuidv4(), { channel: 'ws' });
  log.info('Chat client connected');
  send(ws, greetingReply());

  ws.on('message', (raw: RawData) => {
    try {
      const reply = handleSocketMessage(raw.toString(), runTriage);
      if (reply.type === 'triage_result') {
        log.info(
          { orderId: reply.result.orderId, issueType: reply.result.issueType, failed: reply.result.error !== null },
          'Ticket triaged',
        );
      }
      send(ws, reply);
    } catch (err: unknown) {
      log.error({ err }, 'Failed to handle chat message');
      send(ws, { type: 'error', error: 'Internal error' });
    }
  });

  ws.on('close', () => {
    log.info('Chat client disconnected');
  });
});

function send(ws: WebSocket, reply: TriageSocketReply): void {
  ws.send(JSON.stringify(reply));
}

server.listen(env.port, () => {
  logger.info(
    { baseUrl: env.baseUrl, mockDataDir: env.triage.mockDataDir, rules: store.ruleCount },
    'Ticket triage service listening',
  );
  logger.info(`WebSocket chat endpoint: ws://127.0.0.1:${env.port}/ws/triage`);
});
