import 'dotenv/config';
import express, { type Express } from 'express';
import type { Logger } from 'pino';
import { createAssistant, type Assistant } from '../bootstrap.js';
import { isAssistantError } from '../core/errors.js';
import { createLogger } from '../util/logging.js';
import { router } from './routes.js';

function resOnFinish(res: express.Response, cb: () => void) {
  res.once('finish', cb);
}

export function createApp(assistant: Assistant, log: Logger): Express {
  const app = express();

  app.use(express.json({ limit: '512kb' }));

  // CORS support for frontend integration
  app.use((req, res, next) => {
    res.header('Access-Control-Allow-Origin', '*');
    res.header('Access-Control-Allow-Methods', 'GET, POST, OPTIONS');
    res.header('Access-Control-Allow-Headers', 'Content-Type, Authorization');
    if (req.method === 'OPTIONS') {
      res.sendStatus(200);
    } else {
      next();
    }
  });

  // Basic request logging
  app.use((req, res, next) => {
    const start = Date.now();
    log.debug({ method: req.method, path: req.path }, 'req:start');
    resOnFinish(res, () => {
      log.debug({ method: req.method, path: req.path, status: res.statusCode, ms: Date.now() - start }, 'req:done');
    });
    next();
  });

  app.get('/healthz', (_req, res) => {
    res.status(200).json({ ok: true, stores: assistant.catalog.size });
  });
  app.use('/', router(assistant, log));

  return app;
}

async function main(): Promise<void> {
  const log = createLogger();
  let assistant: Assistant;
  try {
    assistant = await createAssistant({ log });
  } catch (err) {
    if (isAssistantError(err)) {
      log.fatal({ code: err.code, details: err.details }, err.message);
    } else {
      log.fatal({ err }, 'Startup failed');
    }
    process.exit(1);
  }

  const port = Number(process.env.PORT ?? 3000);
  const server = createApp(assistant, log).listen(port, () => log.info({ port }, 'HTTP server started'));

  const shutdown = () => {
    server.close(() => {
      assistant.close();
      process.exit(0);
    });
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}

if (require.main === module) {
  main().catch((e) => (console.error(e), process.exit(1)));
}
