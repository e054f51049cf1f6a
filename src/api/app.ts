import express from 'express';
import type { BookingAgent } from '../core/agent.js';
import type { Logger } from '../util/logging.js';
import { router } from './routes.js';

export function createApp(agent: BookingAgent, log: Logger, opts: { bodyLimit?: string } = {}): express.Express {
  const app = express();
  app.use(express.json({ limit: opts.bodyLimit ?? '64kb' }));

  // Basic request logging
  app.use((req, res, next) => {
    const start = Date.now();
    log.debug({ method: req.method, path: req.path }, 'req:start');
    res.on('finish', () => {
      log.debug({ method: req.method, path: req.path, status: res.statusCode, ms: Date.now() - start }, 'req:done');
    });
    next();
  });

  app.use(router(agent, log));
  return app;
}
