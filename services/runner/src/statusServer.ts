import express, { type Express, type Request, type Response } from 'express';
import type { Server } from 'http';
import { createLogger } from './logger.js';
import type { StatusStore } from './statusStore.js';

const logger = createLogger('status');

export function createStatusApp(store: StatusStore): Express {
  const app = express();

  app.get('/health', (req: Request, res: Response) => {
    res.json({ status: 'ok' });
  });

  app.get('/experiment', (req: Request, res: Response) => {
    res.json(store.snapshot());
  });

  return app;
}

/** Serves the status endpoints on `port`; resolves once listening. */
export function startStatusServer(store: StatusStore, port: number): Promise<Server> {
  const app = createStatusApp(store);

  return new Promise((resolve, reject) => {
    const server = app.listen(port);
    server.once('listening', () => {
      logger.info(`Status endpoint listening on port ${port}`);
      resolve(server);
    });
    server.once('error', reject);
  });
}

export function stopStatusServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()));
  });
}
