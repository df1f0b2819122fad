import express from 'express';
import type { Server } from 'node:http';
import type { Logger } from '../../infra/logger/logger.js';
import type { ApiController } from './ApiController.js';
import { createApiRouter } from './router.js';

/**
 * JSON API over express. Read-only apart from the digest trigger.
 */
export class HttpServer {
  private server: Server | null = null;

  constructor(
    private readonly controller: ApiController,
    private readonly logger: Logger,
    private readonly port: number,
  ) {}

  public createApp(): express.Express {
    const app = express();
    app.use(express.json({ limit: '1mb' }));
    app.use(createApiRouter(this.controller));
    return app;
  }

  public start(): Promise<void> {
    return new Promise((resolve, reject) => {
      const server = this.createApp().listen(this.port, () => {
        this.logger.info('http', `Listening on http://localhost:${this.port}`);
        resolve();
      });
      server.once('error', reject);
      this.server = server;
    });
  }

  public stop(): Promise<void> {
    const server = this.server;
    if (!server) return Promise.resolve();
    this.server = null;
    return new Promise((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
    });
  }
}
