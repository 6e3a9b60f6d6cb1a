import express, { type Express, type Request, type Response } from 'express';
import cors from 'cors';
import type { Server } from 'http';
import { createQueryRoutes } from './routes.js';
import type { QueryService } from './service.js';

export { createQueryRoutes } from './routes.js';
export { PipelineQueryService, type QueryService, type QueryRequest, type PipelineFactory } from './service.js';

export interface ServerConfig {
  port: number;
  queryService: QueryService;
}

export function createApp(queryService: QueryService): Express {
  const app = express();
  app.use(cors());
  app.use(express.json());

  app.get('/', (_req: Request, res: Response) => {
    res.json({
      status: 'running',
      endpoints: {
        query: 'POST /api/query',
        collections: 'GET /api/collections',
        health: 'GET /health',
      },
    });
  });

  app.get('/health', (_req: Request, res: Response) => {
    res.json({ status: 'healthy' });
  });

  app.use('/api', createQueryRoutes(queryService));
  return app;
}

export class RagServer {
  private readonly app: Express;
  private readonly port: number;
  private server: Server | null = null;

  constructor(config: ServerConfig) {
    this.port = config.port;
    this.app = createApp(config.queryService);
  }

  start(): Promise<void> {
    return new Promise((resolve, reject) => {
      const server = this.app.listen(this.port, () => {
        console.log(`[RAGServer] Listening on http://localhost:${this.port}`);
        resolve();
      });
      server.on('error', reject);
      this.server = server;
    });
  }

  stop(): Promise<void> {
    return new Promise((resolve, reject) => {
      if (this.server === null) {
        resolve();
        return;
      }
      this.server.close((error) => (error ? reject(error) : resolve()));
      this.server = null;
    });
  }
}
