/**
 * HTTP API server
 */

import type { Server } from 'http';
import express, { Request, Response, NextFunction } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { ZodError } from 'zod';
import { SearchError } from 'court-playwright';
import { initRoutes, statusForKind } from './routes.js';
import { PdfDownloadError, ServiceBusyError, type CaseSearchService } from '../services/search.js';
import { logger } from '../utils/logger.js';

export interface ApiServerConfig {
  port: number;
  corsOrigins: string[] | '*';
  /** Expose error messages of unexpected failures */
  exposeErrors?: boolean;
}

export function createApiServer<S>(service: CaseSearchService<S>, config: ApiServerConfig) {
  const app = express();

  app.use(helmet());
  app.use(cors({
    origin: config.corsOrigins,
    methods: ['GET', 'POST', 'DELETE'],
    allowedHeaders: ['Content-Type', 'Authorization'],
  }));

  app.use(express.json({ limit: '100kb' }));

  // Logging
  app.use((req: Request, res: Response, next: NextFunction) => {
    const start = Date.now();
    res.on('finish', () => {
      const duration = Date.now() - start;
      logger.info(`${req.method} ${req.path} ${res.statusCode} ${duration}ms`);
    });
    next();
  });

  // Health check
  app.get('/health', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const report = await service.health();
      res.status(report.status === 'healthy' ? 200 : 503).json(report);
    } catch (error) {
      next(error);
    }
  });

  app.use('/api', initRoutes(service));

  // 404
  app.use((req: Request, res: Response) => {
    res.status(404).json({ error: 'Route not found' });
  });

  // Error handler
  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof ZodError) {
      res.status(400).json({
        error: 'Invalid request',
        details: err.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message })),
      });
      return;
    }

    if (err instanceof ServiceBusyError) {
      res.status(503).json({ error: err.message });
      return;
    }

    if (err instanceof PdfDownloadError) {
      res.status(err.status).json({ error: err.message });
      return;
    }

    if (err instanceof SearchError) {
      logger.warn('Search error in API', { kind: err.kind, message: err.message });
      res.status(statusForKind(err.kind)).json({ error: err.message, kind: err.kind });
      return;
    }

    // malformed JSON bodies arrive from express.json with a status
    if (err instanceof SyntaxError && 'status' in err && err.status === 400) {
      res.status(400).json({ error: 'Malformed JSON body' });
      return;
    }

    logger.error('API error', { error: err instanceof Error ? err.stack ?? err.message : String(err) });
    res.status(500).json({
      error: 'Internal server error',
      message: config.exposeErrors && err instanceof Error ? err.message : undefined,
    });
  });

  return app;
}

export async function startApiServer<S>(service: CaseSearchService<S>, config: ApiServerConfig): Promise<Server> {
  const app = createApiServer(service, config);

  return new Promise<Server>((resolve, reject) => {
    const server = app.listen(config.port, (error?: Error) => {
      if (error) {
        reject(error);
        return;
      }
      logger.info(`API server listening on port ${config.port}`);
      resolve(server);
    });
  });
}
