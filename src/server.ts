import express, { Application } from 'express';
import morgan from 'morgan';
import * as http from 'node:http';
import { KeySite } from './loader.js';
import { createApiRoutes } from './routes/api.js';
import { logger } from './logger.js';

/**
 * Server configuration
 */
export interface ServerOptions {
  /** Port to listen on (default: 3000) */
  port?: number;
  /** Directory with generated pages to serve */
  staticDir?: string;
  /** Log requests (default: true) */
  requestLog?: boolean;
}

/**
 * Create and configure the Express application
 */
export function createApp(site: KeySite, options: ServerOptions = {}): Application {
  const app = express();

  // Middleware
  if (options.requestLog !== false) {
    app.use(morgan('dev'));
  }
  app.use(express.json());

  // API routes
  app.use('/api', createApiRoutes(site));

  // Health check
  app.get('/health', (_req, res) => {
    res.json({
      status: 'ok',
      characteristics: site.model.nodes.size,
      species: site.closure.allSpecies().length,
      terms: site.catalog.size
    });
  });

  // Generated pages
  if (options.staticDir) {
    app.use(express.static(options.staticDir));
  }

  app.use((_req, res) => {
    res.status(404).json({ error: 'Not found' });
  });

  return app;
}

/**
 * Start the preview server; stops on SIGINT/SIGTERM
 */
export function startServer(site: KeySite, options: ServerOptions = {}): http.Server {
  const port = options.port ?? 3000;
  const app = createApp(site, options);

  const server = app.listen(port, () => {
    logger.info(`keypages preview listening on http://localhost:${port}`);
  });

  // Graceful shutdown handler
  const shutdown = (signal: string) => {
    logger.info(`\nReceived ${signal}, shutting down gracefully...`);

    server.close(() => {
      logger.info('Server closed');
      process.exit(0);
    });

    // Force exit after 10 seconds
    setTimeout(() => {
      logger.error('Forced shutdown after timeout');
      process.exit(1);
    }, 10000).unref();
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));

  return server;
}
