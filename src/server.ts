import express, { Application, NextFunction, Request, Response } from 'express';
import morgan from 'morgan';
import { Server } from 'node:http';
import { Dictionary } from './dictionary.js';
import { LanguageTools, createEnglishTools } from './nlp.js';
import { createApiRoutes } from './routes/api.js';
import { isKnownError } from './errors.js';

/**
 * Application options
 */
export interface AppOptions {
  /** Log each request with morgan (default: true) */
  logRequests?: boolean;
  /** Tokenizer/lemmatizer for /api/vocabulary (default: English) */
  tools?: LanguageTools;
}

/**
 * Create and configure the Express application
 */
export function createApp(dictionary: Dictionary, options: AppOptions = {}): Application {
  const { logRequests = true, tools = createEnglishTools() } = options;
  const app = express();

  // Middleware
  app.use(express.json({ limit: '10mb' }));
  if (logRequests) {
    app.use(morgan('dev'));
  }

  // API routes
  app.use('/api', createApiRoutes(dictionary, tools));

  // Health check
  app.get('/health', (_req, res) => {
    res.json({
      status: 'ok',
      entries: dictionary.size,
      links: dictionary.linkCount
    });
  });

  app.use((_req, res) => {
    res.status(404).json({ error: 'Not found' });
  });

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (isKnownError(err)) {
      res.status(err.statusCode).json({ error: err.message });
      return;
    }
    console.error(err);
    res.status(500).json({ error: 'Internal server error' });
  });

  return app;
}

/**
 * Start serving a dictionary and shut down cleanly on SIGINT/SIGTERM
 */
export function startServer(dictionary: Dictionary, port: number, options: AppOptions = {}): Server {
  const app = createApp(dictionary, options);

  const server = app.listen(port, () => {
    console.log(`Wordhoard API listening on http://localhost:${port}`);
  });

  // Graceful shutdown handler
  const shutdown = (signal: string) => {
    console.log(`\nReceived ${signal}, shutting down gracefully...`);

    server.close(() => {
      console.log('Server closed');
      process.exit(0);
    });

    // Force exit after 10 seconds
    setTimeout(() => {
      console.error('Forced shutdown after timeout');
      process.exit(1);
    }, 10000).unref();
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));

  return server;
}
