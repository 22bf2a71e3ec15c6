import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import morgan from 'morgan';
import { config } from './config/index.js';
import {
  ConfigurationError,
  GenerationAbortedError,
  NotFoundError,
  ProviderError,
  ValidationError,
} from './errors/index.js';
import { createConfigRouter } from './routes/config.js';
import { createImagesRouter } from './routes/images.js';
import { createProjectsRouter } from './routes/projects.js';
import { createPromptsRouter } from './routes/prompts.js';
import { createStoriesRouter } from './routes/stories.js';
import { createVisualRouter } from './routes/visual.js';
import type { ProjectOrchestrator } from './services/project/projectOrchestrator.js';
import logger from './utils/logger.js';

export interface AppDeps {
  orchestrator: ProjectOrchestrator;
  // Request logging, off in tests
  accessLog?: boolean;
}

export function createApp({ orchestrator, accessLog = true }: AppDeps): express.Express {
  const app = express();

  // Middleware
  app.use(helmet());
  app.use(cors({
    origin: config.clientUrl,
    credentials: true,
  }));
  if (accessLog) {
    app.use(morgan('dev'));
  }
  app.use(express.json({ limit: '1mb' }));

  // Health check
  app.get('/health', (req, res) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  // Routes
  app.use('/api/config', createConfigRouter());
  app.use('/api/stories', createStoriesRouter(orchestrator));
  app.use('/api/projects', createProjectsRouter(orchestrator));
  app.use('/api/images', createImagesRouter(orchestrator));
  app.use('/api/prompts', createPromptsRouter(orchestrator));
  app.use('/api/visual-consistency', createVisualRouter(orchestrator));

  // 404 handler
  app.use((req, res) => {
    res.status(404).json({ error: 'Not found' });
  });

  // Error handler
  app.use((err: unknown, req: express.Request, res: express.Response, _next: express.NextFunction) => {
    if (err instanceof ValidationError) {
      res.status(400).json({ error: err.message, details: err.details });
      return;
    }
    if (err instanceof NotFoundError) {
      res.status(404).json({ error: err.message });
      return;
    }
    // Malformed JSON bodies from express.json()
    if (err instanceof SyntaxError && 'body' in err) {
      res.status(400).json({ error: 'Request body is not valid JSON' });
      return;
    }

    logger.error('HTTP', `${req.method} ${req.originalUrl} failed`, err);
    if (err instanceof ConfigurationError || err instanceof ProviderError || err instanceof GenerationAbortedError) {
      res.status(500).json({ error: err.message });
      return;
    }
    res.status(500).json({ error: 'Internal server error' });
  });

  return app;
}
