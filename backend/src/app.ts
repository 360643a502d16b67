import express from 'express';
import cors from 'cors';
import { env } from './config/env.js';
import type { AssistantOrchestrator } from './agents/orchestrator.js';
import { errorHandler } from './middleware/errorHandler.js';
import { createRoutes } from './routes/index.js';

export function createApp(orchestrator: AssistantOrchestrator): express.Express {
  const app = express();

  // Middleware
  app.use(cors({
    origin: env.FRONTEND_URL,
    credentials: true
  }));
  app.use(express.json());

  // Request logging
  app.use((req, _res, next) => {
    console.log(`${new Date().toISOString()} ${req.method} ${req.path}`);
    next();
  });

  // API Routes
  app.use('/api', createRoutes(orchestrator));

  // 404 handler
  app.use((_req, res) => {
    res.status(404).json({ error: 'NotFound', message: 'Not found' });
  });

  // Error handling
  app.use(errorHandler);

  return app;
}
