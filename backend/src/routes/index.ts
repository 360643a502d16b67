import { Router } from 'express';
import type { AssistantOrchestrator } from '../agents/orchestrator.js';
import { createCalendarRoutes } from './calendar.js';
import { createCommandRoutes } from './commands.js';
import { createLogRoutes } from './logs.js';
import { createVoiceRoutes } from './voice.js';

export function createRoutes(orchestrator: AssistantOrchestrator): Router {
  const router = Router();

  // Health check
  router.get('/health', (_req, res) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  // API Routes
  router.use('/voice', createVoiceRoutes(orchestrator));
  router.use('/commands', createCommandRoutes(orchestrator));
  router.use('/calendar', createCalendarRoutes(orchestrator));
  router.use('/logs', createLogRoutes(orchestrator));

  return router;
}
