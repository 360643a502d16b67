import { Router, Response, NextFunction } from 'express';
import { z } from 'zod';
import type { AssistantOrchestrator } from '../agents/orchestrator.js';
import { statusForKind } from '../middleware/errorHandler.js';
import { identifyOwner, requireOwner, OwnerRequest } from '../middleware/owner.js';
import { parseRequest } from '../middleware/validate.js';

const routeSchema = z.object({
  text: z.string().trim().min(1, 'text is required'),
});

const commandBodySchema = z
  .object({
    params: z.record(z.unknown()).optional(),
  })
  .default({});

export function createCommandRoutes(orchestrator: AssistantOrchestrator): Router {
  const router = Router();
  router.use(identifyOwner);

  /**
   * GET /api/commands
   * 등록된 명령 목록
   */
  router.get('/', (_req: OwnerRequest, res: Response) => {
    const commands = orchestrator.listCommands();
    res.json({ commands, count: commands.length });
  });

  /**
   * POST /api/commands/route
   * 자유 텍스트를 명령으로 라우팅 후 실행 { text }
   */
  router.post('/route', async (req: OwnerRequest, res: Response, next: NextFunction) => {
    try {
      const { text } = parseRequest(routeSchema, req.body, 'body');
      const result = await orchestrator.routeAndProcess(text, req.ownerId);
      res.json({ matched: result !== null, result });
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /api/commands/timers
   * 실행 중인 타이머
   */
  router.get('/timers', (req: OwnerRequest, res: Response, next: NextFunction) => {
    try {
      const ownerId = requireOwner(req);
      const timers = orchestrator.getActiveTimers(ownerId);
      res.json({ timers, count: timers.length });
    } catch (error) {
      next(error);
    }
  });

  /**
   * POST /api/commands/reminders/:id/dismiss
   */
  router.post('/reminders/:id/dismiss', async (req: OwnerRequest, res: Response, next: NextFunction) => {
    try {
      const ownerId = requireOwner(req);
      const reminder = await orchestrator.dismissReminder(ownerId, req.params.id);
      res.json({ reminder });
    } catch (error) {
      next(error);
    }
  });

  /**
   * POST /api/commands/:name
   * 명령 직접 실행 { params }
   */
  router.post('/:name', async (req: OwnerRequest, res: Response, next: NextFunction) => {
    try {
      const { params } = parseRequest(commandBodySchema, req.body ?? {}, 'body');
      const result = await orchestrator.processCommand(req.params.name, params ?? {}, req.ownerId);
      res.status(result.success ? 200 : statusForKind(result.errorKind)).json(result);
    } catch (error) {
      next(error);
    }
  });

  return router;
}
