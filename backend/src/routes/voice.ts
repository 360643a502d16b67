import { Router, Response, NextFunction } from 'express';
import { z } from 'zod';
import type { AssistantOrchestrator } from '../agents/orchestrator.js';
import { statusForKind } from '../middleware/errorHandler.js';
import { identifyOwner, requireOwner, OwnerRequest } from '../middleware/owner.js';
import { parseRequest } from '../middleware/validate.js';

const utteranceSchema = z.object({
  text: z.string().trim().min(1, 'text is required'),
});

export function createVoiceRoutes(orchestrator: AssistantOrchestrator): Router {
  const router = Router();
  router.use(identifyOwner);

  /**
   * POST /api/voice/start
   * 음성 세션 시작 (재시도 포함)
   */
  router.post('/start', async (req: OwnerRequest, res: Response, next: NextFunction) => {
    try {
      const ownerId = requireOwner(req);
      const result = await orchestrator.startSession(ownerId);

      if (result.error) {
        res.status(statusForKind(result.error.kind)).json({
          error: result.error.kind,
          message: result.error.message,
          status: result.status,
        });
        return;
      }

      res.json({ status: result.status });
    } catch (error) {
      next(error);
    }
  });

  /**
   * POST /api/voice/stop
   * 세션 종료 (멱등)
   */
  router.post('/stop', async (req: OwnerRequest, res: Response, next: NextFunction) => {
    try {
      const ownerId = requireOwner(req);
      const result = await orchestrator.stopSession(ownerId);
      res.json(result);
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /api/voice/status
   */
  router.get('/status', (req: OwnerRequest, res: Response, next: NextFunction) => {
    try {
      const ownerId = requireOwner(req);
      res.json({ status: orchestrator.getSessionStatus(ownerId) });
    } catch (error) {
      next(error);
    }
  });

  /**
   * POST /api/voice/input
   * 사용자 발화 전달 { text }
   */
  router.post('/input', async (req: OwnerRequest, res: Response, next: NextFunction) => {
    try {
      const ownerId = requireOwner(req);
      const { text } = parseRequest(utteranceSchema, req.body, 'body');
      const result = await orchestrator.handleUtterance(ownerId, text);
      res.json(result);
    } catch (error) {
      next(error);
    }
  });

  return router;
}
