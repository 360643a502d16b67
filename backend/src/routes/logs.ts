import { Router, Response, NextFunction } from 'express';
import { z } from 'zod';
import type { AssistantOrchestrator } from '../agents/orchestrator.js';
import { identifyOwner, requireOwner, OwnerRequest } from '../middleware/owner.js';
import { parseRequest } from '../middleware/validate.js';
import type { AuditEntry } from '../types/index.js';

const logsQuery = z.object({
  page: z.coerce.number().int().positive().default(1),
  per_page: z.coerce.number().int().positive().max(100).default(20),
});

function serializeEntry(entry: AuditEntry) {
  return {
    id: entry.id,
    level: entry.level,
    message: entry.message,
    source: entry.source,
    extra: entry.extra,
    timestamp: entry.createdAt.toISOString(),
  };
}

export function createLogRoutes(orchestrator: AssistantOrchestrator): Router {
  const router = Router();
  router.use(identifyOwner);

  /**
   * GET /api/logs?page=1&per_page=20
   * 본인 감사 로그 (최신순)
   */
  router.get('/', async (req: OwnerRequest, res: Response, next: NextFunction) => {
    try {
      const ownerId = requireOwner(req);
      const query = parseRequest(logsQuery, req.query, 'query');
      const log = await orchestrator.getAuditLog(ownerId, query.page, query.per_page);
      res.json({
        logs: log.entries.map(serializeEntry),
        total: log.total,
        page: log.page,
        pages: log.pages,
      });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
