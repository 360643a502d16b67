import { Router, Response, NextFunction } from 'express';
import { z } from 'zod';
import { serializeEvent } from '../agents/agenda.js';
import type { AssistantOrchestrator } from '../agents/orchestrator.js';
import { NO_SLOTS } from '../agents/schedulingEngine.js';
import { identifyOwner, requireOwner, OwnerRequest } from '../middleware/owner.js';
import { parseRequest } from '../middleware/validate.js';
import type { FreeSlot } from '../types/index.js';

const findSlotsQuery = z.object({
  duration: z.coerce.number().int().positive(),
  participants: z.string().optional(),
  days: z.coerce.number().int().positive().max(31).default(7),
});

const freeTimeQuery = z.object({
  day: z
    .string()
    .regex(/^\d{4}-\d{2}-\d{2}$/, 'day must be YYYY-MM-DD')
    .optional(),
});

const upcomingQuery = z.object({
  days: z.coerce.number().int().min(1).max(365).default(7),
});

// 'YYYY-MM-DD' → 로컬 자정
function parseDay(day: string): Date {
  const [year, month, date] = day.split('-').map(Number);
  return new Date(year, month - 1, date);
}

function serializeSlots(slots: FreeSlot[]) {
  return slots.map(slot => ({ start: slot.start.toISOString(), end: slot.end.toISOString() }));
}

export function createCalendarRoutes(orchestrator: AssistantOrchestrator): Router {
  const router = Router();
  router.use(identifyOwner);

  /**
   * GET /api/calendar/find-slots?duration=30&participants=a@x.com,b@y.com&days=7
   * 참가자 전원이 가능한 회의 시간
   */
  router.get('/find-slots', async (req: OwnerRequest, res: Response, next: NextFunction) => {
    try {
      const query = parseRequest(findSlotsQuery, req.query, 'query');
      const participants = (query.participants ?? '').split(',').filter(id => id.trim() !== '');
      const result = await orchestrator.findMeetingSlots(query.duration, participants, query.days);

      if (result === NO_SLOTS) {
        res.json({ found: false, slots: [], message: 'No common free time found.' });
        return;
      }
      res.json({ found: true, slots: serializeSlots(result) });
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /api/calendar/free-time?day=2024-03-15
   * 하루 중 1시간 넘는 빈 시간 (기본: 오늘)
   */
  router.get('/free-time', async (req: OwnerRequest, res: Response, next: NextFunction) => {
    try {
      const ownerId = requireOwner(req);
      const { day } = parseRequest(freeTimeQuery, req.query, 'query');
      const slots = await orchestrator.getFreeTime(ownerId, day ? parseDay(day) : new Date());
      res.json({ slots: serializeSlots(slots), count: slots.length });
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /api/calendar/today
   * 오늘 일정
   */
  router.get('/today', async (_req: OwnerRequest, res: Response, next: NextFunction) => {
    try {
      const events = await orchestrator.getTodaySchedule();
      res.json({ events: events.map(serializeEvent), count: events.length });
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /api/calendar/upcoming?days=7
   * 지금부터 N일 이내 일정 (1~365)
   */
  router.get('/upcoming', async (req: OwnerRequest, res: Response, next: NextFunction) => {
    try {
      const { days } = parseRequest(upcomingQuery, req.query, 'query');
      const events = await orchestrator.getUpcomingEvents(days);
      res.json({ events: events.map(serializeEvent), days, count: events.length });
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /api/calendar/next-meeting
   */
  router.get('/next-meeting', async (_req: OwnerRequest, res: Response, next: NextFunction) => {
    try {
      const meeting = await orchestrator.getNextMeeting();
      res.json({ found: meeting !== null, meeting: meeting ? serializeEvent(meeting) : null });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
