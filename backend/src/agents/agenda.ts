import type { CalendarEvent, CalendarProvider, FreeSlot } from '../types/index.js';
import { getFreeSlots } from './schedulingEngine.js';

/**
 * Agenda - 본인 캘린더 조회 (오늘 일정, 다가오는 일정, 다음 회의, 빈 시간)
 * 응답 문장 포맷도 여기서 담당
 */

// 빈 시간으로 인정하는 최소 길이 (분)
export const FREE_TIME_MIN_GAP_MINUTES = 60;

// 다음 회의 검색 범위 (일)
export const NEXT_MEETING_LOOKAHEAD_DAYS = 30;

export type TimedEvent = CalendarEvent & { start: Date };

export function startOfDay(date: Date): Date {
  const result = new Date(date);
  result.setHours(0, 0, 0, 0);
  return result;
}

export function addDays(date: Date, days: number): Date {
  const result = new Date(date);
  result.setDate(result.getDate() + days);
  return result;
}

// ==============================================
// 조회
// ==============================================

export function getTodaySchedule(calendar: CalendarProvider, now: Date): Promise<CalendarEvent[]> {
  const start = startOfDay(now);
  return calendar.listEvents({ start, end: addDays(start, 1) });
}

export function getUpcomingEvents(calendar: CalendarProvider, now: Date, days: number): Promise<CalendarEvent[]> {
  return calendar.listEvents({ start: now, end: addDays(now, days) });
}

/**
 * 지금 이후 시작하는 첫 일정. 종일 일정과 이미 시작한 일정은 제외
 */
export async function getNextMeeting(calendar: CalendarProvider, now: Date): Promise<TimedEvent | null> {
  const events = await calendar.listEvents({ start: now, end: addDays(now, NEXT_MEETING_LOOKAHEAD_DAYS) });

  const upcoming = events
    .filter((event): event is TimedEvent => event.start !== null && !event.allDay && event.start >= now)
    .sort((a, b) => a.start.getTime() - b.start.getTime());

  return upcoming[0] ?? null;
}

/**
 * 하루 중 60분 넘는 빈 시간. 오늘이면 현재 시각부터 계산
 */
export async function getFreeTime(calendar: CalendarProvider, now: Date, day: Date): Promise<FreeSlot[]> {
  const dayStart = startOfDay(day);
  const dayEnd = addDays(dayStart, 1);
  const isToday = dayStart.getTime() === startOfDay(now).getTime();
  const windowStart = isToday && now > dayStart ? now : dayStart;

  const events = await calendar.listEvents({ start: dayStart, end: dayEnd });

  // 종일 일정은 바쁜 시간으로 치지 않음
  const busy = events.flatMap(event =>
    event.start && event.end && !event.allDay ? [{ start: event.start, end: event.end }] : []
  );

  return getFreeSlots(busy, windowStart, dayEnd, FREE_TIME_MIN_GAP_MINUTES);
}

// ==============================================
// 음성 응답 포맷
// ==============================================

// timeZone이 없으면 프로세스 로컬 시간대
function clock(date: Date, timeZone?: string): string {
  return new Intl.DateTimeFormat('en-US', { hour: '2-digit', minute: '2-digit', hourCycle: 'h23', timeZone }).format(date);
}

function monthDay(date: Date, timeZone?: string): string {
  return new Intl.DateTimeFormat('en-US', { month: 'long', day: 'numeric', timeZone }).format(date);
}

function title(event: CalendarEvent): string {
  return event.summary || 'Untitled Event';
}

/** "Standup at 09:00 at Room 4; Offsite at All day" */
export function describeSchedule(events: CalendarEvent[], timeZone?: string): string {
  return events
    .map(event => {
      const time = event.start ? clock(event.start, timeZone) : 'All day';
      const place = event.location ? ` at ${event.location}` : '';
      return `${title(event)} at ${time}${place}`;
    })
    .join('; ');
}

/** "Design review at 14:00 on June 3" */
export function describeNextMeeting(event: TimedEvent, timeZone?: string): string {
  return `${title(event)} at ${clock(event.start, timeZone)} on ${monthDay(event.start, timeZone)}`;
}

/** "10:00 - 12:00; 13:00 - 17:00" */
export function describeFreeTime(slots: FreeSlot[], timeZone?: string): string {
  return slots.map(slot => `${clock(slot.start, timeZone)} - ${clock(slot.end, timeZone)}`).join('; ');
}

export function serializeEvent(event: CalendarEvent) {
  return {
    id: event.id ?? null,
    summary: title(event),
    start: event.start?.toISOString() ?? null,
    end: event.end?.toISOString() ?? null,
    location: event.location ?? null,
    allDay: event.allDay,
  };
}
