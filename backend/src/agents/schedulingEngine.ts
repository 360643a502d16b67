import { ValidationError } from '../errors.js';
import type { BusyInterval, FreeSlot, TimeRange } from '../types/index.js';

/**
 * Scheduling Engine
 * 역할: 바쁜 시간 병합, 빈 시간 계산, 회의 슬롯 탐색
 *
 * All comparisons are done at minute granularity; seconds are truncated.
 */

export const NO_SLOTS = 'no slots' as const;
export type NoSlots = typeof NO_SLOTS;

export interface MeetingSearchOptions {
  workHourStart?: number; // 기본 9
  workHourEnd?: number; // 기본 17
  stepMinutes?: number; // 기본 30
  maxResults?: number; // 기본 5
  from?: Date; // day 0 기준 시각 (기본: 현재)
}

interface MinuteRange {
  start: number;
  end: number;
}

const MS_PER_MINUTE = 60_000;

function toMinute(date: Date): number {
  return Math.floor(date.getTime() / MS_PER_MINUTE);
}

function fromMinute(minute: number): Date {
  return new Date(minute * MS_PER_MINUTE);
}

function toMinuteRange(range: TimeRange): MinuteRange {
  return { start: toMinute(range.start), end: toMinute(range.end) };
}

function fromMinuteRange(range: MinuteRange): TimeRange {
  return { start: fromMinute(range.start), end: fromMinute(range.end) };
}

function mergeMinuteRanges(ranges: MinuteRange[]): MinuteRange[] {
  const sorted = ranges
    .filter(r => r.start < r.end)
    .sort((a, b) => a.start - b.start);

  if (sorted.length === 0) return [];

  const merged: MinuteRange[] = [];
  let current = sorted[0];

  for (const next of sorted.slice(1)) {
    if (next.start < current.end) {
      current = { start: current.start, end: Math.max(current.end, next.end) };
    } else {
      merged.push(current);
      current = next;
    }
  }
  merged.push(current);

  return merged;
}

/**
 * [a,b) and [c,d) overlap iff max(a,c) < min(b,d).
 */
export function rangesOverlap(a: TimeRange, b: TimeRange): boolean {
  const x = toMinuteRange(a);
  const y = toMinuteRange(b);
  return Math.max(x.start, y.start) < Math.min(x.end, y.end);
}

/**
 * 바쁜 시간 병합
 * Touching intervals (next.start === current.end) stay separate.
 */
export function mergeIntervals(intervals: readonly BusyInterval[]): BusyInterval[] {
  return mergeMinuteRanges(intervals.map(toMinuteRange)).map(fromMinuteRange);
}

/**
 * 빈 시간 슬롯 계산
 * Emits every gap inside [windowStart, windowEnd) that is longer than `minGapMinutes`.
 */
export function getFreeSlots(
  busyIntervals: readonly BusyInterval[],
  windowStart: Date,
  windowEnd: Date,
  minGapMinutes: number = 0
): FreeSlot[] {
  const merged = mergeMinuteRanges(busyIntervals.map(toMinuteRange));
  const windowStartMinute = toMinute(windowStart);
  const windowEndMinute = toMinute(windowEnd);
  const minGap = Math.max(0, minGapMinutes);

  const slots: MinuteRange[] = [];
  let cursor = windowStartMinute;

  for (const busy of merged) {
    if (busy.end <= cursor) continue;
    if (busy.start >= windowEndMinute) break;

    // 이벤트 전 빈 시간
    if (busy.start - cursor > minGap) {
      slots.push({ start: cursor, end: busy.start });
    }
    cursor = Math.max(cursor, busy.end);
  }

  // 마지막 이벤트 후 빈 시간
  if (windowEndMinute - cursor > minGap) {
    slots.push({ start: cursor, end: windowEndMinute });
  }

  return slots.map(fromMinuteRange);
}

function atHour(date: Date, hour: number): Date {
  const result = new Date(date);
  result.setHours(hour, 0, 0, 0);
  return result;
}

function addDays(date: Date, days: number): Date {
  const result = new Date(date);
  result.setDate(result.getDate() + days);
  return result;
}

/**
 * 회의 가능 시간 찾기
 *
 * Unions every participant's busy list and slides a cursor through work hours
 * (local time) from `workHourStart` on the day of `from`, for `searchWindowDays` days.
 */
export function findMeetingSlots(
  durationMinutes: number,
  participantBusyLists: Record<string, readonly BusyInterval[]> | ReadonlyArray<readonly BusyInterval[]>,
  searchWindowDays: number,
  options: MeetingSearchOptions = {}
): FreeSlot[] | NoSlots {
  const {
    workHourStart = 9,
    workHourEnd = 17,
    stepMinutes = 30,
    maxResults = 5,
    from = new Date(),
  } = options;

  if (!Number.isFinite(durationMinutes) || durationMinutes <= 0) {
    throw new ValidationError(`Invalid meeting duration: ${durationMinutes}`, 'The meeting needs a positive duration.');
  }
  if (!Number.isFinite(stepMinutes) || stepMinutes <= 0) {
    throw new ValidationError(`Invalid step: ${stepMinutes}`);
  }
  if (!Number.isInteger(searchWindowDays) || searchWindowDays < 0) {
    throw new ValidationError(`Invalid search window: ${searchWindowDays}`, 'Please ask for a whole number of days.');
  }

  const merged = mergeMinuteRanges(Object.values(participantBusyLists).flat().map(toMinuteRange));

  const windowEnd = addDays(atHour(from, 0), searchWindowDays);
  const slots: MinuteRange[] = [];
  let cursor = atHour(from, workHourStart);

  while (cursor < windowEnd && slots.length < maxResults) {
    const hour = cursor.getHours();

    // 근무 시간 밖이면 다음 근무 시작으로
    if (hour >= workHourEnd) {
      cursor = atHour(addDays(cursor, 1), workHourStart);
      continue;
    }
    if (hour < workHourStart) {
      cursor = atHour(cursor, workHourStart);
      continue;
    }

    const start = toMinute(cursor);
    const end = start + durationMinutes;
    const conflict = merged.find(busy => Math.max(start, busy.start) < Math.min(end, busy.end));

    if (conflict) {
      cursor = fromMinute(conflict.end);
      continue;
    }

    slots.push({ start, end });
    cursor = fromMinute(start + stepMinutes);
  }

  return slots.length > 0 ? slots.map(fromMinuteRange) : NO_SLOTS;
}
