import { describe, it, expect } from 'vitest';
import {
  describeFreeTime,
  describeNextMeeting,
  describeSchedule,
  getNextMeeting,
  getTodaySchedule,
  getUpcomingEvents,
  serializeEvent,
} from '../agenda.js';
import type { CalendarEvent } from '../../types/index.js';
import { FakeCalendar } from './fakes.js';

// 2024-06-03 local time
function at(day: number, hour: number, minute = 0): Date {
  return new Date(2024, 5, 3 + day, hour, minute);
}

const utc = (iso: string) => new Date(iso);

describe('agenda queries', () => {
  it("reads today's events over the whole local day", async () => {
    const calendar = new FakeCalendar();

    await getTodaySchedule(calendar, at(0, 10, 30));

    expect(calendar.listEventsCalls).toEqual([{ start: at(0, 0), end: at(1, 0) }]);
  });

  it('reads upcoming events from now', async () => {
    const calendar = new FakeCalendar();

    await getUpcomingEvents(calendar, at(0, 10, 30), 3);

    expect(calendar.listEventsCalls).toEqual([{ start: at(0, 10, 30), end: at(3, 10, 30) }]);
  });

  it('picks the earliest meeting that has not started yet', async () => {
    const calendar = new FakeCalendar({}, [
      { summary: 'Offsite', start: null, end: null, allDay: true },
      { summary: 'Retro', start: at(0, 9), end: at(0, 11), allDay: false },
      { summary: 'Design review', start: at(1, 14), end: at(1, 15), allDay: false },
      { summary: 'Standup', start: at(0, 11), end: at(0, 11, 15), allDay: false },
    ]);

    const meeting = await getNextMeeting(calendar, at(0, 10));

    expect(meeting?.summary).toBe('Standup');
  });

  it('returns null when nothing is coming up', async () => {
    const calendar = new FakeCalendar({}, [{ summary: 'Retro', start: at(0, 9), end: at(0, 11), allDay: false }]);

    expect(await getNextMeeting(calendar, at(0, 10))).toBeNull();
  });
});

describe('agenda wording', () => {
  const events: CalendarEvent[] = [
    { summary: 'Offsite', start: null, end: null, allDay: true },
    {
      summary: 'Standup',
      start: utc('2024-06-03T09:00:00Z'),
      end: utc('2024-06-03T09:15:00Z'),
      location: 'Room 4',
      allDay: false,
    },
    { summary: '', start: utc('2024-06-03T16:30:00Z'), end: utc('2024-06-03T17:00:00Z'), allDay: false },
  ];

  it('lists the schedule with times and places', () => {
    expect(describeSchedule(events, 'UTC')).toBe(
      'Offsite at All day; Standup at 09:00 at Room 4; Untitled Event at 16:30'
    );
  });

  it('describes the next meeting with its date', () => {
    const meeting = { summary: 'Design review', start: utc('2024-06-04T14:00:00Z'), end: null, allDay: false };
    expect(describeNextMeeting(meeting, 'UTC')).toBe('Design review at 14:00 on June 4');
  });

  it('shows times in the requested time zone', () => {
    const meeting = { summary: 'Design review', start: utc('2024-06-04T14:00:00Z'), end: null, allDay: false };
    expect(describeNextMeeting(meeting, 'Asia/Seoul')).toBe('Design review at 23:00 on June 4');
  });

  it('joins free slots', () => {
    const slots = [
      { start: utc('2024-06-03T10:00:00Z'), end: utc('2024-06-03T12:00:00Z') },
      { start: utc('2024-06-03T13:00:00Z'), end: utc('2024-06-04T00:00:00Z') },
    ];
    expect(describeFreeTime(slots, 'UTC')).toBe('10:00 - 12:00; 13:00 - 00:00');
  });

  it('serializes events for the API', () => {
    expect(serializeEvent(events[1])).toEqual({
      id: null,
      summary: 'Standup',
      start: '2024-06-03T09:00:00.000Z',
      end: '2024-06-03T09:15:00.000Z',
      location: 'Room 4',
      allDay: false,
    });
    expect(serializeEvent(events[2]).summary).toBe('Untitled Event');
  });
});
