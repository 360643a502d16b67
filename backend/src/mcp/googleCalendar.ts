/**
 * Google Calendar MCP Client
 *
 * Google Calendar API를 통해 캘린더 데이터를 읽습니다.
 * - 일정 조회 (오늘 일정, 다음 회의, 빈 시간)
 * - Free/Busy 조회 (회의 슬롯 탐색의 핵심)
 */

import { google, calendar_v3 } from 'googleapis';
import createDebug from 'debug';
import { env, isGoogleCalendarConfigured } from '../config/env.js';
import { ExternalProviderError, describeError } from '../errors.js';
import type { BusyInterval, CalendarEvent, CalendarProvider, TimeRange } from '../types/index.js';

const debug = createDebug('voicedesk:calendar');

// Google OAuth2 클라이언트 타입
type OAuth2Client = InstanceType<typeof google.auth.OAuth2>;

const CALENDAR_UNAVAILABLE = "Sorry, I couldn't reach your calendar right now. Please try again later.";

export class GoogleCalendarMCP implements CalendarProvider {
  private oauth2Client: OAuth2Client;
  private calendar: calendar_v3.Calendar;
  private timeZone: string;

  constructor(credentials?: {
    clientId: string;
    clientSecret: string;
    redirectUri: string;
    refreshToken: string;
    timeZone?: string;
  }) {
    // OAuth2 클라이언트 초기화
    this.oauth2Client = new google.auth.OAuth2(
      credentials?.clientId ?? env.GOOGLE_CLIENT_ID,
      credentials?.clientSecret ?? env.GOOGLE_CLIENT_SECRET,
      credentials?.redirectUri ?? env.GOOGLE_REDIRECT_URI
    );
    // refresh token만 있으면 access token은 라이브러리가 갱신
    this.oauth2Client.setCredentials({ refresh_token: credentials?.refreshToken ?? env.GOOGLE_REFRESH_TOKEN });
    this.timeZone = credentials?.timeZone ?? env.GOOGLE_TIME_ZONE;

    this.calendar = google.calendar({ version: 'v3', auth: this.oauth2Client });
  }

  // ====================================================
  // 일정 조회
  // ====================================================

  /**
   * 기간 내 일정 목록 조회 (primary 캘린더)
   */
  async listEvents(window: TimeRange): Promise<CalendarEvent[]> {
    debug('listEvents %s → %s', window.start.toISOString(), window.end.toISOString());

    try {
      const response = await this.calendar.events.list({
        calendarId: 'primary',
        timeMin: window.start.toISOString(),
        timeMax: window.end.toISOString(),
        maxResults: 250,
        singleEvents: true,
        orderBy: 'startTime',
      });

      return (response.data.items || []).map(event => this.mapToCalendarEvent(event));
    } catch (error) {
      console.error('[GoogleCalendarMCP] listEvents error:', describeError(error));
      throw new ExternalProviderError('GoogleCalendar', `listEvents failed: ${describeError(error)}`, CALENDAR_UNAVAILABLE, {
        cause: error,
      });
    }
  }

  // ====================================================
  // Free/Busy 조회
  // ====================================================

  /**
   * 참가자들의 바쁜 시간을 한 번에 조회합니다.
   * 캘린더별 오류는 경고 로그로 남기고, 받은 busy 목록은 그대로 사용합니다.
   */
  async freeBusy(participantIds: string[], window: TimeRange): Promise<Record<string, BusyInterval[]>> {
    debug('freeBusy for %o', participantIds);

    let calendars: Record<string, calendar_v3.Schema$FreeBusyCalendar>;
    try {
      const response = await this.calendar.freebusy.query({
        requestBody: {
          timeMin: window.start.toISOString(),
          timeMax: window.end.toISOString(),
          timeZone: this.timeZone,
          items: participantIds.map(id => ({ id })),
        },
      });
      calendars = response.data.calendars ?? {};
    } catch (error) {
      console.error('[GoogleCalendarMCP] getFreeBusy error:', describeError(error));
      throw new ExternalProviderError('GoogleCalendar', `freeBusy failed: ${describeError(error)}`, CALENDAR_UNAVAILABLE, {
        cause: error,
      });
    }

    const result: Record<string, BusyInterval[]> = {};
    for (const [calendarId, data] of Object.entries(calendars)) {
      if (data.errors?.length) {
        console.warn(`[GoogleCalendarMCP] Calendar ${calendarId} returned errors:`, data.errors.map(e => e.reason));
      }
      result[calendarId] = (data.busy ?? []).flatMap(period =>
        period.start && period.end ? [{ start: new Date(period.start), end: new Date(period.end) }] : []
      );
    }
    return result;
  }

  // ====================================================
  // 유틸리티
  // ====================================================

  private mapToCalendarEvent(event: calendar_v3.Schema$Event): CalendarEvent {
    // 종일 일정은 date만 있고 dateTime이 없음
    const start = event.start?.dateTime;
    const end = event.end?.dateTime;
    return {
      id: event.id || undefined,
      summary: event.summary || '',
      location: event.location || undefined,
      start: start ? new Date(start) : null,
      end: end ? new Date(end) : null,
      allDay: !start && Boolean(event.start?.date),
    };
  }
}

/**
 * Google 자격 증명이 없을 때 사용. 모든 조회가 ExternalProviderError로 실패합니다.
 */
export class DisconnectedCalendar implements CalendarProvider {
  private fail(): never {
    throw new ExternalProviderError(
      'GoogleCalendar',
      'Google Calendar credentials are not configured',
      "Your calendar isn't connected yet."
    );
  }

  async listEvents(): Promise<CalendarEvent[]> {
    return this.fail();
  }

  async freeBusy(): Promise<Record<string, BusyInterval[]>> {
    return this.fail();
  }
}

export function createCalendarProvider(): CalendarProvider {
  if (!isGoogleCalendarConfigured()) {
    console.warn('[GoogleCalendarMCP] GOOGLE_CLIENT_ID / GOOGLE_CLIENT_SECRET / GOOGLE_REFRESH_TOKEN not set');
    return new DisconnectedCalendar();
  }
  return new GoogleCalendarMCP();
}
