/**
 * External Provider Layer
 *
 * 지원하는 외부 서비스:
 * 1. Google Calendar - 일정 조회, Free/Busy 조회
 * 2. NewsAPI - 주요 헤드라인
 * 3. ElevenLabs - 음성 출력 (TTS)
 */

export { GoogleCalendarMCP, DisconnectedCalendar, createCalendarProvider } from './googleCalendar.js';
export { NewsMCP, getNewsMCP } from './news.js';
export { ElevenLabsMCP, TextOnlySpeechSink, createSpeechSink, type ElevenLabsConfig } from './elevenLabs.js';
