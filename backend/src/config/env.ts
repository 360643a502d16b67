import dotenv from 'dotenv';
import path from 'path';
import { fileURLToPath } from 'url';

// ES module에서 __dirname 구하기
const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

// 저장소 루트의 .env (backend/src/config → ../../..)
dotenv.config({ path: path.resolve(__dirname, '../../../.env') });

function str(name: string, defaultValue: string): string {
  const v = process.env[name];
  return (typeof v === 'string' && v.trim()) || defaultValue;
}

function num(name: string, defaultValue: number): number {
  const v = process.env[name];
  if (v === undefined || v === '') return defaultValue;
  const n = Number(v);
  return Number.isFinite(n) ? n : defaultValue;
}

/** Loaded once at startup. Use this instead of process.env everywhere. */
export const env = {
  NODE_ENV: str('NODE_ENV', 'development'),
  PORT: num('PORT', 3001),
  FRONTEND_URL: str('FRONTEND_URL', 'http://localhost:5173'),

  OPENWEATHER_API_KEY: str('OPENWEATHER_API_KEY', ''),
  NEWS_API_KEY: str('NEWS_API_KEY', ''),

  ELEVENLABS_API_KEY: str('ELEVENLABS_API_KEY', ''),
  /** Rachel */
  ELEVENLABS_VOICE_ID: str('ELEVENLABS_VOICE_ID', '21m00Tcm4TlvDq8ikWAM'),
  /** Optional. When set, session start also checks that the agent exists. */
  ELEVENLABS_AGENT_ID: str('ELEVENLABS_AGENT_ID', ''),

  GOOGLE_CLIENT_ID: str('GOOGLE_CLIENT_ID', ''),
  GOOGLE_CLIENT_SECRET: str('GOOGLE_CLIENT_SECRET', ''),
  GOOGLE_REDIRECT_URI: str('GOOGLE_REDIRECT_URI', ''),
  GOOGLE_REFRESH_TOKEN: str('GOOGLE_REFRESH_TOKEN', ''),
  GOOGLE_TIME_ZONE: str('GOOGLE_TIME_ZONE', 'UTC'),

  SUPABASE_URL: str('SUPABASE_URL', ''),
  SUPABASE_SERVICE_KEY: str('SUPABASE_SERVICE_KEY', ''),

  SESSION_MAX_RETRIES: num('SESSION_MAX_RETRIES', 3),
  SESSION_RETRY_DELAY_MS: num('SESSION_RETRY_DELAY_MS', 5_000),
  /** Watchdog window. Default 10 minutes. */
  SESSION_INACTIVITY_MS: num('SESSION_INACTIVITY_MS', 600_000),

  WORK_HOUR_START: num('WORK_HOUR_START', 9),
  WORK_HOUR_END: num('WORK_HOUR_END', 17),
} as const;

export function isSupabaseConfigured(): boolean {
  return env.SUPABASE_URL !== '' && env.SUPABASE_SERVICE_KEY !== '';
}

export function isGoogleCalendarConfigured(): boolean {
  return env.GOOGLE_CLIENT_ID !== '' && env.GOOGLE_CLIENT_SECRET !== '' && env.GOOGLE_REFRESH_TOKEN !== '';
}
