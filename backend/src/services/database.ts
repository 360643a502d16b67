import { randomUUID } from 'crypto';
import { createClient, SupabaseClient } from '@supabase/supabase-js';
import { env, isSupabaseConfigured } from '../config/env.js';
import type { AuditEntry, AuditLevel, AuditPage, AuditQuery, Note, PersistenceStore, Reminder } from '../types/index.js';
import { InMemoryPersistenceStore } from './memoryStore.js';

// ==============================================
// Row types (snake_case, as stored)
// ==============================================

interface NoteRow {
  id: string;
  user_id: string;
  content: string;
  created_at: string;
}

interface ReminderRow {
  id: string;
  user_id: string;
  text: string;
  remind_at: string;
  expires_at: string;
  triggered: boolean;
  triggered_at: string | null;
  dismissed: boolean;
  created_at: string;
}

interface AuditLogRow {
  id: string;
  user_id: string | null;
  level: AuditLevel;
  message: string;
  source: string;
  extra_data: Record<string, unknown> | null;
  created_at: string;
}

// "no rows" (single()에서 0건)
const NOT_FOUND = 'PGRST116';
// 전체 건수를 넘는 페이지 요청
const RANGE_NOT_SATISFIABLE = 'PGRST103';

function toNote(row: NoteRow): Note {
  return { id: row.id, ownerId: row.user_id, content: row.content, createdAt: new Date(row.created_at) };
}

function toReminder(row: ReminderRow): Reminder {
  return {
    id: row.id,
    ownerId: row.user_id,
    text: row.text,
    remindAt: new Date(row.remind_at),
    expiresAt: new Date(row.expires_at),
    triggered: row.triggered,
    triggeredAt: row.triggered_at ? new Date(row.triggered_at) : undefined,
    dismissed: row.dismissed,
    createdAt: new Date(row.created_at),
  };
}

function toAuditEntry(row: AuditLogRow): AuditEntry {
  return {
    id: row.id,
    ownerId: row.user_id,
    level: row.level,
    message: row.message,
    source: row.source,
    extra: row.extra_data ?? {},
    createdAt: new Date(row.created_at),
  };
}

/**
 * Supabase 기반 저장소 (notes, reminders, audit_logs 테이블)
 */
export class SupabaseStore implements PersistenceStore {
  constructor(private readonly supabase: SupabaseClient) {}

  // ==============================================
  // Note Operations
  // ==============================================

  async saveNote(note: Note): Promise<Note> {
    const { data, error } = await this.supabase
      .from('notes')
      .insert({
        id: note.id,
        user_id: note.ownerId,
        content: note.content,
        created_at: note.createdAt.toISOString(),
      })
      .select()
      .single<NoteRow>();

    if (error) throw new Error(`Failed to save note: ${error.message}`);
    return toNote(data);
  }

  async getNote(id: string): Promise<Note | null> {
    const { data, error } = await this.supabase
      .from('notes')
      .select('*')
      .eq('id', id)
      .single<NoteRow>();

    if (error && error.code !== NOT_FOUND) throw new Error(`Failed to get note: ${error.message}`);
    return data ? toNote(data) : null;
  }

  // ==============================================
  // Reminder Operations
  // ==============================================

  async saveReminder(reminder: Reminder): Promise<Reminder> {
    const { data, error } = await this.supabase
      .from('reminders')
      .insert({
        id: reminder.id,
        user_id: reminder.ownerId,
        text: reminder.text,
        remind_at: reminder.remindAt.toISOString(),
        expires_at: reminder.expiresAt.toISOString(),
        triggered: reminder.triggered,
        triggered_at: reminder.triggeredAt?.toISOString() ?? null,
        dismissed: reminder.dismissed,
        created_at: reminder.createdAt.toISOString(),
      })
      .select()
      .single<ReminderRow>();

    if (error) throw new Error(`Failed to save reminder: ${error.message}`);
    return toReminder(data);
  }

  async getReminder(id: string): Promise<Reminder | null> {
    const { data, error } = await this.supabase
      .from('reminders')
      .select('*')
      .eq('id', id)
      .single<ReminderRow>();

    if (error && error.code !== NOT_FOUND) throw new Error(`Failed to get reminder: ${error.message}`);
    return data ? toReminder(data) : null;
  }

  async markReminderTriggered(id: string, triggeredAt: Date): Promise<Reminder | null> {
    const { data, error } = await this.supabase
      .from('reminders')
      .update({ triggered: true, triggered_at: triggeredAt.toISOString() })
      .eq('id', id)
      .select()
      .single<ReminderRow>();

    if (error && error.code !== NOT_FOUND) throw new Error(`Failed to update reminder: ${error.message}`);
    return data ? toReminder(data) : null;
  }

  async dismissReminder(id: string): Promise<Reminder | null> {
    const { data, error } = await this.supabase
      .from('reminders')
      .update({ dismissed: true })
      .eq('id', id)
      .select()
      .single<ReminderRow>();

    if (error && error.code !== NOT_FOUND) throw new Error(`Failed to dismiss reminder: ${error.message}`);
    return data ? toReminder(data) : null;
  }

  // ==============================================
  // Audit Log Operations
  // ==============================================

  async appendAudit(entry: Omit<AuditEntry, 'id' | 'createdAt'>): Promise<AuditEntry> {
    const { data, error } = await this.supabase
      .from('audit_logs')
      .insert({
        id: randomUUID(),
        user_id: entry.ownerId,
        level: entry.level,
        message: entry.message,
        source: entry.source,
        extra_data: entry.extra,
        created_at: new Date().toISOString(),
      })
      .select()
      .single<AuditLogRow>();

    if (error) throw new Error(`Failed to append audit log: ${error.message}`);
    return toAuditEntry(data);
  }

  async getAudit(id: string): Promise<AuditEntry | null> {
    const { data, error } = await this.supabase
      .from('audit_logs')
      .select('*')
      .eq('id', id)
      .single<AuditLogRow>();

    if (error && error.code !== NOT_FOUND) throw new Error(`Failed to get audit log: ${error.message}`);
    return data ? toAuditEntry(data) : null;
  }

  async getAuditLog(ownerId: string, { page, perPage }: AuditQuery): Promise<AuditPage> {
    const from = (page - 1) * perPage;
    const { data, error, count } = await this.supabase
      .from('audit_logs')
      .select('*', { count: 'exact' })
      .eq('user_id', ownerId)
      .order('created_at', { ascending: false })
      .range(from, from + perPage - 1)
      .returns<AuditLogRow[]>();

    if (error && error.code !== RANGE_NOT_SATISFIABLE) throw new Error(`Failed to list audit logs: ${error.message}`);
    const total = count ?? 0;
    return {
      entries: (data ?? []).map(toAuditEntry),
      total,
      page,
      pages: Math.ceil(total / perPage),
    };
  }
}

/**
 * Supabase 설정이 없으면 프로세스 메모리에 저장합니다 (재시작 시 사라짐).
 */
export function createPersistenceStore(): PersistenceStore {
  if (!isSupabaseConfigured()) {
    console.warn('Warning: SUPABASE_URL or SUPABASE_SERVICE_KEY not set, using in-memory store');
    return new InMemoryPersistenceStore();
  }
  return new SupabaseStore(createClient(env.SUPABASE_URL, env.SUPABASE_SERVICE_KEY));
}
