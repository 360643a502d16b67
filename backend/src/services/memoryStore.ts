import { randomUUID } from 'crypto';
import type { AuditEntry, AuditPage, AuditQuery, Note, PersistenceStore, Reminder } from '../types/index.js';

/**
 * In-process PersistenceStore. Used when Supabase is not configured, and by tests.
 * Every read returns a copy so callers cannot mutate stored records.
 */
export class InMemoryPersistenceStore implements PersistenceStore {
  private notes = new Map<string, Note>();
  private reminders = new Map<string, Reminder>();
  private audit = new Map<string, AuditEntry>();

  async saveNote(note: Note): Promise<Note> {
    this.notes.set(note.id, { ...note });
    return { ...note };
  }

  async getNote(id: string): Promise<Note | null> {
    const note = this.notes.get(id);
    return note ? { ...note } : null;
  }

  async saveReminder(reminder: Reminder): Promise<Reminder> {
    this.reminders.set(reminder.id, { ...reminder });
    return { ...reminder };
  }

  async getReminder(id: string): Promise<Reminder | null> {
    const reminder = this.reminders.get(id);
    return reminder ? { ...reminder } : null;
  }

  async markReminderTriggered(id: string, triggeredAt: Date): Promise<Reminder | null> {
    const reminder = this.reminders.get(id);
    if (!reminder) return null;
    reminder.triggered = true;
    reminder.triggeredAt = triggeredAt;
    return { ...reminder };
  }

  async dismissReminder(id: string): Promise<Reminder | null> {
    const reminder = this.reminders.get(id);
    if (!reminder) return null;
    reminder.dismissed = true;
    return { ...reminder };
  }

  async appendAudit(entry: Omit<AuditEntry, 'id' | 'createdAt'>): Promise<AuditEntry> {
    const stored: AuditEntry = { ...entry, id: randomUUID(), createdAt: new Date() };
    this.audit.set(stored.id, stored);
    return { ...stored };
  }

  async getAudit(id: string): Promise<AuditEntry | null> {
    const entry = this.audit.get(id);
    return entry ? { ...entry } : null;
  }

  async getAuditLog(ownerId: string, { page, perPage }: AuditQuery): Promise<AuditPage> {
    // insertion order reversed, so entries written in the same millisecond stay newest-first
    const owned = this.listAudit()
      .filter(entry => entry.ownerId === ownerId)
      .reverse();
    const offset = (page - 1) * perPage;
    return {
      entries: owned.slice(offset, offset + perPage),
      total: owned.length,
      page,
      pages: Math.ceil(owned.length / perPage),
    };
  }

  /** Audit entries in insertion order. */
  listAudit(): AuditEntry[] {
    return Array.from(this.audit.values(), entry => ({ ...entry }));
  }
}
