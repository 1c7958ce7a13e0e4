import crypto from 'node:crypto';
import type { NewReminder, Reminder, ReminderMatch } from '@voice-reminder/shared';
import type { ReminderStore } from './reminderStore.js';

/** Process-local store for tests and for running without Firebase credentials. */
export class MemoryReminderStore implements ReminderStore {
  private readonly rows: Reminder[] = [];

  async insert(reminder: NewReminder): Promise<Reminder> {
    const row: Reminder = { id: crypto.randomUUID(), ...reminder, isSent: false };
    this.rows.push(row);
    return { ...row };
  }

  async findUnsent(match: ReminderMatch): Promise<Reminder | null> {
    const row = this.rows.find(
      (r) =>
        !r.isSent &&
        r.userId === match.userId &&
        r.eventTime.getTime() === match.eventTime.getTime() &&
        r.eventContent === match.eventContent
    );
    return row ? { ...row } : null;
  }

  async markSent(reminder: Reminder): Promise<void> {
    const row = this.rows.find((r) => r.id === reminder.id);
    if (row) row.isSent = true;
  }

  async listUnsent(): Promise<Reminder[]> {
    return this.rows.filter((r) => !r.isSent).map((r) => ({ ...r }));
  }

  all(): Reminder[] {
    return this.rows.map((r) => ({ ...r }));
  }
}
