import type { NewReminder, Reminder, ReminderMatch } from '@voice-reminder/shared';

export interface ReminderStore {
  /** Persists a new, unsent reminder and returns it with its assigned id. */
  insert(reminder: NewReminder): Promise<Reminder>;
  /** First unsent reminder whose user, time and content all match, or null. */
  findUnsent(match: ReminderMatch): Promise<Reminder | null>;
  markSent(reminder: Reminder): Promise<void>;
  listUnsent(): Promise<Reminder[]>;
}
