import type { DocumentData } from 'firebase-admin/firestore';
import { z } from 'zod';
import { ReminderSchema, type NewReminder, type Reminder, type ReminderMatch } from '@voice-reminder/shared';
import { Timestamp } from './firestore.js';
import { collections } from './collections.js';
import { StorageError } from '../errors.js';
import type { ReminderStore } from './reminderStore.js';

// The slice of the Firestore API the store uses; `Firestore` satisfies it.
export interface ReminderQuery {
  where(fieldPath: string, opStr: '==', value: unknown): ReminderQuery;
  limit(limit: number): ReminderQuery;
  get(): Promise<{ docs: Array<{ id: string; data(): DocumentData }> }>;
}

export interface ReminderCollection extends ReminderQuery {
  doc(documentPath?: string): {
    readonly id: string;
    set(data: DocumentData): Promise<unknown>;
    update(data: DocumentData): Promise<unknown>;
  };
}

export interface ReminderDatabase {
  collection(collectionPath: string): ReminderCollection;
}

const ReminderDocSchema = z.object({
  user_id: z.string(),
  event_time: z.instanceof(Timestamp),
  event_content: z.string(),
  is_sent: z.boolean()
});

function toReminder(id: string, data: DocumentData): Reminder {
  const doc = ReminderDocSchema.parse(data);
  return ReminderSchema.parse({
    id,
    userId: doc.user_id,
    eventTime: doc.event_time.toDate(),
    eventContent: doc.event_content,
    isSent: doc.is_sent
  });
}

async function guard<T>(operation: string, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new StorageError(`Firestore ${operation} failed: ${msg}`, { cause: err });
  }
}

export class FirestoreReminderStore implements ReminderStore {
  constructor(private readonly db: ReminderDatabase) {}

  private get reminders() {
    return this.db.collection(collections.reminders);
  }

  insert(reminder: NewReminder): Promise<Reminder> {
    return guard('insert', async () => {
      const ref = this.reminders.doc();
      await ref.set({
        user_id: reminder.userId,
        event_time: Timestamp.fromDate(reminder.eventTime),
        event_content: reminder.eventContent,
        is_sent: false
      });
      return { id: ref.id, ...reminder, isSent: false };
    });
  }

  findUnsent(match: ReminderMatch): Promise<Reminder | null> {
    return guard('findUnsent', async () => {
      const snap = await this.reminders
        .where('user_id', '==', match.userId)
        .where('event_time', '==', Timestamp.fromDate(match.eventTime))
        .where('event_content', '==', match.eventContent)
        .where('is_sent', '==', false)
        .limit(1)
        .get();
      const doc = snap.docs[0];
      return doc ? toReminder(doc.id, doc.data()) : null;
    });
  }

  markSent(reminder: Reminder): Promise<void> {
    return guard('markSent', async () => {
      await this.reminders.doc(reminder.id).update({ is_sent: true });
    });
  }

  listUnsent(): Promise<Reminder[]> {
    return guard('listUnsent', async () => {
      const snap = await this.reminders.where('is_sent', '==', false).get();
      return snap.docs.map((doc) => toReminder(doc.id, doc.data()));
    });
  }
}
