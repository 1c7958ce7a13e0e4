import { NewReminderSchema, type NewReminder, type Reminder, type ReminderMatch } from '@voice-reminder/shared';
import type { ReminderStore } from '../db/reminderStore.js';
import type { MessagingPlatform } from '../integrations/line.js';
import type { ReminderScheduler } from '../scheduler.js';
import type { Logger } from '../logger.js';
import { formatReminderPush } from '../messages.js';

export type ReminderDeps = {
  store: ReminderStore;
  scheduler: ReminderScheduler;
  messaging: MessagingPlatform;
  logger: Logger;
};

export async function createReminder(deps: ReminderDeps, input: NewReminder) {
  const reminder = await deps.store.insert(NewReminderSchema.parse(input));
  const scheduled = scheduleDelivery(deps, reminder);
  return { reminder, scheduled };
}

export function scheduleDelivery(deps: ReminderDeps, reminder: Reminder): boolean {
  // The job carries the content fields, not the id, and looks its record up when it fires.
  const match: ReminderMatch = {
    userId: reminder.userId,
    eventTime: reminder.eventTime,
    eventContent: reminder.eventContent
  };

  const scheduled = deps.scheduler.scheduleAt(reminder.eventTime, `reminder:${reminder.id}`, () =>
    deliverReminder(deps, match).then(() => undefined)
  );

  if (scheduled) {
    deps.logger.info({ reminderId: reminder.id, runAt: reminder.eventTime.toISOString() }, 'reminder:scheduled');
  } else {
    deps.logger.warn(
      { reminderId: reminder.id, runAt: reminder.eventTime.toISOString() },
      'reminder:not-scheduled (event time already passed)'
    );
  }
  return scheduled;
}

/**
 * Pushes the reminder, then marks its record sent. A failed push throws before
 * the record is touched, so it stays unsent.
 */
export async function deliverReminder(deps: ReminderDeps, match: ReminderMatch): Promise<Reminder | null> {
  await deps.messaging.push(match.userId, formatReminderPush(match));
  const sent = await markReminderSent(deps.store, match);
  if (sent) {
    deps.logger.info({ reminderId: sent.id }, 'reminder:sent');
  } else {
    deps.logger.warn({ userId: match.userId }, 'reminder:sent-without-record');
  }
  return sent;
}

export async function markReminderSent(store: ReminderStore, match: ReminderMatch): Promise<Reminder | null> {
  const reminder = await store.findUnsent(match);
  if (!reminder) return null;
  await store.markSent(reminder);
  return { ...reminder, isSent: true };
}

/** Reschedules unsent reminders that are still due; the scheduler itself keeps nothing across restarts. */
export async function restorePendingReminders(deps: ReminderDeps, now: Date = new Date()): Promise<number> {
  const unsent = await deps.store.listUnsent();
  let restored = 0;
  for (const reminder of unsent) {
    if (reminder.eventTime.getTime() <= now.getTime()) continue;
    if (scheduleDelivery(deps, reminder)) restored++;
  }
  return restored;
}
