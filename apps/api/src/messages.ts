import { formatEventTime, type ReminderMatch } from '@voice-reminder/shared';

export const NOT_UNDERSTOOD_REPLY = "Sorry, I couldn't understand the event details. Please try again.";

export const PROCESSING_FAILED_REPLY =
  'Sorry, something went wrong while processing your voice message. Please try again later.';

// Echoes the time line exactly as the model wrote it.
export function formatConfirmation(timeText: string, eventContent: string) {
  return `Reminder set for ${timeText}: ${eventContent}`;
}

export function formatReminderPush(reminder: ReminderMatch) {
  return `Reminder: ${formatEventTime(reminder.eventTime)} - ${reminder.eventContent}`;
}
