import { z } from 'zod';

export const ReminderSchema = z.object({
  id: z.string().min(1),
  userId: z.string().min(1),
  eventTime: z.date(),
  eventContent: z.string().min(1),
  isSent: z.boolean()
});

export const NewReminderSchema = ReminderSchema.omit({ id: true, isSent: true });

export type Reminder = z.infer<typeof ReminderSchema>;
export type NewReminder = z.infer<typeof NewReminderSchema>;

// The three content fields a delivery job carries to find its record again.
export type ReminderMatch = NewReminder;
