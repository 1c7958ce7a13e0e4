export const collections = {
  reminders: 'reminders'
} as const;
