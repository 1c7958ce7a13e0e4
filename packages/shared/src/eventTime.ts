export const EVENT_TIME_FORMAT = 'HH:MM YYYY-MM-DD';

const EVENT_TIME_PATTERN = /^(\d{1,2}):(\d{1,2}) (\d{4})-(\d{1,2})-(\d{1,2})$/;

/**
 * Parses `HH:MM YYYY-MM-DD` into a Date in the process's local time.
 * Event times carry no timezone; they are wall-clock times on this host.
 * Returns null for anything that is not a real minute on this host's clock.
 */
export function parseEventTime(text: string): Date | null {
  const match = EVENT_TIME_PATTERN.exec(text);
  if (!match) return null;

  const [hour, minute, year, month, day] = match.slice(1).map(Number);
  if (hour > 23 || minute > 59) return null;

  const date = new Date(year, month - 1, day, hour, minute);
  // Also catches wall-clock times skipped by a daylight-saving jump, which Date shifts forward.
  if (
    date.getFullYear() !== year ||
    date.getMonth() !== month - 1 ||
    date.getDate() !== day ||
    date.getHours() !== hour ||
    date.getMinutes() !== minute
  ) {
    return null;
  }
  return date;
}

function pad2(n: number) {
  return String(n).padStart(2, '0');
}

export function formatEventTime(date: Date): string {
  return (
    `${pad2(date.getHours())}:${pad2(date.getMinutes())} ` +
    `${date.getFullYear()}-${pad2(date.getMonth() + 1)}-${pad2(date.getDate())}`
  );
}
