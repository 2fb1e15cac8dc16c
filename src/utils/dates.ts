const MS_PER_DAY = 24 * 60 * 60 * 1000;

interface CalendarDate {
  year: number;
  month: number;
  day: number;
}

function calendarDateIn(date: Date, timezone: string): CalendarDate {
  const parts = new Intl.DateTimeFormat('en-US', {
    timeZone: timezone,
    year: 'numeric',
    month: 'numeric',
    day: 'numeric',
  }).formatToParts(date);

  const pick = (type: Intl.DateTimeFormatPartTypes): number => {
    const part = parts.find((p) => p.type === type);
    return part ? parseInt(part.value, 10) : NaN;
  };

  return { year: pick('year'), month: pick('month'), day: pick('day') };
}

/** Day of the year (1-366) of the local calendar date in `timezone`. */
export function getDayOfYear(date: Date, timezone: string): number {
  const { year, month, day } = calendarDateIn(date, timezone);
  return (Date.UTC(year, month - 1, day) - Date.UTC(year, 0, 1)) / MS_PER_DAY + 1;
}

/** "2025-9-7" style key of the local calendar date in `timezone`. */
export function localDateKey(date: Date, timezone: string): string {
  const { year, month, day } = calendarDateIn(date, timezone);
  return `${year}-${month}-${day}`;
}

/** "January 05" style label in `timezone`. */
export function formatMonthDay(date: Date, timezone: string): string {
  const parts = new Intl.DateTimeFormat('en-US', {
    timeZone: timezone,
    month: 'long',
    day: '2-digit',
  }).formatToParts(date);
  const month = parts.find((p) => p.type === 'month')?.value ?? '';
  const day = parts.find((p) => p.type === 'day')?.value ?? '';
  return `${month} ${day}`;
}
