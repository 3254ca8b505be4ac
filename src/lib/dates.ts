/**
 * Calendar and duration helpers. All calendar arithmetic is done in UTC.
 */

function daysInMonth(year: number, monthIndex: number): number {
  return new Date(Date.UTC(year, monthIndex + 1, 0)).getUTCDate();
}

/**
 * Subtract whole calendar months, clamping the day to the end of the target
 * month (Mar 31 minus one month is Feb 28, or Feb 29 in a leap year).
 * The time of day is kept.
 */
export function subtractMonths(date: Date, months: number): Date {
  const totalMonths = date.getUTCFullYear() * 12 + date.getUTCMonth() - months;
  const year = Math.floor(totalMonths / 12);
  const monthIndex = totalMonths - year * 12;
  const day = Math.min(date.getUTCDate(), daysInMonth(year, monthIndex));

  return new Date(
    Date.UTC(
      year,
      monthIndex,
      day,
      date.getUTCHours(),
      date.getUTCMinutes(),
      date.getUTCSeconds(),
      date.getUTCMilliseconds()
    )
  );
}

const ISO_DURATION = /^P(?:(\d+)W)?(?:(\d+)D)?(?:T(?:(\d+)H)?(?:(\d+)M)?(?:(\d+)(?:\.\d+)?S)?)?$/;

/**
 * Parse an ISO-8601 duration such as PT1H2M30S into whole seconds.
 * Returns undefined when the value is not a duration.
 */
export function parseIsoDuration(value: string): number | undefined {
  const trimmed = value.trim();
  const match = ISO_DURATION.exec(trimmed);
  if (!match || trimmed === 'P' || trimmed.endsWith('T')) return undefined;

  const [weeks, days, hours, minutes, seconds] = match
    .slice(1)
    .map((part) => (part ? Number.parseInt(part, 10) : 0));

  return (((weeks * 7 + days) * 24 + hours) * 60 + minutes) * 60 + seconds;
}

/**
 * YYYY-MM-DD of the UTC calendar date
 */
export function formatDay(date: Date): string {
  return date.toISOString().slice(0, 10);
}
