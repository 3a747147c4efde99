const DAY_NAMES = ["Sun", "Mon", "Tue", "Wed", "Thu", "Fri", "Sat"];
const MONTH_NAMES = [
  "Jan",
  "Feb",
  "Mar",
  "Apr",
  "May",
  "Jun",
  "Jul",
  "Aug",
  "Sep",
  "Oct",
  "Nov",
  "Dec",
];

// IMF-fixdate, e.g. "Sun, 06 Nov 1994 08:49:37 GMT" (RFC 7231 section 7.1.1.1)
const IMF_FIXDATE =
  /^(Mon|Tue|Wed|Thu|Fri|Sat|Sun), (\d{2}) (Jan|Feb|Mar|Apr|May|Jun|Jul|Aug|Sep|Oct|Nov|Dec) (\d{4}) (\d{2}):(\d{2}):(\d{2}) GMT$/;

function pad2(n: number): string {
  return n.toString().padStart(2, "0");
}

export function formatHttpDate(date: Date): string {
  return (
    `${DAY_NAMES[date.getUTCDay()]}, ${pad2(date.getUTCDate())} ` +
    `${MONTH_NAMES[date.getUTCMonth()]} ${date.getUTCFullYear()} ` +
    `${pad2(date.getUTCHours())}:${pad2(date.getUTCMinutes())}:${pad2(date.getUTCSeconds())} GMT`
  );
}

/**
 * Parse an IMF-fixdate into epoch milliseconds.
 *
 * Returns null for anything else, including out-of-range fields
 * ("31 Feb") and a weekday that does not match the date.
 */
export function parseHttpDate(raw: string): number | null {
  const match = IMF_FIXDATE.exec(raw.trim());
  if (!match) return null;

  const [, dayName, day, monthName, year, hours, minutes, seconds] = match;
  const month = MONTH_NAMES.indexOf(monthName);
  const ms = Date.UTC(
    Number(year),
    month,
    Number(day),
    Number(hours),
    Number(minutes),
    Number(seconds),
  );

  const date = new Date(ms);
  if (
    date.getUTCDate() !== Number(day) ||
    date.getUTCMonth() !== month ||
    date.getUTCHours() !== Number(hours) ||
    date.getUTCMinutes() !== Number(minutes) ||
    date.getUTCSeconds() !== Number(seconds) ||
    DAY_NAMES[date.getUTCDay()] !== dayName
  ) {
    return null;
  }

  return ms;
}

/** Truncates to whole seconds, the resolution HTTP dates carry. */
export function toHttpDatePrecision(ms: number): number {
  return Math.floor(ms / 1000) * 1000;
}
