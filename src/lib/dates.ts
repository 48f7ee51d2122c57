const DATE_ONLY = /^(\d{4})-(\d{2})-(\d{2})$/;
const DATE_TIME = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}(:\d{2}(\.\d{1,3})?)?(Z|[+-]\d{2}:\d{2})?$/;

/**
 * Parse a due date given by the model.
 *
 * Accepts `YYYY-MM-DD` (due at the end of that day, UTC) or an ISO 8601
 * date-time; a date-time without an offset is read as UTC.
 * Returns null for anything else, including impossible calendar dates.
 */
export function parseDueDate(input: string): Date | null {
  const value = input.trim();

  if (DATE_ONLY.test(value)) {
    const date = new Date(`${value}T23:59:59.999Z`);
    // V8 rolls 2026-02-30 over into March instead of rejecting it
    if (Number.isNaN(date.getTime()) || date.toISOString().slice(0, 10) !== value) {
      return null;
    }
    return date;
  }

  const match = DATE_TIME.exec(value);
  if (match) {
    const date = new Date(match[3] ? value : `${value}Z`);
    return Number.isNaN(date.getTime()) ? null : date;
  }

  return null;
}

/** `YYYY-MM-DD` in UTC */
export function formatDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

/** Long form used in the system prompt, e.g. "Monday, October 19, 2026" */
export function formatCurrentDate(now: Date, timeZone: string): string {
  return new Intl.DateTimeFormat("en-US", {
    timeZone,
    weekday: "long",
    year: "numeric",
    month: "long",
    day: "numeric",
  }).format(now);
}

export function isValidTimeZone(timeZone: string): boolean {
  try {
    new Intl.DateTimeFormat("en-US", { timeZone });
    return true;
  } catch {
    return false;
  }
}
