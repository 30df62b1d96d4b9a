const MINUTE_MS = 60_000;
const DAY_MS = 24 * 60 * MINUTE_MS;

/** Parse a fixed UTC offset such as `+05:30` or `-04:00` into minutes. */
export function parseOffset(value: string): number | null {
  const m = /^([+-])(\d{2}):?(\d{2})$/.exec(value.trim());
  if (!m) return null;
  const hours = Number(m[2]);
  const minutes = Number(m[3]);
  if (hours > 14 || minutes > 59) return null;
  const total = hours * 60 + minutes;
  return m[1] === '-' ? -total : total;
}

// Wall-clock fields of `instant` in the civil zone are the UTC fields of the shifted instant.
function shift(instant: Date, offsetMinutes: number): Date {
  return new Date(instant.getTime() + offsetMinutes * MINUTE_MS);
}

function pad(n: number, width = 2): string {
  return String(n).padStart(width, '0');
}

/** `YYYY-MM-DD HH:MM:SS` in the civil zone, truncated to the second. */
export function formatCivil(instant: Date, offsetMinutes: number): string {
  const d = shift(instant, offsetMinutes);
  return `${pad(d.getUTCFullYear(), 4)}-${pad(d.getUTCMonth() + 1)}-${pad(d.getUTCDate())} `
    + `${pad(d.getUTCHours())}:${pad(d.getUTCMinutes())}:${pad(d.getUTCSeconds())}`;
}

/** `YYYY-MM-DD` of the civil calendar day containing `instant`. */
export function civilDate(instant: Date, offsetMinutes: number): string {
  return formatCivil(instant, offsetMinutes).slice(0, 10);
}

/** Absolute instant of the civil midnight that starts the day containing `instant`. */
export function startOfCivilDay(instant: Date, offsetMinutes: number): Date {
  const d = shift(instant, offsetMinutes);
  const midnight = Date.UTC(d.getUTCFullYear(), d.getUTCMonth(), d.getUTCDate());
  return new Date(midnight - offsetMinutes * MINUTE_MS);
}

export function daysBefore(instant: Date, days: number): Date {
  return new Date(instant.getTime() - days * DAY_MS);
}
