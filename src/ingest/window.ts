import { ConfigError } from '../errors.js';
import { daysBefore, startOfCivilDay } from './civil-time.js';
import type { BackfillStart, IngestionWindow } from '../types/index.js';

export function resolveStart(start: BackfillStart, now: Date): Date {
  return start.kind === 'fixed' ? start.at : daysBefore(now, start.days);
}

/**
 * Half-open `[start, end)` window. `end` is the civil midnight beginning
 * today, so everything up to 23:59:59 of yesterday is eligible.
 */
export function planWindow(start: BackfillStart, now: Date, offsetMinutes: number): IngestionWindow {
  const end = startOfCivilDay(now, offsetMinutes);
  const from = resolveStart(start, now);
  if (from.getTime() > end.getTime()) {
    throw new ConfigError(
      `Backfill start ${from.toISOString()} is after the window end ${end.toISOString()}`,
    );
  }
  return { start: from, end };
}
