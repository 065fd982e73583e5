import type { BusinessCalendar } from "../schemas/config.schema";

const MINUTE_MS = 60_000;

export function stepStartDate(
  calendar: BusinessCalendar,
  time: number,
  stepSize: number
): Date {
  const origin = Date.parse(calendar.origin);
  return new Date(origin + (time - stepSize) * calendar.unitMinutes * MINUTE_MS);
}

/**
 * Whether work happens in the step ending at `time`. Weekdays and hours are
 * read in UTC so results do not depend on the host time zone; both hour
 * bounds are inclusive.
 */
export function isBusinessTime(
  calendar: BusinessCalendar | undefined,
  time: number,
  stepSize: number
): boolean {
  if (calendar === undefined) return true;

  const at = stepStartDate(calendar, time, stepSize);
  const day = at.getUTCDay();
  if (!calendar.weekendWorking && (day === 0 || day === 6)) return false;

  if (calendar.workStartHour !== undefined && calendar.workFinishHour !== undefined) {
    const hour = at.getUTCHours();
    return hour >= calendar.workStartHour && hour <= calendar.workFinishHour;
  }
  return true;
}
