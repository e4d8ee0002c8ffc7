// Calendar-date and time-of-day helpers. Calendar dates are "YYYY-MM-DD" in UTC so that
// day counts do not shift with the host timezone.

const DAY_MS = 24 * 60 * 60 * 1000;

export function toIsoDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

function utcMidnight(isoDate: string): number {
  return Date.parse(`${isoDate}T00:00:00Z`);
}

/** Whole days from `from` to `to`; negative when `to` is earlier. */
export function daysBetween(from: string, to: string): number {
  return Math.round((utcMidnight(to) - utcMidnight(from)) / DAY_MS);
}

export function addDays(isoDate: string, days: number): string {
  return toIsoDate(new Date(utcMidnight(isoDate) + days * DAY_MS));
}

/** 0 = Monday … 6 = Sunday. */
export function weekdayOf(isoDate: string): number {
  return (new Date(utcMidnight(isoDate)).getUTCDay() + 6) % 7;
}

/** "HH:MM" → minutes since midnight. */
export function minutesOfDay(hhmm: string): number {
  const [hours, minutes] = hhmm.split(':').map((part) => Number.parseInt(part, 10));
  return hours * 60 + (minutes || 0);
}

/** Local clock time of an ISO datetime ("2026-03-01T09:30:00" → 570), or null when absent. */
export function clockMinutes(isoDateTime: string): number | null {
  const match = /T(\d{2}):(\d{2})/.exec(isoDateTime);
  if (!match) return null;
  return Number.parseInt(match[1], 10) * 60 + Number.parseInt(match[2], 10);
}

/** Inclusive window check; a window whose start is after its end wraps past midnight. */
export function isWithinWindow(startMinutes: number, endMinutes: number, minutes: number): boolean {
  if (startMinutes <= endMinutes) return startMinutes <= minutes && minutes <= endMinutes;
  return minutes >= startMinutes || minutes <= endMinutes;
}

/** Hours from `minutes` to the nearest edge of the window; 0 inside it. */
export function hoursOutsideWindow(startMinutes: number, endMinutes: number, minutes: number): number {
  let distance: number;
  if (startMinutes <= endMinutes) {
    if (minutes < startMinutes) distance = startMinutes - minutes;
    else if (minutes > endMinutes) distance = minutes - endMinutes;
    else distance = 0;
  } else if (minutes > endMinutes && minutes < startMinutes) {
    distance = Math.min(minutes - endMinutes, startMinutes - minutes);
  } else {
    distance = 0;
  }
  return distance / 60;
}
