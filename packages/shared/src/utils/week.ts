// Calendar helpers for Monday-based reporting weeks. Dates are 'YYYY-MM-DD'.

function toIsoDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

function parseIsoDate(isoDate: string): Date {
  return new Date(`${isoDate}T00:00:00Z`);
}

/** Monday of the week containing `isoDate`. */
export function weekStartOf(isoDate: string): string {
  const date = parseIsoDate(isoDate);
  const mondayOffset = (date.getUTCDay() + 6) % 7;
  date.setUTCDate(date.getUTCDate() - mondayOffset);
  return toIsoDate(date);
}

export function addDays(isoDate: string, days: number): string {
  const date = parseIsoDate(isoDate);
  date.setUTCDate(date.getUTCDate() + days);
  return toIsoDate(date);
}

export function currentWeekStart(now: Date = new Date()): string {
  return weekStartOf(toIsoDate(now));
}

export function previousWeekStart(now: Date = new Date()): string {
  return addDays(currentWeekStart(now), -7);
}

export function isMonday(isoDate: string): boolean {
  return parseIsoDate(isoDate).getUTCDay() === 1;
}
