const DAY_MS = 24 * 60 * 60 * 1000;
const ISO_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

export function dateParts(isoDate: string): { year: string; month: string; day: string } {
  const match = ISO_DATE_PATTERN.exec(isoDate);
  if (!match) {
    throw new Error(`Expected a YYYY-MM-DD date, got '${isoDate}'`);
  }
  const [, year = '', month = '', day = ''] = match;
  return { year, month, day };
}

function toUtcMs(isoDate: string): number {
  const { year, month, day } = dateParts(isoDate);
  return Date.UTC(Number(year), Number(month) - 1, Number(day));
}

export function addDays(isoDate: string, days: number): string {
  return new Date(toUtcMs(isoDate) + days * DAY_MS).toISOString().slice(0, 10);
}

/** `windowDays + 1` consecutive dates ending at `endDate`, oldest first. */
export function enumerateDays(endDate: string, windowDays: number): string[] {
  const days: string[] = [];
  for (let offset = windowDays; offset >= 0; offset -= 1) {
    days.push(addDays(endDate, -offset));
  }
  return days;
}
