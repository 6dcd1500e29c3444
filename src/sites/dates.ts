import { DateTime } from 'luxon';

function fromIso(value: string): DateTime {
  const parsed = DateTime.fromISO(value);
  if (!parsed.isValid) {
    throw new Error(`Invalid calendar date: "${value}".`);
  }
  return parsed;
}

/** `2025-08-10` → `08-10-2025`, the format ForeUp's date field accepts. */
export function toMonthDayYear(isoDate: string): string {
  return fromIso(isoDate).toFormat('MM-dd-yyyy');
}

export function ordinalSuffix(day: number): string {
  if (day % 100 >= 11 && day % 100 <= 13) {
    return 'th';
  }
  switch (day % 10) {
    case 1:
      return 'st';
    case 2:
      return 'nd';
    case 3:
      return 'rd';
    default:
      return 'th';
  }
}

/** `2025-08-04` → `August 4th, 2025`, as used in calendar aria-labels. */
export function ordinalDateLabel(isoDate: string): string {
  const date = fromIso(isoDate);
  return `${date.toFormat('MMMM')} ${date.day}${ordinalSuffix(date.day)}, ${date.year}`;
}

export function addDays(isoDate: string, days: number): string {
  return fromIso(isoDate).plus({ days }).toISODate() ?? isoDate;
}

export function dateParts(isoDate: string): { month: number; day: number; year: number } {
  const date = fromIso(isoDate);
  return { month: date.month, day: date.day, year: date.year };
}
