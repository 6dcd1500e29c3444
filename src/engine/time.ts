import { DateTime } from 'luxon';
import { TimeOfDay } from '../types';

const TIME_PATTERN = /^(\d{1,2}):(\d{2})(?::\d{2})?\s*([ap])?\.?\s*m?\.?$/i;
const EMBEDDED_TIME_PATTERN = /(\d{1,2}):(\d{2})(?::\d{2})?\s*([ap])?\.?\s*m?\.?(?![a-z])/i;

export const START_OF_DAY: TimeOfDay = { hour: 0, minute: 0 };

function toTimeOfDay(hourText: string, minuteText: string, meridiem?: string): TimeOfDay | null {
  let hour = Number(hourText);
  const minute = Number(minuteText);

  if (!Number.isInteger(hour) || !Number.isInteger(minute) || minute > 59) {
    return null;
  }

  if (meridiem) {
    if (hour < 1 || hour > 12) {
      return null;
    }
    const pm = meridiem.toLowerCase() === 'p';
    hour = hour % 12 + (pm ? 12 : 0);
  } else if (hour > 23) {
    return null;
  }

  return { hour, minute };
}

/**
 * Parses a whole string as a time of day: `9:30 AM`, `5:51pm`, `07:30`,
 * `7:30 p.m.` or `17:30:00`. Returns null for anything else.
 */
export function parseTimeOfDay(value: string): TimeOfDay | null {
  const match = value.trim().match(TIME_PATTERN);
  if (!match) {
    return null;
  }
  return toTimeOfDay(match[1], match[2], match[3]);
}

/** Finds the first time of day inside free text such as a tile label or an API timestamp. */
export function extractTimeOfDay(text: string): TimeOfDay | null {
  const match = text.match(EMBEDDED_TIME_PATTERN);
  if (!match) {
    return null;
  }
  return toTimeOfDay(match[1], match[2], match[3]);
}

export function minutesOf(time: TimeOfDay): number {
  return time.hour * 60 + time.minute;
}

export function compareTimes(a: TimeOfDay, b: TimeOfDay): number {
  return minutesOf(a) - minutesOf(b);
}

export function formatTimeOfDay(time: TimeOfDay): string {
  const suffix = time.hour < 12 ? 'AM' : 'PM';
  const hour12 = time.hour % 12 === 0 ? 12 : time.hour % 12;
  return `${hour12}:${String(time.minute).padStart(2, '0')} ${suffix}`;
}

export function isValidTimezone(zone: string): boolean {
  return DateTime.now().setZone(zone).isValid;
}

export function parseIsoDate(value: string): DateTime | null {
  if (!/^\d{4}-\d{2}-\d{2}$/.test(value)) {
    return null;
  }
  const parsed = DateTime.fromISO(value);
  return parsed.isValid ? parsed : null;
}
