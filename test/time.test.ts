import { describe, expect, it } from 'vitest';
import {
  extractTimeOfDay,
  formatTimeOfDay,
  isValidTimezone,
  parseIsoDate,
  parseTimeOfDay,
} from '../src/engine/time';

describe('parseTimeOfDay', () => {
  it('reads twelve-hour times with a meridiem', () => {
    expect(parseTimeOfDay('9:30 AM')).toEqual({ hour: 9, minute: 30 });
    expect(parseTimeOfDay('5:51pm')).toEqual({ hour: 17, minute: 51 });
    expect(parseTimeOfDay('7:30 p.m.')).toEqual({ hour: 19, minute: 30 });
    expect(parseTimeOfDay('12:05 AM')).toEqual({ hour: 0, minute: 5 });
    expect(parseTimeOfDay('12:00 PM')).toEqual({ hour: 12, minute: 0 });
  });

  it('reads twenty-four-hour times, with or without seconds', () => {
    expect(parseTimeOfDay('07:30')).toEqual({ hour: 7, minute: 30 });
    expect(parseTimeOfDay('17:30:00')).toEqual({ hour: 17, minute: 30 });
  });

  it('rejects out-of-range and malformed values', () => {
    expect(parseTimeOfDay('24:00')).toBeNull();
    expect(parseTimeOfDay('13:00 PM')).toBeNull();
    expect(parseTimeOfDay('9:75')).toBeNull();
    expect(parseTimeOfDay('soon')).toBeNull();
    expect(parseTimeOfDay('')).toBeNull();
  });
});

describe('extractTimeOfDay', () => {
  it('finds the time inside a tile label', () => {
    expect(extractTimeOfDay('Tee time 7:30am (4 spots)')).toEqual({ hour: 7, minute: 30 });
  });

  it('finds the time inside an API timestamp', () => {
    expect(extractTimeOfDay('2025-08-10 14:20')).toEqual({ hour: 14, minute: 20 });
  });

  it('returns null when no time is present', () => {
    expect(extractTimeOfDay('Sold out')).toBeNull();
  });
});

describe('formatTimeOfDay', () => {
  it('prints a twelve-hour clock', () => {
    expect(formatTimeOfDay({ hour: 0, minute: 5 })).toBe('12:05 AM');
    expect(formatTimeOfDay({ hour: 9, minute: 10 })).toBe('9:10 AM');
    expect(formatTimeOfDay({ hour: 12, minute: 0 })).toBe('12:00 PM');
    expect(formatTimeOfDay({ hour: 20, minute: 45 })).toBe('8:45 PM');
  });
});

describe('calendar helpers', () => {
  it('accepts only strict ISO dates', () => {
    expect(parseIsoDate('2025-08-10')?.day).toBe(10);
    expect(parseIsoDate('2025-02-30')).toBeNull();
    expect(parseIsoDate('08/10/2025')).toBeNull();
  });

  it('recognizes IANA zones', () => {
    expect(isValidTimezone('America/Los_Angeles')).toBe(true);
    expect(isValidTimezone('Mars/Olympus_Mons')).toBe(false);
  });
});
