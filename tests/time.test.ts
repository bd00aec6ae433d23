import { describe, expect, it } from 'vitest';
import {
  addDays,
  arrivalInstant,
  connects,
  dateRange,
  formatSeconds,
  isIsoDate,
  parseUtcOffset,
  toInstant,
} from '../src/time.js';
import { occurrence } from './helpers.js';

describe('parseUtcOffset', () => {
  it('reads the label formats the checkers print', () => {
    expect(parseUtcOffset('UTC+1')).toBe(60);
    expect(parseUtcOffset('UTC+05:30')).toBe(330);
    expect(parseUtcOffset('GMT-3')).toBe(-180);
    expect(parseUtcOffset('+0200')).toBe(120);
    expect(parseUtcOffset('UTC')).toBe(0);
  });

  it('returns null for labels it cannot read', () => {
    expect(parseUtcOffset('CET')).toBeNull();
    expect(parseUtcOffset('UTC+25')).toBeNull();
    expect(parseUtcOffset('')).toBeNull();
    expect(parseUtcOffset('   ')).toBeNull();
  });

  it('gives no instant for a flight without an offset label', () => {
    expect(toInstant('2025-03-01', '10:00', '')).toBeNull();
  });
});

describe('instants', () => {
  it('subtracts the offset from the local wall clock', () => {
    expect(toInstant('2025-03-01', '10:00', 'UTC+1')).toBe(Date.UTC(2025, 2, 1, 9, 0));
    expect(toInstant('2025-03-01', '25:00', 'UTC+1')).toBeNull();
  });

  it('rolls an arrival past midnight onto the next day', () => {
    const overnight = occurrence({ from: 'A', to: 'B', date: '2025-03-01', dep: '23:30', arr: '01:10', depOffset: 'UTC', arrOffset: 'UTC' });
    expect(arrivalInstant(overnight)).toBe(Date.UTC(2025, 2, 2, 1, 10));
  });

  it('keeps a same-day arrival in a zone further west', () => {
    const westbound = occurrence({ from: 'A', to: 'B', date: '2025-03-01', dep: '10:00', arr: '11:30', depOffset: 'UTC+2', arrOffset: 'UTC' });
    expect(arrivalInstant(westbound)).toBe(Date.UTC(2025, 2, 1, 11, 30));
  });

  it('accepts a connection on the following day', () => {
    const first = occurrence({ from: 'A', to: 'B', date: '2025-03-01', dep: '20:00', arr: '22:00' });
    const second = occurrence({ from: 'B', to: 'C', date: '2025-03-02', dep: '07:00', arr: '09:00' });
    expect(connects(first, second)).toBe(true);
    expect(connects(second, first)).toBe(false);
  });
});

describe('dates', () => {
  it('builds inclusive ranges across month ends', () => {
    expect(dateRange('2025-02-27', 3)).toEqual(['2025-02-27', '2025-02-28', '2025-03-01']);
    expect(addDays('2024-12-31', 1)).toBe('2025-01-01');
  });

  it('rejects impossible calendar dates', () => {
    expect(isIsoDate('2025-02-30')).toBe(false);
    expect(isIsoDate('2025-02-28')).toBe(true);
    expect(() => addDays('28-02-2025', 1)).toThrow(RangeError);
  });
});

describe('formatSeconds', () => {
  it('spells out non-zero units', () => {
    expect(formatSeconds(3725)).toBe('1 hour, 2 minutes, 5 seconds');
    expect(formatSeconds(90061)).toBe('1 day, 1 hour, 1 minute, 1 second');
    expect(formatSeconds(120)).toBe('2 minutes');
    expect(formatSeconds(0)).toBe('0 seconds');
  });
});
