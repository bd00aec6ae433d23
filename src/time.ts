import type { CheckedOccurrence } from './types.js';

const MINUTE_MS = 60_000;
const DAY_MS = 24 * 60 * MINUTE_MS;

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;
const CLOCK = /^(\d{1,2}):(\d{2})$/;
const OFFSET = /^(?:UTC|GMT)?\s*(?:([+-])(\d{1,2})(?::?(\d{2}))?)?$/i;

function isoDateToUtcMs(date: string): number | null {
  const m = ISO_DATE.exec(date);
  if (!m) return null;
  const ms = Date.UTC(Number(m[1]), Number(m[2]) - 1, Number(m[3]));
  return new Date(ms).toISOString().slice(0, 10) === date ? ms : null;
}

function ymd(ms: number): string {
  return new Date(ms).toISOString().slice(0, 10);
}

export function isIsoDate(value: string): boolean {
  return isoDateToUtcMs(value) !== null;
}

export function addDays(date: string, days: number): string {
  const ms = isoDateToUtcMs(date);
  if (ms === null) throw new RangeError(`Invalid date: ${date}`);
  return ymd(ms + days * DAY_MS);
}

/** `days` consecutive calendar dates starting at `start`, inclusive. */
export function dateRange(start: string, days: number): string[] {
  const out: string[] = [];
  for (let i = 0; i < days; i++) out.push(addDays(start, i));
  return out;
}

/** Minutes east of UTC for labels like "UTC+1", "GMT-03:30" or "+0200"; null if unreadable. */
export function parseUtcOffset(label: string): number | null {
  const trimmed = label.trim();
  // Needs a UTC/GMT prefix or a sign; a blank label is unreadable, not UTC.
  if (!trimmed) return null;
  const m = OFFSET.exec(trimmed);
  if (!m) return null;
  if (!m[1]) return 0;
  const hours = Number(m[2]);
  const minutes = m[3] ? Number(m[3]) : 0;
  if (hours > 14 || minutes > 59) return null;
  const total = hours * 60 + minutes;
  return m[1] === '-' ? -total : total;
}

export function parseClock(time: string): number | null {
  const m = CLOCK.exec(time.trim());
  if (!m) return null;
  const hours = Number(m[1]);
  const minutes = Number(m[2]);
  if (hours > 23 || minutes > 59) return null;
  return hours * 60 + minutes;
}

/** UTC epoch ms of a local wall-clock date and time at the given offset. */
export function toInstant(date: string, time: string, utcOffset: string): number | null {
  const day = isoDateToUtcMs(date);
  const clock = parseClock(time);
  const offset = parseUtcOffset(utcOffset);
  if (day === null || clock === null || offset === null) return null;
  return day + (clock - offset) * MINUTE_MS;
}

export function departureInstant(occurrence: CheckedOccurrence): number | null {
  const { date, departure } = occurrence;
  return toInstant(date, departure.time, departure.utcOffset);
}

/**
 * Occurrences only carry the departure day, so the arrival instant is the first
 * moment at or after departure whose local clock (at the arrival offset) shows
 * the arrival time.
 */
export function arrivalInstant(occurrence: CheckedOccurrence): number | null {
  const departed = departureInstant(occurrence);
  const sameDay = toInstant(occurrence.date, occurrence.arrival.time, occurrence.arrival.utcOffset);
  if (departed === null || sameDay === null) return null;

  let arrived = sameDay;
  while (arrived < departed) arrived += DAY_MS;
  while (arrived - DAY_MS >= departed) arrived -= DAY_MS;
  return arrived;
}

/** True when `next` leaves no earlier than `previous` lands. */
export function connects(previous: CheckedOccurrence, next: CheckedOccurrence): boolean {
  const landed = arrivalInstant(previous);
  const leaves = departureInstant(next);
  if (landed === null || leaves === null) return false;
  return leaves >= landed;
}

function plural(n: number, unit: string): string {
  return `${n} ${unit}${n === 1 ? '' : 's'}`;
}

export function formatSeconds(total: number): string {
  let seconds = Math.max(0, Math.round(total));
  const days = Math.floor(seconds / 86_400);
  seconds %= 86_400;
  const hours = Math.floor(seconds / 3600);
  seconds %= 3600;
  const minutes = Math.floor(seconds / 60);
  seconds %= 60;

  const parts: string[] = [];
  if (days) parts.push(plural(days, 'day'));
  if (hours) parts.push(plural(hours, 'hour'));
  if (minutes) parts.push(plural(minutes, 'minute'));
  if (seconds || parts.length === 0) parts.push(plural(seconds, 'second'));
  return parts.join(', ');
}
