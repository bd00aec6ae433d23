import { vi } from 'vitest';
import type { AvailabilityChecker, CheckedOccurrence, CheckResult, Leg } from '../src/types.js';

export function occurrence(o: {
  from: string;
  to: string;
  date: string;
  dep: string;
  arr: string;
  depOffset?: string;
  arrOffset?: string;
  code?: string;
}): CheckedOccurrence {
  return {
    date: o.date,
    departure: { city: o.from, time: o.dep, utcOffset: o.depOffset ?? 'UTC+1' },
    arrival: { city: o.to, time: o.arr, utcOffset: o.arrOffset ?? 'UTC+1' },
    duration: '',
    carrier: 'Test Air',
    flightCode: o.code ?? `TA ${o.from}${o.to}`,
    price: '0 EUR',
  };
}

export type CheckBehaviour = (leg: Leg, date: string, attempt: number) => CheckResult | Promise<CheckResult>;

/** Deterministic result: a flight when origin sorts before destination, nothing otherwise. */
export const alphabetical: CheckBehaviour = (leg, date) =>
  leg.origin < leg.destination
    ? {
        kind: 'occurrences',
        occurrences: [occurrence({ from: leg.origin, to: leg.destination, date, dep: '08:00', arr: '10:00' })],
      }
    : { kind: 'none-found' };

export class FakeChecker implements AvailabilityChecker {
  readonly calls: string[] = [];
  private readonly attempts = new Map<string, number>();
  resets = 0;
  closes = 0;

  constructor(
    private readonly behaviour: CheckBehaviour = alphabetical,
    private readonly failReset: (resetNumber: number) => boolean = () => false,
  ) {}

  async check(leg: Leg, date: string): Promise<CheckResult> {
    const key = `${leg.origin}-${leg.destination}@${date}`;
    this.calls.push(key);
    const attempt = (this.attempts.get(key) ?? 0) + 1;
    this.attempts.set(key, attempt);
    return this.behaviour(leg, date, attempt);
  }

  async resetSession(): Promise<void> {
    this.resets++;
    if (this.failReset(this.resets)) throw new Error('login page unreachable');
  }

  async close(): Promise<void> {
    this.closes++;
  }
}

/** Options that keep the orchestrator from waiting in tests. */
export const fastChecks = {
  maxAttempts: 3,
  checkTimeoutMs: 1000,
  retryDelayMs: 0,
  checkDelayMs: { min: 0, max: 0 },
  pacing: { scope: 'global' as const, every: 0, coolDownMs: 0 },
};

export const noSleep = () => vi.fn(async (_ms: number) => {});
