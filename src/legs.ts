import crypto from 'crypto';
import type { AirportCode, Leg } from './types.js';

export function legHash(origin: AirportCode, destination: AirportCode): string {
  return crypto.createHash('sha256').update(`${origin}-${destination}`).digest('hex');
}

/** Interns legs by hash: one Leg object per origin/destination pair. */
export class LegRegistry {
  private readonly legs = new Map<string, Leg>();

  intern(origin: AirportCode, destination: AirportCode): Leg {
    const hash = legHash(origin, destination);
    const existing = this.legs.get(hash);
    if (existing) return existing;
    const leg: Leg = Object.freeze({ origin, destination, hash });
    this.legs.set(hash, leg);
    return leg;
  }

  get size(): number {
    return this.legs.size;
  }
}
