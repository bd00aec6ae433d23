import { deepFreeze, uniqueBy } from './canonical.js';
import { Logger } from './logger.js';
import { ResultStore } from './store.js';
import { connects } from './time.js';
import type { AirportCode, AvailableItinerary, CandidateItinerary, CheckedOccurrence, Leg, StoredResult } from './types.js';

export type ReconcilerOptions = {
  /** City name the checker prints for an airport code; defaults to the code. */
  cityOf?: (code: AirportCode) => string;
  logger?: Logger;
};

type OccurrenceIndex = Map<string, CheckedOccurrence[]>;

function cityPair(departureCity: string, arrivalCity: string): string {
  return `${departureCity}\u0000${arrivalCity}`;
}

export class Reconciler {
  private readonly cityOf: (code: AirportCode) => string;
  private readonly logger: Logger;

  constructor(options: ReconcilerOptions = {}) {
    this.cityOf = options.cityOf ?? ((code) => code);
    this.logger = options.logger ?? new Logger('reconciler');
  }

  /**
   * Matches checked occurrences back onto candidate skeletons. Occurrences are
   * found by city pair over every stored entry, so a leg checked on several
   * dates contributes all of them. Two-leg combinations are kept only when the
   * second flight leaves no earlier than the first one lands.
   */
  reconcile(candidates: readonly CandidateItinerary[], store: ResultStore | readonly StoredResult[]): AvailableItinerary[] {
    const index = this.indexOccurrences(store instanceof ResultStore ? store.values() : structuredClone(store));
    const out: AvailableItinerary[] = [];

    for (const candidate of candidates) {
      switch (candidate.type) {
        case 'direct':
          for (const occ of this.lookup(index, candidate.first)) {
            out.push({ type: 'direct', firstLeg: [occ], secondLeg: null });
          }
          break;

        case 'one-stop': {
          const firsts = this.lookup(index, candidate.first);
          if (!candidate.second) {
            for (const occ of firsts) out.push({ type: 'direct', firstLeg: [occ], secondLeg: null });
            break;
          }
          const seconds = this.lookup(index, candidate.second);
          for (const first of firsts) {
            for (const second of seconds) {
              if (connects(first, second)) out.push({ type: 'one-stop', firstLeg: [first], secondLeg: [second] });
            }
          }
          break;
        }

        case 'round-trip': {
          const returns = candidate.return ? this.lookup(index, candidate.return) : [];
          for (const outward of this.lookup(index, candidate.outward)) {
            const valid = returns.filter((back) => connects(outward, back));
            if (valid.length === 0) {
              out.push({ type: 'round-trip', outward: [outward], return: null });
              continue;
            }
            for (const back of valid) out.push({ type: 'round-trip', outward: [outward], return: [back] });
          }
          break;
        }
      }
    }

    const unique = uniqueBy(out).map((itinerary) => deepFreeze(itinerary));
    this.logger.info('Reconciled available itineraries', {
      candidates: candidates.length,
      combinations: out.length,
      itineraries: unique.length,
    });
    return unique;
  }

  private indexOccurrences(entries: readonly StoredResult[]): OccurrenceIndex {
    const index: OccurrenceIndex = new Map();
    for (const entry of entries) {
      if (entry.kind !== 'found') continue;
      for (const occ of entry.occurrences) {
        const key = cityPair(occ.departure.city, occ.arrival.city);
        const list = index.get(key);
        if (list) list.push(occ);
        else index.set(key, [occ]);
      }
    }
    return index;
  }

  private lookup(index: OccurrenceIndex, leg: Leg): CheckedOccurrence[] {
    return index.get(cityPair(this.cityOf(leg.origin), this.cityOf(leg.destination))) ?? [];
  }
}
