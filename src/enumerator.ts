import { ConfigurationError } from './errors.js';
import { LegRegistry } from './legs.js';
import { Logger } from './logger.js';
import type { RouteGraph } from './routes.js';
import { formatSeconds } from './time.js';
import type { AirportCode, CandidateItinerary, Leg } from './types.js';

export type CheckingTimeEstimate = {
  distinctLegs: number;
  seconds: number;
  formatted: string;
};

export type EstimateOptions = {
  secondsPerCheck?: number;
  daysPerLeg?: number;
  setupSeconds?: number;
};

export function candidateLegs(candidate: CandidateItinerary): Leg[] {
  switch (candidate.type) {
    case 'direct':
      return [candidate.first];
    case 'one-stop':
      return candidate.second ? [candidate.first, candidate.second] : [candidate.first];
    case 'round-trip':
      return candidate.return ? [candidate.outward, candidate.return] : [candidate.outward];
  }
}

/** Interned legs referenced by the candidates, in first-seen order. */
export function distinctLegs(candidates: readonly CandidateItinerary[]): Leg[] {
  const byHash = new Map<string, Leg>();
  for (const candidate of candidates) {
    for (const leg of candidateLegs(candidate)) {
      if (!byHash.has(leg.hash)) byHash.set(leg.hash, leg);
    }
  }
  return [...byHash.values()];
}

export function estimateCheckingTime(
  candidates: readonly CandidateItinerary[],
  { secondsPerCheck = 5, daysPerLeg = 4, setupSeconds = 20 }: EstimateOptions = {},
): CheckingTimeEstimate {
  const legs = distinctLegs(candidates).length;
  const seconds = legs * secondsPerCheck * daysPerLeg + setupSeconds;
  return { distinctLegs: legs, seconds, formatted: formatSeconds(seconds) };
}

export class ItineraryEnumerator {
  private readonly legs: LegRegistry;
  private readonly logger: Logger;

  constructor(
    private readonly graph: RouteGraph,
    options: { legs?: LegRegistry; logger?: Logger } = {},
  ) {
    this.legs = options.legs ?? new LegRegistry();
    this.logger = options.logger ?? new Logger('enumerator');
  }

  /**
   * Direct and (with maxStops 1) one-stop one-way candidates, found by a
   * breadth-first walk from each departure airport capped at maxStops + 1 hops.
   */
  enumerateOneStop(
    departures: readonly AirportCode[],
    destinations: readonly AirportCode[],
    maxStops: number,
  ): CandidateItinerary[] {
    if (!Number.isInteger(maxStops) || maxStops < 0) {
      throw new ConfigurationError(`maxStops must be a non-negative integer, got ${maxStops}`);
    }
    const stops = Math.min(maxStops, 1);
    const { from, to } = this.resolveFilters(departures, destinations);

    const candidates: CandidateItinerary[] = [];
    for (const airport of from) {
      const visited = new Set<AirportCode>([airport]);
      const hubs: AirportCode[] = [];

      for (const reached of this.graph.destinations(airport)) {
        if (visited.has(reached)) continue;
        visited.add(reached);
        hubs.push(reached);
        if (to.has(reached)) {
          candidates.push({ type: 'direct', first: this.legs.intern(airport, reached) });
        }
      }

      if (stops === 0) continue;

      for (const hub of hubs) {
        for (const reached of this.graph.destinations(hub)) {
          if (!to.has(reached)) continue;
          candidates.push({
            type: 'one-stop',
            first: this.legs.intern(airport, hub),
            second: this.legs.intern(hub, reached),
          });
        }
      }
    }

    const estimate = estimateCheckingTime(candidates);
    this.logger.info('Enumerated one-way candidates', {
      candidates: candidates.length,
      maxStops: stops,
      distinctLegs: estimate.distinctLegs,
      estimatedCheckingTime: estimate.formatted,
    });
    return candidates;
  }

  /** Direct outward A→D and direct return D→B, where B is any departure airport. */
  enumerateRoundTrip(
    departures: readonly AirportCode[],
    destinations: readonly AirportCode[] = [],
  ): CandidateItinerary[] {
    const { from, to } = this.resolveFilters(departures, destinations);
    const homes = new Set(from);

    const candidates: CandidateItinerary[] = [];
    for (const airport of from) {
      for (const destination of this.graph.destinations(airport)) {
        if (!to.has(destination)) continue;
        for (const back of this.graph.destinations(destination)) {
          if (!homes.has(back)) continue;
          candidates.push({
            type: 'round-trip',
            outward: this.legs.intern(airport, destination),
            return: this.legs.intern(destination, back),
          });
        }
      }
    }

    const estimate = estimateCheckingTime(candidates);
    this.logger.info('Enumerated round-trip candidates', {
      candidates: candidates.length,
      distinctLegs: estimate.distinctLegs,
      estimatedCheckingTime: estimate.formatted,
    });
    return candidates;
  }

  private resolveFilters(departures: readonly AirportCode[], destinations: readonly AirportCode[]) {
    if (this.graph.size === 0) {
      throw new ConfigurationError('Route graph is empty');
    }
    const unknown = [...departures, ...destinations].filter((code) => !this.graph.has(code));
    if (unknown.length) {
      throw new ConfigurationError(`Unknown airport code(s): ${[...new Set(unknown)].join(', ')}`);
    }
    const all = this.graph.airports();
    return {
      from: departures.length ? [...new Set(departures)] : all,
      to: new Set(destinations.length ? destinations : all),
    };
  }
}
