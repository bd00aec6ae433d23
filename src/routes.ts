import fs from 'fs';
import { z } from 'zod';
import { ConfigurationError, errorMessage } from './errors.js';
import type { AirportCode } from './types.js';

const routesFileSchema = z.record(z.string().min(1), z.array(z.string().min(1)));
const airportsFileSchema = z.record(z.string().min(1), z.string().min(1));

/**
 * Read-only adjacency map of airport code to directly reachable airport codes.
 * Airports that only appear as destinations are known to the graph too, with no
 * outbound connections.
 */
export class RouteGraph {
  private readonly adjacency = new Map<AirportCode, readonly AirportCode[]>();

  constructor(connections: Readonly<Record<AirportCode, readonly AirportCode[]>>) {
    for (const [origin, destinations] of Object.entries(connections)) {
      const unique = [...new Set(destinations)].filter((d) => d !== origin);
      this.adjacency.set(origin, Object.freeze(unique));
    }
    for (const destinations of Object.values(connections)) {
      for (const d of destinations) {
        if (!this.adjacency.has(d)) this.adjacency.set(d, Object.freeze([]));
      }
    }
  }

  destinations(airport: AirportCode): readonly AirportCode[] {
    return this.adjacency.get(airport) ?? [];
  }

  has(airport: AirportCode): boolean {
    return this.adjacency.has(airport);
  }

  airports(): AirportCode[] {
    return [...this.adjacency.keys()];
  }

  get size(): number {
    return this.adjacency.size;
  }

  toJSON(): Record<AirportCode, AirportCode[]> {
    const out: Record<AirportCode, AirportCode[]> = {};
    for (const [origin, destinations] of this.adjacency) out[origin] = [...destinations];
    return out;
  }
}

/** Code to city name, as the availability source prints it. */
export class AirportDirectory {
  private readonly cities: ReadonlyMap<AirportCode, string>;

  constructor(cities: Readonly<Record<AirportCode, string>> = {}) {
    this.cities = new Map(Object.entries(cities));
  }

  cityOf(code: AirportCode): string {
    return this.cities.get(code) ?? code;
  }
}

function readJson(path: string): unknown {
  try {
    return JSON.parse(fs.readFileSync(path, 'utf8'));
  } catch (e) {
    throw new ConfigurationError(`Cannot read ${path}: ${errorMessage(e)}`);
  }
}

export function loadRouteGraph(path: string): RouteGraph {
  const parsed = routesFileSchema.safeParse(readJson(path));
  if (!parsed.success) {
    throw new ConfigurationError(`Route graph ${path} is not a map of airport code to codes`);
  }
  return new RouteGraph(parsed.data);
}

export function loadAirportDirectory(path: string): AirportDirectory {
  if (!fs.existsSync(path)) return new AirportDirectory();
  const parsed = airportsFileSchema.safeParse(readJson(path));
  if (!parsed.success) {
    throw new ConfigurationError(`Airport directory ${path} is not a map of airport code to city`);
  }
  return new AirportDirectory(parsed.data);
}
