import { z } from 'zod';
import { distinctLegs, estimateCheckingTime, ItineraryEnumerator, type CheckingTimeEstimate } from './enumerator.js';
import { ConfigurationError } from './errors.js';
import { Logger } from './logger.js';
import { CheckOrchestrator, type CheckOptions } from './orchestrator.js';
import { Reconciler } from './reconciler.js';
import type { AirportDirectory, RouteGraph } from './routes.js';
import type { ResultStore } from './store.js';
import { dateRange, isIsoDate } from './time.js';
import type {
  AvailableItinerary,
  CandidateItinerary,
  CheckerFactory,
  FailedCheck,
  RunSummary,
} from './types.js';

const airportCode = z.string().regex(/^[A-Z]{3}$/, 'expected a 3-letter upper-case airport code');

export const searchRequestSchema = z.object({
  tripType: z.enum(['oneway', 'roundtrip']),
  departures: z.array(airportCode).max(10).default([]),
  destinations: z.array(airportCode).max(10).default([]),
  maxStops: z.number().int().min(0).max(1).default(0),
  startDate: z.string().refine(isIsoDate, 'expected a YYYY-MM-DD date'),
  days: z.number().int().min(1).max(14).default(4),
});

export type SearchRequest = z.infer<typeof searchRequestSchema>;

export type SearchDeps = {
  graph: RouteGraph;
  airports?: AirportDirectory;
  createChecker: CheckerFactory;
  checks?: Partial<CheckOptions>;
  /** Results from earlier runs; settled entries are not checked again. */
  store?: ResultStore;
  logger?: Logger;
  sleep?: (ms: number) => Promise<void>;
};

export type SearchOutcome = {
  candidates: number;
  legs: number;
  dates: string[];
  summary: RunSummary;
  failures: FailedCheck[];
  itineraries: AvailableItinerary[];
  store: ResultStore;
};

export function parseSearchRequest(input: unknown): SearchRequest {
  const parsed = searchRequestSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.') || 'request'}: ${i.message}`).join('; ');
    throw new ConfigurationError(`Invalid search request: ${issues}`);
  }
  return parsed.data;
}

export function enumerateCandidates(
  request: SearchRequest,
  graph: RouteGraph,
  logger = new Logger('search'),
): CandidateItinerary[] {
  const enumerator = new ItineraryEnumerator(graph, { logger: logger.child('enumerator') });
  return request.tripType === 'oneway'
    ? enumerator.enumerateOneStop(request.departures, request.destinations, request.maxStops)
    : enumerator.enumerateRoundTrip(request.departures, request.destinations);
}

export function estimateSearch(
  request: SearchRequest,
  graph: RouteGraph,
  logger?: Logger,
): CheckingTimeEstimate & { candidates: number } {
  const candidates = enumerateCandidates(request, graph, logger);
  return { candidates: candidates.length, ...estimateCheckingTime(candidates, { daysPerLeg: request.days }) };
}

/** Enumerate, check and reconcile one search request. */
export async function runSearch(request: SearchRequest, deps: SearchDeps): Promise<SearchOutcome> {
  const logger = deps.logger ?? new Logger('search');
  const candidates = enumerateCandidates(request, deps.graph, logger);
  const legs = distinctLegs(candidates);
  const dates = dateRange(request.startDate, request.days);

  const orchestrator = new CheckOrchestrator(deps.checks, { logger: logger.child('orchestrator'), sleep: deps.sleep });
  const report = await orchestrator.runChecks(legs, dates, deps.createChecker, deps.store);

  const airports = deps.airports;
  const reconciler = new Reconciler({
    cityOf: airports ? (code) => airports.cityOf(code) : undefined,
    logger: logger.child('reconciler'),
  });
  const itineraries = reconciler.reconcile(candidates, report.store);

  return {
    candidates: candidates.length,
    legs: legs.length,
    dates,
    summary: report.summary,
    failures: report.failed,
    itineraries,
    store: report.store,
  };
}
