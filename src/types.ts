export type AirportCode = string;

export type Leg = {
  origin: AirportCode;
  destination: AirportCode;
  hash: string; // sha256 of "origin-destination"
};

export type CandidateItinerary =
  | { type: 'direct'; first: Leg }
  | { type: 'one-stop'; first: Leg; second: Leg | null }
  | { type: 'round-trip'; outward: Leg; return: Leg | null };

export type FlightEndpoint = {
  city: string;
  time: string; // HH:mm, local to the airport
  utcOffset: string; // "UTC+1", "UTC+05:30", "GMT-3", "+02:00"
};

export type CheckedOccurrence = {
  date: string; // YYYY-MM-DD, day of departure
  departure: FlightEndpoint;
  arrival: FlightEndpoint;
  duration: string;
  carrier: string;
  flightCode: string;
  price: string;
};

export type CheckResult =
  | { kind: 'occurrences'; occurrences: CheckedOccurrence[] }
  | { kind: 'none-found' }
  | { kind: 'transient-failure'; reason: string };

export type StoredResult =
  | { kind: 'found'; occurrences: CheckedOccurrence[] }
  | { kind: 'none' }
  | { kind: 'failed'; reason: string };

export type StoreSnapshot = Readonly<Record<string, StoredResult>>;

export type AvailableItinerary =
  | { type: 'direct'; firstLeg: [CheckedOccurrence]; secondLeg: null }
  | { type: 'one-stop'; firstLeg: [CheckedOccurrence]; secondLeg: [CheckedOccurrence] }
  | { type: 'round-trip'; outward: [CheckedOccurrence]; return: [CheckedOccurrence] | null };

export interface AvailabilityChecker {
  check(leg: Leg, date: string): Promise<CheckResult>;
  /** Re-establishes cookies/tokens; disposes any previous session first. */
  resetSession(): Promise<void>;
  close(): Promise<void>;
}

export type CheckerFactory = (workerId: number) => AvailabilityChecker | Promise<AvailabilityChecker>;

export type TripType = 'oneway' | 'roundtrip';

export type FailedCheck = {
  legHash: string;
  origin: AirportCode;
  destination: AirportCode;
  date: string;
  reason: string;
};

export type RunSummary = {
  checked: number;
  found: number;
  none: number;
  failed: number;
  skipped: number;
  workerErrors: number;
};
