import Database from 'better-sqlite3';
import { z } from 'zod';
import { Logger } from './logger.js';
import type { SearchRequest } from './search.js';
import { ResultStore, parseResultKey } from './store.js';
import type { AvailableItinerary, RunSummary, StoredResult, StoreSnapshot } from './types.js';

export type SavedSearch = SearchRequest & { id: number; createdAt: string };

export type RunStatus = 'queued' | 'running' | 'completed' | 'failed';

export type RunRecord = {
  id: number;
  searchId: number | null;
  status: RunStatus;
  startedAt: string;
  finishedAt: string | null;
  summary: RunSummary | null;
  itineraries: AvailableItinerary[] | null;
  error: string | null;
};

const endpointSchema = z.object({ city: z.string(), time: z.string(), utcOffset: z.string() });

const storedResultSchema = z.discriminatedUnion('kind', [
  z.object({
    kind: z.literal('found'),
    occurrences: z.array(
      z.object({
        date: z.string(),
        departure: endpointSchema,
        arrival: endpointSchema,
        duration: z.string(),
        carrier: z.string(),
        flightCode: z.string(),
        price: z.string(),
      }),
    ),
  }),
  z.object({ kind: z.literal('none') }),
  z.object({ kind: z.literal('failed'), reason: z.string() }),
]);

function parseStoredResult(payload: string): StoredResult | null {
  let raw: unknown;
  try {
    raw = JSON.parse(payload);
  } catch {
    return null;
  }
  const parsed = storedResultSchema.safeParse(raw);
  return parsed.success ? parsed.data : null;
}

type SearchRow = {
  id: number;
  trip_type: SearchRequest['tripType'];
  departures: string;
  destinations: string;
  max_stops: number;
  start_date: string;
  days: number;
  created_at: string;
};

type RunRow = {
  id: number;
  search_id: number | null;
  status: RunStatus;
  started_at: string;
  finished_at: string | null;
  summary: string | null;
  itineraries: string | null;
  error: string | null;
};

const SCHEMA = `
CREATE TABLE IF NOT EXISTS searches (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  trip_type TEXT NOT NULL,
  departures TEXT NOT NULL,
  destinations TEXT NOT NULL,
  max_stops INTEGER NOT NULL DEFAULT 0,
  start_date TEXT NOT NULL,
  days INTEGER NOT NULL DEFAULT 4,
  created_at TEXT NOT NULL DEFAULT (datetime('now'))
);

CREATE TABLE IF NOT EXISTS checked_results (
  leg_hash TEXT NOT NULL,
  date TEXT NOT NULL,
  payload TEXT NOT NULL,
  created_at INTEGER NOT NULL,
  PRIMARY KEY (leg_hash, date)
);

CREATE TABLE IF NOT EXISTS runs (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  search_id INTEGER,
  status TEXT NOT NULL,
  started_at TEXT NOT NULL DEFAULT (datetime('now')),
  finished_at TEXT,
  summary TEXT,
  itineraries TEXT,
  error TEXT,
  FOREIGN KEY(search_id) REFERENCES searches(id) ON DELETE SET NULL
);
`;

function toSearch(r: SearchRow): SavedSearch {
  return {
    id: r.id,
    tripType: r.trip_type,
    departures: JSON.parse(r.departures),
    destinations: JSON.parse(r.destinations),
    maxStops: r.max_stops,
    startDate: r.start_date,
    days: r.days,
    createdAt: r.created_at,
  };
}

function toRun(r: RunRow): RunRecord {
  return {
    id: r.id,
    searchId: r.search_id,
    status: r.status,
    startedAt: r.started_at,
    finishedAt: r.finished_at,
    summary: r.summary ? JSON.parse(r.summary) : null,
    itineraries: r.itineraries ? JSON.parse(r.itineraries) : null,
    error: r.error,
  };
}

export class Repository {
  private readonly db: Database.Database;

  constructor(
    file: string,
    private readonly logger = new Logger('db'),
  ) {
    this.db = new Database(file);
    this.db.pragma('journal_mode = WAL');
    this.db.pragma('foreign_keys = ON');
    this.db.exec(SCHEMA);
  }

  addSearch(input: SearchRequest): number {
    const info = this.db
      .prepare(
        `INSERT INTO searches (trip_type, departures, destinations, max_stops, start_date, days)
         VALUES (@tripType, @departures, @destinations, @maxStops, @startDate, @days)`,
      )
      .run({
        ...input,
        departures: JSON.stringify(input.departures),
        destinations: JSON.stringify(input.destinations),
      });
    return Number(info.lastInsertRowid);
  }

  getSearch(id: number): SavedSearch | undefined {
    const row = this.db.prepare('SELECT * FROM searches WHERE id=?').get(id) as SearchRow | undefined;
    return row ? toSearch(row) : undefined;
  }

  listSearches(): SavedSearch[] {
    const rows = this.db.prepare('SELECT * FROM searches ORDER BY id DESC').all() as SearchRow[];
    return rows.map(toSearch);
  }

  deleteSearch(id: number): boolean {
    return this.db.prepare('DELETE FROM searches WHERE id=?').run(id).changes > 0;
  }

  /** Upserts settled results; failure markers are not persisted so later runs retry them. */
  saveResults(snapshot: StoreSnapshot): number {
    const upsert = this.db.prepare(
      `INSERT INTO checked_results (leg_hash, date, payload, created_at) VALUES (?,?,?,?)
       ON CONFLICT(leg_hash, date) DO UPDATE SET payload=excluded.payload, created_at=excluded.created_at`,
    );
    const now = Date.now();
    const write = this.db.transaction((entries: [string, StoredResult][]) => {
      let saved = 0;
      for (const [key, value] of entries) {
        if (value.kind === 'failed') continue;
        const { legHash, date } = parseResultKey(key);
        upsert.run(legHash, date, JSON.stringify(value), now);
        saved++;
      }
      return saved;
    });
    return write(Object.entries(snapshot));
  }

  /** Results younger than `maxAgeMs`, as a store to seed the next run with. */
  loadResults(maxAgeMs: number): ResultStore {
    const rows = this.db
      .prepare('SELECT leg_hash, date, payload FROM checked_results WHERE created_at >= ?')
      .all(Date.now() - maxAgeMs) as { leg_hash: string; date: string; payload: string }[];
    const store = new ResultStore();
    for (const r of rows) {
      const result = parseStoredResult(r.payload);
      if (!result) {
        this.logger.warn('Skipping unreadable cached result', { legHash: r.leg_hash, date: r.date });
        continue;
      }
      store.put(r.leg_hash, r.date, result);
    }
    return store;
  }

  createRun(searchId: number | null): number {
    const info = this.db.prepare("INSERT INTO runs (search_id, status) VALUES (?, 'queued')").run(searchId);
    return Number(info.lastInsertRowid);
  }

  startRun(id: number): void {
    this.db.prepare("UPDATE runs SET status='running', started_at=datetime('now') WHERE id=?").run(id);
  }

  completeRun(id: number, summary: RunSummary, itineraries: AvailableItinerary[]): void {
    this.db
      .prepare("UPDATE runs SET status='completed', finished_at=datetime('now'), summary=?, itineraries=? WHERE id=?")
      .run(JSON.stringify(summary), JSON.stringify(itineraries), id);
  }

  failRun(id: number, error: string): void {
    this.db.prepare("UPDATE runs SET status='failed', finished_at=datetime('now'), error=? WHERE id=?").run(error, id);
  }

  getRun(id: number): RunRecord | undefined {
    const row = this.db.prepare('SELECT * FROM runs WHERE id=?').get(id) as RunRow | undefined;
    return row ? toRun(row) : undefined;
  }

  close(): void {
    this.db.close();
  }
}
