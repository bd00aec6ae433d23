import Database from 'better-sqlite3';
import { mkdtempSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { Repository } from '../src/db.js';
import { Logger } from '../src/logger.js';
import { ResultStore } from '../src/store.js';
import { occurrence } from './helpers.js';

const request = {
  tripType: 'oneway' as const,
  departures: ['AAA'],
  destinations: ['CCC'],
  maxStops: 1,
  startDate: '2025-05-01',
  days: 2,
};

describe('Repository', () => {
  let repo: Repository;

  beforeEach(() => {
    repo = new Repository(':memory:');
  });

  afterEach(() => {
    vi.restoreAllMocks();
    repo.close();
  });

  it('stores and lists searches, newest first', () => {
    const first = repo.addSearch(request);
    const second = repo.addSearch({ ...request, tripType: 'roundtrip', destinations: [] });

    expect(repo.getSearch(first)).toMatchObject({ id: first, ...request });
    expect(repo.listSearches().map((s) => s.id)).toEqual([second, first]);
    expect(repo.getSearch(second)?.tripType).toBe('roundtrip');
  });

  it('deletes searches', () => {
    const id = repo.addSearch(request);
    expect(repo.deleteSearch(id)).toBe(true);
    expect(repo.deleteSearch(id)).toBe(false);
    expect(repo.getSearch(id)).toBeUndefined();
  });

  it('persists settled results but not failure markers', () => {
    const store = new ResultStore();
    const found = { kind: 'found' as const, occurrences: [occurrence({ from: 'AAA', to: 'BBB', date: '2025-05-01', dep: '08:00', arr: '10:00' })] };
    store.put('leg-1', '2025-05-01', found);
    store.put('leg-1', '2025-05-02', { kind: 'none' });
    store.put('leg-2', '2025-05-01', { kind: 'failed', reason: 'HTTP 503' });

    expect(repo.saveResults(store.snapshot())).toBe(2);

    const loaded = repo.loadResults(60_000);
    expect(loaded.size).toBe(2);
    expect(loaded.get('leg-1', '2025-05-01')).toEqual(found);
    expect(loaded.get('leg-1', '2025-05-02')).toEqual({ kind: 'none' });
    expect(loaded.has('leg-2', '2025-05-01')).toBe(false);
  });

  it('only loads results younger than the cache age', () => {
    const now = vi.spyOn(Date, 'now').mockReturnValue(1_000_000);
    const store = new ResultStore();
    store.put('leg-1', '2025-05-01', { kind: 'none' });
    repo.saveResults(store.snapshot());

    now.mockReturnValue(1_010_000);
    expect(repo.loadResults(5_000).size).toBe(0);
    expect(repo.loadResults(20_000).size).toBe(1);
  });

  it('records the lifecycle of a run', () => {
    const searchId = repo.addSearch(request);
    const completed = repo.createRun(searchId);
    const failed = repo.createRun(searchId);

    expect(repo.getRun(completed)).toMatchObject({ searchId, status: 'queued', finishedAt: null, summary: null });
    repo.startRun(completed);
    expect(repo.getRun(completed)?.status).toBe('running');

    const summary = { checked: 4, found: 2, none: 2, failed: 0, skipped: 0, workerErrors: 0 };
    repo.completeRun(completed, summary, []);
    repo.failRun(failed, 'Route graph is empty');

    expect(repo.getRun(completed)).toMatchObject({ status: 'completed', summary, itineraries: [], error: null });
    expect(repo.getRun(failed)).toMatchObject({ status: 'failed', summary: null, error: 'Route graph is empty' });
    expect(repo.getRun(999)).toBeUndefined();
  });

  it('keeps runs when their search is deleted', () => {
    const searchId = repo.addSearch(request);
    const runId = repo.createRun(searchId);
    repo.deleteSearch(searchId);
    expect(repo.getRun(runId)?.searchId).toBeNull();
  });
});

describe('Repository cache rows', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'itinerary-scout-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('skips cached payloads that are not stored results', () => {
    const file = join(dir, 'cache.db');
    const logger = new Logger('db');
    const warn = vi.spyOn(logger, 'warn');
    const repo = new Repository(file, logger);

    const raw = new Database(file);
    const insert = raw.prepare('INSERT INTO checked_results (leg_hash, date, payload, created_at) VALUES (?, ?, ?, ?)');
    insert.run('leg-1', '2025-05-01', '{"kind":"none"}', Date.now());
    insert.run('leg-2', '2025-05-01', 'not json', Date.now());
    insert.run('leg-3', '2025-05-01', '{"kind":"found","occurrences":[{"date":"2025-05-01"}]}', Date.now());
    insert.run('leg-4', '2025-05-01', '{"kind":"maybe"}', Date.now());
    raw.close();

    const loaded = repo.loadResults(60_000);
    repo.close();

    expect(loaded.size).toBe(1);
    expect(loaded.get('leg-1', '2025-05-01')).toEqual({ kind: 'none' });
    expect(warn.mock.calls.map(([, context]) => context)).toEqual([
      { legHash: 'leg-2', date: '2025-05-01' },
      { legHash: 'leg-3', date: '2025-05-01' },
      { legHash: 'leg-4', date: '2025-05-01' },
    ]);
  });
});
