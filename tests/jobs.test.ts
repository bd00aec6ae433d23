import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { Repository } from '../src/db.js';
import { JobRunner } from '../src/jobs.js';
import { RouteGraph } from '../src/routes.js';
import { FakeChecker, fastChecks, noSleep } from './helpers.js';

const graph = new RouteGraph({ AAA: ['BBB'], BBB: ['AAA', 'CCC'], CCC: ['BBB'] });

describe('JobRunner', () => {
  let repo: Repository;
  let checkers: FakeChecker[];
  let jobs: JobRunner;

  beforeEach(() => {
    repo = new Repository(':memory:');
    checkers = [];
    jobs = new JobRunner({
      repo,
      graph,
      cacheMaxAgeMs: 60_000,
      checks: fastChecks,
      sleep: noSleep(),
      createChecker: () => {
        const checker = new FakeChecker();
        checkers.push(checker);
        return checker;
      },
    });
  });

  afterEach(() => repo.close());

  it('runs a saved search in the background and stores its outcome', async () => {
    const searchId = repo.addSearch({
      tripType: 'oneway',
      departures: ['AAA'],
      destinations: ['CCC'],
      maxStops: 1,
      startDate: '2025-05-01',
      days: 2,
    });
    const search = repo.getSearch(searchId);
    if (!search) throw new Error('search not saved');

    const runId = jobs.start(search);
    expect(repo.getRun(runId)?.status).toBe('queued');
    await jobs.idle();

    const run = repo.getRun(runId);
    expect(run?.status).toBe('completed');
    expect(run?.summary).toEqual({ checked: 4, found: 4, none: 0, failed: 0, skipped: 0, workerErrors: 0 });
    expect(run?.itineraries).toHaveLength(1);
    expect(repo.loadResults(60_000).size).toBe(4);
  });

  it('serves a repeated run from cached results', async () => {
    repo.addSearch({ tripType: 'oneway', departures: ['AAA'], destinations: ['BBB'], maxStops: 0, startDate: '2025-05-01', days: 3 });

    await jobs.runAllOnce();
    await jobs.runAllOnce();

    expect(checkers).toHaveLength(2);
    expect(checkers[0].calls).toHaveLength(3);
    expect(checkers[1].calls).toEqual([]);
    expect(repo.getRun(2)?.summary?.skipped).toBe(3);
  });

  it('marks the run failed when the search cannot be enumerated', async () => {
    const searchId = repo.addSearch({ tripType: 'oneway', departures: ['ZZZ'], destinations: [], maxStops: 0, startDate: '2025-05-01', days: 1 });
    const search = repo.getSearch(searchId);
    if (!search) throw new Error('search not saved');

    const runId = jobs.start(search);
    await jobs.idle();

    expect(repo.getRun(runId)).toMatchObject({ status: 'failed', error: 'Unknown airport code(s): ZZZ' });
    expect(checkers).toEqual([]);
  });

  it('runs one search at a time and lets a queued run reuse the results', async () => {
    let open = 0;
    let maxOpen = 0;
    class TrackedChecker extends FakeChecker {
      constructor() {
        super();
        open++;
        maxOpen = Math.max(maxOpen, open);
      }

      async close(): Promise<void> {
        open--;
        await super.close();
      }
    }
    const runner = new JobRunner({
      repo,
      graph,
      cacheMaxAgeMs: 60_000,
      checks: { ...fastChecks, workerCount: 1 },
      sleep: noSleep(),
      createChecker: () => new TrackedChecker(),
    });
    const searchId = repo.addSearch({
      tripType: 'oneway',
      departures: ['AAA'],
      destinations: ['CCC'],
      maxStops: 1,
      startDate: '2025-05-01',
      days: 2,
    });
    const search = repo.getSearch(searchId);
    if (!search) throw new Error('search not saved');

    const first = runner.start(search);
    const second = runner.start(search);
    expect(repo.getRun(second)?.status).toBe('queued');
    await runner.idle();

    expect(maxOpen).toBe(1);
    expect(repo.getRun(first)?.summary).toMatchObject({ checked: 4, skipped: 0 });
    expect(repo.getRun(second)).toMatchObject({ status: 'completed', summary: { checked: 0, skipped: 4 } });
  });

  it('starts the next queued run after one fails', async () => {
    const badId = repo.addSearch({ tripType: 'oneway', departures: ['ZZZ'], destinations: [], maxStops: 0, startDate: '2025-05-01', days: 1 });
    const goodId = repo.addSearch({ tripType: 'oneway', departures: ['AAA'], destinations: ['BBB'], maxStops: 0, startDate: '2025-05-01', days: 1 });
    const bad = repo.getSearch(badId);
    const good = repo.getSearch(goodId);
    if (!bad || !good) throw new Error('search not saved');

    const badRun = jobs.start(bad);
    const goodRun = jobs.start(good);
    await jobs.idle();

    expect(repo.getRun(badRun)?.status).toBe('failed');
    expect(repo.getRun(goodRun)?.status).toBe('completed');
  });
});
