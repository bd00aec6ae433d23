import type { Repository, SavedSearch } from './db.js';
import { errorMessage } from './errors.js';
import { Logger } from './logger.js';
import { runSearch, type SearchDeps, type SearchOutcome } from './search.js';

export type JobRunnerDeps = Omit<SearchDeps, 'store' | 'logger'> & {
  repo: Repository;
  cacheMaxAgeMs: number;
  logger?: Logger;
};

/**
 * Runs saved searches against the repository: seeds from cached results, persists new ones.
 * Runs execute one at a time: every run opens the same browser profiles, and a
 * queued run starts from the results the previous one saved.
 */
export class JobRunner {
  private readonly logger: Logger;
  private readonly active = new Map<number, Promise<void>>();
  private tail: Promise<void> = Promise.resolve();

  constructor(private readonly deps: JobRunnerDeps) {
    this.logger = deps.logger ?? new Logger('jobs');
  }

  /** Queues a run behind any run in progress; returns the run id. */
  start(search: SavedSearch): number {
    const runId = this.deps.repo.createRun(search.id);
    const job = this.enqueue(() => this.execute(runId, search))
      .then(() => undefined)
      .catch((e: unknown) => this.logger.error('Run failed', e, { runId, searchId: search.id }))
      .finally(() => this.active.delete(runId));
    this.active.set(runId, job);
    return runId;
  }

  /** Every saved search, one after another. */
  async runAllOnce(): Promise<void> {
    for (const search of this.deps.repo.listSearches()) {
      const runId = this.deps.repo.createRun(search.id);
      try {
        await this.enqueue(() => this.execute(runId, search));
      } catch (e) {
        this.logger.error('Scheduled run failed', e, { runId, searchId: search.id });
      }
    }
  }

  /** Resolves when every background run started so far has settled. */
  async idle(): Promise<void> {
    await Promise.all([...this.active.values()]);
  }

  private enqueue<T>(task: () => Promise<T>): Promise<T> {
    const next = this.tail.then(task);
    this.tail = next.then(
      () => undefined,
      () => undefined,
    );
    return next;
  }

  private async execute(runId: number, search: SavedSearch): Promise<SearchOutcome> {
    const { repo, cacheMaxAgeMs, ...searchDeps } = this.deps;
    const log = this.logger.child(`run-${runId}`);
    log.info('Run started', { searchId: search.id, tripType: search.tripType });
    repo.startRun(runId);
    try {
      const outcome = await runSearch(search, {
        ...searchDeps,
        store: repo.loadResults(cacheMaxAgeMs),
        logger: log,
      });
      repo.saveResults(outcome.store.snapshot());
      repo.completeRun(runId, outcome.summary, outcome.itineraries);
      log.info('Run completed', { itineraries: outcome.itineraries.length, ...outcome.summary });
      return outcome;
    } catch (e) {
      repo.failRun(runId, errorMessage(e));
      throw e;
    }
  }
}
