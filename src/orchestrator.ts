import { setTimeout as delay } from 'timers/promises';
import { CheckTimeoutError, WorkerFatalError, errorMessage } from './errors.js';
import { Logger } from './logger.js';
import { ResultStore } from './store.js';
import type { AvailabilityChecker, CheckerFactory, CheckResult, FailedCheck, Leg, RunSummary } from './types.js';

export type PacingPolicy = {
  /** 'global' counts successes across the whole run, 'worker' within each worker. */
  scope: 'global' | 'worker';
  /** Successful checks between cool-downs; 0 disables pacing. */
  every: number;
  coolDownMs: number;
};

export type CheckOptions = {
  workerCount: number;
  maxAttempts: number;
  checkTimeoutMs: number;
  retryDelayMs: number;
  pacing: PacingPolicy;
  checkDelayMs: { min: number; max: number };
};

export const DEFAULT_CHECK_OPTIONS: CheckOptions = {
  workerCount: 4,
  maxAttempts: 3,
  checkTimeoutMs: 60_000,
  retryDelayMs: 10_000,
  pacing: { scope: 'global', every: 40, coolDownMs: 30_000 },
  checkDelayMs: { min: 1000, max: 2000 },
};

export type OrchestratorDeps = {
  logger?: Logger;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
};

export type WorkerError = { workerId: number; message: string };

export type CheckRunReport = {
  store: ResultStore;
  summary: RunSummary;
  failed: FailedCheck[];
  workerErrors: WorkerError[];
};

type Tally = {
  checked: number;
  found: number;
  none: number;
  skipped: number;
  failed: FailedCheck[];
  workerErrors: WorkerError[];
};

/** Splits items into at most `parts` contiguous chunks whose sizes differ by at most one. */
export function chunk<T>(items: readonly T[], parts: number): T[][] {
  const n = Math.max(1, Math.min(Math.floor(parts), items.length));
  const base = Math.floor(items.length / n);
  const extra = items.length % n;
  const chunks: T[][] = [];
  let start = 0;
  for (let i = 0; i < n && start < items.length; i++) {
    const size = base + (i < extra ? 1 : 0);
    chunks.push(items.slice(start, start + size));
    start += size;
  }
  return chunks;
}

async function withTimeout<T>(work: Promise<T>, timeoutMs: number): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new CheckTimeoutError(timeoutMs)), timeoutMs);
  });
  try {
    return await Promise.race([work, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Counts successful checks and opens a cool-down window every `every` of them.
 * Workers compare the generation they last refreshed at against the current
 * one to know when their session is due for a refresh.
 */
export class CoolDown {
  private successes = 0;
  private window: Promise<void> | null = null;
  generation = 0;

  constructor(
    private readonly every: number,
    private readonly coolDownMs: number,
    private readonly sleep: (ms: number) => Promise<void>,
  ) {}

  recordSuccess(): boolean {
    this.successes++;
    if (this.every <= 0 || this.successes % this.every !== 0) return false;
    this.generation++;
    const window = this.sleep(this.coolDownMs).finally(() => {
      if (this.window === window) this.window = null;
    });
    this.window = window;
    return true;
  }

  async elapsed(): Promise<void> {
    while (this.window) await this.window;
  }
}

type Pair = { leg: Leg; date: string };

export class CheckOrchestrator {
  private readonly options: CheckOptions;
  private readonly logger: Logger;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly random: () => number;

  constructor(options: Partial<CheckOptions> = {}, deps: OrchestratorDeps = {}) {
    this.options = { ...DEFAULT_CHECK_OPTIONS, ...options };
    this.logger = deps.logger ?? new Logger('orchestrator');
    this.sleep = deps.sleep ?? ((ms) => delay(ms));
    this.random = deps.random ?? Math.random;
  }

  /**
   * Checks every leg on every date across a pool of workers, each owning its
   * own checker, and resolves once all of them have finished their chunk.
   * Individual failures end up as `failed` markers in the store, never as a
   * rejection.
   */
  async runChecks(
    legs: readonly Leg[],
    dates: readonly string[],
    createChecker: CheckerFactory,
    store: ResultStore = new ResultStore(),
  ): Promise<CheckRunReport> {
    const unique = [...new Map(legs.map((l) => [l.hash, l])).values()];
    const chunks = chunk(unique, this.options.workerCount);
    const { pacing } = this.options;
    const shared = new CoolDown(pacing.every, pacing.coolDownMs, this.sleep);
    const tally: Tally = { checked: 0, found: 0, none: 0, skipped: 0, failed: [], workerErrors: [] };

    this.logger.info('Starting availability checks', {
      legs: unique.length,
      dates: dates.length,
      workers: chunks.length,
      pacing: `${pacing.scope}/${pacing.every}`,
    });

    await Promise.all(
      chunks.map((legsForWorker, workerId) => {
        const pacer =
          pacing.scope === 'global' ? shared : new CoolDown(pacing.every, pacing.coolDownMs, this.sleep);
        const pairs = legsForWorker.flatMap((leg) => dates.map((date) => ({ leg, date })));
        return this.runWorker(workerId, pairs, createChecker, store, pacer, tally);
      }),
    );

    const summary: RunSummary = {
      checked: tally.checked,
      found: tally.found,
      none: tally.none,
      failed: tally.failed.length,
      skipped: tally.skipped,
      workerErrors: tally.workerErrors.length,
    };
    if (tally.failed.length) {
      this.logger.warn(`Results may be incomplete for ${tally.failed.length} leg/date pairs`, summary);
    } else {
      this.logger.info('Availability checks finished', summary);
    }
    return { store, summary, failed: tally.failed, workerErrors: tally.workerErrors };
  }

  private async runWorker(
    workerId: number,
    pairs: Pair[],
    createChecker: CheckerFactory,
    store: ResultStore,
    pacer: CoolDown,
    tally: Tally,
  ): Promise<void> {
    const log = this.logger.child(`worker-${workerId}`);
    let checker: AvailabilityChecker | null = null;
    let index = 0;

    try {
      try {
        checker = await createChecker(workerId);
        await checker.resetSession();
      } catch (e) {
        throw new WorkerFatalError(`Checker could not be started: ${errorMessage(e)}`, workerId);
      }

      let refreshedAt = pacer.generation;
      for (; index < pairs.length; index++) {
        const { leg, date } = pairs[index];
        if (store.isSettled(leg.hash, date)) {
          tally.skipped++;
          continue;
        }

        if (pacer.generation !== refreshedAt) {
          await this.refreshSession(checker, pacer, workerId, log);
          refreshedAt = pacer.generation;
        }

        let result: CheckResult;
        try {
          result = await this.checkWithRetries(checker, leg, date, workerId, log);
        } catch (e) {
          if (e instanceof WorkerFatalError) throw e;
          log.error('Unexpected error while checking', e, { origin: leg.origin, destination: leg.destination, date });
          result = { kind: 'transient-failure', reason: errorMessage(e) };
        }

        this.record(store, tally, leg, date, result);
        if (result.kind !== 'transient-failure' && pacer.recordSuccess()) {
          log.info('Pacing threshold reached, cooling down', { coolDownMs: this.options.pacing.coolDownMs });
        }
      }
    } catch (e) {
      const message = errorMessage(e);
      log.error('Worker stopped; remaining pairs marked as failed', e, { remaining: pairs.length - index });
      tally.workerErrors.push({ workerId, message });
      for (const { leg, date } of pairs.slice(index)) {
        if (store.isSettled(leg.hash, date)) continue;
        this.record(store, tally, leg, date, { kind: 'transient-failure', reason: `worker failed: ${message}` });
      }
    } finally {
      if (checker) {
        await checker.close().catch((e: unknown) => log.warn('Closing checker failed', { error: errorMessage(e) }));
      }
    }
  }

  /** Tear down, wait out the cool-down, re-acquire. */
  private async refreshSession(checker: AvailabilityChecker, pacer: CoolDown, workerId: number, log: Logger) {
    log.info('Refreshing checker session');
    await checker.close().catch((e: unknown) => log.warn('Closing checker failed', { error: errorMessage(e) }));
    await pacer.elapsed();
    await this.resetOrFail(checker, workerId);
  }

  private async checkWithRetries(
    checker: AvailabilityChecker,
    leg: Leg,
    date: string,
    workerId: number,
    log: Logger,
  ): Promise<CheckResult> {
    const { maxAttempts, checkTimeoutMs, retryDelayMs, checkDelayMs } = this.options;
    let reason = 'not attempted';
    let timedOut = false;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      const jitter = checkDelayMs.min + this.random() * (checkDelayMs.max - checkDelayMs.min);
      if (jitter > 0) await this.sleep(jitter);

      let result: CheckResult;
      try {
        result = await withTimeout(checker.check(leg, date), checkTimeoutMs);
        timedOut = false;
      } catch (e) {
        timedOut = e instanceof CheckTimeoutError;
        result = { kind: 'transient-failure', reason: errorMessage(e) };
      }
      if (result.kind !== 'transient-failure') return result;

      reason = result.reason;
      if (attempt === maxAttempts) break;

      log.warn(`Check attempt ${attempt}/${maxAttempts} failed`, {
        origin: leg.origin,
        destination: leg.destination,
        date,
        reason,
        nextRetryDelayMs: retryDelayMs,
      });
      await this.sleep(retryDelayMs);
      await this.resetOrFail(checker, workerId);
    }

    // An abandoned call may still be running on this session.
    if (timedOut) await this.resetOrFail(checker, workerId);

    return { kind: 'transient-failure', reason: `${maxAttempts} attempts failed, last: ${reason}` };
  }

  private async resetOrFail(checker: AvailabilityChecker, workerId: number): Promise<void> {
    try {
      await checker.resetSession();
    } catch (e) {
      throw new WorkerFatalError(`Session could not be re-acquired: ${errorMessage(e)}`, workerId);
    }
  }

  private record(store: ResultStore, tally: Tally, leg: Leg, date: string, result: CheckResult): void {
    switch (result.kind) {
      case 'occurrences':
        store.put(leg.hash, date, { kind: 'found', occurrences: result.occurrences });
        tally.checked++;
        if (result.occurrences.length) tally.found++;
        else tally.none++;
        return;
      case 'none-found':
        store.put(leg.hash, date, { kind: 'none' });
        tally.checked++;
        tally.none++;
        return;
      case 'transient-failure':
        store.put(leg.hash, date, { kind: 'failed', reason: result.reason });
        tally.failed.push({
          legHash: leg.hash,
          origin: leg.origin,
          destination: leg.destination,
          date,
          reason: result.reason,
        });
        return;
    }
  }
}
