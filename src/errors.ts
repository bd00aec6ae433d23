/** Bad input or environment; raised before any check is started. */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/** The checking capability could not be created or re-acquired for a worker. */
export class WorkerFatalError extends Error {
  constructor(
    message: string,
    public readonly workerId: number,
  ) {
    super(message);
    this.name = 'WorkerFatalError';
  }
}

export class CheckTimeoutError extends Error {
  constructor(public readonly timeoutMs: number) {
    super(`Availability check timed out after ${timeoutMs}ms`);
    this.name = 'CheckTimeoutError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
