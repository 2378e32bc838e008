/**
 * Generation Scheduler
 *
 * Serializes generation runs for watch mode. At most one run is in flight;
 * triggers that arrive meanwhile are coalesced into a single queued run
 * that starts once the current one settles.
 */

interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (reason: unknown) => void;
}

function createDeferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  let reject: (reason: unknown) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

export class GenerationScheduler<T> {
  private running: Promise<T> | null = null;
  private queued: Deferred<T> | null = null;
  private runs = 0;

  /**
   * @param task - One full generation run
   */
  constructor(private readonly task: () => Promise<T>) {}

  /** Whether a run is in flight */
  get isRunning(): boolean {
    return this.running !== null;
  }

  /** Whether a run is waiting for the current one */
  get hasQueued(): boolean {
    return this.queued !== null;
  }

  /** Number of runs started so far */
  get runCount(): number {
    return this.runs;
  }

  /**
   * Request a run. Starts one immediately when idle; otherwise every caller
   * until the next start shares the same queued run and its result.
   */
  trigger(): Promise<T> {
    if (this.running === null) {
      return this.start();
    }
    if (this.queued === null) {
      this.queued = createDeferred<T>();
    }
    return this.queued.promise;
  }

  /**
   * Resolves once no run is in flight or queued. Failures of those runs are
   * left to their own callers.
   */
  async idle(): Promise<void> {
    while (this.running !== null) {
      const current = this.queued?.promise ?? this.running;
      await current.then(
        () => undefined,
        () => undefined
      );
    }
  }

  private start(): Promise<T> {
    this.runs++;
    const run = Promise.resolve().then(() => this.task());
    this.running = run;

    const settle = (): void => {
      this.running = null;
      const next = this.queued;
      this.queued = null;
      if (next !== null) {
        this.start().then(next.resolve, next.reject);
      }
    };
    run.then(settle, settle);

    return run;
  }
}
