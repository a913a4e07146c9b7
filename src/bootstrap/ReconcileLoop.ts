import { Logger } from '../logging/Logger';
import { CycleOutcome, RecordReconciler } from '../reconciler';
import { NetworkError } from '../errors';

export interface ReconcileLoopOptions {
  pollIntervalMs: number;
  cycleTimeoutMs: number;
}

/**
 * Invokes the reconciler once per poll interval. The next cycle is only
 * scheduled after the previous one settled, so cycles never overlap.
 */
export class ReconcileLoop {
  private timer: NodeJS.Timeout | undefined;
  private inFlight: Promise<CycleOutcome> | undefined;
  /** The reconciler call itself, which can outlive a timed-out cycle */
  private reconciling: Promise<CycleOutcome> | undefined;
  private stopped = true;

  constructor(
    private readonly reconciler: RecordReconciler,
    private readonly logger: Logger,
    private readonly options: ReconcileLoopOptions
  ) {}

  public start(): void {
    if (!this.stopped) return;
    this.stopped = false;
    this.logger.info(`Checking DNS record every ${Math.round(this.options.pollIntervalMs / 1000)}s`);
    this.tick();
  }

  /** Stops scheduling and waits for a cycle that is still running, timed out or not. */
  public async stop(): Promise<void> {
    this.stopped = true;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = undefined;
    }
    if (this.inFlight) {
      await this.inFlight;
    }
    if (this.reconciling) {
      await this.reconciling.catch((error: unknown) => this.logger.error('Abandoned cycle crashed', error));
    }
  }

  public async runOnce(): Promise<CycleOutcome> {
    const cycle = this.runCycle();
    this.inFlight = cycle;
    try {
      return await cycle;
    } finally {
      this.inFlight = undefined;
    }
  }

  private tick(): void {
    this.timer = undefined;
    void this.runOnce()
      .catch((error: unknown) => this.logger.error('Reconciliation cycle crashed', error))
      .finally(() => {
        if (this.stopped) return;
        this.timer = setTimeout(() => this.tick(), this.options.pollIntervalMs);
      });
  }

  private async runCycle(): Promise<CycleOutcome> {
    if (this.reconciling) {
      const error = new NetworkError('Previous reconciliation cycle is still running, skipping this one');
      this.logger.warn(error.message);
      return { status: 'failed', step: 'cycle', error };
    }

    const reconciling = this.reconciler.reconcile();
    this.reconciling = reconciling;
    const settled = () => {
      if (this.reconciling === reconciling) this.reconciling = undefined;
    };
    void reconciling.then(settled, settled);

    let timeout: NodeJS.Timeout | undefined;
    const timedOut = new Promise<CycleOutcome>(resolve => {
      timeout = setTimeout(() => {
        const error = new NetworkError(`Reconciliation cycle timed out after ${this.options.cycleTimeoutMs}ms`);
        this.logger.warn(error.message);
        resolve({ status: 'failed', step: 'cycle', error });
      }, this.options.cycleTimeoutMs);
    });

    try {
      const outcome = await Promise.race([reconciling, timedOut]);
      this.logOutcome(outcome);
      return outcome;
    } finally {
      clearTimeout(timeout);
    }
  }

  private logOutcome(outcome: CycleOutcome): void {
    switch (outcome.status) {
      case 'skipped':
        this.logger.debug(`Cycle finished: skipped (${outcome.reason})`);
        break;
      case 'unchanged':
        this.logger.debug(`Cycle finished: ${outcome.ip} already published`);
        break;
      case 'updated':
        this.logger.debug(`Cycle finished: ${outcome.previousIp} -> ${outcome.ip}`);
        break;
      case 'failed':
        this.logger.debug(`Cycle finished: failed during ${outcome.step} (${outcome.error.code})`);
        break;
    }
  }
}
