import { Logger, backoffDelay, buildLogger, logError } from "../commons";
import { BatchRunReport } from "./orchestrator";

export interface BatchRunner {
  runOnce(): Promise<BatchRunReport>;
  requestStop(): void;
}

export interface SchedulerOptions {
  intervalMs: number;
  /** First delay after a failed run; doubles per consecutive failure up to `intervalMs`. */
  retryBackoffMs: number;
  logger?: Logger;
  onRun?: (report: BatchRunReport) => void;
}

/**
 * Single-threaded periodic loop. The next tick is scheduled only once the
 * current run has finished, so runs never overlap.
 */
export class BatchScheduler {
  private timer: NodeJS.Timeout | undefined;
  private inFlight: Promise<void> | undefined;
  private stopped = true;
  private consecutiveFailures = 0;
  private readonly logger: Logger;

  constructor(
    private readonly runner: BatchRunner,
    private readonly options: SchedulerOptions,
  ) {
    this.logger = options.logger ?? buildLogger("batch:scheduler");
  }

  get failureStreak(): number {
    return this.consecutiveFailures;
  }

  /** Runs immediately, then keeps ticking until `stop()`. */
  start(): void {
    if (!this.stopped) {
      return;
    }
    this.stopped = false;
    this.logger.log(`Starting; interval ${this.options.intervalMs}ms`);
    this.tick();
  }

  /** Cancels the pending tick and waits for the in-flight run. */
  async stop(): Promise<void> {
    this.stopped = true;
    if (this.timer !== undefined) {
      clearTimeout(this.timer);
      this.timer = undefined;
    }
    if (this.inFlight !== undefined) {
      this.logger.log("Waiting for the in-flight run to finish");
      this.runner.requestStop();
      await this.inFlight;
    }
    this.logger.log("Stopped");
  }

  /** Delay before the next run given the current failure streak. */
  nextDelay(): number {
    if (this.consecutiveFailures === 0) {
      return this.options.intervalMs;
    }
    return backoffDelay(
      this.consecutiveFailures,
      this.options.retryBackoffMs,
      this.options.intervalMs,
    );
  }

  private tick(): void {
    this.timer = undefined;
    this.inFlight = this.runAndReschedule().finally(() => {
      this.inFlight = undefined;
    });
  }

  private async runAndReschedule(): Promise<void> {
    try {
      const report = await this.runner.runOnce();
      this.consecutiveFailures = report.ok ? 0 : this.consecutiveFailures + 1;
      this.options.onRun?.(report);
    } catch (error) {
      this.consecutiveFailures += 1;
      logError(this.logger, error);
    }

    if (this.stopped) {
      return;
    }
    const delay = this.nextDelay();
    if (this.consecutiveFailures > 0) {
      this.logger.warn(
        `Run incomplete (${this.consecutiveFailures} in a row); retrying in ${delay}ms`,
      );
    }
    this.timer = setTimeout(() => this.tick(), delay);
  }
}
