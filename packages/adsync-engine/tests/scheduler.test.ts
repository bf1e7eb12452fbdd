import { expect } from "chai";
import { BatchRunReport } from "../src/batch/orchestrator";
import { BatchRunner, BatchScheduler } from "../src/batch/scheduler";
import { captureLogger, sleep } from "./helpers/fakes";

const report = (ok: boolean): BatchRunReport => ({
  startedAt: new Date(0),
  finishedAt: new Date(0),
  tables: [],
  ok,
});

class FakeRunner implements BatchRunner {
  calls = 0;
  active = 0;
  maxActive = 0;
  stopRequests = 0;

  constructor(
    private readonly durationMs: number,
    private readonly outcome: () => boolean | Error = () => true,
  ) {}

  async runOnce(): Promise<BatchRunReport> {
    this.calls += 1;
    this.active += 1;
    this.maxActive = Math.max(this.maxActive, this.active);
    try {
      await sleep(this.durationMs);
      const outcome = this.outcome();
      if (outcome instanceof Error) {
        throw outcome;
      }
      return report(outcome);
    } finally {
      this.active -= 1;
    }
  }

  requestStop(): void {
    this.stopRequests += 1;
  }
}

describe("Batch scheduler", () => {
  it("should run immediately and never overlap runs", async () => {
    const runner = new FakeRunner(15);
    const scheduler = new BatchScheduler(runner, {
      intervalMs: 1,
      retryBackoffMs: 1,
      logger: captureLogger(),
    });

    scheduler.start();
    expect(runner.calls).to.equal(1);
    await sleep(80);
    await scheduler.stop();

    expect(runner.calls).to.be.greaterThan(1);
    expect(runner.maxActive).to.equal(1);
  });

  it("should back off after failed runs", async () => {
    const runner = new FakeRunner(0, () => false);
    const scheduler = new BatchScheduler(runner, {
      intervalMs: 60_000,
      retryBackoffMs: 1000,
      logger: captureLogger(),
    });

    expect(scheduler.nextDelay()).to.equal(60_000);
    scheduler.start();
    await sleep(20);

    expect(scheduler.failureStreak).to.equal(1);
    expect(scheduler.nextDelay()).to.equal(1000);
    await scheduler.stop();
    expect(runner.calls).to.equal(1);
  });

  it("should count a thrown run as a failure", async () => {
    const logger = captureLogger();
    const runner = new FakeRunner(0, () => new Error("source down"));
    const scheduler = new BatchScheduler(runner, {
      intervalMs: 60_000,
      retryBackoffMs: 1000,
      logger,
    });

    scheduler.start();
    await sleep(20);
    await scheduler.stop();

    expect(scheduler.failureStreak).to.equal(1);
    expect(logger.lines).to.include("error: Error: source down");
  });

  it("should reset the streak after a successful run", async () => {
    const outcomes = [false, true];
    const runner = new FakeRunner(0, () => outcomes.shift() ?? true);
    const scheduler = new BatchScheduler(runner, {
      intervalMs: 60_000,
      retryBackoffMs: 5,
      logger: captureLogger(),
    });

    scheduler.start();
    await sleep(60);
    await scheduler.stop();

    expect(runner.calls).to.equal(2);
    expect(scheduler.failureStreak).to.equal(0);
  });

  it("should wait for the in-flight run when stopped", async () => {
    const runner = new FakeRunner(30);
    const scheduler = new BatchScheduler(runner, {
      intervalMs: 1,
      retryBackoffMs: 1,
      logger: captureLogger(),
    });

    scheduler.start();
    await scheduler.stop();

    expect(runner.active).to.equal(0);
    expect(runner.stopRequests).to.equal(1);
    await sleep(20);
    expect(runner.calls).to.equal(1);
  });
});
