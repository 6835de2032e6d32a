import cron from "node-cron";
import type { ScheduledTask } from "node-cron";
import PQueue from "p-queue";
import { ConfigurationError, errorMessage } from "../../core/domain/errors.js";
import { ILogger } from "../../core/domain/services/logger.service.js";
import { FetchCycleResult } from "../../core/domain/types.js";

export interface FetchCycle {
  execute(): Promise<FetchCycleResult>;
}

export interface RefreshSchedulerOptions {
  /** node-cron expression; a leading seconds field is allowed. */
  cron: string;
  /** Run a cycle as soon as the scheduler starts. */
  runOnStart?: boolean;
}

function incompleteResult(): FetchCycleResult {
  return { created: [], deleted: [], failedLocations: [], failedJobs: [], completed: false };
}

/**
 * Runs fetch cycles on a cron schedule and on demand. Cycles go through a
 * single-slot queue: one runs at a time, and triggers that arrive while a
 * run is already waiting share that run.
 */
export class RefreshScheduler {
  private readonly queue = new PQueue({ concurrency: 1 });
  private task: ScheduledTask | null = null;
  private queued: Promise<FetchCycleResult> | null = null;

  constructor(
    private fetcher: FetchCycle,
    private logger: ILogger,
    private options: RefreshSchedulerOptions,
  ) {}

  /** Resolves after the first cycle when `runOnStart` is set. */
  async start(): Promise<void> {
    if (!cron.validate(this.options.cron)) {
      throw new ConfigurationError(`Invalid refresh cron expression: ${this.options.cron}`);
    }
    if (this.task) return;

    this.task = cron.schedule(this.options.cron, () => {
      void this.trigger();
    });
    this.logger.info("Archive refresh scheduled", { cron: this.options.cron });

    if (this.options.runOnStart) {
      await this.trigger();
    }
  }

  /** Never rejects; a failed cycle resolves with `completed: false`. */
  trigger(): Promise<FetchCycleResult> {
    if (this.queue.size > 0 && this.queued) {
      this.logger.debug("Archive fetch already queued; coalescing trigger");
      return this.queued;
    }
    const run = this.enqueue();
    this.queued = run;
    return run;
  }

  isRunning(): boolean {
    return this.queue.pending > 0;
  }

  /** Stops scheduling and waits for queued cycles to finish. */
  async stop(): Promise<void> {
    if (this.task) {
      this.task.stop();
      this.task = null;
    }
    await this.queue.onIdle();
  }

  private async enqueue(): Promise<FetchCycleResult> {
    let result = incompleteResult();
    await this.queue.add(async () => {
      result = await this.runCycle();
    });
    return result;
  }

  private async runCycle(): Promise<FetchCycleResult> {
    try {
      return await this.fetcher.execute();
    } catch (e) {
      this.logger.error("Archive fetch cycle failed", { err: errorMessage(e) });
      return incompleteResult();
    }
  }
}
