import { z } from "zod";
import { IArchiveStorage } from "../domain/repositories/archive-storage.repository.js";
import { ILogger } from "../domain/services/logger.service.js";
import { errorMessage } from "../domain/errors.js";
import { StoredOverview } from "../domain/types.js";

// Stored overviews are kept as written; only the fields needed to merge are checked.
const StoredJobSchema = z.object({ jid: z.string() }).passthrough();
const StoredOverviewSchema = z.object({ jobs: z.array(StoredJobSchema) });

type StoredJob = z.infer<typeof StoredJobSchema>;

/**
 * Every archive carries its own jobs overview listing just that job. The
 * combined overview lists all of them, the way a live cluster would answer
 * for all finished jobs.
 */
export class RebuildOverviewUseCase {
  constructor(
    private storage: IArchiveStorage,
    private logger: ILogger,
  ) {}

  /** Returns the number of jobs published, or false when publishing failed. */
  async execute(): Promise<number | false> {
    let overviews: StoredOverview[];
    try {
      overviews = await this.storage.listOverviews();
    } catch (e) {
      this.logger.error("Failed to update job overview", { err: errorMessage(e) });
      return false;
    }

    const jobs: StoredJob[] = [];
    const seen = new Set<string>();
    for (const { jobId, json } of overviews) {
      let parsed: z.infer<typeof StoredOverviewSchema>;
      try {
        parsed = StoredOverviewSchema.parse(JSON.parse(json));
      } catch (e) {
        this.logger.warn("Skipping unreadable job overview", {
          jobId,
          err: errorMessage(e),
        });
        continue;
      }
      for (const job of parsed.jobs) {
        if (seen.has(job.jid)) continue;
        seen.add(job.jid);
        jobs.push(job);
      }
    }

    try {
      await this.storage.writeCombinedOverview(JSON.stringify({ jobs }));
    } catch (e) {
      this.logger.error("Failed to update job overview", { err: errorMessage(e) });
      return false;
    }
    this.logger.debug("Job overview updated", { jobs: jobs.length });
    return jobs.length;
  }
}
