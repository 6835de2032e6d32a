import { ArchiveCacheState } from "../domain/entities/archive-cache-state.entity.js";
import { RETAIN_ALL_JOBS } from "../domain/entities/config.entity.js";
import {
  ConfigurationError,
  IngestionError,
  errorMessage,
} from "../domain/errors.js";
import { IArchiveStorage } from "../domain/repositories/archive-storage.repository.js";
import { ArchiveEventNotifier } from "../domain/services/archive-event-notifier.js";
import { IArchiveSource } from "../domain/services/archive-source.service.js";
import { migrateLegacyOverview } from "../domain/services/legacy-overview.migration.js";
import { ILogger } from "../domain/services/logger.service.js";
import {
  ArchiveEntry,
  ArchiveEvent,
  FetchCycleResult,
  JOBS_OVERVIEW_PATH,
  LEGACY_JOB_OVERVIEW_PATH,
} from "../domain/types.js";
import { RebuildOverviewUseCase } from "./rebuild-overview.use-case.js";

export interface RetentionPolicy {
  /** Entries kept per location, in listing order. -1 keeps all. */
  retainedJobs: number;
  /** Evict cached jobs whose archive disappeared from its location. */
  cleanupExpiredJobs: boolean;
  /** Evict (and delete upstream) entries listed after the first `retainedJobs`. */
  cleanupBeyondLimit: boolean;
}

interface BeyondLimitEntry {
  source: IArchiveSource;
  entry: ArchiveEntry;
}

export function validateRetentionPolicy(policy: RetentionPolicy): void {
  const { retainedJobs } = policy;
  if (
    !Number.isInteger(retainedJobs) ||
    retainedJobs === 0 ||
    retainedJobs < RETAIN_ALL_JOBS
  ) {
    throw new ConfigurationError(
      `Cannot set retained jobs to ${retainedJobs}; it must be -1 (unbounded) or at least 1.`,
    );
  }
}

/**
 * One reconciliation pass over all archive locations: ingests new archives,
 * evicts archives beyond the retention limit and archives that disappeared
 * upstream, refreshes the combined overview and notifies the listener.
 *
 * Cycles must not overlap; the scheduler serializes them.
 */
export class FetchArchivesUseCase {
  private readonly cache: ArchiveCacheState;
  private readonly processBeyondLimit: boolean;

  constructor(
    private sources: IArchiveSource[],
    private storage: IArchiveStorage,
    private overview: RebuildOverviewUseCase,
    private notifier: ArchiveEventNotifier,
    private logger: ILogger,
    private policy: RetentionPolicy,
  ) {
    validateRetentionPolicy(policy);
    if (sources.length === 0) {
      throw new ConfigurationError("At least one archive location is required.");
    }
    const locations = sources.map((s) => s.location);
    const duplicate = locations.find((l, i) => locations.indexOf(l) !== i);
    if (duplicate !== undefined) {
      throw new ConfigurationError(`Archive location configured twice: ${duplicate}`);
    }

    this.cache = new ArchiveCacheState(locations);
    this.processBeyondLimit =
      policy.cleanupBeyondLimit && policy.retainedJobs !== RETAIN_ALL_JOBS;
  }

  /** Prepares the storage and publishes an (empty) combined overview. */
  async initialize(): Promise<void> {
    await this.storage.initialize();
    await this.overview.execute();
    for (const source of this.sources) {
      this.logger.info("Monitoring directory for archived jobs", {
        location: source.location,
      });
    }
  }

  /** Read-only view for callers outside the cycle. */
  cachedJobIds(location: string): Set<string> {
    return this.cache.snapshot(location);
  }

  async execute(): Promise<FetchCycleResult> {
    const result: FetchCycleResult = {
      created: [],
      deleted: [],
      failedLocations: [],
      failedJobs: [],
      completed: false,
    };

    try {
      this.logger.debug("Starting archive fetching");
      const events: ArchiveEvent[] = [];
      const cachedAtStart = new Map<string, Set<string>>();
      const jobsToRemove = new Map<string, Set<string>>();
      for (const location of this.cache.locations()) {
        cachedAtStart.set(location, this.cache.snapshot(location));
        jobsToRemove.set(location, this.cache.snapshot(location));
      }
      const beyondSizeLimit: BeyondLimitEntry[] = [];

      for (const source of this.sources) {
        const location = source.location;
        this.logger.debug("Checking archive directory", { location });

        let entries: ArchiveEntry[];
        try {
          entries = await source.list();
        } catch (e) {
          // possibly a concurrent deletion; keep everything and retry next cycle
          this.logger.error("Failed to access job archive location", {
            location,
            err: errorMessage(e),
          });
          jobsToRemove.delete(location);
          result.failedLocations.push(location);
          continue;
        }

        const remaining = jobsToRemove.get(location) ?? new Set<string>();
        const cached = cachedAtStart.get(location) ?? new Set<string>();
        let historySize = 0;
        for (const entry of entries) {
          remaining.delete(entry.jobId);

          historySize++;
          if (this.processBeyondLimit && historySize > this.policy.retainedJobs) {
            beyondSizeLimit.push({ source, entry });
            continue;
          }

          if (cached.has(entry.jobId)) {
            this.logger.debug("Ignoring archive because it was already fetched", {
              path: entry.path,
            });
            continue;
          }

          // same job archived in another location; its documents are already stored
          if (this.cache.isHeldElsewhere(location, entry.jobId)) {
            this.logger.debug("Sharing archive already fetched from another location", {
              jobId: entry.jobId,
              path: entry.path,
            });
            this.cache.markIngested(location, entry.jobId);
            continue;
          }

          if (await this.ingest(source, entry)) {
            this.cache.markIngested(location, entry.jobId);
            events.push({ jobId: entry.jobId, type: "CREATED" });
            result.created.push(entry.jobId);
          } else {
            result.failedJobs.push(entry.jobId);
          }
        }
      }

      if (this.processBeyondLimit && beyondSizeLimit.length > 0) {
        events.push(...(await this.cleanupJobsBeyondSizeLimit(beyondSizeLimit)));
      }
      if (this.policy.cleanupExpiredJobs) {
        events.push(...(await this.cleanupExpiredJobs(jobsToRemove)));
      }

      if (events.length > 0) {
        await this.overview.execute();
      }
      this.notifier.notifyAll(events);

      result.deleted = events
        .filter((e) => e.type === "DELETED")
        .map((e) => e.jobId);
      result.completed = true;
      this.logger.debug("Finished archive fetching", {
        created: result.created.length,
        deleted: result.deleted.length,
      });
    } catch (e) {
      this.logger.error("Critical failure while fetching/processing job archives", {
        err: errorMessage(e),
      });
    }
    return result;
  }

  private async ingest(source: IArchiveSource, entry: ArchiveEntry): Promise<boolean> {
    const { jobId } = entry;
    this.logger.info("Processing archive", { jobId, path: entry.path });
    try {
      const documents = await source.read(entry);
      for (const document of documents) {
        let { path, json } = document;
        if (path === LEGACY_JOB_OVERVIEW_PATH) {
          this.logger.debug("Migrating legacy archive", { jobId, path: entry.path });
          json = migrateLegacyOverview(jobId, json);
          path = JOBS_OVERVIEW_PATH;
        }
        try {
          await this.storage.put(jobId, path, json);
        } catch (e) {
          throw new IngestionError(jobId, `Failed to store ${path} of job ${jobId}`, {
            cause: e,
          });
        }
      }
      this.logger.info("Processing archive finished", { jobId });
      return true;
    } catch (e) {
      this.logger.error("Failure while fetching/processing job archive", {
        jobId,
        err: errorMessage(e),
      });
      // no partial job may stay visible; it is offered again next cycle
      await this.storage.delete(jobId);
      return false;
    }
  }

  private async cleanupJobsBeyondSizeLimit(
    entries: BeyondLimitEntry[],
  ): Promise<ArchiveEvent[]> {
    const events: ArchiveEvent[] = [];
    for (const { source, entry } of entries) {
      this.logger.info("Removing archive beyond history size limit", {
        jobId: entry.jobId,
        path: entry.path,
      });
      try {
        await source.remove(entry);
      } catch (e) {
        this.logger.warn("Could not delete old archive", {
          path: entry.path,
          err: errorMessage(e),
        });
      }
      const event = await this.evict(source.location, entry.jobId);
      if (event) events.push(event);
    }
    return events;
  }

  private async cleanupExpiredJobs(
    jobsToRemove: Map<string, Set<string>>,
  ): Promise<ArchiveEvent[]> {
    const events: ArchiveEvent[] = [];
    for (const [location, jobIds] of jobsToRemove) {
      for (const jobId of jobIds) {
        this.logger.info("Removing expired archive", { jobId, location });
        const event = await this.evict(location, jobId);
        if (event) events.push(event);
      }
    }
    return events;
  }

  /**
   * Drops the id from one location. The documents go only with the last
   * location holding the id; until then there is nothing to announce.
   */
  private async evict(location: string, jobId: string): Promise<ArchiveEvent | null> {
    this.cache.markEvicted(location, jobId);
    if (this.cache.isHeldElsewhere(location, jobId)) {
      this.logger.debug("Keeping job still archived in another location", { jobId, location });
      return null;
    }
    await this.storage.delete(jobId);
    return { jobId, type: "DELETED" };
  }
}
