import { Config } from "../../core/domain/entities/config.entity.js";
import { IArchiveStorage } from "../../core/domain/repositories/archive-storage.repository.js";
import { ArchiveEventNotifier } from "../../core/domain/services/archive-event-notifier.js";
import { ILogger } from "../../core/domain/services/logger.service.js";
import { IObjectStoreClient } from "../../core/domain/services/object-store.service.js";
import { ArchiveEventListener } from "../../core/domain/types.js";
import { FetchArchivesUseCase } from "../../core/use-cases/fetch-archives.use-case.js";
import { RebuildOverviewUseCase } from "../../core/use-cases/rebuild-overview.use-case.js";
import { AwsObjectStoreClient } from "../services/aws-object-store.service.js";
import { createArchiveSources } from "../sources/archive-source.factory.js";
import { createArchiveStorage } from "../storage/archive-storage.factory.js";

export interface ArchiveFetcherDeps {
  logger: ILogger;
  listener?: ArchiveEventListener;
  /** Overrides the AWS client for s3:// locations. */
  objectStore?: IObjectStoreClient;
}

export interface ArchiveFetcher {
  fetcher: FetchArchivesUseCase;
  storage: IArchiveStorage;
  overview: RebuildOverviewUseCase;
}

/**
 * Wires sources, storage, overview and notifier from the configuration.
 * Throws ConfigurationError for an invalid retention policy.
 */
export function buildArchiveFetcher(config: Config, deps: ArchiveFetcherDeps): ArchiveFetcher {
  const { logger } = deps;
  const sources = createArchiveSources(config.archive.dirs, {
    logger,
    objectStore: () =>
      deps.objectStore ??
      new AwsObjectStoreClient({
        region: config.s3.region,
        endpoint: config.s3.endpoint,
        forcePathStyle: config.s3.forcePathStyle,
      }),
  });
  const storage = createArchiveStorage(config.storage, logger);
  const overview = new RebuildOverviewUseCase(storage, logger.child({ component: "overview" }));
  const notifier = new ArchiveEventNotifier(logger, deps.listener);
  const fetcher = new FetchArchivesUseCase(
    sources,
    storage,
    overview,
    notifier,
    logger.child({ component: "fetcher" }),
    {
      retainedJobs: config.archive.retainedJobs,
      cleanupExpiredJobs: config.archive.cleanupExpiredJobs,
      cleanupBeyondLimit: config.archive.cleanupBeyondLimit,
    },
  );
  return { fetcher, storage, overview };
}
