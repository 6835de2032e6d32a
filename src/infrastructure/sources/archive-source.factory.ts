import { IArchiveSource } from "../../core/domain/services/archive-source.service.js";
import { ILogger } from "../../core/domain/services/logger.service.js";
import { IObjectStoreClient } from "../../core/domain/services/object-store.service.js";
import { LocalArchiveSource } from "./local-archive-source.service.js";
import { S3ArchiveSource } from "./s3-archive-source.service.js";

export interface ArchiveSourceDeps {
  logger: ILogger;
  /** Called once, only if an S3 location is configured. */
  objectStore: () => IObjectStoreClient;
}

export function isS3Location(location: string): boolean {
  return /^s3a?:\/\//.test(location);
}

export function createArchiveSources(
  locations: readonly string[],
  deps: ArchiveSourceDeps,
): IArchiveSource[] {
  let client: IObjectStoreClient | undefined;
  return locations.map((location) => {
    const logger = deps.logger.child({ location });
    if (isS3Location(location)) {
      client ??= deps.objectStore();
      return new S3ArchiveSource(location, client, logger);
    }
    return new LocalArchiveSource(location, logger);
  });
}
