import {
  ConfigurationError,
  HousekeepingError,
  IngestionError,
  ListingError,
} from "../../core/domain/errors.js";
import { IArchiveSource } from "../../core/domain/services/archive-source.service.js";
import { ILogger } from "../../core/domain/services/logger.service.js";
import {
  IObjectStoreClient,
  StoredObject,
} from "../../core/domain/services/object-store.service.js";
import { ArchiveEntry, ArchivedJson, isValidJobId } from "../../core/domain/types.js";
import { parseArchiveBundle } from "../utils/archive-bundle.utils.js";

export interface S3Location {
  bucket: string;
  /** Empty, or ends with "/". */
  prefix: string;
}

export function parseS3Location(location: string): S3Location {
  const match = /^s3a?:\/\/([^/]+)\/?(.*)$/.exec(location);
  if (!match) {
    throw new ConfigurationError(`Not an S3 location: ${location}`);
  }
  const [, bucket, path] = match;
  const trimmed = path.replace(/^\/+|\/+$/g, "");
  return { bucket, prefix: trimmed ? `${trimmed}/` : "" };
}

/**
 * Archive directory in an S3 bucket: the objects directly below the prefix.
 * Listing order is the store's (lexicographic by key).
 */
export class S3ArchiveSource implements IArchiveSource {
  private readonly bucket: string;
  private readonly prefix: string;

  constructor(
    readonly location: string,
    private client: IObjectStoreClient,
    private logger: ILogger,
  ) {
    const parsed = parseS3Location(location);
    this.bucket = parsed.bucket;
    this.prefix = parsed.prefix;
  }

  async list(): Promise<ArchiveEntry[]> {
    let objects: StoredObject[];
    try {
      objects = await this.client.listObjects(this.bucket, this.prefix);
    } catch (e) {
      throw new ListingError(this.location, { cause: e });
    }

    const entries: ArchiveEntry[] = [];
    for (const { key, lastModified } of objects) {
      const name = key.slice(this.prefix.length);
      if (!key.startsWith(this.prefix) || !isValidJobId(name)) {
        this.logger.debug("Ignoring entry that is not a job archive", {
          location: this.location,
          key,
        });
        continue;
      }
      entries.push({
        jobId: name,
        location: this.location,
        path: key,
        modifiedAt: lastModified,
      });
    }
    return entries;
  }

  async read(entry: ArchiveEntry): Promise<ArchivedJson[]> {
    let raw: string;
    try {
      raw = await this.client.getObjectText(this.bucket, entry.path);
    } catch (e) {
      throw new IngestionError(
        entry.jobId,
        `Failed to read archive s3://${this.bucket}/${entry.path}`,
        { cause: e },
      );
    }
    return parseArchiveBundle(entry.jobId, raw);
  }

  async remove(entry: ArchiveEntry): Promise<void> {
    try {
      await this.client.deleteObject(this.bucket, entry.path);
    } catch (e) {
      throw new HousekeepingError(
        `Failed to delete archive s3://${this.bucket}/${entry.path}`,
        { cause: e },
      );
    }
  }
}
