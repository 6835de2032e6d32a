import { readFile, readdir, rm, stat } from "node:fs/promises";
import { join } from "node:path";
import { fileURLToPath } from "node:url";
import {
  ConfigurationError,
  HousekeepingError,
  IngestionError,
  ListingError,
} from "../../core/domain/errors.js";
import { IArchiveSource } from "../../core/domain/services/archive-source.service.js";
import { ILogger } from "../../core/domain/services/logger.service.js";
import { ArchiveEntry, ArchivedJson, isValidJobId } from "../../core/domain/types.js";
import { parseArchiveBundle } from "../utils/archive-bundle.utils.js";

async function modificationTime(path: string): Promise<number | null> {
  try {
    return (await stat(path)).mtimeMs;
  } catch (e) {
    if (e instanceof Error && "code" in e && e.code === "ENOENT") return null;
    throw e;
  }
}

function directoryOf(fileUrl: string): string {
  try {
    return fileURLToPath(fileUrl);
  } catch (e) {
    throw new ConfigurationError(`Not a local file URL: ${fileUrl}`, { cause: e });
  }
}

/** Archive directory on a locally mounted file system. */
export class LocalArchiveSource implements IArchiveSource {
  private readonly dir: string;

  constructor(
    readonly location: string,
    private logger: ILogger,
  ) {
    this.dir = location.startsWith("file:") ? directoryOf(location) : location;
  }

  async list(): Promise<ArchiveEntry[]> {
    const entries: ArchiveEntry[] = [];
    try {
      // readdir order is whatever the file system returns; it is not re-sorted
      const dirents = await readdir(this.dir, { withFileTypes: true });
      for (const dirent of dirents) {
        if (!dirent.isFile()) continue;
        if (!isValidJobId(dirent.name)) {
          this.logger.debug("Ignoring entry that is not a job archive", {
            location: this.location,
            name: dirent.name,
          });
          continue;
        }
        const path = join(this.dir, dirent.name);
        const modifiedAt = await modificationTime(path);
        // deleted between readdir and stat
        if (modifiedAt === null) continue;
        entries.push({ jobId: dirent.name, location: this.location, path, modifiedAt });
      }
    } catch (e) {
      throw new ListingError(this.location, { cause: e });
    }
    return entries;
  }

  async read(entry: ArchiveEntry): Promise<ArchivedJson[]> {
    let raw: string;
    try {
      raw = await readFile(entry.path, "utf-8");
    } catch (e) {
      throw new IngestionError(entry.jobId, `Failed to read archive ${entry.path}`, {
        cause: e,
      });
    }
    return parseArchiveBundle(entry.jobId, raw);
  }

  async remove(entry: ArchiveEntry): Promise<void> {
    try {
      await rm(entry.path, { force: true });
    } catch (e) {
      throw new HousekeepingError(`Failed to delete archive ${entry.path}`, { cause: e });
    }
  }
}
