import { randomUUID } from "node:crypto";
import { mkdir, readFile, readdir, rename, rm, stat, writeFile } from "node:fs/promises";
import { dirname, join, relative, resolve, sep } from "node:path";
import { errorMessage } from "../../core/domain/errors.js";
import {
  IArchiveStorage,
  StorageBackendKind,
  assertJobDocumentPath,
} from "../../core/domain/repositories/archive-storage.repository.js";
import { ILogger } from "../../core/domain/services/logger.service.js";
import { JOBS_OVERVIEW_PATH, StoredOverview } from "../../core/domain/types.js";

const JSON_FILE_ENDING = ".json";

function isNotFound(e: unknown): boolean {
  return e instanceof Error && "code" in e && e.code === "ENOENT";
}

/**
 * Mirrors the REST hierarchy on disk:
 *   <root>/jobs/<path>.json        job documents
 *   <root>/jobs/overview.json      combined overview
 *   <root>/overviews/<jobId>.json  per-job overviews
 */
export class FileArchiveStorage implements IArchiveStorage {
  readonly kind: StorageBackendKind = "file";
  private readonly rootDir: string;
  private readonly jobsDir: string;
  private readonly overviewsDir: string;

  constructor(
    rootDir: string,
    private logger: ILogger,
  ) {
    this.rootDir = resolve(rootDir);
    this.jobsDir = join(this.rootDir, "jobs");
    this.overviewsDir = join(this.rootDir, "overviews");
  }

  async initialize(): Promise<void> {
    await rm(this.jobsDir, { recursive: true, force: true });
    await rm(this.overviewsDir, { recursive: true, force: true });
    await mkdir(this.jobsDir, { recursive: true });
    await mkdir(this.overviewsDir, { recursive: true });
  }

  async put(jobId: string, path: string, json: string): Promise<void> {
    assertJobDocumentPath(jobId, path);
    const target =
      path === JOBS_OVERVIEW_PATH ? this.overviewFile(jobId) : this.documentFile(path);
    if (target === null) {
      throw new Error(`Document path ${path} of job ${jobId} escapes the storage directory`);
    }
    await this.replaceFile(target, json);
  }

  async get(path: string): Promise<string | null> {
    const file = this.documentFile(path);
    if (file === null) return null;
    try {
      return await readFile(file, "utf-8");
    } catch (e) {
      if (isNotFound(e)) return null;
      throw e;
    }
  }

  async delete(jobId: string): Promise<void> {
    // the overview goes first so the job drops out of the next combined overview
    await this.deleteOverview(jobId);
    await this.bestEffort("Could not clean up job directory", () =>
      rm(join(this.jobsDir, jobId), { recursive: true, force: true }),
    );
    await this.bestEffort("Could not delete file from job directory", () =>
      rm(join(this.jobsDir, jobId + JSON_FILE_ENDING), { force: true }),
    );
  }

  async deleteOverview(jobId: string): Promise<void> {
    await this.bestEffort("Could not delete file from overview directory", () =>
      rm(this.overviewFile(jobId), { force: true }),
    );
  }

  async listOverviews(): Promise<StoredOverview[]> {
    let names: string[];
    try {
      names = await readdir(this.overviewsDir);
    } catch (e) {
      if (isNotFound(e)) return [];
      throw e;
    }

    const overviews: StoredOverview[] = [];
    for (const name of names) {
      if (!name.endsWith(JSON_FILE_ENDING)) continue;
      try {
        const json = await readFile(join(this.overviewsDir, name), "utf-8");
        overviews.push({ jobId: name.slice(0, -JSON_FILE_ENDING.length), json });
      } catch (e) {
        // removed while listing
        if (isNotFound(e)) continue;
        throw e;
      }
    }
    return overviews;
  }

  async exists(jobId: string): Promise<boolean> {
    const candidates = [
      this.overviewFile(jobId),
      join(this.jobsDir, jobId),
      join(this.jobsDir, jobId + JSON_FILE_ENDING),
    ];
    for (const candidate of candidates) {
      try {
        await stat(candidate);
        return true;
      } catch (e) {
        if (!isNotFound(e)) throw e;
      }
    }
    return false;
  }

  async writeCombinedOverview(json: string): Promise<void> {
    await this.replaceFile(join(this.jobsDir, "overview" + JSON_FILE_ENDING), json);
  }

  async close(): Promise<void> {}

  private overviewFile(jobId: string): string {
    return join(this.overviewsDir, jobId + JSON_FILE_ENDING);
  }

  /** File for a REST path, or null if the path points outside the root. */
  private documentFile(path: string): string | null {
    const file = resolve(this.rootDir, path.replace(/^\/+/, "") + JSON_FILE_ENDING);
    const rel = relative(this.rootDir, file);
    if (rel.startsWith(".." + sep) || rel === "..") return null;
    return file;
  }

  /**
   * Writes beside the target and renames over it, so a previous (possibly
   * incomplete) file is replaced in one step and never appended to.
   */
  private async replaceFile(target: string, content: string): Promise<void> {
    await mkdir(dirname(target), { recursive: true });
    const tmp = `${target}.${randomUUID()}.tmp`;
    try {
      await writeFile(tmp, content, "utf-8");
      await rename(tmp, target);
    } catch (e) {
      await rm(tmp, { force: true });
      throw e;
    }
  }

  private async bestEffort(message: string, action: () => Promise<void>): Promise<void> {
    try {
      await action();
    } catch (e) {
      this.logger.warn(message, { err: errorMessage(e) });
    }
  }
}
