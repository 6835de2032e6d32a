import { IngestionError } from "../errors.js";
import { JOBS_OVERVIEW_PATH, StoredOverview } from "../types.js";

export type StorageBackendKind = "file" | "kvstore";

/**
 * A job may only write its own overview and documents in its own tree,
 * `/jobs/<jobId>` and below. Anything else could not be removed with the job.
 */
export function isJobDocumentPath(jobId: string, path: string): boolean {
  if (path === JOBS_OVERVIEW_PATH) return true;
  const root = `/jobs/${jobId}`;
  if (path === root) return true;
  if (!path.startsWith(`${root}/`)) return false;
  return path
    .slice(root.length + 1)
    .split("/")
    .every((segment) => segment !== "" && segment !== "." && segment !== "..");
}

export function assertJobDocumentPath(jobId: string, path: string): void {
  if (!isJobDocumentPath(jobId, path)) {
    throw new IngestionError(jobId, `Document path ${path} is outside the tree of job ${jobId}`);
  }
}

/**
 * Local mirror of extracted archive documents, keyed by REST path.
 *
 * Writes must be visible to readers as soon as they resolve, and a reader
 * never observes a partially written document.
 */
export interface IArchiveStorage {
  readonly kind: StorageBackendKind;

  /** Creates the layout and drops anything left from a previous run. */
  initialize(): Promise<void>;

  /**
   * Overwrites the document at `path`. The jobs overview path is stored as
   * the job's own overview rather than at the path itself. Rejects paths
   * outside the job's tree (see {@link isJobDocumentPath}).
   */
  put(jobId: string, path: string, json: string): Promise<void>;

  get(path: string): Promise<string | null>;

  /** Removes every document of the job. Never rejects. */
  delete(jobId: string): Promise<void>;

  /** Never rejects. */
  deleteOverview(jobId: string): Promise<void>;

  listOverviews(): Promise<StoredOverview[]>;

  exists(jobId: string): Promise<boolean>;

  writeCombinedOverview(json: string): Promise<void>;

  close(): Promise<void>;
}
