import Database from "better-sqlite3";
import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import { errorMessage } from "../../core/domain/errors.js";
import {
  IArchiveStorage,
  StorageBackendKind,
  assertJobDocumentPath,
} from "../../core/domain/repositories/archive-storage.repository.js";
import { ILogger } from "../../core/domain/services/logger.service.js";
import { JOBS_OVERVIEW_PATH, StoredOverview } from "../../core/domain/types.js";

const OVERVIEW_PREFIX = "/overviews/";
// "0" is the character right after "/", so [prefix, end) covers the prefix
const OVERVIEW_PREFIX_END = "/overviews0";

/**
 * Key-value mirror in SQLite. Keys are REST paths, except per-job overviews
 * which live under /overviews/<jobId>. Every row remembers its job so a job
 * can be dropped in one statement.
 */
export class SqliteArchiveStorage implements IArchiveStorage {
  readonly kind: StorageBackendKind = "kvstore";
  private _db: Database.Database | null = null;

  constructor(
    private dbPath: string,
    private logger: ILogger,
  ) {}

  private getDb(): Database.Database {
    if (this._db) return this._db;
    if (this.dbPath !== ":memory:") {
      mkdirSync(dirname(this.dbPath), { recursive: true });
    }
    this._db = new Database(this.dbPath);
    this._db.pragma("journal_mode = WAL");
    this._db.pragma("busy_timeout = 5000");
    this._db.exec(`
      CREATE TABLE IF NOT EXISTS documents (
        key    TEXT PRIMARY KEY,
        job_id TEXT,
        value  TEXT NOT NULL
      );
      CREATE INDEX IF NOT EXISTS idx_documents_job_id ON documents (job_id);
    `);
    return this._db;
  }

  async initialize(): Promise<void> {
    this.getDb().prepare("DELETE FROM documents").run();
  }

  async put(jobId: string, path: string, json: string): Promise<void> {
    assertJobDocumentPath(jobId, path);
    const key = path === JOBS_OVERVIEW_PATH ? OVERVIEW_PREFIX + jobId : path;
    this.upsert(key, jobId, json);
  }

  async get(path: string): Promise<string | null> {
    const row = this.getDb()
      .prepare<[string], { value: string }>("SELECT value FROM documents WHERE key = ?")
      .get(path);
    return row ? row.value : null;
  }

  async delete(jobId: string): Promise<void> {
    try {
      this.getDb().prepare("DELETE FROM documents WHERE job_id = ?").run(jobId);
    } catch (e) {
      this.logger.warn("Could not delete job documents", { jobId, err: errorMessage(e) });
    }
  }

  async deleteOverview(jobId: string): Promise<void> {
    try {
      this.getDb()
        .prepare("DELETE FROM documents WHERE key = ?")
        .run(OVERVIEW_PREFIX + jobId);
    } catch (e) {
      this.logger.warn("Could not delete job overview", { jobId, err: errorMessage(e) });
    }
  }

  async listOverviews(): Promise<StoredOverview[]> {
    const rows = this.getDb()
      .prepare<[string, string], { key: string; value: string }>(
        "SELECT key, value FROM documents WHERE key >= ? AND key < ? ORDER BY key",
      )
      .all(OVERVIEW_PREFIX, OVERVIEW_PREFIX_END);
    return rows.map((r) => ({
      jobId: r.key.slice(OVERVIEW_PREFIX.length),
      json: r.value,
    }));
  }

  async exists(jobId: string): Promise<boolean> {
    const row = this.getDb()
      .prepare<[string], { found: number }>(
        "SELECT 1 AS found FROM documents WHERE job_id = ? LIMIT 1",
      )
      .get(jobId);
    return row !== undefined;
  }

  async writeCombinedOverview(json: string): Promise<void> {
    this.upsert(JOBS_OVERVIEW_PATH, null, json);
  }

  async close(): Promise<void> {
    if (this._db) {
      this._db.close();
      this._db = null;
    }
  }

  private upsert(key: string, jobId: string | null, value: string): void {
    this.getDb()
      .prepare(
        `INSERT INTO documents (key, job_id, value) VALUES (?, ?, ?)
         ON CONFLICT(key) DO UPDATE SET
           job_id = excluded.job_id,
           value  = excluded.value`,
      )
      .run(key, jobId, value);
  }
}
