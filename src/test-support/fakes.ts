import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { HousekeepingError, IngestionError, ListingError } from "../core/domain/errors.js";
import { IArchiveSource } from "../core/domain/services/archive-source.service.js";
import { ILogger, LogFields } from "../core/domain/services/logger.service.js";
import {
  IObjectStoreClient,
  StoredObject,
} from "../core/domain/services/object-store.service.js";
import { ArchiveEntry, ArchivedJson, JobDetails, JobStatus } from "../core/domain/types.js";

export interface LogRecord {
  level: "debug" | "info" | "warn" | "error";
  msg: string;
  fields: LogFields;
}

export class RecordingLogger implements ILogger {
  constructor(
    readonly records: LogRecord[] = [],
    private readonly bindings: LogFields = {},
  ) {}

  debug(msg: string, fields?: LogFields): void {
    this.record("debug", msg, fields);
  }
  info(msg: string, fields?: LogFields): void {
    this.record("info", msg, fields);
  }
  warn(msg: string, fields?: LogFields): void {
    this.record("warn", msg, fields);
  }
  error(msg: string, fields?: LogFields): void {
    this.record("error", msg, fields);
  }
  child(bindings: LogFields): ILogger {
    return new RecordingLogger(this.records, { ...this.bindings, ...bindings });
  }

  messages(level: LogRecord["level"]): string[] {
    return this.records.filter((r) => r.level === level).map((r) => r.msg);
  }

  private record(level: LogRecord["level"], msg: string, fields?: LogFields): void {
    this.records.push({ level, msg, fields: { ...this.bindings, ...(fields ?? {}) } });
  }
}

/** Deterministic 32-hex job id. */
export function jobId(n: number): string {
  return n.toString(16).padStart(32, "0");
}

export function jobDetails(id: string, overrides: Partial<JobDetails> = {}): JobDetails {
  return {
    jid: id,
    name: `job-${id.slice(-4)}`,
    "start-time": 1000,
    "end-time": 2000,
    duration: 1000,
    state: "FINISHED",
    "last-modification": 2000,
    tasks: {
      total: 4,
      created: 0,
      scheduled: 0,
      deploying: 0,
      running: 0,
      finished: 4,
      canceling: 0,
      canceled: 0,
      failed: 0,
      reconciling: 0,
      initializing: 0,
    },
    ...overrides,
  };
}

export function overviewJson(id: string): string {
  return JSON.stringify({ jobs: [jobDetails(id)] });
}

export function legacyOverviewJson(
  id: string,
  options: { pending?: number; state?: JobStatus } = {},
): string {
  const split =
    options.pending === undefined
      ? { created: 1, scheduled: 2, deploying: 3 }
      : { pending: options.pending };
  return JSON.stringify({
    finished: [
      {
        jid: id,
        name: "testjob",
        state: options.state ?? "FINISHED",
        "start-time": 0,
        "end-time": 1,
        duration: 1,
        "last-modification": 1,
        tasks: {
          total: 10,
          ...split,
          running: 0,
          finished: 4,
          canceling: 0,
          canceled: 0,
          failed: 0,
        },
      },
    ],
  });
}

/** The documents of a current-format archive. */
export function archiveDocuments(id: string): ArchivedJson[] {
  return [
    { path: "/jobs/overview", json: overviewJson(id) },
    { path: `/jobs/${id}`, json: JSON.stringify({ jid: id, vertices: [] }) },
    { path: `/jobs/${id}/vertices`, json: JSON.stringify({ vertices: [] }) },
  ];
}

export type FakeArchiveContent = ArchivedJson[] | Error;

/**
 * In-memory archive location. Entries are listed in insertion order;
 * `remove` deletes them, as an upstream delete would.
 */
export class FakeArchiveSource implements IArchiveSource {
  private readonly archives = new Map<string, FakeArchiveContent>();
  failListing = false;
  readonly removed: string[] = [];
  readonly reads: string[] = [];

  constructor(readonly location: string) {}

  add(id: string, content: FakeArchiveContent = archiveDocuments(id)): this {
    this.archives.set(id, content);
    return this;
  }

  drop(id: string): this {
    this.archives.delete(id);
    return this;
  }

  ids(): string[] {
    return [...this.archives.keys()];
  }

  async list(): Promise<ArchiveEntry[]> {
    if (this.failListing) {
      throw new ListingError(this.location, { cause: new Error("unreachable") });
    }
    return this.ids().map((id, i) => ({
      jobId: id,
      location: this.location,
      path: `${this.location}/${id}`,
      modifiedAt: i,
    }));
  }

  async read(entry: ArchiveEntry): Promise<ArchivedJson[]> {
    this.reads.push(entry.jobId);
    const content = this.archives.get(entry.jobId);
    if (content === undefined) {
      throw new IngestionError(entry.jobId, `No archive ${entry.path}`);
    }
    if (content instanceof Error) throw content;
    return content;
  }

  async remove(entry: ArchiveEntry): Promise<void> {
    if (!this.archives.has(entry.jobId)) {
      throw new HousekeepingError(`No archive ${entry.path}`);
    }
    this.archives.delete(entry.jobId);
    this.removed.push(entry.jobId);
  }
}

export class InMemoryObjectStore implements IObjectStoreClient {
  readonly objects = new Map<string, { body: string; lastModified: number }>();
  failListing = false;

  put(bucket: string, key: string, body: string, lastModified = 0): this {
    this.objects.set(`${bucket}/${key}`, { body, lastModified });
    return this;
  }

  async listObjects(bucket: string, prefix: string): Promise<StoredObject[]> {
    if (this.failListing) throw new Error("connection reset");
    const result: StoredObject[] = [];
    for (const [fullKey, object] of [...this.objects].sort(([a], [b]) => a.localeCompare(b))) {
      if (!fullKey.startsWith(`${bucket}/`)) continue;
      const key = fullKey.slice(bucket.length + 1);
      if (!key.startsWith(prefix) || key.slice(prefix.length).includes("/")) continue;
      result.push({ key, lastModified: object.lastModified });
    }
    return result;
  }

  async getObjectText(bucket: string, key: string): Promise<string> {
    const object = this.objects.get(`${bucket}/${key}`);
    if (!object) throw new Error(`NoSuchKey: ${key}`);
    return object.body;
  }

  async deleteObject(bucket: string, key: string): Promise<void> {
    this.objects.delete(`${bucket}/${key}`);
  }
}

export async function withTempDir<T>(fn: (dir: string) => Promise<T>): Promise<T> {
  const dir = await mkdtemp(join(tmpdir(), "archive-fetcher-"));
  try {
    return await fn(dir);
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
}

export async function makeTempDir(): Promise<string> {
  return mkdtemp(join(tmpdir(), "archive-fetcher-"));
}
